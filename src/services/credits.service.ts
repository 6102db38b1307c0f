/**
 * Credits Service
 * Generation credits, daily allowance and priority tiers
 */

import type { CreditAccount, Priority, PriorityInfo } from '../models.js';
import type { GalleryStore } from '../store.js';
import { InsufficientCreditsError, NotFoundError, ValidationError } from '../errors.js';

export const STARTING_CREDITS = 100;
export const DAILY_FREE_CREDITS = 50;
export const CREDITS_PER_REQUEST = 12;
export const MEDIUM_PRIORITY_THRESHOLD = 100;
export const HIGH_PRIORITY_THRESHOLD = 500;

export interface CreditsServiceConfig {
  startingCredits: number;
  dailyFreeCredits: number;
  now: () => Date;
}

const DEFAULT_CONFIG: CreditsServiceConfig = {
  startingCredits: STARTING_CREDITS,
  dailyFreeCredits: DAILY_FREE_CREDITS,
  now: () => new Date(),
};

export function priorityFor(credits: number): Priority {
  if (credits >= HIGH_PRIORITY_THRESHOLD) return 'high';
  if (credits >= MEDIUM_PRIORITY_THRESHOLD) return 'medium';
  return 'low';
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

function assertAmount(amount: number): void {
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new ValidationError('Credit amount must be a positive integer');
  }
}

/**
 * Credits Service
 *
 * Balances live in the store. A deduction is one conditional update and never
 * takes an account below zero.
 */
export class CreditsService {
  private config: CreditsServiceConfig;

  constructor(
    private store: GalleryStore,
    config: Partial<CreditsServiceConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Open an account with the starting balance; no-op when it exists
   */
  async openAccount(userId: string): Promise<CreditAccount> {
    const existing = await this.store.getCreditAccount(userId);
    if (existing) return existing;

    return this.store.createCreditAccount({
      userId,
      credits: this.config.startingCredits,
      lastCreditsUpdate: this.config.now().toISOString(),
    });
  }

  /**
   * Current balance, after granting today's free credits
   */
  async getBalance(userId: string): Promise<number> {
    return (await this.refresh(userId)).credits;
  }

  async deduct(userId: string, amount: number = CREDITS_PER_REQUEST): Promise<number> {
    assertAmount(amount);
    const account = await this.refresh(userId);

    const updated = await this.store.adjustCredits(userId, -amount);
    if (!updated) {
      const current = await this.store.getCreditAccount(userId);
      throw new InsufficientCreditsError(amount, current?.credits ?? account.credits);
    }

    console.log(`[Credits] Deducted ${amount} credits from ${userId}. New balance: ${updated.credits}`);
    return updated.credits;
  }

  async add(userId: string, amount: number): Promise<number> {
    assertAmount(amount);
    await this.refresh(userId);

    const updated = await this.store.adjustCredits(userId, amount);
    if (!updated) throw new NotFoundError('credit_account');

    console.log(`[Credits] Added ${amount} credits to ${userId}. New balance: ${updated.credits}`);
    return updated.credits;
  }

  async canMakeRequest(userId: string): Promise<boolean> {
    return (await this.getBalance(userId)) >= CREDITS_PER_REQUEST;
  }

  async getPriorityInfo(userId: string): Promise<PriorityInfo> {
    const credits = await this.getBalance(userId);
    return {
      userCredits: credits,
      userPriority: priorityFor(credits),
      mediumPriorityThreshold: MEDIUM_PRIORITY_THRESHOLD,
      highPriorityThreshold: HIGH_PRIORITY_THRESHOLD,
      canMakeRequest: credits >= CREDITS_PER_REQUEST,
    };
  }

  /**
   * Grant the daily allowance at most once per UTC day; never on the opening day
   */
  private async refresh(userId: string): Promise<CreditAccount> {
    const account = await this.openAccount(userId);
    const now = this.config.now();
    const dayStart = startOfUtcDay(now);

    if (Date.parse(account.lastCreditsUpdate) >= dayStart.getTime()) return account;

    const granted = await this.store.grantDailyCredits(userId, this.config.dailyFreeCredits, dayStart, now);
    if (granted) {
      console.log(`[Credits] Added daily free credits to ${userId}. New balance: ${granted.credits}`);
      return granted;
    }

    // Another request granted today's credits first
    return (await this.store.getCreditAccount(userId)) ?? account;
  }
}
