/**
 * Generation Queue
 *
 * Credit-gated image generation. Requests are charged up front, queued in the
 * tier their remaining balance earns, and refunded after the final failed
 * attempt.
 */

import { randomUUID } from 'crypto';
import {
  PRIORITIES,
  type GenerationInput,
  type GenerationRequest,
  type Image,
  type Priority,
  type QueueStatus,
  type Viewer,
} from '../models.js';
import type { ImageGenerator } from './image-generator.js';
import type { ImagesService } from './images.service.js';
import { ServiceUnavailableError } from '../errors.js';
import { CREDITS_PER_REQUEST, priorityFor, type CreditsService } from './credits.service.js';

export const MAX_ATTEMPTS = 3;
export const DEFAULT_CONCURRENCY = 3;

export interface GenerationQueue {
  enqueue(viewer: Viewer, input: GenerationInput): Promise<GenerationRequest>;
  getRequest(id: string): Promise<GenerationRequest | null>;
  getStatus(): Promise<QueueStatus>;
  close(): Promise<void>;
}

/**
 * Work shared by every queue implementation
 */
export class GenerationProcessor {
  constructor(
    private generator: ImageGenerator,
    private images: ImagesService,
    private credits: CreditsService
  ) {}

  /**
   * Charge the viewer and build a queued request
   */
  async createRequest(viewer: Viewer, input: GenerationInput): Promise<GenerationRequest> {
    const remaining = await this.credits.deduct(viewer.id, CREDITS_PER_REQUEST);
    const now = new Date().toISOString();

    return {
      ...input,
      id: randomUUID(),
      userId: viewer.id,
      userName: viewer.name,
      priority: priorityFor(remaining),
      attempts: 0,
      status: 'queued',
      createdAt: now,
      updatedAt: now,
    };
  }

  async process(request: GenerationRequest): Promise<Image> {
    const generated = await this.generator.generate(request.prompt);

    return this.images.createImage({
      prompt: request.prompt,
      imageUrl: generated.imageUrl,
      owner: { id: request.userId, name: request.userName },
      visibility: request.visibility,
      tags: request.tags,
      qualitySignal: generated.qualitySignal,
      generationRequestId: request.id,
    });
  }

  async refund(request: Pick<GenerationRequest, 'id' | 'userId'>): Promise<void> {
    await this.credits.add(request.userId, CREDITS_PER_REQUEST);
    console.log(`[Queue] Refunded ${CREDITS_PER_REQUEST} credits for failed request ${request.id}`);
  }
}

export interface InMemoryQueueOptions {
  concurrency?: number;
  maxAttempts?: number;
}

/**
 * In-process queue; workers always take the oldest request of the highest
 * non-empty tier
 */
export class InMemoryQueue implements GenerationQueue {
  private lanes: Record<Priority, GenerationRequest[]> = { high: [], medium: [], low: [] };
  private requests = new Map<string, GenerationRequest>();
  private running = new Set<Promise<void>>();
  private idleWaiters: Array<() => void> = [];
  private closed = false;
  private concurrency: number;
  private maxAttempts: number;

  constructor(
    private processor: GenerationProcessor,
    options: InMemoryQueueOptions = {}
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.maxAttempts = options.maxAttempts ?? MAX_ATTEMPTS;
  }

  async enqueue(viewer: Viewer, input: GenerationInput): Promise<GenerationRequest> {
    if (this.closed) {
      throw new ServiceUnavailableError('Generation queue is shutting down');
    }

    const request = await this.processor.createRequest(viewer, input);

    this.requests.set(request.id, request);
    this.lanes[request.priority].push(request);
    console.log(`[Queue] Request ${request.id} added to ${request.priority} queue for user ${viewer.id}`);

    const snapshot = { ...request };
    this.drain();
    return snapshot;
  }

  async getRequest(id: string): Promise<GenerationRequest | null> {
    const request = this.requests.get(id);
    return request ? { ...request } : null;
  }

  async getStatus(): Promise<QueueStatus> {
    return {
      high: this.lanes.high.length,
      medium: this.lanes.medium.length,
      low: this.lanes.low.length,
    };
  }

  /**
   * Resolves once nothing is queued or running
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  async close(): Promise<void> {
    this.closed = true;
    await Promise.all(this.running);
  }

  private isIdle(): boolean {
    return this.running.size === 0 && PRIORITIES.every((priority) => this.lanes[priority].length === 0);
  }

  private takeNext(): GenerationRequest | undefined {
    for (const priority of PRIORITIES) {
      const request = this.lanes[priority].shift();
      if (request) return request;
    }
    return undefined;
  }

  private drain(): void {
    while (!this.closed && this.running.size < this.concurrency) {
      const request = this.takeNext();
      if (!request) break;

      const task = this.run(request).finally(() => {
        this.running.delete(task);
        this.drain();
      });
      this.running.add(task);
    }

    if (this.isIdle()) {
      const waiters = this.idleWaiters.splice(0);
      for (const resolve of waiters) resolve();
    }
  }

  private async run(request: GenerationRequest): Promise<void> {
    request.status = 'processing';
    request.attempts += 1;
    request.updatedAt = new Date().toISOString();

    try {
      const image = await this.processor.process(request);
      request.status = 'completed';
      request.imageId = image.id;
      request.error = undefined;
      console.log(`[Queue] Request ${request.id} completed: image ${image.id}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      request.error = message;
      console.error(`[Queue] Request ${request.id} attempt ${request.attempts} failed: ${message}`);

      if (request.attempts < this.maxAttempts) {
        request.status = 'queued';
        this.lanes[request.priority].push(request);
      } else {
        request.status = 'failed';
        try {
          await this.processor.refund(request);
        } catch (refundError) {
          console.error(`[Queue] Refund for request ${request.id} failed:`, refundError);
        }
      }
    }

    request.updatedAt = new Date().toISOString();
  }
}
