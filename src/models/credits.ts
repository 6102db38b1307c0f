/**
 * Credits and Generation Models
 */

import type { ImageVisibility } from '../models.js';

export type Priority = 'high' | 'medium' | 'low';

export const PRIORITIES: readonly Priority[] = ['high', 'medium', 'low'];

export interface CreditAccount {
  userId: string;
  credits: number;
  lastCreditsUpdate: string;
}

export interface PriorityInfo {
  userCredits: number;
  userPriority: Priority;
  mediumPriorityThreshold: number;
  highPriorityThreshold: number;
  canMakeRequest: boolean;
}

export type GenerationStatus = 'queued' | 'processing' | 'completed' | 'failed';

export interface GenerationInput {
  prompt: string;
  visibility: ImageVisibility;
  tags: string[];
}

export interface GenerationRequest extends GenerationInput {
  id: string;
  userId: string;
  userName: string;
  priority: Priority;
  attempts: number;
  status: GenerationStatus;
  imageId?: string;
  error?: string;
  createdAt: string;
  updatedAt: string;
}

export type QueueStatus = Record<Priority, number>;
