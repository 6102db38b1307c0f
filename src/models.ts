import type { UserRole } from './models/auth.js';

export type ImageVisibility = 'public' | 'private';
export type GalleryVisibility = 'all' | ImageVisibility;
export type DateRange = '1d' | '7d' | '30d';

export * from './models/tags.js';
export * from './models/auth.js';
export * from './models/credits.js';

/**
 * Raw engagement counters persisted on every image
 */
export interface ImageSignals {
  views: number;
  upvotes: number;
  shares: number;
  saves: number;
}

export type SignalName = keyof ImageSignals;

/**
 * Generated image
 */
export interface Image extends ImageSignals {
  id: string;
  prompt: string;
  imageUrl: string;
  ownerId: string;
  ownerName: string;
  visibility: ImageVisibility;
  tags: string[];
  // 0-1, supplied by the generator or an external evaluator
  qualitySignal: number;
  generationRequestId?: string;
  createdAt: string;
  updatedAt: string;
}

export interface RankingScores {
  engagement: number;
  quality: number;
  trending: number;
  final: number;
}

export interface RankedImage extends Image {
  scores: RankingScores;
}

/**
 * Which images a viewer may see. `ownerId` unset means every owner (admin).
 */
export type VisibilityScope =
  | { kind: 'public' }
  | { kind: 'private'; ownerId?: string }
  | { kind: 'all'; ownerId?: string };

/**
 * Validated gallery request
 */
export interface GalleryQuery {
  tag?: string;
  dateRange?: DateRange;
  visibility?: GalleryVisibility;
  page: number;
  asOf?: Date;
}

/**
 * Query handed to the persistence layer
 */
export interface RankedImageQuery {
  scope: VisibilityScope;
  tag?: string;
  since?: Date;
  asOf: Date;
  offset: number;
  limit: number;
}

export interface GalleryImage {
  id: string;
  prompt: string;
  imageUrl: string;
  creator: {
    id: string;
    name: string;
  };
  createdAt: string;
  visibility: ImageVisibility;
  tags: string[];
  views: number;
  upvotes: number;
  shares: number;
  saves: number;
  scores: RankingScores;
}

export interface GalleryPage {
  items: GalleryImage[];
  page: number;
  pageSize: number;
  hasMore: boolean;
  asOf: string;
}

/**
 * Authenticated caller, or `undefined` for anonymous requests
 */
export interface Viewer {
  id: string;
  name: string;
  role: UserRole;
}
