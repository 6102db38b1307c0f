/**
 * Gallery Service
 *
 * Filters, ranks and pages the image gallery. Every page of a browsing session
 * is ranked at the same `asOf` instant, so the order does not shift between
 * load-more requests and images created mid-session do not push earlier items
 * onto the next page.
 */

import { z } from 'zod';
import type { GalleryStore } from '../store.js';
import type {
  DateRange,
  GalleryImage,
  GalleryPage,
  GalleryQuery,
  GalleryVisibility,
  RankedImage,
  Viewer,
  VisibilityScope,
} from '../models.js';
import { InvalidFilterError, InvalidPageError, NotAuthorizedError } from '../errors.js';
import { normalizeTagName } from './tags.service.js';

export const DEFAULT_PAGE_SIZE = 12;

const HOUR_MS = 60 * 60 * 1000;

export const DATE_RANGE_HOURS: Record<DateRange, number> = {
  '1d': 24,
  '7d': 7 * 24,
  '30d': 30 * 24,
};

const dateRangeSchema = z.enum(['1d', '7d', '30d']);
const visibilitySchema = z.enum(['all', 'public', 'private']);
const pageSchema = z.coerce.number().int().positive().max(Number.MAX_SAFE_INTEGER);
const asOfSchema = z.string().datetime({ offset: true });

export interface GalleryServiceConfig {
  pageSize: number;
}

/**
 * Raw query-string values; empty strings count as unset
 */
export interface RawGalleryQuery {
  tag?: unknown;
  date_range?: unknown;
  visibility?: unknown;
  page?: unknown;
  as_of?: unknown;
}

function isUnset(value: unknown): boolean {
  return value === undefined || value === '';
}

/**
 * Validate raw request values. Nothing is applied unless every value is valid.
 */
export function parseGalleryQuery(raw: RawGalleryQuery): GalleryQuery {
  const query: GalleryQuery = { page: 1 };

  if (!isUnset(raw.page)) {
    const page = pageSchema.safeParse(raw.page);
    if (!page.success) throw new InvalidPageError();
    query.page = page.data;
  }

  if (!isUnset(raw.date_range)) {
    const dateRange = dateRangeSchema.safeParse(raw.date_range);
    if (!dateRange.success) {
      throw new InvalidFilterError('date_range must be one of 1d, 7d, 30d', { field: 'date_range' });
    }
    query.dateRange = dateRange.data;
  }

  if (!isUnset(raw.visibility)) {
    const visibility = visibilitySchema.safeParse(raw.visibility);
    if (!visibility.success) {
      throw new InvalidFilterError('visibility must be one of all, public, private', { field: 'visibility' });
    }
    query.visibility = visibility.data;
  }

  if (!isUnset(raw.tag)) {
    const tag = typeof raw.tag === 'string' ? normalizeTagName(raw.tag) : null;
    if (!tag) {
      throw new InvalidFilterError('tag must be a non-empty name of at most 50 characters', { field: 'tag' });
    }
    query.tag = tag;
  }

  if (!isUnset(raw.as_of)) {
    const asOf = asOfSchema.safeParse(raw.as_of);
    if (!asOf.success) {
      throw new InvalidFilterError('as_of must be an ISO-8601 timestamp', { field: 'as_of' });
    }
    query.asOf = new Date(asOf.data);
  }

  return query;
}

/**
 * Map the requested visibility onto what the viewer may see
 */
export function resolveScope(visibility: GalleryVisibility | undefined, viewer?: Viewer): VisibilityScope {
  if (!viewer) {
    if (visibility === undefined || visibility === 'public') return { kind: 'public' };
    throw new NotAuthorizedError(`Sign in to browse ${visibility} images`);
  }

  const requested = visibility ?? 'all';
  if (requested === 'public') return { kind: 'public' };

  // Admins are not restricted to their own private images
  const ownerId = viewer.role === 'admin' ? undefined : viewer.id;
  return { kind: requested, ownerId };
}

export function pageWindow(page: number, pageSize: number): { offset: number; limit: number } {
  return { offset: (page - 1) * pageSize, limit: pageSize };
}

export function toGalleryImage(image: RankedImage): GalleryImage {
  return {
    id: image.id,
    prompt: image.prompt,
    imageUrl: image.imageUrl,
    creator: {
      id: image.ownerId,
      name: image.ownerName,
    },
    createdAt: image.createdAt,
    visibility: image.visibility,
    tags: image.tags,
    views: image.views,
    upvotes: image.upvotes,
    shares: image.shares,
    saves: image.saves,
    scores: image.scores,
  };
}

/**
 * Gallery Service
 */
export class GalleryService {
  readonly pageSize: number;

  constructor(
    private store: GalleryStore,
    config: Partial<GalleryServiceConfig> = {}
  ) {
    this.pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  /**
   * One page of ranked images. Pages past the end are empty, not errors.
   */
  async getPage(query: GalleryQuery, viewer?: Viewer, now: Date = new Date()): Promise<GalleryPage> {
    if (!Number.isSafeInteger(query.page) || query.page < 1) {
      throw new InvalidPageError();
    }

    const scope = resolveScope(query.visibility, viewer);
    const asOf = query.asOf && query.asOf.getTime() < now.getTime() ? query.asOf : now;
    const since = query.dateRange
      ? new Date(asOf.getTime() - DATE_RANGE_HOURS[query.dateRange] * HOUR_MS)
      : undefined;
    const { offset, limit } = pageWindow(query.page, this.pageSize);
    const page: GalleryPage = {
      items: [],
      page: query.page,
      pageSize: this.pageSize,
      hasMore: false,
      asOf: asOf.toISOString(),
    };

    // No result set reaches this far; the offset would not fit a database OFFSET
    if (offset > Number.MAX_SAFE_INTEGER) return page;

    // One extra row tells whether another page exists
    const rows = await this.store.queryRankedImages({
      scope,
      tag: query.tag,
      since,
      asOf,
      offset,
      limit: limit + 1,
    });

    return {
      ...page,
      items: rows.slice(0, limit).map(toGalleryImage),
      hasMore: rows.length > limit,
    };
  }

  /**
   * Parse raw request values, then read the page
   */
  async listGallery(raw: RawGalleryQuery, viewer?: Viewer, now?: Date): Promise<GalleryPage> {
    return this.getPage(parseGalleryQuery(raw), viewer, now);
  }
}

export function createGalleryService(store: GalleryStore, config?: Partial<GalleryServiceConfig>): GalleryService {
  return new GalleryService(store, config);
}
