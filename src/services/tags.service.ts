/**
 * Tags Service
 * Free-form image tags, created on first use
 */

import type { GalleryStore } from '../store.js';
import type { Image, TagUsage, Viewer } from '../models.js';
import { NotAuthorizedError, NotFoundError, ValidationError } from '../errors.js';
import { assertCanModify, canView } from './images.service.js';

/**
 * Tags Service Configuration
 */
export interface TagsServiceConfig {
  maxTagsPerImage: number;
  maxTagLength: number;
}

const DEFAULT_CONFIG: TagsServiceConfig = {
  maxTagsPerImage: 20,
  maxTagLength: 50,
};

/**
 * Trim, collapse inner whitespace and lowercase. Returns null for names that
 * are empty or too long.
 */
export function normalizeTagName(name: string, maxLength = DEFAULT_CONFIG.maxTagLength): string | null {
  const normalized = name.trim().replace(/\s+/g, ' ').toLowerCase();
  if (!normalized || normalized.length > maxLength) return null;
  return normalized;
}

/**
 * Tags Service
 */
export class TagsService {
  private config: TagsServiceConfig;

  constructor(
    private store: GalleryStore,
    config: Partial<TagsServiceConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Normalize and deduplicate a batch of names, rejecting the batch if any is invalid
   */
  normalizeNames(names: string[]): string[] {
    const normalized = new Set<string>();

    for (const name of names) {
      const tag = normalizeTagName(name, this.config.maxTagLength);
      if (!tag) {
        throw new ValidationError(`Invalid tag name: "${name}"`, {
          maxLength: this.config.maxTagLength,
        });
      }
      normalized.add(tag);
    }

    return Array.from(normalized);
  }

  /**
   * Attach tags to an image the viewer owns
   */
  async tagImage(imageId: string, names: string[], viewer: Viewer): Promise<Image> {
    const image = await this.store.getImage(imageId);
    if (!image || !canView(image, viewer)) throw new NotFoundError('image');
    assertCanModify(image, viewer);

    const tags = this.normalizeNames(names);
    const combined = new Set([...image.tags, ...tags]);
    if (combined.size > this.config.maxTagsPerImage) {
      throw new ValidationError(`An image can carry at most ${this.config.maxTagsPerImage} tags`, {
        current: image.tags.length,
        requested: tags.length,
      });
    }

    const updated = await this.store.attachTags(imageId, tags);
    if (!updated) throw new NotFoundError('image');

    console.log(`[Tags] Tagged image ${imageId}: ${tags.join(', ')}`);
    return updated;
  }

  /**
   * Detach one tag from an image the viewer owns
   */
  async untagImage(imageId: string, name: string, viewer: Viewer): Promise<void> {
    const image = await this.store.getImage(imageId);
    if (!image || !canView(image, viewer)) throw new NotFoundError('image');
    assertCanModify(image, viewer);

    const tag = normalizeTagName(name, this.config.maxTagLength);
    if (!tag || !(await this.store.detachTag(imageId, tag))) {
      throw new NotFoundError('tag');
    }
  }

  /**
   * Tags with image counts, most used first
   */
  async listTags(options: { limit?: number } = {}): Promise<TagUsage[]> {
    return this.store.listTagUsage(options.limit);
  }

  /**
   * Remove a tag everywhere (admin only)
   */
  async deleteTag(name: string, viewer: Viewer): Promise<void> {
    if (viewer.role !== 'admin') {
      throw new NotAuthorizedError('Only admins can delete tags');
    }

    const tag = normalizeTagName(name, this.config.maxTagLength);
    if (!tag || !(await this.store.deleteTag(tag))) {
      throw new NotFoundError('tag');
    }

    console.log(`[Tags] Deleted tag: ${tag}`);
  }
}

export function createTagsService(store: GalleryStore, config?: Partial<TagsServiceConfig>): TagsService {
  return new TagsService(store, config);
}
