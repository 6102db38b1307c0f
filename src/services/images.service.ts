/**
 * Images Service
 * Library access, visibility and engagement writes
 */

import { randomUUID } from 'crypto';
import type { GalleryStore } from '../store.js';
import type { Image, ImageVisibility, Viewer } from '../models.js';
import { NotAuthorizedError, NotFoundError } from '../errors.js';

export interface NewImage {
  prompt: string;
  imageUrl: string;
  owner: Pick<Viewer, 'id' | 'name'>;
  visibility: ImageVisibility;
  tags?: string[];
  qualitySignal?: number;
  generationRequestId?: string;
}

/**
 * Owner and admin see everything; everyone else sees public images only
 */
export function canView(image: Pick<Image, 'visibility' | 'ownerId'>, viewer?: Viewer): boolean {
  if (image.visibility === 'public') return true;
  if (!viewer) return false;
  return viewer.role === 'admin' || viewer.id === image.ownerId;
}

export function assertCanModify(image: Pick<Image, 'ownerId'>, viewer: Viewer): void {
  if (viewer.role !== 'admin' && viewer.id !== image.ownerId) {
    throw new NotAuthorizedError('Only the owner can modify this image');
  }
}

export class ImagesService {
  constructor(private store: GalleryStore) {}

  async createImage(data: NewImage): Promise<Image> {
    const now = new Date().toISOString();
    const image: Image = {
      id: randomUUID(),
      prompt: data.prompt,
      imageUrl: data.imageUrl,
      ownerId: data.owner.id,
      ownerName: data.owner.name,
      visibility: data.visibility,
      tags: [],
      qualitySignal: Math.min(Math.max(data.qualitySignal ?? 0, 0), 1),
      generationRequestId: data.generationRequestId,
      views: 0,
      upvotes: 0,
      shares: 0,
      saves: 0,
      createdAt: now,
      updatedAt: now,
    };

    let created = await this.store.createImage(image);
    if (data.tags && data.tags.length > 0) {
      created = (await this.store.attachTags(created.id, data.tags)) ?? created;
    }

    console.log(`[Images] Created image ${created.id} for ${created.ownerId}`);
    return created;
  }

  /**
   * Read without side effects. Hidden images look missing.
   */
  async getImage(id: string, viewer?: Viewer): Promise<Image> {
    const image = await this.store.getImage(id);
    if (!image || !canView(image, viewer)) {
      throw new NotFoundError('image');
    }
    return image;
  }

  /**
   * Detail view write; the only path that increments `views`
   */
  async recordView(id: string, viewer?: Viewer): Promise<Image> {
    await this.getImage(id, viewer);
    return this.increment(id, 'views');
  }

  async share(id: string, viewer?: Viewer): Promise<Image> {
    await this.getImage(id, viewer);
    return this.increment(id, 'shares');
  }

  /**
   * One upvote per user; a repeat leaves the count unchanged
   */
  async upvote(id: string, viewer: Viewer): Promise<{ image: Image; alreadyUpvoted: boolean }> {
    await this.getImage(id, viewer);

    const added = await this.store.addUpvote(id, viewer.id);
    const image = await this.store.getImage(id);
    if (!image) throw new NotFoundError('image');

    return { image, alreadyUpvoted: !added };
  }

  async setVisibility(id: string, viewer: Viewer, visibility: ImageVisibility): Promise<Image> {
    const image = await this.getImage(id, viewer);
    assertCanModify(image, viewer);

    const updated = await this.store.updateImage(id, { visibility });
    if (!updated) throw new NotFoundError('image');
    return updated;
  }

  async deleteImage(id: string, viewer: Viewer): Promise<void> {
    const image = await this.getImage(id, viewer);
    assertCanModify(image, viewer);

    await this.store.deleteImage(id);
    console.log(`[Images] Deleted image ${id}`);
  }

  async listOwned(userId: string): Promise<Image[]> {
    return this.store.listImagesByOwner(userId);
  }

  private async increment(id: string, signal: 'views' | 'shares'): Promise<Image> {
    const image = await this.store.incrementSignal(id, signal);
    if (!image) throw new NotFoundError('image');
    return image;
  }
}
