/**
 * Collections Service
 * Owner-scoped sets of saved images
 */

import { randomUUID } from 'crypto';
import type { GalleryStore } from '../store.js';
import type { Collection, CollectionUpdate, Image, Viewer } from '../models.js';
import { NotAuthorizedError, NotFoundError } from '../errors.js';
import { canView } from './images.service.js';

export class CollectionsService {
  constructor(private store: GalleryStore) {}

  async createCollection(
    viewer: Viewer,
    data: { name: string; description?: string }
  ): Promise<Collection> {
    const now = new Date().toISOString();
    const collection = await this.store.createCollection({
      id: randomUUID(),
      name: data.name,
      description: data.description,
      ownerId: viewer.id,
      imageIds: [],
      createdAt: now,
      updatedAt: now,
    });

    console.log(`[Collections] Created collection: ${collection.name} (${collection.id})`);
    return collection;
  }

  /**
   * Collections are private to their owner (and admins)
   */
  async getCollection(id: string, viewer: Viewer): Promise<Collection> {
    const collection = await this.store.getCollection(id);
    if (!collection || (collection.ownerId !== viewer.id && viewer.role !== 'admin')) {
      throw new NotFoundError('collection');
    }
    return collection;
  }

  async listCollections(viewer: Viewer): Promise<Collection[]> {
    return this.store.listCollections(viewer.id);
  }

  /**
   * Images of a collection the viewer can still see
   */
  async listImages(id: string, viewer: Viewer): Promise<Image[]> {
    const collection = await this.getCollection(id, viewer);
    const images: Image[] = [];

    for (const imageId of collection.imageIds) {
      const image = await this.store.getImage(imageId);
      if (image && canView(image, viewer)) images.push(image);
    }

    return images;
  }

  async updateCollection(id: string, viewer: Viewer, updates: CollectionUpdate): Promise<Collection> {
    await this.getOwned(id, viewer);

    const updated = await this.store.updateCollection(id, updates);
    if (!updated) throw new NotFoundError('collection');
    return updated;
  }

  async deleteCollection(id: string, viewer: Viewer): Promise<void> {
    await this.getOwned(id, viewer);
    await this.store.deleteCollection(id);
  }

  /**
   * Saving an image counts towards its `saves` signal once per collection
   */
  async addImage(id: string, imageId: string, viewer: Viewer): Promise<{ collection: Collection; added: boolean }> {
    await this.getOwned(id, viewer);

    const image = await this.store.getImage(imageId);
    if (!image || !canView(image, viewer)) throw new NotFoundError('image');

    const added = await this.store.addToCollection(id, imageId);
    if (added) {
      await this.store.incrementSignal(imageId, 'saves');
    }

    return { collection: await this.getCollection(id, viewer), added };
  }

  async removeImage(id: string, imageId: string, viewer: Viewer): Promise<Collection> {
    await this.getOwned(id, viewer);

    if (!(await this.store.removeFromCollection(id, imageId))) {
      throw new NotFoundError('image');
    }
    return this.getCollection(id, viewer);
  }

  private async getOwned(id: string, viewer: Viewer): Promise<Collection> {
    const collection = await this.getCollection(id, viewer);
    if (collection.ownerId !== viewer.id) {
      throw new NotAuthorizedError('Only the owner can modify this collection');
    }
    return collection;
  }
}
