import { randomUUID } from 'crypto';
import type {
  Collection,
  CollectionUpdate,
  CreditAccount,
  Image,
  RankedImage,
  RankedImageQuery,
  SignalName,
  Tag,
  TagUsage,
  VisibilityScope,
} from './models.js';
import { rankImages } from './services/ranking.js';

export type ImageUpdate = Partial<Pick<Image, 'visibility' | 'qualitySignal'>>;

/**
 * Persistence port. MemoryStore and PgStore both implement it.
 */
export interface GalleryStore {
  createImage(image: Image): Promise<Image>;
  getImage(id: string): Promise<Image | null>;
  updateImage(id: string, updates: ImageUpdate): Promise<Image | null>;
  deleteImage(id: string): Promise<boolean>;
  listImagesByOwner(ownerId: string): Promise<Image[]>;
  incrementSignal(id: string, signal: SignalName): Promise<Image | null>;
  /** Records one upvote per user; false when the user already upvoted */
  addUpvote(imageId: string, userId: string): Promise<boolean>;
  queryRankedImages(query: RankedImageQuery): Promise<RankedImage[]>;

  attachTags(imageId: string, names: string[]): Promise<Image | null>;
  detachTag(imageId: string, name: string): Promise<boolean>;
  listTagUsage(limit?: number): Promise<TagUsage[]>;
  deleteTag(name: string): Promise<boolean>;

  createCollection(collection: Collection): Promise<Collection>;
  getCollection(id: string): Promise<Collection | null>;
  listCollections(ownerId: string): Promise<Collection[]>;
  updateCollection(id: string, updates: CollectionUpdate): Promise<Collection | null>;
  deleteCollection(id: string): Promise<boolean>;
  /** False when the image was already a member */
  addToCollection(collectionId: string, imageId: string): Promise<boolean>;
  removeFromCollection(collectionId: string, imageId: string): Promise<boolean>;

  getCreditAccount(userId: string): Promise<CreditAccount | null>;
  /** Returns the existing account unchanged when one is already open */
  createCreditAccount(account: CreditAccount): Promise<CreditAccount>;
  /** Applies `delta` atomically; null when the account is missing or would go negative */
  adjustCredits(userId: string, delta: number): Promise<CreditAccount | null>;
  /** Adds `amount` once, only if the last update is before `dayStart` */
  grantDailyCredits(userId: string, amount: number, dayStart: Date, now: Date): Promise<CreditAccount | null>;

  initialize?(): Promise<void>;
  close?(): Promise<void>;
}

export function matchesScope(image: Pick<Image, 'visibility' | 'ownerId'>, scope: VisibilityScope): boolean {
  switch (scope.kind) {
    case 'public':
      return image.visibility === 'public';
    case 'private':
      return image.visibility === 'private' && (!scope.ownerId || image.ownerId === scope.ownerId);
    case 'all':
      return image.visibility === 'public' || !scope.ownerId || image.ownerId === scope.ownerId;
  }
}

function byNewest(a: { createdAt: string }, b: { createdAt: string }) {
  return b.createdAt.localeCompare(a.createdAt);
}

export class MemoryStore implements GalleryStore {
  images = new Map<string, Image>();
  tags = new Map<string, Tag>(); // name -> tag
  collections = new Map<string, Collection>();
  upvotes = new Map<string, Set<string>>(); // imageId -> userIds
  creditAccounts = new Map<string, CreditAccount>(); // userId -> account

  async createImage(image: Image) {
    const stored: Image = { ...image, tags: [...image.tags] };
    this.images.set(stored.id, stored);
    return stored;
  }

  async getImage(id: string) {
    return this.images.get(id) ?? null;
  }

  async updateImage(id: string, updates: ImageUpdate) {
    const image = this.images.get(id);
    if (!image) return null;

    const updated: Image = {
      ...image,
      ...updates,
      updatedAt: new Date().toISOString(),
    };

    this.images.set(id, updated);
    return updated;
  }

  async deleteImage(id: string) {
    if (!this.images.delete(id)) return false;

    this.upvotes.delete(id);
    for (const collection of this.collections.values()) {
      if (collection.imageIds.includes(id)) {
        collection.imageIds = collection.imageIds.filter((imageId) => imageId !== id);
      }
    }
    return true;
  }

  async listImagesByOwner(ownerId: string) {
    return Array.from(this.images.values())
      .filter((image) => image.ownerId === ownerId)
      .sort(byNewest);
  }

  async incrementSignal(id: string, signal: SignalName) {
    const image = this.images.get(id);
    if (!image) return null;

    const updated: Image = { ...image };
    updated[signal] += 1;
    this.images.set(id, updated);
    return updated;
  }

  async addUpvote(imageId: string, userId: string) {
    let voters = this.upvotes.get(imageId);
    if (!voters) {
      voters = new Set<string>();
      this.upvotes.set(imageId, voters);
    }
    if (voters.has(userId)) return false;

    voters.add(userId);
    await this.incrementSignal(imageId, 'upvotes');
    return true;
  }

  async queryRankedImages(query: RankedImageQuery) {
    const asOf = query.asOf.getTime();
    const since = query.since?.getTime();

    const candidates = Array.from(this.images.values()).filter((image) => {
      const createdAt = Date.parse(image.createdAt);
      if (createdAt > asOf) return false;
      if (since !== undefined && createdAt < since) return false;
      if (query.tag && !image.tags.includes(query.tag)) return false;
      return matchesScope(image, query.scope);
    });

    return rankImages(candidates, query.asOf).slice(query.offset, query.offset + query.limit);
  }

  // Tags

  async attachTags(imageId: string, names: string[]) {
    const image = this.images.get(imageId);
    if (!image) return null;

    const now = new Date().toISOString();
    for (const name of names) {
      if (!this.tags.has(name)) {
        this.tags.set(name, { id: randomUUID(), name, createdAt: now });
      }
    }

    const updated: Image = {
      ...image,
      tags: Array.from(new Set([...image.tags, ...names])).sort(),
      updatedAt: now,
    };
    this.images.set(imageId, updated);
    return updated;
  }

  async detachTag(imageId: string, name: string) {
    const image = this.images.get(imageId);
    if (!image || !image.tags.includes(name)) return false;

    this.images.set(imageId, {
      ...image,
      tags: image.tags.filter((tag) => tag !== name),
      updatedAt: new Date().toISOString(),
    });
    return true;
  }

  async listTagUsage(limit?: number) {
    const counts = new Map<string, number>();
    for (const name of this.tags.keys()) counts.set(name, 0);
    for (const image of this.images.values()) {
      for (const tag of image.tags) counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }

    const usage = Array.from(counts, ([name, count]) => ({ name, count })).sort(
      (a, b) => b.count - a.count || a.name.localeCompare(b.name)
    );
    return limit === undefined ? usage : usage.slice(0, limit);
  }

  async deleteTag(name: string) {
    if (!this.tags.delete(name)) return false;

    for (const image of this.images.values()) {
      if (image.tags.includes(name)) {
        this.images.set(image.id, { ...image, tags: image.tags.filter((tag) => tag !== name) });
      }
    }
    return true;
  }

  // Collections

  async createCollection(collection: Collection) {
    const stored: Collection = { ...collection, imageIds: [...collection.imageIds] };
    this.collections.set(stored.id, stored);
    return stored;
  }

  async getCollection(id: string) {
    return this.collections.get(id) ?? null;
  }

  async listCollections(ownerId: string) {
    return Array.from(this.collections.values())
      .filter((collection) => collection.ownerId === ownerId)
      .sort(byNewest);
  }

  async updateCollection(id: string, updates: CollectionUpdate) {
    const collection = this.collections.get(id);
    if (!collection) return null;

    const updated: Collection = {
      ...collection,
      ...updates,
      updatedAt: new Date().toISOString(),
    };
    this.collections.set(id, updated);
    return updated;
  }

  async deleteCollection(id: string) {
    return this.collections.delete(id);
  }

  async addToCollection(collectionId: string, imageId: string) {
    const collection = this.collections.get(collectionId);
    if (!collection || collection.imageIds.includes(imageId)) return false;

    this.collections.set(collectionId, {
      ...collection,
      imageIds: [...collection.imageIds, imageId],
      updatedAt: new Date().toISOString(),
    });
    return true;
  }

  async removeFromCollection(collectionId: string, imageId: string) {
    const collection = this.collections.get(collectionId);
    if (!collection || !collection.imageIds.includes(imageId)) return false;

    this.collections.set(collectionId, {
      ...collection,
      imageIds: collection.imageIds.filter((id) => id !== imageId),
      updatedAt: new Date().toISOString(),
    });
    return true;
  }

  // Credits

  async getCreditAccount(userId: string) {
    const account = this.creditAccounts.get(userId);
    return account ? { ...account } : null;
  }

  async createCreditAccount(account: CreditAccount) {
    const existing = this.creditAccounts.get(account.userId);
    if (existing) return { ...existing };

    this.creditAccounts.set(account.userId, { ...account });
    return { ...account };
  }

  async adjustCredits(userId: string, delta: number) {
    const account = this.creditAccounts.get(userId);
    if (!account || account.credits + delta < 0) return null;

    const updated: CreditAccount = { ...account, credits: account.credits + delta };
    this.creditAccounts.set(userId, updated);
    return { ...updated };
  }

  async grantDailyCredits(userId: string, amount: number, dayStart: Date, now: Date) {
    const account = this.creditAccounts.get(userId);
    if (!account || Date.parse(account.lastCreditsUpdate) >= dayStart.getTime()) return null;

    const updated: CreditAccount = {
      ...account,
      credits: account.credits + amount,
      lastCreditsUpdate: now.toISOString(),
    };
    this.creditAccounts.set(userId, updated);
    return { ...updated };
  }
}
