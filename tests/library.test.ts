import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryStore } from '../src/store.js';
import { ImagesService, canView } from '../src/services/images.service.js';
import { TagsService, normalizeTagName } from '../src/services/tags.service.js';
import { CollectionsService } from '../src/services/collections.service.js';
import { NotAuthorizedError, NotFoundError, ValidationError } from '../src/errors.js';
import { admin, alice, bob, makeImage } from './helpers.js';

describe('Images, tags and collections', () => {
  let store: MemoryStore;
  let images: ImagesService;
  let tags: TagsService;
  let collections: CollectionsService;

  beforeEach(async () => {
    store = new MemoryStore();
    images = new ImagesService(store);
    tags = new TagsService(store);
    collections = new CollectionsService(store);

    await store.createImage(makeImage({ id: 'public-img', tags: ['sea'] }));
    await store.createImage(makeImage({ id: 'private-img', visibility: 'private' }));
  });

  describe('ImagesService', () => {
    it('checks visibility', () => {
      const hidden = { visibility: 'private' as const, ownerId: alice.id };
      expect(canView(hidden)).toBe(false);
      expect(canView(hidden, bob)).toBe(false);
      expect(canView(hidden, alice)).toBe(true);
      expect(canView(hidden, admin)).toBe(true);
    });

    it('treats hidden images as missing', async () => {
      await expect(images.getImage('private-img', bob)).rejects.toThrow(NotFoundError);
      await expect(images.getImage('private-img')).rejects.toThrow(NotFoundError);
      expect((await images.getImage('private-img', admin)).id).toBe('private-img');
    });

    it('increments views and shares', async () => {
      await images.recordView('public-img');
      await images.recordView('public-img', bob);
      const shared = await images.share('public-img', bob);

      expect(shared.views).toBe(2);
      expect(shared.shares).toBe(1);
    });

    it('keeps one upvote per user', async () => {
      expect((await images.upvote('public-img', bob)).alreadyUpvoted).toBe(false);
      expect((await images.upvote('public-img', admin)).alreadyUpvoted).toBe(false);

      const repeat = await images.upvote('public-img', bob);
      expect(repeat.alreadyUpvoted).toBe(true);
      expect(repeat.image.upvotes).toBe(2);
    });

    it('lets owners and admins toggle visibility', async () => {
      await expect(images.setVisibility('public-img', bob, 'private')).rejects.toThrow(NotAuthorizedError);
      expect((await images.setVisibility('public-img', alice, 'private')).visibility).toBe('private');
      expect((await images.setVisibility('public-img', admin, 'public')).visibility).toBe('public');
    });

    it('removes deleted images from collections', async () => {
      const collection = await collections.createCollection(bob, { name: 'Saved' });
      await collections.addImage(collection.id, 'public-img', bob);

      await expect(images.deleteImage('public-img', bob)).rejects.toThrow(NotAuthorizedError);
      await images.deleteImage('public-img', alice);

      expect((await collections.getCollection(collection.id, bob)).imageIds).toEqual([]);
      expect(await store.getImage('public-img')).toBeNull();
    });
  });

  describe('TagsService', () => {
    it('normalizes names', () => {
      expect(normalizeTagName('  Golden   Hour ')).toBe('golden hour');
      expect(normalizeTagName('   ')).toBeNull();
      expect(normalizeTagName('a'.repeat(51))).toBeNull();
    });

    it('tags owned images', async () => {
      const image = await tags.tagImage('public-img', ['Storm', 'SEA'], alice);
      expect(image.tags).toEqual(['sea', 'storm']);

      await expect(tags.tagImage('public-img', ['mine'], bob)).rejects.toThrow(NotAuthorizedError);
    });

    it('treats private images of other owners as missing', async () => {
      await expect(tags.tagImage('private-img', ['mine'], bob)).rejects.toThrow(NotFoundError);
      await expect(tags.untagImage('private-img', 'sea', bob)).rejects.toThrow(NotFoundError);
    });

    it('caps the number of tags per image', async () => {
      const many = Array.from({ length: 20 }, (_, i) => `tag-${i}`);
      await expect(tags.tagImage('public-img', many, alice)).rejects.toThrow(ValidationError);

      const capped = new TagsService(store, { maxTagsPerImage: 3 });
      await capped.tagImage('public-img', ['a', 'b'], alice);
      await expect(capped.tagImage('public-img', ['c'], alice)).rejects.toThrow(ValidationError);
    });

    it('rejects empty names', async () => {
      await expect(tags.tagImage('public-img', [' '], alice)).rejects.toThrow(ValidationError);
    });

    it('lists usage, most used first', async () => {
      await tags.tagImage('private-img', ['sea', 'fog'], alice);
      expect(await tags.listTags()).toEqual([
        { name: 'sea', count: 2 },
        { name: 'fog', count: 1 },
      ]);
      expect(await tags.listTags({ limit: 1 })).toEqual([{ name: 'sea', count: 2 }]);
    });

    it('untags and deletes', async () => {
      await tags.untagImage('public-img', 'SEA', alice);
      expect((await store.getImage('public-img'))?.tags).toEqual([]);
      await expect(tags.untagImage('public-img', 'sea', alice)).rejects.toThrow(NotFoundError);

      await tags.tagImage('private-img', ['fog'], alice);
      await expect(tags.deleteTag('fog', alice)).rejects.toThrow(NotAuthorizedError);
      await tags.deleteTag('fog', admin);
      expect((await store.getImage('private-img'))?.tags).toEqual([]);
    });
  });

  describe('CollectionsService', () => {
    it('keeps collections private to their owner', async () => {
      const collection = await collections.createCollection(alice, { name: 'Moodboard', description: 'blue' });

      await expect(collections.getCollection(collection.id, bob)).rejects.toThrow(NotFoundError);
      expect(await collections.listCollections(alice)).toHaveLength(1);
      expect(await collections.listCollections(bob)).toEqual([]);
    });

    it('lets admins read but not modify', async () => {
      const collection = await collections.createCollection(alice, { name: 'Moodboard' });

      expect((await collections.getCollection(collection.id, admin)).name).toBe('Moodboard');
      await expect(collections.updateCollection(collection.id, admin, { name: 'Mine now' })).rejects.toThrow(
        NotAuthorizedError
      );
    });

    it('counts a save once per collection', async () => {
      const collection = await collections.createCollection(bob, { name: 'Sea' });

      expect((await collections.addImage(collection.id, 'public-img', bob)).added).toBe(true);
      expect((await collections.addImage(collection.id, 'public-img', bob)).added).toBe(false);
      expect((await store.getImage('public-img'))?.saves).toBe(1);
    });

    it('refuses images the owner cannot see', async () => {
      const collection = await collections.createCollection(bob, { name: 'Sea' });
      await expect(collections.addImage(collection.id, 'private-img', bob)).rejects.toThrow(NotFoundError);
    });

    it('lists only visible images', async () => {
      const collection = await collections.createCollection(bob, { name: 'Sea' });
      await collections.addImage(collection.id, 'public-img', bob);
      await images.setVisibility('public-img', alice, 'private');

      expect(await collections.listImages(collection.id, bob)).toEqual([]);
    });

    it('updates, removes and deletes', async () => {
      const collection = await collections.createCollection(alice, { name: 'Drafts' });
      await collections.addImage(collection.id, 'private-img', alice);

      expect((await collections.updateCollection(collection.id, alice, { name: 'Finals' })).name).toBe('Finals');
      expect((await collections.removeImage(collection.id, 'private-img', alice)).imageIds).toEqual([]);
      await expect(collections.removeImage(collection.id, 'private-img', alice)).rejects.toThrow(NotFoundError);

      await collections.deleteCollection(collection.id, alice);
      await expect(collections.getCollection(collection.id, alice)).rejects.toThrow(NotFoundError);
    });
  });
});
