import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createApp } from '../src/app.js';
import { loadConfig } from '../src/config.js';
import { MemoryStore } from '../src/store.js';
import { InMemoryQueue } from '../src/services/queue.js';
import { FakeGenerator, makeImage } from './helpers.js';

const config = loadConfig({
  LOG_LEVEL: 'silent',
  JWT_SECRET: 'test-secret',
  BCRYPT_ROUNDS: '4',
  ADMIN_EMAIL: 'admin@example.com',
  ADMIN_PASSWORD: 'test-password',
  GALLERY_PAGE_SIZE: '2',
});

describe('HTTP API', () => {
  let app: FastifyInstance;
  let store: MemoryStore;
  let memberToken: string;
  let memberId: string;
  let otherToken: string;
  let adminToken: string;

  async function login(email: string, password: string): Promise<string> {
    const res = await app.inject({ method: 'POST', url: '/auth/login', payload: { email, password } });
    expect(res.statusCode).toBe(200);
    return res.json().accessToken;
  }

  async function register(email: string, name: string): Promise<string> {
    const res = await app.inject({
      method: 'POST',
      url: '/auth/register',
      payload: { email, password: 'password123', name },
    });
    expect(res.statusCode).toBe(201);
    return res.json().user.id;
  }

  const auth = (token: string) => ({ authorization: `Bearer ${token}` });

  beforeAll(async () => {
    store = new MemoryStore();
    app = await createApp({ config, store, generator: new FakeGenerator() });
    await app.ready();

    memberId = await register('member@example.com', 'Member');
    await register('other@example.com', 'Other');
    memberToken = await login('member@example.com', 'password123');
    otherToken = await login('other@example.com', 'password123');
    adminToken = await login('admin@example.com', 'test-password');

    const now = Date.now();
    const hoursAgo = (hours: number) => new Date(now - hours * 60 * 60 * 1000).toISOString();
    await store.createImage(makeImage({ id: 'pub-1', ownerId: memberId, ownerName: 'Member', views: 50, tags: ['sea'], createdAt: hoursAgo(1) }));
    await store.createImage(makeImage({ id: 'pub-2', ownerId: memberId, ownerName: 'Member', views: 20, createdAt: hoursAgo(2) }));
    await store.createImage(makeImage({ id: 'pub-3', ownerId: memberId, ownerName: 'Member', views: 5, createdAt: hoursAgo(3) }));
    await store.createImage(
      makeImage({ id: 'priv-1', ownerId: memberId, ownerName: 'Member', visibility: 'private', createdAt: hoursAgo(4) })
    );
  });

  afterAll(async () => {
    await app.close();
  });

  describe('GET /health', () => {
    it('returns health check status', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toHaveProperty('status', 'ok');
    });
  });

  describe('auth', () => {
    it('returns the current user without the password hash', async () => {
      const res = await app.inject({ method: 'GET', url: '/auth/me', headers: auth(memberToken) });

      expect(res.statusCode).toBe(200);
      const { user } = res.json();
      expect(user.email).toBe('member@example.com');
      expect(user.role).toBe('member');
      expect(user).not.toHaveProperty('passwordHash');
    });

    it('rejects requests without a token', async () => {
      const res = await app.inject({ method: 'GET', url: '/auth/me' });

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: 'unauthenticated', message: 'Missing authorization header' });
    });

    it('rejects duplicate registrations', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: { email: 'member@example.com', password: 'password123', name: 'Again' },
      });

      expect(res.statusCode).toBe(409);
      expect(res.json().error).toBe('email_taken');
    });

    it('validates the registration body', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: { email: 'short@example.com', password: 'short', name: 'Short' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('validation_failed');
    });
  });

  describe('GET /gallery', () => {
    it('pages public images for anonymous viewers', async () => {
      const first = await app.inject({ method: 'GET', url: '/gallery' });
      expect(first.statusCode).toBe(200);

      const page1 = first.json();
      expect(page1.items.map((item: { id: string }) => item.id)).toEqual(['pub-1', 'pub-2']);
      expect(page1.page).toBe(1);
      expect(page1.pageSize).toBe(2);
      expect(page1.hasMore).toBe(true);
      expect(page1.items[0].creator).toEqual({ id: memberId, name: 'Member' });

      const second = await app.inject({
        method: 'GET',
        url: '/gallery',
        query: { page: '2', as_of: page1.asOf },
      });
      const page2 = second.json();
      expect(page2.items.map((item: { id: string }) => item.id)).toEqual(['pub-3']);
      expect(page2.hasMore).toBe(false);
      expect(page2.asOf).toBe(page1.asOf);
    });

    it('includes the member’s own private images by default', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/gallery',
        query: { page: '2' },
        headers: auth(memberToken),
      });

      expect(res.json().items.map((item: { id: string }) => item.id)).toEqual(['pub-3', 'priv-1']);
    });

    it('hides other members’ private images', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/gallery',
        query: { visibility: 'private' },
        headers: auth(otherToken),
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().items).toEqual([]);
    });

    it('filters by tag', async () => {
      const res = await app.inject({ method: 'GET', url: '/gallery', query: { tag: 'SEA' } });
      expect(res.json().items.map((item: { id: string }) => item.id)).toEqual(['pub-1']);
    });

    it('rejects an invalid date range', async () => {
      const res = await app.inject({ method: 'GET', url: '/gallery', query: { date_range: '2d' } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: 'invalid_filter',
        message: 'date_range must be one of 1d, 7d, 30d',
        details: { field: 'date_range' },
      });
    });

    it('rejects a non-positive page', async () => {
      const res = await app.inject({ method: 'GET', url: '/gallery', query: { page: '0' } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'invalid_page', message: 'Page must be a positive integer' });
    });

    it('refuses private listings to anonymous viewers', async () => {
      const res = await app.inject({ method: 'GET', url: '/gallery', query: { visibility: 'private' } });

      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({ error: 'not_authorized', message: 'Sign in to browse private images' });
    });

    it('returns an empty page beyond the end', async () => {
      const res = await app.inject({ method: 'GET', url: '/gallery', query: { page: '9' } });

      expect(res.statusCode).toBe(200);
      expect(res.json().items).toEqual([]);
      expect(res.json().hasMore).toBe(false);
    });
  });

  describe('images', () => {
    it('hides private images from other users', async () => {
      const res = await app.inject({ method: 'GET', url: '/images/priv-1', headers: auth(otherToken) });

      expect(res.statusCode).toBe(404);
      expect(res.json().error).toBe('image_not_found');
    });

    it('counts views only on the view endpoint', async () => {
      await app.inject({ method: 'GET', url: '/images/pub-3' });
      const res = await app.inject({ method: 'POST', url: '/images/pub-3/view' });

      expect(res.statusCode).toBe(200);
      expect(res.json().views).toBe(6);
    });

    it('accepts one upvote per user', async () => {
      const first = await app.inject({ method: 'POST', url: '/images/pub-2/upvote', headers: auth(otherToken) });
      const second = await app.inject({ method: 'POST', url: '/images/pub-2/upvote', headers: auth(otherToken) });

      expect(first.json().alreadyUpvoted).toBe(false);
      expect(second.json().alreadyUpvoted).toBe(true);
      expect(second.json().image.upvotes).toBe(1);
    });

    it('lets only the owner change visibility', async () => {
      const denied = await app.inject({
        method: 'PATCH',
        url: '/images/pub-2',
        headers: auth(otherToken),
        payload: { visibility: 'private' },
      });
      expect(denied.statusCode).toBe(403);

      const res = await app.inject({
        method: 'PATCH',
        url: '/images/priv-1',
        headers: auth(memberToken),
        payload: { visibility: 'public' },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json().visibility).toBe('public');

      await app.inject({
        method: 'PATCH',
        url: '/images/priv-1',
        headers: auth(memberToken),
        payload: { visibility: 'private' },
      });
    });

    it('tags owned images with normalized names', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/images/pub-3/tags',
        headers: auth(memberToken),
        payload: { tags: ['Night Sky', 'night sky', 'Stars'] },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().tags).toEqual(['night sky', 'stars']);
    });
  });

  describe('collections', () => {
    it('saves an image once and counts the save', async () => {
      const created = await app.inject({
        method: 'POST',
        url: '/collections',
        headers: auth(otherToken),
        payload: { name: 'Favourites' },
      });
      expect(created.statusCode).toBe(201);
      const { id } = created.json();

      const added = await app.inject({
        method: 'POST',
        url: `/collections/${id}/images`,
        headers: auth(otherToken),
        payload: { imageId: 'pub-1' },
      });
      expect(added.statusCode).toBe(201);
      expect(added.json().imageIds).toEqual(['pub-1']);

      const again = await app.inject({
        method: 'POST',
        url: `/collections/${id}/images`,
        headers: auth(otherToken),
        payload: { imageId: 'pub-1' },
      });
      expect(again.statusCode).toBe(200);

      const image = await app.inject({ method: 'GET', url: '/images/pub-1' });
      expect(image.json().saves).toBe(1);

      const hidden = await app.inject({ method: 'GET', url: `/collections/${id}`, headers: auth(memberToken) });
      expect(hidden.statusCode).toBe(404);
    });

    it('rejects names shorter than three characters', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/collections',
        headers: auth(otherToken),
        payload: { name: 'ab' },
      });

      expect(res.statusCode).toBe(400);
    });
  });

  describe('credits and generations', () => {
    it('reports the starting balance', async () => {
      const res = await app.inject({ method: 'GET', url: '/credits', headers: auth(otherToken) });

      expect(res.json()).toEqual({
        userCredits: 100,
        userPriority: 'medium',
        mediumPriorityThreshold: 100,
        highPriorityThreshold: 500,
        canMakeRequest: true,
      });
    });

    it('lets only admins grant credits', async () => {
      const denied = await app.inject({
        method: 'POST',
        url: '/credits/grant',
        headers: auth(memberToken),
        payload: { userId: memberId, amount: 10 },
      });
      expect(denied.statusCode).toBe(403);

      const res = await app.inject({
        method: 'POST',
        url: '/credits/grant',
        headers: auth(adminToken),
        payload: { userId: memberId, amount: 500 },
      });
      expect(res.json()).toEqual({ userId: memberId, credits: 600 });
    });

    it('charges credits and generates an image', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/generations',
        headers: auth(memberToken),
        payload: { prompt: 'a fox in the snow', tags: ['Winter'] },
      });

      expect(res.statusCode).toBe(202);
      const request = res.json();
      expect(request.priority).toBe('high');
      expect(request.status).toBe('queued');

      const queue = app.services.queue;
      if (!(queue instanceof InMemoryQueue)) throw new Error('expected the in-process queue');
      await queue.onIdle();

      const status = await app.inject({
        method: 'GET',
        url: `/generations/${request.id}`,
        headers: auth(memberToken),
      });
      const done = status.json();
      expect(done.status).toBe('completed');

      const image = await app.inject({ method: 'GET', url: `/images/${done.imageId}`, headers: auth(memberToken) });
      expect(image.json().prompt).toBe('a fox in the snow');
      expect(image.json().visibility).toBe('private');
      expect(image.json().tags).toEqual(['winter']);

      const credits = await app.inject({ method: 'GET', url: '/credits', headers: auth(memberToken) });
      expect(credits.json().userCredits).toBe(588);
    });

    it('hides generation requests from other users', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/generations',
        headers: auth(memberToken),
        payload: { prompt: 'a quiet harbour' },
      });
      const other = await app.inject({
        method: 'GET',
        url: `/generations/${res.json().id}`,
        headers: auth(otherToken),
      });

      expect(other.statusCode).toBe(404);
    });
  });
});
