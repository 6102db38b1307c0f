import { describe, it, expect } from 'vitest';
import {
  ageInHours,
  calculateEngagementScore,
  calculateFinalScore,
  calculateQualityScore,
  calculateTrendingScore,
  compareRanked,
  rankImages,
  scoreImage,
} from '../src/services/ranking.js';
import { GalleryService, pageWindow } from '../src/services/gallery.service.js';
import { MemoryStore } from '../src/store.js';
import { makeImage } from './helpers.js';

const asOf = new Date('2024-01-10T00:00:00.000Z');

describe('Ranking', () => {
  describe('calculateEngagementScore', () => {
    it('is zero without interactions', () => {
      expect(calculateEngagementScore({ views: 0, upvotes: 0, shares: 0, saves: 0 })).toBe(0);
    });

    it('weights signals and scales by signal diversity', () => {
      // (10 + 2*5 + 1*4) * log2(1 + 3)
      expect(calculateEngagementScore({ views: 10, upvotes: 2, shares: 0, saves: 1 })).toBe(48);
      // 5 * log2(2)
      expect(calculateEngagementScore({ views: 5, upvotes: 0, shares: 0, saves: 0 })).toBe(5);
    });

    it('rewards a mix of signals over a single kind', () => {
      const single = calculateEngagementScore({ views: 0, upvotes: 1, shares: 0, saves: 0 });
      const mixed = calculateEngagementScore({ views: 1, upvotes: 1, shares: 0, saves: 0 });
      expect(single).toBe(5);
      expect(mixed).toBeCloseTo(6 * Math.log2(3), 10);
    });
  });

  describe('calculateQualityScore', () => {
    it('combines the quality signal with tag coverage', () => {
      expect(calculateQualityScore(0.5, 2)).toBeCloseTo(0.48, 10);
    });

    it('clamps the signal and caps tags', () => {
      expect(calculateQualityScore(1.7, 9)).toBeCloseTo(1, 10);
      expect(calculateQualityScore(-3, 0)).toBe(0);
    });
  });

  describe('trending decay', () => {
    it('never treats future timestamps as negative age', () => {
      expect(ageInHours('2024-01-11T00:00:00.000Z', asOf)).toBe(0);
      expect(ageInHours('2024-01-09T00:00:00.000Z', asOf)).toBe(24);
    });

    it('decays by e after one time constant', () => {
      expect(calculateTrendingScore(48, 0)).toBe(48);
      expect(calculateTrendingScore(48, 72)).toBeCloseTo(48 / Math.E, 10);
    });

    it('gives a newer image a final score at least as high as an older twin', () => {
      const signals = { views: 7, upvotes: 3, shares: 1, saves: 2, qualitySignal: 0.4, tags: ['sea'] };
      const older = makeImage({ ...signals, createdAt: '2024-01-02T00:00:00.000Z' });
      const newer = makeImage({ ...signals, createdAt: '2024-01-08T00:00:00.000Z' });

      expect(scoreImage(newer, asOf).final).toBeGreaterThanOrEqual(scoreImage(older, asOf).final);
    });
  });

  describe('scoreImage', () => {
    it('blends the component scores', () => {
      const image = makeImage({
        views: 10,
        upvotes: 2,
        saves: 1,
        qualitySignal: 0.5,
        tags: ['night', 'sea'],
        createdAt: asOf.toISOString(),
      });

      const scores = scoreImage(image, asOf);

      expect(scores.engagement).toBe(48);
      expect(scores.quality).toBeCloseTo(0.48, 10);
      expect(scores.trending).toBe(48);
      // 0.40*48 + 0.25*0.48 + 0.35*48
      expect(scores.final).toBeCloseTo(36.12, 10);
      expect(calculateFinalScore(scores)).toBe(scores.final);
    });

    it('is reproducible for the same inputs', () => {
      const image = makeImage({ views: 3, shares: 2, createdAt: '2024-01-07T12:00:00.000Z' });
      expect(scoreImage(image, asOf)).toEqual(scoreImage(image, asOf));
    });
  });

  describe('compareRanked', () => {
    const ranked = (id: string, final: number, createdAt: string) => ({
      id,
      createdAt,
      scores: { engagement: 0, quality: 0, trending: 0, final },
    });

    it('orders by score, then newest, then id', () => {
      const a = ranked('A', 9.1, '2024-01-05T00:00:00.000Z');
      const b = ranked('B', 9.1, '2024-01-01T00:00:00.000Z');
      const c = ranked('C', 8.0, '2024-01-09T00:00:00.000Z');
      const d = ranked('D', 7.5, '2024-01-01T00:00:00.000Z');

      const ordered = [d, c, b, a].sort(compareRanked);
      const first = pageWindow(1, 3);
      const second = pageWindow(2, 3);

      expect(ordered.slice(first.offset, first.offset + first.limit).map((r) => r.id)).toEqual(['A', 'B', 'C']);
      expect(ordered.slice(second.offset, second.offset + second.limit).map((r) => r.id)).toEqual(['D']);
    });

    it('falls back to id when score and time tie', () => {
      const x = ranked('x-2', 1, '2024-01-01T00:00:00.000Z');
      const y = ranked('x-1', 1, '2024-01-01T00:00:00.000Z');
      expect([x, y].sort(compareRanked).map((r) => r.id)).toEqual(['x-1', 'x-2']);
    });
  });

  describe('paging a tied result set', () => {
    it('breaks a score tie by recency across page boundaries', async () => {
      const store = new MemoryStore();
      // No engagement, so the final score is the quality share alone: A and B tie
      await store.createImage(makeImage({ id: 'D', qualitySignal: 0, createdAt: '2024-01-01T00:00:00.000Z' }));
      await store.createImage(makeImage({ id: 'C', qualitySignal: 0.25, createdAt: '2024-01-09T00:00:00.000Z' }));
      await store.createImage(makeImage({ id: 'B', qualitySignal: 0.5, createdAt: '2024-01-01T00:00:00.000Z' }));
      await store.createImage(makeImage({ id: 'A', qualitySignal: 0.5, createdAt: '2024-01-05T00:00:00.000Z' }));

      const gallery = new GalleryService(store, { pageSize: 3 });
      const now = new Date('2024-02-01T00:00:00.000Z');
      const first = await gallery.getPage({ page: 1 }, undefined, now);
      const second = await gallery.getPage({ page: 2 }, undefined, now);

      expect(first.items.map((item) => item.id)).toEqual(['A', 'B', 'C']);
      expect(first.items.map((item) => item.scores.final)).toEqual([0.1, 0.1, 0.05]);
      expect(first.hasMore).toBe(true);
      expect(second.items.map((item) => item.id)).toEqual(['D']);
      expect(second.hasMore).toBe(false);
    });
  });

  describe('rankImages', () => {
    it('attaches scores and sorts descending', () => {
      const quiet = makeImage({ id: 'quiet', createdAt: '2024-01-09T00:00:00.000Z' });
      const popular = makeImage({ id: 'popular', upvotes: 4, views: 20, createdAt: '2024-01-03T00:00:00.000Z' });

      const result = rankImages([quiet, popular], asOf);

      expect(result.map((image) => image.id)).toEqual(['popular', 'quiet']);
      expect(result[1].scores.final).toBe(0);
    });
  });
});
