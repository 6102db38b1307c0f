/**
 * Gallery ranking
 *
 * Scores are evaluated against a reference instant (`asOf`) so that every page
 * of one pagination session ranks with the same recency decay. PgStore builds
 * the same formula in SQL from these constants; keep the two in step.
 */

import type { Image, ImageSignals, RankedImage, RankingScores } from '../models.js';

/**
 * Relative weight of each signal in the engagement score
 */
export const ENGAGEMENT_WEIGHTS: Readonly<ImageSignals> = {
  views: 1,
  upvotes: 5,
  shares: 3,
  saves: 4,
};

/**
 * Weights of the component scores in the final score; they sum to 1
 */
export const RANKING_WEIGHTS = {
  engagement: 0.4,
  quality: 0.25,
  trending: 0.35,
} as const;

/**
 * Time constant of the trending decay, in hours
 */
export const TRENDING_DECAY_HOURS = 72;

export const QUALITY_SIGNAL_WEIGHT = 0.8;
export const QUALITY_TAG_WEIGHT = 0.2;
export const QUALITY_TAG_CAP = 5;

const HOUR_MS = 60 * 60 * 1000;

const SIGNALS: readonly (keyof ImageSignals)[] = ['views', 'upvotes', 'shares', 'saves'];

/**
 * Weighted interactions scaled by log2(1 + number of signal kinds present)
 */
export function calculateEngagementScore(signals: ImageSignals): number {
  let weighted = 0;
  let kinds = 0;

  for (const signal of SIGNALS) {
    weighted += signals[signal] * ENGAGEMENT_WEIGHTS[signal];
    if (signals[signal] > 0) kinds++;
  }

  return weighted * Math.log2(1 + kinds);
}

/**
 * Engagement-independent quality proxy in [0, 1]
 */
export function calculateQualityScore(qualitySignal: number, tagCount: number): number {
  const signal = Math.min(Math.max(qualitySignal, 0), 1);
  const tags = Math.min(tagCount, QUALITY_TAG_CAP) / QUALITY_TAG_CAP;
  return signal * QUALITY_SIGNAL_WEIGHT + tags * QUALITY_TAG_WEIGHT;
}

/**
 * Hours between creation and the reference instant, never negative
 */
export function ageInHours(createdAt: string, asOf: Date): number {
  return Math.max((asOf.getTime() - Date.parse(createdAt)) / HOUR_MS, 0);
}

/**
 * Engagement decayed by age
 */
export function calculateTrendingScore(engagement: number, ageHours: number): number {
  return engagement * Math.exp(-ageHours / TRENDING_DECAY_HOURS);
}

export function calculateFinalScore(scores: Omit<RankingScores, 'final'>): number {
  return (
    scores.engagement * RANKING_WEIGHTS.engagement +
    scores.quality * RANKING_WEIGHTS.quality +
    scores.trending * RANKING_WEIGHTS.trending
  );
}

export function scoreImage(image: Image, asOf: Date): RankingScores {
  const engagement = calculateEngagementScore(image);
  const quality = calculateQualityScore(image.qualitySignal, image.tags.length);
  const trending = calculateTrendingScore(engagement, ageInHours(image.createdAt, asOf));

  return {
    engagement,
    quality,
    trending,
    final: calculateFinalScore({ engagement, quality, trending }),
  };
}

/**
 * Final score descending, then newest first, then id for a total order
 */
export function compareRanked(
  a: Pick<RankedImage, 'id' | 'createdAt' | 'scores'>,
  b: Pick<RankedImage, 'id' | 'createdAt' | 'scores'>
): number {
  if (a.scores.final !== b.scores.final) {
    return b.scores.final - a.scores.final;
  }

  const byTime = Date.parse(b.createdAt) - Date.parse(a.createdAt);
  if (byTime !== 0) return byTime;

  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function rankImages(images: Image[], asOf: Date): RankedImage[] {
  return images
    .map((image) => ({ ...image, scores: scoreImage(image, asOf) }))
    .sort(compareRanked);
}
