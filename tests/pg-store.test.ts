import { describe, it, expect } from 'vitest';
import { buildRankedImagesQuery } from '../src/services/pg-store.js';

const asOf = new Date('2024-02-01T00:00:00.000Z');

describe('buildRankedImagesQuery', () => {
  it('limits public scope to public images', () => {
    const { sql, params } = buildRankedImagesQuery({ scope: { kind: 'public' }, asOf, offset: 0, limit: 13 });

    expect(params).toEqual(['2024-02-01T00:00:00.000Z', 0, 13]);
    expect(sql).toContain("WHERE i.created_at <= $1 AND i.visibility = 'public'\n");
    expect(sql).toContain('OFFSET $2 LIMIT $3');
  });

  it('numbers every filter in order', () => {
    const { sql, params } = buildRankedImagesQuery({
      scope: { kind: 'all', ownerId: 'user-alice' },
      tag: 'sea',
      since: new Date('2024-01-25T00:00:00.000Z'),
      asOf,
      offset: 12,
      limit: 13,
    });

    expect(params).toEqual([
      '2024-02-01T00:00:00.000Z',
      '2024-01-25T00:00:00.000Z',
      'sea',
      'user-alice',
      12,
      13,
    ]);
    expect(sql).toContain('i.created_at >= $2');
    expect(sql).toContain('ftg.name = $3');
    expect(sql).toContain("(i.visibility = 'public' OR i.owner_id = $4)");
    expect(sql).toContain('OFFSET $5 LIMIT $6');
  });

  it('restricts private scope to the owner', () => {
    const { sql, params } = buildRankedImagesQuery({
      scope: { kind: 'private', ownerId: 'user-bob' },
      asOf,
      offset: 0,
      limit: 3,
    });

    expect(params).toEqual(['2024-02-01T00:00:00.000Z', 'user-bob', 0, 3]);
    expect(sql).toContain("i.visibility = 'private' AND i.owner_id = $2");
  });

  it('adds no visibility condition for an unrestricted scope', () => {
    const { sql, params } = buildRankedImagesQuery({ scope: { kind: 'all' }, asOf, offset: 0, limit: 3 });

    expect(params).toEqual(['2024-02-01T00:00:00.000Z', 0, 3]);
    expect(sql).toContain('WHERE i.created_at <= $1\n');
  });

  it('orders by score, then recency, then id', () => {
    const { sql } = buildRankedImagesQuery({ scope: { kind: 'public' }, asOf, offset: 0, limit: 3 });
    expect(sql).toContain('ORDER BY final_score DESC, created_at DESC, id COLLATE "C" ASC');
  });
});
