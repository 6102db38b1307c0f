import { randomUUID } from 'crypto';
import { getPool, query, closePool } from '../db.js';
import type {
  Collection,
  CollectionUpdate,
  CreditAccount,
  Image,
  RankedImage,
  RankedImageQuery,
  SignalName,
  TagUsage,
} from '../models.js';
import type { GalleryStore, ImageUpdate } from '../store.js';
import {
  ENGAGEMENT_WEIGHTS,
  QUALITY_SIGNAL_WEIGHT,
  QUALITY_TAG_CAP,
  QUALITY_TAG_WEIGHT,
  RANKING_WEIGHTS,
  TRENDING_DECAY_HOURS,
} from './ranking.js';

// Database row types (snake_case as returned by PostgreSQL)
interface DbImage {
  id: string;
  prompt: string;
  image_url: string;
  owner_id: string;
  owner_name: string;
  visibility: string;
  quality_signal: number;
  generation_request_id: string | null;
  views: number;
  upvotes: number;
  shares: number;
  saves: number;
  tags: string[];
  created_at: Date;
  updated_at: Date;
}

interface DbRankedImage extends DbImage {
  engagement_score: number;
  quality_score: number;
  trending_score: number;
  final_score: number;
}

interface DbCollection {
  id: string;
  name: string;
  description: string | null;
  owner_id: string;
  image_ids: string[];
  created_at: Date;
  updated_at: Date;
}

interface DbCreditAccount {
  user_id: string;
  credits: number;
  last_credits_update: Date;
}

const SIGNAL_COLUMNS: Record<SignalName, string> = {
  views: 'views',
  upvotes: 'upvotes',
  shares: 'shares',
  saves: 'saves',
};

/**
 * Idempotent schema
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS images (
  id TEXT PRIMARY KEY,
  prompt TEXT NOT NULL,
  image_url TEXT NOT NULL,
  owner_id TEXT NOT NULL,
  owner_name TEXT NOT NULL,
  visibility TEXT NOT NULL DEFAULT 'private',
  quality_signal FLOAT NOT NULL DEFAULT 0,
  generation_request_id TEXT UNIQUE,
  views INTEGER NOT NULL DEFAULT 0,
  upvotes INTEGER NOT NULL DEFAULT 0,
  shares INTEGER NOT NULL DEFAULT 0,
  saves INTEGER NOT NULL DEFAULT 0,
  created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS tags (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS image_tags (
  image_id TEXT NOT NULL REFERENCES images(id) ON DELETE CASCADE,
  tag_id TEXT NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
  PRIMARY KEY (image_id, tag_id)
);

CREATE TABLE IF NOT EXISTS image_upvotes (
  image_id TEXT NOT NULL REFERENCES images(id) ON DELETE CASCADE,
  user_id TEXT NOT NULL,
  created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
  PRIMARY KEY (image_id, user_id)
);

CREATE TABLE IF NOT EXISTS collections (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  description TEXT,
  owner_id TEXT NOT NULL,
  created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS collection_images (
  collection_id TEXT NOT NULL REFERENCES collections(id) ON DELETE CASCADE,
  image_id TEXT NOT NULL REFERENCES images(id) ON DELETE CASCADE,
  added_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
  PRIMARY KEY (collection_id, image_id)
);

CREATE TABLE IF NOT EXISTS credit_accounts (
  user_id TEXT PRIMARY KEY,
  credits INTEGER NOT NULL CHECK (credits >= 0),
  last_credits_update TIMESTAMP WITH TIME ZONE NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_images_created_at ON images(created_at DESC);
CREATE INDEX IF NOT EXISTS idx_images_visibility_created_at ON images(visibility, created_at DESC);
CREATE INDEX IF NOT EXISTS idx_images_owner_id ON images(owner_id);
CREATE INDEX IF NOT EXISTS idx_image_tags_tag_id ON image_tags(tag_id);
CREATE INDEX IF NOT EXISTS idx_collections_owner_id ON collections(owner_id);
`;

const IMAGE_TAGS_JOIN = `
  LEFT JOIN LATERAL (
    SELECT array_agg(tg.name ORDER BY tg.name) AS tags
    FROM image_tags it
    JOIN tags tg ON tg.id = it.tag_id
    WHERE it.image_id = i.id
  ) t ON TRUE`;

const IMAGE_SELECT = `SELECT i.*, COALESCE(t.tags, '{}') AS tags FROM images i ${IMAGE_TAGS_JOIN}`;

const COLLECTION_SELECT = `
  SELECT c.*, COALESCE(m.image_ids, '{}') AS image_ids
  FROM collections c
  LEFT JOIN LATERAL (
    SELECT array_agg(ci.image_id ORDER BY ci.added_at) AS image_ids
    FROM collection_images ci
    WHERE ci.collection_id = c.id
  ) m ON TRUE`;

const w = ENGAGEMENT_WEIGHTS;

const ENGAGEMENT_SQL = `((i.views * ${w.views} + i.upvotes * ${w.upvotes} + i.shares * ${w.shares} + i.saves * ${w.saves})
      * LOG(2.0, (1 + (i.views > 0)::int + (i.upvotes > 0)::int + (i.shares > 0)::int + (i.saves > 0)::int)::numeric))::float8`;

const QUALITY_SQL = `(LEAST(GREATEST(i.quality_signal, 0), 1) * ${QUALITY_SIGNAL_WEIGHT}
      + LEAST(COALESCE(cardinality(t.tags), 0), ${QUALITY_TAG_CAP}) / ${QUALITY_TAG_CAP}.0 * ${QUALITY_TAG_WEIGHT})::float8`;

/**
 * Builds the filtered, scored and paginated gallery query. `$1` is always the
 * ranking instant.
 */
export function buildRankedImagesQuery(options: RankedImageQuery): { sql: string; params: unknown[] } {
  const params: unknown[] = [options.asOf.toISOString()];
  const conditions: string[] = ['i.created_at <= $1'];

  if (options.since) {
    params.push(options.since.toISOString());
    conditions.push(`i.created_at >= $${params.length}`);
  }

  if (options.tag) {
    params.push(options.tag);
    conditions.push(
      `EXISTS (SELECT 1 FROM image_tags ft JOIN tags ftg ON ftg.id = ft.tag_id WHERE ft.image_id = i.id AND ftg.name = $${params.length})`
    );
  }

  const { scope } = options;
  if (scope.kind === 'public') {
    conditions.push(`i.visibility = 'public'`);
  } else if (scope.kind === 'private') {
    conditions.push(`i.visibility = 'private'`);
    if (scope.ownerId) {
      params.push(scope.ownerId);
      conditions.push(`i.owner_id = $${params.length}`);
    }
  } else if (scope.ownerId) {
    params.push(scope.ownerId);
    conditions.push(`(i.visibility = 'public' OR i.owner_id = $${params.length})`);
  }

  params.push(options.offset, options.limit);
  const offsetParam = params.length - 1;
  const limitParam = params.length;

  const sql = `
WITH base AS (
  SELECT i.*, COALESCE(t.tags, '{}') AS tags,
    ${ENGAGEMENT_SQL} AS engagement_score,
    ${QUALITY_SQL} AS quality_score,
    GREATEST(EXTRACT(EPOCH FROM ($1::timestamptz - i.created_at)) / 3600.0, 0)::float8 AS age_hours
  FROM images i ${IMAGE_TAGS_JOIN}
  WHERE ${conditions.join(' AND ')}
), scored AS (
  SELECT base.*, (engagement_score * EXP(-age_hours / ${TRENDING_DECAY_HOURS}))::float8 AS trending_score
  FROM base
)
SELECT scored.*,
  (engagement_score * ${RANKING_WEIGHTS.engagement} + quality_score * ${RANKING_WEIGHTS.quality} + trending_score * ${RANKING_WEIGHTS.trending})::float8 AS final_score
FROM scored
ORDER BY final_score DESC, created_at DESC, id COLLATE "C" ASC
OFFSET $${offsetParam} LIMIT $${limitParam}`;

  return { sql, params };
}

/**
 * PgStore - PostgreSQL-backed GalleryStore
 */
export class PgStore implements GalleryStore {
  private initialized = false;

  constructor(private readonly connectionString?: string) {}

  async initialize(): Promise<void> {
    if (this.initialized) return;

    const pool = getPool({ connectionString: this.connectionString });
    await pool.query(SCHEMA_SQL);
    this.initialized = true;
  }

  async close(): Promise<void> {
    await closePool();
    this.initialized = false;
  }

  // ===== Images =====

  async createImage(image: Image): Promise<Image> {
    await query(
      `INSERT INTO images (id, prompt, image_url, owner_id, owner_name, visibility, quality_signal,
         generation_request_id, views, upvotes, shares, saves, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)`,
      [
        image.id,
        image.prompt,
        image.imageUrl,
        image.ownerId,
        image.ownerName,
        image.visibility,
        image.qualitySignal,
        image.generationRequestId ?? null,
        image.views,
        image.upvotes,
        image.shares,
        image.saves,
        image.createdAt,
        image.updatedAt,
      ]
    );

    if (image.tags.length > 0) {
      await this.attachTags(image.id, image.tags);
    }

    const created = await this.getImage(image.id);
    return created ?? image;
  }

  async getImage(id: string): Promise<Image | null> {
    const result = await query<DbImage>(`${IMAGE_SELECT} WHERE i.id = $1`, [id]);
    return result.rowCount ? this.mapImageFromDb(result.rows[0]) : null;
  }

  async updateImage(id: string, updates: ImageUpdate): Promise<Image | null> {
    const setClauses: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (updates.visibility !== undefined) {
      setClauses.push(`visibility = $${paramIndex++}`);
      params.push(updates.visibility);
    }
    if (updates.qualitySignal !== undefined) {
      setClauses.push(`quality_signal = $${paramIndex++}`);
      params.push(updates.qualitySignal);
    }

    if (setClauses.length === 0) return this.getImage(id);

    setClauses.push(`updated_at = $${paramIndex++}`);
    params.push(new Date().toISOString());
    params.push(id);

    const result = await query(
      `UPDATE images SET ${setClauses.join(', ')} WHERE id = $${paramIndex}`,
      params
    );

    return result.rowCount ? this.getImage(id) : null;
  }

  async deleteImage(id: string): Promise<boolean> {
    const result = await query('DELETE FROM images WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async listImagesByOwner(ownerId: string): Promise<Image[]> {
    const result = await query<DbImage>(
      `${IMAGE_SELECT} WHERE i.owner_id = $1 ORDER BY i.created_at DESC`,
      [ownerId]
    );
    return result.rows.map((row) => this.mapImageFromDb(row));
  }

  async incrementSignal(id: string, signal: SignalName): Promise<Image | null> {
    const column = SIGNAL_COLUMNS[signal];
    const result = await query(`UPDATE images SET ${column} = ${column} + 1 WHERE id = $1`, [id]);
    return result.rowCount ? this.getImage(id) : null;
  }

  async addUpvote(imageId: string, userId: string): Promise<boolean> {
    const result = await query(
      `WITH vote AS (
         INSERT INTO image_upvotes (image_id, user_id) VALUES ($1, $2)
         ON CONFLICT DO NOTHING
         RETURNING image_id
       )
       UPDATE images SET upvotes = upvotes + 1 WHERE id IN (SELECT image_id FROM vote)`,
      [imageId, userId]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async queryRankedImages(options: RankedImageQuery): Promise<RankedImage[]> {
    const { sql, params } = buildRankedImagesQuery(options);
    const result = await query<DbRankedImage>(sql, params);

    return result.rows.map((row) => ({
      ...this.mapImageFromDb(row),
      scores: {
        engagement: row.engagement_score,
        quality: row.quality_score,
        trending: row.trending_score,
        final: row.final_score,
      },
    }));
  }

  // ===== Tags =====

  async attachTags(imageId: string, names: string[]): Promise<Image | null> {
    const image = await query('SELECT 1 FROM images WHERE id = $1', [imageId]);
    if (!image.rowCount) return null;

    await query(
      `INSERT INTO tags (id, name)
       SELECT * FROM unnest($1::text[], $2::text[])
       ON CONFLICT (name) DO NOTHING`,
      [names.map(() => randomUUID()), names]
    );
    await query(
      `INSERT INTO image_tags (image_id, tag_id)
       SELECT $1, id FROM tags WHERE name = ANY($2::text[])
       ON CONFLICT DO NOTHING`,
      [imageId, names]
    );
    await query('UPDATE images SET updated_at = NOW() WHERE id = $1', [imageId]);

    return this.getImage(imageId);
  }

  async detachTag(imageId: string, name: string): Promise<boolean> {
    const result = await query(
      `DELETE FROM image_tags
       WHERE image_id = $1 AND tag_id = (SELECT id FROM tags WHERE name = $2)`,
      [imageId, name]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async listTagUsage(limit?: number): Promise<TagUsage[]> {
    const result = await query<TagUsage>(
      `SELECT tg.name, COUNT(it.image_id)::int AS count
       FROM tags tg
       LEFT JOIN image_tags it ON it.tag_id = tg.id
       GROUP BY tg.name
       ORDER BY count DESC, tg.name ASC
       LIMIT $1`,
      [limit ?? null]
    );
    return result.rows;
  }

  async deleteTag(name: string): Promise<boolean> {
    const result = await query('DELETE FROM tags WHERE name = $1', [name]);
    return (result.rowCount ?? 0) > 0;
  }

  // ===== Collections =====

  async createCollection(collection: Collection): Promise<Collection> {
    await query(
      `INSERT INTO collections (id, name, description, owner_id, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [
        collection.id,
        collection.name,
        collection.description ?? null,
        collection.ownerId,
        collection.createdAt,
        collection.updatedAt,
      ]
    );

    for (const imageId of collection.imageIds) {
      await this.addToCollection(collection.id, imageId);
    }

    const created = await this.getCollection(collection.id);
    return created ?? collection;
  }

  async getCollection(id: string): Promise<Collection | null> {
    const result = await query<DbCollection>(`${COLLECTION_SELECT} WHERE c.id = $1`, [id]);
    return result.rowCount ? this.mapCollectionFromDb(result.rows[0]) : null;
  }

  async listCollections(ownerId: string): Promise<Collection[]> {
    const result = await query<DbCollection>(
      `${COLLECTION_SELECT} WHERE c.owner_id = $1 ORDER BY c.created_at DESC`,
      [ownerId]
    );
    return result.rows.map((row) => this.mapCollectionFromDb(row));
  }

  async updateCollection(id: string, updates: CollectionUpdate): Promise<Collection | null> {
    const setClauses: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (updates.name !== undefined) {
      setClauses.push(`name = $${paramIndex++}`);
      params.push(updates.name);
    }
    if (updates.description !== undefined) {
      setClauses.push(`description = $${paramIndex++}`);
      params.push(updates.description);
    }

    if (setClauses.length === 0) return this.getCollection(id);

    setClauses.push(`updated_at = $${paramIndex++}`);
    params.push(new Date().toISOString());
    params.push(id);

    const result = await query(
      `UPDATE collections SET ${setClauses.join(', ')} WHERE id = $${paramIndex}`,
      params
    );
    return result.rowCount ? this.getCollection(id) : null;
  }

  async deleteCollection(id: string): Promise<boolean> {
    const result = await query('DELETE FROM collections WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async addToCollection(collectionId: string, imageId: string): Promise<boolean> {
    const result = await query(
      `INSERT INTO collection_images (collection_id, image_id) VALUES ($1, $2)
       ON CONFLICT DO NOTHING`,
      [collectionId, imageId]
    );
    if (!result.rowCount) return false;

    await query('UPDATE collections SET updated_at = NOW() WHERE id = $1', [collectionId]);
    return true;
  }

  async removeFromCollection(collectionId: string, imageId: string): Promise<boolean> {
    const result = await query(
      'DELETE FROM collection_images WHERE collection_id = $1 AND image_id = $2',
      [collectionId, imageId]
    );
    if (!result.rowCount) return false;

    await query('UPDATE collections SET updated_at = NOW() WHERE id = $1', [collectionId]);
    return true;
  }

  // ===== Credits =====

  async getCreditAccount(userId: string): Promise<CreditAccount | null> {
    const result = await query<DbCreditAccount>('SELECT * FROM credit_accounts WHERE user_id = $1', [userId]);
    return result.rows[0] ? this.mapCreditAccountFromDb(result.rows[0]) : null;
  }

  async createCreditAccount(account: CreditAccount): Promise<CreditAccount> {
    await query(
      `INSERT INTO credit_accounts (user_id, credits, last_credits_update) VALUES ($1, $2, $3)
       ON CONFLICT (user_id) DO NOTHING`,
      [account.userId, account.credits, account.lastCreditsUpdate]
    );
    return (await this.getCreditAccount(account.userId)) ?? account;
  }

  async adjustCredits(userId: string, delta: number): Promise<CreditAccount | null> {
    const result = await query<DbCreditAccount>(
      `UPDATE credit_accounts SET credits = credits + $2
       WHERE user_id = $1 AND credits + $2 >= 0
       RETURNING *`,
      [userId, delta]
    );
    return result.rows[0] ? this.mapCreditAccountFromDb(result.rows[0]) : null;
  }

  async grantDailyCredits(userId: string, amount: number, dayStart: Date, now: Date): Promise<CreditAccount | null> {
    const result = await query<DbCreditAccount>(
      `UPDATE credit_accounts SET credits = credits + $2, last_credits_update = $4
       WHERE user_id = $1 AND last_credits_update < $3
       RETURNING *`,
      [userId, amount, dayStart.toISOString(), now.toISOString()]
    );
    return result.rows[0] ? this.mapCreditAccountFromDb(result.rows[0]) : null;
  }

  // ===== Mapping =====

  private mapImageFromDb(row: DbImage): Image {
    return {
      id: row.id,
      prompt: row.prompt,
      imageUrl: row.image_url,
      ownerId: row.owner_id,
      ownerName: row.owner_name,
      visibility: row.visibility === 'public' ? 'public' : 'private',
      tags: row.tags,
      qualitySignal: row.quality_signal,
      generationRequestId: row.generation_request_id ?? undefined,
      views: row.views,
      upvotes: row.upvotes,
      shares: row.shares,
      saves: row.saves,
      createdAt: row.created_at.toISOString(),
      updatedAt: row.updated_at.toISOString(),
    };
  }

  private mapCollectionFromDb(row: DbCollection): Collection {
    return {
      id: row.id,
      name: row.name,
      description: row.description ?? undefined,
      ownerId: row.owner_id,
      imageIds: row.image_ids,
      createdAt: row.created_at.toISOString(),
      updatedAt: row.updated_at.toISOString(),
    };
  }

  private mapCreditAccountFromDb(row: DbCreditAccount): CreditAccount {
    return {
      userId: row.user_id,
      credits: row.credits,
      lastCreditsUpdate: row.last_credits_update.toISOString(),
    };
  }
}
