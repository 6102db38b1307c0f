/**
 * Tags and Collections Models
 * Image organization
 */

/**
 * Tag shared across images; `name` is the normalized, unique key
 */
export interface Tag {
  id: string;
  name: string;
  createdAt: string;
}

/**
 * Tag with the number of images carrying it
 */
export interface TagUsage {
  name: string;
  count: number;
}

/**
 * Owner-scoped set of image references
 */
export interface Collection {
  id: string;
  name: string;
  description?: string;
  ownerId: string;
  imageIds: string[];
  createdAt: string;
  updatedAt: string;
}

export type CollectionUpdate = Partial<Pick<Collection, 'name' | 'description'>>;
