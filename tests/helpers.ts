import type { Image, Viewer } from '../src/models.js';
import type { GeneratedImage, ImageGenerator } from '../src/services/image-generator.js';

export const alice: Viewer = { id: 'user-alice', name: 'Alice', role: 'member' };
export const bob: Viewer = { id: 'user-bob', name: 'Bob', role: 'member' };
export const admin: Viewer = { id: 'user-admin', name: 'Admin', role: 'admin' };

let counter = 0;

export function makeImage(overrides: Partial<Image> = {}): Image {
  counter += 1;
  const createdAt = overrides.createdAt ?? '2024-01-01T00:00:00.000Z';
  return {
    id: `img-${String(counter).padStart(4, '0')}`,
    prompt: 'a lighthouse at dusk',
    imageUrl: `https://images.test/${counter}.png`,
    ownerId: alice.id,
    ownerName: alice.name,
    visibility: 'public',
    tags: [],
    qualitySignal: 0,
    views: 0,
    upvotes: 0,
    shares: 0,
    saves: 0,
    createdAt,
    updatedAt: createdAt,
    ...overrides,
  };
}

/**
 * Generator that fails the first `failures` calls
 */
export class FakeGenerator implements ImageGenerator {
  calls: string[] = [];

  constructor(private failures = 0) {}

  async generate(prompt: string): Promise<GeneratedImage> {
    this.calls.push(prompt);
    if (this.calls.length <= this.failures) {
      throw new Error('generator unavailable');
    }
    return { imageUrl: `https://images.test/generated-${this.calls.length}.png`, qualitySignal: 0.5 };
  }
}
