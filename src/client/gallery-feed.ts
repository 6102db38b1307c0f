/**
 * Incremental gallery feed
 *
 * Owns the state of one browsing session. The first page pins `asOf`; every
 * load-more request sends it back so the server ranks all pages at the same
 * instant. Two feeds never share state.
 */

import type { GalleryImage } from '../models.js';
import type { GalleryFilter, PageFetcher } from './api.js';

// Start loading before the control scrolls into view
export const PREFETCH_ROOT_MARGIN = '0px 0px 400px 0px';

export interface FeedState {
  items: GalleryImage[];
  page: number;
  loading: boolean;
  done: boolean;
  error: Error | null;
  asOf?: string;
  filter: GalleryFilter;
}

export interface IntersectionEntryLike {
  isIntersecting: boolean;
}

export interface IntersectionObserverLike<T> {
  observe(target: T): void;
  disconnect(): void;
}

/**
 * Matches `(callback, options) => new IntersectionObserver(callback, options)`
 */
export type ObserverFactory<T> = (
  callback: (entries: IntersectionEntryLike[]) => void,
  options: { rootMargin: string }
) => IntersectionObserverLike<T>;

type Listener = (state: Readonly<FeedState>) => void;

function initialState(filter: GalleryFilter): FeedState {
  return { items: [], page: 0, loading: false, done: false, error: null, filter };
}

export class GalleryFeed {
  private state: FeedState = initialState({});
  private session = 0;
  private listeners = new Set<Listener>();

  constructor(private fetchPage: PageFetcher) {}

  getState(): Readonly<FeedState> {
    return this.state;
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Start a new session at page 1. Responses still in flight for the previous
   * session are dropped.
   */
  async reset(filter: GalleryFilter = {}): Promise<void> {
    this.session += 1;
    this.setState(initialState(filter));
    await this.load();
  }

  /**
   * Fetch the next page; no-op while a request is in flight or after the end
   */
  async loadMore(): Promise<void> {
    if (this.state.loading || this.state.done) return;
    await this.load();
  }

  /**
   * Load more whenever the target (the load-more control) comes into range.
   * Returns a function that stops observing.
   */
  observe<T>(target: T, createObserver: ObserverFactory<T>, rootMargin = PREFETCH_ROOT_MARGIN): () => void {
    const observer = createObserver(
      (entries) => {
        if (entries.some((entry) => entry.isIntersecting)) {
          this.loadMore().catch((error: unknown) => {
            console.error('[GalleryFeed] Load more failed:', error);
          });
        }
      },
      { rootMargin }
    );

    observer.observe(target);
    return () => observer.disconnect();
  }

  private async load(): Promise<void> {
    const session = this.session;
    const page = this.state.page + 1;
    const { filter, asOf } = this.state;

    this.setState({ ...this.state, loading: true, error: null });

    try {
      const result = await this.fetchPage({ ...filter, page, asOf });
      if (session !== this.session) return;

      // Signals can move an image across a page boundary between requests
      const seen = new Set(this.state.items.map((item) => item.id));
      const fresh = result.items.filter((item) => !seen.has(item.id));

      this.setState({
        ...this.state,
        items: [...this.state.items, ...fresh],
        page,
        asOf: result.asOf,
        loading: false,
        done: !result.hasMore || result.items.length < result.pageSize,
      });
    } catch (error) {
      if (session !== this.session) return;
      this.setState({
        ...this.state,
        loading: false,
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }

  private setState(next: FeedState): void {
    this.state = next;
    for (const listener of this.listeners) listener(next);
  }
}
