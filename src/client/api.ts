/**
 * HTTP client for the gallery endpoint
 */

import axios, { AxiosError, type AxiosInstance } from 'axios';
import type { DateRange, GalleryPage, GalleryVisibility } from '../models.js';

const API_TIMEOUT = 30000;

export interface GalleryFilter {
  tag?: string;
  dateRange?: DateRange;
  visibility?: GalleryVisibility;
}

export interface PageRequest extends GalleryFilter {
  page: number;
  asOf?: string;
}

export type PageFetcher = (request: PageRequest) => Promise<GalleryPage>;

export class ApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class NetworkError extends Error {
  constructor(message: string = 'Network error occurred') {
    super(message);
    this.name = 'NetworkError';
  }
}

function readString(data: unknown, key: string): string | undefined {
  if (typeof data !== 'object' || data === null || !(key in data)) return undefined;
  const value: unknown = Reflect.get(data, key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Map an axios failure onto ApiError (server answered) or NetworkError
 */
export function transformError(error: unknown): Error {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error : new Error(String(error));
  }
  return fromAxiosError(error);
}

function fromAxiosError(error: AxiosError): ApiError | NetworkError {
  if (!error.response) {
    return new NetworkError(error.message || 'Network error. Please check your connection.');
  }

  const statusCode = error.response.status;
  const data = error.response.data;
  const message = readString(data, 'message') ?? error.message;
  const code = readString(data, 'error') ?? `http_${statusCode}`;

  return new ApiError(message || 'An error occurred', statusCode, code);
}

/**
 * Query-string form of a page request; unset values are omitted
 */
export function toQueryParams(request: PageRequest): Record<string, string> {
  const params: Record<string, string> = { page: String(request.page) };
  if (request.tag) params.tag = request.tag;
  if (request.dateRange) params.date_range = request.dateRange;
  if (request.visibility) params.visibility = request.visibility;
  if (request.asOf) params.as_of = request.asOf;
  return params;
}

export interface GalleryClientOptions {
  baseURL: string;
  getToken?: () => string | null;
  client?: AxiosInstance;
}

export function createGalleryFetcher(options: GalleryClientOptions): PageFetcher {
  const client =
    options.client ??
    axios.create({
      baseURL: options.baseURL,
      timeout: API_TIMEOUT,
      headers: {
        'Content-Type': 'application/json',
      },
    });

  return async (request) => {
    const token = options.getToken?.();

    try {
      const response = await client.get<GalleryPage>('/gallery', {
        params: toQueryParams(request),
        headers: token ? { Authorization: `Bearer ${token}` } : undefined,
      });
      return response.data;
    } catch (error) {
      throw transformError(error);
    }
  };
}
