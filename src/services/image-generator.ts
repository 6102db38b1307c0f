/**
 * Image generator port and its HTTP adapter
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';

export interface GeneratedImage {
  imageUrl: string;
  // 0-1 when the backend reports one
  qualitySignal?: number;
}

export interface ImageGenerator {
  generate(prompt: string): Promise<GeneratedImage>;
}

export interface HttpImageGeneratorOptions {
  url: string;
  apiKey?: string;
  timeout?: number;
}

const generatedImageSchema = z.object({
  imageUrl: z.string().url(),
  qualitySignal: z.number().min(0).max(1).optional(),
});

/**
 * Posts `{ prompt }` to the generation backend and expects
 * `{ imageUrl, qualitySignal? }` back
 */
export class HttpImageGenerator implements ImageGenerator {
  private client: AxiosInstance;

  constructor(options: HttpImageGeneratorOptions, client?: AxiosInstance) {
    this.client =
      client ??
      axios.create({
        baseURL: options.url,
        timeout: options.timeout ?? 120000,
        headers: {
          'Content-Type': 'application/json',
          ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
        },
      });
  }

  async generate(prompt: string): Promise<GeneratedImage> {
    const started = Date.now();
    const response = await this.client.post<unknown>('', { prompt });
    const result = generatedImageSchema.parse(response.data);

    console.log(`[Generator] Generated image in ${Date.now() - started}ms`);
    return result;
  }
}
