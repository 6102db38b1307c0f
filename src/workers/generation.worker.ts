import { Job, Worker } from 'bullmq';
import { Redis } from 'ioredis';
import type { GenerationInput, Priority } from '../models.js';
import type { GenerationProcessor } from '../services/queue.js';

export const GENERATION_QUEUE_NAME = 'image-generation';

/**
 * Generation job payload
 */
export interface GenerationJob extends GenerationInput {
  requestId: string;
  userId: string;
  userName: string;
  priority: Priority;
  createdAt: string;
}

/**
 * Generation job result
 */
export interface GenerationJobResult {
  imageId: string;
}

/**
 * Worker options
 */
export interface WorkerOptions {
  connection: Redis;
  processor: GenerationProcessor;
  concurrency?: number;
}

/**
 * Generation Worker
 *
 * Runs queued generation jobs. BullMQ retries a failed job until its attempts
 * are spent; the credits are refunded after the last one.
 */
export class GenerationWorker {
  private worker: Worker<GenerationJob, GenerationJobResult>;
  private processor: GenerationProcessor;

  constructor(options: WorkerOptions) {
    this.processor = options.processor;

    this.worker = new Worker<GenerationJob, GenerationJobResult>(
      GENERATION_QUEUE_NAME,
      async (job: Job<GenerationJob>) => {
        return await this.processJob(job);
      },
      {
        connection: options.connection,
        concurrency: options.concurrency ?? 3,
      }
    );

    this.worker.on('completed', (job, result) => {
      console.log(`[Generation Worker] Job ${job.id} completed: image ${result.imageId}`);
    });

    this.worker.on('failed', (job, error) => {
      if (!job) return;
      console.error(`[Generation Worker] Job ${job.id} attempt ${job.attemptsMade} failed: ${error.message}`);

      if (job.attemptsMade >= (job.opts.attempts ?? 1)) {
        this.processor.refund({ id: job.data.requestId, userId: job.data.userId }).catch((refundError: unknown) => {
          console.error(`[Generation Worker] Refund for job ${job.id} failed:`, refundError);
        });
      }
    });
  }

  private async processJob(job: Job<GenerationJob>): Promise<GenerationJobResult> {
    const { requestId, createdAt, ...input } = job.data;

    console.log(`[Generation Worker] Processing request ${requestId} (${input.priority})`);

    const image = await this.processor.process({
      ...input,
      id: requestId,
      attempts: job.attemptsMade + 1,
      status: 'processing',
      createdAt,
      updatedAt: new Date().toISOString(),
    });

    return { imageId: image.id };
  }

  /**
   * Start the worker
   */
  async run(): Promise<void> {
    console.log('[Generation Worker] Starting generation worker...');
    await this.worker.waitUntilReady();
  }

  /**
   * Stop the worker
   */
  async close(): Promise<void> {
    console.log('[Generation Worker] Closing generation worker...');
    await this.worker.close();
  }
}

/**
 * Create and start a generation worker
 */
export async function createGenerationWorker(options: WorkerOptions): Promise<GenerationWorker> {
  const worker = new GenerationWorker(options);
  await worker.run();
  return worker;
}
