import { Job, Queue } from 'bullmq';
import { Redis } from 'ioredis';
import type { GenerationInput, GenerationRequest, GenerationStatus, Priority, QueueStatus, Viewer } from '../models.js';
import {
  GENERATION_QUEUE_NAME,
  createGenerationWorker,
  type GenerationJob,
  type GenerationJobResult,
  type GenerationWorker,
} from '../workers/generation.worker.js';
import { DEFAULT_CONCURRENCY, MAX_ATTEMPTS, type GenerationProcessor, type GenerationQueue } from './queue.js';

// BullMQ runs lower numbers first
const JOB_PRIORITY: Record<Priority, number> = {
  high: 1,
  medium: 2,
  low: 3,
};

export interface RedisQueueOptions {
  host: string;
  port?: number;
  password?: string;
  concurrency?: number;
  maxAttempts?: number;
}

/**
 * BullMQ-backed generation queue. Request state lives in the jobs themselves,
 * so any instance can answer status queries.
 */
export class RedisQueueService implements GenerationQueue {
  private connection: Redis;
  private queue: Queue<GenerationJob, GenerationJobResult>;
  private worker: GenerationWorker | null = null;
  private maxAttempts: number;

  constructor(
    private processor: GenerationProcessor,
    private options: RedisQueueOptions
  ) {
    this.connection = new Redis({
      host: options.host,
      port: options.port ?? 6379,
      password: options.password,
      maxRetriesPerRequest: null,
    });
    this.maxAttempts = options.maxAttempts ?? MAX_ATTEMPTS;
    this.queue = new Queue<GenerationJob, GenerationJobResult>(GENERATION_QUEUE_NAME, {
      connection: this.connection,
    });
  }

  async startWorkers(): Promise<void> {
    this.worker = await createGenerationWorker({
      connection: this.connection,
      processor: this.processor,
      concurrency: this.options.concurrency ?? DEFAULT_CONCURRENCY,
    });
  }

  async enqueue(viewer: Viewer, input: GenerationInput): Promise<GenerationRequest> {
    const request = await this.processor.createRequest(viewer, input);

    await this.queue.add(
      'generate',
      {
        requestId: request.id,
        userId: request.userId,
        userName: request.userName,
        priority: request.priority,
        prompt: request.prompt,
        visibility: request.visibility,
        tags: request.tags,
        createdAt: request.createdAt,
      },
      {
        jobId: request.id,
        priority: JOB_PRIORITY[request.priority],
        attempts: this.maxAttempts,
        backoff: { type: 'exponential', delay: 1000 },
        removeOnComplete: { age: 24 * 60 * 60 },
        removeOnFail: { age: 7 * 24 * 60 * 60 },
      }
    );

    console.log(`[Queue] Enqueued request ${request.id} (${request.priority}) for user ${viewer.id}`);
    return request;
  }

  async getRequest(id: string): Promise<GenerationRequest | null> {
    const job = await this.queue.getJob(id);
    if (!job) return null;
    return this.toRequest(job);
  }

  async getStatus(): Promise<QueueStatus> {
    const status: QueueStatus = { high: 0, medium: 0, low: 0 };
    const jobs = await this.queue.getJobs(['prioritized', 'waiting', 'delayed']);

    for (const job of jobs) {
      status[job.data.priority] += 1;
    }
    return status;
  }

  async close(): Promise<void> {
    await this.worker?.close();
    await this.queue.close();
    await this.connection.quit();
  }

  private async toRequest(job: Job<GenerationJob, GenerationJobResult>): Promise<GenerationRequest> {
    const { requestId, ...data } = job.data;
    const state = await job.getState();
    const attempts = job.opts.attempts ?? this.maxAttempts;

    let status: GenerationStatus;
    switch (state) {
      case 'active':
        status = 'processing';
        break;
      case 'completed':
        status = 'completed';
        break;
      case 'failed':
        status = job.attemptsMade >= attempts ? 'failed' : 'queued';
        break;
      default:
        status = 'queued';
    }

    return {
      ...data,
      id: requestId,
      attempts: job.attemptsMade,
      status,
      imageId: status === 'completed' ? job.returnvalue.imageId : undefined,
      error: job.failedReason || undefined,
      updatedAt: new Date(job.finishedOn ?? job.processedOn ?? job.timestamp).toISOString(),
    };
  }
}
