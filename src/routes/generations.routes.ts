/**
 * Generation Routes
 */

import { z } from 'zod';
import type { FastifyInstance } from 'fastify';
import type { GenerationQueue } from '../services/queue.js';
import type { TagsService } from '../services/tags.service.js';
import { requireUser, type AuthHooks } from '../middleware/auth.js';
import { NotFoundError, ServiceUnavailableError } from '../errors.js';

const generationSchema = z.object({
  prompt: z.string().trim().min(1).max(1000),
  visibility: z.enum(['public', 'private']).default('private'),
  tags: z.array(z.string()).max(20).default([]),
});

/**
 * Register generation routes. Without a queue every endpoint answers 503.
 */
export async function registerGenerationRoutes(
  app: FastifyInstance,
  options: { queue: GenerationQueue | null; tags: TagsService; hooks: AuthHooks; prefix?: string }
): Promise<void> {
  const prefix = options.prefix || '/generations';
  const { tags, hooks } = options;

  function requireQueue(): GenerationQueue {
    if (!options.queue) {
      throw new ServiceUnavailableError('Image generation is not configured');
    }
    return options.queue;
  }

  // POST /generations - Charge credits and queue a generation
  app.post(prefix, { onRequest: [hooks.authenticate] }, async (request, reply) => {
    const queue = requireQueue();
    const payload = generationSchema.parse(request.body);

    const generation = await queue.enqueue(requireUser(request), {
      prompt: payload.prompt,
      visibility: payload.visibility,
      tags: tags.normalizeNames(payload.tags),
    });
    return reply.status(202).send(generation);
  });

  // GET /generations/queue - Queued requests per priority tier
  app.get(`${prefix}/queue`, { onRequest: [hooks.authenticate] }, async (request, reply) => {
    const status = await requireQueue().getStatus();
    return reply.send(status);
  });

  // GET /generations/:id - One request, visible to its owner
  app.get<{ Params: { id: string } }>(
    `${prefix}/:id`,
    { onRequest: [hooks.authenticate] },
    async (request, reply) => {
      const viewer = requireUser(request);
      const generation = await requireQueue().getRequest(request.params.id);

      if (!generation || (generation.userId !== viewer.id && viewer.role !== 'admin')) {
        throw new NotFoundError('generation');
      }
      return reply.send(generation);
    }
  );
}
