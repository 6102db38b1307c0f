/**
 * Tag Routes
 */

import { z } from 'zod';
import type { FastifyInstance } from 'fastify';
import type { TagsService } from '../services/tags.service.js';
import { requireUser, type AuthHooks } from '../middleware/auth.js';

const tagImageSchema = z.object({
  tags: z.array(z.string()).min(1).max(20),
});

const listTagsSchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional(),
});

/**
 * Register tag routes
 */
export async function registerTagRoutes(
  app: FastifyInstance,
  options: { service: TagsService; hooks: AuthHooks }
): Promise<void> {
  const { service, hooks } = options;

  // GET /tags - Tags with image counts, most used first
  app.get('/tags', async (request, reply) => {
    const { limit } = listTagsSchema.parse(request.query);
    const tags = await service.listTags({ limit });
    return reply.send({ tags });
  });

  // DELETE /tags/:name - Remove a tag from every image (admin)
  app.delete<{ Params: { name: string } }>(
    '/tags/:name',
    { onRequest: [hooks.authenticate, hooks.requireRole('admin')] },
    async (request, reply) => {
      await service.deleteTag(request.params.name, requireUser(request));
      return reply.status(204).send();
    }
  );

  // POST /images/:id/tags - Attach tags to an owned image
  app.post<{ Params: { id: string } }>(
    '/images/:id/tags',
    { onRequest: [hooks.authenticate] },
    async (request, reply) => {
      const { tags } = tagImageSchema.parse(request.body);
      const image = await service.tagImage(request.params.id, tags, requireUser(request));
      return reply.send(image);
    }
  );

  // DELETE /images/:id/tags/:name
  app.delete<{ Params: { id: string; name: string } }>(
    '/images/:id/tags/:name',
    { onRequest: [hooks.authenticate] },
    async (request, reply) => {
      await service.untagImage(request.params.id, request.params.name, requireUser(request));
      return reply.status(204).send();
    }
  );
}
