/**
 * Image Routes
 * Library, detail, visibility and engagement endpoints
 */

import { z } from 'zod';
import type { FastifyInstance } from 'fastify';
import type { ImagesService } from '../services/images.service.js';
import { requireUser, type AuthHooks } from '../middleware/auth.js';

const visibilityUpdateSchema = z.object({
  visibility: z.enum(['public', 'private']),
});

type IdParams = { Params: { id: string } };

/**
 * Register image routes
 */
export async function registerImageRoutes(
  app: FastifyInstance,
  options: { service: ImagesService; hooks: AuthHooks; prefix?: string }
): Promise<void> {
  const prefix = options.prefix || '/images';
  const { service, hooks } = options;

  // GET /images/mine - The caller's library, newest first
  app.get(`${prefix}/mine`, { onRequest: [hooks.authenticate] }, async (request, reply) => {
    const images = await service.listOwned(requireUser(request).id);
    return reply.send({ images });
  });

  // GET /images/:id - Image detail (no side effects)
  app.get<IdParams>(`${prefix}/:id`, { onRequest: [hooks.optionalAuth] }, async (request, reply) => {
    const image = await service.getImage(request.params.id, request.user);
    return reply.send(image);
  });

  // POST /images/:id/view - Record a detail view
  app.post<IdParams>(`${prefix}/:id/view`, { onRequest: [hooks.optionalAuth] }, async (request, reply) => {
    const image = await service.recordView(request.params.id, request.user);
    return reply.send(image);
  });

  // POST /images/:id/share - Record a share
  app.post<IdParams>(`${prefix}/:id/share`, { onRequest: [hooks.optionalAuth] }, async (request, reply) => {
    const image = await service.share(request.params.id, request.user);
    return reply.send(image);
  });

  // POST /images/:id/upvote - One upvote per user
  app.post<IdParams>(`${prefix}/:id/upvote`, { onRequest: [hooks.authenticate] }, async (request, reply) => {
    const result = await service.upvote(request.params.id, requireUser(request));
    return reply.send(result);
  });

  // PATCH /images/:id - Toggle visibility
  app.patch<IdParams>(`${prefix}/:id`, { onRequest: [hooks.authenticate] }, async (request, reply) => {
    const { visibility } = visibilityUpdateSchema.parse(request.body);
    const image = await service.setVisibility(request.params.id, requireUser(request), visibility);
    return reply.send(image);
  });

  // DELETE /images/:id
  app.delete<IdParams>(`${prefix}/:id`, { onRequest: [hooks.authenticate] }, async (request, reply) => {
    await service.deleteImage(request.params.id, requireUser(request));
    return reply.status(204).send();
  });
}
