/**
 * Collection Routes
 */

import { z } from 'zod';
import type { FastifyInstance } from 'fastify';
import type { CollectionsService } from '../services/collections.service.js';
import { requireUser, type AuthHooks } from '../middleware/auth.js';

const collectionSchema = z.object({
  name: z.string().trim().min(3).max(100),
  description: z.string().max(500).optional(),
});

const addImageSchema = z.object({
  imageId: z.string().min(1),
});

type IdParams = { Params: { id: string } };

/**
 * Register collection routes
 */
export async function registerCollectionRoutes(
  app: FastifyInstance,
  options: { service: CollectionsService; hooks: AuthHooks; prefix?: string }
): Promise<void> {
  const prefix = options.prefix || '/collections';
  const { service, hooks } = options;

  // Every collection endpoint needs a signed-in owner
  const onRequest = [hooks.authenticate];

  app.get(prefix, { onRequest }, async (request, reply) => {
    const collections = await service.listCollections(requireUser(request));
    return reply.send({ collections });
  });

  app.post(prefix, { onRequest }, async (request, reply) => {
    const payload = collectionSchema.parse(request.body);
    const collection = await service.createCollection(requireUser(request), payload);
    return reply.status(201).send(collection);
  });

  // GET /collections/:id - Collection with the images the caller can see
  app.get<IdParams>(`${prefix}/:id`, { onRequest }, async (request, reply) => {
    const viewer = requireUser(request);
    const collection = await service.getCollection(request.params.id, viewer);
    const images = await service.listImages(request.params.id, viewer);
    return reply.send({ ...collection, images });
  });

  app.patch<IdParams>(`${prefix}/:id`, { onRequest }, async (request, reply) => {
    const updates = collectionSchema.partial().parse(request.body);
    const collection = await service.updateCollection(request.params.id, requireUser(request), updates);
    return reply.send(collection);
  });

  app.delete<IdParams>(`${prefix}/:id`, { onRequest }, async (request, reply) => {
    await service.deleteCollection(request.params.id, requireUser(request));
    return reply.status(204).send();
  });

  // POST /collections/:id/images - Save an image
  app.post<IdParams>(`${prefix}/:id/images`, { onRequest }, async (request, reply) => {
    const { imageId } = addImageSchema.parse(request.body);
    const result = await service.addImage(request.params.id, imageId, requireUser(request));
    return reply.status(result.added ? 201 : 200).send(result.collection);
  });

  app.delete<{ Params: { id: string; imageId: string } }>(
    `${prefix}/:id/images/:imageId`,
    { onRequest },
    async (request, reply) => {
      const collection = await service.removeImage(request.params.id, request.params.imageId, requireUser(request));
      return reply.send(collection);
    }
  );
}
