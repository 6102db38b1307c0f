/**
 * Gallery Routes
 * Ranked, filtered and paginated image browsing
 */

import type { FastifyInstance } from 'fastify';
import type { GalleryService, RawGalleryQuery } from '../services/gallery.service.js';
import type { AuthHooks } from '../middleware/auth.js';

/**
 * Register gallery routes
 */
export async function registerGalleryRoutes(
  app: FastifyInstance,
  options: { service: GalleryService; hooks: AuthHooks; prefix?: string }
): Promise<void> {
  const prefix = options.prefix || '/gallery';
  const { service, hooks } = options;

  // GET /gallery?tag&date_range&visibility&page&as_of - One page of ranked images
  app.get<{ Querystring: RawGalleryQuery }>(
    prefix,
    { onRequest: [hooks.optionalAuth] },
    async (request, reply) => {
      const page = await service.listGallery(request.query, request.user);
      return reply.send(page);
    }
  );
}
