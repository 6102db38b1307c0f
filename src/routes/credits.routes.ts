/**
 * Credit Routes
 */

import { z } from 'zod';
import type { FastifyInstance } from 'fastify';
import type { CreditsService } from '../services/credits.service.js';
import type { AuthService } from '../services/auth.service.js';
import { requireUser, type AuthHooks } from '../middleware/auth.js';
import { NotFoundError } from '../errors.js';

const grantSchema = z.object({
  userId: z.string().min(1),
  amount: z.number().int().positive().max(100000),
});

/**
 * Register credit routes
 */
export async function registerCreditRoutes(
  app: FastifyInstance,
  options: { service: CreditsService; authService: AuthService; hooks: AuthHooks; prefix?: string }
): Promise<void> {
  const prefix = options.prefix || '/credits';
  const { service, authService, hooks } = options;

  // GET /credits - Balance and priority tier of the caller
  app.get(prefix, { onRequest: [hooks.authenticate] }, async (request, reply) => {
    return reply.send(await service.getPriorityInfo(requireUser(request).id));
  });

  // POST /credits/grant - Add credits to an account (admin)
  app.post(
    `${prefix}/grant`,
    { onRequest: [hooks.authenticate, hooks.requireRole('admin')] },
    async (request, reply) => {
      const { userId, amount } = grantSchema.parse(request.body);
      if (!authService.getUserById(userId)) throw new NotFoundError('user');

      const credits = await service.add(userId, amount);
      return reply.send({ userId, credits });
    }
  );
}
