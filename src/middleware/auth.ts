/**
 * Authentication Middleware for Fastify
 * Bearer-token hooks and the /auth routes
 */

import { z } from 'zod';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { AuthService } from '../services/auth.service.js';
import { toPublicUser } from '../services/auth.service.js';
import type { CreditsService } from '../services/credits.service.js';
import type { UserRole, Viewer } from '../models.js';
import { AuthError, NotAuthorizedError, NotFoundError } from '../errors.js';

export interface AuthenticatedUser extends Viewer {
  email: string;
}

/**
 * Extend FastifyRequest with auth properties
 */
declare module 'fastify' {
  interface FastifyRequest {
    user?: AuthenticatedUser;
  }
}

export type AuthHook = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

export interface AuthHooks {
  authenticate: AuthHook;
  optionalAuth: AuthHook;
  requireRole: (...allowedRoles: UserRole[]) => AuthHook;
}

/**
 * Extract token from Authorization header
 */
function extractToken(request: FastifyRequest): string | null {
  const authHeader = request.headers.authorization;

  if (!authHeader) {
    return null;
  }

  const parts = authHeader.split(' ');

  if (parts.length !== 2) {
    return null;
  }

  const [scheme, token] = parts;

  if (scheme.toLowerCase() !== 'bearer') {
    return null;
  }

  return token;
}

/**
 * The authenticated caller; for handlers behind `authenticate`
 */
export function requireUser(request: FastifyRequest): AuthenticatedUser {
  if (!request.user) {
    throw new AuthError('Authentication required');
  }
  return request.user;
}

export function createAuthHooks(authService: AuthService): AuthHooks {
  function attachUser(request: FastifyRequest, token: string): void {
    const payload = authService.verifyAccessToken(token);

    // Verify user still exists and is active
    const user = authService.getUserById(payload.sub);
    if (!user) {
      throw new AuthError('User not found');
    }

    if (!user.isActive) {
      throw new AuthError('Account is disabled');
    }

    request.user = {
      id: user.id,
      email: user.email,
      name: user.name,
      role: user.role,
    };
  }

  /**
   * Requires a valid bearer token
   */
  async function authenticate(request: FastifyRequest): Promise<void> {
    const token = extractToken(request);

    if (!token) {
      throw new AuthError('Missing authorization header');
    }

    attachUser(request, token);
  }

  /**
   * Anonymous requests pass through; a token, when sent, must be valid
   */
  async function optionalAuth(request: FastifyRequest): Promise<void> {
    const token = extractToken(request);

    if (token) {
      attachUser(request, token);
    }
  }

  function requireRole(...allowedRoles: UserRole[]): AuthHook {
    return async function (request: FastifyRequest): Promise<void> {
      const user = requireUser(request);

      if (!allowedRoles.includes(user.role)) {
        throw new NotAuthorizedError(`Requires one of roles: ${allowedRoles.join(', ')}`);
      }
    };
  }

  return { authenticate, optionalAuth, requireRole };
}

const registerSchema = z.object({
  email: z.string().email(),
  password: z.string().min(8),
  name: z.string().trim().min(1).max(100),
});

const loginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

const refreshSchema = z.object({
  refreshToken: z.string().min(1),
});

/**
 * Register auth routes
 */
export async function registerAuthRoutes(
  app: FastifyInstance,
  options: { authService: AuthService; credits: CreditsService; hooks: AuthHooks; prefix?: string }
): Promise<void> {
  const prefix = options.prefix || '/auth';
  const { authService, credits, hooks } = options;

  // Register
  app.post(`${prefix}/register`, async (request, reply) => {
    const payload = registerSchema.parse(request.body);
    const user = await authService.register(payload);
    await credits.openAccount(user.id);
    return reply.status(201).send({ user });
  });

  // Login
  app.post(`${prefix}/login`, async (request, reply) => {
    const payload = loginSchema.parse(request.body);
    const result = await authService.login(payload);
    return reply.send(result);
  });

  // Refresh token
  app.post(`${prefix}/refresh`, async (request, reply) => {
    const { refreshToken } = refreshSchema.parse(request.body);
    const result = await authService.refreshAccessToken(refreshToken);
    return reply.send(result);
  });

  // Logout
  app.post(`${prefix}/logout`, async (request, reply) => {
    const { refreshToken } = refreshSchema.parse(request.body);
    await authService.logout(refreshToken);
    return reply.status(204).send();
  });

  // Get current user
  app.get(`${prefix}/me`, { onRequest: [hooks.authenticate] }, async (request, reply) => {
    const user = authService.getUserById(requireUser(request).id);
    if (!user) throw new NotFoundError('user');
    return reply.send({ user: toPublicUser(user) });
  });
}
