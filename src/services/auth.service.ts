/**
 * Authentication Service
 * Handles JWT tokens, password hashing and refresh-token rotation
 */

import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import type {
  AuthConfig,
  JWTPayload,
  LoginRequest,
  LoginResponse,
  PublicUser,
  RefreshToken,
  RegisterRequest,
  User,
} from '../models/auth.js';
import { AuthError, ConflictError } from '../errors.js';

const DEFAULT_CONFIG: AuthConfig = {
  jwtSecret: 'change-this-secret-in-production',
  jwtExpiresIn: '15m',
  refreshExpiresIn: '7d',
  bcryptRounds: 10,
};

const jwtPayloadSchema = z.object({
  sub: z.string(),
  email: z.string(),
  name: z.string(),
  role: z.enum(['admin', 'member']),
  iat: z.number(),
  exp: z.number(),
});

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _, ...rest } = user;
  return rest;
}

/**
 * In-memory storage (replace with PostgreSQL in production)
 */
class AuthStore {
  private users = new Map<string, User>();
  private refreshTokens = new Map<string, RefreshToken>();
  private usersByEmail = new Map<string, User>();

  getUserById(id: string): User | undefined {
    return this.users.get(id);
  }

  getUserByEmail(email: string): User | undefined {
    return this.usersByEmail.get(email.toLowerCase());
  }

  createUser(user: Omit<User, 'id' | 'createdAt' | 'updatedAt'>): User {
    const now = new Date().toISOString();
    const newUser: User = {
      ...user,
      id: `user_${randomBytes(16).toString('hex')}`,
      createdAt: now,
      updatedAt: now,
    };
    this.users.set(newUser.id, newUser);
    this.usersByEmail.set(newUser.email.toLowerCase(), newUser);
    return newUser;
  }

  updateUser(id: string, updates: Partial<Omit<User, 'id' | 'email'>>): User | undefined {
    const user = this.users.get(id);
    if (!user) return undefined;
    const updated = { ...user, ...updates, updatedAt: new Date().toISOString() };
    this.users.set(id, updated);
    this.usersByEmail.set(updated.email.toLowerCase(), updated);
    return updated;
  }

  createRefreshToken(token: Omit<RefreshToken, 'id' | 'createdAt'>): RefreshToken {
    const newToken: RefreshToken = {
      ...token,
      id: `rt_${randomBytes(16).toString('hex')}`,
      createdAt: new Date().toISOString(),
    };
    this.refreshTokens.set(newToken.token, newToken);
    return newToken;
  }

  getRefreshToken(token: string): RefreshToken | undefined {
    return this.refreshTokens.get(token);
  }

  revokeRefreshToken(token: string): boolean {
    const rt = this.refreshTokens.get(token);
    if (rt && !rt.revokedAt) {
      rt.revokedAt = new Date().toISOString();
      return true;
    }
    return false;
  }
}

/**
 * Authentication Service
 */
export class AuthService {
  private store: AuthStore;
  private config: AuthConfig;

  constructor(config: Partial<AuthConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.store = new AuthStore();
    this.seedAdmin();
  }

  /**
   * Create the configured admin account, if any
   */
  private seedAdmin(): void {
    const { adminEmail, adminPassword } = this.config;
    if (!adminEmail || !adminPassword || this.store.getUserByEmail(adminEmail)) return;

    this.store.createUser({
      email: adminEmail,
      passwordHash: bcrypt.hashSync(adminPassword, this.config.bcryptRounds),
      name: 'Admin',
      role: 'admin',
      isActive: true,
    });
    console.log(`[Auth] Admin user created: ${adminEmail}`);
  }

  /**
   * Register a new member
   */
  async register(data: RegisterRequest): Promise<PublicUser> {
    if (this.store.getUserByEmail(data.email)) {
      throw new ConflictError('Email already registered', 'email_taken');
    }

    const passwordHash = await bcrypt.hash(data.password, this.config.bcryptRounds);
    const user = this.store.createUser({
      email: data.email,
      passwordHash,
      name: data.name,
      role: 'member',
      isActive: true,
    });

    return toPublicUser(user);
  }

  /**
   * Login user
   */
  async login(data: LoginRequest): Promise<LoginResponse> {
    const user = this.store.getUserByEmail(data.email);
    if (!user) {
      throw new AuthError('Invalid credentials');
    }

    if (!user.isActive) {
      throw new AuthError('Account is disabled');
    }

    const isValid = await bcrypt.compare(data.password, user.passwordHash);
    if (!isValid) {
      throw new AuthError('Invalid credentials');
    }

    this.store.updateUser(user.id, { lastLoginAt: new Date().toISOString() });

    const { accessToken, refreshToken } = this.generateTokens(user);

    return {
      accessToken,
      refreshToken,
      user: {
        id: user.id,
        email: user.email,
        name: user.name,
        role: user.role,
      },
    };
  }

  /**
   * Generate access and refresh tokens
   */
  private generateTokens(user: User): { accessToken: string; refreshToken: string } {
    const now = Math.floor(Date.now() / 1000);

    const payload: JWTPayload = {
      sub: user.id,
      email: user.email,
      name: user.name,
      role: user.role,
      iat: now,
      exp: now + this.parseExpiration(this.config.jwtExpiresIn),
    };

    const accessToken = jwt.sign(payload, this.config.jwtSecret);

    const refreshTokenValue = randomBytes(32).toString('hex');
    const expiresAt = new Date(Date.now() + this.parseExpiration(this.config.refreshExpiresIn) * 1000).toISOString();

    this.store.createRefreshToken({
      token: refreshTokenValue,
      userId: user.id,
      expiresAt,
    });

    return { accessToken, refreshToken: refreshTokenValue };
  }

  /**
   * Exchange a refresh token for a new pair; the old one is revoked
   */
  async refreshAccessToken(refreshToken: string): Promise<{ accessToken: string; refreshToken: string }> {
    const token = this.store.getRefreshToken(refreshToken);

    if (!token) {
      throw new AuthError('Invalid refresh token');
    }

    if (token.revokedAt) {
      throw new AuthError('Refresh token revoked');
    }

    if (new Date(token.expiresAt) < new Date()) {
      throw new AuthError('Refresh token expired');
    }

    const user = this.store.getUserById(token.userId);
    if (!user || !user.isActive) {
      throw new AuthError('User not found or inactive');
    }

    this.store.revokeRefreshToken(refreshToken);
    return this.generateTokens(user);
  }

  /**
   * Logout user (revoke refresh token)
   */
  async logout(refreshToken: string): Promise<void> {
    this.store.revokeRefreshToken(refreshToken);
  }

  /**
   * Verify JWT token and return payload
   */
  verifyAccessToken(token: string): JWTPayload {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, this.config.jwtSecret);
    } catch {
      throw new AuthError('Invalid or expired token');
    }

    const payload = jwtPayloadSchema.safeParse(decoded);
    if (!payload.success) {
      throw new AuthError('Invalid or expired token');
    }
    return payload.data;
  }

  /**
   * Parse expiration string to seconds
   */
  private parseExpiration(expiration: string): number {
    const match = expiration.match(/^(\d+)([smhd])$/);
    if (!match) {
      throw new Error(`Invalid expiration format: ${expiration}`);
    }

    const value = parseInt(match[1], 10);
    const unit = match[2];

    const multipliers: Record<string, number> = {
      s: 1,
      m: 60,
      h: 60 * 60,
      d: 24 * 60 * 60,
    };

    return value * multipliers[unit];
  }

  getUserById(id: string): User | undefined {
    return this.store.getUserById(id);
  }

  getUserByEmail(email: string): User | undefined {
    return this.store.getUserByEmail(email);
  }
}

/**
 * Create auth service instance
 */
export function createAuthService(config?: Partial<AuthConfig>): AuthService {
  return new AuthService(config);
}
