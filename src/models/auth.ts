/**
 * Authentication and Authorization Models
 */

export type UserRole = 'admin' | 'member';

/**
 * User account
 */
export interface User {
  id: string;
  email: string;
  passwordHash: string; // bcrypt hash
  name: string;
  role: UserRole;
  createdAt: string;
  updatedAt: string;
  lastLoginAt?: string;
  isActive: boolean;
}

export type PublicUser = Omit<User, 'passwordHash'>;

/**
 * JWT Payload
 */
export interface JWTPayload {
  sub: string; // User ID
  email: string;
  name: string;
  role: UserRole;
  iat: number;
  exp: number;
}

/**
 * Refresh token for session management
 */
export interface RefreshToken {
  id: string;
  token: string;
  userId: string;
  expiresAt: string;
  createdAt: string;
  revokedAt?: string;
}

export interface LoginRequest {
  email: string;
  password: string;
}

export interface LoginResponse {
  accessToken: string;
  refreshToken: string;
  user: {
    id: string;
    email: string;
    name: string;
    role: UserRole;
  };
}

export interface RegisterRequest {
  email: string;
  password: string;
  name: string;
}

export interface AuthConfig {
  jwtSecret: string;
  jwtExpiresIn: string; // e.g., "15m", "1h"
  refreshExpiresIn: string; // e.g., "7d", "30d"
  bcryptRounds: number;
  adminEmail?: string;
  adminPassword?: string;
}
