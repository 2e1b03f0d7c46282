/**
 * JSON bodies for the HTTP layer, shaped by the shared response schemas
 */

import type { TokenPair } from '@warden/auth-core';
import type { ListSessionsResponse, TokenPairResponse, UserResponse } from '@warden/types';
import type { PublicUser } from '../users/user-types.js';
import type { ActiveSession } from './auth-types.js';

export function toTokenPairResponse(tokens: TokenPair): TokenPairResponse {
  return {
    accessToken: tokens.accessToken,
    refreshToken: tokens.refreshToken,
    accessTokenExpiresAt: tokens.accessTokenExpiresAt.toISOString(),
    refreshTokenExpiresAt: tokens.refreshTokenExpiresAt.toISOString(),
    tokenType: 'Bearer',
  };
}

export function toUserResponse(user: PublicUser): UserResponse {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    role: user.role,
    isVerified: user.isVerified,
    createdAt: user.createdAt.toISOString(),
  };
}

export function toListSessionsResponse(sessions: ActiveSession[]): ListSessionsResponse {
  return {
    sessions: sessions.map((session) => ({
      id: session.id,
      createdAt: session.createdAt.toISOString(),
      expiresAt: session.expiresAt.toISOString(),
      ipAddress: session.ipAddress,
      userAgent: session.userAgent,
      isCurrent: session.isCurrent,
    })),
  };
}
