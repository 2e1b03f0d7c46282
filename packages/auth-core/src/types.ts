export type TokenUse = 'access' | 'refresh';

type BaseTokenClaims = {
  userId: string;
  email: string;
  /** Millisecond precision; compared against per-user revocation timestamps */
  issuedAt: Date;
  expiresAt: Date;
  notBefore: Date;
  issuer: string;
  subject: string;
  tokenId: string;
};

export type AccessTokenClaims = BaseTokenClaims & {
  tokenUse: 'access';
  role: string;
  name: string;
};

export type RefreshTokenClaims = BaseTokenClaims & {
  tokenUse: 'refresh';
};

export type TokenClaims = AccessTokenClaims | RefreshTokenClaims;

export type TokenSubject = {
  userId: string;
  email: string;
  role: string;
  name: string;
};

export type TokenPair = {
  accessToken: string;
  refreshToken: string;
  accessTokenExpiresAt: Date;
  refreshTokenExpiresAt: Date;
};

export type RefreshedAccessToken = {
  accessToken: string;
  accessTokenExpiresAt: Date;
  claims: AccessTokenClaims;
};

/**
 * Current user attributes re-read when an access token is refreshed,
 * so role or email changes take effect without a new login.
 */
export type UserClaimsRecord = {
  email: string;
  role: string;
  name: string;
  isActive: boolean;
};

export interface UserClaimsSource {
  findClaimsById(userId: string): Promise<UserClaimsRecord | null>;
}
