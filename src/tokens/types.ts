import { PrivilegeLevel } from '../credentials/types';

export type TokenPair = {
  accessToken: string;
  refreshToken: string;
  tokenType: 'Bearer';
  // Access token lifetime in seconds.
  expiresIn: number;
};

export type AccessTokenClaims = {
  sub: string;
  email: string;
  priv: PrivilegeLevel;
  typ: 'access';
};

export type RefreshTokenClaims = {
  sub: string;
  jti: string;
  typ: 'refresh';
};

export type RefreshTokenRecord = {
  userId: string;
  issuedAt: string;
  expiresAt: string;
};
