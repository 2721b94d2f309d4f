import { randomUUID } from 'node:crypto';

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JsonWebTokenError, JwtPayload, sign, TokenExpiredError, verify } from 'jsonwebtoken';

import { CredentialsService } from '../credentials/credentials.service';
import { Identity } from '../credentials/types';
import { StoreService } from '../store/store.service';
import { hashKeyForLogging } from '../utils/hash';
import { TokenError } from './errors';
import { RefreshTokenRecord, TokenPair } from './types';

const SIGNING_ALGORITHM = 'HS256';
const MIN_SECRET_LENGTH = 32;

type TokenType = 'access' | 'refresh';

@Injectable()
export class TokensService {
  private readonly logger = new Logger(TokensService.name);
  private readonly secret: string;
  private readonly issuer: string;
  private readonly accessTtlSeconds: number;
  private readonly refreshTtlSeconds: number;

  constructor(
    private readonly storeService: StoreService,
    private readonly credentialsService: CredentialsService,
    private readonly configService: ConfigService,
  ) {
    const secret = this.configService.get<unknown>('JWT_SECRET');
    if (typeof secret !== 'string' || secret.length < MIN_SECRET_LENGTH) {
      throw new Error(`JWT_SECRET must be at least ${MIN_SECRET_LENGTH} characters`);
    }

    this.secret = secret;
    this.issuer = this.configService.get<string>('JWT_ISSUER') ?? 'gatehouse';
    this.accessTtlSeconds = this.parsePositiveInteger(
      this.configService.get<unknown>('ACCESS_TOKEN_TTL_SECONDS'),
      900,
      'ACCESS_TOKEN_TTL_SECONDS',
    );
    this.refreshTtlSeconds = this.parsePositiveInteger(
      this.configService.get<unknown>('REFRESH_TOKEN_TTL_SECONDS'),
      1209600,
      'REFRESH_TOKEN_TTL_SECONDS',
    );
  }

  issueAccessToken(identity: Identity): string {
    return sign({ email: identity.email, priv: identity.privilege, typ: 'access' }, this.secret, {
      algorithm: SIGNING_ALGORITHM,
      expiresIn: this.accessTtlSeconds,
      issuer: this.issuer,
      subject: identity.userId,
    });
  }

  async issueRefreshToken(identity: Identity): Promise<string> {
    const redis = this.storeService.getClient();
    const tokenId = randomUUID();
    const now = Date.now();
    const token = sign({ typ: 'refresh' }, this.secret, {
      algorithm: SIGNING_ALGORITHM,
      expiresIn: this.refreshTtlSeconds,
      issuer: this.issuer,
      subject: identity.userId,
      jwtid: tokenId,
    });

    const record: RefreshTokenRecord = {
      userId: identity.userId,
      issuedAt: new Date(now).toISOString(),
      expiresAt: new Date(now + this.refreshTtlSeconds * 1000).toISOString(),
    };

    await redis.set(this.refreshKey(tokenId), JSON.stringify(record), {
      EX: this.refreshTtlSeconds,
    });
    await redis.sAdd(this.userTokensKey(identity.userId), tokenId);
    await redis.pExpire(this.userTokensKey(identity.userId), this.refreshTtlSeconds * 1000);

    return token;
  }

  async issueTokenPair(identity: Identity): Promise<TokenPair> {
    const refreshToken = await this.issueRefreshToken(identity);
    return {
      accessToken: this.issueAccessToken(identity),
      refreshToken,
      tokenType: 'Bearer',
      expiresIn: this.accessTtlSeconds,
    };
  }

  validateAccessToken(token: string): Identity {
    const payload = this.decode(token, 'access');
    const { sub, email, priv } = payload;

    if (typeof email !== 'string' || typeof priv !== 'number' || !Number.isInteger(priv) || priv < 0) {
      throw new TokenError('bad-signature');
    }

    return { userId: sub, email, privilege: priv };
  }

  /**
   * Exchanges a refresh token for a new pair. The replacement is written
   * before the old record is removed with a single DEL; of several concurrent
   * redemptions of one token only the caller whose DEL removed it keeps its
   * pair, the others discard theirs. A failed write leaves the old token
   * redeemable.
   */
  async redeemRefreshToken(token: string): Promise<TokenPair> {
    const payload = this.decode(token, 'refresh');
    const tokenId = this.requireTokenId(payload);
    const redis = this.storeService.getClient();

    // Mint from the stored user so privilege changes and disabling take effect.
    const user = await this.credentialsService.findUser(payload.sub);
    if (!user || user.disabled) {
      await redis.del(this.refreshKey(tokenId));
      throw new TokenError('revoked');
    }

    const pair = await this.issueTokenPair(this.credentialsService.toIdentity(user));

    const removed = await redis.del(this.refreshKey(tokenId));
    if (removed !== 1) {
      this.logger.debug(`Refresh token ${hashKeyForLogging(tokenId)} already redeemed or revoked`);
      await this.revokeRefreshToken(pair.refreshToken);
      throw new TokenError('revoked');
    }
    await redis.sRem(this.userTokensKey(payload.sub), tokenId);

    return pair;
  }

  async revokeRefreshToken(token: string): Promise<boolean> {
    const payload = this.decode(token, 'refresh');
    const tokenId = this.requireTokenId(payload);
    const redis = this.storeService.getClient();

    const removed = await redis.del(this.refreshKey(tokenId));
    await redis.sRem(this.userTokensKey(payload.sub), tokenId);
    return removed === 1;
  }

  async revokeAllForUser(userId: string): Promise<number> {
    const redis = this.storeService.getClient();
    const tokenIds = await redis.sMembers(this.userTokensKey(userId));

    let revoked = 0;
    for (const tokenId of tokenIds) {
      revoked += await redis.del(this.refreshKey(tokenId));
    }
    await redis.del(this.userTokensKey(userId));

    if (revoked > 0) {
      this.logger.log(`Revoked ${revoked} refresh token(s) for user ${userId}`);
    }
    return revoked;
  }

  private decode(token: string, expectedType: TokenType): JwtPayload & { sub: string } {
    let payload: string | JwtPayload;
    try {
      payload = verify(token, this.secret, {
        algorithms: [SIGNING_ALGORITHM],
        issuer: this.issuer,
      });
    } catch (error) {
      if (error instanceof TokenExpiredError) {
        throw new TokenError('expired');
      }
      if (error instanceof JsonWebTokenError) {
        throw new TokenError('bad-signature');
      }
      throw error;
    }

    if (typeof payload === 'string' || payload.typ !== expectedType) {
      throw new TokenError('bad-signature');
    }

    const { sub } = payload;
    if (typeof sub !== 'string' || sub.length === 0) {
      throw new TokenError('bad-signature');
    }

    return { ...payload, sub };
  }

  private requireTokenId(payload: JwtPayload): string {
    if (typeof payload.jti !== 'string' || payload.jti.length === 0) {
      throw new TokenError('bad-signature');
    }
    return payload.jti;
  }

  private refreshKey(tokenId: string): string {
    return this.storeService.key('refresh', tokenId);
  }

  private userTokensKey(userId: string): string {
    return this.storeService.key('refresh-index', userId);
  }

  private parsePositiveInteger(value: unknown, fallback: number, fieldName: string): number {
    const parsed = typeof value === 'number' ? value : Number(value);
    if (Number.isInteger(parsed) && parsed > 0) {
      return parsed;
    }

    if (value !== undefined) {
      this.logger.warn(`${fieldName} is invalid; using fallback ${fallback}`);
    }
    return fallback;
  }
}
