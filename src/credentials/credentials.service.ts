import { randomBytes, randomUUID } from 'node:crypto';

import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import bcrypt from 'bcryptjs';

import { StoreService } from '../store/store.service';
import { RedisClient } from '../store/types';
import { hashKeyForLogging, sha256Hex } from '../utils/hash';
import { DuplicateEmailError, InvalidCredentialsError } from './errors';
import { Identity, PrivilegeLevel, PublicUser, UserRecord } from './types';

const DEFAULT_BCRYPT_ROUNDS = 12;
const ROTATION_LOCK_MS = 10_000;

@Injectable()
export class CredentialsService {
  private readonly logger = new Logger(CredentialsService.name);
  private readonly bcryptRounds: number;
  // Compared against when the email is unknown, so both failure paths pay for one bcrypt run.
  private readonly dummyHash: string;

  constructor(
    private readonly storeService: StoreService,
    private readonly configService: ConfigService,
  ) {
    this.bcryptRounds = this.parseRounds(this.configService.get<unknown>('BCRYPT_ROUNDS'));
    this.dummyHash = bcrypt.hashSync(randomBytes(16).toString('hex'), this.bcryptRounds);
  }

  async createUser(email: string, secret: string, privilege: PrivilegeLevel): Promise<UserRecord> {
    const redis = this.storeService.getClient();
    const normalizedEmail = this.normalizeEmail(email);
    const id = randomUUID();
    const secretHash = await bcrypt.hash(secret, this.bcryptRounds);

    const claimed = await redis.set(this.emailKey(normalizedEmail), id, { NX: true });
    if (claimed === null) {
      throw new DuplicateEmailError();
    }

    const now = new Date().toISOString();
    const record: UserRecord = {
      id,
      email: normalizedEmail,
      secretHash,
      privilege,
      disabled: false,
      createdAt: now,
      updatedAt: now,
    };

    try {
      await redis.set(this.userKey(id), JSON.stringify(record));
      await redis.sAdd(this.indexKey(), id);
    } catch (error) {
      await redis.del(this.emailKey(normalizedEmail)).catch(() => {
        this.logger.warn(`Could not release email claim for user ${id}`);
        return 0;
      });
      throw error;
    }

    this.logger.log(`Created user ${id} with privilege ${privilege}`);
    return record;
  }

  async verifySecret(email: string, candidate: string): Promise<Identity> {
    const record = await this.findUserByEmail(email);
    const matches = await bcrypt.compare(candidate, record?.secretHash ?? this.dummyHash);

    if (!record || !matches || record.disabled) {
      throw new InvalidCredentialsError();
    }

    return this.toIdentity(record);
  }

  /**
   * Issues a new API key for the user and invalidates the previous one.
   * The plaintext key is only ever returned here. Rotations of one user are
   * serialized by a short-lived lock; a concurrent second rotation gets 409.
   */
  async rotateApiKey(userId: string): Promise<string> {
    const redis = this.storeService.getClient();
    const record = await this.getUserOrThrow(userId, redis);

    const lockKey = this.storeService.key('api-key-lock', record.id);
    const locked = await redis.set(lockKey, '1', { NX: true, PX: ROTATION_LOCK_MS });
    if (locked === null) {
      throw new ConflictException('API key rotation already in progress');
    }

    try {
      return await this.replaceApiKey(record.id, redis);
    } finally {
      await redis.del(lockKey);
    }
  }

  async lookupByApiKey(apiKey: string): Promise<Identity> {
    const normalized = apiKey.trim();
    if (normalized.length === 0) {
      throw new InvalidCredentialsError();
    }

    const redis = this.storeService.getClient();
    const hash = sha256Hex(normalized);
    const userId = await redis.get(this.apiKeyKey(hash));
    if (!userId) {
      throw new InvalidCredentialsError();
    }

    const record = await this.getRecord(userId, redis);
    if (!record || record.disabled || record.apiKeyHash !== hash) {
      throw new InvalidCredentialsError();
    }

    return this.toIdentity(record);
  }

  async findUser(userId: string): Promise<UserRecord | null> {
    return this.getRecord(userId, this.storeService.getClient());
  }

  async findUserByEmail(email: string): Promise<UserRecord | null> {
    const redis = this.storeService.getClient();
    const userId = await redis.get(this.emailKey(this.normalizeEmail(email)));
    if (!userId) {
      return null;
    }

    return this.getRecord(userId, redis);
  }

  async listUsers(): Promise<UserRecord[]> {
    const redis = this.storeService.getClient();
    const ids = await redis.sMembers(this.indexKey());

    const records: UserRecord[] = [];
    for (const id of ids) {
      const record = await this.getRecord(id, redis);
      if (record) {
        records.push(record);
      }
    }

    return records.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async updatePrivilege(userId: string, privilege: PrivilegeLevel): Promise<UserRecord> {
    const redis = this.storeService.getClient();
    const record = await this.getUserOrThrow(userId, redis);
    const updated = await this.saveRecord({ ...record, privilege }, redis);

    this.logger.log(`Changed privilege of user ${userId} from ${record.privilege} to ${privilege}`);
    return updated;
  }

  async disableUser(userId: string): Promise<UserRecord> {
    const redis = this.storeService.getClient();
    const record = await this.getUserOrThrow(userId, redis);
    if (record.disabled) {
      return record;
    }

    const updated = await this.saveRecord({ ...record, disabled: true }, redis);
    this.logger.log(`Disabled user ${userId}`);
    return updated;
  }

  toIdentity(record: UserRecord): Identity {
    return { userId: record.id, email: record.email, privilege: record.privilege };
  }

  toPublicUser(record: UserRecord): PublicUser {
    return {
      id: record.id,
      email: record.email,
      privilege: record.privilege,
      disabled: record.disabled,
      createdAt: record.createdAt,
      updatedAt: record.updatedAt,
      hasApiKey: record.apiKeyHash !== undefined,
    };
  }

  private async replaceApiKey(userId: string, redis: RedisClient): Promise<string> {
    // Re-read under the lock so the previous hash is the one currently stored.
    const record = await this.getUserOrThrow(userId, redis);
    const apiKey = this.generateApiKey();
    const hash = sha256Hex(apiKey);
    const claimed = await redis.set(this.apiKeyKey(hash), record.id, { NX: true });
    if (claimed === null) {
      // 256 random bits colliding means the generator is broken; do not hand out a shared key.
      throw new Error('API key collision');
    }

    try {
      await this.saveRecord({ ...record, apiKeyHash: hash }, redis);
    } catch (error) {
      await redis.del(this.apiKeyKey(hash)).catch(() => {
        this.logger.warn(`Could not release API key claim for user ${record.id}`);
        return 0;
      });
      throw error;
    }

    if (record.apiKeyHash) {
      await redis.del(this.apiKeyKey(record.apiKeyHash));
    }

    this.logger.log(`Rotated API key for user ${record.id} (key hash ${hashKeyForLogging(hash)})`);
    return apiKey;
  }

  private async saveRecord(record: UserRecord, redis: RedisClient): Promise<UserRecord> {
    const updated: UserRecord = { ...record, updatedAt: new Date().toISOString() };
    await redis.set(this.userKey(record.id), JSON.stringify(updated));
    return updated;
  }

  private async getUserOrThrow(userId: string, redis: RedisClient): Promise<UserRecord> {
    const record = await this.getRecord(userId, redis);
    if (!record) {
      throw new NotFoundException('User not found');
    }
    return record;
  }

  private async getRecord(userId: string, redis: RedisClient): Promise<UserRecord | null> {
    const raw = await redis.get(this.userKey(userId));
    if (!raw) {
      return null;
    }

    try {
      return JSON.parse(raw) as UserRecord;
    } catch {
      this.logger.warn(`Invalid user record payload for id hash ${hashKeyForLogging(userId)}`);
      return null;
    }
  }

  private generateApiKey(): string {
    return `ak_${randomBytes(32).toString('base64url')}`;
  }

  private normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
  }

  private userKey(userId: string): string {
    return this.storeService.key('user', userId);
  }

  private emailKey(email: string): string {
    return this.storeService.key('email', email);
  }

  private apiKeyKey(hash: string): string {
    return this.storeService.key('api-key', hash);
  }

  private indexKey(): string {
    return this.storeService.key('users');
  }

  private parseRounds(value: unknown): number {
    const parsed = typeof value === 'number' ? value : Number(value);
    if (Number.isInteger(parsed) && parsed >= 4 && parsed <= 15) {
      return parsed;
    }

    if (value !== undefined) {
      this.logger.warn(`BCRYPT_ROUNDS is invalid; using fallback ${DEFAULT_BCRYPT_ROUNDS}`);
    }
    return DEFAULT_BCRYPT_ROUNDS;
  }
}
