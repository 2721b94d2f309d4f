import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { ConflictException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import bcrypt from 'bcryptjs';

import { buildCacheManager, buildConfigService, InMemoryRedis } from '../../test/utils/in-memory-redis';
import { StoreService } from '../store/store.service';
import { sha256Hex } from '../utils/hash';
import { CredentialsService } from './credentials.service';
import { DuplicateEmailError, InvalidCredentialsError } from './errors';
import { Privilege } from './types';

describe('CredentialsService', () => {
  let service: CredentialsService;
  let redis: InMemoryRedis;

  const prefix = 'test-gatehouse';

  beforeEach(async () => {
    redis = new InMemoryRedis();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CredentialsService,
        StoreService,
        { provide: CACHE_MANAGER, useValue: buildCacheManager(redis) },
        {
          provide: ConfigService,
          useValue: buildConfigService({ STORE_KEY_PREFIX: prefix, BCRYPT_ROUNDS: 4 }),
        },
      ],
    }).compile();

    service = module.get<CredentialsService>(CredentialsService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('creates users and verifies their secret', async () => {
    const created = await service.createUser('ada@example.com', 'correct-horse', Privilege.User);

    await expect(service.verifySecret('ada@example.com', 'correct-horse')).resolves.toEqual({
      userId: created.id,
      email: 'ada@example.com',
      privilege: Privilege.User,
    });
  });

  it('persists only a salted hash of the secret', async () => {
    const created = await service.createUser('ada@example.com', 'correct-horse', Privilege.User);

    const raw = redis.strings.get(`${prefix}:user:${created.id}`);
    expect(raw).toBeDefined();
    expect(raw).not.toContain('correct-horse');
    expect(created.secretHash).toMatch(/^\$2[aby]\$04\$/);
    expect(redis.strings.get(`${prefix}:email:ada@example.com`)).toBe(created.id);
  });

  it('normalizes emails for registration and login', async () => {
    const created = await service.createUser('  Ada@Example.COM ', 'correct-horse', Privilege.User);

    expect(created.email).toBe('ada@example.com');
    await expect(service.verifySecret('ADA@example.com', 'correct-horse')).resolves.toEqual(
      expect.objectContaining({ userId: created.id }),
    );
  });

  it('rejects duplicate emails', async () => {
    await service.createUser('ada@example.com', 'correct-horse', Privilege.User);

    await expect(
      service.createUser('ada@example.com', 'another-secret', Privilege.Admin),
    ).rejects.toBeInstanceOf(DuplicateEmailError);
  });

  it('admits exactly one of several concurrent registrations for the same email', async () => {
    const results = await Promise.allSettled(
      Array.from({ length: 5 }, () =>
        service.createUser('race@example.com', 'correct-horse', Privilege.User),
      ),
    );

    expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.filter(
      (result): result is PromiseRejectedResult => result.status === 'rejected',
    );
    expect(rejected).toHaveLength(4);
    rejected.forEach((result) => expect(result.reason).toBeInstanceOf(DuplicateEmailError));
    await expect(service.listUsers()).resolves.toHaveLength(1);
  });

  it('fails with InvalidCredentialsError on a wrong secret', async () => {
    await service.createUser('ada@example.com', 'correct-horse', Privilege.User);

    await expect(service.verifySecret('ada@example.com', 'Correct-horse')).rejects.toBeInstanceOf(
      InvalidCredentialsError,
    );
  });

  it('runs one bcrypt comparison for unknown emails and wrong secrets alike', async () => {
    await service.createUser('ada@example.com', 'correct-horse', Privilege.User);
    const compareSpy = jest.spyOn(bcrypt, 'compare');

    const unknown = await service.verifySecret('nobody@example.com', 'x').catch((error) => error);
    const wrong = await service.verifySecret('ada@example.com', 'x').catch((error) => error);

    expect(compareSpy).toHaveBeenCalledTimes(2);
    expect(unknown).toBeInstanceOf(InvalidCredentialsError);
    expect(wrong).toBeInstanceOf(InvalidCredentialsError);
    expect(unknown.message).toBe(wrong.message);
  });

  it('refuses disabled users even with the right secret', async () => {
    const created = await service.createUser('ada@example.com', 'correct-horse', Privilege.User);
    await service.disableUser(created.id);

    await expect(service.verifySecret('ada@example.com', 'correct-horse')).rejects.toBeInstanceOf(
      InvalidCredentialsError,
    );
  });

  it('rotates api keys and resolves identities from them', async () => {
    const created = await service.createUser('ada@example.com', 'correct-horse', Privilege.Admin);

    const apiKey = await service.rotateApiKey(created.id);

    expect(apiKey).toMatch(/^ak_[A-Za-z0-9_-]{43}$/);
    await expect(service.lookupByApiKey(apiKey)).resolves.toEqual({
      userId: created.id,
      email: 'ada@example.com',
      privilege: Privilege.Admin,
    });
    expect(redis.strings.has(`${prefix}:api-key:${sha256Hex(apiKey)}`)).toBe(true);
  });

  it('invalidates the previous api key on rotation', async () => {
    const created = await service.createUser('ada@example.com', 'correct-horse', Privilege.User);
    const first = await service.rotateApiKey(created.id);

    const second = await service.rotateApiKey(created.id);

    expect(second).not.toBe(first);
    await expect(service.lookupByApiKey(first)).rejects.toBeInstanceOf(InvalidCredentialsError);
    await expect(service.lookupByApiKey(second)).resolves.toEqual(
      expect.objectContaining({ userId: created.id }),
    );
  });

  it('refuses a second rotation while one is in flight for the same user', async () => {
    const created = await service.createUser('ada@example.com', 'correct-horse', Privilege.User);

    const results = await Promise.allSettled([
      service.rotateApiKey(created.id),
      service.rotateApiKey(created.id),
    ]);

    const issued = results.filter(
      (result): result is PromiseFulfilledResult<string> => result.status === 'fulfilled',
    );
    const refused = results.filter(
      (result): result is PromiseRejectedResult => result.status === 'rejected',
    );
    expect(issued).toHaveLength(1);
    expect(refused).toHaveLength(1);
    expect(refused[0]?.reason).toBeInstanceOf(ConflictException);
    await expect(service.lookupByApiKey(issued[0]?.value ?? '')).resolves.toEqual(
      expect.objectContaining({ userId: created.id }),
    );
    expect([...redis.strings.keys()].filter((key) => key.startsWith(`${prefix}:api-key:`))).toHaveLength(1);
    await expect(service.rotateApiKey(created.id)).resolves.toMatch(/^ak_/);
  });

  it('releases the new key and the lock when the user record cannot be written', async () => {
    const created = await service.createUser('ada@example.com', 'correct-horse', Privilege.User);
    const setSpy = jest.spyOn(redis, 'set');
    setSpy.mockImplementation(async (key, value, options) => {
      if (key === `${prefix}:user:${created.id}`) {
        throw new Error('write failed');
      }
      return InMemoryRedis.prototype.set.call(redis, key, value, options);
    });

    await expect(service.rotateApiKey(created.id)).rejects.toThrow('write failed');

    expect([...redis.strings.keys()].filter((key) => key.startsWith(`${prefix}:api-key`))).toEqual([]);
  });

  it('ignores lookup entries that no longer match the user record', async () => {
    const created = await service.createUser('ada@example.com', 'correct-horse', Privilege.User);
    const first = await service.rotateApiKey(created.id);
    await service.rotateApiKey(created.id);
    // Simulate a rotation that died before removing the old lookup entry.
    redis.strings.set(`${prefix}:api-key:${sha256Hex(first)}`, created.id);

    await expect(service.lookupByApiKey(first)).rejects.toBeInstanceOf(InvalidCredentialsError);
  });

  it('rejects unknown and blank api keys', async () => {
    await expect(service.lookupByApiKey('ak_unknown')).rejects.toBeInstanceOf(
      InvalidCredentialsError,
    );
    await expect(service.lookupByApiKey('   ')).rejects.toBeInstanceOf(InvalidCredentialsError);
  });

  it('refuses api keys of disabled users', async () => {
    const created = await service.createUser('ada@example.com', 'correct-horse', Privilege.User);
    const apiKey = await service.rotateApiKey(created.id);

    await service.disableUser(created.id);

    await expect(service.lookupByApiKey(apiKey)).rejects.toBeInstanceOf(InvalidCredentialsError);
  });

  it('updates privilege levels', async () => {
    const created = await service.createUser('ada@example.com', 'correct-horse', Privilege.User);

    const updated = await service.updatePrivilege(created.id, 5);

    expect(updated.privilege).toBe(5);
    await expect(service.findUser(created.id)).resolves.toEqual(
      expect.objectContaining({ privilege: 5 }),
    );
  });

  it('throws NotFoundException for unknown users', async () => {
    await expect(service.updatePrivilege('missing', 1)).rejects.toBeInstanceOf(NotFoundException);
    await expect(service.rotateApiKey('missing')).rejects.toBeInstanceOf(NotFoundException);
  });

  it('surfaces store failures instead of reporting invalid credentials', async () => {
    await service.createUser('ada@example.com', 'correct-horse', Privilege.User);
    const outage = new Error('connection lost');
    jest.spyOn(redis, 'get').mockRejectedValueOnce(outage);

    await expect(service.verifySecret('ada@example.com', 'correct-horse')).rejects.toBe(outage);
  });

  it('releases the email claim when the user record cannot be written', async () => {
    const setSpy = jest.spyOn(redis, 'set');
    setSpy.mockImplementation(async (key, value, options) => {
      if (key.startsWith(`${prefix}:user:`)) {
        throw new Error('write failed');
      }
      return InMemoryRedis.prototype.set.call(redis, key, value, options);
    });

    await expect(
      service.createUser('ada@example.com', 'correct-horse', Privilege.User),
    ).rejects.toThrow('write failed');
    expect(redis.strings.has(`${prefix}:email:ada@example.com`)).toBe(false);
  });

  it('lists users without secret material', async () => {
    const created = await service.createUser('ada@example.com', 'correct-horse', Privilege.User);
    await service.rotateApiKey(created.id);

    const [user] = await service.listUsers();

    expect(user).toBeDefined();
    if (user) {
      expect(service.toPublicUser(user)).toEqual({
        id: created.id,
        email: 'ada@example.com',
        privilege: Privilege.User,
        disabled: false,
        createdAt: created.createdAt,
        updatedAt: expect.any(String),
        hasApiKey: true,
      });
    }
  });
});
