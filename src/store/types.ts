export type SetOptions = {
  NX?: boolean;
  EX?: number;
  PX?: number;
};

// Subset of the node-redis v4 client exposed by cache-manager-redis-yet.
export type RedisClient = {
  get: (key: string) => Promise<string | null>;
  set: (key: string, value: string, options?: SetOptions) => Promise<string | null>;
  del: (key: string) => Promise<number>;
  incr: (key: string) => Promise<number>;
  pExpire: (key: string, milliseconds: number) => Promise<boolean>;
  pTTL: (key: string) => Promise<number>;
  sAdd: (key: string, member: string) => Promise<number>;
  sMembers: (key: string) => Promise<string[]>;
  sRem: (key: string, member: string) => Promise<number>;
  ping: () => Promise<string>;
};

export type StoreHealth = { status: 'ok' | 'degraded'; message?: string };
