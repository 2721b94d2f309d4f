export const Privilege = {
  Guest: 0,
  User: 1,
  Admin: 2,
} as const;

// Ordered scale: any non-negative integer; higher satisfies lower.
export type PrivilegeLevel = number;

export type Identity = {
  userId: string;
  email: string;
  privilege: PrivilegeLevel;
};

export type UserRecord = {
  id: string;
  email: string;
  secretHash: string;
  privilege: PrivilegeLevel;
  apiKeyHash?: string;
  disabled: boolean;
  createdAt: string;
  updatedAt: string;
};

export type PublicUser = Omit<UserRecord, 'secretHash' | 'apiKeyHash'> & {
  hasApiKey: boolean;
};
