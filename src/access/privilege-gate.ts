import { PrivilegeLevel } from '../credentials/types';

export type PrivilegeDecision =
  | { allowed: true }
  | { allowed: false; reason: 'InsufficientPrivilege' };

// Equal levels satisfy the requirement.
export function authorize(privilege: PrivilegeLevel, minPrivilege: PrivilegeLevel): PrivilegeDecision {
  if (privilege >= minPrivilege) {
    return { allowed: true };
  }

  return { allowed: false, reason: 'InsufficientPrivilege' };
}
