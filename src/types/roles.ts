export type UserRole = 'user' | 'admin';

export const DEFAULT_ROLE: UserRole = 'user';

export function isUserRole(value: unknown): value is UserRole {
  return value === 'user' || value === 'admin';
}
