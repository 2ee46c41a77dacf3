// lib/auth.ts

/**
 * Static username allow-list. This gates the dashboard; it is not authentication.
 */
export function isAllowedUser(username: string, allowedUsers: string[]): boolean {
  const candidate = username.trim().toLowerCase();
  if (!candidate) return false;
  return allowedUsers.some((u) => u.trim().toLowerCase() === candidate);
}
