export interface User {
  username: string;                 // case preserved, unique case-insensitively
  balance: bigint;                  // base units, never negative
  registeredAt: Date;
}

/**
 * Reddit usernames are case-insensitive; compare through this.
 */
export function sameUser(a: string | null | undefined, b: string | null | undefined): boolean {
  if (!a || !b) return false;
  return normalizeUsername(a) === normalizeUsername(b);
}

export function normalizeUsername(username: string): string {
  return username.trim().replace(/^\/?u\//i, '').toLowerCase();
}
