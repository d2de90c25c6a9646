import { nanoid } from 'nanoid';

/**
 * Generates a unique ID with a specified prefix and length.
 *
 * @param prefix - The prefix for the ID (e.g., 'task', 'req').
 * @param length - The desired length of the random part of the ID (default: 10).
 * @returns A prefixed ID string (e.g., 'task_aBcDeFgHiJ').
 */
export function generatePrefixedId(prefix: string, length: number = 10): string {
  return `${prefix}_${nanoid(length)}`;
}

/**
 * Generates a 21-character URL-safe unique ID.
 */
export function generateId(): string {
  return nanoid();
}
