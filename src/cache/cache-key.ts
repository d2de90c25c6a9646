import { createHash } from 'crypto';

/**
 * Builds a deterministic cache key from a namespace (usually a pipeline stage)
 * and the stage input. Input is lower-cased and trimmed before hashing, so
 * requests differing only in case or surrounding whitespace share an entry.
 *
 * @example generateCacheKey('plan', 'Solar storage') // 'plan:<md5 hex>'
 */
export function generateCacheKey(namespace: string, input: string): string {
  const normalized = input.toLowerCase().trim();
  const hash = createHash('md5').update(normalized).digest('hex');
  return `${namespace}:${hash}`;
}
