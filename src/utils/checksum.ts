/**
 * Short hex digests used to build deterministic identifiers.
 */
import { createHash } from 'node:crypto';

/**
 * SHA-1 of the given content, truncated to `length` hex characters.
 */
export function shortSha1(content: string, length: number): string {
  return createHash('sha1').update(content).digest('hex').slice(0, length);
}
