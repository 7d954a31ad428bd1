/**
 * SHA-256 content hashing
 *
 * All content hashes use the format: 'sha256:' + 64-character lowercase hex string.
 * The hash is the key of a full-content blob, so two records with byte-identical
 * bodies resolve to the same blob.
 *
 * @module utils/hash
 */

import crypto from 'crypto';

const HASH_PREFIX = 'sha256:';

/**
 * Compute SHA-256 hash of content
 *
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  const hash = crypto.createHash('sha256').update(content).digest('hex');
  return HASH_PREFIX + hash;
}

/**
 * Short stable hex digest (first 16 hex chars), used for query signatures
 * and generated object names.
 */
export function shortDigest(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex').slice(0, 16);
}
