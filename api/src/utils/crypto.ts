/**
 * Token Utilities
 *
 * API tokens have the form `ins_{tokenId}_{secret}`. Only the SHA-256 hash
 * of the full token is stored; tokens are high-entropy so SHA-256 is
 * sufficient for lookup.
 */

import crypto from 'node:crypto';
import { logger } from '@/utils/logger';

const TOKEN_PREFIX = 'ins';

export interface IssuedToken {
  token: string;
  tokenId: string;
  hash: string;
}

export function generateApiToken(): IssuedToken {
  const tokenId = crypto.randomBytes(8).toString('hex');
  const secret = crypto.randomBytes(32).toString('hex');
  const token = `${TOKEN_PREFIX}_${tokenId}_${secret}`;
  return { token, tokenId, hash: hashToken(token) };
}

/**
 * True when `token` has the `ins_{16 hex}_{64 hex}` layout
 */
export function isWellFormedToken(token: string): boolean {
  const parts = token.split('_');
  return (
    parts.length === 3 &&
    parts[0] === TOKEN_PREFIX &&
    /^[0-9a-f]{16}$/.test(parts[1]) &&
    /^[0-9a-f]{64}$/.test(parts[2])
  );
}

export function hashToken(token: string): string {
  return crypto.createHash('sha256').update(token).digest('hex');
}

/**
 * Constant-time string comparison
 */
export function constantTimeCompare(a: string, b: string): boolean {
  try {
    const bufA = Buffer.from(a, 'utf8');
    const bufB = Buffer.from(b, 'utf8');

    // Length check is not timing-safe, but needed for timingSafeEqual
    if (bufA.length !== bufB.length) {
      crypto.timingSafeEqual(bufA, bufA);
      return false;
    }

    return crypto.timingSafeEqual(bufA, bufB);
  } catch (error) {
    logger.error('Error in constant time comparison', { error: String(error) });
    return false;
  }
}
