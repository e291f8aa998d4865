import { describe, it, expect } from 'vitest';
import crypto from 'node:crypto';
import {
  constantTimeCompare,
  generateApiToken,
  hashToken,
  isWellFormedToken,
} from '@/utils/crypto';

describe('generateApiToken', () => {
  it('issues an ins_* token and its SHA-256 hash', () => {
    const { token, tokenId, hash } = generateApiToken();

    expect(token).toMatch(/^ins_[0-9a-f]{16}_[0-9a-f]{64}$/);
    expect(token.split('_')[1]).toBe(tokenId);
    expect(hash).toBe(crypto.createHash('sha256').update(token).digest('hex'));
    expect(isWellFormedToken(token)).toBe(true);
  });

  it('issues a different token each time', () => {
    expect(generateApiToken().token).not.toBe(generateApiToken().token);
  });
});

describe('isWellFormedToken', () => {
  it('rejects other layouts', () => {
    expect(isWellFormedToken('')).toBe(false);
    expect(isWellFormedToken('test-secret')).toBe(false);
    expect(isWellFormedToken(`abc_${'0'.repeat(16)}_${'0'.repeat(64)}`)).toBe(false);
    expect(isWellFormedToken(`ins_${'0'.repeat(15)}_${'0'.repeat(64)}`)).toBe(false);
    expect(isWellFormedToken(`ins_${'0'.repeat(16)}_${'G'.repeat(64)}`)).toBe(false);
  });
});

describe('hashToken', () => {
  it('is stable', () => {
    expect(hashToken('test-secret')).toBe(hashToken('test-secret'));
    expect(hashToken('test-secret')).toHaveLength(64);
  });
});

describe('constantTimeCompare', () => {
  it('compares strings', () => {
    expect(constantTimeCompare('test-secret', 'test-secret')).toBe(true);
    expect(constantTimeCompare('test-secret', 'test-secreT')).toBe(false);
    expect(constantTimeCompare('test-secret', 'test')).toBe(false);
  });
});
