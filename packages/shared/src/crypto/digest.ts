import crypto from 'node:crypto';
import { DIGEST_ALGORITHM } from '../types/common.js';

/** Lowercase hex SHA-256 of the UTF-8 bytes of `text`. */
export function digestText(text: string): string {
  return crypto.createHash(DIGEST_ALGORITHM).update(text, 'utf-8').digest('hex');
}

/**
 * Constant-time comparison of two hex digests. Returns false when the
 * lengths differ.
 */
export function digestsEqual(a: string, b: string): boolean {
  const left = Buffer.from(a.toLowerCase(), 'utf-8');
  const right = Buffer.from(b.toLowerCase(), 'utf-8');
  if (left.length !== right.length) return false;
  return crypto.timingSafeEqual(left, right);
}

export function toBase64Url(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64url');
}

export function fromBase64Url(encoded: string): string {
  return Buffer.from(encoded.trim(), 'base64url').toString('utf-8');
}
