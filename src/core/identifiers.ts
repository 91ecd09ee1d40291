/**
 * Post and comment identifier handling.
 *
 * Reddit ids are case-insensitive base-36 tokens. Everything that compares or
 * indexes ids goes through normalizeId() first.
 */

import { InvalidIdentifierError, type NormalizedId } from '../types.js';

/**
 * Canonical form of a raw id: surrounding whitespace removed, lowercased.
 * Idempotent. Throws InvalidIdentifierError when nothing is left.
 */
export function normalizeId(raw: string): NormalizedId {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new InvalidIdentifierError('Identifier must not be empty');
  }
  return trimmed.toLowerCase();
}

/**
 * Strip the structural wrapping Reddit puts around ids in markup, keeping case:
 * a fullname type prefix (`t1_abc` → `abc`) or an anchor (`#abc` → `abc`).
 * Returns null when no id is left.
 */
export function stripFullname(raw: string | null | undefined): string | null {
  if (!raw) return null;

  let id = raw.trim();
  if (id.startsWith('#')) id = id.slice(1);

  const prefixed = id.match(/^t\d_(.+)$/i);
  if (prefixed) id = prefixed[1];

  return id || null;
}

/** Identity comparison of two raw ids. */
export function sameId(a: string, b: string): boolean {
  return normalizeId(a) === normalizeId(b);
}
