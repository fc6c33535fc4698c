import type { EntityKind, MatchStrategy } from './types.js';

const ID_CHARSET = /^[A-Za-z0-9]{15,32}$/;
const DIGITS_ONLY = /^\d+$/;
const SEQUENTIAL_REF = /^#?\d+$/;

/**
 * Service IDs are opaque alphanumeric tokens such as `67973f72db34592d8fc96c48`
 * or `tXzdzvR7t8jSk8i3K`. A long single word ("Internationalization") has the
 * same charset, so a token must also carry a digit or an upper-case letter
 * after its first character.
 */
export function looksLikeNativeId(raw: string): boolean {
  if (!ID_CHARSET.test(raw) || DIGITS_ONLY.test(raw)) return false;
  return /\d/.test(raw) || /[A-Z]/.test(raw.slice(1));
}

export function looksLikeSequentialRef(raw: string): boolean {
  return SEQUENTIAL_REF.test(raw);
}

/**
 * Ordered strategies for one input. The resolver stops at the first
 * strategy that matches anything; ID-shaped input never falls back to names.
 */
export function classify(kind: EntityKind, raw: string): MatchStrategy[] {
  const input = raw.trim();

  if (looksLikeNativeId(input)) {
    return ['exact-id'];
  }

  if (kind === 'card' && looksLikeSequentialRef(input)) {
    return ['sequential-id'];
  }

  if (kind === 'user' && input.includes('@')) {
    return ['exact-email', 'exact-name'];
  }

  return ['exact-name'];
}
