import type { MatchStrategy } from './types.js';

/** How the matcher reads one entity kind. */
export interface MatchFields<T> {
  id(entity: T): string;
  name(entity: T): string;
  email?(entity: T): string | undefined;
  sequentialId?(entity: T): number | undefined;
}

const fold = (text: string) => text.trim().toLowerCase();

export function parseSequentialRef(raw: string): number | undefined {
  const digits = raw.trim().replace(/^#/, '');
  if (!/^\d+$/.test(digits)) return undefined;
  return parseInt(digits, 10);
}

/**
 * Exact matching only: IDs compare case-sensitively, names and emails
 * case-insensitively. Returns every candidate that matches.
 */
export function match<T>(
  strategy: MatchStrategy,
  raw: string,
  candidates: readonly T[],
  fields: MatchFields<T>
): T[] {
  const input = raw.trim();

  switch (strategy) {
    case 'exact-id':
      return candidates.filter((candidate) => fields.id(candidate) === input);

    case 'sequential-id': {
      const sequentialId = parseSequentialRef(input);
      const read = fields.sequentialId;
      if (sequentialId === undefined || !read) return [];
      return candidates.filter((candidate) => read(candidate) === sequentialId);
    }

    case 'exact-email': {
      const read = fields.email;
      if (!read) return [];
      const wanted = fold(input);
      return candidates.filter((candidate) => {
        const email = read(candidate);
        return email !== undefined && fold(email) === wanted;
      });
    }

    case 'exact-name': {
      const wanted = fold(input);
      return candidates.filter((candidate) => fold(fields.name(candidate)) === wanted);
    }
  }
}
