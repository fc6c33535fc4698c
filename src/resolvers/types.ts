import type { Board, Card, Column, Organization, Tag, User } from '../schemas.js';

export type EntityKind = 'organization' | 'board' | 'column' | 'card' | 'tag' | 'user';

export type MatchStrategy = 'exact-id' | 'sequential-id' | 'exact-email' | 'exact-name';

// ============================================
// ENTITY FETCHER
// ============================================

export interface BoardListOptions {
  collectionId?: string;
  includeArchived?: boolean;
}

export interface CardFilter {
  boardId?: string;
  columnId?: string;
  collectionId?: string;
}

/**
 * Read access to the service, one call per entity kind. Implementations do
 * not cache. Single-entity lookups return `null` when the entity does not
 * exist; every other failure is thrown as-is.
 */
export interface EntityFetcher {
  fetchOrganizations(): Promise<Organization[]>;
  fetchOrganization(organizationId: string): Promise<Organization | null>;
  fetchBoards(options?: BoardListOptions): Promise<Board[]>;
  fetchBoard(widgetCommonId: string): Promise<Board | null>;
  fetchColumns(widgetCommonId: string): Promise<Column[]>;
  fetchColumn(columnId: string): Promise<Column | null>;
  fetchCards(filter: CardFilter): Promise<Card[]>;
  fetchCard(cardId: string): Promise<Card | null>;
  fetchTags(): Promise<Tag[]>;
  fetchTag(tagId: string): Promise<Tag | null>;
  fetchUsers(): Promise<User[]>;
  fetchUser(userId: string): Promise<User | null>;
}

// ============================================
// RESOLUTION RESULTS
// ============================================

export interface CandidateSummary {
  id: string;
  name: string;
  context?: string;
}

export interface NotFoundFailure {
  type: 'not_found';
  entityKind: EntityKind;
  input: string;
}

export interface AmbiguousFailure {
  type: 'ambiguous';
  entityKind: EntityKind;
  input: string;
  candidates: CandidateSummary[];
}

export interface ScopeRequiredFailure {
  type: 'scope_required';
  entityKind: EntityKind;
  input: string;
  missingScope: EntityKind;
}

export type ResolutionFailure = NotFoundFailure | AmbiguousFailure | ScopeRequiredFailure;

export type Resolution<T> =
  | { ok: true; entity: T }
  | { ok: false; failure: ResolutionFailure };

/**
 * Parent identifiers for scoped lookups. A string is a raw, user-typed board
 * identifier that the resolver resolves first; an object is a board that the
 * caller already resolved.
 */
export interface ResolutionScope {
  board?: string | Board;
}

export function resolved<T>(entity: T): Resolution<T> {
  return { ok: true, entity };
}

export function failed<T>(failure: ResolutionFailure): Resolution<T> {
  return { ok: false, failure };
}
