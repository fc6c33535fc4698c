import { config } from '../config.js';
import { BoardResolver } from './board-resolver.js';
import { CardResolver } from './card-resolver.js';
import { ColumnResolver } from './column-resolver.js';
import { OrganizationResolver } from './organization-resolver.js';
import { TagResolver } from './tag-resolver.js';
import { UserResolver } from './user-resolver.js';
import type { BoardListOptions, EntityFetcher } from './types.js';

export * from './types.js';
export { classify, looksLikeNativeId, looksLikeSequentialRef } from './classifier.js';
export { match, parseSequentialRef, type MatchFields } from './matcher.js';
export { EntityResolver, CollectionResolver } from './entity-resolver.js';
export { BoardResolver, resolveBoardScope } from './board-resolver.js';
export { CardResolver } from './card-resolver.js';
export { ColumnResolver } from './column-resolver.js';
export { OrganizationResolver } from './organization-resolver.js';
export { TagResolver } from './tag-resolver.js';
export { UserResolver } from './user-resolver.js';

export interface ResolverSet {
  organizations: OrganizationResolver;
  boards: BoardResolver;
  columns: ColumnResolver;
  cards: CardResolver;
  tags: TagResolver;
  users: UserResolver;
}

export interface ResolverSetOptions {
  boards?: BoardListOptions;
  cacheSize?: number;
}

/**
 * Resolvers for one command invocation. Columns and cards share the board
 * resolver, so a board named in a scope is fetched once per command.
 */
export function createResolvers(fetcher: EntityFetcher, options: ResolverSetOptions = {}): ResolverSet {
  const cacheSize = options.cacheSize ?? config.FAVRO_RESOLVER_CACHE_SIZE;
  const boards = new BoardResolver(fetcher, options.boards, cacheSize);

  return {
    organizations: new OrganizationResolver(fetcher, cacheSize),
    boards,
    columns: new ColumnResolver(fetcher, boards, cacheSize),
    cards: new CardResolver(fetcher, boards, cacheSize),
    tags: new TagResolver(fetcher, cacheSize),
    users: new UserResolver(fetcher, cacheSize),
  };
}
