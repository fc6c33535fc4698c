import type { Board } from '../schemas.js';
import { CollectionResolver } from './entity-resolver.js';
import {
  resolved,
  type BoardListOptions,
  type CandidateSummary,
  type EntityFetcher,
  type Resolution,
  type ResolutionScope,
} from './types.js';

/**
 * Resolves boards and backlogs (both are "widgets" on the service). Name
 * lookups honour the collection filter and archived flag given at
 * construction; ID lookups ignore both.
 */
export class BoardResolver extends CollectionResolver<Board> {
  private readonly options: BoardListOptions;

  constructor(fetcher: EntityFetcher, options: BoardListOptions = {}, cacheSize?: number) {
    super(fetcher, 'board', {
      id: (board) => board.widgetCommonId,
      name: (board) => board.name,
    }, cacheSize);
    this.options = options;
  }

  protected listKey(): string {
    const collection = this.options.collectionId ?? '*';
    return `boards:${collection}:${this.options.includeArchived ? 'archived' : 'active'}`;
  }

  protected fetchAll(): Promise<Board[]> {
    return this.fetcher.fetchBoards(this.options);
  }

  protected fetchOne(id: string): Promise<Board | null> {
    return this.fetcher.fetchBoard(id);
  }

  summarize(board: Board): CandidateSummary {
    return { id: board.widgetCommonId, name: board.name, context: board.type };
  }
}

/**
 * Settles the board part of a scope: a raw identifier is resolved through
 * `boards` (its failure is returned untouched), an already resolved board is
 * passed through, and no board yields `undefined`.
 */
export async function resolveBoardScope(
  boards: BoardResolver,
  scope: ResolutionScope | undefined
): Promise<Resolution<Board | undefined>> {
  const board = scope?.board;
  if (board === undefined) return resolved(undefined);
  if (typeof board !== 'string') return resolved(board);
  return boards.resolve(board);
}
