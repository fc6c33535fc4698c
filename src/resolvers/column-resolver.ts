import type { Column } from '../schemas.js';
import { BoardResolver, resolveBoardScope } from './board-resolver.js';
import { EntityResolver } from './entity-resolver.js';
import {
  failed,
  type CandidateSummary,
  type EntityFetcher,
  type Resolution,
  type ResolutionScope,
} from './types.js';

/**
 * Column names only mean something inside one board, so a name lookup
 * without a board scope is refused rather than searched organization-wide.
 */
export class ColumnResolver extends EntityResolver<Column> {
  constructor(
    fetcher: EntityFetcher,
    private readonly boards: BoardResolver,
    cacheSize?: number
  ) {
    super(fetcher, 'column', {
      id: (column) => column.columnId,
      name: (column) => column.name,
    }, cacheSize);
  }

  async resolve(raw: string, scope?: ResolutionScope): Promise<Resolution<Column>> {
    const input = raw.trim();
    if (!input) return this.notFound(input);

    const boardScope = await resolveBoardScope(this.boards, scope);
    if (!boardScope.ok) return failed(boardScope.failure);
    const board = boardScope.entity;

    if (this.isIdInput(input)) {
      const column = await this.fetchById(input, (id) => this.fetcher.fetchColumn(id));
      if (column === undefined || (board && column.widgetCommonId !== board.widgetCommonId)) {
        return this.notFound(input);
      }
      return this.success(input, column);
    }

    if (!board) {
      return failed({ type: 'scope_required', entityKind: 'column', input, missingScope: 'board' });
    }

    const boardId = board.widgetCommonId;
    const columns = await this.candidates(`board:${boardId}`, () => this.fetcher.fetchColumns(boardId));
    return this.decide(input, columns);
  }

  summarize(column: Column): CandidateSummary {
    return { id: column.columnId, name: column.name, context: `board ${column.widgetCommonId}` };
  }
}
