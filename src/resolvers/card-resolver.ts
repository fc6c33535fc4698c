import type { Card } from '../schemas.js';
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
 * Cards resolve by card ID, sequential number (`#123` or `123`) or name.
 * Sequential numbers repeat across boards: without a board scope every board
 * is searched and a number found on two boards is ambiguous.
 */
export class CardResolver extends EntityResolver<Card> {
  constructor(
    fetcher: EntityFetcher,
    private readonly boards: BoardResolver,
    cacheSize?: number
  ) {
    super(fetcher, 'card', {
      id: (card) => card.cardId,
      name: (card) => card.name,
      sequentialId: (card) => card.sequentialId,
    }, cacheSize);
  }

  async resolve(raw: string, scope?: ResolutionScope): Promise<Resolution<Card>> {
    const input = raw.trim();
    if (!input) return this.notFound(input);

    const boardScope = await resolveBoardScope(this.boards, scope);
    if (!boardScope.ok) return failed(boardScope.failure);
    const board = boardScope.entity;

    if (this.isIdInput(input)) {
      const card = await this.fetchById(input, (id) => this.fetcher.fetchCard(id));
      if (card === undefined || (board && card.widgetCommonId !== board.widgetCommonId)) {
        return this.notFound(input);
      }
      return this.success(input, card);
    }

    const cards = board ? await this.boardCards(board.widgetCommonId) : await this.allCards();
    return this.decide(input, cards);
  }

  summarize(card: Card): CandidateSummary {
    const where = card.widgetCommonId ? ` on board ${card.widgetCommonId}` : '';
    return { id: card.cardId, name: card.name, context: `#${card.sequentialId}${where}` };
  }

  private boardCards(boardId: string): Promise<Card[]> {
    return this.candidates(`board:${boardId}`, () => this.fetcher.fetchCards({ boardId }));
  }

  // One board at a time; board-level lists land in the cache as well
  private allCards(): Promise<Card[]> {
    return this.candidates('all-boards', async () => {
      const cards: Card[] = [];
      for (const board of await this.boards.list()) {
        cards.push(...(await this.boardCards(board.widgetCommonId)));
      }
      return cards;
    });
  }
}
