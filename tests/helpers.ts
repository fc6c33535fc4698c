import type {
  CreateCardParams,
  CreateColumnParams,
  FavroApi,
  UpdateCardParams,
  UpdateColumnParams,
} from '../src/favro-client.js';
import type { BoardListOptions, CardFilter } from '../src/resolvers/index.js';
import type { Board, Card, Column, Organization, Tag, User } from '../src/schemas.js';
import type { TextSink } from '../src/output.js';

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export const ORG_ID = 'org0000000000001';

/** A 16-character alphanumeric ID, the shape the service hands out. */
export function nativeId(prefix: string, n: number): string {
  return `${prefix}${String(n).padStart(13, '0')}`;
}

export function makeOrganization(overrides?: Partial<Organization>): Organization {
  return { organizationId: ORG_ID, name: 'Acme Studio', ...overrides };
}

export function makeBoard(overrides?: Partial<Board>): Board {
  return {
    widgetCommonId: nativeId('brd', 1),
    organizationId: ORG_ID,
    name: 'Sprint',
    type: 'board',
    color: 'blue',
    archived: false,
    collectionIds: [],
    ...overrides,
  };
}

export function makeColumn(overrides?: Partial<Column>): Column {
  return {
    columnId: nativeId('col', 1),
    organizationId: ORG_ID,
    widgetCommonId: nativeId('brd', 1),
    name: 'Todo',
    position: 0,
    cardCount: 0,
    ...overrides,
  };
}

export function makeCard(overrides?: Partial<Card>): Card {
  return {
    cardId: nativeId('crd', 1),
    cardCommonId: nativeId('ccm', 1),
    organizationId: ORG_ID,
    widgetCommonId: nativeId('brd', 1),
    columnId: nativeId('col', 1),
    sequentialId: 1,
    name: 'Write release notes',
    detailedDescription: null,
    tags: [],
    assignments: [],
    startDate: null,
    dueDate: null,
    tasksTotal: 0,
    tasksDone: 0,
    numComments: 0,
    listPosition: 0,
    archived: false,
    ...overrides,
  };
}

export function makeTag(overrides?: Partial<Tag>): Tag {
  return { tagId: nativeId('tag', 1), organizationId: ORG_ID, name: 'urgent', color: 'red', ...overrides };
}

export function makeUser(overrides?: Partial<User>): User {
  return {
    userId: nativeId('usr', 1),
    name: 'Ada Example',
    email: 'ada@example.com',
    organizationRole: 'administrator',
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// In-memory service
// ---------------------------------------------------------------------------

export interface FakeData {
  organizations?: Organization[];
  boards?: Board[];
  columns?: Column[];
  cards?: Card[];
  tags?: Tag[];
  users?: User[];
}

export interface Mutation {
  method: string;
  args: unknown[];
}

/**
 * Service stand-in holding entities in arrays. Every call is counted so
 * tests can assert how often the resolvers went to the service.
 */
export class FakeFavro implements FavroApi {
  readonly organizationId: string | undefined = ORG_ID;
  organizations: Organization[];
  boards: Board[];
  columns: Column[];
  cards: Card[];
  tags: Tag[];
  users: User[];
  readonly calls = new Map<string, number>();
  readonly mutations: Mutation[] = [];
  private failures = new Map<string, Error>();

  constructor(data: FakeData = {}) {
    this.organizations = data.organizations ?? [makeOrganization()];
    this.boards = data.boards ?? [];
    this.columns = data.columns ?? [];
    this.cards = data.cards ?? [];
    this.tags = data.tags ?? [];
    this.users = data.users ?? [];
  }

  callCount(method: string): number {
    return this.calls.get(method) ?? 0;
  }

  totalCalls(): number {
    let total = 0;
    for (const count of this.calls.values()) total += count;
    return total;
  }

  /** Makes every later call to `method` reject with `error`. */
  failWith(method: string, error: Error): void {
    this.failures.set(method, error);
  }

  private record(method: string): void {
    this.calls.set(method, this.callCount(method) + 1);
    const failure = this.failures.get(method);
    if (failure) throw failure;
  }

  async fetchOrganizations(): Promise<Organization[]> {
    this.record('fetchOrganizations');
    return [...this.organizations];
  }

  async fetchOrganization(organizationId: string): Promise<Organization | null> {
    this.record('fetchOrganization');
    return this.organizations.find((o) => o.organizationId === organizationId) ?? null;
  }

  async fetchBoards(options: BoardListOptions = {}): Promise<Board[]> {
    this.record('fetchBoards');
    return this.boards.filter((b) =>
      (options.includeArchived || !b.archived) &&
      (options.collectionId === undefined || b.collectionIds.includes(options.collectionId))
    );
  }

  async fetchBoard(widgetCommonId: string): Promise<Board | null> {
    this.record('fetchBoard');
    return this.boards.find((b) => b.widgetCommonId === widgetCommonId) ?? null;
  }

  async fetchColumns(widgetCommonId: string): Promise<Column[]> {
    this.record('fetchColumns');
    return this.columns.filter((c) => c.widgetCommonId === widgetCommonId);
  }

  async fetchColumn(columnId: string): Promise<Column | null> {
    this.record('fetchColumn');
    return this.columns.find((c) => c.columnId === columnId) ?? null;
  }

  async fetchCards(filter: CardFilter): Promise<Card[]> {
    this.record('fetchCards');
    return this.cards.filter((c) =>
      (filter.boardId === undefined || c.widgetCommonId === filter.boardId) &&
      (filter.columnId === undefined || c.columnId === filter.columnId)
    );
  }

  async fetchCard(cardId: string): Promise<Card | null> {
    this.record('fetchCard');
    return this.cards.find((c) => c.cardId === cardId) ?? null;
  }

  async fetchTags(): Promise<Tag[]> {
    this.record('fetchTags');
    return [...this.tags];
  }

  async fetchTag(tagId: string): Promise<Tag | null> {
    this.record('fetchTag');
    return this.tags.find((t) => t.tagId === tagId) ?? null;
  }

  async fetchUsers(): Promise<User[]> {
    this.record('fetchUsers');
    return [...this.users];
  }

  async fetchUser(userId: string): Promise<User | null> {
    this.record('fetchUser');
    return this.users.find((u) => u.userId === userId) ?? null;
  }

  async createCard(params: CreateCardParams): Promise<Card> {
    this.record('createCard');
    this.mutations.push({ method: 'createCard', args: [params] });
    const card = makeCard({
      cardId: nativeId('crd', 900 + this.cards.length),
      sequentialId: Math.max(0, ...this.cards.map((c) => c.sequentialId)) + 1,
      name: params.name,
      widgetCommonId: params.widgetCommonId,
      columnId: params.columnId,
      detailedDescription: params.detailedDescription,
    });
    this.cards.push(card);
    return card;
  }

  async updateCard(cardId: string, params: UpdateCardParams): Promise<Card> {
    this.record('updateCard');
    this.mutations.push({ method: 'updateCard', args: [cardId, params] });
    const card = this.cards.find((c) => c.cardId === cardId) ?? makeCard({ cardId });
    return {
      ...card,
      name: params.name ?? card.name,
      detailedDescription: params.detailedDescription ?? card.detailedDescription,
      widgetCommonId: params.widgetCommonId ?? card.widgetCommonId,
      columnId: params.columnId ?? card.columnId,
    };
  }

  async deleteCard(cardId: string, everywhere?: boolean): Promise<void> {
    this.record('deleteCard');
    this.mutations.push({ method: 'deleteCard', args: [cardId, everywhere] });
  }

  async createColumn(params: CreateColumnParams): Promise<Column> {
    this.record('createColumn');
    this.mutations.push({ method: 'createColumn', args: [params] });
    const siblings = this.columns.filter((c) => c.widgetCommonId === params.widgetCommonId);
    return makeColumn({
      columnId: nativeId('col', 900 + this.columns.length),
      widgetCommonId: params.widgetCommonId,
      name: params.name,
      position: params.position ?? siblings.length,
    });
  }

  async updateColumn(columnId: string, params: UpdateColumnParams): Promise<Column> {
    this.record('updateColumn');
    this.mutations.push({ method: 'updateColumn', args: [columnId, params] });
    const column = this.columns.find((c) => c.columnId === columnId) ?? makeColumn({ columnId });
    return { ...column, name: params.name ?? column.name, position: params.position ?? column.position };
  }

  async deleteColumn(columnId: string): Promise<void> {
    this.record('deleteColumn');
    this.mutations.push({ method: 'deleteColumn', args: [columnId] });
  }
}

// ---------------------------------------------------------------------------
// Output capture
// ---------------------------------------------------------------------------

export class MemorySink implements TextSink {
  private chunks: string[] = [];

  write(text: string): boolean {
    this.chunks.push(text);
    return true;
  }

  text(): string {
    return this.chunks.join('');
  }

  lines(): string[] {
    return this.text().split('\n').filter((line) => line !== '');
  }
}
