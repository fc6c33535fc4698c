import { describe, it, expect, beforeEach } from 'vitest';
import { FavroError, FavroErrorType } from '../src/favro-client.js';
import {
  BoardResolver,
  CardResolver,
  ColumnResolver,
  createResolvers,
  OrganizationResolver,
  TagResolver,
  UserResolver,
  type AmbiguousFailure,
  type Resolution,
} from '../src/resolvers/index.js';
import {
  FakeFavro,
  makeBoard,
  makeCard,
  makeColumn,
  makeOrganization,
  makeTag,
  makeUser,
  nativeId,
} from './helpers.js';

// ---------------------------------------------------------------------------
// Fixture: two boards called "Sprint", a backlog and an archived board
// ---------------------------------------------------------------------------

const B1 = nativeId('brd', 1);
const B2 = nativeId('brd', 2);
const B3 = nativeId('brd', 3);
const B4 = nativeId('brd', 4);

function sampleData() {
  return {
    organizations: [
      makeOrganization(),
      makeOrganization({ organizationId: nativeId('org', 2), name: 'Side Project' }),
    ],
    boards: [
      makeBoard({ widgetCommonId: B1, name: 'Sprint' }),
      makeBoard({ widgetCommonId: B2, name: 'Sprint' }),
      makeBoard({ widgetCommonId: B3, name: 'Roadmap', type: 'backlog' }),
      makeBoard({ widgetCommonId: B4, name: 'Old Sprint', archived: true }),
    ],
    columns: [
      makeColumn({ columnId: nativeId('col', 1), widgetCommonId: B1, name: 'Todo', position: 0 }),
      makeColumn({ columnId: nativeId('col', 2), widgetCommonId: B1, name: 'Done', position: 1 }),
      makeColumn({ columnId: nativeId('col', 3), widgetCommonId: B2, name: 'Todo', position: 0 }),
      makeColumn({ columnId: nativeId('col', 4), widgetCommonId: B2, name: 'In Review', position: 1 }),
      makeColumn({ columnId: nativeId('col', 5), widgetCommonId: B2, name: 'in review', position: 2 }),
    ],
    cards: [
      makeCard({ cardId: nativeId('crd', 1), widgetCommonId: B1, columnId: nativeId('col', 1), sequentialId: 12, name: 'Fix login' }),
      makeCard({ cardId: nativeId('crd', 2), widgetCommonId: B1, columnId: nativeId('col', 2), sequentialId: 13, name: 'Release' }),
      makeCard({ cardId: nativeId('crd', 3), widgetCommonId: B2, columnId: nativeId('col', 3), sequentialId: 12, name: 'Fix logout' }),
      makeCard({ cardId: nativeId('crd', 4), widgetCommonId: B2, columnId: nativeId('col', 4), sequentialId: 20, name: 'Release' }),
    ],
    tags: [
      makeTag({ tagId: nativeId('tag', 1), name: 'Urgent', color: 'red' }),
      makeTag({ tagId: nativeId('tag', 2), name: 'backend', color: 'blue' }),
      makeTag({ tagId: nativeId('tag', 3), name: 'Backend', color: 'green' }),
    ],
    users: [
      makeUser({ userId: nativeId('usr', 1), name: 'Ada Example', email: 'ada@example.com' }),
      makeUser({ userId: nativeId('usr', 2), name: 'ada@example.com', email: 'alias@example.com' }),
      makeUser({ userId: nativeId('usr', 3), name: 'team@lead', email: 'lead@example.com' }),
      makeUser({ userId: nativeId('usr', 4), name: 'Sam Example', email: 'sam.one@example.com' }),
      makeUser({ userId: nativeId('usr', 5), name: 'Sam Example', email: 'sam.two@example.com' }),
    ],
  };
}

function entityOf<T>(resolution: Resolution<T>): T {
  if (!resolution.ok) {
    throw new Error(`expected a match, got ${resolution.failure.type}`);
  }
  return resolution.entity;
}

function ambiguityOf<T>(resolution: Resolution<T>): AmbiguousFailure {
  if (resolution.ok || resolution.failure.type !== 'ambiguous') {
    throw new Error(`expected an ambiguous result, got ${resolution.ok ? 'a match' : resolution.failure.type}`);
  }
  return resolution.failure;
}

let api: FakeFavro;

beforeEach(() => {
  api = new FakeFavro(sampleData());
});

// ---------------------------------------------------------------------------
// Organizations
// ---------------------------------------------------------------------------

describe('OrganizationResolver', () => {
  it('finds an organization by name, ignoring case', async () => {
    const resolver = new OrganizationResolver(api);
    expect(entityOf(await resolver.resolve('side project')).organizationId).toBe(nativeId('org', 2));
  });

  it('fetches an ID directly without listing', async () => {
    const resolver = new OrganizationResolver(api);
    expect(entityOf(await resolver.resolve(nativeId('org', 2))).name).toBe('Side Project');
    expect(api.callCount('fetchOrganization')).toBe(1);
    expect(api.callCount('fetchOrganizations')).toBe(0);
  });

  it('reports an unknown name as not found', async () => {
    const resolver = new OrganizationResolver(api);
    expect(await resolver.resolve('Nobody')).toEqual({
      ok: false,
      failure: { type: 'not_found', entityKind: 'organization', input: 'Nobody' },
    });
  });
});

// ---------------------------------------------------------------------------
// Boards
// ---------------------------------------------------------------------------

describe('BoardResolver', () => {
  it('resolves a unique name, backlogs included', async () => {
    const resolver = new BoardResolver(api);
    expect(entityOf(await resolver.resolve('ROADMAP')).widgetCommonId).toBe(B3);
  });

  it('returns the same board whatever the case of the name', async () => {
    const resolver = new BoardResolver(api);
    const upper = entityOf(await resolver.resolve('Roadmap'));
    const lower = entityOf(await resolver.resolve('roadmap'));
    expect(lower).toBe(upper);
  });

  it('reports every board sharing a name as ambiguous', async () => {
    const resolver = new BoardResolver(api);
    expect(await resolver.resolve('sprint')).toEqual({
      ok: false,
      failure: {
        type: 'ambiguous',
        entityKind: 'board',
        input: 'sprint',
        candidates: [
          { id: B1, name: 'Sprint', context: 'board' },
          { id: B2, name: 'Sprint', context: 'board' },
        ],
      },
    });
  });

  it('returns the same board for repeated ID lookups with one request', async () => {
    const resolver = new BoardResolver(api);
    const first = entityOf(await resolver.resolve(B2));
    const second = entityOf(await resolver.resolve(B2));

    expect(second).toBe(first);
    expect(api.callCount('fetchBoard')).toBe(1);
    expect(api.callCount('fetchBoards')).toBe(0);
  });

  it('remembers that an ID does not exist', async () => {
    const resolver = new BoardResolver(api);
    const missing = nativeId('brd', 99);

    expect((await resolver.resolve(missing)).ok).toBe(false);
    expect((await resolver.resolve(missing)).ok).toBe(false);
    expect(api.callCount('fetchBoard')).toBe(1);
  });

  it('lists boards once for several name lookups', async () => {
    const resolver = new BoardResolver(api);
    await resolver.resolve('Roadmap');
    await resolver.resolve('Sprint');
    await resolver.resolve('Nothing here');

    expect(api.callCount('fetchBoards')).toBe(1);
    expect(resolver.getCacheStats()).toMatchObject({ name: 'boards', size: 1, hits: 2, misses: 1 });
  });

  it('leaves archived boards out of name lookups unless asked', async () => {
    expect((await new BoardResolver(api).resolve('Old Sprint')).ok).toBe(false);

    const withArchived = new BoardResolver(api, { includeArchived: true });
    expect(entityOf(await withArchived.resolve('Old Sprint')).widgetCommonId).toBe(B4);
  });

  it('finds an archived board by ID regardless of filters', async () => {
    const resolver = new BoardResolver(api, { collectionId: nativeId('cll', 1) });
    expect(entityOf(await resolver.resolve(B4)).name).toBe('Old Sprint');
  });

  it('restricts name lookups to a collection', async () => {
    const collection = nativeId('cll', 1);
    api.boards[2] = { ...api.boards[2], collectionIds: [collection] };

    const resolver = new BoardResolver(api, { collectionId: collection });
    expect(entityOf(await resolver.resolve('Roadmap')).widgetCommonId).toBe(B3);
    expect((await resolver.resolve('Sprint')).ok).toBe(false);
  });

  it('answers blank input without calling the service', async () => {
    const resolver = new BoardResolver(api);
    expect(await resolver.resolve('   ')).toEqual({
      ok: false,
      failure: { type: 'not_found', entityKind: 'board', input: '' },
    });
    expect(api.totalCalls()).toBe(0);
  });

  it('lets service errors through untouched', async () => {
    const error = new FavroError(FavroErrorType.AUTH_ERROR, 'Authentication failed', 401);
    api.failWith('fetchBoards', error);

    await expect(new BoardResolver(api).resolve('Sprint')).rejects.toBe(error);
  });
});

// ---------------------------------------------------------------------------
// Columns
// ---------------------------------------------------------------------------

describe('ColumnResolver', () => {
  function columnResolver() {
    const boards = new BoardResolver(api);
    return { boards, columns: new ColumnResolver(api, boards) };
  }

  it('refuses a name lookup without a board', async () => {
    const { columns } = columnResolver();
    expect(await columns.resolve('Todo')).toEqual({
      ok: false,
      failure: { type: 'scope_required', entityKind: 'column', input: 'Todo', missingScope: 'board' },
    });
    expect(api.totalCalls()).toBe(0);
  });

  it('refuses a name found on only one board when no board is given', async () => {
    const { columns } = columnResolver();
    const resolution = await columns.resolve('Done');
    expect(resolution.ok).toBe(false);
    if (!resolution.ok) expect(resolution.failure.type).toBe('scope_required');
  });

  it('finds a name within a board given by ID', async () => {
    const { columns } = columnResolver();
    expect(entityOf(await columns.resolve('todo', { board: B2 })).columnId).toBe(nativeId('col', 3));
  });

  it('accepts an already resolved board without fetching it again', async () => {
    const { columns } = columnResolver();
    const board = api.boards[0];

    expect(entityOf(await columns.resolve('Done', { board })).columnId).toBe(nativeId('col', 2));
    expect(api.callCount('fetchBoard')).toBe(0);
    expect(api.callCount('fetchBoards')).toBe(0);
  });

  it('returns the board failure when the board scope is ambiguous', async () => {
    const { columns } = columnResolver();
    const resolution = await columns.resolve('Todo', { board: 'Sprint' });

    expect(resolution.ok).toBe(false);
    if (resolution.ok) return;
    expect(resolution.failure.type).toBe('ambiguous');
    expect(resolution.failure.entityKind).toBe('board');
    expect(api.callCount('fetchColumns')).toBe(0);
  });

  it('reports duplicate names within one board as ambiguous', async () => {
    const { columns } = columnResolver();
    expect(await columns.resolve('IN REVIEW', { board: B2 })).toEqual({
      ok: false,
      failure: {
        type: 'ambiguous',
        entityKind: 'column',
        input: 'IN REVIEW',
        candidates: [
          { id: nativeId('col', 4), name: 'In Review', context: `board ${B2}` },
          { id: nativeId('col', 5), name: 'in review', context: `board ${B2}` },
        ],
      },
    });
  });

  it('finds a column by ID without a board', async () => {
    const { columns } = columnResolver();
    expect(entityOf(await columns.resolve(nativeId('col', 4))).name).toBe('In Review');
    expect(api.callCount('fetchColumn')).toBe(1);
  });

  it('rejects an ID that belongs to another board', async () => {
    const { columns } = columnResolver();
    expect(await columns.resolve(nativeId('col', 4), { board: B1 })).toEqual({
      ok: false,
      failure: { type: 'not_found', entityKind: 'column', input: nativeId('col', 4) },
    });
  });

  it('fetches a board\'s columns once', async () => {
    const { columns } = columnResolver();
    await columns.resolve('Todo', { board: B1 });
    await columns.resolve('Done', { board: B1 });
    expect(api.callCount('fetchColumns')).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Cards
// ---------------------------------------------------------------------------

describe('CardResolver', () => {
  function cardResolver() {
    const boards = new BoardResolver(api);
    return { boards, cards: new CardResolver(api, boards) };
  }

  it('finds a sequential number within a board', async () => {
    const { cards } = cardResolver();
    expect(entityOf(await cards.resolve('#12', { board: B1 })).name).toBe('Fix login');
    expect(entityOf(await cards.resolve('12', { board: B2 })).name).toBe('Fix logout');
  });

  it('reports a number used on two boards as ambiguous', async () => {
    const { cards } = cardResolver();
    expect(await cards.resolve('#12')).toEqual({
      ok: false,
      failure: {
        type: 'ambiguous',
        entityKind: 'card',
        input: '#12',
        candidates: [
          { id: nativeId('crd', 1), name: 'Fix login', context: `#12 on board ${B1}` },
          { id: nativeId('crd', 3), name: 'Fix logout', context: `#12 on board ${B2}` },
        ],
      },
    });
  });

  it('searches every active board once when no board is given', async () => {
    const { cards } = cardResolver();
    expect(entityOf(await cards.resolve('#13')).cardId).toBe(nativeId('crd', 2));
    expect(entityOf(await cards.resolve('#20')).cardId).toBe(nativeId('crd', 4));

    expect(api.callCount('fetchBoards')).toBe(1);
    // B1, B2 and the backlog B3; the archived board is skipped
    expect(api.callCount('fetchCards')).toBe(3);
  });

  it('reuses board lists gathered by an organization-wide search', async () => {
    const { cards } = cardResolver();
    await cards.resolve('#13');
    await cards.resolve('Release', { board: B2 });
    expect(api.callCount('fetchCards')).toBe(3);
  });

  it('narrows a duplicated name with a board', async () => {
    const { cards } = cardResolver();
    const everywhere = await cards.resolve('release');
    expect(everywhere.ok).toBe(false);
    if (!everywhere.ok) expect(everywhere.failure.type).toBe('ambiguous');

    expect(entityOf(await cards.resolve('release', { board: B2 })).cardId).toBe(nativeId('crd', 4));
  });

  it('fetches a card ID directly', async () => {
    const { cards } = cardResolver();
    expect(entityOf(await cards.resolve(nativeId('crd', 3))).name).toBe('Fix logout');
    expect(api.callCount('fetchCard')).toBe(1);
    expect(api.callCount('fetchCards')).toBe(0);
  });

  it('rejects a card ID that is on another board', async () => {
    const { cards } = cardResolver();
    const resolution = await cards.resolve(nativeId('crd', 3), { board: B1 });
    expect(resolution).toEqual({
      ok: false,
      failure: { type: 'not_found', entityKind: 'card', input: nativeId('crd', 3) },
    });
  });

  it('reports an unknown number as not found', async () => {
    const { cards } = cardResolver();
    expect(await cards.resolve('#99', { board: B1 })).toEqual({
      ok: false,
      failure: { type: 'not_found', entityKind: 'card', input: '#99' },
    });
  });

  it('returns the board failure for an unknown board scope', async () => {
    const { cards } = cardResolver();
    expect(await cards.resolve('#12', { board: 'Nope' })).toEqual({
      ok: false,
      failure: { type: 'not_found', entityKind: 'board', input: 'Nope' },
    });
  });
});

// ---------------------------------------------------------------------------
// Tags and users
// ---------------------------------------------------------------------------

describe('TagResolver', () => {
  it('finds a tag by name, ignoring case', async () => {
    expect(entityOf(await new TagResolver(api).resolve('urgent')).tagId).toBe(nativeId('tag', 1));
  });

  it('lists both tags whose names differ only in case', async () => {
    const resolution = await new TagResolver(api).resolve('BACKEND');
    expect(resolution).toEqual({
      ok: false,
      failure: {
        type: 'ambiguous',
        entityKind: 'tag',
        input: 'BACKEND',
        candidates: [
          { id: nativeId('tag', 2), name: 'backend', context: 'blue' },
          { id: nativeId('tag', 3), name: 'Backend', context: 'green' },
        ],
      },
    });
  });
});

describe('UserResolver', () => {
  it('prefers an email match over a name match', async () => {
    const user = entityOf(await new UserResolver(api).resolve('ADA@example.com'));
    expect(user.userId).toBe(nativeId('usr', 1));
  });

  it('falls back to names when no email matches', async () => {
    const user = entityOf(await new UserResolver(api).resolve('team@lead'));
    expect(user.userId).toBe(nativeId('usr', 3));
  });

  it('reports two users with one display name as ambiguous', async () => {
    const failure = ambiguityOf(await new UserResolver(api).resolve('sam example'));
    expect(failure.candidates.map((c) => c.context)).toEqual([
      'sam.one@example.com',
      'sam.two@example.com',
    ]);
  });
});

// ---------------------------------------------------------------------------
// Resolver set
// ---------------------------------------------------------------------------

describe('createResolvers', () => {
  it('resolves each kind by ID repeatedly with a single lookup and no listing', async () => {
    const resolvers = createResolvers(api);
    const lookups = [
      () => resolvers.organizations.resolve(nativeId('org', 2)),
      () => resolvers.boards.resolve(B3),
      () => resolvers.columns.resolve(nativeId('col', 2)),
      () => resolvers.cards.resolve(nativeId('crd', 4)),
      () => resolvers.tags.resolve(nativeId('tag', 1)),
      () => resolvers.users.resolve(nativeId('usr', 3)),
    ];

    for (const lookup of lookups) {
      const first = entityOf<unknown>(await lookup());
      expect(entityOf<unknown>(await lookup())).toBe(first);
    }

    for (const method of ['fetchOrganization', 'fetchBoard', 'fetchColumn', 'fetchCard', 'fetchTag', 'fetchUser']) {
      expect(api.callCount(method)).toBe(1);
    }
    for (const method of ['fetchOrganizations', 'fetchBoards', 'fetchColumns', 'fetchCards', 'fetchTags', 'fetchUsers']) {
      expect(api.callCount(method)).toBe(0);
    }
  });

  it('shares one board cache between boards, columns and cards', async () => {
    const resolvers = createResolvers(api);

    await resolvers.columns.resolve('Todo', { board: 'Roadmap' });
    await resolvers.cards.resolve('Release', { board: 'Roadmap' });
    await resolvers.boards.resolve('Roadmap');

    expect(api.callCount('fetchBoards')).toBe(1);
  });

  it('settles an ambiguous board by ID, then a card number on it', async () => {
    const resolvers = createResolvers(api);

    const byName = ambiguityOf(await resolvers.boards.resolve('Sprint'));

    const chosen = byName.candidates[1].id;
    const card = entityOf(await resolvers.cards.resolve('#12', { board: chosen }));
    expect(card.cardId).toBe(nativeId('crd', 3));
  });
});
