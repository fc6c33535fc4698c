import type { Command } from 'commander';
import type { Board, Card, Column, Tag, User } from '../schemas.js';
import type { Resolution, ResolutionFailure, ResolverSet } from '../resolvers/index.js';
import {
  action,
  CliError,
  ExitCode,
  openSession,
  reportFailure,
  type CommandContext,
} from './common.js';

interface BoardOption {
  board?: string;
}

interface ListOptions extends BoardOption {
  column?: string;
  collection?: string;
}

interface CreateOptions extends BoardOption {
  column?: string;
  description?: string;
}

interface UpdateOptions extends BoardOption {
  name?: string;
  description?: string;
}

interface MoveOptions extends BoardOption {
  column?: string;
}

interface ChangeOptions extends BoardOption {
  add: string[];
  remove: string[];
}

interface DeleteOptions extends BoardOption {
  everywhere?: boolean;
  force?: boolean;
}

const BOARD_FLAG = '-b, --board <board>';
const BOARD_HELP = 'board ID or name to search in';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function cardTitle(card: Card): string {
  return `#${card.sequentialId} ${card.name}`;
}

/** Resolves every reference or stops at the first failure. */
async function resolveAll<T>(
  refs: readonly string[],
  resolve: (raw: string) => Promise<Resolution<T>>
): Promise<{ ok: true; entities: T[] } | { ok: false; failure: ResolutionFailure }> {
  const entities: T[] = [];
  for (const raw of refs) {
    const resolution = await resolve(raw);
    if (!resolution.ok) return resolution;
    entities.push(resolution.entity);
  }
  return { ok: true, entities };
}

export function registerCardCommands(program: Command, ctx: CommandContext): void {
  const card = program.command('card').description('Cards');

  card
    .command('list')
    .description('List cards on a board, in a column or in a collection')
    .option(BOARD_FLAG, 'board ID or name')
    .option('-c, --column <column>', 'column ID, or name together with --board')
    .option('--collection <collectionId>', 'collection ID')
    .action(action(ctx, async (options: ListOptions) => {
      if (!options.board && !options.column && !options.collection) {
        throw new CliError('At least one filter is required: --board, --column or --collection.');
      }
      const { client, resolvers } = openSession(ctx);

      let board: Board | undefined;
      if (options.board) {
        const resolution = await resolvers.boards.resolve(options.board);
        if (!resolution.ok) return reportFailure(ctx, resolution.failure);
        board = resolution.entity;
      }

      let column: Column | undefined;
      if (options.column) {
        const resolution = await resolvers.columns.resolve(options.column, { board });
        if (!resolution.ok) return reportFailure(ctx, resolution.failure);
        column = resolution.entity;
      }

      const cards = await client.fetchCards({
        boardId: board?.widgetCommonId,
        columnId: column?.columnId,
        collectionId: options.collection,
      });

      if (ctx.output.json) {
        ctx.output.printJson(cards);
        return;
      }
      ctx.output.table(cards, [
        ['#', (c) => c.sequentialId],
        ['ID', (c) => c.cardId],
        ['Name', (c) => c.name],
        ['Tasks', (c) => (c.tasksTotal > 0 ? `${c.tasksDone}/${c.tasksTotal}` : '')],
        ['Due', (c) => c.dueDate?.slice(0, 10)],
      ], `Cards (${cards.length})`);
    }));

  card
    .command('show')
    .description('Show card details')
    .argument('<card>', 'card ID, #number or name')
    .option(BOARD_FLAG, BOARD_HELP)
    .action(action(ctx, async (raw: string, options: BoardOption) => {
      const { resolvers } = openSession(ctx);
      const resolution = await resolvers.cards.resolve(raw, { board: options.board });
      if (!resolution.ok) return reportFailure(ctx, resolution.failure);

      const found = resolution.entity;
      if (ctx.output.json) {
        ctx.output.printJson(found);
        return;
      }
      await printCard(ctx, resolvers, found);
    }));

  card
    .command('create')
    .description('Create a card')
    .argument('<name>', 'card name')
    .option(BOARD_FLAG, 'board ID or name')
    .option('-c, --column <column>', 'column ID, or name together with --board')
    .option('-d, --description <text>', 'card description')
    .action(action(ctx, async (name: string, options: CreateOptions) => {
      if (!options.board && !options.column) {
        throw new CliError('A card needs a place: pass --board, --column or both.');
      }
      const { client, resolvers } = openSession(ctx);

      let board: Board | undefined;
      if (options.board) {
        const resolution = await resolvers.boards.resolve(options.board);
        if (!resolution.ok) return reportFailure(ctx, resolution.failure);
        board = resolution.entity;
      }

      let column: Column | undefined;
      if (options.column) {
        const resolution = await resolvers.columns.resolve(options.column, { board });
        if (!resolution.ok) return reportFailure(ctx, resolution.failure);
        column = resolution.entity;
      }

      const created = await client.createCard({
        name,
        widgetCommonId: board?.widgetCommonId ?? column?.widgetCommonId,
        columnId: column?.columnId,
        detailedDescription: options.description,
      });

      if (ctx.output.json) {
        ctx.output.printJson(created);
        return;
      }
      ctx.output.success(`Created card ${cardTitle(created)} (${created.cardId})`);
    }));

  card
    .command('update')
    .description('Change the name or description of a card')
    .argument('<card>', 'card ID, #number or name')
    .option(BOARD_FLAG, BOARD_HELP)
    .option('-n, --name <name>', 'new name')
    .option('-d, --description <text>', 'new description')
    .action(action(ctx, async (raw: string, options: UpdateOptions) => {
      if (options.name === undefined && options.description === undefined) {
        throw new CliError('Nothing to update: pass --name, --description or both.');
      }
      const { client, resolvers } = openSession(ctx);
      const resolution = await resolvers.cards.resolve(raw, { board: options.board });
      if (!resolution.ok) return reportFailure(ctx, resolution.failure);

      const updated = await client.updateCard(resolution.entity.cardId, {
        name: options.name,
        detailedDescription: options.description,
      });

      if (ctx.output.json) {
        ctx.output.printJson(updated);
        return;
      }
      ctx.output.success(`Updated card ${cardTitle(updated)}`);
    }));

  card
    .command('move')
    .description('Move a card to another column')
    .argument('<card>', 'card ID, #number or name')
    .option('-c, --column <column>', 'target column ID or name (prompted for when omitted)')
    .option(BOARD_FLAG, 'board of the card and the target column')
    .action(action(ctx, async (raw: string, options: MoveOptions) => {
      const { client, resolvers } = openSession(ctx);

      const cardResolution = await resolvers.cards.resolve(raw, { board: options.board });
      if (!cardResolution.ok) return reportFailure(ctx, cardResolution.failure);
      const found = cardResolution.entity;

      // Column names are looked up on the card's own board unless --board says otherwise
      const scope = options.board ?? found.widgetCommonId ?? undefined;
      const columnRef = options.column ?? (await ctx.prompter.ask('Target column'));
      const columnResolution = await resolvers.columns.resolve(columnRef, { board: scope });
      if (!columnResolution.ok) return reportFailure(ctx, columnResolution.failure);
      const target = columnResolution.entity;

      const updated = await client.updateCard(found.cardId, {
        widgetCommonId: target.widgetCommonId,
        columnId: target.columnId,
      });

      if (ctx.output.json) {
        ctx.output.printJson(updated);
        return;
      }
      ctx.output.success(`Moved card ${cardTitle(found)} to column '${target.name}'`);
    }));

  card
    .command('assign')
    .description('Add or remove assignees')
    .argument('<card>', 'card ID, #number or name')
    .option(BOARD_FLAG, BOARD_HELP)
    .option('-a, --add <user>', 'user ID, email or name to assign (repeatable)', collect, [])
    .option('-r, --remove <user>', 'user ID, email or name to unassign (repeatable)', collect, [])
    .action(action(ctx, async (raw: string, options: ChangeOptions) => {
      if (options.add.length === 0 && options.remove.length === 0) {
        throw new CliError('Nothing to change: pass --add or --remove.');
      }
      const { client, resolvers } = openSession(ctx);
      const cardResolution = await resolvers.cards.resolve(raw, { board: options.board });
      if (!cardResolution.ok) return reportFailure(ctx, cardResolution.failure);

      const added = await resolveAll<User>(options.add, (ref) => resolvers.users.resolve(ref));
      if (!added.ok) return reportFailure(ctx, added.failure);
      const removed = await resolveAll<User>(options.remove, (ref) => resolvers.users.resolve(ref));
      if (!removed.ok) return reportFailure(ctx, removed.failure);

      const updated = await client.updateCard(cardResolution.entity.cardId, {
        addAssignmentIds: added.entities.map((user) => user.userId),
        removeAssignmentIds: removed.entities.map((user) => user.userId),
      });

      if (ctx.output.json) {
        ctx.output.printJson(updated);
        return;
      }
      ctx.output.success(describeChange(cardTitle(updated), 'Assigned', added.entities, 'Unassigned', removed.entities));
    }));

  card
    .command('tag')
    .description('Add or remove tags')
    .argument('<card>', 'card ID, #number or name')
    .option(BOARD_FLAG, BOARD_HELP)
    .option('-a, --add <tag>', 'tag ID or name to add (repeatable)', collect, [])
    .option('-r, --remove <tag>', 'tag ID or name to remove (repeatable)', collect, [])
    .action(action(ctx, async (raw: string, options: ChangeOptions) => {
      if (options.add.length === 0 && options.remove.length === 0) {
        throw new CliError('Nothing to change: pass --add or --remove.');
      }
      const { client, resolvers } = openSession(ctx);
      const cardResolution = await resolvers.cards.resolve(raw, { board: options.board });
      if (!cardResolution.ok) return reportFailure(ctx, cardResolution.failure);

      const added = await resolveAll<Tag>(options.add, (ref) => resolvers.tags.resolve(ref));
      if (!added.ok) return reportFailure(ctx, added.failure);
      const removed = await resolveAll<Tag>(options.remove, (ref) => resolvers.tags.resolve(ref));
      if (!removed.ok) return reportFailure(ctx, removed.failure);

      const updated = await client.updateCard(cardResolution.entity.cardId, {
        addTagIds: added.entities.map((tag) => tag.tagId),
        removeTagIds: removed.entities.map((tag) => tag.tagId),
      });

      if (ctx.output.json) {
        ctx.output.printJson(updated);
        return;
      }
      ctx.output.success(describeChange(cardTitle(updated), 'Tagged', added.entities, 'Untagged', removed.entities));
    }));

  card
    .command('delete')
    .description('Delete a card')
    .argument('<card>', 'card ID, #number or name')
    .option(BOARD_FLAG, BOARD_HELP)
    .option('--everywhere', 'delete the card from every board it appears on')
    .option('-f, --force', 'skip the confirmation prompt')
    .action(action(ctx, async (raw: string, options: DeleteOptions) => {
      const { client, resolvers } = openSession(ctx);
      const resolution = await resolvers.cards.resolve(raw, { board: options.board });
      if (!resolution.ok) return reportFailure(ctx, resolution.failure);

      const target = resolution.entity;
      if (!options.force) {
        const confirmed = await ctx.prompter.confirm(`Delete card ${cardTitle(target)}?`);
        if (!confirmed) {
          ctx.output.warning('Aborted.');
          return ExitCode.FAILURE;
        }
      }

      await client.deleteCard(target.cardId, options.everywhere);
      if (ctx.output.json) {
        ctx.output.printJson({ deleted: target.cardId });
        return;
      }
      ctx.output.success(`Deleted card ${cardTitle(target)}`);
    }));
}

function describeChange(
  title: string,
  addedVerb: string,
  added: readonly { name: string }[],
  removedVerb: string,
  removed: readonly { name: string }[]
): string {
  const parts: string[] = [];
  if (added.length > 0) parts.push(`${addedVerb}: ${added.map((e) => e.name).join(', ')}`);
  if (removed.length > 0) parts.push(`${removedVerb}: ${removed.map((e) => e.name).join(', ')}`);
  return `${title}: ${parts.join('; ')}`;
}

async function printCard(ctx: CommandContext, resolvers: ResolverSet, card: Card): Promise<void> {
  const [users, tags] = await Promise.all([resolvers.users.list(), resolvers.tags.list()]);
  const userNames = new Map(users.map((user) => [user.userId, user.name]));
  const tagNames = new Map(tags.map((tag) => [tag.tagId, tag.name]));

  ctx.output.panel(cardTitle(card), [
    ['ID', card.cardId],
    ['Common ID', card.cardCommonId],
    ['Board', card.widgetCommonId],
    ['Column', card.columnId],
    ['Start', card.startDate?.slice(0, 10)],
    ['Due', card.dueDate?.slice(0, 10)],
    ['Assigned', card.assignments.map((a) => userNames.get(a.userId) ?? a.userId).join(', ')],
    ['Tags', card.tags.map((tagId) => tagNames.get(tagId) ?? tagId).join(', ')],
    ['Tasks', card.tasksTotal > 0 ? `${card.tasksDone}/${card.tasksTotal}` : undefined],
    ['Comments', card.numComments > 0 ? card.numComments : undefined],
  ]);
  if (card.detailedDescription) {
    ctx.output.text('');
    ctx.output.text(card.detailedDescription);
  }
}
