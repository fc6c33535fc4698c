import type { Command } from 'commander';
import type { Board, Column } from '../schemas.js';
import { layoutBoard } from '../output.js';
import {
  action,
  CliError,
  connect,
  effectiveBoard,
  openSession,
  parsePositiveInt,
  reportFailure,
  type CommandContext,
} from './common.js';

interface ListOptions {
  collection?: string;
  archived?: boolean;
}

interface ViewOptions {
  maxCards: number;
  all?: boolean;
}

const DEFAULT_MAX_CARDS = 7;

function byPosition(a: Column, b: Column): number {
  return a.position - b.position;
}

function boardArgument(ctx: CommandContext, board: string | undefined): string {
  const boardRef = effectiveBoard(ctx, board);
  if (!boardRef) {
    throw new CliError('No board given and no default board set.', "Run 'favro board select <board>' first.");
  }
  return boardRef;
}

export function registerBoardCommands(program: Command, ctx: CommandContext): void {
  const board = program.command('board').description('Boards and backlogs');

  board
    .command('list')
    .description('List boards in the selected organization')
    .option('-c, --collection <collectionId>', 'only boards in this collection')
    .option('-a, --archived', 'include archived boards')
    .action(action(ctx, async (options: ListOptions) => {
      const boards = (await connect(ctx).fetchBoards({
        collectionId: options.collection,
        includeArchived: options.archived,
      })).filter((b) => b.type === 'board');

      if (ctx.output.json) {
        ctx.output.printJson(boards);
        return;
      }
      const current = ctx.settings.getBoardId();
      ctx.output.table(boards, [
        ['', (b) => (b.widgetCommonId === current ? '*' : '')],
        ['ID', (b) => b.widgetCommonId],
        ['Name', (b) => b.name],
        ['Color', (b) => b.color],
        ['Archived', (b) => (b.archived ? 'yes' : '')],
      ], `Boards (${boards.length})`);
    }));

  board
    .command('show')
    .description('Show a board and its columns')
    .argument('[board]', 'board ID or name (defaults to the selected board)')
    .action(action(ctx, async (raw: string | undefined) => {
      const { client, resolvers } = openSession(ctx);
      const resolution = await resolvers.boards.resolve(boardArgument(ctx, raw));
      if (!resolution.ok) return reportFailure(ctx, resolution.failure);

      const found = resolution.entity;
      const columns = (await client.fetchColumns(found.widgetCommonId)).sort(byPosition);

      if (ctx.output.json) {
        ctx.output.printJson({ ...found, columns });
        return;
      }
      ctx.output.panel(found.name, [
        ['ID', found.widgetCommonId],
        ['Type', found.type],
        ['Color', found.color],
        ['Archived', found.archived ? 'yes' : undefined],
      ]);
      ctx.output.table(columns, [
        ['Position', (c) => c.position],
        ['ID', (c) => c.columnId],
        ['Name', (c) => c.name],
        ['Cards', (c) => c.cardCount],
      ], 'Columns');
    }));

  board
    .command('view')
    .description('Show a board as a kanban grid')
    .argument('[board]', 'board ID or name (defaults to the selected board)')
    .option('-m, --max-cards <n>', 'cards shown per column', parsePositiveInt, DEFAULT_MAX_CARDS)
    .option('--all', 'show every card')
    .action(action(ctx, async (raw: string | undefined, options: ViewOptions) => {
      const { client, resolvers } = openSession(ctx);
      const resolution = await resolvers.boards.resolve(boardArgument(ctx, raw));
      if (!resolution.ok) return reportFailure(ctx, resolution.failure);

      const found = resolution.entity;
      const [columns, cards, tags] = await Promise.all([
        client.fetchColumns(found.widgetCommonId),
        client.fetchCards({ boardId: found.widgetCommonId }),
        client.fetchTags(),
      ]);

      if (ctx.output.json) {
        ctx.output.printJson({ board: found, columns: [...columns].sort(byPosition), cards });
        return;
      }
      const maxCards = options.all ? Number.POSITIVE_INFINITY : options.maxCards;
      const tagsById = new Map(tags.map((tag) => [tag.tagId, tag]));
      ctx.output.board(`Board: ${found.name}`, layoutBoard(columns, cards, maxCards, tagsById));
    }));

  board
    .command('select')
    .description('Make a board the default for later commands')
    .argument('<board>', 'board ID or name')
    .action(action(ctx, async (raw: string) => {
      const { resolvers } = openSession(ctx);
      const resolution = await resolvers.boards.resolve(raw);
      if (!resolution.ok) return reportFailure(ctx, resolution.failure);

      const selected = resolution.entity;
      ctx.settings.setBoardId(selected.widgetCommonId);
      printBoardSummary(ctx, selected, 'Selected board');
    }));

  board
    .command('current')
    .description('Show the selected board')
    .action(action(ctx, async () => {
      const boardId = ctx.settings.getBoardId();
      if (!boardId) {
        throw new CliError('No default board set.', "Run 'favro board select <board>' first.");
      }
      const { resolvers } = openSession(ctx);
      const resolution = await resolvers.boards.resolve(boardId);
      if (!resolution.ok) {
        throw new CliError(
          `Selected board ${boardId} is no longer available.`,
          "Run 'favro board select <board>' again."
        );
      }
      printBoardSummary(ctx, resolution.entity, 'Current board');
    }));
}

function printBoardSummary(ctx: CommandContext, board: Board, label: string): void {
  if (ctx.output.json) {
    ctx.output.printJson(board);
    return;
  }
  ctx.output.success(`${label}: ${board.name} (${board.widgetCommonId})`);
}
