import type { Command } from 'commander';
import {
  action,
  effectiveBoard,
  ExitCode,
  openSession,
  parseNonNegativeInt,
  reportFailure,
  requireBoard,
  type CommandContext,
} from './common.js';

interface BoardOption {
  board?: string;
}

interface CreateOptions extends BoardOption {
  position?: number;
}

interface DeleteOptions extends BoardOption {
  force?: boolean;
}

const BOARD_FLAG = '-b, --board <board>';
const BOARD_HELP = 'board ID or name (defaults to the selected board)';

export function registerColumnCommands(program: Command, ctx: CommandContext): void {
  const column = program.command('column').description('Board columns');

  column
    .command('list')
    .description('List columns of a board')
    .option(BOARD_FLAG, BOARD_HELP)
    .action(action(ctx, async (options: BoardOption) => {
      const { client, resolvers } = openSession(ctx);
      const board = await resolvers.boards.resolve(requireBoard(ctx, options.board));
      if (!board.ok) return reportFailure(ctx, board.failure);

      const columns = (await client.fetchColumns(board.entity.widgetCommonId))
        .sort((a, b) => a.position - b.position);

      if (ctx.output.json) {
        ctx.output.printJson(columns);
        return;
      }
      ctx.output.table(columns, [
        ['Position', (c) => c.position],
        ['ID', (c) => c.columnId],
        ['Name', (c) => c.name],
        ['Cards', (c) => c.cardCount],
      ], `Columns on ${board.entity.name}`);
    }));

  column
    .command('create')
    .description('Add a column to a board')
    .argument('<name>', 'column name')
    .option(BOARD_FLAG, BOARD_HELP)
    .option('-p, --position <n>', 'zero-based position (defaults to the end)', parseNonNegativeInt)
    .action(action(ctx, async (name: string, options: CreateOptions) => {
      const { client, resolvers } = openSession(ctx);
      const board = await resolvers.boards.resolve(requireBoard(ctx, options.board));
      if (!board.ok) return reportFailure(ctx, board.failure);

      const created = await client.createColumn({
        widgetCommonId: board.entity.widgetCommonId,
        name,
        position: options.position,
      });

      if (ctx.output.json) {
        ctx.output.printJson(created);
        return;
      }
      ctx.output.success(`Created column: ${created.name} (${created.columnId}) at position ${created.position}`);
    }));

  column
    .command('rename')
    .description('Rename a column')
    .argument('<column>', 'column ID or name')
    .argument('<name>', 'new name')
    .option(BOARD_FLAG, BOARD_HELP)
    .action(action(ctx, async (raw: string, name: string, options: BoardOption) => {
      const { client, resolvers } = openSession(ctx);
      const found = await resolvers.columns.resolve(raw, { board: effectiveBoard(ctx, options.board) });
      if (!found.ok) return reportFailure(ctx, found.failure);

      const updated = await client.updateColumn(found.entity.columnId, { name });
      if (ctx.output.json) {
        ctx.output.printJson(updated);
        return;
      }
      ctx.output.success(`Renamed column '${found.entity.name}' to '${updated.name}'`);
    }));

  column
    .command('move')
    .description('Move a column to another position')
    .argument('<column>', 'column ID or name')
    .argument('<position>', 'zero-based position', parseNonNegativeInt)
    .option(BOARD_FLAG, BOARD_HELP)
    .action(action(ctx, async (raw: string, position: number, options: BoardOption) => {
      const { client, resolvers } = openSession(ctx);
      const found = await resolvers.columns.resolve(raw, { board: effectiveBoard(ctx, options.board) });
      if (!found.ok) return reportFailure(ctx, found.failure);

      const updated = await client.updateColumn(found.entity.columnId, { position });
      if (ctx.output.json) {
        ctx.output.printJson(updated);
        return;
      }
      ctx.output.success(`Moved column '${updated.name}' to position ${updated.position}`);
    }));

  column
    .command('delete')
    .description('Delete a column and every card in it')
    .argument('<column>', 'column ID or name')
    .option(BOARD_FLAG, BOARD_HELP)
    .option('-f, --force', 'skip the confirmation prompt')
    .action(action(ctx, async (raw: string, options: DeleteOptions) => {
      const { client, resolvers } = openSession(ctx);
      const found = await resolvers.columns.resolve(raw, { board: effectiveBoard(ctx, options.board) });
      if (!found.ok) return reportFailure(ctx, found.failure);

      const target = found.entity;
      if (!options.force) {
        const confirmed = await ctx.prompter.confirm(
          `Delete column '${target.name}' and all of its ${target.cardCount} card(s)?`
        );
        if (!confirmed) {
          ctx.output.warning('Aborted.');
          return ExitCode.FAILURE;
        }
      }

      await client.deleteColumn(target.columnId);
      if (ctx.output.json) {
        ctx.output.printJson({ deleted: target.columnId });
        return;
      }
      ctx.output.success(`Deleted column: ${target.name}`);
    }));
}
