import { InvalidArgumentError } from 'commander';
import prompts from 'prompts';
import { FavroClient, FavroError, type FavroApi } from '../favro-client.js';
import { logger } from '../logging/index.js';
import { Output } from '../output.js';
import { createResolvers, type ResolutionFailure, type ResolverSet } from '../resolvers/index.js';
import { SettingsStore, type Credentials } from '../settings-store.js';

export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
}

/** A usage problem the user can fix: not logged in, missing flag, ... */
export class CliError extends Error {
  constructor(message: string, public hint?: string) {
    super(message);
    this.name = 'CliError';
  }
}

export interface Prompter {
  ask(message: string, options?: { secret?: boolean }): Promise<string>;
  confirm(message: string): Promise<boolean>;
}

export const terminalPrompter: Prompter = {
  async ask(message, options = {}) {
    const answer = await prompts({ type: options.secret ? 'password' : 'text', name: 'value', message });
    if (typeof answer.value !== 'string' || answer.value.trim() === '') {
      throw new CliError('Aborted');
    }
    return answer.value.trim();
  },

  async confirm(message) {
    const answer = await prompts({ type: 'confirm', name: 'value', message, initial: false });
    return answer.value === true;
  },
};

export type ClientFactory = (credentials: Credentials, organizationId?: string) => FavroApi;

export const defaultClientFactory: ClientFactory = (credentials, organizationId) =>
  new FavroClient(credentials, { organizationId });

export interface CommandContext {
  output: Output;
  settings: SettingsStore;
  prompter: Prompter;
  createClient: ClientFactory;
  exitCode: ExitCode;
}

export function createContext(overrides: Partial<Omit<CommandContext, 'exitCode'>> = {}): CommandContext {
  return {
    output: overrides.output ?? new Output(),
    settings: overrides.settings ?? new SettingsStore(),
    prompter: overrides.prompter ?? terminalPrompter,
    createClient: overrides.createClient ?? defaultClientFactory,
    exitCode: ExitCode.SUCCESS,
  };
}

// ============================================
// SESSION
// ============================================

export function requireCredentials(ctx: CommandContext): Credentials {
  const credentials = ctx.settings.getCredentials();
  if (!credentials) {
    throw new CliError('Not logged in.', "Run 'favro login' first.");
  }
  return credentials;
}

export function requireOrganizationId(ctx: CommandContext): string {
  const organizationId = ctx.settings.getOrganizationId();
  if (!organizationId) {
    throw new CliError('No organization selected.', "Run 'favro org select <organization>' first.");
  }
  return organizationId;
}

/** An API client scoped to the selected organization. */
export function connect(ctx: CommandContext): FavroApi {
  const credentials = requireCredentials(ctx);
  return ctx.createClient(credentials, requireOrganizationId(ctx));
}

export interface Session {
  client: FavroApi;
  resolvers: ResolverSet;
}

/** Client plus a fresh resolver set; both live for one command. */
export function openSession(ctx: CommandContext): Session {
  const client = connect(ctx);
  return { client, resolvers: createResolvers(client) };
}

/** The board named on the command line, else the stored default. */
export function effectiveBoard(ctx: CommandContext, board: string | undefined): string | undefined {
  return board ?? ctx.settings.getBoardId();
}

export function requireBoard(ctx: CommandContext, board: string | undefined): string {
  const boardRef = effectiveBoard(ctx, board);
  if (!boardRef) {
    throw new CliError('Board is required.', "Use --board or set a default with 'favro board select <board>'.");
  }
  return boardRef;
}

// ============================================
// ACTIONS
// ============================================

export function reportFailure(ctx: CommandContext, failure: ResolutionFailure): ExitCode {
  ctx.output.resolutionFailure(failure);
  return ExitCode.FAILURE;
}

/**
 * Wraps a command handler: API and usage errors are printed and turned into
 * an exit code; anything else propagates.
 */
export function action<A extends unknown[]>(
  ctx: CommandContext,
  handler: (...args: A) => Promise<ExitCode | void>
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      const code = await handler(...args);
      ctx.exitCode = typeof code === 'number' ? code : ExitCode.SUCCESS;
    } catch (error) {
      if (error instanceof FavroError) {
        logger.error('API request failed', { type: error.type, status: error.status }, 'cli');
        ctx.output.apiError(error);
        ctx.exitCode = ExitCode.FAILURE;
      } else if (error instanceof CliError) {
        ctx.output.error(error.message, error.hint);
        ctx.exitCode = ExitCode.FAILURE;
      } else {
        throw error;
      }
    }
  };
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

export function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}
