import { Command, CommanderError } from 'commander';
import { CLI_NAME, CLI_VERSION, registerSecret } from './config.js';
import { logger, LogLevel } from './logging/index.js';
import { Output, type TextSink } from './output.js';
import { registerAuthCommands } from './commands/auth.js';
import { registerBoardCommands } from './commands/board.js';
import { registerCardCommands } from './commands/card.js';
import { registerColumnCommands } from './commands/column.js';
import { registerOrgCommands } from './commands/org.js';
import { createContext, ExitCode, type CommandContext } from './commands/common.js';

interface GlobalOptions {
  json?: boolean;
  verbose?: boolean;
}

export interface RunOptions extends Partial<Omit<CommandContext, 'output' | 'exitCode'>> {
  stdout?: TextSink;
  stderr?: TextSink;
  color?: boolean;
}

export function buildProgram(ctx: CommandContext, io: { stdout: TextSink; stderr: TextSink }): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Work with Favro organizations, boards, columns and cards from the terminal')
    .version(CLI_VERSION, '-v, --version')
    .option('-j, --json', 'print machine-readable JSON')
    .option('--verbose', 'log API traffic to stderr')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    })
    .hook('preAction', (_program, actionCommand) => {
      const options: GlobalOptions = actionCommand.optsWithGlobals();
      ctx.output.json = options.json === true;
      if (options.verbose) {
        logger.updateConfig({ enabled: true, stderrEnabled: true, level: LogLevel.DEBUG, requestsEnabled: true });
      }
      // Tokens never reach the logs, whichever command runs
      registerSecret(ctx.settings.getCredentials()?.token);
    });

  registerAuthCommands(program, ctx);
  registerOrgCommands(program, ctx);
  registerBoardCommands(program, ctx);
  registerColumnCommands(program, ctx);
  registerCardCommands(program, ctx);

  return program;
}

/** Parses `argv` (node-style, with the executable and script first) and runs one command. */
export async function run(argv: readonly string[], options: RunOptions = {}): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const ctx = createContext({
    ...options,
    output: new Output({ stdout, stderr, color: options.color }),
  });
  const program = buildProgram(ctx, { stdout, stderr });

  try {
    await program.parseAsync([...argv]);
    return ctx.exitCode;
  } catch (error) {
    // Help, version and usage errors; commander has already printed them
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    logger.critical('Unhandled error', { error: String(error) }, 'cli');
    ctx.output.error(error instanceof Error ? error.message : String(error));
    return ExitCode.FAILURE;
  }
}
