import { Command, type CommanderError } from 'commander';
import { COMMAND_NAMES, type CommandName } from './commands';

export type CliCommand = CommandName | 'watch';

export interface CliArgs {
  command: CliCommand;
  outputDir?: string;
}

interface CliOptions {
  out?: string;
}

export const EXIT = { OK: 0, FATAL: 1, USAGE: 2 } as const;

const CLI_COMMANDS: readonly CliCommand[] = [...COMMAND_NAMES, 'watch'];

const DESCRIPTIONS: Record<CliCommand, string> = {
  orders: 'Fetch open orders and mids, write the quoting strategy tables',
  positions: 'Fetch perpetual positions, write positions.csv',
  balances: 'Fetch spot balances, write balances.csv',
  all: 'Fetch the full snapshot and write every table',
  watch: 'Re-run `all` every POLL_INTERVAL_MS until interrupted',
};

export const USAGE = `Usage: quote-ladder <${CLI_COMMANDS.join('|')}> [--out <dir>]`;

/**
 * A command line that cannot be run. `exitCode` is 0 when commander only printed help.
 */
export class UsageError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = EXIT.USAGE
  ) {
    super(message);
    this.name = 'UsageError';
  }
}

function toUsageError(err: CommanderError): never {
  if (err.exitCode === EXIT.OK) throw new UsageError(err.message, EXIT.OK);
  if (err.code === 'commander.help') throw new UsageError('No command given');
  throw new UsageError(err.message.replace(/^error: /, ''));
}

function buildProgram(onCommand: (command: CliCommand, options: CliOptions) => void): Command {
  // Output and exit handling on the root are inherited by every subcommand added below.
  const program = new Command()
    .name('quote-ladder')
    .description('Snapshot one Hyperliquid account and write quoting-ladder statistics as CSV tables')
    .usage(`<${CLI_COMMANDS.join('|')}> [--out <dir>]`)
    .configureOutput({ writeErr: () => undefined })
    .exitOverride(toUsageError);

  for (const name of CLI_COMMANDS) {
    program
      .command(name)
      .description(DESCRIPTIONS[name])
      .option('-o, --out <dir>', 'output directory (defaults to OUTPUT_DIR)')
      .allowExcessArguments(false)
      .action((options: CliOptions) => onCommand(name, options));
  }
  return program;
}

export function parseCli(argv: string[]): CliArgs {
  const result: { args?: CliArgs } = {};
  buildProgram((command, options) => {
    result.args = { command, outputDir: options.out };
  }).parse(argv, { from: 'user' });

  const { args } = result;
  if (args === undefined) throw new UsageError('No command given');
  if (args.outputDir !== undefined && args.outputDir.trim() === '') throw new UsageError('--out needs a directory');
  return args;
}
