import { validateEnv, type AnalyzerEnv } from '../config/env';
import { PollLoop } from '../loops/pollLoop';
import { InfoClient, type InfoTransport } from '../services/infoClient';
import { describeError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { EXIT, USAGE, UsageError, parseCli, type CliArgs } from './cli';
import { COMMANDS, runAll, type CommandContext } from './commands';

export interface RunDeps {
  /** Replaces the axios instance of the info client. */
  transport?: InfoTransport;
}

function buildContext(args: CliArgs, env: AnalyzerEnv, deps: RunDeps): CommandContext {
  const valid = validateEnv(env);
  return {
    client: new InfoClient({
      url: valid.INFO_URL,
      timeoutMs: valid.REQUEST_TIMEOUT_MS,
      maxRetries: valid.MAX_RETRIES,
      transport: deps.transport,
    }),
    user: valid.WALLET_ADDRESS,
    outputDir: args.outputDir ?? valid.OUTPUT_DIR,
    tierOptions: { ratioThreshold: valid.TIER_RATIO_THRESHOLD },
  };
}

// Resolves once SIGINT or SIGTERM arrives and the in-flight cycle has finished.
async function watch(ctx: CommandContext, intervalMs: number): Promise<number> {
  const loop = new PollLoop(() => runAll(ctx), intervalMs);

  await new Promise<void>(resolve => {
    const stop = () => {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
      resolve();
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
    loop.start();
  });

  Logger.info('Shutting down...');
  await loop.stop();
  return EXIT.OK;
}

/**
 * Runs one command line to completion and returns the process exit code.
 */
export async function run(argv: string[], env: AnalyzerEnv, deps: RunDeps = {}): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCli(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    if (err.exitCode === EXIT.OK) return EXIT.OK;
    Logger.error(err.message);
    console.error(USAGE);
    return err.exitCode;
  }

  try {
    // 1. Validate Config
    const ctx = buildContext(args, env, deps);
    Logger.info(`[CLI] ${args.command} -> ${ctx.outputDir}`);

    // 2. Run once, or keep re-running the full snapshot
    if (args.command === 'watch') return await watch(ctx, env.POLL_INTERVAL_MS);

    await COMMANDS[args.command](ctx);
    Logger.info(`Done! Data saved to ${ctx.outputDir}/`);
    return EXIT.OK;
  } catch (err) {
    Logger.error('Fatal Error', describeError(err));
    return EXIT.FATAL;
  }
}
