import { parseCliArgs, USAGE, type CliOptions } from './env';
import {
  buildApplication,
  type ApplicationInstance,
  type ApplicationOverrides,
} from './composition/container';
import { formatAnswer } from './app/ChatSession';
import { initializeLogging, type LoggingHandle } from './runtime/logging';
import type { EnvRecord } from './providers';
import { CliError, describeError } from './shared/errors';

async function runApplication(app: ApplicationInstance, cli: CliOptions): Promise<void> {
  await app.start();
  if (cli.listTools) {
    console.log(app.listTools());
    return;
  }
  if (cli.query !== undefined) {
    console.log(formatAnswer(await app.ask(cli.query)));
    return;
  }
  await app.runInteractive();
}

/** Runs the client and resolves with the process exit code. */
export async function main(
  argv: string[],
  env: EnvRecord,
  overrides: ApplicationOverrides = {}
): Promise<number> {
  let cli: CliOptions;
  try {
    cli = parseCliArgs(argv);
  } catch (err) {
    console.error(`❌ ${describeError(err)}\n\n${USAGE}`);
    return 1;
  }

  if (cli.showUsage) {
    console.log(USAGE);
    return 0;
  }
  if (!cli.server) {
    console.error(`❌ Missing MCP server script path or URL.\n\n${USAGE}`);
    return 1;
  }

  let loggingHandle: LoggingHandle | null = null;
  let app: ApplicationInstance | null = null;
  try {
    loggingHandle = initializeLogging(cli.logFile);
    if (loggingHandle.logPath) {
      console.log(`Logging output to ${loggingHandle.logPath}`);
    }
    app = buildApplication(cli, env, overrides);
    await runApplication(app, cli);
    return 0;
  } catch (err) {
    console.error(`❌ ${describeError(err)}`);
    return err instanceof CliError ? err.exitCode : 1;
  } finally {
    try {
      await app?.shutdown();
    } catch (err) {
      console.warn('Shutdown failed:', err);
    }
    await loggingHandle?.shutdown();
  }
}
