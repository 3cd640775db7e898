import type { CliOptions } from '../env';
import { resolveProviderSettings, type EnvRecord, type ProviderSettings } from '../providers';
import { resolveServerTarget } from '../serverTarget';
import { openAiLlmFactory } from '../openai';
import { ConsoleLogger, parseLogLevel } from '../adapters/sys/ConsoleLogger';
import { McpSdkToolServer } from '../adapters/mcp/McpSdkToolServer';
import { McpToolRegistry } from '../adapters/tools/McpToolRegistry';
import { ReadlineTerminal } from '../adapters/io/ReadlineTerminal';
import { ToolOrchestrator } from '../app/ToolOrchestrator';
import { QueryHistory } from '../app/QueryHistory';
import { ChatSession } from '../app/ChatSession';
import { SYSTEM_PROMPT } from '../app/prompts';
import type { LlmPort } from '../app/LlmPort';
import type { ToolServerPort } from '../ports/mcp/ToolServerPort';
import type { TerminalPort } from '../ports/io/TerminalPort';
import type { LoggerPort } from '../ports/sys/LoggerPort';
import { UsageError, ServerConnectionError } from '../shared/errors';

export interface ApplicationInstance {
  readonly history: QueryHistory;
  start(): Promise<void>;
  listTools(): string;
  ask(query: string): Promise<string>;
  runInteractive(): Promise<void>;
  shutdown(): Promise<void>;
}

/** Seams for replacing the outside world; everything defaults to the real thing. */
export interface ApplicationOverrides {
  logger?: LoggerPort;
  llm?: (settings: ProviderSettings, logger: LoggerPort) => LlmPort;
  server?: ToolServerPort;
  terminal?: () => TerminalPort;
}

export function buildApplication(
  cli: CliOptions,
  env: EnvRecord,
  overrides: ApplicationOverrides = {}
): ApplicationInstance {
  if (!cli.server) {
    throw new UsageError('Missing MCP server script path or URL.');
  }

  const logger =
    overrides.logger ??
    new ConsoleLogger({ level: cli.debug ? 'debug' : parseLogLevel(env.LOG_LEVEL) });

  const target = resolveServerTarget(cli.server, cli.transport);
  const settings = resolveProviderSettings(env, cli.model);

  const llm = (overrides.llm ?? openAiLlmFactory(env))(settings, logger);
  logger.info(`Using ${settings.provider}, model ${llm.model}`);

  const server = overrides.server ?? new McpSdkToolServer(target, logger);
  const registry = new McpToolRegistry(server, logger);
  const orchestrator = new ToolOrchestrator(llm, registry, logger, {
    systemPrompt: SYSTEM_PROMPT,
  });
  const history = new QueryHistory();

  let terminal: TerminalPort | null = null;
  const openTerminal = (): TerminalPort => {
    if (!terminal) {
      terminal = overrides.terminal ? overrides.terminal() : new ReadlineTerminal();
    }
    return terminal;
  };

  // One-shot output goes through console; the terminal is only opened for
  // interactive mode so stdin is never held open otherwise.
  const printer: TerminalPort = {
    prompt: async () => null,
    write: (text) => {
      if (terminal) terminal.write(text);
      else console.log(text);
    },
    close: () => undefined,
  };
  const oneShot = new ChatSession(printer, orchestrator, registry, history, logger);

  let shutdownPromise: Promise<void> | null = null;

  return {
    history,
    start: async () => {
      try {
        await registry.connect();
      } catch (err) {
        throw new ServerConnectionError(server.label, err);
      }
    },
    listTools: () => oneShot.renderTools(),
    ask: (query) => oneShot.ask(query),
    runInteractive: async () => {
      const session = new ChatSession(openTerminal(), orchestrator, registry, history, logger);
      await session.run();
    },
    shutdown: () => {
      shutdownPromise ??= (async () => {
        terminal?.close();
        await registry.close();
      })();
      return shutdownPromise;
    },
  };
}
