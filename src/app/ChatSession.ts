import type { TerminalPort } from "../ports/io/TerminalPort";
import type { ToolRegistryPort } from "../ports/tools/ToolRegistryPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { QueryOutcome } from "./ToolOrchestrator";
import type { QueryHistory } from "./QueryHistory";
import { BANNER, helpText } from "./prompts";
import { describeError } from "../shared/errors";

export type ChatCommand = "help" | "history" | "tools" | "quit";

export const HISTORY_DISPLAY_COUNT = 5;
export const PROMPT = "\n> ";

export interface QueryRunner {
  run(query: string): Promise<QueryOutcome>;
}

export function parseCommand(line: string): ChatCommand | null {
  switch (line.trim().toLowerCase()) {
    case "help":
      return "help";
    case "history":
      return "history";
    case "tools":
      return "tools";
    case "quit":
    case "exit":
      return "quit";
    default:
      return null;
  }
}

export function formatAnswer(answer: string): string {
  return `\n=== result ===\n${answer || "(no answer)"}\n============`;
}

/**
 * The interactive read-eval-print loop. Turns are strictly sequential: the
 * next line is not read until the current query has been answered.
 */
export class ChatSession {
  constructor(
    private readonly terminal: TerminalPort,
    private readonly runner: QueryRunner,
    private readonly tools: ToolRegistryPort,
    private readonly history: QueryHistory,
    private readonly logger: LoggerPort
  ) {}

  async run(): Promise<void> {
    this.terminal.write(BANNER);
    for (;;) {
      const line = await this.terminal.prompt(PROMPT);
      if (line === null) {
        this.terminal.write("\nInput closed, exiting.");
        return;
      }
      const keepGoing = await this.handleLine(line);
      if (!keepGoing) return;
    }
  }

  /** Returns false when the session should end. */
  async handleLine(raw: string): Promise<boolean> {
    const line = raw.trim();
    if (!line) return true;

    switch (parseCommand(line)) {
      case "quit":
        this.terminal.write("bye.");
        return false;
      case "help":
        this.terminal.write(helpText());
        return true;
      case "history":
        this.terminal.write(this.renderHistory());
        return true;
      case "tools":
        this.terminal.write(this.renderTools());
        return true;
      case null:
        break;
    }

    this.terminal.write("\n[processing] ...");
    try {
      const answer = await this.ask(line);
      this.terminal.write(formatAnswer(answer));
    } catch (err) {
      this.terminal.write(`\nError: ${describeError(err)}`);
      this.logger.error("Query failed", { query: line, error: describeError(err) });
    }
    return true;
  }

  async ask(query: string): Promise<string> {
    const outcome = await this.runner.run(query);
    this.history.record(query, outcome.chunks);
    return outcome.answer;
  }

  renderTools(): string {
    const tools = this.tools.list();
    if (!tools.length) return "No tools available.";
    return tools
      .map((tool) => (tool.description ? `- ${tool.name}: ${tool.description}` : `- ${tool.name}`))
      .join("\n");
  }

  private renderHistory(): string {
    const entries = this.history.recent(HISTORY_DISPLAY_COUNT);
    if (!entries.length) return "No queries yet.";
    return JSON.stringify(entries, null, 2);
  }
}
