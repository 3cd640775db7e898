import { createWriteStream, mkdirSync, openSync } from "fs";
import path from "path";
import { ConfigurationError, describeError } from "../shared/errors";

export interface LoggingHandle {
  readonly logPath?: string;
  /** Restores the console and resolves once the log file is flushed. */
  shutdown(): Promise<void>;
}

type ConsoleMethod = "log" | "info" | "warn" | "error" | "debug";

const MIRRORED: ConsoleMethod[] = ["log", "info", "warn", "error", "debug"];

function stringify(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

/**
 * Mirrors every console call into `logFile` (appending) while still writing to
 * the terminal. Without a log file this is a no-op. Throws a
 * `ConfigurationError` when the file cannot be opened.
 */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: async () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  let fd: number;
  try {
    mkdirSync(path.dirname(resolvedLog), { recursive: true });
    fd = openSync(resolvedLog, "a");
  } catch (err) {
    throw new ConfigurationError(`Cannot write log file ${resolvedLog}: ${describeError(err)}`);
  }

  const stream = createWriteStream(resolvedLog, { fd, flags: "a" });
  stream.write(`[${new Date().toISOString()}] --- chat session started ---\n`);

  const original: Record<ConsoleMethod, (...args: unknown[]) => void> = {
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
    debug: console.debug,
  };

  let failed = false;
  const restoreConsole = () => {
    for (const level of MIRRORED) {
      console[level] = original[level];
    }
  };

  // A later write failure stops mirroring; the session itself carries on.
  stream.on("error", (err) => {
    if (failed) return;
    failed = true;
    restoreConsole();
    console.error(`Cannot write log file ${resolvedLog}: ${err.message}`);
  });

  const mirror =
    (level: ConsoleMethod) =>
    (...args: unknown[]) => {
      original[level].apply(console, args);
      if (failed) return;
      const timestamp = new Date().toISOString();
      stream.write(`[${timestamp}] ${level.toUpperCase()} ${args.map(stringify).join(" ")}\n`);
    };

  for (const level of MIRRORED) {
    console[level] = mirror(level);
  }

  let finished: Promise<void> | null = null;
  const shutdown = () => {
    if (finished) return finished;
    restoreConsole();
    finished = new Promise<void>((resolve) => {
      if (failed) {
        resolve();
        return;
      }
      stream.once("error", () => resolve());
      stream.end(`[${new Date().toISOString()}] --- chat session ended ---\n`, () => resolve());
    });
    return finished;
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
