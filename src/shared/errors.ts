/**
 * Errors raised while starting the client. Each carries the process exit code
 * the entry point should use after printing the message.
 */
export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "CliError";
    this.exitCode = exitCode;
  }
}

export class UsageError extends CliError {
  constructor(message: string) {
    super(message, 1);
    this.name = "UsageError";
  }
}

export class ConfigurationError extends CliError {
  constructor(message: string) {
    super(message, 1);
    this.name = "ConfigurationError";
  }
}

export class ServerConnectionError extends CliError {
  readonly target: string;

  constructor(target: string, cause: unknown) {
    super(`Failed to connect to MCP server ${target}: ${describeError(cause)}`, 1);
    this.name = "ServerConnectionError";
    this.target = target;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
