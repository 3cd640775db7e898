import readline from "readline";
import type { TerminalPort } from "../../ports/io/TerminalPort";

export interface ReadlineTerminalOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Without an injected output stream, text goes through `console.log` so the
 * `--log-file` mirror records the chat transcript.
 */
export class ReadlineTerminal implements TerminalPort {
  private readonly rl: readline.Interface;
  private readonly output?: NodeJS.WritableStream;
  private closed = false;

  constructor(options: ReadlineTerminalOptions = {}) {
    this.output = options.output;
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
    });
    this.rl.on("close", () => {
      this.closed = true;
    });
    this.rl.on("SIGINT", () => {
      this.write("\nInterrupted.");
      this.rl.close();
    });
  }

  prompt(question: string): Promise<string | null> {
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      const onClose = () => resolve(null);
      this.rl.once("close", onClose);
      this.rl.question(question, (answer) => {
        this.rl.off("close", onClose);
        resolve(answer);
      });
    });
  }

  write(text: string): void {
    if (this.output) this.output.write(`${text}\n`);
    else console.log(text);
  }

  close(): void {
    if (this.closed) return;
    this.rl.close();
  }
}
