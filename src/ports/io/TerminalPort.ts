export interface TerminalPort {
  /** Resolves with the next line, or null once input is closed or interrupted. */
  prompt(question: string): Promise<string | null>;
  write(text: string): void;
  close(): void;
}
