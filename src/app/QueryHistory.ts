export interface HistoryEntry {
  query: string;
  response: string[];
}

export const DEFAULT_HISTORY_LIMIT = 100;

/** Queries in submission order; the oldest entry is dropped past the limit. */
export class QueryHistory {
  private readonly entries: HistoryEntry[] = [];

  constructor(private readonly limit = DEFAULT_HISTORY_LIMIT) {}

  record(query: string, response: string[]): void {
    this.entries.push({ query, response: [...response] });
    while (this.entries.length > this.limit) {
      this.entries.shift();
    }
  }

  recent(count: number): HistoryEntry[] {
    if (count <= 0) return [];
    return this.entries.slice(-count).map((entry) => ({ ...entry, response: [...entry.response] }));
  }
}
