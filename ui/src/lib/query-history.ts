import { QUERY_MODES, type QueryHistoryEntry, type QueryMode } from './types';

export const QUERY_HISTORY_KEY = 'queryHistory';
export const QUERY_HISTORY_CAPACITY = 10;

/**
 * The part of the Web Storage API the history needs.
 */
export interface StorageLike {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

function isQueryMode(value: unknown): value is QueryMode {
  return QUERY_MODES.some((mode) => mode === value);
}

function isHistoryEntry(value: unknown): value is QueryHistoryEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'query' in value &&
    typeof value.query === 'string' &&
    'mode' in value &&
    isQueryMode(value.mode) &&
    'result' in value &&
    typeof value.result === 'string' &&
    'timestamp' in value &&
    typeof value.timestamp === 'string'
  );
}

/**
 * Newest-first list of answered queries, capped and mirrored to storage.
 */
export class QueryHistory {
  private items: QueryHistoryEntry[];

  constructor(
    private readonly storage?: StorageLike,
    private readonly capacity = QUERY_HISTORY_CAPACITY
  ) {
    this.items = this.load();
  }

  entries(): QueryHistoryEntry[] {
    return [...this.items];
  }

  add(entry: QueryHistoryEntry): QueryHistoryEntry[] {
    this.items = [{ ...entry }, ...this.items].slice(0, this.capacity);
    this.save();
    return this.entries();
  }

  clear() {
    this.items = [];
    this.storage?.removeItem(QUERY_HISTORY_KEY);
  }

  private load(): QueryHistoryEntry[] {
    const saved = this.storage?.getItem(QUERY_HISTORY_KEY);
    if (!saved) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(saved);
    } catch (error) {
      console.warn('[query-history] ignoring unreadable saved history:', error);
      return [];
    }

    return Array.isArray(parsed) ? parsed.filter(isHistoryEntry).slice(0, this.capacity) : [];
  }

  private save() {
    this.storage?.setItem(QUERY_HISTORY_KEY, JSON.stringify(this.items));
  }
}
