export interface DuplicateQuery {
  query: string;
  count: number;
}

export interface QueryPoolStats {
  total: number;
  unique: number;
  /** Number of distinct queries that occur more than once. */
  duplicateCount: number;
  /** Up to `sampleLimit` duplicates, most frequent first. */
  duplicates: DuplicateQuery[];
}

export type RandomSource = () => number;

const SURROUNDING_QUOTES = /^[",]+|[",]+$/g;
const TRAILING_SEARCH_NOISE = /[,"\s]+$/u;

export function normalizeQueryLine(line: string): string {
  return line.trim().replace(SURROUNDING_QUOTES, '').trim();
}

/** Strips trailing commas, quotes and spaces right before a query is typed. */
export function cleanQueryForSearch(query: string): string {
  return query.replace(TRAILING_SEARCH_NOISE, '');
}

export class QueryPool {
  readonly all: readonly string[];
  readonly unique: ReadonlySet<string>;
  private pending: string[];

  private constructor(all: string[]) {
    this.all = all;
    this.unique = new Set(all);
    this.pending = [...this.unique];
  }

  static fromLines(lines: Iterable<string>): QueryPool {
    const normalized: string[] = [];
    for (const line of lines) {
      const query = normalizeQueryLine(line);
      if (query) {
        normalized.push(query);
      }
    }
    return new QueryPool(normalized);
  }

  get remaining(): readonly string[] {
    return this.pending;
  }

  get size(): number {
    return this.unique.size;
  }

  reset(): void {
    this.pending = [...this.unique];
  }

  /** Picks one remaining query uniformly at random and removes it; `undefined` once exhausted. */
  draw(random: RandomSource = Math.random): string | undefined {
    if (this.pending.length === 0) {
      return undefined;
    }
    const index = Math.min(Math.floor(random() * this.pending.length), this.pending.length - 1);
    const [query] = this.pending.splice(index, 1);
    return query;
  }

  stats(sampleLimit = 5): QueryPoolStats {
    const counts = new Map<string, number>();
    for (const query of this.all) {
      counts.set(query, (counts.get(query) ?? 0) + 1);
    }
    const duplicates = [...counts.entries()]
      .filter(([, count]) => count > 1)
      .map(([query, count]) => ({ query, count }))
      .sort((a, b) => b.count - a.count || a.query.localeCompare(b.query));
    return {
      total: this.all.length,
      unique: this.unique.size,
      duplicateCount: duplicates.length,
      duplicates: duplicates.slice(0, Math.max(0, sampleLimit)),
    };
  }
}
