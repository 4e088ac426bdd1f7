/**
 * Observability counters
 *
 * The crawling engine may pass its own collector; MemoryStatsCollector keeps
 * the values in process. Counters are for observability only and never feed
 * control decisions.
 */

export const STATS_PREFIX = 'browser';

export interface StatsCollector {
  incValue(key: string, count?: number): void;
  setValue(key: string, value: number): void;
  /** Store `value` if it is greater than the current one (or none is set) */
  maxValue(key: string, value: number): void;
  getValue(key: string): number | undefined;
  getStats(): Record<string, number>;
}

export class MemoryStatsCollector implements StatsCollector {
  private readonly values = new Map<string, number>();

  incValue(key: string, count = 1): void {
    this.values.set(key, (this.values.get(key) ?? 0) + count);
  }

  setValue(key: string, value: number): void {
    this.values.set(key, value);
  }

  maxValue(key: string, value: number): void {
    const current = this.values.get(key);
    if (current === undefined || value > current) {
      this.values.set(key, value);
    }
  }

  getValue(key: string): number | undefined {
    return this.values.get(key);
  }

  getStats(): Record<string, number> {
    return Object.fromEntries(this.values);
  }
}

/**
 * Build a counter key under the bridge prefix: statKey('page_count', 'closed')
 * gives 'browser/page_count/closed'.
 */
export function statKey(...parts: Array<string | number | boolean>): string {
  return [STATS_PREFIX, ...parts.map(String)].join('/');
}
