/**
 * Metrics tracking for key lookups
 */

export interface LookupMetrics {
  hitCount: number;
  missCount: number;
  lookupTimeMs: number[];
}

const MAX_SAMPLES = 100;

export class MetricsCollector {
  #metrics = new Map<string, LookupMetrics>();

  /**
   * Get or create metrics for a key
   */
  #getMetrics(recordType: string, key: string): LookupMetrics {
    const id = `${recordType}/${key}`;
    let metrics = this.#metrics.get(id);
    if (!metrics) {
      metrics = { hitCount: 0, missCount: 0, lookupTimeMs: [] };
      this.#metrics.set(id, metrics);
    }
    return metrics;
  }

  recordHit(recordType: string, key: string): void {
    this.#getMetrics(recordType, key).hitCount++;
  }

  recordMiss(recordType: string, key: string): void {
    this.#getMetrics(recordType, key).missCount++;
  }

  /**
   * Record lookup time, keeping only the last 100 samples
   */
  recordLookupTime(recordType: string, key: string, ms: number): void {
    const metrics = this.#getMetrics(recordType, key);
    metrics.lookupTimeMs.push(ms);

    if (metrics.lookupTimeMs.length > MAX_SAMPLES) {
      metrics.lookupTimeMs.shift();
    }
  }

  getMetrics(recordType: string, key: string): LookupMetrics | undefined {
    return this.#metrics.get(`${recordType}/${key}`);
  }

  getAllMetrics(): Map<string, LookupMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Hit rate for a key (0 when it was never looked up)
   */
  getHitRate(recordType: string, key: string): number {
    const metrics = this.getMetrics(recordType, key);
    if (!metrics) return 0;
    const total = metrics.hitCount + metrics.missCount;
    return total > 0 ? metrics.hitCount / total : 0;
  }

  /**
   * Calculate p95 for a series of samples
   */
  getP95(values: readonly number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)];
  }

  getP95LookupTime(recordType: string, key: string): number {
    return this.getP95(this.getMetrics(recordType, key)?.lookupTimeMs ?? []);
  }

  /**
   * Reset metrics for one key, or all of them
   */
  reset(recordType?: string, key?: string): void {
    if (recordType && key) {
      this.#metrics.delete(`${recordType}/${key}`);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
