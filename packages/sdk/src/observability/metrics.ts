/**
 * Metrics tracking for script execution
 */

export interface ScriptMetrics {
  executions: number;
  failures: number;
  durationMs: number[];
}

export interface TransactionMetrics {
  commits: number;
  rollbacks: number;
  rollbackFailures: number;
}

const MAX_SAMPLES = 100;

class MetricsCollector {
  #scripts = new Map<string, ScriptMetrics>();
  #transactions: TransactionMetrics = { commits: 0, rollbacks: 0, rollbackFailures: 0 };

  #getMetrics(name: string): ScriptMetrics {
    let metrics = this.#scripts.get(name);
    if (!metrics) {
      metrics = { executions: 0, failures: 0, durationMs: [] };
      this.#scripts.set(name, metrics);
    }
    return metrics;
  }

  /**
   * Record one execution of a script
   */
  recordExecution(name: string, ms: number, success: boolean): void {
    const metrics = this.#getMetrics(name);
    metrics.executions++;
    if (!success) {
      metrics.failures++;
    }
    metrics.durationMs.push(ms);

    // Keep only the latest samples
    if (metrics.durationMs.length > MAX_SAMPLES) {
      metrics.durationMs.shift();
    }
  }

  recordCommit(): void {
    this.#transactions.commits++;
  }

  recordRollback(succeeded: boolean): void {
    this.#transactions.rollbacks++;
    if (!succeeded) {
      this.#transactions.rollbackFailures++;
    }
  }

  getMetrics(name: string): ScriptMetrics | undefined {
    return this.#scripts.get(name);
  }

  getTransactionMetrics(): TransactionMetrics {
    return { ...this.#transactions };
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: readonly number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  /**
   * p95 execution time of a script
   */
  getP95Duration(name: string): number {
    return this.getP95(this.#scripts.get(name)?.durationMs ?? []);
  }

  /**
   * Reset metrics for one script, or everything
   */
  reset(name?: string): void {
    if (name) {
      this.#scripts.delete(name);
    } else {
      this.#scripts.clear();
      this.#transactions = { commits: 0, rollbacks: 0, rollbackFailures: 0 };
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
