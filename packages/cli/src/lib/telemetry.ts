/**
 * Verbose-mode metric lines on stderr
 *
 * Format: `metric <key> field=value ...`
 */

import { metrics } from "@sqlcatalog/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

type MetricFields = Record<string, string | number | boolean>;

// Keys and values must stay on one line
function flatten(part: string | number | boolean): string {
  return String(part).replace(/\s+/g, " ").trim();
}

export function formatMetric(key: string, fields: MetricFields): string {
  const pairs = Object.entries(fields).map(([name, value]) => `${flatten(name)}=${flatten(value)}`);
  return [`metric ${flatten(key)}`, ...pairs].join(" ");
}

export function emitMetric(key: string, fields: MetricFields): void {
  if (isVerbose()) {
    writeStderr(formatMetric(key, fields) + "\n");
  }
}

/**
 * Per-script counters collected by the SDK during this run
 */
export function emitScriptMetrics(names: readonly string[]): void {
  for (const name of new Set(names)) {
    const stats = metrics.getMetrics(name);
    if (stats) {
      emitMetric(`script.${name}`, {
        executions: stats.executions,
        failures: stats.failures,
        p95_ms: metrics.getP95Duration(name).toFixed(2),
      });
    }
  }
}

export function emitTransactionMetrics(): void {
  const { commits, rollbacks, rollbackFailures } = metrics.getTransactionMetrics();
  emitMetric("transactions", { commits, rollbacks, rollback_failures: rollbackFailures });
}

/**
 * Run a command body and report how long it took and whether it threw
 */
export async function withTiming<T>(command: string, fn: () => Promise<T>): Promise<T> {
  const started = performance.now();
  let ok = false;

  try {
    const result = await fn();
    ok = true;
    return result;
  } finally {
    emitMetric(command, { duration_ms: (performance.now() - started).toFixed(1), ok });
  }
}
