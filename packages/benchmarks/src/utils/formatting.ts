/**
 * Benchmark result formatting utilities
 */

import type { Bench, Task } from 'tinybench';

export interface FormattedResult {
  name: string;
  ops: number;
  mean: number;
  p75: number;
  p99: number;
  stdDev: number;
  margin: number;
  samples: number;
  cv: number; // Coefficient of variation
}

const NS_PER_MS = 1_000_000;

/**
 * Format a single benchmark task result, with times in nanoseconds
 */
export function formatTaskResult(name: string, task: Task): FormattedResult | null {
  const result = task.result;
  if (!result) {
    return null;
  }

  // tinybench reports milliseconds
  const meanNs = (result.mean || 0) * NS_PER_MS;
  const stdDevNs = (result.sd || 0) * NS_PER_MS;

  return {
    name,
    ops: result.hz || 0,
    mean: meanNs,
    p75: (result.p75 || 0) * NS_PER_MS,
    p99: (result.p99 || 0) * NS_PER_MS,
    stdDev: stdDevNs,
    margin: (result.moe || 0) * NS_PER_MS,
    samples: result.samples.length,
    cv: meanNs > 0 ? stdDevNs / meanNs : 0,
  };
}

/**
 * Format all benchmark results from a Bench instance
 */
export function formatBenchResults(bench: Bench): FormattedResult[] {
  const results: FormattedResult[] = [];
  for (const task of bench.tasks) {
    const formatted = formatTaskResult(task.name, task);
    if (formatted) {
      results.push(formatted);
    }
  }
  return results;
}

/**
 * Pick a readable unit for a nanosecond latency
 */
export function formatLatency(ns: number): string {
  if (ns >= 1_000_000) {
    return `${(ns / 1_000_000).toFixed(3)}ms`;
  }
  if (ns >= 1_000) {
    return `${(ns / 1_000).toFixed(1)}μs`;
  }
  return `${ns.toFixed(0)}ns`;
}

/**
 * Create a markdown table from benchmark results
 */
export function resultsToMarkdownTable(results: readonly FormattedResult[]): string {
  const headers = ['Name', 'Ops/sec', 'Mean', 'P75', 'P99', 'Std Dev', 'Margin'];
  const separator = headers.map((h) => '-'.repeat(h.length));

  const rows = results.map((r) => [
    r.name,
    r.ops.toFixed(2),
    formatLatency(r.mean),
    formatLatency(r.p75),
    formatLatency(r.p99),
    formatLatency(r.stdDev),
    `±${formatLatency(r.margin)}`,
  ]);

  const table = [headers.join(' | '), separator.join(' | '), ...rows.map((row) => row.join(' | '))];

  return table.join('\n');
}

/**
 * Format results for individual scenario tracking
 */
export function formatIndividualResults(results: readonly FormattedResult[]): string {
  const lines: string[] = [];

  lines.push('## Individual Scenario Results\n');

  for (const result of results) {
    const stability =
      result.cv < 0.05 ? '🟢 Stable' : result.cv < 0.1 ? '🟡 Moderate' : '🔴 High variance';

    lines.push(`### ${result.name}`);
    lines.push(`- **Ops/sec**: ${result.ops.toFixed(2)}`);
    lines.push(`- **Mean latency**: ${formatLatency(result.mean)}`);
    lines.push(`- **P99 latency**: ${formatLatency(result.p99)}`);
    lines.push(
      `- **Samples**: ${result.samples} (CV: ${(result.cv * 100).toFixed(1)}%) ${stability}`,
    );
    lines.push(`- **Standard deviation**: ±${formatLatency(result.stdDev)}`);
    lines.push('');
  }

  return lines.join('\n');
}
