/**
 * Shared console reporting for the tinybench runners
 */

import type { Bench, Task } from 'tinybench';
import { analyzeResults, getBenchmarkProfile, getBenchmarkRecommendations } from '../utils/config';
import {
  formatBenchResults,
  formatIndividualResults,
  formatLatency,
  resultsToMarkdownTable,
} from '../utils/formatting';

const NS_PER_MS = 1_000_000;

export function printHeader(title: string): void {
  console.log(`🚀 Running ${title}\n`);

  console.log('💡 Benchmark Reliability Tips:');
  for (const tip of getBenchmarkRecommendations()) {
    console.log(`   ${tip}`);
  }
  console.log('');

  console.log(`📊 Using profile: ${getBenchmarkProfile()}\n`);
}

/**
 * One line per task: median latency, outliers and whether the run was stable
 */
export function describeStability(task: Task): string | null {
  const samples = task.result?.samples ?? [];
  if (samples.length === 0) {
    return null;
  }
  const stats = analyzeResults(samples);
  const verdict = stats.isStable ? '🟢 stable' : '🔴 unstable';
  return (
    `${task.name}: median ${formatLatency(stats.median * NS_PER_MS)}, ` +
    `CV ${(stats.cv * 100).toFixed(1)}%, ${stats.outliers} outliers, ${verdict}`
  );
}

/**
 * Run every task, then print the results table, per-task details and a
 * stability summary
 */
export async function runAndReport(bench: Bench): Promise<void> {
  console.log(`\nRunning ${bench.tasks.length} benchmarks...\n`);

  await bench.run();

  const results = formatBenchResults(bench);

  console.log('\n📊 Benchmark Results\n');
  console.log(resultsToMarkdownTable(results));

  console.log('\n📋 Detailed Results:\n');
  console.log(formatIndividualResults(results));

  console.log('🔬 Stability:\n');
  for (const task of bench.tasks) {
    const line = describeStability(task);
    if (line !== null) {
      console.log(`   ${line}`);
    }
  }
}
