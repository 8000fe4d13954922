import { describe, it, expect, vi, afterEach } from 'vitest';
import { Bench } from 'tinybench';
import { describeStability, runAndReport } from './report';

function tinyBench(): Bench {
  return new Bench({ time: 5, iterations: 10 }).add('noop', () => {
    Math.sqrt(2);
  });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('describeStability', () => {
  it('should return null for a task that has not run', () => {
    const bench = tinyBench();
    expect(describeStability(bench.tasks[0])).toBeNull();
  });

  it('should summarise the samples of a finished task', async () => {
    const bench = tinyBench();
    await bench.run();
    expect(describeStability(bench.tasks[0])).toMatch(
      /^noop: median \S+, CV \d+\.\d%, \d+ outliers, (🟢 stable|🔴 unstable)$/,
    );
  });
});

describe('runAndReport', () => {
  it('should print the markdown table and the stability summary', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    await runAndReport(tinyBench());

    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => line.startsWith('Name | Ops/sec | Mean | P75 | P99'))).toBe(true);
    expect(lines).toContain('🔬 Stability:\n');
    expect(lines.some((line) => line.startsWith('   noop: median '))).toBe(true);
  });
});
