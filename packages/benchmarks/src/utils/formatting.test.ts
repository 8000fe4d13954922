import { describe, it, expect } from 'vitest';
import { formatLatency, resultsToMarkdownTable, type FormattedResult } from './formatting';
import { formatSize, SQUARE_SIZES } from './sizes';

describe('formatLatency', () => {
  it('should pick a unit by magnitude', () => {
    expect(formatLatency(500)).toBe('500ns');
    expect(formatLatency(1500)).toBe('1.5μs');
    expect(formatLatency(2_000_000)).toBe('2.000ms');
  });
});

describe('resultsToMarkdownTable', () => {
  it('should render one row per result', () => {
    const result: FormattedResult = {
      name: 'add tiny',
      ops: 1000,
      mean: 500,
      p75: 600,
      p99: 1500,
      stdDev: 20,
      margin: 5,
      samples: 10,
      cv: 0.04,
    };
    expect(resultsToMarkdownTable([result]).split('\n')).toEqual([
      'Name | Ops/sec | Mean | P75 | P99 | Std Dev | Margin',
      '---- | ------- | ---- | --- | --- | ------- | ------',
      'add tiny | 1000.00 | 500ns | 600ns | 1.5μs | 20ns | ±5ns',
    ]);
  });
});

describe('formatSize', () => {
  it('should describe the shape and element count', () => {
    expect(formatSize(SQUARE_SIZES[0])).toBe('tiny 4x4 (16 elements)');
  });
});
