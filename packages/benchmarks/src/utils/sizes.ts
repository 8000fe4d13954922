/**
 * Common matrix sizes for benchmarking
 */

export interface BenchmarkSize {
  name: string;
  rows: number;
  cols: number;
  elements: number;
}

function size(name: string, rows: number, cols: number): BenchmarkSize {
  return { name, rows, cols, elements: rows * cols };
}

export const SQUARE_SIZES: BenchmarkSize[] = [
  size('tiny', 4, 4),
  size('small', 16, 16),
  size('medium', 64, 64),
  size('large', 128, 128),
];

export const RECTANGULAR_SIZES: BenchmarkSize[] = [
  size('row', 1, 256),
  size('column', 256, 1),
  size('wide', 16, 128),
  size('tall', 128, 16),
];

// Products are O(n^3) in the generic loop, so keep these smaller
export const MATMUL_SIZES: BenchmarkSize[] = [
  size('tiny', 4, 4),
  size('small', 16, 16),
  size('medium', 32, 32),
  size('large', 64, 64),
];

export function formatSize(size: BenchmarkSize): string {
  return `${size.name} ${size.rows}x${size.cols} (${size.elements.toLocaleString()} elements)`;
}
