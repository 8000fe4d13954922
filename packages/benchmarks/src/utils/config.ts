/**
 * Benchmark configuration utilities for statistical reliability
 */

import type { BenchOptions } from 'tinybench';

function collectGarbage(): void {
  if (globalThis.gc) {
    globalThis.gc();
  }
}

/**
 * Configuration profiles for different benchmark scenarios
 */
export const BENCHMARK_PROFILES = {
  /**
   * Quick profile for development/debugging
   * Faster but less reliable results
   */
  quick: {
    time: 250,
    iterations: 10,
    warmup: true,
  },

  /**
   * Standard profile for regular benchmarking
   */
  standard: {
    time: 1000,
    warmup: true,
  },

  /**
   * High-precision profile for CI
   * Run node with --expose-gc so the hooks can collect between tasks
   */
  precise: {
    time: 2000,
    iterations: 200,
    warmup: true,
    setup(_task?: unknown, mode?: string) {
      if (mode === 'warmup') {
        collectGarbage();
        collectGarbage();
      }
    },
    teardown() {
      collectGarbage();
    },
  },
} satisfies Record<string, BenchOptions>;

export type BenchmarkProfile = keyof typeof BENCHMARK_PROFILES;

function isBenchmarkProfile(name: string): name is BenchmarkProfile {
  return Object.prototype.hasOwnProperty.call(BENCHMARK_PROFILES, name);
}

/**
 * Profile named by BENCHMARK_PROFILE, or 'standard'
 */
export function getBenchmarkProfile(env: NodeJS.ProcessEnv = process.env): BenchmarkProfile {
  const profile = env.BENCHMARK_PROFILE;
  if (profile !== undefined && isBenchmarkProfile(profile)) {
    return profile;
  }
  return 'standard';
}

/**
 * Get benchmark configuration based on environment
 */
export function getBenchmarkConfig(env: NodeJS.ProcessEnv = process.env): BenchOptions {
  return BENCHMARK_PROFILES[getBenchmarkProfile(env)];
}

export interface SampleAnalysis {
  mean: number;
  median: number;
  stdDev: number;
  cv: number; // Coefficient of variation
  outliers: number;
  isStable: boolean;
}

/**
 * Statistical analysis helpers
 *
 * @throws {RangeError} if `samples` is empty
 */
export function analyzeResults(samples: readonly number[]): SampleAnalysis {
  const n = samples.length;
  if (n === 0) {
    throw new RangeError('Cannot analyze an empty sample set');
  }
  const sorted = [...samples].sort((a, b) => a - b);

  const mean = samples.reduce((sum, val) => sum + val, 0) / n;

  const median = n % 2 === 0 ? (sorted[n / 2 - 1] + sorted[n / 2]) / 2 : sorted[Math.floor(n / 2)];

  // Sample standard deviation; a single sample has none
  const variance = n > 1 ? samples.reduce((sum, val) => sum + (val - mean) ** 2, 0) / (n - 1) : 0;
  const stdDev = Math.sqrt(variance);

  const cv = mean === 0 ? 0 : stdDev / mean;

  // Outlier detection using IQR method
  const q1 = sorted[Math.floor(n * 0.25)];
  const q3 = sorted[Math.floor(n * 0.75)];
  const iqr = q3 - q1;
  const lowerBound = q1 - 1.5 * iqr;
  const upperBound = q3 + 1.5 * iqr;
  const outliers = samples.filter((val) => val < lowerBound || val > upperBound).length;

  // Consider stable if CV < 5% and outliers < 5%
  const isStable = cv < 0.05 && outliers / n < 0.05;

  return { mean, median, stdDev, cv, outliers, isStable };
}

/**
 * Recommendations for benchmark reliability
 */
export function getBenchmarkRecommendations(env: NodeJS.ProcessEnv = process.env): string[] {
  const recommendations = [
    '🔧 For best results, run benchmarks on a dedicated machine',
    '🔇 Close unnecessary applications to reduce system noise',
    '⚡ Consider using Node.js with --expose-gc flag for garbage collection control',
    '📊 Run multiple benchmark sessions and compare results',
  ];

  if (env.NODE_ENV === 'development') {
    recommendations.push('🚀 Use BENCHMARK_PROFILE=quick for faster development cycles');
  }

  if (env.CI) {
    recommendations.push('🏗️  CI environments may have higher variance - consider dedicated runners');
  }

  return recommendations;
}
