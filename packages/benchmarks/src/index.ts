// Re-export tinybench types
export { Bench } from 'tinybench';
export type { Task, BenchOptions, TaskResult } from 'tinybench';

// Export utilities
export * from './utils/sizes';
export * from './utils/data';
export * from './utils/config';
export * from './utils/formatting';

// Export runner reporting
export { printHeader, describeStability, runAndReport } from './runners/report';
