export * from './dtype';
export * from './matrix';
export * from './errors';
export { ok, fail, isOk, unwrap } from './result';
export type { Result } from './result';
