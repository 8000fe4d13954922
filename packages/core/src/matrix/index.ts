/**
 * Matrix module exports
 *
 * @module matrix
 */

export { Matrix } from './matrix';
export { matrix, tryMatrix } from './creation';
export {
  add,
  addAssign,
  neg,
  sub,
  subAssign,
  matmul,
  scalarMul,
  mulScalar,
  equals,
} from './operations';
export {
  formatMatrix,
  writeMatrix,
  setOutputWidth,
  getOutputWidth,
  resetOutputWidth,
  DEFAULT_OUTPUT_WIDTH,
} from './format';
export type { ReadonlyMatrix, MatrixOptions, FormatOptions, OutputSink } from './types';
