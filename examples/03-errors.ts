import {
  Matrix,
  float64,
  isMatrixError,
  tryMatrix,
  IncompatibleSizesAddError,
  IncompatibleSizesMultiplyError,
} from '@densematrix/core';

function main(): void {
  // Construction failures as values
  const empty = tryMatrix(0, 3, { dtype: float64 });
  if (!empty.ok) {
    console.log(empty.error.getFormattedMessage());
  }

  const short = Matrix.tryFromElements(2, 2, [1, 2, 3], { dtype: float64 });
  if (!short.ok) {
    console.log(`${short.error.code}: ${short.error.message}`);
  }

  // Checked access
  const m = Matrix.filled(2, 2, 1, { dtype: float64 });
  const outside = m.tryAt(2, 0);
  if (!outside.ok) {
    console.log(outside.error.message);
    // Index (2, 0) out of range for a 2x2 matrix
  }

  // Arithmetic throws
  try {
    m.add(Matrix.filled(3, 3, 1, { dtype: float64 }));
  } catch (error) {
    if (!(error instanceof IncompatibleSizesAddError)) {
      throw error;
    }
    console.log(error.message);
  }

  try {
    Matrix.filled(2, 3, 1, { dtype: float64 }).matmul(m);
  } catch (error) {
    if (!(error instanceof IncompatibleSizesMultiplyError)) {
      throw error;
    }
    console.log(error.message);
  }

  try {
    m.at(-1, 0);
  } catch (error) {
    if (!isMatrixError(error)) {
      throw error;
    }
    console.log(`${error.category}: ${error.message}`);
  }
}

main();
