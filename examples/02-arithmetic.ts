import {
  Matrix,
  float64,
  int32,
  matmul,
  mulScalar,
  scalarMul,
  setOutputWidth,
  writeMatrix,
} from '@densematrix/core';

function main(): void {
  const a = Matrix.fromElements(2, 2, [1, 2, 3, 4], { dtype: float64 });
  const b = Matrix.fromElements(2, 2, [5, 6, 7, 8], { dtype: float64 });

  writeMatrix(process.stdout, a.add(b));
  // (     6     8 )
  // (    10    12 )

  writeMatrix(process.stdout, matmul(a, b));
  // (    19    22 )
  // (    43    50 )

  writeMatrix(process.stdout, a.sub(b).neg());

  // Scalars multiply from either side
  writeMatrix(process.stdout, scalarMul(7, a));
  writeMatrix(process.stdout, mulScalar(a, 7));

  // In-place forms overwrite the left operand
  const original = a.clone();
  a.addAssign(b).subAssign(b);
  console.log(`round trip unchanged: ${a.equals(original)}`);

  // The output width is shared by every int32 matrix
  setOutputWidth(int32, 3);
  writeMatrix(process.stdout, Matrix.diagonal([1, 2, 3], { dtype: int32 }));
  // (   1   0   0 )
  // (   0   2   0 )
  // (   0   0   3 )
}

main();
