import { Matrix, matrix, float64, int64, complex128, complex } from '@densematrix/core';

function main(): void {
  // 2x3 from row-major elements
  const e = matrix(2, 3, [1, 2, 3, 4, 5, 6], { dtype: float64 });
  e.setAt(0, 2, 7);
  console.log(e.format());
  // (     1     2     7 )
  // (     4     5     6 )

  // 3x3 diagonal
  const c = matrix([1, 2, 3], { dtype: float64 });
  console.log(c.format());

  // 4x5 filled
  const b = Matrix.filled(4, 5, 0n, { dtype: int64 });
  console.log(b.toString());
  // Matrix(rows=4, cols=5, dtype=int64)

  // Complex elements print as (re,im)
  const z = Matrix.diagonal([complex(1, 1), complex(0, -2)], { dtype: complex128 });
  console.log(z.format({ width: 8 }));

  // Moving hands the buffer over and leaves the source empty
  const moved = Matrix.move(e);
  console.log(`${moved.toString()} / source empty: ${e.isEmpty()}`);
  console.log(e.format());
  // ()
}

main();
