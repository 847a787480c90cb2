// Structural Change Analyzer - Cumulative Sum Builder
// Prefix sums over frames so any window mean costs one subtraction per dimension.

/**
 * Row 0 is all zeros; row `k` is the elementwise sum of frames `[0, k)`.
 * Row `k` minus row `j` is therefore the sum of frames `[j, k)`.
 */
export type CumulativeMatrix = Float64Array[];

export function buildCumulativeMatrix(
  frames: readonly ArrayLike<number>[],
  dimension: number,
): CumulativeMatrix {
  const matrix: CumulativeMatrix = [new Float64Array(dimension)];
  let running = new Float64Array(dimension);

  for (const frame of frames) {
    const next = new Float64Array(dimension);
    for (let d = 0; d < dimension; d++) {
      next[d] = running[d] + frame[d];
    }
    matrix.push(next);
    running = next;
  }

  return matrix;
}

/** Elementwise sum of frames `[start, end)`. */
export function windowSum(matrix: CumulativeMatrix, start: number, end: number): number[] {
  const upper = matrix[end];
  const lower = matrix[start];
  const sum: number[] = new Array(upper.length);
  for (let d = 0; d < upper.length; d++) {
    sum[d] = upper[d] - lower[d];
  }
  return sum;
}

/** Elementwise mean of frames `[start, end)`. An empty window yields zeros. */
export function windowMean(matrix: CumulativeMatrix, start: number, end: number): number[] {
  const size = end - start;
  const sum = windowSum(matrix, start, end);
  if (size <= 0) return sum.map(() => 0);
  return sum.map((v) => v / size);
}
