import { RANK_TOLERANCE } from '../constants';

// Dense row-major matrix.
export type Matrix = {
  rows: number;
  cols: number;
  data: number[];
};

export type LeastSquaresResult = {
  x: number[];
  rank: number;
  residual: number[]; // b - A x
};

export const createMatrix = (rows: number, cols: number, data?: number[]): Matrix => {
  const size = rows * cols;
  if (data && data.length !== size) {
    throw new RangeError(`matrix data length ${data.length} does not match ${rows}x${cols}`);
  }
  return { rows, cols, data: data ? data.slice() : new Array<number>(size).fill(0) };
};

export const matVecMul = (a: Matrix, x: number[]) => {
  const out = new Array<number>(a.rows).fill(0);
  for (let r = 0; r < a.rows; r++) {
    let sum = 0;
    for (let c = 0; c < a.cols; c++) sum += a.data[r * a.cols + c] * x[c];
    out[r] = sum;
  }
  return out;
};

export const euclideanNorm = (v: number[]) => Math.sqrt(v.reduce((s, x) => s + x * x, 0));

const columnNormSq = (m: Matrix, col: number, fromRow: number) => {
  let sum = 0;
  for (let r = fromRow; r < m.rows; r++) {
    const v = m.data[r * m.cols + col];
    sum += v * v;
  }
  return sum;
};

const swapColumns = (m: Matrix, i: number, j: number) => {
  if (i === j) return;
  for (let r = 0; r < m.rows; r++) {
    const a = r * m.cols + i;
    const b = r * m.cols + j;
    const tmp = m.data[a];
    m.data[a] = m.data[b];
    m.data[b] = tmp;
  }
};

/**
 * Solves min ||A x - b||_2 with a Householder QR factorization using column
 * pivoting. A is never squared (no A^T A), so conditioning is that of A.
 *
 * Rank is the number of diagonal entries of R above `tolerance * |R[0][0]|`.
 * When rank < cols the basic solution is returned: coordinates on the
 * dependent pivoted columns are set to zero.
 */
export const solveLeastSquaresQR = (
  a: Matrix,
  b: number[],
  tolerance = RANK_TOLERANCE
): LeastSquaresResult => {
  if (b.length !== a.rows) {
    throw new RangeError(`rhs length ${b.length} does not match ${a.rows} rows`);
  }

  const R = createMatrix(a.rows, a.cols, a.data);
  const qtb = b.slice();
  const perm = Array.from({ length: a.cols }, (_, i) => i);
  const steps = Math.min(a.rows, a.cols);
  let factored = 0;

  for (let k = 0; k < steps; k++) {
    // Pivot: remaining column with the largest norm below row k
    let pivot = k;
    let pivotNormSq = columnNormSq(R, k, k);
    for (let j = k + 1; j < a.cols; j++) {
      const n = columnNormSq(R, j, k);
      if (n > pivotNormSq) {
        pivot = j;
        pivotNormSq = n;
      }
    }
    if (pivotNormSq === 0) break;

    swapColumns(R, k, pivot);
    [perm[k], perm[pivot]] = [perm[pivot], perm[k]];

    // Householder vector v = x - alpha e1, alpha = -sign(x0) ||x||
    const colNorm = Math.sqrt(pivotNormSq);
    const x0 = R.data[k * R.cols + k];
    const alpha = x0 >= 0 ? -colNorm : colNorm;
    const v: number[] = [];
    for (let r = k; r < R.rows; r++) v.push(R.data[r * R.cols + k]);
    v[0] -= alpha;
    const vNormSq = v.reduce((s, x) => s + x * x, 0);

    if (vNormSq > 0) {
      for (let c = k; c < R.cols; c++) {
        let dot = 0;
        for (let i = 0; i < v.length; i++) dot += v[i] * R.data[(k + i) * R.cols + c];
        const f = (2 * dot) / vNormSq;
        for (let i = 0; i < v.length; i++) R.data[(k + i) * R.cols + c] -= f * v[i];
      }
      let dot = 0;
      for (let i = 0; i < v.length; i++) dot += v[i] * qtb[k + i];
      const f = (2 * dot) / vNormSq;
      for (let i = 0; i < v.length; i++) qtb[k + i] -= f * v[i];
    }

    R.data[k * R.cols + k] = alpha;
    for (let r = k + 1; r < R.rows; r++) R.data[r * R.cols + k] = 0;
    factored = k + 1;
  }

  const largest = factored > 0 ? Math.abs(R.data[0]) : 0;
  let rank = 0;
  while (rank < factored && Math.abs(R.data[rank * R.cols + rank]) > tolerance * largest) rank++;

  // Back substitution on the leading rank x rank block of R
  const z = new Array<number>(a.cols).fill(0);
  for (let k = rank - 1; k >= 0; k--) {
    let sum = qtb[k];
    for (let j = k + 1; j < rank; j++) sum -= R.data[k * R.cols + j] * z[j];
    z[k] = sum / R.data[k * R.cols + k];
  }

  const x = new Array<number>(a.cols).fill(0);
  for (let k = 0; k < a.cols; k++) x[perm[k]] = z[k];

  const ax = matVecMul(a, x);
  const residual = b.map((v, i) => v - ax[i]);

  return { x, rank, residual };
};
