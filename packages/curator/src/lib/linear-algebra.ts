/**
 * Small dense linear algebra for feature projection
 *
 * Vectors are plain number arrays; matrices are arrays of rows.
 * Sizes here are tiny (a handful of acoustic dimensions), so clarity wins over speed.
 */

import {JACOBI} from '../constants'

export type Matrix = number[][]
export type Vector = number[]

export interface EigenDecomposition {
  /** Eigenvalues, descending */
  values: number[]
  /** Unit eigenvectors, same order as values */
  vectors: Vector[]
}

export interface PrincipalComponents {
  components: Vector[]
  explainedVariance: number[]
  mean: Vector
}

// ===== Vector Helpers =====

export function dot(a: Vector, b: Vector): number {
  let sum = 0
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i]
  }
  return sum
}

export function squaredDistance(a: Vector, b: Vector): number {
  let sum = 0
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i]
    sum += d * d
  }
  return sum
}

/** Column-wise mean of the rows; zeros of the given width when there are none */
export function meanVector(rows: Matrix, width: number): Vector {
  const mean = new Array<number>(width).fill(0)
  if (rows.length === 0) return mean

  for (const row of rows) {
    for (let j = 0; j < width; j++) {
      mean[j] += row[j]
    }
  }
  return mean.map(sum => sum / rows.length)
}

export function identity(size: number): Matrix {
  return Array.from({length: size}, (_, i) => Array.from({length: size}, (_, j) => (i === j ? 1 : 0)))
}

// ===== Covariance =====

/**
 * Sample covariance (n - 1 denominator, n for a single row)
 */
export function covarianceMatrix(rows: Matrix, mean: Vector): Matrix {
  const width = mean.length
  const cov = Array.from({length: width}, () => new Array<number>(width).fill(0))
  const denominator = Math.max(1, rows.length - 1)

  for (const row of rows) {
    for (let i = 0; i < width; i++) {
      const di = row[i] - mean[i]
      for (let j = i; j < width; j++) {
        cov[i][j] += di * (row[j] - mean[j])
      }
    }
  }

  for (let i = 0; i < width; i++) {
    for (let j = i; j < width; j++) {
      cov[i][j] /= denominator
      cov[j][i] = cov[i][j]
    }
  }
  return cov
}

// ===== Eigen-decomposition =====

/**
 * Cyclic Jacobi eigen-decomposition of a symmetric matrix.
 * Each eigenvector's sign is fixed so its largest-magnitude entry is positive.
 */
export function jacobiEigen(symmetric: Matrix): EigenDecomposition {
  const n = symmetric.length
  const a = symmetric.map(row => [...row])
  const v = identity(n)

  for (let sweep = 0; sweep < JACOBI.MAX_SWEEPS; sweep++) {
    let offDiagonal = 0
    for (let p = 0; p < n; p++) {
      for (let q = p + 1; q < n; q++) {
        offDiagonal += a[p][q] * a[p][q]
      }
    }
    if (offDiagonal < JACOBI.EPSILON) break

    for (let p = 0; p < n; p++) {
      for (let q = p + 1; q < n; q++) {
        const apq = a[p][q]
        if (apq === 0) continue

        const theta = (a[q][q] - a[p][p]) / (2 * apq)
        const t = (theta >= 0 ? 1 : -1) / (Math.abs(theta) + Math.sqrt(theta * theta + 1))
        const c = 1 / Math.sqrt(t * t + 1)
        const s = t * c

        for (let k = 0; k < n; k++) {
          const akp = a[k][p]
          const akq = a[k][q]
          a[k][p] = c * akp - s * akq
          a[k][q] = s * akp + c * akq
        }
        for (let k = 0; k < n; k++) {
          const apk = a[p][k]
          const aqk = a[q][k]
          a[p][k] = c * apk - s * aqk
          a[q][k] = s * apk + c * aqk
        }
        for (let k = 0; k < n; k++) {
          const vkp = v[k][p]
          const vkq = v[k][q]
          v[k][p] = c * vkp - s * vkq
          v[k][q] = s * vkp + c * vkq
        }
      }
    }
  }

  const pairs = Array.from({length: n}, (_, i) => ({
    value: a[i][i],
    vector: normalizeSign(v.map(row => row[i])),
  }))
  pairs.sort((x, y) => y.value - x.value)

  return {
    values: pairs.map(pair => pair.value),
    vectors: pairs.map(pair => pair.vector),
  }
}

function normalizeSign(vector: Vector): Vector {
  let pivot = 0
  for (let i = 1; i < vector.length; i++) {
    if (Math.abs(vector[i]) > Math.abs(vector[pivot])) pivot = i
  }
  return vector[pivot] < 0 ? vector.map(x => -x) : vector
}

// ===== PCA =====

export function principalComponents(rows: Matrix, width: number, count: number): PrincipalComponents {
  const mean = meanVector(rows, width)
  const {values, vectors} = jacobiEigen(covarianceMatrix(rows, mean))
  const kept = Math.max(0, Math.min(count, width))

  return {
    components: vectors.slice(0, kept),
    explainedVariance: values.slice(0, kept),
    mean,
  }
}

export function project(row: Vector, pca: PrincipalComponents): Vector {
  const centered = row.map((x, i) => x - pca.mean[i])
  return pca.components.map(component => dot(centered, component))
}
