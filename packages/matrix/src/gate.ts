import type { BuildMatrix, GateResult } from './types'

/**
 * CI platforms reject an empty matrix as a configuration error, so
 * downstream stages branch on `hasJobs` instead of the matrix itself.
 */
export function gateMatrix(matrix: BuildMatrix): GateResult {
  return { matrix, hasJobs: matrix.length > 0 }
}
