// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import { DEFAULT_ALPHA } from '../../constants';
import type { Point2D } from '../../types';

export type WeightResult =
  | { singular: true; index: number }
  | { singular: false; weights: Float64Array; total: number };

/**
 * Inverse-distance weights of the source control points for the query
 * `point`, w_i = (d_min / d_i)^alpha with d_i = |p_i - v|^2. Scaling by the
 * nearest distance leaves the normalized weights of |p_i - v|^(-2 alpha)
 * unchanged and keeps the largest weight at 1 for any alpha.
 *
 * A query sitting on a control point has no finite weight vector; the result
 * then names the first such control point instead.
 */
export function computeWeights(
  controlsP: readonly Point2D[],
  point: Point2D,
  alpha = DEFAULT_ALPHA
): WeightResult {
  const weights = new Float64Array(controlsP.length);
  let minSqrDist = Infinity;
  for (let i = 0; i < controlsP.length; i++) {
    const dx = controlsP[i][0] - point[0];
    const dy = controlsP[i][1] - point[1];
    const sqrDist = dx * dx + dy * dy;
    if (sqrDist === 0) {
      return { singular: true, index: i };
    }
    // Holds the squared distance until the second pass.
    weights[i] = sqrDist;
    minSqrDist = Math.min(minSqrDist, sqrDist);
  }
  let total = 0;
  for (let i = 0; i < weights.length; i++) {
    const ratio = minSqrDist / weights[i];
    const w = alpha === 1 ? ratio : Math.pow(ratio, alpha);
    weights[i] = w;
    total += w;
  }
  return { singular: false, weights, total };
}

export interface Centroids {
  pStar: Point2D;
  qStar: Point2D;
}

export function weightedCentroids(
  controlsP: readonly Point2D[],
  controlsQ: readonly Point2D[],
  weights: Float64Array,
  total: number
): Centroids {
  let px = 0;
  let py = 0;
  let qx = 0;
  let qy = 0;
  for (let i = 0; i < controlsP.length; i++) {
    const w = weights[i];
    px += w * controlsP[i][0];
    py += w * controlsP[i][1];
    qx += w * controlsQ[i][0];
    qy += w * controlsQ[i][1];
  }
  return {
    pStar: [px / total, py / total],
    qStar: [qx / total, qy / total]
  };
}

export type LocalFrame =
  | { singular: true; target: Point2D }
  | { singular: false; weights: Float64Array; pStar: Point2D; qStar: Point2D };

/**
 * Everything the three solvers share: either the exact destination of a
 * control point the query coincides with, or the weights and centroids.
 */
export function localFrame(
  controlsP: readonly Point2D[],
  controlsQ: readonly Point2D[],
  point: Point2D,
  alpha = DEFAULT_ALPHA
): LocalFrame {
  const result = computeWeights(controlsP, point, alpha);
  if (result.singular) {
    const [x, y] = controlsQ[result.index];
    return { singular: true, target: [x, y] };
  }
  const { pStar, qStar } = weightedCentroids(controlsP, controlsQ, result.weights, result.total);
  return { singular: false, weights: result.weights, pStar, qStar };
}
