// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import { DEFAULT_ALPHA } from '../../constants';
import type { Point2D } from '../../types';
import { add, dot, perp, sqrNorm, sub } from '../vec2';
import { localFrame } from './weights';

export interface SimilarityTerms {
  /** sum_i w_i |p̂_i|^2 */
  mu: number;
  /** sum_i w_i q̂_i . p̂_i */
  a: number;
  /** sum_i w_i q̂_i . p̂_i^⊥ */
  b: number;
}

/**
 * The similarity matrix [[a, b], [-b, a]] / mu never needs an explicit
 * inverse: with p̂_i and p̂_i^⊥ as a basis, its entries reduce to these
 * weighted dot products.
 */
export function similarityTerms(
  controlsP: readonly Point2D[],
  controlsQ: readonly Point2D[],
  weights: Float64Array,
  pStar: Point2D,
  qStar: Point2D
): SimilarityTerms {
  let mu = 0;
  let a = 0;
  let b = 0;
  for (let i = 0; i < controlsP.length; i++) {
    const w = weights[i];
    const pHat = sub(controlsP[i], pStar);
    const qHat = sub(controlsQ[i], qStar);
    mu += w * sqrNorm(pHat);
    a += w * dot(qHat, pHat);
    b += w * dot(qHat, perp(pHat));
  }
  return { mu, a, b };
}

// Row vector (ox, oy) times [[a, b], [-b, a]].
export function rotateScale(offset: Point2D, a: number, b: number): Point2D {
  const [ox, oy] = offset;
  return [a * ox - b * oy, b * ox + a * oy];
}

/**
 * Moving least squares with a similarity (rotation, uniform scale and
 * translation) local transform.
 */
export function solveSimilarity(
  controlsP: readonly Point2D[],
  controlsQ: readonly Point2D[],
  point: Point2D,
  alpha = DEFAULT_ALPHA
): Point2D {
  const frame = localFrame(controlsP, controlsQ, point, alpha);
  if (frame.singular) {
    return frame.target;
  }
  const { weights, pStar, qStar } = frame;
  const { mu, a, b } = similarityTerms(controlsP, controlsQ, weights, pStar, qStar);

  const offset = sub(point, pStar);
  if (!(mu > 0)) {
    return add(offset, qStar);
  }
  return add(rotateScale(offset, a / mu, b / mu), qStar);
}
