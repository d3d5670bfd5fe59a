// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import { DEFAULT_ALPHA } from '../../constants';
import type { Point2D } from '../../types';
import { invertMatrix2x2, type Matrix2x2, rowVecMul } from '../linalg';
import { add, sub } from '../vec2';
import { localFrame } from './weights';

/**
 * Moving least squares with an affine local transform.
 *
 * Minimizes sum_i w_i |p̂_i M - q̂_i|^2 over 2x2 matrices M, which gives
 * M = (sum_i w_i p̂_i^T p̂_i)^-1 sum_i w_i p̂_i^T q̂_i, and maps the query to
 * (v - p*) M + q*. When the sources have no spread in some direction the
 * first factor cannot be inverted and the query is only translated.
 */
export function solveAffine(
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

  let pxx = 0;
  let pxy = 0;
  let pyy = 0;
  let qxx = 0;
  let qxy = 0;
  let qyx = 0;
  let qyy = 0;
  for (let i = 0; i < controlsP.length; i++) {
    const w = weights[i];
    const [phx, phy] = sub(controlsP[i], pStar);
    const [qhx, qhy] = sub(controlsQ[i], qStar);
    pxx += w * phx * phx;
    pxy += w * phx * phy;
    pyy += w * phy * phy;
    qxx += w * phx * qhx;
    qxy += w * phx * qhy;
    qyx += w * phy * qhx;
    qyy += w * phy * qhy;
  }

  const offset = sub(point, pStar);
  const mpInv = invertMatrix2x2({ data: [[pxx, pxy], [pxy, pyy]] });
  if (!mpInv) {
    return add(offset, qStar);
  }
  const mq: Matrix2x2 = { data: [[qxx, qxy], [qyx, qyy]] };
  return add(rowVecMul(rowVecMul(offset, mpInv), mq), qStar);
}
