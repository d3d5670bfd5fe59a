// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import { DEFAULT_ALPHA } from '../../constants';
import type { Point2D } from '../../types';
import { add, norm, scale, sub } from '../vec2';
import { rotateScale, similarityTerms } from './similarity';
import { localFrame } from './weights';

/**
 * Moving least squares with a rigid (rotation and translation) local
 * transform.
 *
 * The unnormalized similarity offset already points in the rigid direction;
 * rescaling it to |v - p*| removes the scale.
 */
export function solveRigid(
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

  const offset = sub(point, pStar);
  const length = norm(offset);
  if (length === 0) {
    return qStar;
  }

  const { a, b } = similarityTerms(controlsP, controlsQ, weights, pStar, qStar);
  const rotated = rotateScale(offset, a, b);
  const rotatedLength = norm(rotated);
  // No rotation can be recovered, e.g. from a single control point.
  if (rotatedLength === 0) {
    return add(offset, qStar);
  }
  return add(scale(rotated, length / rotatedLength), qStar);
}
