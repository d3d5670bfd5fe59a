// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import { SINGULAR_TOLERANCE } from '../constants';
import type { Point2D } from '../types';

export interface Matrix2x2 {
  data: [[number, number], [number, number]];
}

export function determinant(m: Matrix2x2): number {
  const [[a, b], [c, d]] = m.data;
  return a * d - b * c;
}

// |det| compared against the squared size of the entries, independent of coordinate scale.
export function isSingular(m: Matrix2x2, tolerance = SINGULAR_TOLERANCE): boolean {
  const [[a, b], [c, d]] = m.data;
  const magnitude = Math.abs(a) + Math.abs(b) + Math.abs(c) + Math.abs(d);
  return Math.abs(determinant(m)) <= tolerance * magnitude * magnitude;
}

export function invertMatrix2x2(m: Matrix2x2, tolerance = SINGULAR_TOLERANCE): Matrix2x2 | null {
  if (isSingular(m, tolerance)) {
    return null;
  }
  const [[a, b], [c, d]] = m.data;
  const invDet = 1 / determinant(m);
  return {
    data: [
      [d * invDet, -b * invDet],
      [-c * invDet, a * invDet]
    ]
  };
}

// Row vector times matrix: [v0 v1] * M.
export function rowVecMul(v: Point2D, m: Matrix2x2): Point2D {
  const [[a, b], [c, d]] = m.data;
  return [v[0] * a + v[1] * c, v[0] * b + v[1] * d];
}
