// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import type { Point2D } from '../../types';

function isFinitePoint(p: Point2D): boolean {
  return Number.isFinite(p[0]) && Number.isFinite(p[1]);
}

/**
 * Rejects control sets the solvers cannot work with. Called once at every
 * public entry point, never inside the per-pixel loop.
 */
export function assertControlPoints(
  controlsP: readonly Point2D[],
  controlsQ: readonly Point2D[]
): void {
  if (controlsP.length !== controlsQ.length) {
    throw new Error(
      `Control points mismatch: ${String(controlsP.length)} sources and ` +
        `${String(controlsQ.length)} destinations`
    );
  }
  if (controlsP.length === 0) {
    throw new Error('At least one control point pair is required');
  }
  for (let i = 0; i < controlsP.length; i++) {
    if (!isFinitePoint(controlsP[i]) || !isFinitePoint(controlsQ[i])) {
      throw new Error(`Control point pair ${String(i)} has a non-finite coordinate`);
    }
  }
}

export function assertAlpha(alpha: number): void {
  if (!Number.isFinite(alpha) || alpha < 0) {
    throw new Error(`Weight exponent alpha must be a finite number >= 0, got ${String(alpha)}`);
  }
}

export function assertQueryPoint(point: Point2D): void {
  if (!isFinitePoint(point)) {
    throw new Error('Query point has a non-finite coordinate');
  }
}
