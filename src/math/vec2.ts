// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import type { Point2D } from '../types';

export function add(a: Point2D, b: Point2D): Point2D {
  return [a[0] + b[0], a[1] + b[1]];
}

export function sub(a: Point2D, b: Point2D): Point2D {
  return [a[0] - b[0], a[1] - b[1]];
}

export function scale(a: Point2D, s: number): Point2D {
  return [a[0] * s, a[1] * s];
}

export function dot(a: Point2D, b: Point2D): number {
  return a[0] * b[0] + a[1] * b[1];
}

// Rotated by 90 degrees counter-clockwise.
export function perp(a: Point2D): Point2D {
  return [-a[1], a[0]];
}

export function sqrNorm(a: Point2D): number {
  return a[0] * a[0] + a[1] * a[1];
}

export function norm(a: Point2D): number {
  return Math.hypot(a[0], a[1]);
}
