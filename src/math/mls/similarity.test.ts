import { describe, expect, it } from 'vitest';

import type { Point2D } from '../../types';
import { solveSimilarity } from './similarity';

function similarity(angle: number, s: number, t: Point2D): (p: Point2D) => Point2D {
  const c = Math.cos(angle);
  const n = Math.sin(angle);
  return ([x, y]) => [s * (c * x - n * y) + t[0], s * (n * x + c * y) + t[1]];
}

describe('solveSimilarity', () => {
  it('reproduces a global rotation, scale and translation', () => {
    const transform = similarity(Math.PI / 6, 2, [1, 2]);
    const controlsP: Point2D[] = [[0, 0], [10, 0], [0, 10], [7, 4]];
    const controlsQ = controlsP.map(transform);
    const queries: Point2D[] = [[3, 5], [-2, 8], [15, 15]];
    for (const point of queries) {
      const [x, y] = solveSimilarity(controlsP, controlsQ, point);
      const [ex, ey] = transform(point);
      expect(x).toBeCloseTo(ex, 8);
      expect(y).toBeCloseTo(ey, 8);
    }
  });

  it('scales uniformly where affine would stretch one axis', () => {
    // Sources spread along x only, destinations twice as far apart.
    const [x, y] = solveSimilarity([[0, 0], [10, 0]], [[0, 0], [20, 0]], [5, 5]);
    expect(x).toBeCloseTo(10, 10);
    expect(y).toBeCloseTo(10, 10);
  });

  it('translates everything with a single control pair', () => {
    expect(solveSimilarity([[0, 0]], [[5, 5]], [1, 1])).toEqual([6, 6]);
  });

  it('maps a control point exactly to its destination', () => {
    expect(solveSimilarity([[0, 0], [10, 0], [3, 8]], [[1, 1], [9, 2], [4, 4]], [3, 8])).toEqual([
      4, 4
    ]);
  });
});
