import { describe, expect, it } from 'vitest';

import { DEFORMATION_KINDS, makeDeformation } from '../math/mls/index';
import type { Image, Point2D } from '../types';
import { makeImage } from './image';
import { reverseDense, reverseSparse } from './warp';
import { makeAnchorGrid, partitionRows } from './warp-plan';

function gradientImage(width: number, height: number, channels: number): Image {
  const image = makeImage(width, height, channels);
  for (let i = 0; i < image.data.length; i++) {
    image.data[i] = (i * 37 + 11) % 256;
  }
  return image;
}

const corners: Point2D[] = [[0, 0], [5, 0], [0, 3], [5, 3]];

describe('reverseDense', () => {
  for (const kind of DEFORMATION_KINDS) {
    it(`returns the input for identity controls (${kind})`, () => {
      const image = gradientImage(6, 4, 3);
      const warped = reverseDense(image, corners, corners, makeDeformation(kind));
      expect(warped.data).toEqual(image.data);
    });
  }

  it('keeps dimensions, channels and sample type', () => {
    const image = makeImage(7, 5, 2, 'u16');
    const warped = reverseDense(image, [[1, 1], [5, 4]], [[2, 1], [5, 3]], makeDeformation('rigid'));
    expect(warped.width).toBe(7);
    expect(warped.height).toBe(5);
    expect(warped.channels).toBe(2);
    expect(warped.data).toBeInstanceOf(Uint16Array);
    expect(warped.data).toHaveLength(70);
  });

  it('moves content from the source control to the destination control', () => {
    const image: Image = { width: 3, height: 1, channels: 1, data: new Float32Array([10, 20, 30]) };
    const shift = makeDeformation('affine');
    const filled = reverseDense(image, [[0, 0]], [[1, 0]], shift, {
      outside: 'fill',
      background: [0]
    });
    expect(Array.from(filled.data)).toEqual([0, 10, 20]);
    const clamped = reverseDense(image, [[0, 0]], [[1, 0]], shift);
    expect(Array.from(clamped.data)).toEqual([10, 10, 20]);
  });

  it('does not modify the source image', () => {
    const image = gradientImage(4, 4, 1);
    const before = Array.from(image.data);
    reverseDense(image, [[0, 0], [3, 3]], [[1, 0], [3, 2]], makeDeformation('similarity'));
    expect(Array.from(image.data)).toEqual(before);
  });

  it('validates before warping', () => {
    const image = gradientImage(2, 2, 1);
    expect(() => reverseDense(image, [], [], makeDeformation('affine'))).toThrow(
      'At least one control point pair is required'
    );
    expect(() =>
      reverseDense({ ...image, width: 3 }, corners, corners, makeDeformation('affine'))
    ).toThrow('Image buffer holds 4 samples, expected 3 x 2 x 1');
  });
});

describe('reverseSparse', () => {
  const controlsSrc: Point2D[] = [[1, 1], [8, 2], [3, 6]];
  const controlsDst: Point2D[] = [[2, 1], [7, 3], [3, 5]];

  it('equals the dense warp with a factor of 1', () => {
    const image = gradientImage(10, 8, 3);
    const deformation = makeDeformation('rigid');
    const dense = reverseDense(image, controlsSrc, controlsDst, deformation);
    const sparse = reverseSparse(image, controlsSrc, controlsDst, 1, deformation);
    expect(sparse.data).toEqual(dense.data);
  });

  it('returns the input for identity controls', () => {
    const image = gradientImage(9, 7, 1);
    const warped = reverseSparse(image, corners, corners, 4, makeDeformation('similarity'));
    expect(warped.data).toEqual(image.data);
  });

  it('rejects a non-integer factor', () => {
    const image = gradientImage(4, 4, 1);
    expect(() => reverseSparse(image, corners, corners, 0, makeDeformation('affine'))).toThrow(
      'Subresolution factor must be a positive integer, got 0'
    );
    expect(() => reverseSparse(image, corners, corners, 2.5, makeDeformation('affine'))).toThrow(
      'Subresolution factor must be a positive integer, got 2.5'
    );
  });
});

describe('makeAnchorGrid', () => {
  it('covers the image with one extra anchor per direction', () => {
    const grid = makeAnchorGrid(5, 3, 2, ([x, y]) => [x + 0.5, y]);
    expect(grid.columns).toBe(4);
    expect(grid.rows).toBe(3);
    expect(Array.from(grid.xy.subarray(0, 8))).toEqual([0.5, 0, 2.5, 0, 4.5, 0, 6.5, 0]);
  });
});

describe('partitionRows', () => {
  it('splits rows into contiguous bands', () => {
    expect(partitionRows(10, 3)).toEqual([[0, 3], [3, 6], [6, 10]]);
    expect(partitionRows(5, 1)).toEqual([[0, 5]]);
  });

  it('never creates more bands than rows', () => {
    expect(partitionRows(2, 8)).toEqual([[0, 1], [1, 2]]);
  });
});
