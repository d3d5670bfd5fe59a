// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import { assertControlPoints, type Deformation, type DeformationSpec } from '../math/mls/index';
import type { Image, Pair, PixelArray, Point2D } from '../types';
import { assertImage } from './image';
import { makeSampler, resolveSampling, type SamplingOptions, type SamplingSettings } from './sampling';

/**
 * Deformed locations on a coarse grid: anchor (u, v) is the reverse mapping of
 * pixel (u * factor, v * factor), stored as xy pairs row by row.
 */
export interface AnchorGrid {
  factor: number;
  columns: number;
  rows: number;
  xy: Float64Array;
}

/**
 * Everything needed to compute any output pixel. Plain data, so it can be
 * handed to a worker as is.
 */
export interface WarpPlan {
  source: Image;
  /** Destination controls; the reverse mapping starts from them. */
  controlsP: Point2D[];
  /** Source controls; where the reverse mapping lands. */
  controlsQ: Point2D[];
  deformation: DeformationSpec;
  sampling: SamplingSettings;
  anchors: AnchorGrid | null;
}

export interface WarpPlanOptions extends SamplingOptions {
  /** Evaluate the deformation only every `subresolution` pixels. */
  subresolution?: number;
}

function copyPoints(points: readonly Point2D[]): Point2D[] {
  return points.map(([x, y]) => [x, y]);
}

export function makeWarpPlan(
  source: Image,
  controlsSrc: readonly Point2D[],
  controlsDst: readonly Point2D[],
  deformation: Deformation,
  options: WarpPlanOptions = {}
): WarpPlan {
  const { subresolution, ...samplingOptions } = options;
  assertImage(source);
  assertControlPoints(controlsSrc, controlsDst);
  const sampling = resolveSampling(source, samplingOptions);

  const controlsP = copyPoints(controlsDst);
  const controlsQ = copyPoints(controlsSrc);
  const anchors =
    subresolution === undefined
      ? null
      : makeAnchorGrid(source.width, source.height, subresolution, (point) =>
          deformation.evaluate(controlsP, controlsQ, point)
        );

  return {
    source,
    controlsP,
    controlsQ,
    deformation: { kind: deformation.kind, alpha: deformation.alpha },
    sampling,
    anchors
  };
}

export function makeAnchorGrid(
  width: number,
  height: number,
  factor: number,
  locate: (point: Point2D) => Point2D
): AnchorGrid {
  if (!Number.isInteger(factor) || factor <= 0) {
    throw new Error(`Subresolution factor must be a positive integer, got ${String(factor)}`);
  }
  // One anchor past the last pixel in each direction, so every pixel has four corners.
  const columns = Math.floor((width - 1) / factor) + 2;
  const rows = Math.floor((height - 1) / factor) + 2;
  const xy = new Float64Array(columns * rows * 2);
  for (let v = 0; v < rows; v++) {
    for (let u = 0; u < columns; u++) {
      const [x, y] = locate([u * factor, v * factor]);
      const k = (v * columns + u) * 2;
      xy[k] = x;
      xy[k + 1] = y;
    }
  }
  return { factor, columns, rows, xy };
}

/** Bilinear blend of the four anchors around pixel (x, y). */
export function interpolateAnchors(grid: AnchorGrid, x: number, y: number): Point2D {
  const { factor, columns, xy } = grid;
  const u = Math.floor(x / factor);
  const v = Math.floor(y / factor);
  const fx = (x - u * factor) / factor;
  const fy = (y - v * factor) / factor;
  const tl = (v * columns + u) * 2;
  const tr = tl + 2;
  const bl = tl + columns * 2;
  const br = bl + 2;
  const wtl = (1 - fx) * (1 - fy);
  const wtr = fx * (1 - fy);
  const wbl = (1 - fx) * fy;
  const wbr = fx * fy;
  return [
    wtl * xy[tl] + wtr * xy[tr] + wbl * xy[bl] + wbr * xy[br],
    wtl * xy[tl + 1] + wtr * xy[tr + 1] + wbl * xy[bl + 1] + wbr * xy[br + 1]
  ];
}

/**
 * Computes output rows [rowStart, rowEnd) into `target`, which has the
 * source's dimensions. Pixels are independent, so disjoint row ranges can be
 * filled concurrently.
 */
export function fillRows(
  plan: WarpPlan,
  deformation: Deformation,
  rowStart: number,
  rowEnd: number,
  target: PixelArray
): void {
  const { source, controlsP, controlsQ, anchors } = plan;
  const { width, channels } = source;
  const sample = makeSampler(source, plan.sampling);

  for (let y = rowStart; y < rowEnd; y++) {
    for (let x = 0; x < width; x++) {
      const [sx, sy] = anchors
        ? interpolateAnchors(anchors, x, y)
        : deformation.evaluate(controlsP, controlsQ, [x, y]);
      sample(sx, sy, target, (y * width + x) * channels);
    }
  }
}

/** Splits [0, height) into at most `parts` contiguous, near-equal row ranges. */
export function partitionRows(height: number, parts: number): Pair<number>[] {
  const count = Math.max(1, Math.min(height, Math.floor(parts)));
  const bands: Pair<number>[] = [];
  for (let i = 0; i < count; i++) {
    const start = Math.floor((i * height) / count);
    const end = Math.floor(((i + 1) * height) / count);
    if (end > start) {
      bands.push([start, end]);
    }
  }
  return bands;
}
