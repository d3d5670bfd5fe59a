// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import type { Deformation } from '../math/mls/index';
import type { Image, Point2D } from '../types';
import { allocatePixels, pixelFormat } from './image';
import type { SamplingOptions } from './sampling';
import { fillRows, makeWarpPlan, type WarpPlan } from './warp-plan';

export function runPlan(plan: WarpPlan, deformation: Deformation): Image {
  const { width, height, channels, data } = plan.source;
  const target = allocatePixels(pixelFormat(data), width * height * channels);
  fillRows(plan, deformation, 0, height, target);
  return { width, height, channels, data: target };
}

/**
 * Warps `image` so that the content at `controlsSrc[i]` ends up at
 * `controlsDst[i]`.
 *
 * Every output pixel is reverse mapped: the deformation is evaluated with
 * the control roles swapped to find where in the source it comes from, and
 * the source is sampled there. The output has the dimensions, channel count
 * and sample type of the input.
 */
export function reverseDense(
  image: Image,
  controlsSrc: readonly Point2D[],
  controlsDst: readonly Point2D[],
  deformation: Deformation,
  options: SamplingOptions = {}
): Image {
  const plan = makeWarpPlan(image, controlsSrc, controlsDst, deformation, options);
  return runPlan(plan, deformation);
}

/**
 * Like {@link reverseDense}, but the deformation is only evaluated on a grid
 * every `subresolution` pixels and interpolated bilinearly in between. With
 * many control points this is much faster at little visible cost.
 */
export function reverseSparse(
  image: Image,
  controlsSrc: readonly Point2D[],
  controlsDst: readonly Point2D[],
  subresolution: number,
  deformation: Deformation,
  options: SamplingOptions = {}
): Image {
  const plan = makeWarpPlan(image, controlsSrc, controlsDst, deformation, {
    ...options,
    subresolution
  });
  return runPlan(plan, deformation);
}
