// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import type { Deformation } from '../math/mls/index';
import type { Image, Point2D } from '../types';
import { type ParallelOptions, runPlanParallel } from './parallel';
import type { SamplingOptions } from './sampling';
import { runPlan } from './warp';
import { makeWarpPlan } from './warp-plan';

export interface WarpImageOptions extends SamplingOptions, ParallelOptions {
  /** Spread the rows over worker threads. */
  parallel?: boolean;
  /** Evaluate the deformation on a sparse grid, see reverseSparse. */
  subresolution?: number;
  /** Log start and duration to the console. */
  verbose?: boolean;
}

let warpId = 0;

export async function warpImage(
  image: Image,
  controlsSrc: readonly Point2D[],
  controlsDst: readonly Point2D[],
  deformation: Deformation,
  options: WarpImageOptions = {}
): Promise<Image> {
  const { parallel = false, threads, subresolution, verbose = false, ...sampling } = options;
  const currentWarpId = ++warpId;
  const startTime = performance.now();

  const plan = makeWarpPlan(image, controlsSrc, controlsDst, deformation, {
    ...sampling,
    subresolution
  });
  if (verbose) {
    const mode = subresolution === undefined ? 'dense' : `sparse (1/${String(subresolution)})`;
    console.log(
      `[Warp #${String(currentWarpId)}] Starting ${mode} ${deformation.kind} warp of ` +
        `${String(image.width)}x${String(image.height)} with ${String(controlsSrc.length)} controls` +
        (parallel ? ' on worker threads' : '')
    );
  }

  const result = parallel
    ? await runPlanParallel(plan, deformation, threads)
    : runPlan(plan, deformation);

  if (verbose) {
    const duration = (performance.now() - startTime).toFixed(2);
    console.log(`[Warp #${String(currentWarpId)}] Finished in ${duration}ms`);
  }
  return result;
}
