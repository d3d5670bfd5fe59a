// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import { availableParallelism } from 'node:os';
import { Worker } from 'node:worker_threads';

import { type Deformation, deformationSpec } from '../math/mls/index';
import type { Image, PixelArray, Point2D } from '../types';
import { allocatePixels, allocateSharedPixels, pixelFormat, shareImage } from './image';
import type { SamplingOptions } from './sampling';
import { runPlan } from './warp';
import { makeWarpPlan, partitionRows, type WarpPlan } from './warp-plan';

/** One row band of a warp, as posted to a worker. */
export interface WarpTask {
  plan: WarpPlan;
  rowStart: number;
  rowEnd: number;
  target: PixelArray;
}

export interface ParallelOptions {
  /** Number of workers; defaults to the available parallelism. */
  threads?: number;
}

const WORKER_URL = new URL('./warp-worker.ts', import.meta.url);

// Registers the tsx loader inside the worker, then loads the TypeScript entry.
const WORKER_BOOTSTRAP = `
import('tsx/esm/api').then(({ register }) => {
  register();
  return import(${JSON.stringify(WORKER_URL.href)});
});
`;

function resolveThreads(threads: number | undefined): number {
  if (threads === undefined) {
    return availableParallelism();
  }
  if (!Number.isInteger(threads) || threads <= 0) {
    throw new Error(`Thread count must be a positive integer, got ${String(threads)}`);
  }
  return threads;
}

function runWorker(task: WarpTask): Promise<void> {
  return new Promise((resolve, reject) => {
    const worker = new Worker(WORKER_BOOTSTRAP, { eval: true, workerData: task });
    let finished = false;
    worker.once('message', () => {
      finished = true;
      worker.terminate().then(() => resolve(), reject);
    });
    worker.once('error', reject);
    worker.once('exit', (code) => {
      if (!finished) {
        reject(
          new Error(
            `Warp worker for rows ${String(task.rowStart)}-${String(task.rowEnd)} ` +
              `exited with code ${String(code)} before finishing`
          )
        );
      }
    });
  });
}

/**
 * Runs a plan with one worker per row band. Source and target live in shared
 * memory and every worker writes its own rows, so nothing needs locking; the
 * result equals {@link runPlan}. Workers rebuild the deformation from
 * {@link deformationSpec}, so it must come from makeDeformation.
 */
export async function runPlanParallel(
  plan: WarpPlan,
  deformation: Deformation,
  threads?: number
): Promise<Image> {
  const spec = deformationSpec(deformation);
  const { width, height, channels, data } = plan.source;
  const bands = partitionRows(height, resolveThreads(threads));
  if (bands.length <= 1) {
    return runPlan(plan, deformation);
  }

  const format = pixelFormat(data);
  const length = width * height * channels;
  const sharedPlan: WarpPlan = { ...plan, source: shareImage(plan.source), deformation: spec };
  const target = allocateSharedPixels(format, length);

  await Promise.all(
    bands.map(([rowStart, rowEnd]) => runWorker({ plan: sharedPlan, rowStart, rowEnd, target }))
  );

  const result = allocatePixels(format, length);
  result.set(target);
  return { width, height, channels, data: result };
}

/** {@link reverseDense} spread over worker threads. */
export async function reverseDenseParallel(
  image: Image,
  controlsSrc: readonly Point2D[],
  controlsDst: readonly Point2D[],
  deformation: Deformation,
  options: SamplingOptions & ParallelOptions = {}
): Promise<Image> {
  const { threads, ...sampling } = options;
  const plan = makeWarpPlan(image, controlsSrc, controlsDst, deformation, sampling);
  return runPlanParallel(plan, deformation, threads);
}

/** {@link reverseSparse} spread over worker threads. */
export async function reverseSparseParallel(
  image: Image,
  controlsSrc: readonly Point2D[],
  controlsDst: readonly Point2D[],
  subresolution: number,
  deformation: Deformation,
  options: SamplingOptions & ParallelOptions = {}
): Promise<Image> {
  const { threads, ...sampling } = options;
  const plan = makeWarpPlan(image, controlsSrc, controlsDst, deformation, {
    ...sampling,
    subresolution
  });
  return runPlanParallel(plan, deformation, threads);
}
