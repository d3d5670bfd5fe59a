// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import { parentPort, workerData } from 'node:worker_threads';

import { makeDeformation } from '../math/mls/index';
import type { WarpTask } from './parallel';
import { fillRows } from './warp-plan';

// Posted by runWorker in ./parallel; the rows land in the shared target buffer.
const { plan, rowStart, rowEnd, target }: WarpTask = workerData;
const deformation = makeDeformation(plan.deformation.kind, plan.deformation.alpha);

fillRows(plan, deformation, rowStart, rowEnd, target);
parentPort?.postMessage('done');
