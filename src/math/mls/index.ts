// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import { DEFAULT_ALPHA } from '../../constants';
import type { Point2D } from '../../types';
import { solveAffine } from './affine';
import { assertAlpha, assertControlPoints, assertQueryPoint } from './controls';
import { solveRigid } from './rigid';
import { solveSimilarity } from './similarity';

export type DeformationKind = 'affine' | 'similarity' | 'rigid';

/** Unchecked solver: callers validate the controls once beforehand. */
export type Solver = (
  controlsP: readonly Point2D[],
  controlsQ: readonly Point2D[],
  point: Point2D,
  alpha: number
) => Point2D;

export interface DeformationDefinition {
  displayName: string;
  solve: Solver;
}

export const DEFORMATIONS: Record<DeformationKind, DeformationDefinition> = {
  affine: {
    displayName: 'Affine (linear map + translation)',
    solve: solveAffine
  },
  similarity: {
    displayName: 'Similarity (rotation + uniform scale + translation)',
    solve: solveSimilarity
  },
  rigid: {
    displayName: 'Rigid (rotation + translation)',
    solve: solveRigid
  }
};

export const DEFORMATION_KINDS: DeformationKind[] = ['affine', 'similarity', 'rigid'];

export function isDeformationKind(value: string): value is DeformationKind {
  return Object.prototype.hasOwnProperty.call(DEFORMATIONS, value);
}

/** Plain-data description of a deformation, safe to post to a worker. */
export interface DeformationSpec {
  kind: DeformationKind;
  alpha: number;
}

export interface Deformation extends DeformationSpec {
  /** Does not validate its inputs, see {@link assertControlPoints}. */
  evaluate(controlsP: readonly Point2D[], controlsQ: readonly Point2D[], point: Point2D): Point2D;
}

// Evaluators built by makeDeformation, with the parameters they close over.
const builtEvaluators = new WeakMap<Deformation['evaluate'], DeformationSpec>();

export function makeDeformation(kind: DeformationKind, alpha = DEFAULT_ALPHA): Deformation {
  if (!isDeformationKind(kind)) {
    throw new Error(`Unknown deformation kind "${String(kind)}"`);
  }
  assertAlpha(alpha);
  const { solve } = DEFORMATIONS[kind];
  const evaluate: Deformation['evaluate'] = (controlsP, controlsQ, point) =>
    solve(controlsP, controlsQ, point, alpha);
  builtEvaluators.set(evaluate, { kind, alpha });
  return { kind, alpha, evaluate };
}

/**
 * The plain-data form a worker rebuilds `deformation` from. Only deformations
 * from {@link makeDeformation} have one: a replaced `evaluate`, or a `kind` or
 * `alpha` changed after construction, throws.
 */
export function deformationSpec(deformation: Deformation): DeformationSpec {
  const spec = builtEvaluators.get(deformation.evaluate);
  if (spec === undefined || spec.kind !== deformation.kind || spec.alpha !== deformation.alpha) {
    throw new Error(
      `Deformation "${String(deformation.kind)}" was not built by makeDeformation ` +
        'and cannot run on worker threads'
    );
  }
  return { kind: spec.kind, alpha: spec.alpha };
}

export type DeformFunction = (
  controlsP: readonly Point2D[],
  controlsQ: readonly Point2D[],
  point: Point2D,
  alpha?: number
) => Point2D;

function checked(kind: DeformationKind): DeformFunction {
  const { solve } = DEFORMATIONS[kind];
  return (
    controlsP: readonly Point2D[],
    controlsQ: readonly Point2D[],
    point: Point2D,
    alpha = DEFAULT_ALPHA
  ) => {
    assertControlPoints(controlsP, controlsQ);
    assertQueryPoint(point);
    assertAlpha(alpha);
    return solve(controlsP, controlsQ, point, alpha);
  };
}

/**
 * Moves `point` along with the deformation that takes the controls `controlsP`
 * to `controlsQ`, using a locally affine transform. A query equal to
 * `controlsP[i]` maps exactly to `controlsQ[i]`.
 */
export const deformAffine = checked('affine');

/** Like {@link deformAffine}, with a locally similar transform. */
export const deformSimilarity = checked('similarity');

/** Like {@link deformAffine}, with a locally rigid transform. */
export const deformRigid = checked('rigid');

export function deformPoints(
  deformation: Deformation,
  controlsP: readonly Point2D[],
  controlsQ: readonly Point2D[],
  points: readonly Point2D[]
): Point2D[] {
  assertControlPoints(controlsP, controlsQ);
  points.forEach(assertQueryPoint);
  return points.map((point) => deformation.evaluate(controlsP, controlsQ, point));
}

export { assertAlpha, assertControlPoints } from './controls';
