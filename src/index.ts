// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

export {
  DEFAULT_ALPHA,
  DEFAULT_INTERPOLATION,
  DEFAULT_OUTSIDE_MODE,
  SINGULAR_TOLERANCE
} from './constants';
export {
  allocatePixels,
  getPixel,
  makeImage,
  pixelFormat,
  type PixelFormat,
  setPixel
} from './image/image';
export {
  type ParallelOptions,
  reverseDenseParallel,
  reverseSparseParallel
} from './image/parallel';
export type { SamplingOptions } from './image/sampling';
export { reverseDense, reverseSparse } from './image/warp';
export { warpImage, type WarpImageOptions } from './image/warp-image';
export {
  assertControlPoints,
  type Deformation,
  DEFORMATION_KINDS,
  type DeformationKind,
  type DeformationSpec,
  DEFORMATIONS,
  deformAffine,
  deformationSpec,
  type DeformFunction,
  deformPoints,
  deformRigid,
  deformSimilarity,
  isDeformationKind,
  makeDeformation
} from './math/mls/index';
export { computeWeights, type WeightResult, weightedCentroids } from './math/mls/weights';
export type { Image, Interpolation, OutsideMode, Pair, PixelArray, Point2D } from './types';
