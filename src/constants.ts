// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import type { Interpolation, OutsideMode } from './types';

/** Exponent of the inverse-distance weights, w = 1 / |p - v|^(2 * alpha). */
export const DEFAULT_ALPHA = 1;

export const DEFAULT_INTERPOLATION: Interpolation = 'bilinear';
export const DEFAULT_OUTSIDE_MODE: OutsideMode = 'clamp';

// A 2x2 matrix counts as singular when |det| <= SINGULAR_TOLERANCE * (sum of |entries|)^2.
export const SINGULAR_TOLERANCE = 1e-12;

export const PIXEL_MAX_U16 = 65535;
