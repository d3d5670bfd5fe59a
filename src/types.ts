// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

export type Pair<T> = [T, T];

export type Point2D = Pair<number>;

/**
 * Sample storage of an image. 8-bit and 16-bit samples are rounded and clamped
 * to their range when written, float samples are stored as they are.
 */
export type PixelArray = Uint8ClampedArray | Uint16Array | Float32Array;

/**
 * Interleaved, row-major image buffer: the sample for channel `c` of pixel
 * `(x, y)` lives at `(y * width + x) * channels + c`.
 */
export interface Image {
  width: number;
  height: number;
  channels: number;
  data: PixelArray;
}

export type Interpolation = 'bilinear' | 'nearest';

/** What a sample location outside the source image resolves to. */
export type OutsideMode = 'clamp' | 'fill';
