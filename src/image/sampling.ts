// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import { DEFAULT_INTERPOLATION, DEFAULT_OUTSIDE_MODE } from '../constants';
import type { Image, Interpolation, OutsideMode, PixelArray } from '../types';
import { writeSample } from './image';

export interface SamplingOptions {
  interpolation?: Interpolation;
  outside?: OutsideMode;
  /** One value per channel, used for 'fill' and for NaN locations. Defaults to zeros. */
  background?: readonly number[];
}

export interface SamplingSettings {
  interpolation: Interpolation;
  outside: OutsideMode;
  background: number[];
}

export function resolveSampling(image: Image, options: SamplingOptions = {}): SamplingSettings {
  const {
    interpolation = DEFAULT_INTERPOLATION,
    outside = DEFAULT_OUTSIDE_MODE,
    background = new Array<number>(image.channels).fill(0)
  } = options;
  if (interpolation !== 'bilinear' && interpolation !== 'nearest') {
    throw new Error(`Unknown interpolation "${String(interpolation)}"`);
  }
  if (outside !== 'clamp' && outside !== 'fill') {
    throw new Error(`Unknown outside mode "${String(outside)}"`);
  }
  if (background.length !== image.channels) {
    throw new Error(
      `Background needs ${String(image.channels)} channels, got ${String(background.length)}`
    );
  }
  return { interpolation, outside, background: [...background] };
}

/** Writes the image's channels at (x, y) into `target` starting at `offset`. */
export type Sampler = (x: number, y: number, target: PixelArray, offset: number) => void;

export function makeSampler(image: Image, settings: SamplingSettings): Sampler {
  const { width, height, channels, data } = image;
  const { interpolation, outside, background } = settings;
  const maxX = width - 1;
  const maxY = height - 1;

  const writeBackground = (target: PixelArray, offset: number): void => {
    for (let c = 0; c < channels; c++) {
      writeSample(target, offset + c, background[c]);
    }
  };

  const nearest: Sampler = (x, y, target, offset) => {
    const px = Math.min(maxX, Math.max(0, Math.round(x)));
    const py = Math.min(maxY, Math.max(0, Math.round(y)));
    const k = (py * width + px) * channels;
    for (let c = 0; c < channels; c++) {
      writeSample(target, offset + c, data[k + c]);
    }
  };

  const bilinear: Sampler = (x, y, target, offset) => {
    const cx = Math.min(maxX, Math.max(0, x));
    const cy = Math.min(maxY, Math.max(0, y));
    const x0 = Math.floor(cx);
    const y0 = Math.floor(cy);
    const x1 = Math.min(maxX, x0 + 1);
    const y1 = Math.min(maxY, y0 + 1);
    const dx = cx - x0;
    const dy = cy - y0;
    const p00 = (y0 * width + x0) * channels;
    const p10 = (y0 * width + x1) * channels;
    const p01 = (y1 * width + x0) * channels;
    const p11 = (y1 * width + x1) * channels;
    for (let c = 0; c < channels; c++) {
      const v =
        (1 - dx) * (1 - dy) * data[p00 + c] +
        dx * (1 - dy) * data[p10 + c] +
        (1 - dx) * dy * data[p01 + c] +
        dx * dy * data[p11 + c];
      writeSample(target, offset + c, v);
    }
  };

  const sample = interpolation === 'nearest' ? nearest : bilinear;

  return (x, y, target, offset) => {
    if (Number.isNaN(x) || Number.isNaN(y)) {
      writeBackground(target, offset);
      return;
    }
    if (outside === 'fill' && (x < 0 || y < 0 || x > maxX || y > maxY)) {
      writeBackground(target, offset);
      return;
    }
    sample(x, y, target, offset);
  };
}
