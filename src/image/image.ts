// SPDX-FileCopyrightText: 2026 Mario Gemoll
// SPDX-License-Identifier: 0BSD

import { PIXEL_MAX_U16 } from '../constants';
import type { Image, PixelArray } from '../types';

export type PixelFormat = 'u8' | 'u16' | 'f32';

export function pixelFormat(data: PixelArray): PixelFormat {
  if (data instanceof Uint8ClampedArray) {
    return 'u8';
  }
  if (data instanceof Uint16Array) {
    return 'u16';
  }
  return 'f32';
}

export function allocatePixels(format: PixelFormat, length: number): PixelArray {
  switch (format) {
    case 'u8':
      return new Uint8ClampedArray(length);
    case 'u16':
      return new Uint16Array(length);
    case 'f32':
      return new Float32Array(length);
  }
}

/** Same as {@link allocatePixels}, backed by a SharedArrayBuffer workers can write to. */
export function allocateSharedPixels(format: PixelFormat, length: number): PixelArray {
  switch (format) {
    case 'u8':
      return new Uint8ClampedArray(new SharedArrayBuffer(length));
    case 'u16':
      return new Uint16Array(new SharedArrayBuffer(length * Uint16Array.BYTES_PER_ELEMENT));
    case 'f32':
      return new Float32Array(new SharedArrayBuffer(length * Float32Array.BYTES_PER_ELEMENT));
  }
}

export function makeImage(
  width: number,
  height: number,
  channels: number,
  format: PixelFormat = 'u8'
): Image {
  assertDimensions(width, height, channels);
  return { width, height, channels, data: allocatePixels(format, width * height * channels) };
}

export function shareImage(image: Image): Image {
  const data = allocateSharedPixels(pixelFormat(image.data), image.data.length);
  data.set(image.data);
  return { ...image, data };
}

function assertDimensions(width: number, height: number, channels: number): void {
  for (const [name, value] of [['width', width], ['height', height], ['channels', channels]] as const) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`Image ${name} must be a positive integer, got ${String(value)}`);
    }
  }
}

export function assertImage(image: Image): void {
  const { width, height, channels, data } = image;
  assertDimensions(width, height, channels);
  if (data.length !== width * height * channels) {
    throw new Error(
      `Image buffer holds ${String(data.length)} samples, expected ` +
        `${String(width)} x ${String(height)} x ${String(channels)}`
    );
  }
}

/**
 * Stores a sample, rounding and clamping it for the integer formats.
 * Uint8ClampedArray clamps on its own.
 */
export function writeSample(data: PixelArray, index: number, value: number): void {
  if (data instanceof Float32Array) {
    data[index] = value;
  } else if (data instanceof Uint16Array) {
    data[index] = Math.min(PIXEL_MAX_U16, Math.max(0, Math.round(value)));
  } else {
    data[index] = Math.round(value);
  }
}

export function getPixel(image: Image, x: number, y: number): number[] {
  const { width, height, channels, data } = image;
  if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= width || y >= height) {
    throw new Error(`Pixel (${String(x)}, ${String(y)}) is outside the image`);
  }
  const offset = (y * width + x) * channels;
  return Array.from(data.subarray(offset, offset + channels));
}

export function setPixel(image: Image, x: number, y: number, value: readonly number[]): void {
  const { width, height, channels, data } = image;
  if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= width || y >= height) {
    throw new Error(`Pixel (${String(x)}, ${String(y)}) is outside the image`);
  }
  if (value.length !== channels) {
    throw new Error(`Pixel value needs ${String(channels)} channels, got ${String(value.length)}`);
  }
  const offset = (y * width + x) * channels;
  for (let c = 0; c < channels; c++) {
    writeSample(data, offset + c, value[c]);
  }
}
