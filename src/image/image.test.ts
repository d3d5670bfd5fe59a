import { describe, expect, it } from 'vitest';

import {
  allocateSharedPixels,
  assertImage,
  getPixel,
  makeImage,
  pixelFormat,
  setPixel,
  shareImage,
  writeSample
} from './image';

describe('makeImage', () => {
  it('allocates a zeroed buffer of the requested format', () => {
    const image = makeImage(3, 2, 4, 'u16');
    expect(image.data).toBeInstanceOf(Uint16Array);
    expect(image.data).toHaveLength(24);
    expect(Array.from(image.data).every((v) => v === 0)).toBe(true);
    expect(pixelFormat(image.data)).toBe('u16');
  });

  it('defaults to 8-bit samples', () => {
    expect(makeImage(1, 1, 3).data).toBeInstanceOf(Uint8ClampedArray);
  });

  it('rejects invalid dimensions', () => {
    expect(() => makeImage(0, 2, 3)).toThrow('Image width must be a positive integer, got 0');
    expect(() => makeImage(2, 1.5, 3)).toThrow('Image height must be a positive integer, got 1.5');
  });
});

describe('assertImage', () => {
  it('rejects a buffer that does not match the dimensions', () => {
    const image = { width: 2, height: 2, channels: 1, data: new Float32Array(5) };
    expect(() => assertImage(image)).toThrow('Image buffer holds 5 samples, expected 2 x 2 x 1');
  });
});

describe('writeSample', () => {
  it('rounds and clamps 16-bit samples', () => {
    const data = new Uint16Array(3);
    writeSample(data, 0, 70000);
    writeSample(data, 1, -5);
    writeSample(data, 2, 1.6);
    expect(Array.from(data)).toEqual([65535, 0, 2]);
  });

  it('rounds halves upwards', () => {
    const data = new Uint16Array(2);
    writeSample(data, 0, 0.5);
    writeSample(data, 1, 2.5);
    expect(Array.from(data)).toEqual([1, 3]);
  });

  it('rounds and clamps 8-bit samples', () => {
    const data = new Uint8ClampedArray(3);
    writeSample(data, 0, 300);
    writeSample(data, 1, -1);
    writeSample(data, 2, 2.5);
    expect(Array.from(data)).toEqual([255, 0, 3]);
  });

  it('stores float samples unchanged', () => {
    const data = new Float32Array(1);
    writeSample(data, 0, -0.25);
    expect(data[0]).toBe(-0.25);
  });
});

describe('pixel access', () => {
  it('reads back what was written', () => {
    const image = makeImage(3, 2, 3);
    setPixel(image, 2, 1, [10, 20, 30]);
    expect(getPixel(image, 2, 1)).toEqual([10, 20, 30]);
    expect(Array.from(image.data.subarray(15, 18))).toEqual([10, 20, 30]);
  });

  it('rejects coordinates outside the image', () => {
    const image = makeImage(3, 2, 1);
    expect(() => getPixel(image, 3, 0)).toThrow('Pixel (3, 0) is outside the image');
    expect(() => setPixel(image, 0, 0, [1, 2])).toThrow('Pixel value needs 1 channels, got 2');
  });
});

describe('shared buffers', () => {
  it('copies an image into shared memory', () => {
    const image = makeImage(2, 1, 1, 'f32');
    image.data[1] = 0.5;
    const shared = shareImage(image);
    expect(shared.data.buffer).toBeInstanceOf(SharedArrayBuffer);
    expect(shared.data).toBeInstanceOf(Float32Array);
    expect(Array.from(shared.data)).toEqual([0, 0.5]);
  });

  it('sizes shared buffers by sample width', () => {
    expect(allocateSharedPixels('u16', 5).buffer.byteLength).toBe(10);
    expect(allocateSharedPixels('u8', 5)).toBeInstanceOf(Uint8ClampedArray);
  });
});
