/**
 * Unit tests for raster geometry and the PNG codec.
 */
import { describe, expect, it } from 'vitest';
import { createRaster, crop, decodePng, encodePng, getPixel, paste, resizeBilinear } from '../../services/raster.js';

describe('createRaster', () => {
  it('allocates one byte per channel per pixel', () => {
    expect(createRaster(4, 3, 'RGB').data).toHaveLength(36);
    expect(createRaster(4, 3, 'L').data).toHaveLength(12);
  });

  it('rejects empty or fractional dimensions', () => {
    expect(() => createRaster(0, 1, 'RGB')).toThrow('invalid raster dimensions 0x1');
    expect(() => createRaster(2.5, 1, 'L')).toThrow('invalid raster dimensions 2.5x1');
  });
});

describe('paste', () => {
  it('clips the source at the target edges', () => {
    const target = createRaster(4, 4, 'L');
    const source = createRaster(2, 2, 'L');
    source.data.fill(9);

    paste(target, source, 3, 3);

    expect(getPixel(target, 3, 3)).toEqual([9]);
    expect(getPixel(target, 2, 2)).toEqual([0]);
    expect(Array.from(target.data).filter(v => v === 9)).toHaveLength(1);
  });

  it('refuses to mix modes', () => {
    expect(() => paste(createRaster(2, 2, 'RGB'), createRaster(1, 1, 'L'), 0, 0)).toThrow(
      'cannot paste L raster into RGB raster',
    );
  });
});

describe('crop', () => {
  it('clamps the box to the raster bounds', () => {
    const raster = createRaster(4, 4, 'L');
    raster.data.forEach((_, i) => (raster.data[i] = i));

    const out = crop(raster, -2, -2, 2, 2);

    expect(out.width).toBe(2);
    expect(out.height).toBe(2);
    expect(Array.from(out.data)).toEqual([0, 1, 4, 5]);
  });
});

describe('resizeBilinear', () => {
  it('is the identity at the same size', () => {
    const raster = createRaster(2, 2, 'L');
    raster.data.set([0, 100, 200, 50]);

    expect(Array.from(resizeBilinear(raster, 2, 2).data)).toEqual([0, 100, 200, 50]);
  });

  it('keeps a flat raster flat at any size', () => {
    const raster = createRaster(3, 3, 'RGB');
    raster.data.fill(77);

    const out = resizeBilinear(raster, 7, 5);

    expect(out.width).toBe(7);
    expect(out.height).toBe(5);
    expect(out.data.every(v => v === 77)).toBe(true);
  });
});

describe('PNG codec', () => {
  it('round-trips RGB pixels', () => {
    const raster = createRaster(2, 1, 'RGB');
    raster.data.set([10, 20, 30, 40, 50, 60]);

    const decoded = decodePng(encodePng(raster));

    expect(decoded.width).toBe(2);
    expect(decoded.height).toBe(1);
    expect(Array.from(decoded.data)).toEqual([10, 20, 30, 40, 50, 60]);
  });

  it('writes grayscale rasters as gray pixels', () => {
    const raster = createRaster(1, 1, 'L');
    raster.data.set([120]);

    const [r, g, b] = Array.from(decodePng(encodePng(raster)).data);
    expect(r).toBe(g);
    expect(g).toBe(b);
    // the encoder's gray conversion may truncate by one
    expect(r).toBeGreaterThanOrEqual(119);
    expect(r).toBeLessThanOrEqual(120);
  });

  it('emits a PNG signature', () => {
    const bytes = encodePng(createRaster(1, 1, 'RGB'));
    expect(Array.from(bytes.subarray(0, 4))).toEqual([0x89, 0x50, 0x4e, 0x47]);
  });
});
