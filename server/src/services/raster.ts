import { PNG } from 'pngjs';

// ─── Types ───────────────────────────────────────────────────────────────────

/** RGB = 3 interleaved channels, L = single 8-bit luminance channel. */
export type RasterMode = 'RGB' | 'L';

export interface Raster {
  width: number;
  height: number;
  mode: RasterMode;
  data: Uint8Array;
}

// ─── Construction ────────────────────────────────────────────────────────────

export function channelCount(mode: RasterMode): number {
  return mode === 'RGB' ? 3 : 1;
}

export function createRaster(width: number, height: number, mode: RasterMode): Raster {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`invalid raster dimensions ${width}x${height}`);
  }
  return { width, height, mode, data: new Uint8Array(width * height * channelCount(mode)) };
}

export function getPixel(raster: Raster, x: number, y: number): number[] {
  const channels = channelCount(raster.mode);
  const offset = (y * raster.width + x) * channels;
  return Array.from(raster.data.subarray(offset, offset + channels));
}

// ─── Geometry ────────────────────────────────────────────────────────────────

/** Copy `source` into `target` with its top-left corner at (left, top), clipped to the target. */
export function paste(target: Raster, source: Raster, left: number, top: number): void {
  if (target.mode !== source.mode) {
    throw new Error(`cannot paste ${source.mode} raster into ${target.mode} raster`);
  }
  const channels = channelCount(target.mode);
  for (let sy = 0; sy < source.height; sy++) {
    const ty = top + sy;
    if (ty < 0 || ty >= target.height) continue;
    for (let sx = 0; sx < source.width; sx++) {
      const tx = left + sx;
      if (tx < 0 || tx >= target.width) continue;
      const from = (sy * source.width + sx) * channels;
      const to = (ty * target.width + tx) * channels;
      for (let c = 0; c < channels; c++) target.data[to + c] = source.data[from + c];
    }
  }
}

/** Crop the half-open box [left, right) × [top, bottom), clamped to the raster bounds. */
export function crop(raster: Raster, left: number, top: number, right: number, bottom: number): Raster {
  const x0 = Math.max(0, left);
  const y0 = Math.max(0, top);
  const x1 = Math.min(raster.width, right);
  const y1 = Math.min(raster.height, bottom);
  const out = createRaster(x1 - x0, y1 - y0, raster.mode);
  const channels = channelCount(raster.mode);
  const rowBytes = out.width * channels;
  for (let y = 0; y < out.height; y++) {
    const from = ((y0 + y) * raster.width + x0) * channels;
    out.data.set(raster.data.subarray(from, from + rowBytes), y * rowBytes);
  }
  return out;
}

/** Bilinear resample with pixel-center alignment; edge samples clamp. */
export function resizeBilinear(raster: Raster, width: number, height: number): Raster {
  const out = createRaster(width, height, raster.mode);
  const channels = channelCount(raster.mode);
  const scaleX = raster.width / width;
  const scaleY = raster.height / height;

  for (let y = 0; y < height; y++) {
    const sy = clamp((y + 0.5) * scaleY - 0.5, 0, raster.height - 1);
    const y0 = Math.floor(sy);
    const y1 = Math.min(y0 + 1, raster.height - 1);
    const fy = sy - y0;

    for (let x = 0; x < width; x++) {
      const sx = clamp((x + 0.5) * scaleX - 0.5, 0, raster.width - 1);
      const x0 = Math.floor(sx);
      const x1 = Math.min(x0 + 1, raster.width - 1);
      const fx = sx - x0;

      const i00 = (y0 * raster.width + x0) * channels;
      const i10 = (y0 * raster.width + x1) * channels;
      const i01 = (y1 * raster.width + x0) * channels;
      const i11 = (y1 * raster.width + x1) * channels;
      const o = (y * width + x) * channels;

      for (let c = 0; c < channels; c++) {
        const top = raster.data[i00 + c] * (1 - fx) + raster.data[i10 + c] * fx;
        const bottom = raster.data[i01 + c] * (1 - fx) + raster.data[i11 + c] * fx;
        out.data[o + c] = Math.round(top * (1 - fy) + bottom * fy);
      }
    }
  }
  return out;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

// ─── PNG Codec ───────────────────────────────────────────────────────────────

export function encodePng(raster: Raster): Buffer {
  const png = new PNG({ width: raster.width, height: raster.height });
  const pixels = raster.width * raster.height;

  for (let i = 0; i < pixels; i++) {
    const o = i * 4;
    if (raster.mode === 'RGB') {
      png.data[o] = raster.data[i * 3];
      png.data[o + 1] = raster.data[i * 3 + 1];
      png.data[o + 2] = raster.data[i * 3 + 2];
    } else {
      png.data[o] = png.data[o + 1] = png.data[o + 2] = raster.data[i];
    }
    png.data[o + 3] = 255;
  }

  return PNG.sync.write(png, { colorType: raster.mode === 'RGB' ? 2 : 0 });
}

/** Decode any PNG into an RGB raster; alpha is dropped. */
export function decodePng(buffer: Buffer): Raster {
  const png = PNG.sync.read(buffer);
  const out = createRaster(png.width, png.height, 'RGB');
  const pixels = png.width * png.height;
  for (let i = 0; i < pixels; i++) {
    out.data[i * 3] = png.data[i * 4];
    out.data[i * 3 + 1] = png.data[i * 4 + 1];
    out.data[i * 3 + 2] = png.data[i * 4 + 2];
  }
  return out;
}
