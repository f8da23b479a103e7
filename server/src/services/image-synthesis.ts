import {
  GenerationMode,
  SatelliteType,
  type LatLon,
  type RequestProfile,
} from '@satsim/shared';
import { buildExternalMapImage, deriveAoiCenter, type TileSource } from './map-tiles.js';
import { randomInt, type RandomSource } from './random-source.js';
import { createRaster, type Raster } from './raster.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface SynthesisParams {
  width: number;
  height: number;
  cloudPercent: number;
}

export type SynthesisStrategy =
  | { kind: 'OPTICAL' }
  | { kind: 'SAR' }
  | { kind: 'EXTERNAL_MAP'; center: LatLon; zoom: number; source: string };

export interface SynthesisDeps {
  random: RandomSource;
  tiles: TileSource;
}

type Rgb = [number, number, number];

// ─── Strategy Selection ──────────────────────────────────────────────────────

/**
 * EXTERNAL generation always renders the map mosaic, whatever the sensor;
 * INTERNAL picks the procedural texture matching the satellite type.
 * Throws when EXTERNAL mode has no AOI to centre on.
 */
export function selectSynthesisStrategy(
  satelliteType: SatelliteType,
  requestProfile: RequestProfile,
): SynthesisStrategy {
  const generation = requestProfile.generation;
  if (generation.mode === GenerationMode.EXTERNAL) {
    return {
      kind: 'EXTERNAL_MAP',
      center: deriveAoiCenter(requestProfile),
      zoom: generation.externalMapZoom,
      source: generation.externalMapSource,
    };
  }
  return satelliteType === SatelliteType.EO_OPTICAL ? { kind: 'OPTICAL' } : { kind: 'SAR' };
}

export async function synthesizeImage(
  strategy: SynthesisStrategy,
  params: SynthesisParams,
  deps: SynthesisDeps,
): Promise<Raster> {
  switch (strategy.kind) {
    case 'OPTICAL':
      return generateOpticalImage(params, deps.random);
    case 'SAR':
      return generateSarImage(params, deps.random);
    case 'EXTERNAL_MAP':
      return buildExternalMapImage({
        centerLat: strategy.center.lat,
        centerLon: strategy.center.lon,
        zoom: strategy.zoom,
        width: params.width,
        height: params.height,
        mapSource: strategy.source,
        tiles: deps.tiles,
      });
  }
}

// ─── Synthetic Optical ───────────────────────────────────────────────────────

/** Number of near-white pixels sprinkled over an optical frame. */
export function cloudSampleCount(width: number, height: number, cloudPercent: number): number {
  // w·h·(pct/100)·0.03, kept in integers so the count is exact
  return Math.floor((width * height * cloudPercent * 3) / 10000);
}

function randomColor(random: RandomSource): Rgb {
  return [randomInt(random, 0, 255), randomInt(random, 0, 255), randomInt(random, 0, 255)];
}

export function generateOpticalImage(params: SynthesisParams, random: RandomSource): Raster {
  const { width, height } = params;
  const raster = createRaster(width, height, 'RGB');
  const c1 = randomColor(random);
  const c2 = randomColor(random);
  const c3 = randomColor(random);

  for (let y = 0; y < height; y++) {
    const t = y / Math.max(1, height - 1);
    for (let x = 0; x < width; x++) {
      const s = x / Math.max(1, width - 1);
      const o = (y * width + x) * 3;
      raster.data[o] = Math.floor((1 - t) * c1[0] + t * c2[0] * (0.6 + 0.4 * s)) % 256;
      raster.data[o + 1] = Math.floor((1 - s) * c2[1] + s * c3[1] * (0.6 + 0.4 * t)) % 256;
      raster.data[o + 2] = Math.floor((1 - t) * c3[2] + t * c1[2] * (0.6 + 0.4 * s)) % 256;
    }
  }

  const samples = cloudSampleCount(width, height, params.cloudPercent);
  for (let i = 0; i < samples; i++) {
    const x = randomInt(random, 0, width - 1);
    const y = randomInt(random, 0, height - 1);
    const cloud = randomInt(random, 190, 255);
    const o = (y * width + x) * 3;
    raster.data[o] = raster.data[o + 1] = raster.data[o + 2] = cloud;
  }

  return raster;
}

// ─── Synthetic SAR ───────────────────────────────────────────────────────────

/** Grayscale ramp (70 at the top row, 255 at the bottom) under uniform ±45 speckle. */
export function generateSarImage(params: SynthesisParams, random: RandomSource): Raster {
  const { width, height } = params;
  const raster = createRaster(width, height, 'L');

  for (let y = 0; y < height; y++) {
    const base = Math.floor(70 + (185 * y) / Math.max(1, height - 1));
    for (let x = 0; x < width; x++) {
      const speckle = randomInt(random, -45, 45);
      raster.data[y * width + x] = Math.max(0, Math.min(255, base + speckle));
    }
  }

  return raster;
}
