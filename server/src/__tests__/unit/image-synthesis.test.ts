/**
 * Unit tests for image synthesis strategies.
 * Draws are scripted so every pixel checked here is traced by hand.
 */
import { ExternalMapSource, GenerationMode, SatelliteType } from '@satsim/shared';
import { describe, expect, it } from 'vitest';
import { buildRequestProfile } from '../../services/command-dispatcher.js';
import {
  cloudSampleCount,
  generateOpticalImage,
  generateSarImage,
  selectSynthesisStrategy,
  synthesizeImage,
} from '../../services/image-synthesis.js';
import { getPixel } from '../../services/raster.js';
import { fakeTileSource, scriptedRandom, uplinkRequest } from '../helpers/test-helpers.js';

describe('cloudSampleCount', () => {
  it('is w·h·(pct/100)·0.03, floored', () => {
    expect(cloudSampleCount(1024, 1024, 20)).toBe(6291);
    expect(cloudSampleCount(128, 128, 100)).toBe(491);
    expect(cloudSampleCount(128, 128, 20)).toBe(98);
  });

  it('is zero without clouds and grows linearly with the percentage', () => {
    expect(cloudSampleCount(1000, 1000, 0)).toBe(0);
    expect(cloudSampleCount(1000, 1000, 10)).toBe(3000);
    expect(cloudSampleCount(1000, 1000, 40)).toBe(12000);
  });
});

describe('generateOpticalImage', () => {
  it('returns an RGB raster of exactly the requested size', () => {
    const raster = generateOpticalImage({ width: 130, height: 129, cloudPercent: 20 }, scriptedRandom([]));

    expect(raster.mode).toBe('RGB');
    expect(raster.width).toBe(130);
    expect(raster.height).toBe(129);
    expect(raster.data).toHaveLength(130 * 129 * 3);
  });

  it('blends the three base colors across the frame', () => {
    // c1 = (128, 0, 0), c2 = (64, 192, 0), c3 = (0, 0, 32)
    const random = scriptedRandom([0.5, 0, 0, 0.25, 0.75, 0, 0, 0, 0.125]);
    const raster = generateOpticalImage({ width: 128, height: 128, cloudPercent: 0 }, random);

    expect(getPixel(raster, 0, 0)).toEqual([128, 192, 32]);
    expect(getPixel(raster, 0, 127)).toEqual([38, 192, 0]);
    expect(getPixel(raster, 127, 0)).toEqual([128, 0, 32]);
    expect(random.consumed()).toBe(9);
  });

  it('sprinkles one gray sample per cloud draw', () => {
    // every draw is 0.5: all samples land on (64, 64) with v = 223
    const random = scriptedRandom([]);
    const raster = generateOpticalImage({ width: 128, height: 128, cloudPercent: 100 }, random);

    expect(getPixel(raster, 64, 64)).toEqual([223, 223, 223]);
    expect(random.consumed()).toBe(9 + 3 * 491);
  });
});

describe('generateSarImage', () => {
  it('ramps brightness from 70 at the top to 255 at the bottom', () => {
    // 0.5 → zero speckle
    const raster = generateSarImage({ width: 128, height: 128, cloudPercent: 0 }, scriptedRandom([]));

    expect(raster.mode).toBe('L');
    expect(raster.data).toHaveLength(128 * 128);
    expect(getPixel(raster, 0, 0)).toEqual([70]);
    expect(getPixel(raster, 5, 127)).toEqual([255]);
  });

  it('clamps speckle into the byte range', () => {
    // 0.999 → +45 speckle everywhere
    const raster = generateSarImage({ width: 128, height: 128, cloudPercent: 0 }, scriptedRandom([], 0.999));

    expect(getPixel(raster, 0, 0)).toEqual([115]);
    expect(getPixel(raster, 0, 127)).toEqual([255]);
  });
});

describe('selectSynthesisStrategy', () => {
  const internal = buildRequestProfile(uplinkRequest(), null);

  it('picks the procedural texture matching the sensor for INTERNAL generation', () => {
    expect(selectSynthesisStrategy(SatelliteType.EO_OPTICAL, internal)).toEqual({ kind: 'OPTICAL' });
    expect(selectSynthesisStrategy(SatelliteType.SAR, internal)).toEqual({ kind: 'SAR' });
  });

  it('always uses the map mosaic for EXTERNAL generation', () => {
    const profile = buildRequestProfile(
      uplinkRequest({ generationMode: GenerationMode.EXTERNAL, aoiBbox: [126, 37, 128, 39], externalMapZoom: 12 }),
      null,
    );

    expect(selectSynthesisStrategy(SatelliteType.SAR, profile)).toEqual({
      kind: 'EXTERNAL_MAP',
      center: { lat: 38, lon: 127 },
      zoom: 12,
      source: ExternalMapSource.OSM,
    });
  });

  it('throws when EXTERNAL generation has no AOI', () => {
    const profile = {
      ...internal,
      generation: { mode: GenerationMode.EXTERNAL, externalMapSource: ExternalMapSource.OSM, externalMapZoom: 10 },
    };

    expect(() => selectSynthesisStrategy(SatelliteType.EO_OPTICAL, profile)).toThrow(
      'external generation requires AOI center or bbox',
    );
  });
});

describe('synthesizeImage', () => {
  it('renders the mosaic strategy through the tile source at the requested size', async () => {
    const tiles = fakeTileSource();
    const raster = await synthesizeImage(
      { kind: 'EXTERNAL_MAP', center: { lat: 0, lon: 0 }, zoom: 3, source: ExternalMapSource.OSM },
      { width: 200, height: 100, cloudPercent: 0 },
      { random: scriptedRandom([]), tiles },
    );

    expect(raster.width).toBe(200);
    expect(raster.height).toBe(100);
    expect(tiles.requests).toHaveLength(9);
  });

  it('dispatches SAR to the grayscale generator', async () => {
    const raster = await synthesizeImage(
      { kind: 'SAR' },
      { width: 128, height: 130, cloudPercent: 0 },
      { random: scriptedRandom([]), tiles: fakeTileSource() },
    );

    expect(raster.mode).toBe('L');
    expect(raster.height).toBe(130);
  });
});
