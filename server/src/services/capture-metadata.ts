import { SatelliteType, type CaptureMetadata } from '@satsim/shared';
import { choice, roundTo, uniform, type RandomSource } from './random-source.js';
import { SATELLITE_TYPE_PROFILES } from './satellite-profiles.js';
import type { CommandRecord } from './simulator-store.js';

export type MetadataSubject = Pick<CommandRecord, 'aoiName' | 'width' | 'height' | 'cloudPercent' | 'requestProfile'>;

/**
 * Mock acquisition + product metadata for a completed capture. Every call
 * draws fresh values; a rerun never sees the previous run's numbers.
 */
export function buildCaptureMetadata(
  satelliteType: SatelliteType,
  command: MetadataSubject,
  capturedAt: Date,
  random: RandomSource,
): CaptureMetadata {
  const profile = SATELLITE_TYPE_PROFILES[satelliteType];
  const { requestProfile } = command;
  const aoi = {
    aoiName: command.aoiName,
    aoiCenter: requestProfile.aoiCenter,
    aoiBbox: requestProfile.aoiBbox,
    generationMode: requestProfile.generation.mode,
  };
  const imageSource = { ...requestProfile.generation };

  if (satelliteType === SatelliteType.EO_OPTICAL) {
    return {
      satelliteType,
      acquisition: {
        capturedAt: capturedAt.toISOString(),
        sensorMode: choice(random, profile.sensorModes),
        offNadirDeg: roundTo(uniform(random, 2, 28), 2),
        sunElevationDeg: roundTo(uniform(random, 20, 65), 2),
        cloudCoverPercent: command.cloudPercent,
        groundTrack: choice(random, ['ASCENDING', 'DESCENDING'] as const),
        ...aoi,
      },
      product: {
        productType: profile.defaultProductType,
        bands: [...profile.defaultBandsOrPolarization],
        gsdM: roundTo(uniform(random, 0.5, 1.5), 2),
        widthPx: command.width,
        heightPx: command.height,
        bitDepth: 8,
        format: 'PNG',
        imageSource,
      },
    };
  }

  return {
    satelliteType,
    acquisition: {
      capturedAt: capturedAt.toISOString(),
      sensorMode: choice(random, profile.sensorModes),
      incidenceAngleDeg: roundTo(uniform(random, 20, 45), 2),
      lookSide: choice(random, ['LEFT', 'RIGHT'] as const),
      passDirection: choice(random, ['ASCENDING', 'DESCENDING'] as const),
      polarization: choice(random, profile.defaultBandsOrPolarization),
      ...aoi,
    },
    product: {
      productType: profile.defaultProductType,
      resolutionM: roundTo(uniform(random, 0.8, 3.0), 2),
      widthPx: command.width,
      heightPx: command.height,
      format: 'PNG',
      speckleFilter: choice(random, ['NONE', 'LEE_3x3'] as const),
      imageSource,
    },
  };
}
