import { SatelliteType, type SatelliteTypeProfile } from '@satsim/shared';

// Static per-type platform characteristics. Seeded once, never mutated.
export const SATELLITE_TYPE_PROFILES: Readonly<Record<SatelliteType, Readonly<SatelliteTypeProfile>>> = Object.freeze({
  [SatelliteType.EO_OPTICAL]: Object.freeze({
    platform: 'Sun-synchronous LEO',
    orbitType: 'SSO',
    nominalAltitudeKm: 500,
    nominalSwathKm: 24,
    revisitHours: 24,
    sensorModes: ['NADIR', 'OFF_NADIR'],
    defaultProductType: 'L1B_ORTHOREADY',
    defaultBandsOrPolarization: ['R', 'G', 'B', 'NIR'],
  }),
  [SatelliteType.SAR]: Object.freeze({
    platform: 'Low Earth Orbit radar',
    orbitType: 'LEO',
    nominalAltitudeKm: 550,
    nominalSwathKm: 30,
    revisitHours: 12,
    sensorModes: ['SPOTLIGHT', 'STRIPMAP'],
    defaultProductType: 'GRD',
    defaultBandsOrPolarization: ['VV', 'VH'],
  }),
});

export function getSatelliteTypeProfile(type: SatelliteType): SatelliteTypeProfile {
  const profile = SATELLITE_TYPE_PROFILES[type];
  return {
    ...profile,
    sensorModes: [...profile.sensorModes],
    defaultBandsOrPolarization: [...profile.defaultBandsOrPolarization],
  };
}
