/**
 * Unit tests for the satellite and ground-station registries.
 */
import {
  GroundStationStatus,
  GroundStationType,
  SatelliteStatus,
  SatelliteType,
} from '@satsim/shared';
import { beforeEach, describe, expect, it } from 'vitest';
import {
  createGroundStation,
  createSatellite,
  deleteGroundStation,
  deleteSatellite,
  listGroundStations,
  listSatellites,
  seedDefaultGroundStations,
  seedDefaultSatellites,
  updateGroundStation,
  updateSatellite,
} from '../../services/registry.js';
import { getSatelliteTypeProfile } from '../../services/satellite-profiles.js';
import { SimulatorStore } from '../../services/simulator-store.js';

let store: SimulatorStore;

beforeEach(() => {
  store = new SimulatorStore();
});

describe('Satellites', () => {
  it('creates a satellite with a short id, default status and its type profile', () => {
    const sat = createSatellite(store, { name: 'Test EO-1', type: SatelliteType.EO_OPTICAL });

    expect(sat.id).toMatch(/^sat-[0-9a-f]{8}$/);
    expect(sat.status).toBe(SatelliteStatus.AVAILABLE);
    expect(sat.profile.platform).toBe('Sun-synchronous LEO');
    expect(sat.profile.sensorModes).toEqual(['NADIR', 'OFF_NADIR']);
    expect(listSatellites(store)).toHaveLength(1);
  });

  it('updates name and status but never the type', () => {
    const sat = createSatellite(store, { name: 'Test SAR-1', type: SatelliteType.SAR });

    const updated = updateSatellite(store, sat.id, { name: 'Renamed', status: SatelliteStatus.MAINTENANCE });

    expect(updated).toMatchObject({ id: sat.id, name: 'Renamed', status: SatelliteStatus.MAINTENANCE, type: SatelliteType.SAR });
  });

  it('returns null when updating or deleting an unknown id', () => {
    expect(updateSatellite(store, 'sat-missing', { name: 'x' })).toBeNull();
    expect(deleteSatellite(store, 'sat-missing')).toBeNull();
  });

  it('deletes a satellite', () => {
    const sat = createSatellite(store, { name: 'Doomed', type: SatelliteType.SAR });

    expect(deleteSatellite(store, sat.id)?.id).toBe(sat.id);
    expect(listSatellites(store)).toEqual([]);
  });

  it('seeds seven presets once and skips names already present', () => {
    const first = seedDefaultSatellites(store);
    const second = seedDefaultSatellites(store);

    expect(first).toHaveLength(7);
    expect(second).toEqual([]);

    const satellites = listSatellites(store);
    expect(satellites.filter(s => s.type === SatelliteType.EO_OPTICAL)).toHaveLength(4);
    expect(satellites.filter(s => s.type === SatelliteType.SAR)).toHaveLength(3);
  });
});

describe('Ground stations', () => {
  it('creates a station with a short id and null location by default', () => {
    const station = createGroundStation(store, { name: 'Test Station', type: GroundStationType.LAND_MOBILE });

    expect(station.id).toMatch(/^gnd-[0-9a-f]{8}$/);
    expect(station.status).toBe(GroundStationStatus.OPERATIONAL);
    expect(station.location).toBeNull();
  });

  it('updates name, status and location', () => {
    const station = createGroundStation(store, { name: 'Test Station', type: GroundStationType.FIXED });

    const updated = updateGroundStation(store, station.id, {
      status: GroundStationStatus.MAINTENANCE,
      location: 'Test Harbor',
    });

    expect(updated).toEqual({
      id: station.id,
      name: 'Test Station',
      type: GroundStationType.FIXED,
      status: GroundStationStatus.MAINTENANCE,
      location: 'Test Harbor',
    });
  });

  it('deletes a station and reports unknown ids as null', () => {
    const station = createGroundStation(store, { name: 'Test Station', type: GroundStationType.AIRBORNE });

    expect(deleteGroundStation(store, station.id)?.id).toBe(station.id);
    expect(deleteGroundStation(store, station.id)).toBeNull();
    expect(updateGroundStation(store, station.id, { name: 'x' })).toBeNull();
  });

  it('seeds three operational presets idempotently', () => {
    expect(seedDefaultGroundStations(store)).toHaveLength(3);
    expect(seedDefaultGroundStations(store)).toEqual([]);
    expect(listGroundStations(store).every(s => s.status === GroundStationStatus.OPERATIONAL)).toBe(true);
  });
});

describe('getSatelliteTypeProfile', () => {
  it('returns a copy that does not leak into the static table', () => {
    const profile = getSatelliteTypeProfile(SatelliteType.SAR);
    profile.sensorModes.push('SCANSAR');

    expect(getSatelliteTypeProfile(SatelliteType.SAR).sensorModes).toEqual(['SPOTLIGHT', 'STRIPMAP']);
    expect(profile.defaultProductType).toBe('GRD');
  });
});
