import {
  GroundStationStatus,
  GroundStationType,
  SatelliteStatus,
  SatelliteType,
  type GroundStation,
  type Satellite,
  type SatelliteWithProfile,
} from '@satsim/shared';
import { v4 as uuid } from 'uuid';
import { getSatelliteTypeProfile } from './satellite-profiles.js';
import type { SimulatorStore } from './simulator-store.js';

// ─── Presets ─────────────────────────────────────────────────────────────────

const SATELLITE_PRESETS: ReadonlyArray<{ name: string; type: SatelliteType }> = [
  { name: 'KOMPSAT-3 (Arirang-3)', type: SatelliteType.EO_OPTICAL },
  { name: 'KOMPSAT-3A (Arirang-3A)', type: SatelliteType.EO_OPTICAL },
  { name: 'CAS500-1 (NextSat-1)', type: SatelliteType.EO_OPTICAL },
  { name: 'Cheollian-2B (GEO-KOMPSAT-2B)', type: SatelliteType.EO_OPTICAL },
  { name: 'KOMPSAT-5 (Arirang-5, SAR)', type: SatelliteType.SAR },
  { name: 'KOMPSAT-6 (Arirang-6, SAR)', type: SatelliteType.SAR },
  { name: 'KOMPSAT-Next-5 (C-band SAR)', type: SatelliteType.SAR },
];

const GROUND_STATION_PRESETS: ReadonlyArray<{ name: string; type: GroundStationType; location: string }> = [
  { name: 'Daejeon Mission Control Ground Station', type: GroundStationType.FIXED, location: 'Daejeon' },
  { name: 'Jeju Maritime Satellite Ground Station', type: GroundStationType.MARITIME, location: 'Jeju' },
  { name: 'Incheon Airborne Relay Ground Station', type: GroundStationType.AIRBORNE, location: 'Incheon' },
];

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function shortId(prefix: string, length: number): string {
  return `${prefix}-${uuid().replace(/-/g, '').slice(0, length)}`;
}

export function withProfile(satellite: Satellite): SatelliteWithProfile {
  return { ...satellite, profile: getSatelliteTypeProfile(satellite.type) };
}

// ─── Satellites ──────────────────────────────────────────────────────────────

export interface CreateSatelliteInput {
  name: string;
  type: SatelliteType;
  status?: SatelliteStatus;
}

export interface UpdateSatelliteInput {
  name?: string;
  status?: SatelliteStatus;
}

export function createSatellite(store: SimulatorStore, input: CreateSatelliteInput): SatelliteWithProfile {
  const satellite: Satellite = {
    id: shortId('sat', 8),
    name: input.name,
    type: input.type,
    status: input.status ?? SatelliteStatus.AVAILABLE,
  };
  store.withLock(({ satellites }) => {
    satellites.set(satellite.id, satellite);
  });
  return withProfile(satellite);
}

/** Type is immutable; only name and status can change. Returns null when the id is unknown. */
export function updateSatellite(
  store: SimulatorStore,
  id: string,
  input: UpdateSatelliteInput,
): SatelliteWithProfile | null {
  return store.withLock(({ satellites }) => {
    const satellite = satellites.get(id);
    if (!satellite) return null;
    if (input.name !== undefined) satellite.name = input.name;
    if (input.status !== undefined) satellite.status = input.status;
    return withProfile(satellite);
  });
}

export function deleteSatellite(store: SimulatorStore, id: string): Satellite | null {
  return store.withLock(({ satellites }) => {
    const satellite = satellites.get(id);
    if (!satellite) return null;
    satellites.delete(id);
    return { ...satellite };
  });
}

export function listSatellites(store: SimulatorStore): SatelliteWithProfile[] {
  return store.withLock(({ satellites }) => Array.from(satellites.values()).map(withProfile));
}

/** Adds any preset satellite whose name is not registered yet; returns the new ids. */
export function seedDefaultSatellites(store: SimulatorStore): string[] {
  return store.withLock(({ satellites }) => {
    const existingNames = new Set(Array.from(satellites.values()).map(s => s.name));
    const seeded: string[] = [];
    for (const preset of SATELLITE_PRESETS) {
      if (existingNames.has(preset.name)) continue;
      const id = shortId('sat', 8);
      satellites.set(id, { id, name: preset.name, type: preset.type, status: SatelliteStatus.AVAILABLE });
      seeded.push(id);
    }
    return seeded;
  });
}

// ─── Ground Stations ─────────────────────────────────────────────────────────

export interface CreateGroundStationInput {
  name: string;
  type: GroundStationType;
  status?: GroundStationStatus;
  location?: string | null;
}

export interface UpdateGroundStationInput {
  name?: string;
  status?: GroundStationStatus;
  location?: string | null;
}

export function createGroundStation(store: SimulatorStore, input: CreateGroundStationInput): GroundStation {
  const station: GroundStation = {
    id: shortId('gnd', 8),
    name: input.name,
    type: input.type,
    status: input.status ?? GroundStationStatus.OPERATIONAL,
    location: input.location ?? null,
  };
  store.withLock(({ groundStations }) => {
    groundStations.set(station.id, station);
  });
  return { ...station };
}

export function updateGroundStation(
  store: SimulatorStore,
  id: string,
  input: UpdateGroundStationInput,
): GroundStation | null {
  return store.withLock(({ groundStations }) => {
    const station = groundStations.get(id);
    if (!station) return null;
    if (input.name !== undefined) station.name = input.name;
    if (input.status !== undefined) station.status = input.status;
    if (input.location !== undefined) station.location = input.location;
    return { ...station };
  });
}

export function deleteGroundStation(store: SimulatorStore, id: string): GroundStation | null {
  return store.withLock(({ groundStations }) => {
    const station = groundStations.get(id);
    if (!station) return null;
    groundStations.delete(id);
    return { ...station };
  });
}

export function listGroundStations(store: SimulatorStore): GroundStation[] {
  return store.withLock(({ groundStations }) => Array.from(groundStations.values()).map(s => ({ ...s })));
}

export function seedDefaultGroundStations(store: SimulatorStore): string[] {
  return store.withLock(({ groundStations }) => {
    const existingNames = new Set(Array.from(groundStations.values()).map(s => s.name));
    const seeded: string[] = [];
    for (const preset of GROUND_STATION_PRESETS) {
      if (existingNames.has(preset.name)) continue;
      const id = shortId('gnd', 8);
      groundStations.set(id, {
        id,
        name: preset.name,
        type: preset.type,
        status: GroundStationStatus.OPERATIONAL,
        location: preset.location,
      });
      seeded.push(id);
    }
    return seeded;
  });
}
