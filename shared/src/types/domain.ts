import {
  CommandState,
  DeliveryMethod,
  ExternalMapSource,
  GenerationMode,
  GroundStationStatus,
  GroundStationType,
  LookSide,
  PassDirection,
  SatelliteStatus,
  SatelliteType,
  TaskPriority,
} from './enums.js';

// ─── Geospatial ──────────────────────────────────────────────────────────────

export interface LatLon {
  lat: number;
  lon: number;
}

/** [minLon, minLat, maxLon, maxLat] */
export type BoundingBox = [number, number, number, number];

// ─── Registry ────────────────────────────────────────────────────────────────

export interface Satellite {
  id: string;
  name: string;
  type: SatelliteType;
  status: SatelliteStatus;
}

export interface GroundStation {
  id: string;
  name: string;
  type: GroundStationType;
  status: GroundStationStatus;
  location: string | null;
}

export interface SatelliteTypeProfile {
  platform: string;
  orbitType: string;
  nominalAltitudeKm: number;
  nominalSwathKm: number;
  revisitHours: number;
  sensorModes: string[];
  defaultProductType: string;
  defaultBandsOrPolarization: string[];
}

export interface SatelliteWithProfile extends Satellite {
  profile: SatelliteTypeProfile;
}

// ─── Request Profile ─────────────────────────────────────────────────────────

export interface EoConstraints {
  maxCloudCoverPercent: number | null;
  maxOffNadirDeg: number | null;
  minSunElevationDeg: number | null;
}

export interface SarConstraints {
  incidenceMinDeg: number | null;
  incidenceMaxDeg: number | null;
  lookSide: LookSide;
  passDirection: PassDirection;
  polarization: string | null;
}

export interface DeliveryOptions {
  method: DeliveryMethod;
  path: string | null;
}

export interface GenerationOptions {
  mode: GenerationMode;
  externalMapSource: ExternalMapSource;
  externalMapZoom: number;
}

/** Captured verbatim when a command is submitted; never mutated afterwards. */
export interface RequestProfile {
  groundStation: GroundStation | null;
  aoiCenter: LatLon | null;
  aoiBbox: BoundingBox | null;
  windowOpenUtc: string | null;
  windowCloseUtc: string | null;
  priority: TaskPriority;
  eoConstraints: EoConstraints;
  sarConstraints: SarConstraints;
  delivery: DeliveryOptions;
  generation: GenerationOptions;
}

// ─── Capture Metadata ────────────────────────────────────────────────────────

export type TrackDirection = 'ASCENDING' | 'DESCENDING';

interface AoiMetadata {
  aoiName: string;
  aoiCenter: LatLon | null;
  aoiBbox: BoundingBox | null;
  generationMode: GenerationMode;
}

export interface OpticalAcquisitionMetadata extends AoiMetadata {
  capturedAt: string;
  sensorMode: string;
  offNadirDeg: number;
  sunElevationDeg: number;
  cloudCoverPercent: number;
  groundTrack: TrackDirection;
}

export interface SarAcquisitionMetadata extends AoiMetadata {
  capturedAt: string;
  sensorMode: string;
  incidenceAngleDeg: number;
  lookSide: 'LEFT' | 'RIGHT';
  passDirection: TrackDirection;
  polarization: string;
}

export interface OpticalProductMetadata {
  productType: string;
  bands: string[];
  gsdM: number;
  widthPx: number;
  heightPx: number;
  bitDepth: 8;
  format: 'PNG';
  imageSource: GenerationOptions;
}

export interface SarProductMetadata {
  productType: string;
  resolutionM: number;
  widthPx: number;
  heightPx: number;
  format: 'PNG';
  speckleFilter: 'NONE' | 'LEE_3x3';
  imageSource: GenerationOptions;
}

export type AcquisitionMetadata = OpticalAcquisitionMetadata | SarAcquisitionMetadata;
export type ProductMetadata = OpticalProductMetadata | SarProductMetadata;

export type CaptureMetadata =
  | { satelliteType: SatelliteType.EO_OPTICAL; acquisition: OpticalAcquisitionMetadata; product: OpticalProductMetadata }
  | { satelliteType: SatelliteType.SAR; acquisition: SarAcquisitionMetadata; product: SarProductMetadata };

// ─── Commands ────────────────────────────────────────────────────────────────

export interface CommandTransition {
  state: CommandState;
  message: string | null;
  at: string; // ISO 8601
}

export interface CommandStatus {
  id: string;
  satelliteId: string;
  satelliteType: SatelliteType | null;
  groundStationId: string | null;
  groundStationName: string | null;
  groundStationType: GroundStationType | null;
  missionName: string;
  aoiName: string;
  width: number;
  height: number;
  cloudPercent: number;
  failProbability: number;
  state: CommandState;
  message: string | null;
  createdAt: string;
  updatedAt: string;
  downloadUrl: string | null;
  requestProfile: RequestProfile;
  acquisitionMetadata: AcquisitionMetadata | null;
  productMetadata: ProductMetadata | null;
  transitions: CommandTransition[];
}

export interface SaveLocalResult {
  commandId: string;
  savedPath: string;
  fileSizeBytes: number;
  message: string;
}

export interface ClearImagesResult {
  deletedCount: number;
  clearedCommandCount: number;
  message: string;
}

// ─── WebSocket Events ────────────────────────────────────────────────────────

export interface CommandUpdateEvent {
  event: 'command:update';
  command: CommandStatus;
}
