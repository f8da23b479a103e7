// ─── Enums ───────────────────────────────────────────────────────────────────

export enum SatelliteType {
  EO_OPTICAL = 'EO_OPTICAL',
  SAR = 'SAR',
}

export enum SatelliteStatus {
  AVAILABLE = 'AVAILABLE',
  MAINTENANCE = 'MAINTENANCE',
}

export enum GroundStationType {
  FIXED = 'FIXED',
  LAND_MOBILE = 'LAND_MOBILE',
  MARITIME = 'MARITIME',
  AIRBORNE = 'AIRBORNE',
}

export enum GroundStationStatus {
  OPERATIONAL = 'OPERATIONAL',
  MAINTENANCE = 'MAINTENANCE',
}

export enum CommandState {
  QUEUED = 'QUEUED',
  ACKED = 'ACKED',
  CAPTURING = 'CAPTURING',
  DOWNLINK_READY = 'DOWNLINK_READY',
  FAILED = 'FAILED',
}

export enum TaskPriority {
  BACKGROUND = 'BACKGROUND',
  COMMERCIAL = 'COMMERCIAL',
  URGENT = 'URGENT',
}

export enum LookSide {
  ANY = 'ANY',
  LEFT = 'LEFT',
  RIGHT = 'RIGHT',
}

export enum PassDirection {
  ANY = 'ANY',
  ASCENDING = 'ASCENDING',
  DESCENDING = 'DESCENDING',
}

export enum DeliveryMethod {
  DOWNLOAD = 'DOWNLOAD',
  S3 = 'S3',
  WEBHOOK = 'WEBHOOK',
}

export enum GenerationMode {
  INTERNAL = 'INTERNAL',
  EXTERNAL = 'EXTERNAL',
}

export enum ExternalMapSource {
  OSM = 'OSM',
}
