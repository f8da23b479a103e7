import {
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
} from '@satsim/shared';
import { z } from 'zod';
import { config } from '../config.js';

/**
 * Request body / query schemas for the HTTP layer. Business rules that span
 * fields live in superRefine so every violation is reported at once.
 */

// ─── Registry ────────────────────────────────────────────────────────────────

export const createSatelliteSchema = z.object({
  name: z.string().min(1).max(100),
  type: z.nativeEnum(SatelliteType),
  status: z.nativeEnum(SatelliteStatus).default(SatelliteStatus.AVAILABLE),
});

export const updateSatelliteSchema = z.object({
  name: z.string().min(1).max(100).optional(),
  status: z.nativeEnum(SatelliteStatus).optional(),
});

export const createGroundStationSchema = z.object({
  name: z.string().min(1).max(120),
  type: z.nativeEnum(GroundStationType),
  status: z.nativeEnum(GroundStationStatus).default(GroundStationStatus.OPERATIONAL),
  location: z.string().max(120).nullish(),
});

export const updateGroundStationSchema = z.object({
  name: z.string().min(1).max(120).optional(),
  status: z.nativeEnum(GroundStationStatus).optional(),
  location: z.string().max(120).nullish(),
});

// ─── Uplink ──────────────────────────────────────────────────────────────────

function isIsoDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}T/.test(value) && !Number.isNaN(Date.parse(value));
}

export const uplinkRequestSchema = z
  .object({
    satelliteId: z.string().min(1),
    groundStationId: z.string().min(1).max(40).nullish(),
    missionName: z.string().min(1).max(150),
    aoiName: z.string().min(1).max(120).default('unknown-aoi'),
    aoiCenterLat: z.number().min(-90).max(90).nullish(),
    aoiCenterLon: z.number().min(-180).max(180).nullish(),
    // [minLon, minLat, maxLon, maxLat]
    aoiBbox: z.tuple([z.number(), z.number(), z.number(), z.number()]).nullish(),
    windowOpenUtc: z.string().nullish(),
    windowCloseUtc: z.string().nullish(),
    priority: z.nativeEnum(TaskPriority).default(TaskPriority.COMMERCIAL),
    width: z.number().int().min(128).max(4096).default(1024),
    height: z.number().int().min(128).max(4096).default(1024),
    cloudPercent: z.number().int().min(0).max(100).default(20),
    maxCloudCoverPercent: z.number().int().min(0).max(100).nullish(),
    maxOffNadirDeg: z.number().min(0).max(45).nullish(),
    minSunElevationDeg: z.number().min(0).max(90).nullish(),
    incidenceMinDeg: z.number().min(0).max(90).nullish(),
    incidenceMaxDeg: z.number().min(0).max(90).nullish(),
    lookSide: z.nativeEnum(LookSide).default(LookSide.ANY),
    passDirection: z.nativeEnum(PassDirection).default(PassDirection.ANY),
    polarization: z.string().max(10).nullish(),
    deliveryMethod: z.nativeEnum(DeliveryMethod).default(DeliveryMethod.DOWNLOAD),
    deliveryPath: z.string().max(500).nullish(),
    generationMode: z.nativeEnum(GenerationMode).default(GenerationMode.INTERNAL),
    externalMapSource: z.nativeEnum(ExternalMapSource).default(ExternalMapSource.OSM),
    externalMapZoom: z.number().int().min(1).max(19).default(19),
    failProbability: z.number().min(0).max(1).default(config.pipeline.defaultFailProbability),
  })
  .superRefine((req, ctx) => {
    const hasLat = req.aoiCenterLat != null;
    const hasLon = req.aoiCenterLon != null;
    if (hasLat !== hasLon) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'aoiCenterLat and aoiCenterLon must be provided together' });
    }

    if (req.aoiBbox) {
      const [minLon, minLat, maxLon, maxLat] = req.aoiBbox;
      if (minLon >= maxLon || minLat >= maxLat) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['aoiBbox'],
          message: 'aoiBbox must be [minLon, minLat, maxLon, maxLat] with min < max',
        });
      }
    }

    if (req.windowOpenUtc && req.windowCloseUtc) {
      if (!isIsoDate(req.windowOpenUtc) || !isIsoDate(req.windowCloseUtc)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'windowOpenUtc/windowCloseUtc must be ISO8601' });
      } else if (Date.parse(req.windowOpenUtc) >= Date.parse(req.windowCloseUtc)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'windowOpenUtc must be earlier than windowCloseUtc' });
      }
    }

    if (req.incidenceMinDeg != null && req.incidenceMaxDeg != null && req.incidenceMinDeg > req.incidenceMaxDeg) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'incidenceMinDeg must be <= incidenceMaxDeg' });
    }

    if ((req.deliveryMethod === DeliveryMethod.S3 || req.deliveryMethod === DeliveryMethod.WEBHOOK) && !req.deliveryPath) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'deliveryPath is required when deliveryMethod is S3 or WEBHOOK' });
    }

    if (req.generationMode === GenerationMode.EXTERNAL && !(hasLat && hasLon) && !req.aoiBbox) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'EXTERNAL generation requires aoiCenterLat/Lon or aoiBbox' });
    }
  });

export type UplinkRequest = z.infer<typeof uplinkRequestSchema>;

// ─── Preview ─────────────────────────────────────────────────────────────────

export const externalMapPreviewSchema = z.object({
  lat: z.coerce.number().min(-90).max(90),
  lon: z.coerce.number().min(-180).max(180),
  zoom: z.coerce.number().int().min(1).max(19).default(19),
  width: z.coerce.number().int().min(128).max(4096).default(768),
  height: z.coerce.number().int().min(128).max(4096).default(768),
  source: z.nativeEnum(ExternalMapSource).default(ExternalMapSource.OSM),
});

export type ExternalMapPreviewQuery = z.infer<typeof externalMapPreviewSchema>;

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Flatten zod issues into one line: "path: message; path: message". */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
