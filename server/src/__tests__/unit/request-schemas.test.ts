/**
 * Unit tests for request validation.
 */
import { DeliveryMethod, GenerationMode, SatelliteStatus, SatelliteType, TaskPriority } from '@satsim/shared';
import { describe, expect, it } from 'vitest';
import {
  createSatelliteSchema,
  externalMapPreviewSchema,
  formatZodError,
  uplinkRequestSchema,
} from '../../services/request-schemas.js';

function uplinkError(body: Record<string, unknown>): string | null {
  const parsed = uplinkRequestSchema.safeParse({ satelliteId: 'sat-test', missionName: 'test mission', ...body });
  return parsed.success ? null : formatZodError(parsed.error);
}

describe('uplinkRequestSchema', () => {
  it('fills every default', () => {
    const parsed = uplinkRequestSchema.parse({ satelliteId: 'sat-test', missionName: 'test mission' });

    expect(parsed).toMatchObject({
      aoiName: 'unknown-aoi',
      width: 1024,
      height: 1024,
      cloudPercent: 20,
      priority: TaskPriority.COMMERCIAL,
      lookSide: 'ANY',
      passDirection: 'ANY',
      deliveryMethod: DeliveryMethod.DOWNLOAD,
      generationMode: GenerationMode.INTERNAL,
      externalMapSource: 'OSM',
      externalMapZoom: 19,
      failProbability: 0.05,
    });
  });

  it('reports field range violations with their path', () => {
    expect(uplinkError({ width: 64 })).toBe('width: Number must be greater than or equal to 128');
    expect(uplinkError({ failProbability: 1.5 })).toBe('failProbability: Number must be less than or equal to 1');
    expect(uplinkError({ missionName: undefined })).toBe('missionName: Required');
  });

  it('accepts the boundary probabilities', () => {
    expect(uplinkError({ failProbability: 0 })).toBeNull();
    expect(uplinkError({ failProbability: 1 })).toBeNull();
  });

  it('requires the AOI center coordinates together', () => {
    expect(uplinkError({ aoiCenterLat: 37.5 })).toBe('aoiCenterLat and aoiCenterLon must be provided together');
  });

  it('requires an ordered bbox', () => {
    expect(uplinkError({ aoiBbox: [128, 37, 126, 39] })).toBe(
      'aoiBbox: aoiBbox must be [minLon, minLat, maxLon, maxLat] with min < max',
    );
    expect(uplinkError({ aoiBbox: [126, 37, 128, 39] })).toBeNull();
  });

  it('validates the acquisition window', () => {
    expect(uplinkError({ windowOpenUtc: 'tomorrow', windowCloseUtc: '2026-05-02T00:00:00Z' })).toBe(
      'windowOpenUtc/windowCloseUtc must be ISO8601',
    );
    expect(uplinkError({ windowOpenUtc: '2026-05-02T00:00:00Z', windowCloseUtc: '2026-05-01T00:00:00Z' })).toBe(
      'windowOpenUtc must be earlier than windowCloseUtc',
    );
    expect(uplinkError({ windowOpenUtc: '2026-05-01T00:00:00Z', windowCloseUtc: '2026-05-02T00:00:00Z' })).toBeNull();
  });

  it('orders the incidence range', () => {
    expect(uplinkError({ incidenceMinDeg: 40, incidenceMaxDeg: 30 })).toBe('incidenceMinDeg must be <= incidenceMaxDeg');
  });

  it('needs a delivery path for push delivery', () => {
    expect(uplinkError({ deliveryMethod: DeliveryMethod.WEBHOOK })).toBe(
      'deliveryPath is required when deliveryMethod is S3 or WEBHOOK',
    );
    expect(uplinkError({ deliveryMethod: DeliveryMethod.S3, deliveryPath: 's3://test-bucket/out' })).toBeNull();
  });

  it('needs an AOI for EXTERNAL generation', () => {
    expect(uplinkError({ generationMode: GenerationMode.EXTERNAL })).toBe(
      'EXTERNAL generation requires aoiCenterLat/Lon or aoiBbox',
    );
  });

  it('reports every cross-field violation at once', () => {
    expect(uplinkError({ incidenceMinDeg: 40, incidenceMaxDeg: 30, deliveryMethod: DeliveryMethod.S3 })).toBe(
      'incidenceMinDeg must be <= incidenceMaxDeg; deliveryPath is required when deliveryMethod is S3 or WEBHOOK',
    );
  });
});

describe('externalMapPreviewSchema', () => {
  it('coerces query strings and fills defaults', () => {
    expect(externalMapPreviewSchema.parse({ lat: '37.5', lon: '127' })).toEqual({
      lat: 37.5,
      lon: 127,
      zoom: 19,
      width: 768,
      height: 768,
      source: 'OSM',
    });
  });

  it('rejects an unknown source', () => {
    const parsed = externalMapPreviewSchema.safeParse({ lat: '1', lon: '2', source: 'GOOGLE' });

    expect(parsed.success).toBe(false);
  });
});

describe('createSatelliteSchema', () => {
  it('defaults the status to AVAILABLE', () => {
    expect(createSatelliteSchema.parse({ name: 'Test EO', type: SatelliteType.SAR })).toEqual({
      name: 'Test EO',
      type: SatelliteType.SAR,
      status: SatelliteStatus.AVAILABLE,
    });
  });
});
