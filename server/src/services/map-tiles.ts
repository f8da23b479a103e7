import { ExternalMapSource, type LatLon, type RequestProfile } from '@satsim/shared';
import { createRaster, crop, decodePng, paste, resizeBilinear, type Raster } from './raster.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface TileSource {
  /** Fetch one 256×256 tile. Coordinates may be out of range; the source wraps/clamps them. */
  fetchTile(zoom: number, x: number, y: number): Promise<Raster>;
}

export interface TileSourceOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
}

export interface ExternalMapRequest {
  centerLat: number;
  centerLon: number;
  zoom: number;
  width: number;
  height: number;
  mapSource: string;
  tiles: TileSource;
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const TILE_SIZE = 256;
const MOSAIC_TILES = 3;
const CROP_HALF = 256; // 512×512 window around the true centre
const MAX_MERCATOR_LAT = 85.05112878;

const SUPPORTED_SOURCES: readonly string[] = [ExternalMapSource.OSM];

// ─── Projection ──────────────────────────────────────────────────────────────

/**
 * Spherical Mercator (slippy-map) tile coordinates, fractional.
 * Latitude is clamped to the projection's limit before the log/tan.
 */
export function latLonToTile(lat: number, lon: number, zoom: number): { x: number; y: number } {
  const clampedLat = Math.max(-MAX_MERCATOR_LAT, Math.min(MAX_MERCATOR_LAT, lat));
  const n = 2 ** zoom;
  const latRad = (clampedLat * Math.PI) / 180;
  const x = ((lon + 180) / 360) * n;
  const y = ((1 - Math.log(Math.tan(latRad) + 1 / Math.cos(latRad)) / Math.PI) / 2) * n;
  return { x, y };
}

/** Explicit AOI centre wins; otherwise the bbox midpoint. */
export function deriveAoiCenter(requestProfile: Pick<RequestProfile, 'aoiCenter' | 'aoiBbox'>): LatLon {
  if (requestProfile.aoiCenter) {
    return { lat: requestProfile.aoiCenter.lat, lon: requestProfile.aoiCenter.lon };
  }
  if (requestProfile.aoiBbox) {
    const [minLon, minLat, maxLon, maxLat] = requestProfile.aoiBbox;
    return { lat: (minLat + maxLat) / 2, lon: (minLon + maxLon) / 2 };
  }
  throw new Error('external generation requires AOI center or bbox');
}

// ─── Tile Provider ───────────────────────────────────────────────────────────

/** x wraps around the antimeridian, y clamps at the poles. */
export function tileUrl(baseUrl: string, zoom: number, x: number, y: number): string {
  const n = 2 ** zoom;
  const wrappedX = ((x % n) + n) % n;
  const clampedY = Math.max(0, Math.min(n - 1, y));
  return `${baseUrl.replace(/\/+$/, '')}/${zoom}/${wrappedX}/${clampedY}.png`;
}

export function createOsmTileSource(options: TileSourceOptions): TileSource {
  return {
    async fetchTile(zoom, x, y) {
      const url = tileUrl(options.baseUrl, zoom, x, y);
      const res = await fetch(url, {
        headers: { 'User-Agent': options.userAgent },
        signal: AbortSignal.timeout(options.timeoutMs),
      });

      if (!res.ok) {
        throw new Error(`${res.status} ${res.statusText} for ${url}`);
      }

      return decodePng(Buffer.from(await res.arrayBuffer()));
    },
  };
}

// ─── Mosaic ──────────────────────────────────────────────────────────────────

/**
 * Stitch the 3×3 tiles around the centre tile, crop a 512×512 window
 * centred on the exact point, and resample to the requested size.
 * Any tile failure aborts the whole image.
 */
export async function buildExternalMapImage(request: ExternalMapRequest): Promise<Raster> {
  const { centerLat, centerLon, zoom, width, height, mapSource, tiles } = request;

  if (!SUPPORTED_SOURCES.includes(mapSource)) {
    throw new Error(`unsupported external map source: ${mapSource}`);
  }

  const tile = latLonToTile(centerLat, centerLon, zoom);
  const tileX = Math.floor(tile.x);
  const tileY = Math.floor(tile.y);

  const offsets: Array<{ dx: number; dy: number }> = [];
  for (let dy = -1; dy <= 1; dy++) {
    for (let dx = -1; dx <= 1; dx++) offsets.push({ dx, dy });
  }

  let fetched: Raster[];
  try {
    fetched = await Promise.all(offsets.map(({ dx, dy }) => tiles.fetchTile(zoom, tileX + dx, tileY + dy)));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new Error(`external map tile fetch failed: ${detail}`, { cause: err });
  }

  const mosaic = createRaster(TILE_SIZE * MOSAIC_TILES, TILE_SIZE * MOSAIC_TILES, 'RGB');
  offsets.forEach(({ dx, dy }, i) => {
    paste(mosaic, fetched[i], (dx + 1) * TILE_SIZE, (dy + 1) * TILE_SIZE);
  });

  const px = Math.floor((tile.x - tileX) * TILE_SIZE) + TILE_SIZE;
  const py = Math.floor((tile.y - tileY) * TILE_SIZE) + TILE_SIZE;
  const cropped = crop(mosaic, px - CROP_HALF, py - CROP_HALF, px + CROP_HALF, py + CROP_HALF);

  return resizeBilinear(cropped, width, height);
}
