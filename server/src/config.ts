import dotenv from 'dotenv';
import path from 'path';
dotenv.config();

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  const items = value.split(',').map(item => item.trim()).filter(Boolean);
  return items.length > 0 ? items : fallback;
}

export const config = {
  port: parseInt(process.env.PORT || '6005', 10),
  corsOrigins: parseList(process.env.CORS_ORIGIN, ['http://localhost:6005', 'http://127.0.0.1:6005']),
  nodeEnv: process.env.NODE_ENV || 'development',

  // x-api-key shared secret; every route except /api/health requires it
  apiKey: process.env.SATSIM_API_KEY || 'change-me',
  rateLimitPerMin: parseInt(process.env.SATSIM_RATE_LIMIT_PER_MIN || '600', 10),

  imageDir: path.resolve(process.env.SATSIM_IMAGE_DIR || path.join(process.cwd(), 'data', 'images')),

  // External map tiles (EXTERNAL generation mode + preview)
  tiles: {
    baseUrl: process.env.SATSIM_TILE_BASE_URL || 'https://tile.openstreetmap.org',
    userAgent: process.env.SATSIM_TILE_USER_AGENT || 'satsim/0.3 (+https://localhost; contact: local-dev)',
    timeoutMs: 8000,
  },

  // Command lifecycle simulation
  pipeline: {
    timeScale: parseFloat(process.env.SIM_TIME_SCALE || '1'), // 0.1 = ten times faster
    randomSeed: process.env.SIM_RANDOM_SEED || undefined,
    defaultFailProbability: 0.05,
  },
};

// Startup validation: warn about insecure defaults
if (config.apiKey === 'change-me') {
  console.warn('[config] WARNING: SATSIM_API_KEY is not set — using the default key "change-me"');
}
if (!Number.isFinite(config.pipeline.timeScale) || config.pipeline.timeScale < 0) {
  console.warn(`[config] WARNING: invalid SIM_TIME_SCALE, falling back to 1`);
  config.pipeline.timeScale = 1;
}
