import cors from 'cors';
import express, { type ErrorRequestHandler } from 'express';
import { createCommandRoutes } from './api/commands.js';
import { createDownloadRoutes } from './api/downloads.js';
import { createGroundStationRoutes } from './api/ground-stations.js';
import { createImageRoutes } from './api/images.js';
import { createPreviewRoutes } from './api/preview.js';
import { createSatelliteRoutes, satelliteTypeRoutes } from './api/satellites.js';
import type { SimulatorContext } from './context.js';
import { API_KEY_HEADER, requireApiKey } from './middleware/api-key.js';
import { rateLimit, SlidingWindowLimiter } from './middleware/rate-limit.js';

export interface AppOptions {
  apiKey: string;
  rateLimitPerMin: number;
  corsOrigins: string[];
}

// Malformed JSON bodies surface here from express.json()
const handleErrors: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof SyntaxError) {
    return res.status(400).json({ success: false, error: 'Malformed JSON body', timestamp: new Date().toISOString() });
  }
  console.error('[API] Unhandled error:', err);
  res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
};

export function createApp(ctx: SimulatorContext, options: AppOptions) {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────

  app.use(
    cors({
      origin: options.corsOrigins,
      methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', API_KEY_HEADER],
    }),
  );
  app.use(express.json({ limit: '1mb' }));
  app.use(requireApiKey(options.apiKey));
  app.use(rateLimit(new SlidingWindowLimiter(options.rateLimitPerMin)));

  // ─── Health Check ───────────────────────────────────────────────────────────

  app.get('/api/health', (_req, res) => {
    res.json({
      success: true,
      data: { status: 'healthy', inFlightTasks: ctx.supervisor.size },
      timestamp: new Date().toISOString(),
    });
  });

  // ─── API Routes ─────────────────────────────────────────────────────────────

  app.use('/api/satellite-types', satelliteTypeRoutes);
  app.use('/api/satellites', createSatelliteRoutes(ctx.store));
  app.use('/api/ground-stations', createGroundStationRoutes(ctx.store));
  app.use('/api', createCommandRoutes(ctx.dispatcher));
  app.use('/api/downloads', createDownloadRoutes(ctx.dispatcher));
  app.use('/api/images', createImageRoutes(ctx.dispatcher));
  app.use('/api/preview', createPreviewRoutes(ctx.dispatcher));

  app.use('/api', (_req, res) => {
    res.status(404).json({ success: false, error: 'Not found', timestamp: new Date().toISOString() });
  });

  app.use(handleErrors);

  return app;
}
