import { Router } from 'express';
import type { CommandDispatcher } from '../services/command-dispatcher.js';
import { externalMapPreviewSchema, formatZodError } from '../services/request-schemas.js';

export function createPreviewRoutes(dispatcher: CommandDispatcher) {
  const router = Router();

  // One-off map mosaic, not tied to a command
  router.get('/external-map', async (req, res) => {
    const parsed = externalMapPreviewSchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: formatZodError(parsed.error), timestamp: new Date().toISOString() });
    }

    try {
      const png = await dispatcher.previewExternalMap(parsed.data);
      res.type('image/png').send(png);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      console.error(`[TILES] preview failed: ${detail}`);
      res.status(502).json({
        success: false,
        error: `external map preview failed: ${detail}`,
        timestamp: new Date().toISOString(),
      });
    }
  });

  return router;
}
