import { Router } from 'express';
import type { CommandDispatcher } from '../services/command-dispatcher.js';

export function createImageRoutes(dispatcher: CommandDispatcher) {
  const router = Router();

  // Deletes every generated image; command states are left alone
  router.post('/clear', async (_req, res) => {
    try {
      const result = await dispatcher.clearImages();
      res.json({ success: true, data: result, timestamp: new Date().toISOString() });
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  return router;
}
