import { Router } from 'express';
import type { CommandDispatcher } from '../services/command-dispatcher.js';
import { HTTP_STATUS_BY_DISPATCH_CODE } from './commands.js';

export function createDownloadRoutes(dispatcher: CommandDispatcher) {
  const router = Router();

  // Raw PNG artifact of a DOWNLINK_READY command
  router.get('/:id', async (req, res) => {
    try {
      const result = await dispatcher.download(req.params.id);
      if (!result.success) {
        return res
          .status(HTTP_STATUS_BY_DISPATCH_CODE[result.code])
          .json({ success: false, error: result.error, timestamp: new Date().toISOString() });
      }
      res.attachment(`${req.params.id}.png`).send(result.data);
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  router.post('/:id/save-local', async (req, res) => {
    try {
      const result = await dispatcher.saveLocal(req.params.id);
      if (!result.success) {
        return res
          .status(HTTP_STATUS_BY_DISPATCH_CODE[result.code])
          .json({ success: false, error: result.error, timestamp: new Date().toISOString() });
      }
      res.json({ success: true, data: result.data, timestamp: new Date().toISOString() });
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  return router;
}
