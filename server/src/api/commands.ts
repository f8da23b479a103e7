import { Router } from 'express';
import type { CommandDispatcher, DispatchErrorCode } from '../services/command-dispatcher.js';
import { formatZodError, uplinkRequestSchema } from '../services/request-schemas.js';

export const HTTP_STATUS_BY_DISPATCH_CODE: Record<DispatchErrorCode, number> = {
  NOT_FOUND: 404,
  CONFLICT: 409,
};

export function createCommandRoutes(dispatcher: CommandDispatcher) {
  const router = Router();

  // Submit an imaging request; returns as soon as the command exists
  router.post('/uplink', (req, res) => {
    try {
      const parsed = uplinkRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ success: false, error: formatZodError(parsed.error), timestamp: new Date().toISOString() });
      }

      const command = dispatcher.submit(parsed.data);
      res.status(202).json({ success: true, data: command, timestamp: new Date().toISOString() });
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  // Newest first
  router.get('/commands', (_req, res) => {
    try {
      res.json({ success: true, data: dispatcher.listStatus(), timestamp: new Date().toISOString() });
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  router.get('/commands/:id', (req, res) => {
    try {
      const result = dispatcher.getStatus(req.params.id);
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

  router.post('/commands/:id/rerun', async (req, res) => {
    try {
      const result = await dispatcher.rerun(req.params.id);
      if (!result.success) {
        return res
          .status(HTTP_STATUS_BY_DISPATCH_CODE[result.code])
          .json({ success: false, error: result.error, timestamp: new Date().toISOString() });
      }
      res.status(202).json({ success: true, data: result.data, timestamp: new Date().toISOString() });
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  return router;
}
