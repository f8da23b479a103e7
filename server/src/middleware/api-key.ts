import type { RequestHandler } from 'express';

export const API_KEY_HEADER = 'x-api-key';

const PUBLIC_PATHS = new Set(['/api/health']);
const QUERY_KEY_PREFIX = '/api/downloads/';

/**
 * Shared-secret check on every /api route except the public ones. Download
 * links can't attach headers from a browser, so those also take ?apiKey=.
 */
export function requireApiKey(apiKey: string): RequestHandler {
  return (req, res, next) => {
    if (req.method === 'OPTIONS' || PUBLIC_PATHS.has(req.path)) return next();

    let supplied = req.get(API_KEY_HEADER) ?? '';
    if (!supplied && req.path.startsWith(QUERY_KEY_PREFIX) && typeof req.query.apiKey === 'string') {
      supplied = req.query.apiKey;
    }

    if (supplied !== apiKey) {
      console.warn(`[AUTH] rejected ${req.method} ${req.path} from ${req.ip ?? 'unknown'}`);
      return res.status(401).json({ success: false, error: 'Unauthorized', timestamp: new Date().toISOString() });
    }
    next();
  };
}
