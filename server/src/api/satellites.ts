import { Router } from 'express';
import {
  createSatellite,
  deleteSatellite,
  listSatellites,
  seedDefaultSatellites,
  updateSatellite,
} from '../services/registry.js';
import { createSatelliteSchema, formatZodError, updateSatelliteSchema } from '../services/request-schemas.js';
import { SATELLITE_TYPE_PROFILES } from '../services/satellite-profiles.js';
import type { SimulatorStore } from '../services/simulator-store.js';

export const satelliteTypeRoutes = Router();

// Static per-type platform profiles
satelliteTypeRoutes.get('/', (_req, res) => {
  res.json({ success: true, data: SATELLITE_TYPE_PROFILES, timestamp: new Date().toISOString() });
});

export function createSatelliteRoutes(store: SimulatorStore) {
  const router = Router();

  router.get('/', (_req, res) => {
    try {
      res.json({ success: true, data: listSatellites(store), timestamp: new Date().toISOString() });
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  router.post('/', (req, res) => {
    try {
      const parsed = createSatelliteSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ success: false, error: formatZodError(parsed.error), timestamp: new Date().toISOString() });
      }

      const satellite = createSatellite(store, parsed.data);
      console.log(`[API] satellite created: ${satellite.id} (${satellite.name})`);
      res.status(201).json({ success: true, data: satellite, timestamp: new Date().toISOString() });
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  // Idempotent: presets already present by name are skipped
  router.post('/seed', (_req, res) => {
    try {
      const seededIds = seedDefaultSatellites(store);
      res.json({ success: true, data: { seededIds, satellites: listSatellites(store) }, timestamp: new Date().toISOString() });
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  router.patch('/:id', (req, res) => {
    try {
      const parsed = updateSatelliteSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ success: false, error: formatZodError(parsed.error), timestamp: new Date().toISOString() });
      }

      const satellite = updateSatellite(store, req.params.id, parsed.data);
      if (!satellite) {
        return res.status(404).json({ success: false, error: 'Satellite not found', timestamp: new Date().toISOString() });
      }
      res.json({ success: true, data: satellite, timestamp: new Date().toISOString() });
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  router.delete('/:id', (req, res) => {
    try {
      const removed = deleteSatellite(store, req.params.id);
      if (!removed) {
        return res.status(404).json({ success: false, error: 'Satellite not found', timestamp: new Date().toISOString() });
      }
      console.log(`[API] satellite deleted: ${removed.id}`);
      res.json({ success: true, data: { id: removed.id }, timestamp: new Date().toISOString() });
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  return router;
}
