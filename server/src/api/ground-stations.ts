import { Router } from 'express';
import {
  createGroundStation,
  deleteGroundStation,
  listGroundStations,
  seedDefaultGroundStations,
  updateGroundStation,
} from '../services/registry.js';
import { createGroundStationSchema, formatZodError, updateGroundStationSchema } from '../services/request-schemas.js';
import type { SimulatorStore } from '../services/simulator-store.js';

export function createGroundStationRoutes(store: SimulatorStore) {
  const router = Router();

  router.get('/', (_req, res) => {
    try {
      res.json({ success: true, data: listGroundStations(store), timestamp: new Date().toISOString() });
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  router.post('/', (req, res) => {
    try {
      const parsed = createGroundStationSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ success: false, error: formatZodError(parsed.error), timestamp: new Date().toISOString() });
      }

      const station = createGroundStation(store, parsed.data);
      console.log(`[API] ground station created: ${station.id} (${station.name})`);
      res.status(201).json({ success: true, data: station, timestamp: new Date().toISOString() });
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  router.post('/seed', (_req, res) => {
    try {
      const seededIds = seedDefaultGroundStations(store);
      res.json({
        success: true,
        data: { seededIds, groundStations: listGroundStations(store) },
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  router.patch('/:id', (req, res) => {
    try {
      const parsed = updateGroundStationSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ success: false, error: formatZodError(parsed.error), timestamp: new Date().toISOString() });
      }

      const station = updateGroundStation(store, req.params.id, parsed.data);
      if (!station) {
        return res.status(404).json({ success: false, error: 'Ground station not found', timestamp: new Date().toISOString() });
      }
      res.json({ success: true, data: station, timestamp: new Date().toISOString() });
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  router.delete('/:id', (req, res) => {
    try {
      const removed = deleteGroundStation(store, req.params.id);
      if (!removed) {
        return res.status(404).json({ success: false, error: 'Ground station not found', timestamp: new Date().toISOString() });
      }
      console.log(`[API] ground station deleted: ${removed.id}`);
      res.json({ success: true, data: { id: removed.id }, timestamp: new Date().toISOString() });
    } catch (error) {
      console.error(error);
      res.status(500).json({ success: false, error: 'Internal server error', timestamp: new Date().toISOString() });
    }
  });

  return router;
}
