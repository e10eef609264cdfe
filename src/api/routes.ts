import express from 'express';
import { PanelStateEngine } from '../ingest/panelStateEngine';
import { parseMasterFlag } from '../protocol/masterStatusDecoder';
import { PanelEventStorage, isPanelEventType } from '../storage/panelEventStorage';
import { MASTER_FLAGS, MAX_DEVICES, ZONES_PER_DEVICE } from '../types/panel';

export function createRoutes(engine: PanelStateEngine, events: PanelEventStorage | null = null): express.Router {
  const router = express.Router();

  // Aggregated label, master LEDs and current zone lists
  router.get('/status', (req, res) => {
    res.json({
      success: true,
      data: engine.getSnapshot()
    });
  });

  // Single master flag, rate-governed
  router.get('/flags/:name', (req, res) => {
    const flag = parseMasterFlag(req.params.name);
    if (!flag) {
      return res.status(404).json({
        success: false,
        message: `Unknown flag ${req.params.name}; expected one of ${MASTER_FLAGS.join(', ')}`
      });
    }

    res.json({
      success: true,
      data: { flag, value: engine.getMasterFlag(flag) }
    });
  });

  router.get('/zones', (req, res) => {
    const { state } = req.query;
    if (state === 'alarm' || state === 'trouble') {
      const zones = state === 'alarm' ? engine.getActiveAlarmZones() : engine.getActiveTroubleZones();
      return res.json({ success: true, total: zones.length, data: zones });
    }

    res.status(400).json({
      success: false,
      message: 'Query parameter state must be alarm or trouble'
    });
  });

  router.get('/zones/:zone', (req, res) => {
    const zoneNumber = Number(req.params.zone);
    const maxZone = engine.getDeviceCount() * ZONES_PER_DEVICE;
    if (!Number.isInteger(zoneNumber) || zoneNumber < 1 || zoneNumber > maxZone) {
      return res.status(400).json({
        success: false,
        message: `Zone must be an integer between 1 and ${maxZone}`
      });
    }

    const status = engine.getZoneStatus(zoneNumber);
    if (!status) {
      return res.status(404).json({
        success: false,
        message: `No status received for zone ${zoneNumber}`
      });
    }

    res.json({
      success: true,
      data: {
        ...status,
        accumulatedAlarm: engine.isZoneAccumulatedAlarm(zoneNumber),
        accumulatedTrouble: engine.isZoneAccumulatedTrouble(zoneNumber)
      }
    });
  });

  router.put('/zones/:zone/name', (req, res) => {
    const zoneNumber = Number(req.params.zone);
    const maxZone = engine.getDeviceCount() * ZONES_PER_DEVICE;
    const name: unknown = req.body?.name;
    if (!Number.isInteger(zoneNumber) || zoneNumber < 1 || zoneNumber > maxZone) {
      return res.status(400).json({
        success: false,
        message: `Zone must be an integer between 1 and ${maxZone}`
      });
    }
    if (typeof name !== 'string' || name.length > 64) {
      return res.status(400).json({
        success: false,
        message: 'Body must contain a name of at most 64 characters (empty resets it)'
      });
    }

    engine.setZoneName(zoneNumber, name);
    res.json({ success: true, data: { zone: zoneNumber, name: engine.getZoneName(zoneNumber) } });
  });

  router.get('/accumulated', (req, res) => {
    res.json({
      success: true,
      data: {
        ...engine.getAccumulatedCounts(),
        zones: engine.getAccumulatedZones()
      }
    });
  });

  router.get('/bells', (req, res) => {
    const limit = Math.max(1, Math.min(100, Number(req.query.limit) || 20));
    res.json({
      success: true,
      data: engine.getBellStatus(limit)
    });
  });

  router.get('/stats', (req, res) => {
    res.json({
      success: true,
      data: engine.getStats()
    });
  });

  router.get('/events', async (req, res) => {
    if (!events) {
      return res.status(503).json({ success: false, message: 'Event log is disabled' });
    }

    const type = typeof req.query.type === 'string' ? req.query.type : undefined;
    if (type !== undefined && !isPanelEventType(type)) {
      return res.status(400).json({ success: false, message: `Unknown event type ${type}` });
    }

    try {
      const rows = await events.recent(Number(req.query.limit) || 50, type);
      res.json({
        success: true,
        total: rows.length,
        data: rows
      });
    } catch (error) {
      console.error('[API] Failed to fetch panel events:', error);
      res.status(500).json({ success: false, message: 'Failed to fetch panel events' });
    }
  });

  // Switch the active producer
  router.post('/mode', (req, res) => {
    const { mode } = req.body ?? {};
    if (mode !== 'push' && mode !== 'socket') {
      return res.status(400).json({
        success: false,
        message: 'mode must be push or socket'
      });
    }

    engine.onModeChanged(mode);
    res.json({
      success: true,
      message: `Ingest mode is ${engine.getMode()}`,
      data: { mode: engine.getMode() }
    });
  });

  router.post('/device-count', (req, res) => {
    const count = Number(req.body?.count);
    if (!Number.isInteger(count) || count < 1 || count > MAX_DEVICES) {
      return res.status(400).json({
        success: false,
        message: `count must be an integer between 1 and ${MAX_DEVICES}`
      });
    }

    res.json({
      success: true,
      data: { deviceCount: engine.setDeviceCount(count) }
    });
  });

  router.post('/reset', (req, res) => {
    engine.beginSystemReset();
    res.json({
      success: true,
      message: 'System reset display started',
      data: engine.getAggregatedLabel()
    });
  });

  return router;
}
