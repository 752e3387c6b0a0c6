import express, { type Request, type Response } from 'express';
import cors from 'cors';
import type { DetectionLoop } from '../services/DetectionLoop';
import type { MetadataCache } from '../services/MetadataCache';
import type { SeenAircraftTracker } from '../services/SeenAircraftTracker';
import type { StatsCollector } from '../services/StatsCollector';
import type { UpstreamSourceStats } from '../services/UpstreamSource';
import type { DisplayDevice } from '../display/DisplayDevice';
import { createLogger } from '../utils/logger';

const logger = createLogger({ component: 'StatusServer' });

export interface StatusServerDeps {
  loop: DetectionLoop;
  stats: StatsCollector;
  cache: MetadataCache;
  tracker: SeenAircraftTracker;
  display: DisplayDevice;
  sources?: ReadonlyArray<{ getName(): string; getStats(): UpstreamSourceStats }>;
}

/**
 * Read-only status API over the running detection loop
 */
export function createServer(deps: StatusServerDeps) {
  const { loop, stats, cache, tracker, display, sources = [] } = deps;
  const app = express();

  // Middleware
  app.use(cors());

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      running: loop.isRunning(),
      timestamp: new Date().toISOString(),
    });
  });

  // Run statistics
  app.get('/api/stats', (_req: Request, res: Response) => {
    try {
      res.json({ success: true, data: stats.summary() });
    } catch (error) {
      logger.error({ error }, 'Error getting run statistics');
      res.status(500).json({ success: false, error: 'Failed to retrieve statistics' });
    }
  });

  app.get('/api/cache/stats', (_req: Request, res: Response) => {
    try {
      res.json({ success: true, data: cache.getStats() });
    } catch (error) {
      logger.error({ error }, 'Error getting cache stats');
      res.status(500).json({ success: false, error: 'Failed to retrieve cache statistics' });
    }
  });

  // Aircraft notified so far, newest first
  app.get('/api/seen', (_req: Request, res: Response) => {
    try {
      const records = tracker
        .records()
        .sort((a, b) => b.firstNotifiedAtUtc.getTime() - a.firstNotifiedAtUtc.getTime());
      res.json({ success: true, count: records.length, data: records });
    } catch (error) {
      logger.error({ error }, 'Error getting seen aircraft');
      res.status(500).json({ success: false, error: 'Failed to retrieve seen aircraft' });
    }
  });

  app.get('/api/sources', (_req: Request, res: Response) => {
    try {
      res.json({
        success: true,
        data: sources.map((source) => ({ name: source.getName(), ...source.getStats() })),
      });
    } catch (error) {
      logger.error({ error }, 'Error getting source stats');
      res.status(500).json({ success: false, error: 'Failed to retrieve source statistics' });
    }
  });

  app.get('/api/status', (_req: Request, res: Response) => {
    try {
      res.json({
        success: true,
        data: {
          running: loop.isRunning(),
          phase: loop.getPhase(),
          fence: loop.getFence(),
          intervalMs: loop.getIntervalMs(),
          display: display.kind,
        },
      });
    } catch (error) {
      logger.error({ error }, 'Error getting loop status');
      res.status(500).json({ success: false, error: 'Failed to retrieve status' });
    }
  });

  return app;
}
