import express from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import { createJobRoutes, type JobRoutesDeps } from './routes/jobs';
import { loadConfig } from './config';
import { SnapshotStore } from './snapshot/store';
import { SnapshotReader } from './snapshot/reader';
import { runFromConfig } from './scrapers/runner';

export function createApp(deps: JobRoutesDeps): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.use((req, _res, next) => {
    console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
    next();
  });

  // Routes
  app.use('/api', createJobRoutes(deps));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), service: 'jobs' });
  });

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('[Error]', err);
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}

if (require.main === module) {
  dotenv.config();
  const config = loadConfig();

  const reader = new SnapshotReader({
    store: new SnapshotStore(config.snapshotPath),
    remoteUrl: config.remoteSnapshotUrl,
    remoteTtlMs: config.remoteCacheTtlMs,
  });

  const app = createApp({
    reader,
    runScrape: options => runFromConfig(config, options),
  });

  app.listen(config.port, () => {
    console.log(`[Jobs] Server running on http://localhost:${config.port}`);
    console.log(`[Jobs] Serving snapshot ${config.remoteSnapshotUrl ?? config.snapshotPath}`);
  });
}
