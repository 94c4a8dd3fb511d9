import { Router, Request, Response } from 'express';
import type { SnapshotReader } from '../snapshot/reader';
import { filterJobs, getFilterOptions, getJobStats } from '../snapshot/query';
import type { RunSummary } from '../scrapers/runner';
import { UnknownSourceError, errorMessage } from '../errors';

export interface JobRoutesDeps {
  reader: Pick<SnapshotReader, 'read' | 'clear'>;
  runScrape: (options: { sources?: string[]; force?: boolean }) => Promise<RunSummary>;
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseScrapeBody(body: unknown): { source: string; force: boolean } {
  if (typeof body !== 'object' || body === null) return { source: 'all', force: false };
  const source = 'source' in body && typeof body.source === 'string' && body.source.trim() ? body.source.trim() : 'all';
  const force = 'force' in body && body.force === true;
  return { source, force };
}

export function createJobRoutes({ reader, runScrape }: JobRoutesDeps): Router {
  const router = Router();

  // GET /api/jobs/stats - counts per source and latest scrape time
  router.get('/jobs/stats', async (_req: Request, res: Response) => {
    try {
      const { jobs, origin } = await reader.read();
      res.json({ success: true, ...getJobStats(jobs), origin });
    } catch (error) {
      console.error('[API] Stats error:', errorMessage(error));
      res.status(500).json({ success: false, error: 'Failed to get stats' });
    }
  });

  // GET /api/jobs/filters - distinct companies for the select
  router.get('/jobs/filters', async (_req: Request, res: Response) => {
    try {
      const { jobs } = await reader.read();
      res.json({ success: true, ...getFilterOptions(jobs) });
    } catch (error) {
      console.error('[API] Filter options error:', errorMessage(error));
      res.status(500).json({ success: false, error: 'Failed to get filter options' });
    }
  });

  // GET /api/jobs - list with filters
  router.get('/jobs', async (req: Request, res: Response) => {
    try {
      const { jobs: snapshot } = await reader.read();
      const jobs = filterJobs(snapshot, {
        keyword: queryString(req.query.keyword),
        company: queryString(req.query.company),
        location: queryString(req.query.location),
      });
      res.json({ success: true, jobs, total: jobs.length, loaded: snapshot.length });
    } catch (error) {
      console.error('[API] Jobs list error:', errorMessage(error));
      res.status(500).json({ success: false, error: 'Failed to list jobs' });
    }
  });

  // POST /api/cache/clear - next read goes back to the file or remote copy
  router.post('/cache/clear', (_req: Request, res: Response) => {
    reader.clear();
    res.json({ success: true });
  });

  // POST /api/jobs/scrape - run the pipeline for one source or all
  router.post('/jobs/scrape', async (req: Request, res: Response) => {
    const { source, force } = parseScrapeBody(req.body);
    try {
      const summary = await runScrape({ sources: source === 'all' ? undefined : [source], force });
      reader.clear();
      res.json({ success: true, source, ...summary });
    } catch (error) {
      if (error instanceof UnknownSourceError) {
        res.status(400).json({ success: false, error: error.message });
        return;
      }
      const message = errorMessage(error);
      console.error('[API] Scrape error:', message);
      res.status(500).json({ success: false, error: message });
    }
  });

  return router;
}
