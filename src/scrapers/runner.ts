import type { RawJobRecord, SourceAdapter } from './types';
import { adapters as defaultRegistry, resolveAdapters, type AdapterRegistry } from './registry';
import type { CanonicalJob, MergePolicy } from '../pipeline/types';
import { normalizeJob } from '../pipeline/normalize';
import { mergeSnapshots } from '../pipeline/merge';
import { SnapshotStore } from '../snapshot/store';
import type { Config } from '../config';
import { AdapterFailure, errorMessage } from '../errors';
import { debug } from '../log';

export interface RunOptions {
  store: Pick<SnapshotStore, 'load' | 'save'>;
  policy?: MergePolicy;
  /** Explicit subset for this run; other sources keep their previous records. */
  sources?: string[];
  /** Configured adapter set; empty means all. Ignored when `sources` is given. */
  enabledSources?: string[];
  /** Save even when the run would empty a non-empty snapshot. */
  force?: boolean;
  timeoutMs?: number;
  concurrency?: number;
  headless?: boolean;
  chromiumPath?: string | null;
  registry?: AdapterRegistry;
  now?: () => Date;
}

export interface SourceResult {
  jobsFound: number;
  jobsKept: number;
  rejected: number;
  error?: string;
}

export interface RunSummary {
  policy: MergePolicy;
  previousCount: number;
  snapshotCount: number;
  saved: boolean;
  sources: Record<string, SourceResult>;
}

interface AdapterOutcome {
  adapter: SourceAdapter;
  jobs: CanonicalJob[];
  result: SourceResult;
}

/** Runs `fn` over `items` with at most `limit` in flight; results keep input order. */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

function isRecord(value: unknown): value is RawJobRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Calls the adapter under a timeout. The signal handed to the adapter is
 * aborted when the timeout fires so browsers and fetches get torn down.
 */
export async function scrapeWithTimeout(
  adapter: SourceAdapter,
  timeoutMs: number,
  options: { headless: boolean; chromiumPath: string | null },
): Promise<unknown[]> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new AdapterFailure(adapter.name, `timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    const result: unknown = await Promise.race([
      adapter.scrape({ signal: controller.signal, headless: options.headless, chromiumPath: options.chromiumPath }),
      timeout,
    ]);
    if (!Array.isArray(result)) {
      throw new AdapterFailure(adapter.name, `returned ${typeof result} instead of a list`);
    }
    return result;
  } catch (error) {
    if (error instanceof AdapterFailure) throw error;
    throw new AdapterFailure(adapter.name, errorMessage(error), error);
  } finally {
    clearTimeout(timer);
  }
}

function normalizeBatch(adapter: SourceAdapter, raw: readonly unknown[], now: Date): CanonicalJob[] {
  const jobs: CanonicalJob[] = [];
  for (const item of raw) {
    const job = isRecord(item) ? normalizeJob(item, adapter, now) : null;
    if (job) {
      jobs.push(job);
    } else {
      debug(adapter.source, `Rejected record: ${JSON.stringify(item)}`);
    }
  }
  return jobs;
}

/**
 * One pipeline run: load the previous snapshot, scrape, normalize, merge,
 * guard against wiping the snapshot, save.
 */
export async function runScrapers(options: RunOptions): Promise<RunSummary> {
  const {
    store,
    policy = 'replace',
    force = false,
    timeoutMs = 180_000,
    concurrency = 1,
    headless = true,
    chromiumPath = null,
    registry = defaultRegistry,
    now = () => new Date(),
  } = options;

  const explicit = options.sources !== undefined && options.sources.length > 0;
  const selected = resolveAdapters(explicit ? (options.sources ?? []) : (options.enabledSources ?? []), registry);

  const previous = await store.load();
  console.log(`[Runner] Loaded ${previous.length} previous jobs. Running ${selected.length} sources (${policy})...`);

  const outcomes = await mapWithConcurrency(selected, concurrency, async (adapter): Promise<AdapterOutcome> => {
    console.log(`[Runner] Starting scrape for ${adapter.name}...`);
    try {
      const raw = await scrapeWithTimeout(adapter, timeoutMs, { headless, chromiumPath });
      const jobs = normalizeBatch(adapter, raw, now());
      const result = { jobsFound: raw.length, jobsKept: jobs.length, rejected: raw.length - jobs.length };
      console.log(`[Runner] ${adapter.name} complete: ${result.jobsFound} found, ${result.jobsKept} kept`);
      return { adapter, jobs, result };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[Runner] ${adapter.name} failed: ${message}`);
      return { adapter, jobs: [], result: { jobsFound: 0, jobsKept: 0, rejected: 0, error: message } };
    }
  });

  // A failed source keeps its previous postings; so does one an explicit run left out.
  const fresh = outcomes.flatMap(outcome => {
    if (outcome.result.error === undefined) return outcome.jobs;
    const kept = previous.filter(job => job.source === outcome.adapter.source);
    if (kept.length > 0) {
      console.log(`[Runner] Keeping ${kept.length} previous ${outcome.adapter.name} jobs after the failure`);
    }
    return kept;
  });

  let carried: CanonicalJob[] = [];
  if (explicit) {
    const ranLabels = new Set(selected.map(adapter => adapter.source));
    carried = previous.filter(job => !ranLabels.has(job.source));
  }

  const merged = mergeSnapshots(previous, [...carried, ...fresh], policy);

  const sources: Record<string, SourceResult> = {};
  for (const outcome of outcomes) {
    sources[outcome.adapter.name] = outcome.result;
  }

  const summary: RunSummary = {
    policy,
    previousCount: previous.length,
    snapshotCount: merged.length,
    saved: false,
    sources,
  };

  if (merged.length === 0 && previous.length > 0 && !force) {
    console.error(
      `[Runner] Run produced no jobs; keeping the previous ${previous.length}. Re-run with --force to save an empty snapshot.`,
    );
    return { ...summary, snapshotCount: previous.length };
  }

  await store.save(merged);
  console.log(`[Runner] Snapshot now holds ${merged.length} jobs`);
  return { ...summary, saved: true };
}

/** `runScrapers` wired to the environment configuration. */
export function runFromConfig(
  config: Config,
  options: { sources?: string[]; force?: boolean; registry?: AdapterRegistry } = {},
): Promise<RunSummary> {
  return runScrapers({
    store: new SnapshotStore(config.snapshotPath),
    policy: config.mergePolicy,
    enabledSources: config.enabledSources,
    timeoutMs: config.adapterTimeoutMs,
    concurrency: config.adapterConcurrency,
    headless: config.headless,
    chromiumPath: config.chromiumPath,
    ...options,
  });
}
