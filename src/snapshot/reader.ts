import type { Snapshot } from '../pipeline/types';
import { errorMessage } from '../errors';
import { parseSnapshot } from './schema';
import type { SnapshotStore } from './store';

export type SnapshotOrigin = 'local' | 'remote';

export interface SnapshotView {
  jobs: Snapshot;
  origin: SnapshotOrigin;
}

export interface SnapshotReaderOptions {
  store: SnapshotStore;
  /** Published copy of the snapshot; the local file is the fallback. */
  remoteUrl?: string | null;
  remoteTtlMs: number;
  now?: () => number;
  fetchImpl?: typeof fetch;
}

/**
 * Read side used by the API. The local file is re-read only when its mtime
 * changes; a remote copy is re-fetched once its TTL runs out.
 */
export class SnapshotReader {
  private local: { mtime: number; jobs: Snapshot } | null = null;
  private remote: { fetchedAt: number; jobs: Snapshot } | null = null;
  private readonly now: () => number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: SnapshotReaderOptions) {
    this.now = options.now ?? Date.now;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async read(): Promise<SnapshotView> {
    if (this.options.remoteUrl) {
      try {
        return { jobs: await this.readRemote(this.options.remoteUrl), origin: 'remote' };
      } catch (error) {
        console.error(`[Reader] Remote fetch failed: ${errorMessage(error)}. Falling back to local file.`);
      }
    }
    return { jobs: await this.readLocal(), origin: 'local' };
  }

  clear(): void {
    this.local = null;
    this.remote = null;
  }

  private async readLocal(): Promise<Snapshot> {
    const mtime = await this.options.store.modifiedAt();
    if (this.local && this.local.mtime === mtime) {
      return this.local.jobs;
    }
    const jobs = await this.options.store.load();
    this.local = { mtime, jobs };
    return jobs;
  }

  private async readRemote(remoteUrl: string): Promise<Snapshot> {
    const now = this.now();
    const ttl = this.options.remoteTtlMs;
    if (this.remote && now - this.remote.fetchedAt < ttl) {
      return this.remote.jobs;
    }

    const url = new URL(remoteUrl);
    url.searchParams.set('t', String(Math.floor(now / ttl)));
    const response = await this.fetchImpl(url, { headers: { 'Cache-Control': 'no-cache' } });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} from ${remoteUrl}`);
    }

    const jobs = parseSnapshot(await response.text());
    this.remote = { fetchedAt: now, jobs };
    console.log(`[Reader] Loaded ${jobs.length} jobs from remote snapshot`);
    return jobs;
  }
}
