import path from 'path';
import { MERGE_POLICIES, type MergePolicy } from './pipeline/types';

export interface Config {
  snapshotPath: string;
  mergePolicy: MergePolicy;
  adapterTimeoutMs: number;
  adapterConcurrency: number;
  /** Adapter names to run; empty means every registered adapter. */
  enabledSources: string[];
  headless: boolean;
  chromiumPath: string | null;
  port: number;
  remoteSnapshotUrl: string | null;
  remoteCacheTtlMs: number;
}

export const DEFAULT_SNAPSHOT_PATH = path.join(__dirname, '../data/latest_jobs.json');

function parseStringArray(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

function parsePositiveInt(name: string, value: string | undefined, defaultValue: number): number {
  if (!value || !value.trim()) return defaultValue;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: expected a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseMergePolicy(value: string | undefined): MergePolicy {
  const policy = (value ?? '').trim().toLowerCase();
  if (!policy) return 'replace';
  const match = MERGE_POLICIES.find(p => p === policy);
  if (!match) {
    throw new Error(`Invalid MERGE_POLICY: "${value}". Expected one of ${MERGE_POLICIES.join(', ')}`);
  }
  return match;
}

function optional(value: string | undefined): string | null {
  return value && value.trim() ? value.trim() : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const snapshotPath = optional(env.SNAPSHOT_PATH);

  return {
    snapshotPath: snapshotPath ? path.resolve(snapshotPath) : DEFAULT_SNAPSHOT_PATH,
    mergePolicy: parseMergePolicy(env.MERGE_POLICY),
    adapterTimeoutMs: parsePositiveInt('ADAPTER_TIMEOUT_MS', env.ADAPTER_TIMEOUT_MS, 180_000),
    adapterConcurrency: parsePositiveInt('ADAPTER_CONCURRENCY', env.ADAPTER_CONCURRENCY, 1),
    enabledSources: parseStringArray(env.ENABLED_SOURCES),
    headless: parseBoolean(env.HEADLESS, true),
    chromiumPath: optional(env.CHROMIUM_PATH),
    port: parsePositiveInt('PORT', env.PORT, 3001),
    remoteSnapshotUrl: optional(env.REMOTE_SNAPSHOT_URL),
    remoteCacheTtlMs: parsePositiveInt('REMOTE_CACHE_TTL_MS', env.REMOTE_CACHE_TTL_MS, 86_400_000),
  };
}
