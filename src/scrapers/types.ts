import type { RawJobRecord } from '../pipeline/types';
import type { NormalizerProfile } from '../pipeline/normalize';

export type { RawJobRecord };

export interface ScrapeContext {
  /** Aborted when the orchestrator's per-adapter timeout fires. */
  signal: AbortSignal;
  headless: boolean;
  chromiumPath?: string | null;
}

/**
 * One employer career site. The profile fields (company, source label,
 * base URL, field map, location policy) tell the normalizer how to read the
 * records `scrape` returns.
 */
export interface SourceAdapter extends NormalizerProfile {
  readonly name: string;
  readonly baseUrl: string;
  scrape(context: ScrapeContext): Promise<RawJobRecord[]>;
}
