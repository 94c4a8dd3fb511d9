export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** An adapter threw, timed out, or returned something that is not a list. */
export class AdapterFailure extends Error {
  constructor(
    readonly source: string,
    message: string,
    cause?: unknown,
  ) {
    super(`${source}: ${message}`, { cause });
    this.name = 'AdapterFailure';
  }
}

/** Writing the snapshot failed. Fatal for a run. */
export class StoreWriteFailure extends Error {
  constructor(
    readonly filePath: string,
    cause?: unknown,
  ) {
    super(`Failed to write snapshot to ${filePath}: ${errorMessage(cause)}`, { cause });
    this.name = 'StoreWriteFailure';
  }
}

export class UnknownSourceError extends Error {
  constructor(
    readonly source: string,
    readonly available: string[],
  ) {
    super(`Unknown source: ${source}. Available: ${available.join(', ')}`);
    this.name = 'UnknownSourceError';
  }
}
