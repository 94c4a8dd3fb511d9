import { errorMessage } from '../errors';

export interface Strategy<T> {
  name: string;
  run(): Promise<T[]>;
}

/**
 * Tries each strategy in order and returns the first non-empty result.
 * If every strategy threw, the last error is rethrown; if some merely came
 * back empty, the result is empty.
 */
export async function firstNonEmpty<T>(label: string, strategies: readonly Strategy<T>[]): Promise<T[]> {
  let lastError: unknown;
  let anySucceeded = false;

  for (const strategy of strategies) {
    try {
      const result = await strategy.run();
      anySucceeded = true;
      if (result.length > 0) {
        console.log(`[${label}] ${strategy.name}: ${result.length} records`);
        return result;
      }
      console.log(`[${label}] ${strategy.name} found nothing, trying next strategy`);
    } catch (error) {
      lastError = error;
      console.error(`[${label}] ${strategy.name} failed: ${errorMessage(error)}`);
    }
  }

  if (!anySucceeded && lastError !== undefined) {
    throw lastError;
  }
  return [];
}
