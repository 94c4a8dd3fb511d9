import fs from 'fs';
import path from 'path';
import type { Snapshot } from '../pipeline/types';
import { StoreWriteFailure, errorMessage } from '../errors';
import { parseSnapshot, serializeSnapshot } from './schema';

/**
 * The snapshot file is the only durable state. Loads never fail; saves replace
 * the whole document through a temp file and a rename.
 */
export class SnapshotStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<Snapshot> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        console.log(`[Store] No snapshot at ${this.filePath}, starting empty`);
      } else {
        console.error(`[Store] Could not read ${this.filePath}: ${errorMessage(error)}`);
      }
      return [];
    }

    try {
      return parseSnapshot(text);
    } catch (error) {
      console.error(`[Store] Ignoring unreadable snapshot ${this.filePath}: ${errorMessage(error)}`);
      return [];
    }
  }

  async save(snapshot: Snapshot): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tmpPath = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.${Date.now()}.tmp`);

    try {
      await fs.promises.mkdir(dir, { recursive: true });
      await fs.promises.writeFile(tmpPath, serializeSnapshot(snapshot), 'utf-8');
      await fs.promises.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.promises.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        console.error(`[Store] Could not remove ${tmpPath}: ${errorMessage(cleanupError)}`);
      });
      throw new StoreWriteFailure(this.filePath, error);
    }

    console.log(`[Store] Saved ${snapshot.length} jobs to ${this.filePath}`);
  }

  /** Modification time in ms, or 0 when the file is missing. */
  async modifiedAt(): Promise<number> {
    try {
      const stat = await fs.promises.stat(this.filePath);
      return stat.mtimeMs;
    } catch (error) {
      if (isNotFound(error)) return 0;
      throw error;
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
