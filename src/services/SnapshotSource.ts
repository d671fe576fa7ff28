import fs from 'fs';
import { z } from 'zod';
import config from '../config';
import logger from '../utils/logger';
import { err, ok, type Result } from '../utils/result';
import type { ISnapshotSource } from '../types/services.types';
import type { RawObservationBatch } from '../types/observation.types';

const snapshotFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ ac: z.array(z.unknown()) }),
  z.object({ states: z.array(z.unknown()) }),
]);

/**
 * Fixed illustrative records read from a JSON file.
 * Accepts a bare array of named records, `{ ac: [...] }` or `{ states: [...] }`.
 * The file is read once; it is never written.
 */
export class SnapshotSource implements ISnapshotSource {
  private batch: RawObservationBatch | null = null;

  constructor(private readonly filePath: string) {}

  load(): Result<RawObservationBatch, Error> {
    if (this.batch) {
      return ok(this.batch);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      logger.error('Unable to read fallback snapshot', { path: this.filePath, error: cause.message });
      return err(cause);
    }

    const parsed = snapshotFileSchema.safeParse(raw);
    if (!parsed.success) {
      logger.error('Fallback snapshot has an unexpected shape', { path: this.filePath });
      return err(new Error(`Snapshot file ${this.filePath} has an unexpected shape`));
    }

    const { data } = parsed;
    if (Array.isArray(data)) {
      this.batch = { shape: 'named', records: data };
    } else if ('ac' in data) {
      this.batch = { shape: 'named', records: data.ac };
    } else {
      this.batch = { shape: 'positional', records: data.states };
    }
    logger.info('Loaded fallback snapshot', { path: this.filePath, records: this.batch.records?.length ?? 0 });
    return ok(this.batch);
  }
}

const snapshotSource = config.acquisition.snapshotPath
  ? new SnapshotSource(config.acquisition.snapshotPath)
  : null;

export default snapshotSource;
