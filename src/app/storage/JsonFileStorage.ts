import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { PersistedRecord } from '../../shared/types';
import { PersistenceError } from '../../shared/errors';
import { PersistedRecordSchema } from '../settings';

/** A record as read back from disk; settings are checked by the caller. */
export type StoredRecord = z.infer<typeof PersistedRecordSchema>;

export interface RecordStorage {
  /** Returns null when nothing has been saved yet. */
  load(): StoredRecord | null;
  save(record: PersistedRecord): void;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class JsonFileStorage implements RecordStorage {
  constructor(readonly filePath: string) {}

  load(): StoredRecord | null {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new PersistenceError(this.filePath, 'read', err);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError(this.filePath, 'read', err);
    }

    const result = PersistedRecordSchema.safeParse(parsed);
    if (!result.success) {
      const detail = result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new PersistenceError(this.filePath, 'read', new Error(`unexpected data (${detail})`));
    }
    return result.data;
  }

  /** Writes beside the target and renames over it, so readers never see half a file. */
  save(record: PersistedRecord): void {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    let tmpWritten = false;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tmpPath, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
      tmpWritten = true;
      fs.renameSync(tmpPath, this.filePath);
    } catch (err) {
      if (tmpWritten) fs.rmSync(tmpPath, { force: true });
      throw new PersistenceError(this.filePath, 'write', err);
    }
  }
}
