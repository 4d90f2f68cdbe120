import { mkdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';

/**
 * Daily lookup counter as persisted on the device.
 * `day` is the local calendar day (YYYY-MM-DD) the count belongs to.
 */
export interface DailyCounterRecord {
  count: number;
  day: string;
}

/**
 * Device-local key-value storage behind the daily quota.
 * Both fields are written together so a reader never sees a count
 * from one day paired with another day.
 */
export interface DailyCounterStore {
  read(): Promise<DailyCounterRecord | null>;
  write(record: DailyCounterRecord): Promise<void>;
}

export class MemoryDailyCounterStore implements DailyCounterStore {
  private record: DailyCounterRecord | null;

  constructor(initial: DailyCounterRecord | null = null) {
    this.record = initial ? { ...initial } : null;
  }

  async read(): Promise<DailyCounterRecord | null> {
    return this.record ? { ...this.record } : null;
  }

  async write(record: DailyCounterRecord): Promise<void> {
    this.record = { ...record };
  }
}

function isCounterRecord(value: unknown): value is DailyCounterRecord {
  if (typeof value !== 'object' || value === null) return false;
  if (!('count' in value) || !('day' in value)) return false;
  return (
    typeof value.count === 'number' &&
    Number.isInteger(value.count) &&
    value.count >= 0 &&
    typeof value.day === 'string'
  );
}

// fs errors are not always `instanceof Error` (Jest runs tests in another realm)
function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * JSON file store for the daily counter, for Node hosts without a
 * settings database. A missing or corrupt file reads as "no record".
 */
export class FileDailyCounterStore implements DailyCounterStore {
  constructor(private readonly filePath: string) {}

  async read(): Promise<DailyCounterRecord | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      return isCounterRecord(parsed) ? { count: parsed.count, day: parsed.day } : null;
    } catch {
      return null;
    }
  }

  async write(record: DailyCounterRecord): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(record), 'utf8');
  }
}
