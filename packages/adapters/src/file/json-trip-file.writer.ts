import { mkdir, rename, writeFile } from 'fs/promises';
import path from 'path';
import type { TripRecord, TripSinkPort } from '@fleet-trips/domain';

/**
 * Writes the whole trip list as a 4-space indented JSON array. The file is
 * written beside the target first and renamed over it, so readers never see
 * a half-written list.
 */
export class JsonTripFileWriter implements TripSinkPort {
  readonly name = 'json-file';
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async saveAll(records: readonly TripRecord[]): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tmpPath, JSON.stringify(records, null, 4), 'utf-8');
    await rename(tmpPath, this.filePath);
  }
}
