/**
 * Persisted record of the last seen SDK versions
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { isErrnoException, toError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';
import { TrackedVersionsSchema, type TrackedVersions } from '../schemas/index.js';

export class VersionStore {
  private readonly file: string;
  private readonly log: Logger;

  constructor(file: string, logger?: Logger) {
    this.file = path.resolve(file);
    this.log = (logger ?? defaultLogger).child({ component: 'version-store' });
  }

  get filePath(): string {
    return this.file;
  }

  /**
   * Versions keyed by `registry:name`. A missing or malformed file yields
   * an empty record, so every package counts as updated.
   */
  async load(): Promise<Record<string, string>> {
    let raw: string;
    try {
      raw = await readFile(this.file, 'utf8');
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        this.log.warn('Failed to read versions file', { file: this.file, error: toError(error).message });
      }
      return {};
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.log.warn('Versions file is not valid JSON; starting empty', {
        file: this.file,
        error: toError(error).message,
      });
      return {};
    }

    const parsed = TrackedVersionsSchema.safeParse(json);
    if (!parsed.success) {
      this.log.warn('Versions file has an unexpected shape; starting empty', { file: this.file });
      return {};
    }
    return parsed.data.versions;
  }

  async save(versions: Record<string, string>, checkedAt: Date): Promise<void> {
    const record: TrackedVersions = { versions, lastChecked: checkedAt.toISOString() };
    const tempFile = `${this.file}.${process.pid}.tmp`;
    await mkdir(path.dirname(this.file), { recursive: true });
    await writeFile(tempFile, JSON.stringify(record, null, 2), 'utf8');
    await rename(tempFile, this.file);
  }
}
