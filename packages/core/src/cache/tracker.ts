/**
 * Content Change Tracker
 *
 * Persists, per tracked file, the content hash, declared dependencies and
 * last validation outcome, and answers "has this file changed since the
 * last build?" and "what depends on this file?".
 *
 * The tracker is the sole writer of the cache file. Every update rewrites the
 * whole file (temp file + rename), so a crash between updates loses at most
 * the in-flight entry and never corrupts what was already persisted.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { mkdir, readFile, rename, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { HASH_CHUNK_SIZE_BYTES } from '../constants.js';
import { isErrnoException, toError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';
import { PersistedCacheSchema } from '../schemas/index.js';
import type { PersistedCache, TrackedUnitState } from '../types/index.js';
import { CacheFileLock } from './file-lock.js';
import { WriteLock } from './write-lock.js';

export interface ChangeTrackerOptions {
  /** Path of the persisted cache file */
  cacheFile: string;
  hashChunkSize?: number;
  logger?: Logger;
}

/**
 * Canonical identifier for a tracked file
 */
export function canonicalUnitId(unit: string): string {
  return path.resolve(unit);
}

export class ChangeTracker {
  private state = new Map<string, TrackedUnitState>();
  private readonly writeLock = new WriteLock();
  private readonly fileLock: CacheFileLock;
  private readonly cacheFile: string;
  private readonly hashChunkSize: number;
  private readonly log: Logger;
  private opened = false;
  /** In-memory state differs from what was last written */
  private dirty = false;
  private writeSequence = 0;

  constructor(options: ChangeTrackerOptions) {
    this.cacheFile = path.resolve(options.cacheFile);
    this.hashChunkSize = options.hashChunkSize ?? HASH_CHUNK_SIZE_BYTES;
    this.log = (options.logger ?? defaultLogger).child({ component: 'change-tracker' });
    this.fileLock = new CacheFileLock(`${this.cacheFile}.lock`, this.log);
  }

  get cacheFilePath(): string {
    return this.cacheFile;
  }

  isOpen(): boolean {
    return this.opened;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Acquire the advisory cache lock and load persisted state
   *
   * @throws {CacheLockError} if another live build holds the cache
   */
  async open(): Promise<void> {
    if (this.opened) {
      return;
    }
    await this.fileLock.acquire();
    await this.loadState();
    this.opened = true;
  }

  /**
   * Persist pending updates and release the cache lock
   */
  async close(): Promise<void> {
    if (!this.opened) {
      return;
    }
    await this.flush();
    await this.fileLock.release();
    this.opened = false;
  }

  /**
   * Write the cache only if an update has not been persisted yet, so a
   * build that recorded nothing never replaces the file
   */
  async flush(): Promise<void> {
    if (this.dirty) {
      await this.saveState();
    }
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  /**
   * Load the persisted cache. A missing, unreadable or malformed file yields
   * an empty state; nothing is thrown.
   */
  async loadState(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.cacheFile, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.log.debug('No cache file found', { cacheFile: this.cacheFile });
      } else {
        this.log.warn('Failed to read cache file', {
          cacheFile: this.cacheFile,
          error: toError(error).message,
        });
      }
      this.state = new Map();
      return;
    }

    try {
      const parsed = PersistedCacheSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        this.log.warn('Cache file has an unexpected shape; starting empty', {
          cacheFile: this.cacheFile,
          issues: parsed.error.issues.length,
        });
        this.state = new Map();
        return;
      }
      this.state = new Map(Object.entries(parsed.data));
      this.log.debug('Loaded cache', {
        cacheFile: this.cacheFile,
        entries: this.state.size,
      });
    } catch (error) {
      this.log.warn('Cache file is not valid JSON; starting empty', {
        cacheFile: this.cacheFile,
        error: toError(error).message,
      });
      this.state = new Map();
    }
  }

  /**
   * Serialise the entire map and replace the cache file. Failures are
   * logged, never thrown.
   */
  async saveState(): Promise<void> {
    await this.writeLock.runExclusive(() => this.writeSnapshot());
  }

  /**
   * Caller must hold the write lock
   */
  private async writeSnapshot(): Promise<void> {
    const tempFile = `${this.cacheFile}.${process.pid}.${++this.writeSequence}.tmp`;
    try {
      await mkdir(path.dirname(this.cacheFile), { recursive: true });
      await writeFile(tempFile, JSON.stringify(this.snapshot(), null, 2), 'utf8');
      await rename(tempFile, this.cacheFile);
      this.dirty = false;
    } catch (error) {
      this.log.error('Failed to save cache', toError(error), {
        cacheFile: this.cacheFile,
      });
    }
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * SHA-256 of the file content, read in fixed-size chunks.
   * Returns '' when the file does not exist or cannot be read.
   */
  async computeHash(unit: string): Promise<string> {
    const hasher = createHash('sha256');
    try {
      const stream = createReadStream(unit, { highWaterMark: this.hashChunkSize });
      for await (const chunk of stream) {
        hasher.update(chunk);
      }
      return hasher.digest('hex');
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        this.log.warn('Failed to hash file', { unit, error: toError(error).message });
      }
      return '';
    }
  }

  /**
   * Return the candidates that are new or whose content changed, in input order
   */
  async getChangedUnits(candidates: string[]): Promise<string[]> {
    const changed: string[] = [];

    for (const candidate of candidates) {
      const cached = this.state.get(canonicalUnitId(candidate));
      if (!cached) {
        this.log.debug('New file, not in cache', { unit: candidate });
        changed.push(candidate);
        continue;
      }

      const currentHash = await this.computeHash(candidate);
      if (currentHash !== cached.contentHash) {
        this.log.debug('File changed', {
          unit: candidate,
          hash: currentHash,
          cachedHash: cached.contentHash,
        });
        changed.push(candidate);
      }
    }

    this.log.debug('Change detection complete', {
      candidates: candidates.length,
      changed: changed.length,
    });
    return changed;
  }

  /**
   * All units that depend on `unit`, directly or transitively.
   * Breadth-first over a visited set, so dependency cycles terminate.
   */
  getDependents(unit: string): string[] {
    const target = canonicalUnitId(unit);

    const reverse = new Map<string, string[]>();
    for (const [id, entry] of this.state) {
      for (const dependency of entry.dependencies) {
        const key = canonicalUnitId(dependency);
        const list = reverse.get(key);
        if (list) {
          list.push(id);
        } else {
          reverse.set(key, [id]);
        }
      }
    }

    const visited = new Set<string>([target]);
    const dependents: string[] = [];
    const queue: string[] = [target];

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      if (current === undefined) {
        break;
      }
      for (const dependent of reverse.get(current) ?? []) {
        if (visited.has(dependent)) {
          continue;
        }
        visited.add(dependent);
        dependents.push(dependent);
        queue.push(dependent);
      }
    }

    return dependents;
  }

  getState(unit: string): TrackedUnitState | undefined {
    const entry = this.state.get(canonicalUnitId(unit));
    return entry ? { ...entry, dependencies: [...entry.dependencies] } : undefined;
  }

  /**
   * Plain-object copy of the in-memory map
   */
  snapshot(): PersistedCache {
    const result: PersistedCache = {};
    for (const [id, entry] of this.state) {
      result[id] = {
        contentHash: entry.contentHash,
        dependencies: [...entry.dependencies],
        lastValidationResult: entry.lastValidationResult,
      };
    }
    return result;
  }

  get size(): number {
    return this.state.size;
  }

  // ==========================================================================
  // Updates
  // ==========================================================================

  /**
   * Record the outcome of processing `unit` and persist immediately.
   * A unit missing from disk is skipped; existing entries stay untouched.
   */
  async updateState(
    unit: string,
    dependencies: string[],
    validationResult: boolean
  ): Promise<void> {
    const id = canonicalUnitId(unit);

    try {
      const info = await stat(unit).catch(() => null);
      if (!info?.isFile()) {
        this.log.warn('Attempted to update state for non-existent file', { unit });
        return;
      }

      await this.writeLock.runExclusive(async () => {
        const contentHash = await this.computeHash(unit);
        if (contentHash === '') {
          this.log.warn('File disappeared before it could be hashed', { unit });
          return;
        }
        this.state.set(id, {
          contentHash,
          dependencies: [...new Set(dependencies.map(canonicalUnitId))],
          lastValidationResult: validationResult,
        });
        this.dirty = true;
        await this.writeSnapshot();
      });
    } catch (error) {
      this.log.error('Failed to update state', toError(error), { unit });
    }
  }
}
