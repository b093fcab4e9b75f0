/**
 * Source sync adapter
 *
 * Remote repositories are shallow-cloned with git; local directories are
 * copied. The destination is expected to exist and be empty.
 */

import { cp, stat } from 'node:fs/promises';
import path from 'node:path';

import { SyncError, toError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';
import { runCommand, type CommandResult, type CommandRunner } from '../process/command.js';
import type { AdapterCallOptions, SourceSyncAdapter } from './types.js';

/** Entries never copied from a local source */
const SKIPPED_ENTRIES = new Set(['.git', 'node_modules']);

/**
 * True for locations git should fetch rather than the filesystem
 */
export function isRemoteLocation(location: string): boolean {
  return (
    /^(https?|ssh|git):\/\//.test(location) ||
    /^[\w.-]+@[\w.-]+:/.test(location) ||
    location.endsWith('.git')
  );
}

export interface GitSyncAdapterOptions {
  runner?: CommandRunner;
  logger?: Logger;
}

export class GitSyncAdapter implements SourceSyncAdapter {
  private readonly runner: CommandRunner;
  private readonly log: Logger;

  constructor(options: GitSyncAdapterOptions = {}) {
    this.runner = options.runner ?? runCommand;
    this.log = (options.logger ?? defaultLogger).child({ component: 'sync' });
  }

  async sync(location: string, destination: string, options?: AdapterCallOptions): Promise<void> {
    if (isRemoteLocation(location)) {
      await this.clone(location, destination, options?.signal);
    } else {
      await this.copy(location, destination, options?.signal);
    }
  }

  private async clone(location: string, destination: string, signal?: AbortSignal): Promise<void> {
    this.log.info('Cloning source', { location });

    let result: CommandResult;
    try {
      result = await this.runner('git', ['clone', '--depth', '1', location, destination], { signal });
    } catch (error) {
      throw new SyncError(`Failed to run git for ${location}`, location, toError(error));
    }

    if (result.exitCode !== 0) {
      const detail = result.stderr.trim().split('\n').pop() ?? '';
      throw new SyncError(
        `git clone failed for ${location} (exit code ${result.exitCode ?? 'none'})${detail ? `: ${detail}` : ''}`,
        location
      );
    }
  }

  private async copy(location: string, destination: string, signal?: AbortSignal): Promise<void> {
    const source = path.resolve(location);
    const info = await stat(source).catch(() => null);
    if (!info?.isDirectory()) {
      throw new SyncError(`Source directory not found: ${location}`, location);
    }
    signal?.throwIfAborted();

    this.log.info('Copying local source', { location: source });
    try {
      await cp(source, destination, {
        recursive: true,
        filter: (entry) => !SKIPPED_ENTRIES.has(path.basename(entry)),
      });
    } catch (error) {
      throw new SyncError(`Failed to copy ${location}`, location, toError(error));
    }
  }
}
