/**
 * SDK Version Monitor
 *
 * Compares the latest published release of each watched package with the
 * version recorded after the last triggered build. A lookup that fails
 * leaves that package's recorded version in place and is reported, not
 * treated as an update.
 */

import { guardAdapterCall, mapWithConcurrency } from '../build/concurrency.js';
import { DEFAULT_REGISTRY_TIMEOUT_MS } from '../constants.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';
import type { WatchedPackage } from '../schemas/index.js';
import type { PackageRegistry } from './registry.js';
import type { VersionStore } from './versions.js';

export interface VersionUpdate {
  registry: WatchedPackage['registry'];
  name: string;
  /** null when the package was never recorded */
  current: string | null;
  latest: string;
}

export interface LookupFailure {
  registry: WatchedPackage['registry'];
  name: string;
  message: string;
}

export interface VersionCheck {
  checkedAt: Date;
  updates: VersionUpdate[];
  failures: LookupFailure[];
  /** Recorded versions with every successful lookup applied */
  versions: Record<string, string>;
}

export interface VersionMonitorOptions {
  store: VersionStore;
  registry: PackageRegistry;
  packages: readonly WatchedPackage[];
  requestTimeoutMs?: number;
  concurrency?: number;
  logger?: Logger;
}

export function packageKey(watched: WatchedPackage): string {
  return `${watched.registry}:${watched.name}`;
}

export class VersionMonitor {
  private readonly store: VersionStore;
  private readonly registry: PackageRegistry;
  private readonly packages: readonly WatchedPackage[];
  private readonly requestTimeoutMs: number;
  private readonly concurrency: number;
  private readonly log: Logger;

  constructor(options: VersionMonitorOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.packages = options.packages;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REGISTRY_TIMEOUT_MS;
    this.concurrency = options.concurrency ?? 4;
    this.log = (options.logger ?? defaultLogger).child({ component: 'version-monitor' });
  }

  async check(signal?: AbortSignal): Promise<VersionCheck> {
    const checkedAt = new Date();
    const recorded = await this.store.load();
    const versions = { ...recorded };
    const updates: VersionUpdate[] = [];
    const failures: LookupFailure[] = [];

    const lookups = await mapWithConcurrency(this.packages, this.concurrency, (watched) =>
      guardAdapterCall(
        `${watched.registry} lookup`,
        this.requestTimeoutMs,
        (lookupSignal) => this.registry.latestVersion(watched, lookupSignal),
        signal
      )
    );

    for (const [index, watched] of this.packages.entries()) {
      const lookup = lookups[index];
      if (!lookup) {
        continue;
      }
      const key = packageKey(watched);

      if (!lookup.ok) {
        failures.push({ registry: watched.registry, name: watched.name, message: lookup.message });
        this.log.warn('Version lookup failed', { package: key, error: lookup.message });
        continue;
      }

      const current = recorded[key] ?? null;
      versions[key] = lookup.value;
      if (lookup.value !== current) {
        updates.push({ registry: watched.registry, name: watched.name, current, latest: lookup.value });
        this.log.info('New release found', { package: key, current, latest: lookup.value });
      }
    }

    this.log.info('Version check complete', {
      packages: this.packages.length,
      updates: updates.length,
      failures: failures.length,
    });
    return { checkedAt, updates, failures, versions };
  }

  /**
   * Remember the versions of a check so the same releases do not trigger again
   */
  async record(check: VersionCheck): Promise<void> {
    await this.store.save(check.versions, check.checkedAt);
    this.log.info('Recorded versions', { file: this.store.filePath });
  }
}
