/**
 * Latest-release lookups against the npm and PyPI registries
 */

import { RegistryError, toError } from '../errors.js';
import { NpmPackumentSchema, PypiProjectSchema, type WatchedPackage } from '../schemas/index.js';

export const REGISTRY_BASE_URLS = {
  npm: 'https://registry.npmjs.org',
  pypi: 'https://pypi.org/pypi',
} as const;

export interface RegistryResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

/** The part of the global fetch the client needs */
export type FetchFn = (
  url: string,
  init: { headers: Record<string, string>; signal?: AbortSignal }
) => Promise<RegistryResponse>;

export interface PackageRegistry {
  latestVersion(watched: WatchedPackage, signal?: AbortSignal): Promise<string>;
}

export function latestVersionUrl(watched: WatchedPackage): string {
  return watched.registry === 'npm'
    ? `${REGISTRY_BASE_URLS.npm}/${watched.name.replace('/', '%2F')}`
    : `${REGISTRY_BASE_URLS.pypi}/${encodeURIComponent(watched.name)}/json`;
}

export class HttpPackageRegistry implements PackageRegistry {
  private readonly fetch: FetchFn;

  constructor(fetchFn: FetchFn = (url, init) => fetch(url, init)) {
    this.fetch = fetchFn;
  }

  /**
   * @throws {RegistryError} on a non-2xx status, a body that is not JSON,
   * or a body without a latest version
   */
  async latestVersion(watched: WatchedPackage, signal?: AbortSignal): Promise<string> {
    const response = await this.fetch(latestVersionUrl(watched), {
      headers: { Accept: 'application/json' },
      signal,
    });
    if (!response.ok) {
      throw new RegistryError(
        `${watched.registry} returned status ${response.status} for ${watched.name}`,
        watched.name,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new RegistryError(
        `${watched.registry} returned invalid JSON for ${watched.name}: ${toError(error).message}`,
        watched.name
      );
    }

    if (watched.registry === 'npm') {
      const parsed = NpmPackumentSchema.safeParse(body);
      if (parsed.success) {
        return parsed.data['dist-tags'].latest;
      }
    } else {
      const parsed = PypiProjectSchema.safeParse(body);
      if (parsed.success) {
        return parsed.data.info.version;
      }
    }
    throw new RegistryError(`${watched.registry} response for ${watched.name} has no latest version`, watched.name);
  }
}
