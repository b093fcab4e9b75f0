/**
 * Monitor module
 *
 * Watches SDK releases on npm and PyPI.
 */

export { VersionMonitor, packageKey } from './monitor.js';
export type {
  LookupFailure,
  VersionCheck,
  VersionMonitorOptions,
  VersionUpdate,
} from './monitor.js';
export { HttpPackageRegistry, REGISTRY_BASE_URLS, latestVersionUrl } from './registry.js';
export type { FetchFn, PackageRegistry, RegistryResponse } from './registry.js';
export { VersionStore } from './versions.js';
