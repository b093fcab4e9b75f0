/**
 * Change tracking module
 */

export { ChangeTracker, canonicalUnitId } from './tracker.js';
export type { ChangeTrackerOptions } from './tracker.js';
export { CacheFileLock, isProcessAlive } from './file-lock.js';
export { WriteLock } from './write-lock.js';
