/**
 * Transient workspace guards shared by the builder and `docforge clean`
 */

import { rm } from 'node:fs/promises';
import path from 'node:path';

import { ConfigurationError } from '../errors.js';

/**
 * A path that must survive removal of the workspace
 */
export interface ProtectedPath {
  label: string;
  path: string;
}

/**
 * Everything a build keeps between runs, in the order it is checked
 */
export function permanentPaths(paths: { cacheFile: string; reportsDir: string; docsDir: string }): ProtectedPath[] {
  return [
    { label: 'cache file', path: paths.cacheFile },
    { label: 'reports directory', path: paths.reportsDir },
    { label: 'docs directory', path: paths.docsDir },
  ];
}

export function isWithin(parent: string, target: string): boolean {
  const relative = path.relative(parent, target);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * @throws {ConfigurationError} naming the first protected path inside the workspace
 */
export function assertWorkspaceExcludes(workspaceDir: string, protectedPaths: ProtectedPath[]): void {
  const workspace = path.resolve(workspaceDir);
  for (const entry of protectedPaths) {
    const target = path.resolve(entry.path);
    if (isWithin(workspace, target)) {
      throw new ConfigurationError(`Workspace ${workspace} must not contain the ${entry.label} ${target}`);
    }
  }
}

/**
 * Remove the workspace after checking it holds nothing permanent. Safe to repeat.
 */
export async function removeWorkspace(workspaceDir: string, protectedPaths: ProtectedPath[]): Promise<void> {
  assertWorkspaceExcludes(workspaceDir, protectedPaths);
  await rm(path.resolve(workspaceDir), { recursive: true, force: true });
}
