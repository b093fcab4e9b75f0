/**
 * Child process runner
 *
 * Adapters that shell out (git, the test runner) take a CommandRunner so
 * tests can substitute a fake instead of spawning processes.
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  /** null when the process was terminated by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Kills the child when aborted */
  signal?: AbortSignal;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;

/** Characters of stdout/stderr kept per stream; the tail wins */
const OUTPUT_LIMIT = 64_000;

function appendCapped(buffer: string, chunk: string): string {
  const next = buffer + chunk;
  return next.length > OUTPUT_LIMIT ? next.slice(next.length - OUTPUT_LIMIT) : next;
}

/**
 * Spawn `command` and collect its output. Rejects only when the process
 * cannot be started or is aborted; a non-zero exit resolves normally.
 */
export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      signal: options.signal,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout = appendCapped(stdout, chunk);
    });
    child.stderr.on('data', (chunk: string) => {
      stderr = appendCapped(stderr, chunk);
    });

    child.once('error', reject);
    child.once('close', (exitCode) => {
      resolve({ exitCode, stdout, stderr });
    });
  });
