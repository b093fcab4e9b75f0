/**
 * Argument parsing and command dispatch for `docforge`
 */

import { runBuildCommand } from './commands/build.js';
import { runCleanCommand } from './commands/clean.js';
import { runMonitorCommand } from './commands/monitor.js';
import type { CliIo } from './io.js';

export const USAGE = `
Usage: docforge <command> [options]

Commands:
  build    Sync sources, regenerate changed documentation and write reports
  clean    Remove the build workspace
  monitor  Check watched SDK releases and build when one is new

Options:
  --config <path>     Configuration file (default: $DOCFORGE_CONFIG or docforge.config.json)
  --keep-workspace    Leave the workspace in place after build or monitor
  --help, -h          Show this help message

Environment:
  ANTHROPIC_API_KEY   Required by build, and by monitor when a release is new
  LOG_LEVEL           DEBUG, INFO, WARN or ERROR (default: INFO)
  DOCFORGE_CONFIG     Configuration file used when --config is not given
`;

const COMMANDS = ['build', 'clean', 'monitor'] as const;

type CommandName = (typeof COMMANDS)[number];

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'error'; message: string }
  | { kind: 'command'; command: CommandName; configPath?: string; keepWorkspace: boolean };

export function parseArgs(argv: readonly string[]): ParsedArgs {
  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    return { kind: 'help' };
  }

  const [command, ...rest] = argv;
  if (command === undefined || !isCommandName(command)) {
    return {
      kind: 'error',
      message: `Unknown command: "${command ?? ''}"\nValid commands: ${COMMANDS.join(', ')}`,
    };
  }

  let configPath: string | undefined;
  let keepWorkspace = false;
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === '--config') {
      configPath = rest[++i];
      if (!configPath) {
        return { kind: 'error', message: '--config flag requires a path argument' };
      }
    } else if (arg === '--keep-workspace') {
      keepWorkspace = true;
    } else {
      return { kind: 'error', message: `Unknown option: ${arg ?? ''}` };
    }
  }

  return { kind: 'command', command, configPath, keepWorkspace };
}

/**
 * Run the CLI and return the process exit code
 */
export async function main(argv: readonly string[], io: CliIo): Promise<number> {
  const parsed = parseArgs(argv);

  switch (parsed.kind) {
    case 'help':
      io.out(USAGE);
      return 0;
    case 'error':
      io.err(parsed.message);
      return 1;
    case 'command': {
      const { configPath, keepWorkspace } = parsed;
      switch (parsed.command) {
        case 'build':
          return runBuildCommand({ configPath, keepWorkspace }, io);
        case 'clean':
          return runCleanCommand({ configPath }, io);
        case 'monitor':
          return runMonitorCommand({ configPath, keepWorkspace }, io);
      }
    }
  }
}
