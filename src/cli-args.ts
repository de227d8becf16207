import { getConfig } from './config.ts';

/**
 * Global CLI flags that shape daemon behavior and output.
 */
export interface GlobalOptions {
  /** Show help text instead of executing. */
  help?: boolean;
  /** Suppress non-essential output. */
  quiet?: boolean;
  /** Enable debug diagnostics. */
  debug?: boolean;
  /** Inactivity timeout (seconds) for the daemon. */
  timeout?: number;
  stage?: string;
  /** Project configuration path, relative to cwd. */
  config: string;
  /** Engine module loaded by `server`. */
  engine?: string;
}

export type CommandName = 'watch' | 'server' | 'daemon' | 'help';

export interface ParsedArgs {
  command: CommandName;
  /** Subcommand for `daemon` (status, stop). */
  daemonCommand?: string;
  globals: GlobalOptions;
}

export const DEFAULT_CONFIG_FILE = 'stagehub.config.ts';

const COMMANDS: readonly string[] = ['watch', 'server', 'daemon'];
const VALUE_FLAGS = ['--stage', '--config', '--engine', '--timeout'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(name: string): name is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === name);
}

function parseTimeout(raw: string): number {
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid --timeout value "${raw}": expected a positive number of seconds`);
  }
  return value;
}

/**
 * Parse CLI argv into a command and its flags.
 *
 * Value flags accept both `--flag value` and `--flag=value`.
 *
 * @param argv Full process argv array.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2); // Remove node and script name
  const config = getConfig();
  const globals: GlobalOptions = { config: DEFAULT_CONFIG_FILE, debug: config.debug };

  if (args.length === 0) {
    return { command: 'help', globals: { ...globals, help: true } };
  }

  let command: CommandName | undefined;
  let daemonCommand: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      globals.help = true;
      continue;
    }
    if (arg === '--quiet' || arg === '-q') {
      globals.quiet = true;
      continue;
    }
    if (arg === '--debug') {
      globals.debug = true;
      continue;
    }

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const name = eq === -1 ? arg : arg.slice(0, eq);
      if (!isValueFlag(name)) {
        throw new Error(`Unknown option: ${name}`);
      }
      let value: string;
      if (eq !== -1) {
        value = arg.slice(eq + 1);
      } else {
        const next = args[i + 1];
        if (next === undefined || next.startsWith('-')) {
          throw new Error(`Option ${name} requires a value`);
        }
        value = next;
        i++;
      }

      switch (name) {
        case '--stage':
          globals.stage = value;
          break;
        case '--config':
          globals.config = value;
          break;
        case '--engine':
          globals.engine = value;
          break;
        case '--timeout':
          globals.timeout = parseTimeout(value);
          break;
      }
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    }

    if (command === undefined) {
      if (!COMMANDS.includes(arg)) {
        throw new Error(`Unknown command: ${arg}`);
      }
      command = arg === 'watch' ? 'watch' : arg === 'server' ? 'server' : 'daemon';
    } else if (command === 'daemon' && daemonCommand === undefined) {
      daemonCommand = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  if (command === undefined) {
    return { command: 'help', globals: { ...globals, help: true } };
  }
  return { command, daemonCommand, globals };
}
