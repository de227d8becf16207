#!/usr/bin/env node

/**
 * stagehub - one shared daemon per project stage, fanned out to every watcher.
 *
 * CLI entrypoint: parses arguments and dispatches to the stage commands.
 */

import {
  handleWatch,
  handleServer,
  handleDaemonStatus,
  handleDaemonStop,
  printHelp,
  printDaemonHelp,
  isStageHubError,
  type StageCommandOptions,
} from './daemon/index.ts';
import { parseArgs, type ParsedArgs } from './cli-args.ts';

function toCommandOptions(parsed: ParsedArgs): StageCommandOptions {
  const { globals } = parsed;
  return {
    configPath: globals.config,
    stage: globals.stage,
    debug: globals.debug,
    quiet: globals.quiet,
    timeout: globals.timeout,
    engine: globals.engine,
  };
}

async function run(parsed: ParsedArgs): Promise<number> {
  const options = toCommandOptions(parsed);

  switch (parsed.command) {
    case 'help':
      printHelp();
      return 0;
    case 'watch':
      if (parsed.globals.help) {
        printHelp();
        return 0;
      }
      return await handleWatch(options);
    case 'server':
      if (parsed.globals.help) {
        printHelp();
        return 0;
      }
      return await handleServer(options);
    case 'daemon':
      if (parsed.globals.help || !parsed.daemonCommand) {
        printDaemonHelp();
        return parsed.daemonCommand || parsed.globals.help ? 0 : 1;
      }
      switch (parsed.daemonCommand) {
        case 'status':
          return await handleDaemonStatus(options);
        case 'stop':
          return await handleDaemonStop(options);
        default:
          console.error(`Unknown daemon command: ${parsed.daemonCommand}`);
          printDaemonHelp();
          return 1;
      }
  }
}

async function main(): Promise<void> {
  let code: number;
  try {
    code = await run(parseArgs(process.argv));
  } catch (error) {
    if (isStageHubError(error)) {
      console.error(`Error [${error.phase}]: ${error.message}`);
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    code = 1;
  }
  process.exit(code);
}

void main();
