import path from 'path';
import { StageClient, withStageClient } from './client.ts';
import { createStageKey, computeStageId, describeStage } from './identity.ts';
import { FileRegistry } from './registry.ts';
import { runDaemonProcess } from './entry.ts';
import { delay } from '../utils/delay.ts';
import { getConfig } from '../config.ts';

/**
 * Common CLI options for stage commands.
 */
export interface StageCommandOptions {
  /** Project configuration path (relative to cwd). */
  configPath: string;
  /** Deployment stage; required by every command except `daemon status`. */
  stage?: string;
  cwd?: string;
  /** Enable debug diagnostics. */
  debug?: boolean;
  /** Suppress non-essential output. */
  quiet?: boolean;
  /** Daemon inactivity timeout in seconds. */
  timeout?: number;
  /** Engine module for `server`. */
  engine?: string;
}

function requireStage(options: StageCommandOptions): string {
  const stage = options.stage?.trim();
  if (!stage) {
    throw new Error('A stage is required (--stage <name>)');
  }
  return stage;
}

/**
 * Attach to the stage's daemon (starting one if needed) and print each event
 * as a JSON line until the stream ends or Ctrl+C.
 *
 * @returns Process exit code.
 */
export async function handleWatch(options: StageCommandOptions): Promise<number> {
  const stage = requireStage(options);
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onInterrupt);

  try {
    const outcome = await withStageClient(
      options.configPath,
      stage,
      { cwd: options.cwd, debug: options.debug },
      async (client: StageClient) => {
        if (!options.quiet) {
          console.error(`Watching stage ${describeStage(client.key)} (id ${client.stageId})`);
        }
        return await client.watch(
          (event) => {
            process.stdout.write(JSON.stringify(event) + '\n');
          },
          { signal: controller.signal },
        );
      },
    );

    if (outcome === 'cancelled') return 130;
    if (!options.quiet) console.error('Stream ended');
    return 0;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

/**
 * Run the stage's daemon in the foreground.
 *
 * @returns Process exit code.
 */
export async function handleServer(options: StageCommandOptions): Promise<number> {
  return await runDaemonProcess({
    configPath: options.configPath,
    stage: requireStage(options),
    cwd: options.cwd,
    engine: options.engine,
    timeoutSeconds: options.timeout,
    debug: options.debug,
  });
}

/**
 * Print every registration in the project's registry.
 */
export async function handleDaemonStatus(options: StageCommandOptions): Promise<number> {
  const cfg = getConfig();
  const cwd = options.cwd ?? process.cwd();
  const configPath = path.normalize(path.resolve(cwd, options.configPath));
  const registry = FileRegistry.forProject(configPath, cfg.stateDir, { debug: options.debug });
  const entries = (await registry.list()).filter((entry) => entry.key.configPath === configPath);

  if (entries.length === 0) {
    console.log('No daemons registered for this project');
    return 0;
  }

  for (const entry of entries) {
    console.log(`Stage ${entry.key.stage}:`);
    console.log(`  ID: ${computeStageId(entry.key)}`);
    console.log(`  Address: ${entry.address}`);
    console.log(`  PID: ${entry.pid}`);
    console.log(`  Started: ${entry.createdAt}`);
    console.log('');
  }
  return 0;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

/**
 * Ask the stage's daemon to shut down and wait for it to deregister.
 */
export async function handleDaemonStop(options: StageCommandOptions): Promise<number> {
  const cfg = getConfig();
  const key = createStageKey(options.configPath, requireStage(options), options.cwd);
  const registry = FileRegistry.forStage(key, cfg.stateDir, { debug: options.debug });
  const registration = await registry.lookup(key);

  if (!registration) {
    if (!options.quiet) console.log(`No daemon registered for stage ${key.stage}`);
    return 0;
  }

  if (!isProcessAlive(registration.pid)) {
    await registry.remove(key, registration.address);
    if (!options.quiet) {
      console.log(`Removed stale registration for stage ${key.stage} (pid ${registration.pid} gone)`);
    }
    return 0;
  }

  process.kill(registration.pid, 'SIGTERM');

  const deadline = Date.now() + 5000;
  while (Date.now() < deadline) {
    const current = await registry.lookup(key);
    if (!current || current.address !== registration.address) {
      if (!options.quiet) console.log(`Stopped daemon for stage ${key.stage}`);
      return 0;
    }
    await delay(100);
  }

  console.error(`Daemon for stage ${key.stage} (pid ${registration.pid}) did not stop within 5s`);
  return 1;
}

/**
 * Print CLI help text.
 */
export function printHelp(): void {
  const config = getConfig();
  console.log('stagehub - local control-plane for per-stage deployment daemons');
  console.log('');
  console.log('Usage:');
  console.log('  stagehub watch --stage <name> [--config <path>]');
  console.log('  stagehub server --stage <name> [--config <path>] [--engine <module>]');
  console.log('  stagehub daemon <status|stop> [options]');
  console.log('');
  console.log('Options:');
  console.log('  --stage <name>         Deployment stage');
  console.log('  --config <path>        Project configuration file (default: stagehub.config.ts)');
  console.log('  --engine <module>      Engine module loaded by the daemon (server only)');
  console.log(
    `  --timeout=<seconds>    Daemon inactivity timeout (default: ${config.daemonTimeoutSeconds})`,
  );
  console.log('  --debug                Enable debug output');
  console.log('  --quiet, -q            Suppress informational output');
  console.log('  --help, -h             Show this help');
  console.log('');
  console.log('Related env vars:');
  console.log('  STAGEHUB_STATE_DIR, STAGEHUB_ENGINE, STAGEHUB_START_TIMEOUT_MS,');
  console.log('  STAGEHUB_CONNECT_ATTEMPTS, STAGEHUB_MAX_LINE_BYTES, STAGEHUB_SUBSCRIBER_QUEUE_LIMIT');
}

/**
 * Print help text for daemon subcommands.
 */
export function printDaemonHelp(): void {
  console.log('stagehub daemon management');
  console.log('');
  console.log('Usage:');
  console.log('  stagehub daemon <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  status                           Show daemons registered for this project');
  console.log('  stop --stage <name>              Stop the daemon serving a stage');
  console.log('');
  console.log('Notes:');
  console.log('  - One daemon serves each (config, stage) pair');
  console.log('  - watch starts a daemon transparently when none is running');
}
