import { Daemon } from './daemon.ts';
import { createStageKey, describeStage } from './identity.ts';
import { FileRegistry } from './registry.ts';
import { idleEngine, loadEngine } from './engine.ts';
import { RegistrationConflictError } from './errors.ts';
import { getConfig, getDaemonTimeoutMs } from '../config.ts';

export interface DaemonProcessOptions {
  configPath: string;
  stage: string;
  cwd?: string;
  /** Engine module specifier (defaults to STAGEHUB_ENGINE). */
  engine?: string;
  /** Inactivity timeout in seconds. */
  timeoutSeconds?: number;
  stateDir?: string;
  debug?: boolean;
}

/**
 * Run a daemon in the current process until it is told to stop.
 *
 * Started by the launcher as a detached child. A daemon that finds the stage
 * already registered defers to the registered one and exits cleanly.
 *
 * @returns The process exit code.
 */
export async function runDaemonProcess(options: DaemonProcessOptions): Promise<number> {
  const cfg = getConfig();
  const cwd = options.cwd ?? process.cwd();
  const debug = options.debug ?? cfg.debug;
  const key = createStageKey(options.configPath, options.stage, cwd);
  const registry = FileRegistry.forStage(key, options.stateDir ?? cfg.stateDir, { debug });

  const engineSpecifier = options.engine ?? cfg.engine;
  const engine = engineSpecifier ? await loadEngine(engineSpecifier, key, cwd) : idleEngine;
  if (debug) {
    console.log(`[DAEMON] Engine: ${engineSpecifier ?? '(idle)'}`);
  }

  const daemon = new Daemon({
    key,
    registry,
    engine,
    inactivityTimeoutMs: getDaemonTimeoutMs(options.timeoutSeconds),
    debug,
  });

  try {
    await daemon.start();
  } catch (error) {
    if (error instanceof RegistrationConflictError) {
      console.log(
        `[DAEMON] Stage ${describeStage(key)} is already served at ${error.existingAddress ?? 'another address'}; deferring to it`,
      );
      return 0;
    }
    throw error;
  }

  const onSignal = (signal: NodeJS.Signals): void => {
    void daemon.stop(signal);
  };
  const onFatal = (error: unknown): void => {
    console.error('[DAEMON] Unhandled error:', error);
    void daemon.stop('unhandled error');
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
  process.on('uncaughtException', onFatal);
  process.on('unhandledRejection', onFatal);

  try {
    const reason = await daemon.stopped;
    if (debug) console.log(`[DAEMON] Exiting (${reason})`);
  } finally {
    process.removeListener('SIGTERM', onSignal);
    process.removeListener('SIGINT', onSignal);
    process.removeListener('uncaughtException', onFatal);
    process.removeListener('unhandledRejection', onFatal);
  }
  return 0;
}
