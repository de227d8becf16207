import { execa } from 'execa';
import type { StageKey } from './identity.ts';
import type { DaemonExit } from './errors.ts';

/**
 * Explicit handle on a spawned daemon. The launcher either awaits `exited`
 * (the daemon failed before registering) or calls `release()` once the
 * daemon has registered, after which it is no longer this process's child
 * to wait on or kill.
 */
export interface DaemonHandle {
  pid?: number;
  /** Resolves when the daemon process exits or fails to spawn. Never rejects. */
  exited: Promise<DaemonExit>;
  release(): void;
}

/**
 * Starts a daemon for a stage. May throw if the process cannot be created.
 */
export type DaemonSpawner = (key: StageKey) => DaemonHandle;

export interface ProcessSpawnerOptions {
  /** Executable to run (defaults to the current Node binary). */
  execPath?: string;
  /** Arguments placed before the stage selection (defaults to Node flags + current script). */
  baseArgs?: string[];
  /** Extra arguments appended after the server-mode selection. */
  extraArgs?: string[];
  env?: Record<string, string | undefined>;
  cwd?: string;
  debug?: boolean;
}

/**
 * Arguments that re-invoke this CLI in server mode for a stage.
 */
export function serverArgsFor(key: StageKey): string[] {
  return ['server', '--stage', key.stage, '--config', key.configPath];
}

/**
 * Spawner that re-invokes the current executable in server mode, detached,
 * with the environment and stdout/stderr inherited.
 */
export function createProcessSpawner(options: ProcessSpawnerOptions = {}): DaemonSpawner {
  const execPath = options.execPath ?? process.execPath;
  const baseArgs = options.baseArgs ?? [...process.execArgv, process.argv[1]];

  return (key: StageKey): DaemonHandle => {
    const args = [...baseArgs, ...serverArgsFor(key), ...(options.extraArgs ?? [])];
    if (options.debug) {
      console.log(`[LAUNCHER] Spawning daemon: ${execPath} ${args.join(' ')}`);
    }

    const subprocess = execa(execPath, args, {
      cwd: options.cwd,
      env: { ...process.env, ...(options.env ?? {}) },
      extendEnv: false,
      detached: true,
      cleanup: false,
      reject: false,
      stdio: ['ignore', 'inherit', 'inherit'],
    });

    const exited: Promise<DaemonExit> = subprocess.then(
      (result): DaemonExit => {
        const exitCode = typeof result.exitCode === 'number' ? result.exitCode : null;
        const signal = result.signal ?? null;
        if (result.failed && exitCode === null && signal === null) {
          return { exitCode, signal, error: new Error(`Failed to spawn ${result.command}`) };
        }
        return { exitCode, signal };
      },
      (error: unknown) => ({
        exitCode: null,
        signal: null,
        error: error instanceof Error ? error : new Error(String(error)),
      }),
    );

    return {
      pid: subprocess.pid,
      exited,
      release: () => {
        subprocess.unref();
      },
    };
  };
}
