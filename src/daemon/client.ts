import { createStageKey, computeStageId, type StageKey } from './identity.ts';
import { FileRegistry, type Registration, type Registry } from './registry.ts';
import { Launcher } from './launcher.ts';
import { createProcessSpawner, type DaemonSpawner } from './spawn.ts';
import { readStream, type EventHandler, type StreamOutcome } from './stream.ts';
import { DaemonUnreachableError } from './errors.ts';
import { delay } from '../utils/delay.ts';
import { getConfig } from '../config.ts';

/**
 * Options for attaching to a stage's daemon.
 * - `cwd`: Directory relative config paths resolve against.
 * - `registry`/`spawner`: Injected collaborators; default to the per-project
 *   file registry and a detached re-invocation of this CLI.
 */
export interface StageClientOptions {
  cwd?: string;
  /** Registry directory override (defaults to config, then `<project>/.stagehub`). */
  stateDir?: string;
  debug?: boolean;
  /** Find-or-start attempts before an unreachable daemon is fatal. */
  connectAttempts?: number;
  /** Base delay between attempts; attempt n waits n times this. */
  connectBackoffMs?: number;
  pollIntervalMs?: number;
  startTimeoutMs?: number;
  maxLineBytes?: number;
  registry?: Registry;
  spawner?: DaemonSpawner;
}

/**
 * Front-end handle on one stage: finds or starts its daemon and streams its
 * events, healing a stale registration by restarting the find-or-start flow.
 */
export class StageClient {
  readonly key: StageKey;
  readonly stageId: string;
  readonly registry: Registry;
  private readonly launcher: Launcher;
  private readonly connectAttempts: number;
  private readonly connectBackoffMs: number;

  /**
   * @param configPath Project configuration path (relative paths resolve against `cwd`).
   * @param stage Deployment stage name.
   */
  constructor(
    configPath: string,
    stage: string,
    private readonly options: StageClientOptions = {},
  ) {
    const cfg = getConfig();
    this.key = createStageKey(configPath, stage, options.cwd);
    this.stageId = computeStageId(this.key);
    this.registry =
      options.registry ??
      FileRegistry.forStage(this.key, options.stateDir ?? cfg.stateDir, { debug: options.debug });
    this.launcher = new Launcher(
      this.registry,
      options.spawner ?? createProcessSpawner({ debug: options.debug }),
      {
        pollIntervalMs: options.pollIntervalMs,
        startTimeoutMs: options.startTimeoutMs,
        debug: options.debug,
      },
    );
    this.connectAttempts = Math.max(1, Math.trunc(options.connectAttempts ?? cfg.connectAttempts));
    this.connectBackoffMs = Math.max(
      0,
      Math.trunc(options.connectBackoffMs ?? cfg.connectBackoffMs),
    );
  }

  /**
   * Resolve the daemon's address, starting a daemon if none is registered.
   */
  async connect(signal?: AbortSignal): Promise<string> {
    return await this.launcher.connect(this.key, signal);
  }

  /**
   * Stream the stage's events to `onEvent` until the daemon closes the stream
   * (`'ended'`) or `signal` aborts (`'cancelled'`).
   *
   * Only a failure to establish the stream is healed: the stale registration
   * is removed and find-or-start runs again, up to `connectAttempts` times.
   * A fault on an established stream is returned to the caller as-is.
   */
  async watch(onEvent: EventHandler, opts: { signal?: AbortSignal } = {}): Promise<StreamOutcome> {
    const { signal } = opts;
    try {
      return await this.watchWithRetry(onEvent, signal);
    } catch (error) {
      if (signal?.aborted) return 'cancelled';
      throw error;
    }
  }

  /**
   * Current registration, if any. Does not start a daemon.
   */
  async status(): Promise<Registration | undefined> {
    return await this.registry.lookup(this.key);
  }

  private async watchWithRetry(
    onEvent: EventHandler,
    signal?: AbortSignal,
  ): Promise<StreamOutcome> {
    let lastFailure: DaemonUnreachableError | undefined;

    for (let attempt = 1; attempt <= this.connectAttempts; attempt++) {
      const address = await this.launcher.connect(this.key, signal);
      try {
        return await readStream(address, {
          onEvent,
          signal,
          maxLineBytes: this.options.maxLineBytes,
          debug: this.options.debug,
        });
      } catch (error) {
        if (!(error instanceof DaemonUnreachableError)) throw error;
        lastFailure = error;
      }

      const removed = await this.registry.remove(this.key, address);
      if (this.options.debug) {
        console.log(
          `[STREAM] Attempt ${attempt}/${this.connectAttempts}: daemon at ${address} unreachable` +
            (removed ? '; removed stale registration' : ''),
        );
      }

      if (attempt < this.connectAttempts && this.connectBackoffMs > 0) {
        await delay(this.connectBackoffMs * attempt, signal);
      }
    }

    throw new DaemonUnreachableError(
      lastFailure?.address ?? 'unknown',
      this.connectAttempts,
      lastFailure?.cause,
    );
  }
}

/**
 * Helper to create a `StageClient`, run an async operation, and return the
 * result.
 */
export async function withStageClient<T>(
  configPath: string,
  stage: string,
  options: StageClientOptions,
  operation: (client: StageClient) => Promise<T>,
): Promise<T> {
  const client = new StageClient(configPath, stage, options);
  return await operation(client);
}
