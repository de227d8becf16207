import type { Registry } from './registry.ts';
import type { DaemonHandle, DaemonSpawner } from './spawn.ts';
import { computeStageId, describeStage, type StageKey } from './identity.ts';
import { RegistrationTimeoutError, SpawnFailureError, type DaemonExit } from './errors.ts';
import { delay } from '../utils/delay.ts';
import { getConfig } from '../config.ts';

export interface LauncherOptions {
  /** Interval between registry lookups while a spawned daemon starts. */
  pollIntervalMs?: number;
  /** Give up on a spawned daemon that neither registers nor exits in time. */
  startTimeoutMs?: number;
  debug?: boolean;
}

/**
 * Client-side find-or-start: resolves a stage to the address of its daemon,
 * spawning one when the registry has none.
 */
export class Launcher {
  private readonly pollIntervalMs: number;
  private readonly startTimeoutMs: number;

  constructor(
    private readonly registry: Registry,
    private readonly spawner: DaemonSpawner,
    private readonly options: LauncherOptions = {},
  ) {
    const cfg = getConfig();
    this.pollIntervalMs = Math.max(1, Math.trunc(options.pollIntervalMs ?? cfg.pollIntervalMs));
    this.startTimeoutMs = Math.max(1, Math.trunc(options.startTimeoutMs ?? cfg.startTimeoutMs));
  }

  /**
   * Return the registered address for `key`, or spawn a daemon and wait for it
   * to register. A registered address is returned without probing it; the
   * stream attach is what proves it live.
   */
  async connect(key: StageKey, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();

    const existing = await this.registry.lookup(key);
    if (existing) {
      if (this.options.debug) {
        console.log(`[LAUNCHER] Found daemon for ${describeStage(key)} at ${existing.address}`);
      }
      return existing.address;
    }

    if (this.options.debug) {
      console.log(`[LAUNCHER] No daemon registered for ${describeStage(key)}; starting one`);
    }

    let handle: DaemonHandle;
    try {
      handle = this.spawner(key);
    } catch (error) {
      throw new SpawnFailureError(computeStageId(key), {
        exitCode: null,
        signal: null,
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }

    try {
      return await this.waitForRegistration(key, handle, signal);
    } finally {
      handle.release();
    }
  }

  private async waitForRegistration(
    key: StageKey,
    handle: DaemonHandle,
    signal?: AbortSignal,
  ): Promise<string> {
    const stageId = computeStageId(key);
    const deadline = Date.now() + this.startTimeoutMs;

    const observed: { exit?: DaemonExit } = {};
    const exited = handle.exited.then((status) => {
      observed.exit = status;
    });

    if (this.options.debug) {
      console.log(`[LAUNCHER] Waiting for daemon ${stageId} (pid ${handle.pid ?? 'n/a'}) to register`);
    }

    for (;;) {
      // Capture exit state before looking up: a daemon that lost a publish race
      // exits only after the winner's record exists.
      const exitedBeforeLookup = observed.exit;
      const registration = await this.registry.lookup(key);
      if (registration) {
        if (this.options.debug) {
          console.log(`[LAUNCHER] Daemon ${stageId} registered at ${registration.address}`);
        }
        return registration.address;
      }

      if (exitedBeforeLookup) {
        throw new SpawnFailureError(stageId, exitedBeforeLookup);
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new RegistrationTimeoutError(stageId, this.startTimeoutMs);
      }

      await Promise.race([delay(Math.min(this.pollIntervalMs, remaining), signal), exited]);
      signal?.throwIfAborted();
    }
  }
}
