import { EventHub } from './hub.ts';
import { createStreamServer, type StreamServer } from './server.ts';
import { computeStageId, describeStage, type StageKey } from './identity.ts';
import type { Registration, Registry } from './registry.ts';
import { idleEngine, type Engine, type EngineContext } from './engine.ts';
import { getConfig } from '../config.ts';

export interface DaemonOptions {
  key: StageKey;
  registry: Registry;
  engine?: Engine;
  /** Per-subscriber queue limit (defaults to config). */
  queueLimit?: number;
  /** Shut down after this long with nobody attached. 0 disables the timer. */
  inactivityTimeoutMs?: number;
  host?: string;
  debug?: boolean;
}

/**
 * The long-running process-level owner of one stage's hub.
 *
 * Lifecycle: bind the stream server, publish the registration (exclusive),
 * then run the engine. Stopping reverses it and removes only this daemon's
 * own registration.
 */
export class Daemon {
  readonly stageId: string;
  readonly startedAt = new Date();
  readonly hub: EventHub;
  /** Resolves with the shutdown reason once the daemon has fully stopped. */
  readonly stopped: Promise<string>;

  private streamServer?: StreamServer;
  private registration?: Registration;
  private inactivityTimeout: NodeJS.Timeout | null = null;
  private readonly engineAbort = new AbortController();
  private stopping?: Promise<void>;
  private resolveStopped: (reason: string) => void = () => {};

  constructor(private readonly options: DaemonOptions) {
    this.stageId = computeStageId(options.key);
    this.hub = new EventHub({
      queueLimit: options.queueLimit ?? getConfig().subscriberQueueLimit,
      debug: options.debug,
      onSubscriberCountChange: (count) => {
        if (count === 0) this.resetInactivityTimer();
        else this.clearInactivityTimer();
      },
    });
    this.stopped = new Promise((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  get address(): string | undefined {
    return this.streamServer?.address;
  }

  get isRunning(): boolean {
    return this.registration !== undefined && this.stopping === undefined;
  }

  /**
   * Start serving. Throws RegistrationConflictError (after releasing the port)
   * when another daemon already holds the stage.
   */
  async start(): Promise<Registration> {
    const { key, registry, debug } = this.options;

    this.streamServer = await createStreamServer(this.hub, {
      host: this.options.host,
      debug,
      status: () => ({
        stageId: this.stageId,
        stage: key.stage,
        configPath: key.configPath,
        pid: process.pid,
        address: this.address,
        startedAt: this.startedAt.toISOString(),
      }),
    });

    const registration: Registration = {
      key,
      address: this.streamServer.address,
      pid: process.pid,
      createdAt: new Date().toISOString(),
    };

    try {
      await registry.publish(registration);
    } catch (error) {
      await this.streamServer.close(0);
      this.resolveStopped('registration failed');
      throw error;
    }
    this.registration = registration;

    if (debug) {
      console.log(
        `[DAEMON] Serving stage ${describeStage(key)} (id ${this.stageId}) at ${registration.address}`,
      );
    }

    this.resetInactivityTimer();
    this.runEngine();
    return registration;
  }

  /**
   * Stop serving: abort the engine, close every stream, close the server and
   * remove this daemon's registration. Safe to call more than once.
   */
  stop(reason = 'requested'): Promise<void> {
    this.stopping ??= this.shutdown(reason);
    return this.stopping;
  }

  private async shutdown(reason: string): Promise<void> {
    if (this.options.debug) {
      console.log(`[DAEMON] Shutting down (reason: ${reason})`);
    }

    this.clearInactivityTimer();
    this.engineAbort.abort(new Error(`Daemon shutting down: ${reason}`));
    this.hub.shutdown();

    try {
      if (this.streamServer) {
        await this.streamServer.close();
      }
      if (this.registration) {
        await this.options.registry.remove(this.options.key, this.registration.address);
      }
    } catch (error) {
      console.error('[DAEMON] Error during shutdown:', error);
    }

    if (this.options.debug) {
      console.log('[DAEMON] Shutdown complete');
    }
    this.resolveStopped(reason);
  }

  private runEngine(): void {
    const engine = this.options.engine ?? idleEngine;
    const context: EngineContext = {
      key: this.options.key,
      publish: (event) => this.hub.publish(event),
      closeStreams: () => this.hub.closeStreams(),
      signal: this.engineAbort.signal,
    };

    void Promise.resolve()
      .then(() => engine.run(context))
      .then(
        () => {
          if (this.options.debug) console.log('[DAEMON] Engine finished');
        },
        (error: unknown) => {
          if (this.engineAbort.signal.aborted) return;
          console.error('[DAEMON] Engine failed:', error);
          void this.stop('engine failure');
        },
      );
  }

  private resetInactivityTimer(): void {
    this.clearInactivityTimer();
    if (this.stopping || !this.registration) return;
    if (this.hub.subscriberCount > 0) return;

    const timeoutMs = this.options.inactivityTimeoutMs ?? 0;
    if (timeoutMs <= 0) return;

    this.inactivityTimeout = setTimeout(() => {
      void this.stop('inactivity timeout');
    }, timeoutMs);
  }

  private clearInactivityTimer(): void {
    if (this.inactivityTimeout) {
      clearTimeout(this.inactivityTimeout);
      this.inactivityTimeout = null;
    }
  }
}
