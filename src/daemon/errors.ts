/**
 * Typed failures surfaced by the registry, launcher and stream client.
 *
 * Every error names the phase it came from so the CLI can report whether
 * spawning, connecting or streaming failed.
 */

export type FailurePhase = 'spawn' | 'connect' | 'stream' | 'registry';

export type StageHubErrorCode =
  | 'SPAWN_FAILURE'
  | 'REGISTRATION_TIMEOUT'
  | 'DAEMON_UNREACHABLE'
  | 'REGISTRATION_CONFLICT'
  | 'OVERSIZED_LINE'
  | 'STREAM_IO'
  | 'SUBSCRIBER_OVERFLOW';

export abstract class StageHubError extends Error {
  abstract readonly code: StageHubErrorCode;
  abstract readonly phase: FailurePhase;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Exit status of a daemon process as observed by the launcher. */
export interface DaemonExit {
  exitCode: number | null;
  signal: string | null;
  /** Spawn-level failure (e.g. executable not found) rather than an exit. */
  error?: Error;
}

function describeExit(exit: DaemonExit): string {
  if (exit.error) return exit.error.message;
  if (exit.signal) return `killed by ${exit.signal}`;
  return `exited with code ${exit.exitCode ?? 'unknown'}`;
}

export class SpawnFailureError extends StageHubError {
  readonly code = 'SPAWN_FAILURE';
  readonly phase = 'spawn';

  constructor(
    readonly stageId: string,
    readonly exit: DaemonExit,
  ) {
    super(`Daemon for stage ${stageId} failed before registering: ${describeExit(exit)}`, {
      cause: exit.error,
    });
  }
}

export class RegistrationTimeoutError extends StageHubError {
  readonly code = 'REGISTRATION_TIMEOUT';
  readonly phase = 'spawn';

  constructor(
    readonly stageId: string,
    readonly timeoutMs: number,
  ) {
    super(`Daemon for stage ${stageId} did not register within ${timeoutMs}ms`);
  }
}

export class DaemonUnreachableError extends StageHubError {
  readonly code = 'DAEMON_UNREACHABLE';
  readonly phase = 'connect';

  constructor(
    readonly address: string,
    readonly attempts: number,
    cause?: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
    super(
      attempts > 1
        ? `Daemon unreachable after ${attempts} attempts (last address ${address}): ${reason}`
        : `Daemon at ${address} is unreachable: ${reason}`,
      { cause },
    );
  }
}

export class RegistrationConflictError extends StageHubError {
  readonly code = 'REGISTRATION_CONFLICT';
  readonly phase = 'registry';

  constructor(
    readonly stageId: string,
    readonly existingAddress: string | undefined,
  ) {
    super(
      `Stage ${stageId} is already registered${existingAddress ? ` at ${existingAddress}` : ''}`,
    );
  }
}

export class OversizedLineError extends StageHubError {
  readonly code = 'OVERSIZED_LINE';
  readonly phase = 'stream';

  constructor(
    readonly lineBytes: number,
    readonly maxLineBytes: number,
  ) {
    super(`Stream line of at least ${lineBytes} bytes exceeds limit of ${maxLineBytes} bytes`);
  }
}

export class StreamIOError extends StageHubError {
  readonly code = 'STREAM_IO';
  readonly phase = 'stream';

  constructor(
    readonly address: string,
    cause: unknown,
  ) {
    super(
      `Stream from ${address} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class SubscriberOverflowError extends StageHubError {
  readonly code = 'SUBSCRIBER_OVERFLOW';
  readonly phase = 'stream';

  constructor(
    readonly limit: number,
    readonly dropped: number,
  ) {
    super(
      `Daemon closed the stream: consumer fell ${dropped} events behind (queue limit ${limit})`,
    );
  }
}

export function isStageHubError(error: unknown): error is StageHubError {
  return error instanceof StageHubError;
}
