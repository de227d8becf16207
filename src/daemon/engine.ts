import path from 'path';
import { pathToFileURL } from 'url';
import type { StageKey } from './identity.ts';
import type { StageEvent } from './protocol.ts';

/**
 * What the daemon hands to the engine: the only way events enter the hub.
 */
export interface EngineContext {
  key: StageKey;
  /** Publish an event to every attached subscriber. The `stream.overflow` type is reserved. */
  publish(event: StageEvent): void;
  /** End every current stream cleanly (e.g. the deployment finished). */
  closeStreams(): void;
  /** Aborted when the daemon shuts down. */
  signal: AbortSignal;
}

/**
 * The deployment engine collaborator. `run` may return immediately or stay
 * pending for the lifetime of the daemon.
 */
export interface Engine {
  run(context: EngineContext): void | Promise<void>;
}

export type EngineFactory = (key: StageKey) => Engine | Promise<Engine>;

/**
 * Engine used when none is configured: the daemon serves an idle hub.
 */
export const idleEngine: Engine = {
  run(): void {},
};

function isEngine(value: unknown): value is Engine {
  return (
    typeof value === 'object' &&
    value !== null &&
    'run' in value &&
    typeof value.run === 'function'
  );
}

function isEngineFactory(value: unknown): value is EngineFactory {
  return typeof value === 'function';
}

/**
 * Load an engine module. The module must export a factory as `default` or
 * `createEngine`. Relative specifiers resolve against `cwd`.
 */
export async function loadEngine(
  specifier: string,
  key: StageKey,
  cwd = process.cwd(),
): Promise<Engine> {
  const looksPathLike =
    specifier.startsWith('.') || specifier.startsWith('/') || path.isAbsolute(specifier);
  const target = looksPathLike ? pathToFileURL(path.resolve(cwd, specifier)).href : specifier;

  let mod: unknown;
  try {
    mod = await import(target);
  } catch (err) {
    throw new Error(`Engine module "${specifier}" could not be loaded: ${err}`);
  }

  const exported =
    typeof mod === 'object' && mod !== null
      ? 'createEngine' in mod
        ? mod.createEngine
        : 'default' in mod
          ? mod.default
          : undefined
      : undefined;

  if (!isEngineFactory(exported)) {
    throw new Error(
      `Invalid engine module "${specifier}". Export a factory as default or createEngine.`,
    );
  }

  const engine: unknown = await exported(key);
  if (!isEngine(engine)) {
    throw new Error(`Engine factory in "${specifier}" did not return an object with run().`);
  }
  return engine;
}
