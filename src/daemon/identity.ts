import path from 'path';
import { createHash } from 'crypto';

/**
 * Identifies one deployable unit: a project's configuration file and a stage.
 */
export interface StageKey {
  /** Absolute, normalized path to the project configuration file. */
  readonly configPath: string;
  /** Deployment stage name. */
  readonly stage: string;
}

const STAGE_NAME_REGEX = /^[A-Za-z0-9][A-Za-z0-9_.-]{0,63}$/;

/**
 * Validate stage name format (1..64 chars, leading alphanumeric).
 */
export function isValidStageName(stage: string): boolean {
  return typeof stage === 'string' && STAGE_NAME_REGEX.test(stage);
}

/**
 * Build an immutable StageKey. Relative config paths are resolved against
 * `cwd` so independent invocations from the same project agree on the key.
 */
export function createStageKey(configPath: string, stage: string, cwd = process.cwd()): StageKey {
  const trimmed = String(configPath ?? '').trim();
  if (!trimmed) {
    throw new Error('Config path is required to identify a stage');
  }
  if (!isValidStageName(stage)) {
    throw new Error(`Invalid stage name "${stage}". Expected [A-Za-z0-9][A-Za-z0-9_.-]{0,63}`);
  }
  return Object.freeze({
    configPath: path.normalize(path.resolve(cwd, trimmed)),
    stage,
  });
}

/**
 * Compute a deterministic 16-character id for a StageKey.
 * This is the registry file name and the id shown in diagnostics.
 */
export function computeStageId(key: StageKey): string {
  const input = JSON.stringify([key.configPath, key.stage]);
  return createHash('sha256').update(input).digest('hex').slice(0, 16);
}

/**
 * Per-project state directory: `.stagehub` beside the configuration file.
 */
export function projectStateDir(configPath: string): string {
  return path.join(path.dirname(path.resolve(configPath)), '.stagehub');
}

export function describeStage(key: StageKey): string {
  return `${key.stage} (${key.configPath})`;
}
