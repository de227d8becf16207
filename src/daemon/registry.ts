import fs from 'fs/promises';
import path from 'path';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import { computeStageId, projectStateDir, type StageKey } from './identity.ts';
import { RegistrationConflictError } from './errors.ts';

/**
 * A daemon's published network address for one stage.
 */
export interface Registration {
  key: StageKey;
  /** host:port the daemon's stream endpoint listens on. */
  address: string;
  /** PID of the daemon process that owns this record. */
  pid: number;
  /** ISO timestamp of publication. */
  createdAt: string;
}

const registrationSchema = z.object({
  key: z.object({
    configPath: z.string().min(1),
    stage: z.string().min(1),
  }),
  address: z.string().min(1),
  pid: z.number().int().positive(),
  createdAt: z.string(),
});

/**
 * Discovery store mapping a StageKey to a live daemon's address.
 * Implementations must be safe across processes.
 */
export interface Registry {
  lookup(key: StageKey): Promise<Registration | undefined>;
  /**
   * Publish a registration. Throws RegistrationConflictError if the key is
   * already registered; never overwrites.
   */
  publish(registration: Registration): Promise<void>;
  /**
   * Remove the key's registration. With `expectedAddress`, only a record still
   * naming that address is removed.
   * @returns True when a record was removed.
   */
  remove(key: StageKey, expectedAddress?: string): Promise<boolean>;
  list(): Promise<Registration[]>;
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Ensure a directory exists with owner-only permissions.
 */
async function ensureDirSecure(dirPath: string, mode: number = 0o700): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true, mode });
}

type RecordState =
  | { kind: 'missing' }
  | { kind: 'invalid' }
  | { kind: 'valid'; record: Registration };

function sameKey(a: StageKey, b: StageKey): boolean {
  return a.configPath === b.configPath && a.stage === b.stage;
}

/**
 * Hard-link `source` to `target`. Returns false when `target` already exists.
 */
async function linkExclusive(source: string, target: string): Promise<boolean> {
  try {
    await fs.link(source, target);
    return true;
  } catch (error) {
    if (isErrnoCode(error, 'EEXIST')) return false;
    throw error;
  }
}

/**
 * Put a claimed record back unless a newer one already took its place.
 */
async function restore(claimed: string, target: string): Promise<void> {
  await linkExclusive(claimed, target);
}

function uniqueSuffix(): string {
  return `${process.pid}-${Date.now()}-${randomBytes(4).toString('hex')}`;
}

/**
 * File-backed registry: one JSON record per stage id under a state directory.
 *
 * Publication writes a private temp file and hard-links it into place, which
 * is both atomic (readers never see a partial record) and exclusive (link
 * fails with EEXIST when a record exists).
 */
export class FileRegistry implements Registry {
  constructor(
    readonly dir: string,
    private readonly options: { debug?: boolean } = {},
  ) {}

  /**
   * Registry rooted at `<project>/.stagehub/registry`, or under an explicit
   * state directory when one is configured.
   */
  static forStage(key: StageKey, stateDir?: string, options: { debug?: boolean } = {}): FileRegistry {
    return FileRegistry.forProject(key.configPath, stateDir, options);
  }

  static forProject(
    configPath: string,
    stateDir?: string,
    options: { debug?: boolean } = {},
  ): FileRegistry {
    const base = stateDir ? path.resolve(stateDir) : projectStateDir(configPath);
    return new FileRegistry(path.join(base, 'registry'), options);
  }

  recordPath(key: StageKey): string {
    return path.join(this.dir, `${computeStageId(key)}.json`);
  }

  async lookup(key: StageKey): Promise<Registration | undefined> {
    const record = await this.readRecord(this.recordPath(key));
    if (!record) return undefined;
    if (!sameKey(record.key, key)) {
      if (this.options.debug) {
        console.log(`[REGISTRY] Ignoring record for ${record.key.stage} at ${this.recordPath(key)}`);
      }
      return undefined;
    }
    return record;
  }

  async publish(registration: Registration): Promise<void> {
    await ensureDirSecure(this.dir);
    const target = this.recordPath(registration.key);
    const tmp = path.join(this.dir, `.tmp-${path.basename(target)}-${uniqueSuffix()}`);
    await fs.writeFile(tmp, JSON.stringify(registration, null, 2), { mode: 0o600, flag: 'wx' });
    try {
      if (!(await linkExclusive(tmp, target))) {
        // A record that is unreadable or names another key can never be
        // looked up, so it is cleared once rather than blocking the stage.
        const holder = await this.clearUnusableRecord(registration.key, target);
        if (holder || !(await linkExclusive(tmp, target))) {
          const current = holder ?? (await this.readRecord(target));
          throw new RegistrationConflictError(computeStageId(registration.key), current?.address);
        }
      }
    } finally {
      await fs.rm(tmp, { force: true });
    }

    if (this.options.debug) {
      console.log(`[REGISTRY] Published ${registration.address} for stage ${registration.key.stage}`);
    }
  }

  async remove(key: StageKey, expectedAddress?: string): Promise<boolean> {
    const target = this.recordPath(key);

    if (expectedAddress === undefined) {
      try {
        await fs.unlink(target);
        return true;
      } catch (error) {
        if (isErrnoCode(error, 'ENOENT')) return false;
        throw error;
      }
    }

    // Leave a record naming another address untouched: claiming it, even
    // briefly, hides a live daemon from concurrent lookups.
    const current = await this.readRecordState(target);
    if (current.kind === 'missing') return false;
    if (current.kind === 'valid' && current.record.address !== expectedAddress) return false;

    // Claim with an atomic rename so a record published since the read is
    // never deleted by mistake.
    const claimed = await this.claim(target);
    if (!claimed) return false;

    try {
      const record = await this.readRecord(claimed);
      if (!record || record.address === expectedAddress) {
        if (this.options.debug) {
          console.log(`[REGISTRY] Removed ${expectedAddress} for stage ${key.stage}`);
        }
        return true;
      }
      await restore(claimed, target);
      return false;
    } finally {
      await fs.rm(claimed, { force: true });
    }
  }

  async list(): Promise<Registration[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return [];
      throw error;
    }

    const records = await Promise.all(
      names
        .filter((name) => name.endsWith('.json') && !name.startsWith('.'))
        .map((name) => this.readRecord(path.join(this.dir, name))),
    );
    return records
      .filter((record): record is Registration => record !== undefined)
      .sort((a, b) => a.key.stage.localeCompare(b.key.stage));
  }

  /**
   * Remove the record at `target` unless it is a valid registration for
   * `key`, which is returned instead.
   */
  private async clearUnusableRecord(
    key: StageKey,
    target: string,
  ): Promise<Registration | undefined> {
    const state = await this.readRecordState(target);
    if (state.kind === 'missing') return undefined;
    if (state.kind === 'valid' && sameKey(state.record.key, key)) return state.record;

    const claimed = await this.claim(target);
    if (!claimed) return undefined;
    try {
      const record = await this.readRecord(claimed);
      if (record && sameKey(record.key, key)) {
        // Replaced by a live registration between the read and the claim.
        await restore(claimed, target);
        return record;
      }
      console.warn(`[REGISTRY] Cleared unusable registration for stage ${key.stage} at ${target}`);
      return undefined;
    } finally {
      await fs.rm(claimed, { force: true });
    }
  }

  /**
   * Move `target` to a private name. Returns undefined when it is gone.
   */
  private async claim(target: string): Promise<string | undefined> {
    const claimed = path.join(this.dir, `.claim-${path.basename(target)}-${uniqueSuffix()}`);
    try {
      await fs.rename(target, claimed);
      return claimed;
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return undefined;
      throw error;
    }
  }

  private async readRecord(file: string): Promise<Registration | undefined> {
    const state = await this.readRecordState(file);
    return state.kind === 'valid' ? state.record : undefined;
  }

  private async readRecordState(file: string): Promise<RecordState> {
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return { kind: 'missing' };
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      console.warn(`[REGISTRY] Ignoring unreadable registration ${file}`);
      return { kind: 'invalid' };
    }
    const parsed = registrationSchema.safeParse(json);
    if (!parsed.success) {
      console.warn(`[REGISTRY] Ignoring invalid registration ${file}: ${parsed.error.message}`);
      return { kind: 'invalid' };
    }
    return { kind: 'valid', record: parsed.data };
  }
}
