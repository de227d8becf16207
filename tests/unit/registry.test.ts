import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import path from 'path';
import fs from 'fs/promises';
import os from 'os';
import { FileRegistry, type Registration } from '../../src/daemon/registry.ts';
import { computeStageId, createStageKey, type StageKey } from '../../src/daemon/identity.ts';
import { RegistrationConflictError } from '../../src/daemon/errors.ts';

function registrationFor(key: StageKey, address: string, pid = 4242): Registration {
  return { key, address, pid, createdAt: '2026-01-01T00:00:00.000Z' };
}

describe('FileRegistry', () => {
  let dir: string;
  let registry: FileRegistry;
  let dev: StageKey;
  let prod: StageKey;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stagehub-registry-'));
    registry = new FileRegistry(path.join(dir, 'registry'));
    dev = createStageKey(path.join(dir, 'stagehub.config.ts'), 'dev');
    prod = createStageKey(path.join(dir, 'stagehub.config.ts'), 'prod');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns undefined for an unknown key', async () => {
    expect(await registry.lookup(dev)).toBeUndefined();
    expect(await registry.list()).toEqual([]);
  });

  it('publishes and looks up a registration', async () => {
    await registry.publish(registrationFor(dev, '127.0.0.1:4100'));
    expect(await registry.lookup(dev)).toEqual(registrationFor(dev, '127.0.0.1:4100'));
    expect(await registry.lookup(prod)).toBeUndefined();
  });

  it('stores one record per stage id with owner-only permissions', async () => {
    await registry.publish(registrationFor(dev, '127.0.0.1:4100'));
    const file = registry.recordPath(dev);
    expect(path.basename(file)).toBe(`${computeStageId(dev)}.json`);
    const stat = await fs.stat(file);
    expect(stat.mode & 0o777).toBe(0o600);
    expect(await fs.readdir(registry.dir)).toEqual([`${computeStageId(dev)}.json`]);
  });

  it('never overwrites an existing registration', async () => {
    await registry.publish(registrationFor(dev, '127.0.0.1:4100'));
    const error = await registry
      .publish(registrationFor(dev, '127.0.0.1:4200'))
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RegistrationConflictError);
    expect(error).toMatchObject({
      code: 'REGISTRATION_CONFLICT',
      phase: 'registry',
      existingAddress: '127.0.0.1:4100',
    });
    expect((await registry.lookup(dev))?.address).toBe('127.0.0.1:4100');
  });

  it('lets exactly one concurrent publisher win', async () => {
    const addresses = Array.from({ length: 8 }, (_, i) => `127.0.0.1:${5000 + i}`);
    const results = await Promise.allSettled(
      addresses.map((address) => registry.publish(registrationFor(dev, address))),
    );

    const winners = results.filter((r) => r.status === 'fulfilled');
    const losers = results.filter((r) => r.status === 'rejected');
    expect(winners).toHaveLength(1);
    expect(losers).toHaveLength(7);
    for (const loser of losers) {
      expect(loser.status === 'rejected' && loser.reason).toBeInstanceOf(RegistrationConflictError);
    }

    const winnerAddress = addresses[results.findIndex((r) => r.status === 'fulfilled')];
    expect((await registry.lookup(dev))?.address).toBe(winnerAddress);
    // No temp files left behind
    expect(await fs.readdir(registry.dir)).toEqual([`${computeStageId(dev)}.json`]);
  });

  it('removes unconditionally without an expected address', async () => {
    await registry.publish(registrationFor(dev, '127.0.0.1:4100'));
    expect(await registry.remove(dev)).toBe(true);
    expect(await registry.lookup(dev)).toBeUndefined();
    expect(await registry.remove(dev)).toBe(false);
  });

  it('removes only a record naming the expected address', async () => {
    await registry.publish(registrationFor(dev, '127.0.0.1:4100'));

    expect(await registry.remove(dev, '127.0.0.1:9999')).toBe(false);
    expect((await registry.lookup(dev))?.address).toBe('127.0.0.1:4100');

    expect(await registry.remove(dev, '127.0.0.1:4100')).toBe(true);
    expect(await registry.lookup(dev)).toBeUndefined();
    expect(await fs.readdir(registry.dir)).toEqual([]);
  });

  it('reports false when removing a missing record by address', async () => {
    expect(await registry.remove(dev, '127.0.0.1:4100')).toBe(false);
  });

  it('lists registrations sorted by stage', async () => {
    await registry.publish(registrationFor(prod, '127.0.0.1:4200'));
    await registry.publish(registrationFor(dev, '127.0.0.1:4100'));
    const listed = await registry.list();
    expect(listed.map((r) => [r.key.stage, r.address])).toEqual([
      ['dev', '127.0.0.1:4100'],
      ['prod', '127.0.0.1:4200'],
    ]);
  });

  it('ignores corrupt and invalid records', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await fs.mkdir(registry.dir, { recursive: true });
    await fs.writeFile(registry.recordPath(dev), '{not json');
    await fs.writeFile(registry.recordPath(prod), JSON.stringify({ address: '' }));

    expect(await registry.lookup(dev)).toBeUndefined();
    expect(await registry.lookup(prod)).toBeUndefined();
    expect(await registry.list()).toEqual([]);
    expect(warn).toHaveBeenCalledWith(
      `[REGISTRY] Ignoring unreadable registration ${registry.recordPath(dev)}`,
    );
  });

  it('ignores a record whose key does not match', async () => {
    await fs.mkdir(registry.dir, { recursive: true });
    await fs.writeFile(
      registry.recordPath(dev),
      JSON.stringify(registrationFor(prod, '127.0.0.1:4200')),
    );
    expect(await registry.lookup(dev)).toBeUndefined();
  });

  it('replaces a corrupt record on publish', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await fs.mkdir(registry.dir, { recursive: true });
    await fs.writeFile(registry.recordPath(dev), '{"truncated');

    await registry.publish(registrationFor(dev, '127.0.0.1:4100'));

    expect(await registry.lookup(dev)).toEqual(registrationFor(dev, '127.0.0.1:4100'));
    expect(warn).toHaveBeenCalledWith(
      `[REGISTRY] Cleared unusable registration for stage dev at ${registry.recordPath(dev)}`,
    );
    expect(await fs.readdir(registry.dir)).toEqual([`${computeStageId(dev)}.json`]);
  });

  it('replaces a record written for another key on publish', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    await fs.mkdir(registry.dir, { recursive: true });
    await fs.writeFile(
      registry.recordPath(dev),
      JSON.stringify(registrationFor(prod, '127.0.0.1:4200')),
    );

    await registry.publish(registrationFor(dev, '127.0.0.1:4100'));
    expect((await registry.lookup(dev))?.address).toBe('127.0.0.1:4100');
  });

  it('keeps a live record visible while a remove for another address runs', async () => {
    await registry.publish(registrationFor(dev, '127.0.0.1:1111'));

    for (let i = 0; i < 25; i++) {
      const [removed, seen] = await Promise.all([
        registry.remove(dev, '127.0.0.1:2222'),
        registry.lookup(dev),
      ]);
      expect(removed).toBe(false);
      expect(seen?.address).toBe('127.0.0.1:1111');
    }
  });

  it('removes a corrupt record when asked to remove by address', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    await fs.mkdir(registry.dir, { recursive: true });
    await fs.writeFile(registry.recordPath(dev), '{"truncated');

    expect(await registry.remove(dev, '127.0.0.1:4100')).toBe(true);
    expect(await fs.readdir(registry.dir)).toEqual([]);
  });

  it('roots the project registry beside the config file', () => {
    const configPath = path.join(dir, 'stagehub.config.ts');
    expect(FileRegistry.forProject(configPath).dir).toBe(path.join(dir, '.stagehub', 'registry'));
    expect(FileRegistry.forStage(dev, path.join(dir, 'state')).dir).toBe(
      path.join(dir, 'state', 'registry'),
    );
  });
});
