import { describe, it, expect } from 'vitest';
import { createProcessSpawner, serverArgsFor } from '../../src/daemon/spawn.ts';
import { createStageKey } from '../../src/daemon/identity.ts';

describe('process spawner', () => {
  const key = createStageKey('/work/app/stagehub.config.ts', 'dev');

  it('re-invokes the CLI in server mode for the stage', () => {
    expect(serverArgsFor(key)).toEqual([
      'server',
      '--stage',
      'dev',
      '--config',
      '/work/app/stagehub.config.ts',
    ]);
  });

  it('reports the exit status of the spawned process', async () => {
    const spawn = createProcessSpawner({
      baseArgs: ['-e', 'process.exit(3)'],
    });
    const handle = spawn(key);

    expect(typeof handle.pid).toBe('number');
    expect(await handle.exited).toEqual({ exitCode: 3, signal: null });
    handle.release();
  });

  it('reports a process that could not be spawned', async () => {
    const spawn = createProcessSpawner({ execPath: '/nonexistent/stagehub-daemon' });
    const handle = spawn(key);

    const exit = await handle.exited;
    expect(exit.exitCode).toBeNull();
    expect(exit.signal).toBeNull();
    expect(exit.error?.message).toMatch(/^Failed to spawn \/nonexistent\/stagehub-daemon /);
  });
});
