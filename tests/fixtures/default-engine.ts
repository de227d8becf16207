import type { Engine } from '../../src/daemon/engine.ts';

export default async function (): Promise<Engine> {
  return { run: () => {} };
}
