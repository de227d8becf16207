import { describe, it, expect } from 'vitest';
import path from 'path';
import { createHash } from 'crypto';
import {
  computeStageId,
  createStageKey,
  describeStage,
  isValidStageName,
  projectStateDir,
} from '../../src/daemon/identity.ts';

describe('stage identity', () => {
  it('resolves relative config paths against cwd', () => {
    const key = createStageKey('./infra/../stagehub.config.ts', 'dev', '/work/app');
    expect(key).toEqual({ configPath: '/work/app/stagehub.config.ts', stage: 'dev' });
    expect(Object.isFrozen(key)).toBe(true);
  });

  it('computes the same id for equivalent keys', () => {
    const a = createStageKey('stagehub.config.ts', 'prod', '/work/app');
    const b = createStageKey('/work/app/./stagehub.config.ts', 'prod', '/elsewhere');
    expect(computeStageId(a)).toBe(computeStageId(b));
    expect(computeStageId(a)).toMatch(/^[0-9a-f]{16}$/);
  });

  it('derives the id from the config path and stage', () => {
    const key = createStageKey('/work/app/stagehub.config.ts', 'dev');
    const expected = createHash('sha256')
      .update(JSON.stringify(['/work/app/stagehub.config.ts', 'dev']))
      .digest('hex')
      .slice(0, 16);
    expect(computeStageId(key)).toBe(expected);
  });

  it('distinguishes stages and projects', () => {
    const dev = createStageKey('/work/app/stagehub.config.ts', 'dev');
    const prod = createStageKey('/work/app/stagehub.config.ts', 'prod');
    const other = createStageKey('/work/other/stagehub.config.ts', 'dev');
    expect(computeStageId(dev)).not.toBe(computeStageId(prod));
    expect(computeStageId(dev)).not.toBe(computeStageId(other));
  });

  it('validates stage names', () => {
    expect(isValidStageName('dev')).toBe(true);
    expect(isValidStageName('pr-42.preview_1')).toBe(true);
    expect(isValidStageName('a'.repeat(64))).toBe(true);
    expect(isValidStageName('a'.repeat(65))).toBe(false);
    expect(isValidStageName('-dev')).toBe(false);
    expect(isValidStageName('dev/prod')).toBe(false);
    expect(isValidStageName('')).toBe(false);
  });

  it('rejects an empty config path or invalid stage', () => {
    expect(() => createStageKey('  ', 'dev')).toThrow('Config path is required to identify a stage');
    expect(() => createStageKey('stagehub.config.ts', '../dev')).toThrow('Invalid stage name "../dev"');
  });

  it('places state beside the config file', () => {
    expect(projectStateDir('/work/app/stagehub.config.ts')).toBe(path.join('/work/app', '.stagehub'));
  });

  it('describes a stage for diagnostics', () => {
    const key = createStageKey('/work/app/stagehub.config.ts', 'dev');
    expect(describeStage(key)).toBe('dev (/work/app/stagehub.config.ts)');
  });
});
