import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadEnvFiles } from '../../scripts/load_env';

const LOCAL_ONLY = 'TICKER_RESOLVER_TEST_LOCAL_ONLY';
const SHARED = 'TICKER_RESOLVER_TEST_SHARED';
const BASE_ONLY = 'TICKER_RESOLVER_TEST_BASE_ONLY';

describe('loadEnvFiles', () => {
  let dir: string | null = null;

  afterEach(() => {
    delete process.env[LOCAL_ONLY];
    delete process.env[SHARED];
    delete process.env[BASE_ONLY];
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it('prefers .env.local over .env and keeps variables from both', () => {
    dir = mkdtempSync(join(tmpdir(), 'ticker-env-'));
    writeFileSync(join(dir, '.env.local'), `${LOCAL_ONLY}=local\n${SHARED}=local\n`);
    writeFileSync(join(dir, '.env'), `${SHARED}=base\n${BASE_ONLY}=base\n`);

    loadEnvFiles(dir);

    expect(process.env[LOCAL_ONLY]).toBe('local');
    expect(process.env[SHARED]).toBe('local');
    expect(process.env[BASE_ONLY]).toBe('base');
  });

  it('does not override variables already set', () => {
    dir = mkdtempSync(join(tmpdir(), 'ticker-env-'));
    writeFileSync(join(dir, '.env'), `${SHARED}=base\n`);
    process.env[SHARED] = 'preset';

    loadEnvFiles(dir);

    expect(process.env[SHARED]).toBe('preset');
  });

  it('is the first import of the lookup CLI, ahead of the logger', () => {
    const source = readFileSync(join(__dirname, '../../scripts/lookup.ts'), 'utf-8');
    const imports = source.split('\n').filter((line) => line.startsWith('import '));

    expect(imports[0]).toBe("import './load_env';");
  });
});
