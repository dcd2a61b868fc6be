import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { runCheckConfigAction } from './check-config.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-check-config');

describe('runCheckConfigAction', () => {
  let baseDir: string;

  beforeEach(() => {
    baseDir = join(TEST_DIR, `${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
    mkdirSync(baseDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(baseDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('prints valid settings with the token redacted', async () => {
    const path = join(baseDir, 'settings.json');
    writeFileSync(
      path,
      JSON.stringify({
        CLOUD_BROWSER: { API_HOST: 'https://browsers.test', API_TOKEN: 'test-token', NUM_BROWSERS: 3 },
      }),
    );
    const output = vi.spyOn(console, 'log').mockImplementation(() => {});

    const exitCode = await runCheckConfigAction({ config: path, pretty: false });

    expect(exitCode).toBe(0);
    const printed: unknown = JSON.parse(String(output.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({
      valid: true,
      source: path,
      slots: 3,
      settings: { API_HOST: 'https://browsers.test', API_TOKEN: '[redacted]', NUM_BROWSERS: 3 },
    });
  });

  it('lists the issues of invalid settings', async () => {
    const path = join(baseDir, 'settings.json');
    writeFileSync(path, JSON.stringify({ CLOUD_BROWSER: { API_HOST: 'https://browsers.test' } }));
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});

    const exitCode = await runCheckConfigAction({ config: path, pretty: false });

    expect(exitCode).toBe(1);
    expect(errors).toHaveBeenCalledWith('{"valid":false,"issues":["API_TOKEN: Required"]}');
  });
});
