import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, configExists } from '../../src/core/config.js';
import { DEFAULT_CONFIG, CONFIG_FILENAME } from '../../src/types/config.js';
import { ConsoleError, ConsoleErrorCode } from '../../src/utils/errors.js';

describe('config', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'opsdeck-config-'));
    configPath = join(testDir, CONFIG_FILENAME);
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('falls back to defaults when the file is absent', () => {
    expect(configExists(configPath)).toBe(false);
    expect(loadConfig(configPath)).toEqual({
      composeFile: 'docker-compose.yml',
      image: { namespace: 'opsdeck', repository: 'stack' },
      services: {},
      buildArgs: {},
    });
  });

  it('fills in defaults around the fields that are given', () => {
    writeFileSync(configPath, JSON.stringify({ services: { api: './docker/api/Dockerfile' } }));

    const config = loadConfig(configPath);

    expect(config.services).toEqual({ api: './docker/api/Dockerfile' });
    expect(config.composeFile).toBe(DEFAULT_CONFIG.composeFile);
    expect(config.image).toEqual(DEFAULT_CONFIG.image);
  });

  it('reads every field', () => {
    writeFileSync(
      configPath,
      JSON.stringify({
        composeFile: 'stack.yml',
        image: { namespace: 'example', repository: 'app' },
        services: { worker: './Dockerfile.worker' },
        buildArgs: { PYTHONPATH: '/app' },
      }),
    );

    expect(loadConfig(configPath)).toEqual({
      composeFile: 'stack.yml',
      image: { namespace: 'example', repository: 'app' },
      services: { worker: './Dockerfile.worker' },
      buildArgs: { PYTHONPATH: '/app' },
    });
  });

  it('rejects unparsable JSON as a config error', () => {
    writeFileSync(configPath, '{ not json');

    let caught: unknown;
    try {
      loadConfig(configPath);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConsoleError);
    expect(caught).toMatchObject({ code: ConsoleErrorCode.CONFIG_ERROR });
  });

  it('names the offending field of an invalid file', () => {
    writeFileSync(configPath, JSON.stringify({ image: { namespace: '', repository: 'app' } }));

    expect(() => loadConfig(configPath)).toThrow(/image\.namespace/);
  });
});
