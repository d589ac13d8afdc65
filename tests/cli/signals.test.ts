import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { handleSignal } from '../../src/cli/signals.js';
import { captureLogger } from '../helpers/console-fixtures.js';

describe('handleSignal', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'opsdeck-signals-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('logs and exits 130 on SIGINT', () => {
    const log = captureLogger(testDir);
    const codes: number[] = [];

    handleSignal('SIGINT', log.logger, code => codes.push(code));

    expect(codes).toEqual([130]);
    expect(log.entries()).toEqual(['[INFO]  2026-01-02 03:04:05 - Interrupted.']);
  });

  it('logs and exits 143 on SIGTERM', () => {
    const log = captureLogger(testDir);
    const codes: number[] = [];

    handleSignal('SIGTERM', log.logger, code => codes.push(code));

    expect(codes).toEqual([143]);
    expect(log.entries()).toEqual(['[INFO]  2026-01-02 03:04:05 - Terminated.']);
  });
});
