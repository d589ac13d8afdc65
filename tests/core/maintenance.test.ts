import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fixPermissions, prune } from '../../src/core/maintenance.js';
import type { PruneOperation } from '../../src/core/maintenance.js';
import { ScriptedExecutor, makeContext } from '../helpers/console-fixtures.js';

const SUDO = ['-k', '-S', '-p', ''];

describe('maintenance', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'opsdeck-maint-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('prune', () => {
    const expected: Record<PruneOperation, string[]> = {
      'prune-cache': ['docker', 'system', 'prune', '-af', '--volumes'],
      'prune-volumes': ['docker', 'volume', 'prune', '-f'],
      'prune-images': ['docker', 'image', 'prune', '-af'],
      'prune-containers': ['docker', 'container', 'prune', '-f'],
    };

    const operations: PruneOperation[] = ['prune-cache', 'prune-volumes', 'prune-images', 'prune-containers'];

    for (const operation of operations) {
      it(`runs ${operation} through sudo`, async () => {
        const { ctx, executor } = makeContext({ dir: testDir });

        expect(await prune(ctx, operation)).toBe(true);
        expect(executor.calls).toHaveLength(1);
        expect(executor.calls[0]?.command).toBe('sudo');
        expect(executor.calls[0]?.args).toEqual([...SUDO, ...expected[operation]]);
        expect(executor.calls[0]?.input).toBe('test-secret\n');
      });
    }

    it('logs a failed prune', async () => {
      const { ctx, log } = makeContext({ dir: testDir, executor: new ScriptedExecutor().on('volume prune', 1) });

      expect(await prune(ctx, 'prune-volumes')).toBe(false);
      expect(log.entriesAt('ERROR')).toEqual(['[ERROR] 2026-01-02 03:04:05 - prune-volumes failed with exit code 1.']);
    });
  });

  describe('fixPermissions', () => {
    it('chmods then chowns the project root for the login user', async () => {
      const { ctx, executor } = makeContext({ dir: testDir });

      expect(await fixPermissions(ctx)).toBe(true);
      expect(executor.calls.map(c => c.args)).toEqual([
        [...SUDO, 'chmod', '-Rfv', '755', '.'],
        [...SUDO, 'chown', '-Rfv', 'operator:operator', '.'],
      ]);
      expect(executor.calls.every(c => c.cwd === testDir)).toBe(true);
    });

    it('does not chown after a failed chmod', async () => {
      const { ctx, executor } = makeContext({ dir: testDir, executor: new ScriptedExecutor().on('chmod', 1) });

      expect(await fixPermissions(ctx)).toBe(false);
      expect(executor.calls).toHaveLength(1);
    });
  });
});
