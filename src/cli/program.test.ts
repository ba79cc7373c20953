// Tests for the CLI commands and their exit codes

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { createProgram } from './program.js';

describe('retention CLI', () => {
  let testDir: string;
  let output: string[];

  const run = (...args: string[]) => {
    const program = createProgram().exitOverride();
    return program.parseAsync(
      [...args, '--data-dir', testDir, '--config', path.join(testDir, 'retention.yaml'), '--quiet'],
      { from: 'user' }
    );
  };

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'retention-cli-'));
    output = [];
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      output.push(String(line));
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('report-usage', () => {
    it('should print the report as JSON', async () => {
      await fs.writeFile(
        path.join(testDir, 'email_history_log.json'),
        JSON.stringify([{ id: 'hist-1', group_key: 'Acme', created_at: '2026-03-01T00:00:00.000Z', payload: {} }])
      );

      await run('report-usage', '--json');

      const report: unknown = JSON.parse(output.join('\n'));
      expect(report).toMatchObject({
        stores: [
          { name: 'history', exists: true, records: 1, byGroup: { Acme: 1 } },
          { name: 'plans', exists: false, records: 0 }
        ]
      });
      expect(process.exitCode).toBeUndefined();
    });

    it('should exit with 3 on a corrupt store', async () => {
      await fs.writeFile(path.join(testDir, 'email_history_log.json'), '{not json');

      await expect(run('report-usage')).rejects.toThrow('exit 3');
    });

    it('should exit with 2 on an invalid config file', async () => {
      await fs.writeFile(path.join(testDir, 'retention.yaml'), 'history:\n  maxTotal: 0\n');

      await expect(run('report-usage')).rejects.toThrow('exit 2');
    });
  });

  describe('sweep-artifacts', () => {
    it('should exit cleanly when every file was handled', async () => {
      const trace = path.join(testDir, 'traces', 'run.json');
      await fs.mkdir(path.dirname(trace), { recursive: true });
      await fs.writeFile(trace, '{}');
      const old = new Date(Date.now() - 30 * 24 * 60 * 60 * 1000);
      await fs.utimes(trace, old, old);

      await run('sweep-artifacts', '--json');

      expect(JSON.parse(output.join('\n'))).toMatchObject({ deletedCount: 1, errors: [] });
      expect(process.exitCode).toBeUndefined();
    });

    it('should finish the sweep and set exit code 1 when a file failed', async () => {
      await fs.writeFile(path.join(testDir, 'outputs'), 'not a directory');

      await run('sweep-artifacts', '--json');

      const report: unknown = JSON.parse(output.join('\n'));
      expect(report).toMatchObject({ archivedCount: 0, deletedCount: 0 });
      expect(report).toHaveProperty('errors.length', 1);
      expect(process.exitCode).toBe(1);
    });
  });
});
