import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { main, run } from './cli';

describe('trace-report CLI', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-test-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe('generate', () => {
    it('writes a report for an empty directory and exits cleanly', async () => {
      await run(['generate', '--traces-dir', dir, '--project', 'Nightly', '--no-assets']);

      const reportPath = path.resolve(dir, 'index.html');
      expect(process.exitCode).toBeUndefined();
      expect(console.log).toHaveBeenCalledWith(`\n📊 Trace report: ${reportPath}`);
      expect(fs.readFileSync(reportPath, 'utf-8')).toContain('<h1>Nightly</h1>');
    });

    it('reports a fatal error through main and sets exit code 1', async () => {
      const blocker = path.join(dir, 'blocker');
      fs.writeFileSync(blocker, 'not a directory');

      await main(['generate', '--traces-dir', dir, '--output-dir', path.join(blocker, 'out'), '--no-assets']);

      expect(process.exitCode).toBe(1);
      expect(vi.mocked(console.error).mock.calls[0]?.[0]).toBe('Error:');
    });
  });

  describe('tag', () => {
    it('renames the archive and prints the new path', async () => {
      const tracePath = path.join(dir, 'login-1700000000000.zip');
      fs.writeFileSync(tracePath, 'trace');

      await run(['tag', tracePath, '--status', 'FAIL']);

      const tagged = path.join(dir, 'login-FAIL-1700000000000.zip');
      expect(process.exitCode).toBeUndefined();
      expect(console.log).toHaveBeenCalledWith(tagged);
      expect(fs.existsSync(tagged)).toBe(true);
    });

    it('rejects an unknown status', async () => {
      const tracePath = path.join(dir, 'login-1700000000000.zip');
      fs.writeFileSync(tracePath, 'trace');

      await run(['tag', tracePath, '--status', 'maybe']);

      expect(process.exitCode).toBe(1);
      expect(console.error).toHaveBeenCalledWith('Error: Invalid status "maybe". Use pass or fail.');
      expect(fs.existsSync(tracePath)).toBe(true);
    });

    it('requires a path', async () => {
      await run(['tag', '--status', 'pass']);

      expect(process.exitCode).toBe(1);
      expect(console.error).toHaveBeenCalledWith('Error: a trace archive path is required.');
    });

    it('fails for a missing archive', async () => {
      const missing = path.join(dir, 'gone-1700000000000.zip');

      await run(['tag', missing, '--status', 'pass']);

      expect(process.exitCode).toBe(1);
      expect(console.error).toHaveBeenCalledWith(`Error: Trace archive not found: ${missing}`);
    });
  });

  it('prints usage without a command', async () => {
    await run([]);

    expect(process.exitCode).toBeUndefined();
    expect(vi.mocked(console.log).mock.calls[0]?.[0]).toContain('Usage: trace-report <command> [options]');
  });

  it('sets exit code 1 for an unknown command', async () => {
    await run(['publish']);

    expect(process.exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Unknown command: publish');
  });
});
