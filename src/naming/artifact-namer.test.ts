import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildTracePath, tagWithStatus } from './artifact-namer';

describe('buildTracePath', () => {
  it('joins the slug and timestamp under the output dir', () => {
    expect(buildTracePath('Login page: user', '/tmp/out', 1700000000000)).toBe(
      path.join('/tmp/out', 'Login_page_user-1700000000000.zip')
    );
  });

  it('produces a name the tagger understands', () => {
    const tracePath = buildTracePath('cart works', 'traces', 1700000000123);
    expect(path.basename(tracePath)).toBe('cart_works-1700000000123.zip');
  });
});

describe('tagWithStatus', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'namer-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function writeTrace(name: string, content = 'trace'): string {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  it('moves an untagged archive to its PASS name', () => {
    const original = writeTrace('demo_test-1700000000000.zip', 'payload');

    const tagged = tagWithStatus(original, 'pass');

    expect(tagged).toBe(path.join(dir, 'demo_test-PASS-1700000000000.zip'));
    expect(fs.existsSync(original)).toBe(false);
    expect(fs.readFileSync(tagged, 'utf-8')).toBe('payload');
  });

  it('tags failures with FAIL', () => {
    const original = writeTrace('checkout-flow-1700000000500.zip');

    expect(tagWithStatus(original, 'fail')).toBe(path.join(dir, 'checkout-flow-FAIL-1700000000500.zip'));
  });

  it('replaces an existing file at the destination', () => {
    writeTrace('demo-PASS-1700000000000.zip', 'stale');
    const original = writeTrace('demo-1700000000000.zip', 'fresh');

    const tagged = tagWithStatus(original, 'pass');

    expect(fs.readFileSync(tagged, 'utf-8')).toBe('fresh');
    expect(fs.readdirSync(dir)).toEqual(['demo-PASS-1700000000000.zip']);
  });

  it('returns names outside the grammar unchanged', () => {
    const notes = writeTrace('notes.txt');
    const noEpoch = writeTrace('archive.zip');

    expect(tagWithStatus(notes, 'pass')).toBe(notes);
    expect(tagWithStatus(noEpoch, 'fail')).toBe(noEpoch);
    expect(fs.existsSync(notes)).toBe(true);
    expect(fs.existsSync(noEpoch)).toBe(true);
  });

  it('replaces the status of an already tagged archive instead of adding a second tag', () => {
    const original = writeTrace('already-PASS-1234567890123.zip');

    const retagged = tagWithStatus(original, 'fail');

    expect(retagged).toBe(path.join(dir, 'already-FAIL-1234567890123.zip'));
    expect(fs.readdirSync(dir)).toEqual(['already-FAIL-1234567890123.zip']);
  });

  it('leaves an archive alone when it already carries the requested status', () => {
    const original = writeTrace('already-PASS-1234567890123.zip');

    expect(tagWithStatus(original, 'pass')).toBe(original);
    expect(fs.existsSync(original)).toBe(true);
  });

  it('logs and returns the original path when the rename fails', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const missing = path.join(dir, 'gone-1700000000000.zip');

    expect(tagWithStatus(missing, 'pass')).toBe(missing);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe(`⚠️  Could not rename trace file ${missing}:`);
  });

  it('treats a test name ending in a status word as already tagged', () => {
    const built = buildTracePath('login-PASS', dir, 1700000000000);
    fs.writeFileSync(built, 'trace');

    expect(path.basename(built)).toBe('login-PASS-1700000000000.zip');
    expect(tagWithStatus(built, 'fail')).toBe(path.join(dir, 'login-FAIL-1700000000000.zip'));
    expect(fs.readdirSync(dir)).toEqual(['login-FAIL-1700000000000.zip']);
  });
});
