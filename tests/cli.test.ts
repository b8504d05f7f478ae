import { existsSync, mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { runCli } from '../cli';

let workDir: string;

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), 'testsheet-cli-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(workDir, { recursive: true, force: true });
});

describe('runCli', () => {
  it('exits 1 with a message for a path that does not exist, writing nothing', async () => {
    const missing = join(workDir, 'nope');

    const code = await runCli([missing], { outputDir: workDir });

    expect(code).toBe(1);
    expect(vi.mocked(console.error)).toHaveBeenCalledWith(`❌ Invalid path: ${missing}`);
    expect(readdirSync(workDir)).toEqual([]);
  });

  it('exits 1 with a usage message when no path is given', async () => {
    const code = await runCli([], { outputDir: workDir });

    expect(code).toBe(1);
    expect(vi.mocked(console.error)).toHaveBeenCalledWith('❌ Missing <path>: a test script file or a directory.');
  });

  it('exits 1 for more than one path', async () => {
    const code = await runCli(['a', 'b'], { outputDir: workDir });

    expect(code).toBe(1);
    expect(vi.mocked(console.error)).toHaveBeenCalledWith('❌ Expected exactly one <path>.');
  });

  it('exits 0 with a warning when a file in the directory cannot be read', async () => {
    const suite = join(workDir, 'suite');
    mkdirSync(suite);
    writeFileSync(join(suite, 'test_bad.py'), Buffer.from([0x23, 0x20, 0xff, 0xfe, 0x0a]));
    writeFileSync(join(suite, 'test_good.py'), 'def test_ok():\n    # Step: S1\n    # Expected Output: E1\n');

    const code = await runCli([suite], { outputDir: workDir });

    expect(code).toBe(0);
    expect(vi.mocked(console.warn)).toHaveBeenCalledWith('⚠️  1 file(s) could not be read and were skipped.');
    expect(vi.mocked(console.error)).not.toHaveBeenCalled();
    expect(existsSync(join(workDir, 'suite_test_documentation.xlsx'))).toBe(true);
  });
});
