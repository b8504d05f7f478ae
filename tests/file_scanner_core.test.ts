import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FileScannerCore } from '../core/file_scanner_core';
import { ALL_SYNTAXES } from '../language';

let root: string;

function touch(relPath: string, content = ''): void {
  const full = join(root, relPath);
  mkdirSync(join(full, '..'), { recursive: true });
  writeFileSync(full, content);
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'testsheet-scan-'));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe('FileScannerCore', () => {
  const scan = (extra?: string[]) =>
    new FileScannerCore({ rootDir: root, syntaxes: Object.values(ALL_SYNTAXES), extraIgnorePatterns: extra }).scan();

  it('returns only test scripts, in name-sorted walk order', async () => {
    touch('test_b.py');
    touch('test_a.py');
    touch('conftest.py');
    touch('helpers.py');
    touch('test_notes.txt');
    touch('api/test_users.py');
    touch('api/models.py');

    expect(await scan()).toEqual([
      join(root, 'api', 'test_users.py'),
      join(root, 'test_a.py'),
      join(root, 'test_b.py'),
    ]);
  });

  it('skips virtual environments and installed packages by default', async () => {
    touch('test_root.py');
    touch('.venv/lib/python3.12/site-packages/pkg/test_vendored.py');
    touch('lib/site-packages/test_other.py');
    touch('__pycache__/test_root.py');

    expect(await scan()).toEqual([join(root, 'test_root.py')]);
  });

  it('applies patterns from .gitignore', async () => {
    touch('.gitignore', '# generated\nbuild/\ntest_skip_*.py\n');
    touch('build/test_generated.py');
    touch('test_skip_me.py');
    touch('test_keep.py');

    expect(await scan()).toEqual([join(root, 'test_keep.py')]);
  });

  it('uses the given extra patterns instead of the defaults', async () => {
    touch('site-packages/test_pkg.py');
    touch('legacy/test_old.py');

    expect(await scan(['legacy/'])).toEqual([join(root, 'site-packages', 'test_pkg.py')]);
  });
});
