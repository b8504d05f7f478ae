// core/file_scanner_core.ts

import * as fs from "fs";
import * as path from "path";
import ignore from "ignore";
import { collectExtensions } from "../language";
import { ScriptSyntax } from "../types/tags";

///
// ScannerOptions: configuration for the core file scanner.
//
// - rootDir: absolute directory to scan.
// - syntaxes: adapters whose test-script naming convention selects the files to return.
// - ignoreFiles: optional array of filenames (like ".gitignore", ".ignore") to read patterns from.
// - extraIgnorePatterns: additional gitignore-style patterns; defaults to DEFAULT_IGNORE_PATTERNS.
///
export interface ScannerOptions {
  rootDir: string;
  syntaxes: ScriptSyntax[];
  ignoreFiles?: string[];
  extraIgnorePatterns?: string[];
}

/** Virtual environments, installed packages and caches never hold the project's own tests. */
export const DEFAULT_IGNORE_PATTERNS = [
  "site-packages/",
  "node_modules/",
  ".git/",
  ".venv/",
  "venv/",
  "__pycache__/",
  ".tox/",
];

/**
 * FileScannerCore: recursively walks rootDir, applies ignore rules,
 * and returns the absolute paths of test scripts in name-sorted walk order.
 *
 * - Uses the “ignore” library to parse .gitignore/.ignore exactly like Git does.
 * - Prunes ignored subdirectories without descending into them.
 */
export class FileScannerCore {
  private ig = ignore();
  private extensions: string[];

  constructor(private opts: ScannerOptions) {
    this.extensions = collectExtensions(opts.syntaxes);

    const ignoreFiles = opts.ignoreFiles ?? [".gitignore", ".ignore"];
    for (const igFileName of ignoreFiles) {
      const fullPath = path.join(opts.rootDir, igFileName);
      if (fs.existsSync(fullPath) && fs.statSync(fullPath).isFile()) {
        const content = fs.readFileSync(fullPath, "utf8");
        const lines = content
          .split(/\r?\n/)
          .map((l) => l.trim())
          .filter((l) => l && !l.startsWith("#"));
        this.ig.add(lines);
      }
    }

    this.ig.add(opts.extraIgnorePatterns ?? DEFAULT_IGNORE_PATTERNS);
  }

  /**
   * scan():
   *   Resolves to every file under rootDir that is not ignored and that one of
   *   the configured adapters recognises as a test script.
   */
  public async scan(): Promise<string[]> {
    const result: string[] = [];
    await this.walk(this.opts.rootDir, result);
    return result;
  }

  private isTestScript(fileName: string): boolean {
    const ext = path.extname(fileName).toLowerCase();
    if (!this.extensions.includes(ext)) return false;
    return this.opts.syntaxes.some((syntax) => syntax.isTestScript(fileName));
  }

  private async walk(dir: string, out: string[]): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (e) {
      // Permissions or a broken symlink: warn and keep going.
      console.warn(`⚠️  Cannot read directory ${dir}: ${(e as Error).message}`);
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      // ignore wants posix-style paths relative to rootDir, with a trailing slash for directories
      const relPath = path.relative(this.opts.rootDir, fullPath).split(path.sep).join("/");

      if (entry.isDirectory()) {
        if (this.ig.ignores(`${relPath}/`)) continue;
        await this.walk(fullPath, out);
      } else if (entry.isFile()) {
        if (this.ig.ignores(relPath) || !this.isTestScript(entry.name)) continue;
        out.push(fullPath);
      }
    }
  }
}
