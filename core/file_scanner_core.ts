// core/file_scanner_core.ts

import * as fs from "fs";
import * as path from "path";
import ignore from "ignore";
import { isSupportedPath } from "../language";
import { DiscoveryError, describe } from "./errors";

/** Leading sample inspected by the binary heuristic. */
export const BINARY_SAMPLE_BYTES = 8192;

///
// DiscoverOptions: configuration for the file discoverer.
//
// - ignoreFiles: gitignore-style files under the root to read patterns from (e.g. ".gitignore").
// - extraIgnorePatterns: additional gitignore-style patterns (e.g. "dist/", "**/*.min.js").
///
export interface DiscoverOptions {
  ignoreFiles?: string[];
  extraIgnorePatterns?: string[];
}

/**
 * FileScannerCore: recursively walks a root directory and returns every file
 * whose extension (or extensionless base name) has a registered comment
 * delimiter and which does not look binary.
 *
 * - The root itself must be readable; otherwise scan() rejects with DiscoveryError.
 * - Unreadable subdirectories are reported and skipped.
 * - Ignored directories are pruned before descending into them.
 */
export class FileScannerCore {
  private ig = ignore();

  constructor(private rootDir: string, opts: DiscoverOptions = {}) {
    for (const igFileName of opts.ignoreFiles ?? []) {
      const fullPath = path.join(rootDir, igFileName);
      if (fs.existsSync(fullPath) && fs.statSync(fullPath).isFile()) {
        const lines = fs
          .readFileSync(fullPath, "utf8")
          .split(/\r?\n/)
          .map((l) => l.trim())
          .filter((l) => l && !l.startsWith("#"));
        this.ig.add(lines);
      }
    }

    if (opts.extraIgnorePatterns && opts.extraIgnorePatterns.length > 0) {
      this.ig.add(opts.extraIgnorePatterns);
    }
  }

  public async scan(): Promise<string[]> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(this.rootDir, { withFileTypes: true });
    } catch (e) {
      throw new DiscoveryError(this.rootDir, e);
    }
    const result: string[] = [];
    await this.visit(this.rootDir, entries, result);
    return result;
  }

  private async walk(dir: string, out: string[]): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (e) {
      console.warn(`⚠️ Cannot read directory ${dir}: ${describe(e)}`);
      return;
    }
    await this.visit(dir, entries, out);
  }

  private async visit(dir: string, entries: fs.Dirent[], out: string[]): Promise<void> {
    // readdir order is filesystem dependent
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      // ignore patterns are relative to the root and use forward slashes
      const relPath = path.relative(this.rootDir, fullPath).split(path.sep).join("/");

      if (entry.isDirectory()) {
        if (this.ig.ignores(`${relPath}/`)) continue;
        await this.walk(fullPath, out);
      } else if (entry.isFile()) {
        if (this.ig.ignores(relPath)) continue;
        if (!isSupportedPath(entry.name)) continue;
        if (await isBinaryFile(fullPath)) continue;
        out.push(fullPath);
      }
      // Symbolic links, sockets, etc. are not followed
    }
  }
}

/**
 * isBinaryFile(filePath):
 *   True when the first BINARY_SAMPLE_BYTES bytes contain a NUL byte.
 *   A file that cannot be opened is treated as text so the extractor can
 *   report the failure.
 */
export async function isBinaryFile(filePath: string): Promise<boolean> {
  let handle: fs.promises.FileHandle;
  try {
    handle = await fs.promises.open(filePath, "r");
  } catch {
    return false;
  }
  try {
    const buf = Buffer.alloc(BINARY_SAMPLE_BYTES);
    const { bytesRead } = await handle.read(buf, 0, BINARY_SAMPLE_BYTES, 0);
    return buf.subarray(0, bytesRead).includes(0);
  } catch {
    return false;
  } finally {
    await handle.close();
  }
}

/** discover(root): candidate source files under root; see FileScannerCore. */
export function discover(root: string, opts: DiscoverOptions = {}): Promise<string[]> {
  return new FileScannerCore(root, opts).scan();
}
