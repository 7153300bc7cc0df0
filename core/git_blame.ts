// core/git_blame.ts

import { execFile } from "child_process";
import * as path from "path";
import { promisify } from "util";
import { BlameInfo, BlameProvider } from "../types/tags";

const execFileAsync = promisify(execFile);

/**
 * parsePorcelainBlame(output):
 *   Reads `git blame --porcelain` output for a single line.
 *   - commit: first token of the header line
 *   - author: value of the "author " line
 *   - timestamp: "author-time " (unix seconds) as RFC 3339 UTC
 *   Returns undefined when there is no header line.
 */
export function parsePorcelainBlame(output: string): BlameInfo | undefined {
  const lines = output.split("\n");
  const commit = lines[0]?.trim().split(/\s+/)[0] ?? "";
  if (commit === "") return undefined;

  let author = "";
  let timestamp = "";
  for (const line of lines) {
    if (line.startsWith("author ")) {
      author = line.slice("author ".length);
    } else if (line.startsWith("author-time ")) {
      const seconds = Number.parseInt(line.slice("author-time ".length), 10);
      if (Number.isFinite(seconds)) {
        timestamp = new Date(seconds * 1000).toISOString().replace(/\.\d{3}Z$/, "Z");
      }
    }
  }
  return { commit, author, timestamp };
}

/**
 * GitBlameProvider: one `git blame -L n,n --porcelain` process per lookup,
 * run from the file's own directory so files of any repository resolve.
 */
export class GitBlameProvider implements BlameProvider {
  constructor(private gitBinary = "git") {}

  async lookup(filePath: string, lineNumber: number): Promise<BlameInfo | undefined> {
    const { stdout } = await execFileAsync(
      this.gitBinary,
      ["blame", "-L", `${lineNumber},${lineNumber}`, "--porcelain", "--", path.basename(filePath)],
      { cwd: path.dirname(path.resolve(filePath)), maxBuffer: 4 * 1024 * 1024 }
    );
    return parsePorcelainBlame(stdout);
  }
}
