import * as fs from "fs";
import * as os from "os";
import * as path from "path";

/** Creates a temporary tree from a map of relative path → contents. */
export function makeTree(files: Record<string, string | Buffer>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "tdl-test-"));
  for (const [rel, contents] of Object.entries(files)) {
    const full = path.join(root, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, contents);
  }
  return root;
}

export function removeTree(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

/** Source text whose given 1-based lines hold the given contents; other lines are code. */
export function sourceWith(lines: Record<number, string>, total: number): string {
  const out: string[] = [];
  for (let i = 1; i <= total; i++) {
    out.push(lines[i] ?? `x := ${i}`);
  }
  return out.join("\n") + "\n";
}
