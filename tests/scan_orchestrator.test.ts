import * as os from "os";
import * as path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { FileOpenError } from "../core/errors";
import { discover } from "../core/file_scanner_core";
import { toSnapshot } from "../core/result_sink";
import { scanAll, workerCount } from "../core/scan_orchestrator";
import { makeTree, removeTree } from "./helpers";

function fixtureTree(): string {
  const files: Record<string, string> = {};
  for (let i = 0; i < 12; i++) {
    files[`pkg${i % 3}/file${i}.go`] = `package p\n// TODO item ${i}\nx := ${i}\n// NOTE detail ${i}\n`;
  }
  files["empty.py"] = "print('nothing to see')\n";
  files["tags.sql"] = "-- BUG: wrong join\nSELECT 1;\n";
  return makeTree(files);
}

describe("workerCount", () => {
  it("uses the requested count when positive", () => {
    expect(workerCount(3, 10)).toBe(3);
  });

  it("never exceeds the number of files", () => {
    expect(workerCount(8, 2)).toBe(2);
  });

  it("falls back to the available parallelism", () => {
    expect(workerCount(0, 10_000)).toBe(Math.min(os.availableParallelism(), 10_000));
    expect(workerCount(-1, 1)).toBe(1);
  });
});

describe("scanAll", () => {
  let root = "";

  afterEach(() => {
    if (root) removeTree(root);
    root = "";
  });

  it("returns an empty map for no files", async () => {
    expect((await scanAll([], 4, "", false)).size).toBe(0);
  });

  it("collects every match and leaves files without matches out", async () => {
    root = fixtureTree();
    const files = await discover(root);

    const results = await scanAll(files, 4, "", true);

    expect(files).toHaveLength(14);
    expect(results.size).toBe(13);
    expect(results.has(path.join(root, "empty.py"))).toBe(false);
    expect(results.get(path.join(root, "pkg1", "file4.go"))).toEqual([
      { tag: "TODO", content: "// TODO item 4", filePath: path.join(root, "pkg1", "file4.go"), lineNumber: 2 },
      { tag: "NOTE", content: "// NOTE detail 4", filePath: path.join(root, "pkg1", "file4.go"), lineNumber: 4 },
    ]);
  });

  it("produces the same result for every worker count", async () => {
    root = fixtureTree();
    const files = await discover(root);

    const baseline = toSnapshot(await scanAll(files, 1, "", true));
    expect(baseline).toHaveLength(25);
    for (const workers of [2, 5, files.length]) {
      expect(toSnapshot(await scanAll(files, workers, "", true))).toEqual(baseline);
    }
  });

  it("is repeatable on an unchanged tree", async () => {
    root = fixtureTree();
    const files = await discover(root);

    const first = toSnapshot(await scanAll(files, 0, "todo", true));
    const second = toSnapshot(await scanAll(files, 0, "todo", true));
    expect(second).toEqual(first);
    expect(first.every((entry) => entry.tag === "TODO")).toBe(true);
  });

  it("reports a failing file and keeps scanning the others", async () => {
    root = makeTree({ "ok.go": "// FIXME fine\n" });
    const missing = path.join(root, "gone.go");
    const onError = vi.fn();

    const results = await scanAll([missing, path.join(root, "ok.go")], 2, "", false, { onError });

    expect(results.size).toBe(1);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toBe(missing);
    expect(onError.mock.calls[0][1]).toBeInstanceOf(FileOpenError);
  });

  it("stays silent about failures when errors are ignored", async () => {
    const onError = vi.fn();

    const results = await scanAll(["/does/not/exist/a.go"], 1, "", true, { onError });

    expect(results.size).toBe(0);
    expect(onError).not.toHaveBeenCalled();
  });

  it("passes the blame provider to every extraction", async () => {
    root = makeTree({ "a.go": "// TODO a\n", "b.go": "// TODO b\n" });
    const lookup = vi.fn(async () => ({ commit: "abc", author: "Sam", timestamp: "2024-05-06T07:08:09Z" }));

    const results = await scanAll(await discover(root), 2, "", false, { blame: { lookup } });

    expect(lookup).toHaveBeenCalledTimes(2);
    expect(results.get(path.join(root, "b.go"))?.[0].blameAuthor).toBe("Sam");
  });
});
