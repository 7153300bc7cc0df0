import * as fs from "fs";
import * as path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { DiscoveryError } from "../core/errors";
import { BINARY_SAMPLE_BYTES, discover, isBinaryFile } from "../core/file_scanner_core";
import { makeTree, removeTree } from "./helpers";

describe("discover", () => {
  let root = "";

  afterEach(() => {
    vi.restoreAllMocks();
    if (root) removeTree(root);
    root = "";
  });

  it("returns supported files recursively, skipping the rest", async () => {
    root = makeTree({
      "main.go": "package main\n",
      "README.md": "# readme\n",
      "scripts/deploy.sh": "echo hi\n",
      "scripts/Makefile": "all:\n",
      "src/deep/util.TS": "export {};\n",
      "LICENSE": "MIT\n",
    });

    const files = await discover(root);

    expect(files).toEqual([
      path.join(root, "main.go"),
      path.join(root, "scripts", "Makefile"),
      path.join(root, "scripts", "deploy.sh"),
      path.join(root, "src", "deep", "util.TS"),
    ]);
  });

  it("never returns directories, even with a supported-looking name", async () => {
    root = makeTree({ "pkg.go/inner.py": "# x\n" });

    expect(await discover(root)).toEqual([path.join(root, "pkg.go", "inner.py")]);
  });

  it("excludes files with a NUL byte in the leading sample", async () => {
    root = makeTree({
      "text.c": "int main(void) { return 0; }\n",
      "blob.c": Buffer.from([0x2f, 0x2f, 0x00, 0x41]),
    });

    expect(await discover(root)).toEqual([path.join(root, "text.c")]);
  });

  it("returns an empty list when nothing is supported", async () => {
    root = makeTree({ "a.md": "x\n", "b.txt": "y\n" });

    expect(await discover(root)).toEqual([]);
  });

  it("honours ignore files and extra patterns", async () => {
    root = makeTree({
      ".gitignore": "# build output\nbuild/\n",
      "build/gen.go": "// TODO generated\n",
      "vendor/lib.go": "// TODO vendored\n",
      "app.go": "// TODO mine\n",
    });

    const files = await discover(root, {
      ignoreFiles: [".gitignore"],
      extraIgnorePatterns: ["vendor/"],
    });

    expect(files).toEqual([path.join(root, "app.go")]);
  });

  it("warns about an unreadable subdirectory and keeps walking", async () => {
    root = makeTree({ "locked/hidden.go": "// TODO x\n", "z.go": "// TODO y\n" });
    const locked = path.join(root, "locked");
    const denied = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
    const readdir = fs.promises.readdir;
    // first call lists the root, second the locked directory
    vi.spyOn(fs.promises, "readdir")
      .mockImplementationOnce(readdir)
      .mockImplementationOnce(async () => {
        throw denied;
      });
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const files = await discover(root);

    expect(files).toEqual([path.join(root, "z.go")]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(`⚠️ Cannot read directory ${locked}: EACCES: permission denied`);
  });

  it("fails with DiscoveryError when the root cannot be read", async () => {
    root = makeTree({});

    await expect(discover(path.join(root, "missing"))).rejects.toBeInstanceOf(DiscoveryError);
  });
});

describe("isBinaryFile", () => {
  let root = "";

  afterEach(() => {
    if (root) removeTree(root);
    root = "";
  });

  it("only inspects the leading sample", async () => {
    const late = Buffer.concat([Buffer.alloc(BINARY_SAMPLE_BYTES, 0x61), Buffer.from([0x00])]);
    root = makeTree({ "late.go": late, "early.go": Buffer.from([0x61, 0x00]) });

    expect(await isBinaryFile(path.join(root, "late.go"))).toBe(false);
    expect(await isBinaryFile(path.join(root, "early.go"))).toBe(true);
  });

  it("treats a missing file as text", async () => {
    root = makeTree({});

    expect(await isBinaryFile(path.join(root, "nope.go"))).toBe(false);
  });
});
