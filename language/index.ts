// language/index.ts

import * as path from "path";

/**
 * COMMENT_DELIMITERS: single-line comment marker → extensions (with leading dot)
 * or base names of extensionless files that use it. Keys are matched lowercased.
 *
 * reStructuredText comments are ".. " with the trailing space: a bare ".." would
 * also match ellipses in prose, at the cost of missing "..TODO" written without
 * the space.
 */
const COMMENT_DELIMITERS: Readonly<Record<string, readonly string[]>> = {
  "//": [
    ".go", ".java", ".c", ".cpp", ".h", ".hpp", ".cs", ".swift", ".kt", ".rs", ".scala",
    ".ts", ".js", ".jsx", ".tsx",
  ],
  "#": [
    ".py", ".rb", ".sh", ".bash", ".zsh", ".yml", ".yaml", ".toml", ".pl", ".pm", ".mk",
    "makefile", "dockerfile", ".ini",
  ],
  ";": [".lisp", ".clj", ".scm", ".s", ".asm"],
  "--": [".lua", ".hs", ".sql", ".adb"],
  "'": [".vb", ".vbs"],
  ".. ": [".rst"],
};

// Reverse lookup, built once at load and never mutated.
const DELIMITER_BY_KEY: ReadonlyMap<string, string> = new Map(
  Object.entries(COMMENT_DELIMITERS).flatMap(([delimiter, keys]) =>
    keys.map((key): [string, string] => [key.toLowerCase(), delimiter])
  )
);

/**
 * lookupKey(filePath):
 *   Lowercased extension, or the lowercased base name for files such as
 *   "Makefile" and "Dockerfile" that have none.
 */
export function lookupKey(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  return ext !== "" ? ext : path.basename(filePath).toLowerCase();
}

/** Delimiter for an extension (".go") or extensionless base name ("makefile"). */
export function delimiterFor(extensionOrBasename: string): string | undefined {
  return DELIMITER_BY_KEY.get(extensionOrBasename.toLowerCase());
}

export function delimiterForPath(filePath: string): string | undefined {
  return delimiterFor(lookupKey(filePath));
}

export function isSupportedPath(filePath: string): boolean {
  return delimiterForPath(filePath) !== undefined;
}

/** All registered keys, sorted. */
export function supportedKeys(): string[] {
  return Array.from(DELIMITER_BY_KEY.keys()).sort();
}
