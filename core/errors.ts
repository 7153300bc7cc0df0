// core/errors.ts

/**
 * Error taxonomy for the scanner. File-level errors (FileOpenError, ReadError)
 * are isolated per file by the orchestrator; the rest surface to the caller.
 */

export class DiscoveryError extends Error {
  constructor(public readonly root: string, cause: unknown) {
    super(`Cannot traverse ${root}: ${describe(cause)}`, { cause });
    this.name = "DiscoveryError";
  }
}

export class FileOpenError extends Error {
  constructor(public readonly filePath: string, cause: unknown) {
    super(`Failed to open ${filePath}: ${describe(cause)}`, { cause });
    this.name = "FileOpenError";
  }
}

export class ReadError extends Error {
  constructor(public readonly filePath: string, cause: unknown) {
    super(`Error reading ${filePath}: ${describe(cause)}`, { cause });
    this.name = "ReadError";
  }
}

export class UnsupportedFormatError extends Error {
  constructor(public readonly format: string) {
    super(`Unsupported output format: ${format}`);
    this.name = "UnsupportedFormatError";
  }
}

export class EmptyResultError extends Error {
  constructor() {
    super("No tagged comments found");
    this.name = "EmptyResultError";
  }
}

export class SnapshotError extends Error {
  constructor(public readonly filePath: string, reason: string, cause?: unknown) {
    super(`Invalid snapshot ${filePath}: ${reason}`, { cause });
    this.name = "SnapshotError";
  }
}

export function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
