// core/scan_orchestrator.ts

import * as os from "os";
import pMap from "p-map";
import { BlameProvider, ScanResult } from "../types/tags";
import { describe } from "./errors";
import { extractComments } from "./extractor";

export interface ScanOptions {
  blame?: BlameProvider;
  /** Receives per-file failures when errors are not ignored. Defaults to a console warning. */
  onError?: (filePath: string, err: unknown) => void;
}

/**
 * workerCount(requested, fileCount):
 *   `requested` when positive, else the available parallelism; never more
 *   than the number of files.
 */
export function workerCount(requested: number, fileCount: number): number {
  const wanted = requested > 0 ? Math.floor(requested) : os.availableParallelism();
  return Math.max(1, Math.min(wanted, fileCount));
}

/**
 * scanAll(files, maxWorkers, tagFilter, ignoreErrors, opts):
 *   Runs the extractor over `files` with a bounded pool fed from one queue and
 *   collects every non-empty result into a single map keyed by file path.
 *
 *   - A failing file never stops the scan; unless `ignoreErrors` is set the
 *     failure goes to `opts.onError`.
 *   - Files without matches are left out of the map.
 *   - Resolves once every file has been processed.
 */
export async function scanAll(
  files: readonly string[],
  maxWorkers: number,
  tagFilter: string,
  ignoreErrors: boolean,
  opts: ScanOptions = {}
): Promise<ScanResult> {
  const results: ScanResult = new Map();
  if (files.length === 0) {
    return results;
  }

  const report =
    opts.onError ??
    ((filePath: string, err: unknown) => {
      console.warn(`⚠️  Error processing ${filePath}: ${describe(err)}`);
    });

  await pMap(
    files,
    async (filePath) => {
      try {
        const comments = await extractComments(filePath, tagFilter, { blame: opts.blame });
        // each insert completes within one turn of the event loop
        if (comments.length > 0) {
          results.set(filePath, comments);
        }
      } catch (err) {
        if (!ignoreErrors) {
          report(filePath, err);
        }
      }
    },
    { concurrency: workerCount(maxWorkers, files.length) }
  );

  return results;
}
