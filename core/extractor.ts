// core/extractor.ts

import * as fs from "fs";
import { delimiterForPath } from "../language";
import { BlameInfo, BlameProvider, TaggedComment } from "../types/tags";
import { FileOpenError, ReadError } from "./errors";
import { findTag, resolveTagFilter } from "./tag_matcher";

export interface ExtractOptions {
  /** When set, each match is enriched with blame metadata for its line. */
  blame?: BlameProvider;
}

/**
 * extractComments(filePath, tagFilter, opts):
 *   - Unsupported extension → [] (not an error).
 *   - Streams the file line by line; lines have no length limit. Only "\n" ends
 *     a line (one trailing "\r" is dropped), so line numbers agree with git.
 *   - On each line, takes the text from the first occurrence of the delimiter
 *     to end of line, trimmed, and keeps it when it carries a tag from the filter.
 *   - Rejects with FileOpenError / ReadError; no partial result is returned.
 *
 * The scan is lexical: a delimiter inside a string literal is treated as a comment.
 */
export async function extractComments(
  filePath: string,
  tagFilter: string,
  opts: ExtractOptions = {}
): Promise<TaggedComment[]> {
  const delimiter = delimiterForPath(filePath);
  if (delimiter === undefined) {
    return [];
  }

  let handle: fs.promises.FileHandle;
  try {
    handle = await fs.promises.open(filePath, "r");
  } catch (err) {
    throw new FileOpenError(filePath, err);
  }

  const tags = resolveTagFilter(tagFilter);
  const out: TaggedComment[] = [];

  try {
    const input = handle.createReadStream({ encoding: "utf8", autoClose: false });

    let lineNumber = 0;
    for await (const line of physicalLines(input)) {
      lineNumber++;
      const pos = line.indexOf(delimiter);
      if (pos === -1) continue;

      const content = line.slice(pos).trim();
      const tag = findTag(content, tags);
      if (tag === undefined) continue;

      out.push({ tag, content, filePath, lineNumber });
    }
  } catch (err) {
    throw new ReadError(filePath, err);
  } finally {
    await handle.close();
  }

  if (opts.blame) {
    await enrich(out, opts.blame);
  }
  return out;
}

/**
 * physicalLines(chunks):
 *   Yields the text between "\n" separators, without one trailing "\r".
 *   A lone "\r" stays inside its line. A final line without "\n" is yielded
 *   when non-empty.
 */
export async function* physicalLines(chunks: AsyncIterable<unknown>): AsyncGenerator<string> {
  let pending = "";
  for await (const chunk of chunks) {
    const text = typeof chunk === "string" ? chunk : String(chunk);
    let start = 0;
    let nl = text.indexOf("\n");
    while (nl !== -1) {
      yield dropCR(pending + text.slice(start, nl));
      pending = "";
      start = nl + 1;
      nl = text.indexOf("\n", start);
    }
    pending += text.slice(start);
  }
  if (pending !== "") {
    yield dropCR(pending);
  }
}

function dropCR(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/** Attaches blame metadata in place; a failed lookup leaves the comment as-is. */
async function enrich(comments: TaggedComment[], blame: BlameProvider): Promise<void> {
  for (const comment of comments) {
    let info: BlameInfo | undefined;
    try {
      info = await blame.lookup(comment.filePath, comment.lineNumber);
    } catch {
      continue;
    }
    if (!info) continue;
    comment.blameCommit = info.commit;
    comment.blameAuthor = info.author;
    comment.blameTimestamp = info.timestamp;
  }
}
