// types/tags.ts

/**
 * SUPPORTED_TAGS: the fixed set of comment markers, in canonical order.
 * Summaries and the default filter iterate in this order.
 */
export const SUPPORTED_TAGS = [
  "TODO",
  "FIXME",
  "NOTE",
  "HACK",
  "BUG",
  "OPTIMIZE",
  "DEPRECATE",
] as const;

export type Tag = (typeof SUPPORTED_TAGS)[number];

/**
 * TaggedComment: one single-line comment that carries a recognized tag.
 *
 * The blame fields are only set when the scan was run with a BlameProvider
 * and the lookup for that line succeeded.
 */
export interface TaggedComment {
  tag: Tag;
  content: string;     // trimmed text from the delimiter to end of line
  filePath: string;    // as supplied by the caller
  lineNumber: number;  // 1-based
  blameCommit?: string;
  blameAuthor?: string;
  blameTimestamp?: string; // RFC 3339
}

/**
 * ScanResult: file path → comments found in that file, in line order.
 * Files without any match are not present.
 */
export type ScanResult = Map<string, TaggedComment[]>;

/**
 * SnapshotEntry: the persisted shape of a TaggedComment (comments.json / .yaml).
 */
export interface SnapshotEntry {
  tag: Tag;
  content: string;
  file: string;
  line: number;
  stamp?: string;
  author?: string;
  commit?: string;
}

export interface BlameInfo {
  commit: string;
  author: string;
  timestamp: string;
}

/**
 * BlameProvider: version-control attribution for a single line.
 * Implementations may be slow and may fail; callers must tolerate both.
 */
export interface BlameProvider {
  lookup(filePath: string, lineNumber: number): Promise<BlameInfo | undefined>;
}
