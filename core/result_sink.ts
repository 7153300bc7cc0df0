// core/result_sink.ts

import * as fs from "fs";
import * as path from "path";
import chalk from "chalk";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { ScanResult, SnapshotEntry, SUPPORTED_TAGS, Tag, TaggedComment } from "../types/tags";
import { EmptyResultError, SnapshotError, UnsupportedFormatError, describe } from "./errors";
import { isTag } from "./tag_matcher";

export type OutputFormat = "json" | "yaml" | "yml" | "text" | "txt";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "yaml", "yml", "text", "txt"];

const TAG_COLORS: Record<Tag, (text: string) => string> = {
  TODO: chalk.yellow,
  FIXME: chalk.red,
  NOTE: chalk.cyan,
  HACK: chalk.magenta,
  BUG: chalk.redBright,
  OPTIMIZE: chalk.green,
  DEPRECATE: chalk.gray,
};

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function byLine(a: TaggedComment, b: TaggedComment): number {
  return a.lineNumber - b.lineNumber;
}

function sortedFiles(results: ScanResult): string[] {
  return Array.from(results.keys()).sort();
}

/**
 * formatPretty(results, useColor):
 *   One block per file, files in lexicographic order, comments by line:
 *
 *     File: src/a.go
 *         5     // TODO fix this
 *
 */
export function formatPretty(results: ScanResult, useColor: boolean): string {
  const out: string[] = [];
  for (const file of sortedFiles(results)) {
    const list = [...(results.get(file) ?? [])].sort(byLine);
    out.push(useColor ? chalk.cyan(`File: ${file}`) : `File: ${file}`);
    if (list.length === 0) {
      out.push("    No tagged comments found");
      continue;
    }
    for (const c of list) {
      const content = useColor ? TAG_COLORS[c.tag](c.content) : c.content;
      out.push(`    ${String(c.lineNumber).padEnd(5)} ${content}`);
    }
    out.push("");
  }
  return out.join("\n");
}

export function prettyPrint(results: ScanResult, useColor: boolean): void {
  const text = formatPretty(results, useColor);
  if (text !== "") {
    console.log(text);
  }
}

export function countComments(results: ScanResult): number {
  let total = 0;
  for (const list of results.values()) total += list.length;
  return total;
}

/** Flattens a scan into its persisted form, files sorted, then lines. */
export function toSnapshot(results: ScanResult): SnapshotEntry[] {
  const entries: SnapshotEntry[] = [];
  for (const file of sortedFiles(results)) {
    for (const c of [...(results.get(file) ?? [])].sort(byLine)) {
      const entry: SnapshotEntry = { tag: c.tag, content: c.content, file: c.filePath, line: c.lineNumber };
      if (c.blameCommit !== undefined || c.blameAuthor !== undefined || c.blameTimestamp !== undefined) {
        entry.stamp = c.blameTimestamp ?? "";
        entry.author = c.blameAuthor ?? "";
        entry.commit = c.blameCommit ?? "";
      }
      entries.push(entry);
    }
  }
  return entries;
}

function encode(entries: SnapshotEntry[], format: OutputFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(entries, null, 2) + "\n";
    case "yaml":
    case "yml":
      return stringifyYaml(entries);
    case "text":
    case "txt":
      return entries.map((e) => `${e.file}:${e.line} [${e.tag}] ${e.content}\n`).join("");
  }
}

/**
 * serialize(results, format, outputDir):
 *   Writes every comment to `<outputDir>/comments.<format>` and returns that path.
 *   The directory is created if needed. Nothing is written when the result is
 *   empty (EmptyResultError) or the format is unknown (UnsupportedFormatError).
 */
export async function serialize(results: ScanResult, format: string, outputDir: string): Promise<string> {
  const entries = toSnapshot(results);
  if (entries.length === 0) {
    throw new EmptyResultError();
  }
  const ext = format.toLowerCase();
  if (!isOutputFormat(ext)) {
    throw new UnsupportedFormatError(format);
  }

  const outPath = path.join(outputDir, `comments.${ext}`);
  await fs.promises.mkdir(outputDir, { recursive: true });
  await fs.promises.writeFile(outPath, encode(entries, ext), "utf8");
  return outPath;
}

/**
 * summarize(source, tagFilter):
 *   Count per tag over a scan or a loaded snapshot. "" or "all" reports every
 *   supported tag; otherwise the listed ones that are supported. Tags without
 *   matches are reported as 0.
 */
export function summarize(source: ScanResult | SnapshotEntry[], tagFilter: string): Map<Tag, number> {
  const counts = new Map<Tag, number>(SUPPORTED_TAGS.map((t): [Tag, number] => [t, 0]));
  const tags: string[] = Array.isArray(source)
    ? source.map((e) => e.tag.toUpperCase())
    : Array.from(source.values()).flatMap((list) => list.map((c) => c.tag));
  for (const tag of tags) {
    if (isTag(tag)) counts.set(tag, (counts.get(tag) ?? 0) + 1);
  }

  const filter = tagFilter.trim();
  if (filter === "" || filter.toLowerCase() === "all") {
    return counts;
  }
  const selected = new Map<Tag, number>();
  for (const token of filter.split(",")) {
    const tag = token.trim().toUpperCase();
    if (isTag(tag)) selected.set(tag, counts.get(tag) ?? 0);
  }
  return selected;
}

export function formatSummary(counts: Map<Tag, number>): string {
  return Array.from(counts, ([tag, count]) => `${tag} => ${count}`).join("\n");
}

/**
 * loadSnapshot(filePath):
 *   Reads a comments.json / comments.yaml written by serialize().
 *   The text format is not loadable.
 */
export async function loadSnapshot(filePath: string): Promise<SnapshotEntry[]> {
  const raw = await fs.promises.readFile(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let parsed: unknown;
  try {
    parsed = ext === ".yaml" || ext === ".yml" ? parseYaml(raw) : JSON.parse(raw);
  } catch (err) {
    throw new SnapshotError(filePath, describe(err), err);
  }
  if (!Array.isArray(parsed)) {
    throw new SnapshotError(filePath, "expected a list of comments");
  }

  return parsed.map((item: unknown, index) => {
    const entry = toSnapshotEntry(item);
    if (!entry) {
      throw new SnapshotError(filePath, `entry ${index} is malformed`);
    }
    return entry;
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toSnapshotEntry(item: unknown): SnapshotEntry | undefined {
  if (!isRecord(item)) return undefined;
  const { tag, content, file, line, stamp, author, commit } = item;
  if (typeof tag !== "string" || typeof content !== "string" || typeof file !== "string") return undefined;
  if (typeof line !== "number" || !Number.isInteger(line) || line < 1) return undefined;
  const upper = tag.toUpperCase();
  if (!isTag(upper)) return undefined;

  const entry: SnapshotEntry = { tag: upper, content, file, line };
  if (typeof stamp === "string") entry.stamp = stamp;
  if (typeof author === "string") entry.author = author;
  if (typeof commit === "string") entry.commit = commit;
  return entry;
}
