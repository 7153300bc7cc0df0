// core/tag_matcher.ts

import { SUPPORTED_TAGS, Tag } from "../types/tags";

const SUPPORTED = new Set<string>(SUPPORTED_TAGS);

// One word-boundary pattern per tag, compiled once.
const TAG_PATTERNS: ReadonlyMap<Tag, RegExp> = new Map(
  SUPPORTED_TAGS.map((tag): [Tag, RegExp] => [tag, new RegExp(`\\b${tag}\\b`)])
);

export function isTag(value: string): value is Tag {
  return SUPPORTED.has(value);
}

/**
 * resolveTagFilter(filter):
 *   "" or whitespace → every supported tag, in canonical order.
 *   Otherwise the comma-separated tokens, trimmed and uppercased, empty ones dropped.
 *   Unknown tokens are kept as-is; findTag never matches them.
 */
export function resolveTagFilter(filter: string): Set<string> {
  if (filter.trim() === "") {
    return new Set<string>(SUPPORTED_TAGS);
  }
  const tags = new Set<string>();
  for (const token of filter.split(",")) {
    const tag = token.trim().toUpperCase();
    if (tag !== "") tags.add(tag);
  }
  return tags;
}

/**
 * findTag(commentText, tags):
 *   First tag of `tags` (in set order) that appears in the uppercased text as a
 *   whole word, so "TODOLIST" does not match TODO. When a comment carries several
 *   tags only one is reported, and which one follows the filter order.
 */
export function findTag(commentText: string, tags: ReadonlySet<string>): Tag | undefined {
  const upper = commentText.toUpperCase();
  for (const candidate of tags) {
    if (!isTag(candidate)) continue;
    const pattern = TAG_PATTERNS.get(candidate);
    if (pattern && pattern.test(upper)) {
      return candidate;
    }
  }
  return undefined;
}
