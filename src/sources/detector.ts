import type { DuplicateGroup, Occurrence, SourceEntry } from "../types/sources.js";

/**
 * Group entries by canonical form. The first occurrence in traversal order is kept;
 * every later one is to be commented. Groups come back in order of first occurrence.
 */
export function detect(entries: readonly SourceEntry[]): DuplicateGroup[] {
  const ordered = [...entries].sort((a, b) => a.ordinal - b.ordinal);
  const groups = new Map<string, Occurrence[]>();
  for (const entry of ordered) {
    let occurrences = groups.get(entry.canonical);
    if (!occurrences) {
      occurrences = [];
      groups.set(entry.canonical, occurrences);
    }
    const index = occurrences.length + 1;
    occurrences.push({ entry, index, role: index === 1 ? "keep" : "comment" });
  }
  return [...groups].map(([key, occurrences]) => ({ key, occurrences }));
}

export function isActionable(group: DuplicateGroup): boolean {
  return group.occurrences.length > 1;
}

