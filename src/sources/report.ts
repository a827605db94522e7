import type { DuplicateGroup } from "../types/sources.js";
import { isActionable } from "./detector.js";

/**
 * Plain-text duplicate report, one actionable group per line:
 *   <count>x: <canonical-line> -> <file:line> <file:line> ...
 * Sorted by count descending; ties keep first-occurrence order.
 */
export function formatReport(groups: readonly DuplicateGroup[]): string {
  return groups
    .filter(isActionable)
    .map((group, position) => ({ group, position }))
    .sort((a, b) => b.group.occurrences.length - a.group.occurrences.length || a.position - b.position)
    .map(({ group }) => {
      const locations = group.occurrences.map((o) => `${o.entry.file}:${o.entry.line}`).join(" ");
      return `${group.occurrences.length}x: ${group.key} -> ${locations}`;
    })
    .join("\n");
}
