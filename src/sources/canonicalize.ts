/**
 * Canonical form used only for matching duplicate lines; never written back.
 * Whitespace runs collapse to a single space and trailing whitespace is dropped.
 * Excluded lines (blank, or already marked) are returned unchanged.
 */
export function canonicalize(line: string, marker: string): string {
  if (isExcluded(line, marker)) return line;
  return line.replace(/\s+/g, " ").trimEnd();
}

/**
 * Blank lines and lines carrying the marker never take part in grouping.
 * This is the only record of "already processed": re-running a dedup skips marked lines.
 */
export function isExcluded(line: string, marker: string): boolean {
  return line.trim() === "" || isMarked(line, marker);
}

export function isMarked(line: string, marker: string): boolean {
  return line.startsWith(`${marker}:`);
}

export function markLine(line: string, marker: string): string {
  return `${marker}: ${line}`;
}

/** Inverse of markLine. Unmarked lines come back as they are. */
export function unmarkLine(line: string, marker: string): string {
  if (!isMarked(line, marker)) return line;
  const rest = line.slice(marker.length + 1);
  return rest.startsWith(" ") ? rest.slice(1) : rest;
}
