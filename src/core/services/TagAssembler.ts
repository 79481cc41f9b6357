// Tag assembly for notes. Tags are compared case-insensitively; among case
// variants the smallest spelling wins and the output is sorted, so the same
// inputs always yield the same list regardless of order.

export function generatedTags(now: Date): string[] {
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  return [`Year::${year}`, `Month::${month}`];
}

export function mergeTags(...lists: ReadonlyArray<readonly string[]>): string[] {
  const byKey = new Map<string, string>();
  for (const list of lists) {
    for (const raw of list) {
      const tag = raw.trim();
      if (!tag) continue;
      const key = tag.toLowerCase();
      const current = byKey.get(key);
      if (current === undefined || tag < current) byKey.set(key, tag);
    }
  }
  return Array.from(byKey.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, tag]) => tag);
}

export function assembleTags(
  sourceTags: readonly string[],
  batchTags: readonly string[],
  now: Date = new Date()
): string[] {
  return mergeTags(sourceTags, batchTags, generatedTags(now));
}

// Parses a comma-separated list as given on the command line or in a CSV cell.
export function parseTagList(value: string | undefined | null): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((t) => t.trim())
    .filter(Boolean);
}
