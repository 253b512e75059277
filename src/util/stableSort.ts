/**
 * Deterministic ordering helpers. Strings compare with localeCompare("en") so
 * output does not depend on the host locale.
 */
export function sortStrings(arr: readonly string[]): string[] {
  return [...arr].sort((a, b) => a.localeCompare(b, "en"));
}

/** Drop case-insensitive duplicates, keeping the first spelling seen. */
export function uniqueIgnoreCase(arr: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const s of arr) {
    const key = s.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(s);
  }
  return out;
}
