/**
 * Keep only the candidates present in `allowed`, in first-seen order, each once.
 * Anything that is not a string (generator noise) is dropped.
 */
export function validateReveals(candidates: readonly unknown[] | undefined, allowed: ReadonlySet<string>): string[] {
  if (!candidates || candidates.length === 0) return [];
  const seen = new Set<string>();
  const result: string[] = [];
  for (const candidate of candidates) {
    if (typeof candidate !== 'string') continue;
    if (!allowed.has(candidate) || seen.has(candidate)) continue;
    seen.add(candidate);
    result.push(candidate);
  }
  return result;
}

export function uniqueStrings(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}
