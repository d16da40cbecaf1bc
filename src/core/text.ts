// ─── Keyword Matching ───────────────────────────────────────────

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Case-insensitive whole-word (or whole-phrase) match. */
export function containsKeyword(text: string, keyword: string): boolean {
  const trimmed = keyword.trim();
  if (trimmed === '') return false;
  return new RegExp(`\\b${escapeRegExp(trimmed)}\\b`, 'i').test(text);
}

/** Keywords from `keywords` that occur in `text`, in the given order. */
export function matchingKeywords(text: string, keywords: readonly string[]): string[] {
  return keywords.filter((keyword) => containsKeyword(text, keyword));
}
