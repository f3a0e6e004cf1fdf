export const DEFAULT_MIN_SKILL_MATCHES = 2;

/**
 * Counts how many keywords occur in the text (case-insensitive substring
 * match, so "sql" also hits "mysql").
 */
export function countSkillMatches(text: string | undefined, keywords: readonly string[]): number {
  if (!text) return 0;
  const lower = text.toLowerCase();
  return keywords.filter(keyword => lower.includes(keyword.toLowerCase())).length;
}

export function hasRequiredSkills(
  text: string | undefined,
  keywords: readonly string[],
  minMatches: number = DEFAULT_MIN_SKILL_MATCHES
): boolean {
  if (!text) return false;
  return countSkillMatches(text, keywords) >= minMatches;
}
