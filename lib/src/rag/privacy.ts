/**
 * Personal information notice for chat questions that appear to name a
 * specific person. Detection is a heuristic; the question is still answered.
 */

export const PERSONAL_INFO_WARNING =
  '⚠️ **Warning**: Please avoid sharing personal information about specific individuals.\n\n';

const PERSONAL_NAME_PATTERN = /\b[A-Z][a-z]+ [A-Z][a-z]+\b/g;

/**
 * Capitalised two-word sequences that look like personal names
 */
export function detectPersonalNames(text: string): string[] {
  return text.match(PERSONAL_NAME_PATTERN) ?? [];
}

export function containsPersonalNames(text: string): boolean {
  return detectPersonalNames(text).length > 0;
}
