import table from './languages.json';

const BY_CODE: Record<string, string> = table;
const NAMES = new Set(Object.values(BY_CODE));

export const SUPPORTED_LANGUAGES = [...NAMES].sort();

/**
 * Accepts an ISO-style code ("DE") or a display name ("german") and returns
 * the display name used as the store key. Unknown names pass through trimmed,
 * so the backend can still be asked for them.
 */
export function resolveLanguage(input: string): string {
  const trimmed = input.trim();
  const byCode = BY_CODE[trimmed.toUpperCase()];
  if (byCode) return byCode;
  for (const name of NAMES) {
    if (name.toLowerCase() === trimmed.toLowerCase()) return name;
  }
  return trimmed;
}
