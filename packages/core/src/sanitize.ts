import svKeywords from './sv-keywords.json';

const RESERVED_KEYWORDS: ReadonlySet<string> = new Set(svKeywords);

/**
 * Make a signal or module name a legal SystemVerilog identifier.
 *
 * - Characters outside `[a-zA-Z0-9_]` become `_`
 * - A leading digit gets a `_` prefix
 * - Reserved keywords get `_` appended until they no longer match
 */
export function sanitizeName(name: string): string {
  let sanitized = name.replace(/[^a-zA-Z0-9_]/g, '_');

  if (/^[0-9]/.test(sanitized)) {
    sanitized = `_${sanitized}`;
  }

  while (RESERVED_KEYWORDS.has(sanitized)) {
    sanitized += '_';
  }

  return sanitized;
}

export function isReservedKeyword(name: string): boolean {
  return RESERVED_KEYWORDS.has(name);
}
