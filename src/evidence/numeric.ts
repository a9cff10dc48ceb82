const NUMERIC_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const THOUSANDS_SEPARATORS = /[,_]/g;
const ACCOUNTING_NEGATIVE = /^\((.*)\)$/;

/**
 * Parse a table cell as a number. Surrounding whitespace and thousands
 * separators are ignored, `(1,200)` reads as -1200. Empty or non-numeric
 * cells return null; an empty cell is absent, not zero.
 */
export function parseNumericCell(raw: string | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  let text = raw.trim();
  if (text.length === 0) return null;

  let sign = 1;
  const accounting = ACCOUNTING_NEGATIVE.exec(text);
  if (accounting) {
    sign = -1;
    text = accounting[1].trim();
  }

  const compact = text.replace(THOUSANDS_SEPARATORS, '');
  if (!NUMERIC_PATTERN.test(compact)) return null;

  const value = Number(compact) * sign;
  return Number.isFinite(value) ? value : null;
}
