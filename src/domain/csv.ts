/**
 * CSV serialization for exported intake rows (RFC 4180, CRLF line endings).
 */

// Spreadsheet apps evaluate cells starting with these characters as formulas
const FORMULA_PREFIX = /^[=+\-@]/;

/**
 * Escape a value for CSV output. Wraps in quotes if it contains commas,
 * quotes, or line breaks. Doubles internal quotes.
 */
export function escapeCsvField(value: string): string {
  const safe = FORMULA_PREFIX.test(value) ? `'${value}` : value;
  if (/[",\r\n]/.test(safe)) {
    return `"${safe.replace(/"/g, '""')}"`;
  }
  return safe;
}

export function toCsv(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const lines = [headers, ...rows].map((row) => row.map(escapeCsvField).join(','));
  return `${lines.join('\r\n')}\r\n`;
}
