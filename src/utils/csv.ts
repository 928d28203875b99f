const FORMULA_PREFIXES = ['=', '+', '-', '@'];

/** Leading quote keeps spreadsheet apps from evaluating the cell as a formula. */
export function neutralizeFormula(value: string): string {
  return value !== '' && FORMULA_PREFIXES.includes(value[0]) ? `'${value}` : value;
}

function quoteField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function cell(value: unknown): string {
  if (value === null || value === undefined) return '';
  return quoteField(neutralizeFormula(String(value)));
}

// RFC 4180 line endings, header row first
export function toCsv<K extends string>(columns: readonly K[], rows: ReadonlyArray<Partial<Record<K, unknown>>>): string {
  const lines = [columns.map(quoteField).join(',')];
  for (const row of rows) {
    lines.push(columns.map((c) => cell(row[c])).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}
