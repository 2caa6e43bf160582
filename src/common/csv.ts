const FORMULA_PREFIX = /^[=+\-@]/;

function formatCell(value: unknown) {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'number') {
    return String(value);
  }
  const text = String(value);
  // Spreadsheets evaluate cells that start like a formula.
  return FORMULA_PREFIX.test(text) ? `'${text}` : text;
}

function escapeCell(value: string) {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Header row from `columns`, then one line per row in column order. */
export function toCsv<T extends object, K extends keyof T & string>(
  columns: readonly K[],
  rows: readonly T[],
) {
  const lines = [columns.map(escapeCell).join(',')];
  for (const row of rows) {
    lines.push(
      columns.map((column) => escapeCell(formatCell(row[column]))).join(','),
    );
  }
  return lines.join('\n');
}
