import { CellValue } from './frame';

export function formatCell(value: CellValue | undefined, digits = 3): string {
  if (value === null || value === undefined) return 'n/a';
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return 'NaN';
    return Number.isInteger(value) ? String(value) : value.toFixed(digits);
  }
  return value;
}

/**
 * Left-aligned columns, two spaces apart, with a dashed divider under the header.
 */
export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, colIdx) =>
    Math.max(...allRows.map((row) => (row[colIdx] ?? '').length)),
  );

  const divider = colWidths.map((w) => '-'.repeat(w)).join('  ');
  const formatRow = (row: readonly string[]) =>
    row
      .map((cell, idx) => cell.padEnd(colWidths[idx], ' '))
      .join('  ')
      .trimEnd();

  return [formatRow(headers), divider, ...rows.map(formatRow)];
}

export function dictToTable(input: Record<string, CellValue>, headers: [string, string]): string[] {
  return renderTable(
    headers,
    Object.entries(input).map(([key, value]) => [key, formatCell(value)]),
  );
}

export function formatFrameTable(title: string, rows: readonly object[]): string[] {
  if (rows.length === 0) return [title, '(no rows)'];
  const columns = Object.keys(rows[0]);
  const body = rows.map((row, index) => {
    const values: Record<string, unknown> = { ...row };
    return [
      String(index),
      ...columns.map((column) => {
        const value = values[column];
        return typeof value === 'number' || typeof value === 'string' || value === null
          ? formatCell(value)
          : String(value);
      }),
    ];
  });
  return [title, ...renderTable(['Index', ...columns], body)];
}
