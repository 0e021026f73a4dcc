/**
 * Render a result set as text: one line per row, values joined by ", ".
 */
export function renderRows(rows: ReadonlyArray<readonly unknown[]>): string {
  return rows.map((row) => row.map(renderValue).join(', ')).join('\n');
}

export function renderValue(value: unknown): string {
  if (value === null || value === undefined) {
    return 'NULL';
  }
  if (value instanceof Uint8Array) {
    return `<blob ${value.byteLength} bytes>`;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

export const toCells = (row: unknown): unknown[] => (Array.isArray(row) ? row : [row]);
