/**
 * Output Formatter - JSON and table formats
 */

export type OutputFormat = 'json' | 'table';

export type OutputRow = Readonly<Record<string, unknown>>;

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Format rows as a simple table; columns default to the first row's keys
 */
export function formatTable(data: readonly OutputRow[], columns?: readonly string[]): string {
  const first = data[0];
  if (first === undefined) {
    return 'No data to display';
  }

  const detectedColumns = columns ?? Object.keys(first);
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const widths = detectedColumns.map((col) =>
    Math.max(col.length, ...data.map((row) => valueToString(row[col]).length))
  );
  const pad = (cells: readonly string[]) => cells.map((cell, index) => cell.padEnd(widths[index] ?? 0));

  const lines: string[] = [];
  lines.push(pad(detectedColumns).join(' | ').trimEnd());
  lines.push(widths.map((width) => '-'.repeat(width)).join('-|-'));
  for (const row of data) {
    lines.push(pad(detectedColumns.map((col) => valueToString(row[col]))).join(' | ').trimEnd());
  }

  return lines.join('\n');
}
