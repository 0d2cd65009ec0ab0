/**
 * Output Formatting for CLI Commands
 *
 * Renders tables of event rows. Supports: csv, tab, json, ndjson, table.
 * Missing values (null, undefined, NaN) render as `nan` in csv and tab and
 * as an empty cell in table; json and ndjson use null.
 *
 * @module cli/lib/output
 */

import { writeFile } from 'node:fs/promises';
import { formatTableTime } from '../../core/utils/time.js';
import type { CellValue, Table } from '../../tabular/types.js';

export const OUTPUT_FORMATS = ['csv', 'tab', 'json', 'ndjson', 'table'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

function isMissing(value: CellValue): value is null | undefined {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

/**
 * Render one cell as text
 */
export function formatCell(value: CellValue, missing: string): string {
  if (isMissing(value)) return missing;
  if (value instanceof Date) return formatTableTime(value);
  return String(value);
}

function jsonValue(value: CellValue): string | number | boolean | null {
  if (isMissing(value)) return null;
  if (value instanceof Date) return value.toISOString();
  return value;
}

function toJSONRecords(table: Table): Record<string, string | number | boolean | null>[] {
  return table.rows.map((row) => {
    const record: Record<string, string | number | boolean | null> = {};
    for (const column of table.columns) {
      record[column] = jsonValue(row[column]);
    }
    return record;
  });
}

/**
 * Escape a value for CSV output
 */
function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsv(table: Table): string {
  const lines = [table.columns.map(escapeCSV).join(',')];
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => escapeCSV(formatCell(row[column], 'nan'))).join(','));
  }
  return lines.join('\n');
}

export function formatTab(table: Table): string {
  const clean = (value: string): string => value.replace(/[\t\r\n]+/g, ' ');
  const lines = [table.columns.map(clean).join('\t')];
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => clean(formatCell(row[column], 'nan'))).join('\t'));
  }
  return lines.join('\n');
}

/**
 * Aligned text table
 */
export function formatTable(table: Table): string {
  if (table.rows.length === 0) {
    return 'No entries found.';
  }

  const cells = table.rows.map((row) => table.columns.map((column) => formatCell(row[column], '')));
  const widths = table.columns.map((column, i) =>
    Math.max(column.length, ...cells.map((rowCells) => (rowCells[i] ?? '').length))
  );

  const headerRow = table.columns.map((column, i) => column.padEnd(widths[i] ?? 0)).join(' | ');
  const separator = widths.map((width) => '-'.repeat(width)).join('-+-');
  const dataRows = cells.map((rowCells) =>
    rowCells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(' | ').trimEnd()
  );
  return [headerRow.trimEnd(), separator, ...dataRows].join('\n');
}

export function formatJson(table: Table, pretty = true): string {
  const records = toJSONRecords(table);
  return pretty ? JSON.stringify(records, null, 2) : JSON.stringify(records);
}

export function formatNdjson(table: Table): string {
  return toJSONRecords(table)
    .map((record) => JSON.stringify(record))
    .join('\n');
}

/**
 * Format a table in the specified format
 */
export function formatOutput(table: Table, format: OutputFormat): string {
  switch (format) {
    case 'csv':
      return formatCsv(table);
    case 'tab':
      return formatTab(table);
    case 'json':
      return formatJson(table);
    case 'ndjson':
      return formatNdjson(table);
    case 'table':
      return formatTable(table);
  }
}

/**
 * Write formatted output to a file, or stdout when no path is given
 */
export async function writeOutput(text: string, filePath?: string): Promise<void> {
  if (filePath) {
    await writeFile(filePath, `${text}\n`, 'utf-8');
    return;
  }
  process.stdout.write(`${text}\n`);
}
