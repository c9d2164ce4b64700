import { writeFile } from 'node:fs/promises';
import { Logger } from '../utils/logger.js';
import type { ListTable } from '../types/list.js';

/**
 * Render one cell. Missing values are empty, nested values are JSON.
 */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function csvEscape(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

export function toCsv(table: ListTable): string {
  if (table.columns.length === 0) return '';

  const lines = [table.columns.map(csvEscape).join(',')];
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => csvEscape(formatCell(row[column]))).join(','));
  }
  return lines.join('\n') + '\n';
}

/**
 * Filesystem-safe CSV name derived from a list title:
 * "RA4-1 Solicitud para Viajes" -> "RA4-1_Solicitud_para_Viajes.csv"
 */
export function safeFileName(listTitle: string): string {
  const safeTitle = [...listTitle]
    .filter((c) => /[\p{L}\p{N} _-]/u.test(c))
    .join('')
    .trimEnd()
    .replace(/ /g, '_');
  return `${safeTitle}.csv`;
}

/**
 * Write the table as CSV and return the path written
 */
export async function saveToCsv(
  table: ListTable,
  listTitle: string,
  logger: Logger,
  fileName?: string
): Promise<string> {
  const path = fileName ?? safeFileName(listTitle);
  await writeFile(path, toCsv(table), 'utf8');
  logger.info('export', { action: 'saved', path, rows: table.rows.length });
  return path;
}
