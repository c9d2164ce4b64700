import { formatCell } from './csv.js';
import type { ListTable } from '../types/list.js';

const MAX_CELL_WIDTH = 30;

function clip(value: string): string {
  const flat = value.replace(/\s+/g, ' ');
  return flat.length > MAX_CELL_WIDTH ? `${flat.slice(0, MAX_CELL_WIDTH - 3)}...` : flat;
}

/**
 * Record count followed by an aligned grid of the first `rows` rows
 */
export function formatPreview(table: ListTable, rows: number = 5): string {
  const header = `Retrieved ${table.rows.length} records.`;
  if (table.columns.length === 0) {
    return `${header}\n(empty table)`;
  }

  const grid = [
    table.columns.map(clip),
    ...table.rows.slice(0, rows).map((row) => table.columns.map((c) => clip(formatCell(row[c])))),
  ];
  const widths = table.columns.map((_, i) => Math.max(...grid.map((line) => line[i].length)));

  const lines = grid.map((line) =>
    line
      .map((cell, i) => cell.padEnd(widths[i]))
      .join('  ')
      .trimEnd()
  );

  return [header, ...lines].join('\n');
}
