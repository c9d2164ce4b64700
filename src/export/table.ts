import { Logger } from '../utils/logger.js';
import type { ListRecord, ListTable } from '../types/list.js';

// Internal metadata fields (e.g. __metadata, _ModerationStatus) start with an underscore
const METADATA_PREFIX = '_';

/**
 * Copy of `record` without internal metadata fields. Key order is kept.
 */
export function cleanRecord(record: ListRecord): ListRecord {
  return Object.fromEntries(
    Object.entries(record).filter(([key]) => !key.startsWith(METADATA_PREFIX))
  );
}

/**
 * Build a table from raw list records. An empty input is not an error: it
 * logs a warning and yields a table with no columns and no rows.
 */
export function toTable(records: ListRecord[], logger: Logger): ListTable {
  if (records.length === 0) {
    logger.warning('table', { message: 'No items were retrieved from the list.' });
    return { columns: [], rows: [] };
  }

  const rows = records.map(cleanRecord);
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      columns.add(key);
    }
  }

  return { columns: [...columns], rows };
}
