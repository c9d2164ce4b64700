/**
 * One list item as returned by the REST endpoint, metadata fields included.
 */
export type ListRecord = Record<string, unknown>;

/**
 * Body of an items page. Only `value` and the continuation links are read;
 * which continuation field appears depends on the server's OData metadata mode.
 */
export interface ListPage {
  value?: unknown;
  __next?: unknown;
  'odata.nextLink'?: unknown;
  '@odata.nextLink'?: unknown;
  [key: string]: unknown;
}

/**
 * Tabular view of a result set: the column union in first-seen order and one
 * cleaned record per row.
 */
export interface ListTable {
  columns: string[];
  rows: ListRecord[];
}
