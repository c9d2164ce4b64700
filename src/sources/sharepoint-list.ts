import {
  HttpClient,
  Logger,
  ListError,
  httpError,
  invalidArgument,
  type HttpResponse,
} from '../utils/index.js';
import { recordPageRequest, withSpan } from '../utils/telemetry.js';
import { toTable } from '../export/table.js';
import type { Config } from '../utils/config.js';
import type { ListPage, ListRecord, ListTable } from '../types/list.js';

const SOURCE = 'sharepoint';

export const REQUEST_HEADERS: Readonly<Record<string, string>> = {
  Accept: 'application/json;odata=nometadata',
  'Content-Type': 'application/json',
};

/**
 * Anything that can GET a URL. HttpClient in production, a fake in tests.
 */
export interface ListTransport {
  get(url: string): Promise<HttpResponse>;
}

export type NextLinkExtractor = (page: ListPage) => string | undefined;

function stringField(field: keyof ListPage): NextLinkExtractor {
  return (page) => {
    const value = page[field];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
  };
}

/**
 * Continuation link candidates in priority order. Which one the server emits
 * depends on its OData metadata mode.
 */
export const NEXT_LINK_EXTRACTORS: readonly NextLinkExtractor[] = [
  stringField('__next'), // SharePoint 2010/2013/2016 verbose
  stringField('odata.nextLink'), // nometadata
  stringField('@odata.nextLink'), // minimal/full metadata
];

export function getNextLink(
  page: ListPage,
  extractors: readonly NextLinkExtractor[] = NEXT_LINK_EXTRACTORS
): string | undefined {
  for (const extract of extractors) {
    const link = extract(page);
    if (link !== undefined) return link;
  }
  return undefined;
}

/**
 * Percent-encode a list title for use inside the `GetByTitle('...')` literal.
 * encodeURIComponent leaves `!'()*` alone; the quote would end the literal.
 */
export function encodeListTitle(title: string): string {
  return encodeURIComponent(title).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

export function assertValidLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw invalidArgument(`Limit must be an integer greater than zero, got ${limit}`);
  }
}

function isListPage(data: unknown): data is ListPage {
  return typeof data === 'object' && data !== null && !Array.isArray(data);
}

function isRecord(item: unknown): item is ListRecord {
  return typeof item === 'object' && item !== null && !Array.isArray(item);
}

/**
 * Create the authenticated session shared by every request of a run
 */
export function createListSession(config: Config, logger: Logger): HttpClient {
  return new HttpClient(
    SOURCE,
    {
      headers: { ...REQUEST_HEADERS },
      timeout: config.requestTimeoutMs,
      ntlm: {
        username: config.username,
        password: config.password,
        domain: config.domain,
        workstation: config.workstation,
      },
    },
    logger
  );
}

/**
 * Reads items from one SharePoint list through the REST API
 */
export class SharePointListSource {
  private config: Config;
  private transport: ListTransport;
  private logger: Logger;

  constructor(config: Config, transport: ListTransport, logger: Logger) {
    this.config = config;
    this.transport = transport;
    this.logger = logger;
  }

  /**
   * Retrieve up to `limit` items. Never follows continuation links.
   */
  async getItemsWithLimit(limit: number): Promise<ListTable> {
    const url = this.buildLimitedUrl(this.config.listTitle, limit);
    const items = await this.fetchAll(url, false);
    return toTable(items, this.logger);
  }

  /**
   * Retrieve every item, following pagination until the server stops linking
   */
  async getAllItems(): Promise<ListTable> {
    const url = this.buildCollectionUrl(this.config.listTitle);
    const items = await this.fetchAll(url, true);
    return toTable(items, this.logger);
  }

  buildCollectionUrl(listTitle: string): string {
    return `${this.config.siteUrl}/_api/web/lists/GetByTitle('${encodeListTitle(listTitle)}')/items`;
  }

  buildLimitedUrl(listTitle: string, limit: number): string {
    assertValidLimit(limit);
    return `${this.buildCollectionUrl(listTitle)}?$top=${limit}`;
  }

  /**
   * Fetch `url` and, when `paginate` is set, every page linked after it.
   * Any failed page aborts the whole fetch; nothing partial is returned.
   */
  async fetchAll(url: string, paginate: boolean): Promise<ListRecord[]> {
    return withSpan(
      'list.fetch',
      { 'list.title': this.config.listTitle, 'list.paginate': paginate },
      async (span) => {
        const items: ListRecord[] = [];
        let pages = 0;
        let next: string | undefined = url;

        while (next) {
          const page = await this.fetchPage(next);
          pages++;
          items.push(...page.records);
          next = paginate ? getNextLink(page.body) : undefined;
        }

        span.setAttribute('list.pages', pages);
        span.setAttribute('list.records', items.length);
        this.logger.info('fetch', { action: 'fetch_complete', pages, records: items.length });

        return items;
      }
    );
  }

  private async fetchPage(url: string): Promise<{ body: ListPage; records: ListRecord[] }> {
    this.logger.info('fetch', { action: 'request', url });

    let response: HttpResponse;
    try {
      response = await this.transport.get(url);
    } catch (error) {
      recordPageRequest(this.config.listTitle, false, 0);
      throw error;
    }

    if (response.status < 200 || response.status >= 300) {
      recordPageRequest(this.config.listTitle, false, 0);
      this.logger.error('fetch', { action: 'http_error', status: response.status, url });
      throw httpError(response.status, url);
    }

    const body = response.data;
    if (!isListPage(body)) {
      recordPageRequest(this.config.listTitle, false, 0);
      throw new ListError('INVALID_RESPONSE', `Expected a JSON object from ${url}`, {
        status: response.status,
        url,
      });
    }

    // A missing or non-array `value` contributes nothing
    const records = Array.isArray(body.value) ? body.value.filter(isRecord) : [];
    recordPageRequest(this.config.listTitle, true, records.length);

    return { body, records };
  }
}
