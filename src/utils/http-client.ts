import { Agent, request, type Dispatcher } from 'undici';
import { Logger } from './logger.js';
import { transportError } from './errors.js';
import {
  createAuthenticateHeader,
  createNegotiateHeader,
  findChallenge,
  type NtlmCredentials,
} from './ntlm.js';

export interface HttpResponse<T = unknown> {
  status: number;
  data: T;
  headers: Record<string, string>;
}

export interface HttpClientOptions {
  headers?: Record<string, string>;
  timeout?: number;
  ntlm?: NtlmCredentials;
}

interface RawResponse {
  status: number;
  body: string;
  headers: Dispatcher.ResponseData['headers'];
}

/**
 * GET-only HTTP client over a single kept-alive connection.
 *
 * NTLM authenticates the connection rather than the request, so the three
 * handshake legs have to travel over the same socket; the agent is capped at
 * one connection for that reason. Failures are never retried.
 */
export class HttpClient {
  private headers: Record<string, string>;
  private timeout: number;
  private ntlm: NtlmCredentials | undefined;
  private logger: Logger;
  private source: string;
  private dispatcher: Agent;

  constructor(source: string, options: HttpClientOptions, logger: Logger) {
    this.source = source;
    this.headers = options.headers ?? {};
    this.timeout = options.timeout ?? 30000;
    this.ntlm = options.ntlm;
    this.logger = logger;
    this.dispatcher = new Agent({ connections: 1 });
  }

  /**
   * Make an authenticated HTTP GET request.
   * Non-2xx statuses are returned, not thrown; network failures and timeouts
   * throw a TRANSPORT_ERROR.
   */
  async get(url: string): Promise<HttpResponse> {
    const startTime = Date.now();
    let response = await this.send(url, this.ntlm ? createNegotiateHeader(this.ntlm) : undefined);

    if (this.ntlm && response.status === 401) {
      const challenge = findChallenge(response.headers['www-authenticate']);
      if (challenge) {
        let authorization: string;
        try {
          authorization = createAuthenticateHeader(challenge, this.ntlm);
        } catch (error) {
          throw transportError(url, error);
        }
        response = await this.send(url, authorization);
      }
    }

    this.logger.debug('http', {
      method: 'GET',
      url,
      status: response.status,
      duration_ms: Date.now() - startTime,
      source: this.source,
    });

    // Parse response
    let data: unknown;
    try {
      data = JSON.parse(response.body);
    } catch {
      // If not JSON, return as string
      data = response.body;
    }

    return {
      status: response.status,
      data,
      headers: flattenHeaders(response.headers),
    };
  }

  /**
   * Release the pooled connection
   */
  async close(): Promise<void> {
    await this.dispatcher.close();
  }

  private async send(url: string, authorization: string | undefined): Promise<RawResponse> {
    try {
      const response = await request(url, {
        method: 'GET',
        dispatcher: this.dispatcher,
        headers: {
          ...this.headers,
          ...(authorization ? { Authorization: authorization } : {}),
        },
        bodyTimeout: this.timeout,
        headersTimeout: this.timeout,
      });

      // The body must be drained before the connection can carry the next leg
      const body = await response.body.text();

      return { status: response.statusCode, body, headers: response.headers };
    } catch (error) {
      this.logger.error('http', {
        action: 'request_failed',
        method: 'GET',
        url,
        error: error instanceof Error ? error.message : String(error),
        source: this.source,
      });
      throw transportError(url, error);
    }
  }
}

function flattenHeaders(raw: RawResponse['headers']): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      headers[key] = value;
    } else if (Array.isArray(value)) {
      headers[key] = value.join(', ');
    }
  }
  return headers;
}
