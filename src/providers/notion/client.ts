/**
 * Notion API Client
 * Pulls every page of a database query; no retries, one timeout per request
 */

import { createChildLogger } from '@/utils/logger';
import type {
  NotionErrorBody,
  NotionPage,
  NotionQueryBody,
  NotionQueryResponse,
} from './types';

const logger = createChildLogger('notion');

const BASE_URL = 'https://api.notion.com/v1';
export const NOTION_VERSION = '2022-06-28';
export const PAGE_SIZE = 100;
export const REQUEST_TIMEOUT_MS = 20_000;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface NotionClientOptions {
  token: string;
  databaseId: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export class UpstreamError extends Error {
  readonly code = 'UPSTREAM_ERROR';

  constructor(
    message: string,
    public readonly status: number | null,
    public readonly upstreamCode?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'UpstreamError';
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

function isPageLike(value: unknown): value is NotionPage {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readErrorBody(response: Response): Promise<NotionErrorBody | null> {
  try {
    const body: unknown = await response.json();
    if (typeof body !== 'object' || body === null) return null;
    return {
      code: 'code' in body && typeof body.code === 'string' ? body.code : undefined,
      message: 'message' in body && typeof body.message === 'string' ? body.message : undefined,
    };
  } catch {
    return null;
  }
}

export class NotionClient {
  private readonly token: string;
  private readonly databaseId: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike | undefined;
  private requestCount = 0;

  constructor(options: NotionClientOptions) {
    this.token = options.token;
    this.databaseId = options.databaseId;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  private get queryUrl(): string {
    return `${BASE_URL}/databases/${encodeURIComponent(this.databaseId)}/query`;
  }

  private timeoutError(cause: unknown): UpstreamError {
    return new UpstreamError(`Notion API request timed out after ${this.timeoutMs}ms`, null, undefined, {
      cause,
    });
  }

  private async parseQueryResponse(response: Response, signal: AbortSignal): Promise<NotionQueryResponse> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (signal.aborted || isAbortError(error)) throw this.timeoutError(error);
      throw new UpstreamError('Notion API returned a malformed response body', response.status, undefined, {
        cause: error,
      });
    }

    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      throw new UpstreamError('Notion API returned a malformed response body', response.status);
    }

    const results: unknown[] = 'results' in body && Array.isArray(body.results) ? body.results : [];
    return {
      results: results.filter(isPageLike),
      has_more: 'has_more' in body && body.has_more === true,
      next_cursor: 'next_cursor' in body && typeof body.next_cursor === 'string' ? body.next_cursor : null,
    };
  }

  /**
   * Fetch a single page of the database query.
   * The timeout spans the whole exchange, body included.
   */
  async queryPage(startCursor?: string): Promise<NotionQueryResponse> {
    const body: NotionQueryBody = { page_size: PAGE_SIZE };
    if (startCursor) {
      body.start_cursor = startCursor;
    }

    const doFetch = this.fetchImpl ?? fetch;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await doFetch(this.queryUrl, {
          method: 'POST',
          cache: 'no-store',
          headers: {
            Authorization: `Bearer ${this.token}`,
            'Notion-Version': NOTION_VERSION,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        if (controller.signal.aborted || isAbortError(error)) throw this.timeoutError(error);
        const reason = error instanceof Error ? error.message : String(error);
        throw new UpstreamError(`Notion API request failed: ${reason}`, null, undefined, {
          cause: error,
        });
      } finally {
        this.requestCount++;
      }

      if (!response.ok) {
        const errorBody = await readErrorBody(response);
        const detail = errorBody?.message ? `: ${errorBody.message}` : '';
        throw new UpstreamError(
          `Notion API request failed with status ${response.status}${detail}`,
          response.status,
          errorBody?.code
        );
      }

      return await this.parseQueryResponse(response, controller.signal);
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * Follow the cursor until the database reports no further pages.
   * Any failure aborts the whole fetch; nothing partial is returned.
   */
  async fetchAllRecords(): Promise<NotionPage[]> {
    const startedAt = Date.now();
    const records: NotionPage[] = [];
    let cursor: string | undefined;
    let pages = 0;

    for (;;) {
      const data = await this.queryPage(cursor);
      pages++;
      const results = data.results ?? [];
      records.push(...results);
      logger.debug({ page: pages, results: results.length }, 'Fetched query page');

      if (data.has_more && data.next_cursor) {
        cursor = data.next_cursor;
      } else {
        break;
      }
    }

    logger.info(
      { pages, records: records.length, durationMs: Date.now() - startedAt },
      'Fetched all database records'
    );
    return records;
  }
}
