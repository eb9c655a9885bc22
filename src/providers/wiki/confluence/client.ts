/**
 * Confluence Client
 *
 * REST v1 content API under {site}/wiki/rest/api. Requests never throw for
 * error pages or permission problems; they come back as a tagged fallback.
 * Transient statuses (429, 5xx) do throw, so the caller's RetryPolicy can
 * try again.
 */

import { z } from 'zod';
import { errorMessage, ProviderError } from '../../errors';
import type { PublishedPage, Wiki, WikiResult } from '../types';

// ============================================================
// CONSTANTS
// ============================================================

const API_PREFIX = '/rest/api';

/** Longest snippet kept from an error body */
export const SNIPPET_LENGTH = 300;

// ============================================================
// RESPONSE SCHEMAS
// ============================================================

const linksSchema = z
  .object({
    base: z.string().optional(),
    webui: z.string().optional()
  })
  .optional();

const pageSchema = z.object({
  id: z.string(),
  version: z.object({ number: z.number() }).optional(),
  _links: linksSchema
});
type PageResponse = z.infer<typeof pageSchema>;

const searchSchema = z.object({
  results: z.array(pageSchema).default([])
});

const errorBodySchema = z.object({
  statusCode: z.coerce.number(),
  message: z.string().optional()
});

// ============================================================
// TYPES
// ============================================================

export interface ConfluenceClientOptions {
  baseUrl: string;
  email: string;
  apiToken: string;
  spaceKey: string;
  parentPageId?: string;
  /** Injected for tests */
  fetch?: typeof fetch;
}

export interface ExistingPage {
  id: string;
  version: number;
}

interface RequestOptions {
  method?: 'GET' | 'POST' | 'PUT';
  query?: Record<string, string>;
  body?: unknown;
}

// ============================================================
// HELPERS
// ============================================================

/** Confluence Cloud serves the REST API under /wiki */
export function normalizeWikiBaseUrl(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, '');
  return trimmed.endsWith('/wiki') ? trimmed : `${trimmed}/wiki`;
}

function fallback<T>(status: number, title: string, snippet: string): WikiResult<T> {
  return { kind: 'fallback', status, title, snippet: snippet.slice(0, SNIPPET_LENGTH) };
}

/**
 * Pull a title and readable text out of an HTML error page.
 */
export function describeHtml(html: string): { title: string; text: string } {
  const title = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html)?.[1]?.trim();
  const text = html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  return { title: title || 'No title', text: text || 'No response body' };
}

// ============================================================
// CLIENT
// ============================================================

export class ConfluenceClient implements Wiki {
  readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: ConfluenceClientOptions) {
    this.baseUrl = normalizeWikiBaseUrl(options.baseUrl);
    this.fetchFn = options.fetch ?? fetch;
  }

  get isConfigured(): boolean {
    const { email, apiToken, spaceKey } = this.options;
    return Boolean(this.options.baseUrl && email && apiToken && spaceKey);
  }

  // ----------------------------------------------------------
  // Pages
  // ----------------------------------------------------------

  async findPageByTitle(title: string): Promise<WikiResult<ExistingPage | null>> {
    const result = await this.safeRequest('/content', searchSchema, {
      query: {
        spaceKey: this.options.spaceKey,
        title,
        type: 'page',
        limit: '1',
        expand: 'version'
      }
    });
    if (result.kind === 'fallback') return result;

    const page = result.data.results[0];
    return {
      kind: 'ok',
      data: page ? { id: page.id, version: page.version?.number ?? 1 } : null
    };
  }

  async createPage(title: string, html: string): Promise<WikiResult<PublishedPage>> {
    const body: Record<string, unknown> = {
      type: 'page',
      title,
      space: { key: this.options.spaceKey },
      body: { storage: { value: html, representation: 'storage' } }
    };
    if (this.options.parentPageId) {
      body['ancestors'] = [{ id: this.options.parentPageId }];
    }

    const result = await this.safeRequest('/content', pageSchema, { method: 'POST', body });
    if (result.kind === 'fallback') return result;

    return { kind: 'ok', data: this.toPublished(result.data, 'created') };
  }

  /**
   * Replace a page's body, bumping its version number by one.
   */
  async updatePage(
    page: ExistingPage,
    title: string,
    html: string
  ): Promise<WikiResult<PublishedPage>> {
    const result = await this.safeRequest(`/content/${encodeURIComponent(page.id)}`, pageSchema, {
      method: 'PUT',
      body: {
        id: page.id,
        type: 'page',
        title,
        space: { key: this.options.spaceKey },
        body: { storage: { value: html, representation: 'storage' } },
        version: { number: page.version + 1 }
      }
    });
    if (result.kind === 'fallback') return result;

    return { kind: 'ok', data: this.toPublished(result.data, 'updated') };
  }

  async createOrUpdatePage(title: string, html: string): Promise<WikiResult<PublishedPage>> {
    const existing = await this.findPageByTitle(title);
    if (existing.kind === 'fallback') return existing;

    return existing.data
      ? this.updatePage(existing.data, title, html)
      : this.createPage(title, html);
  }

  pageUrl(page: PageResponse): string {
    const links = page._links;
    if (links?.webui) return `${links.base ?? this.baseUrl}${links.webui}`;
    return `${this.baseUrl}/spaces/${this.options.spaceKey}/pages/${page.id}`;
  }

  private toPublished(page: PageResponse, action: PublishedPage['action']): PublishedPage {
    return { pageId: page.id, url: this.pageUrl(page), action };
  }

  // ----------------------------------------------------------
  // HTTP
  // ----------------------------------------------------------

  private async safeRequest<T>(
    path: string,
    schema: z.ZodType<T>,
    options: RequestOptions = {}
  ): Promise<WikiResult<T>> {
    if (!this.isConfigured) {
      return fallback(401, 'Not Authenticated', 'Check wiki email and apiToken.');
    }

    const url = new URL(`${this.baseUrl}${API_PREFIX}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }
    const method = options.method ?? 'GET';
    const auth = Buffer.from(`${this.options.email}:${this.options.apiToken}`).toString('base64');

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          Authorization: `Basic ${auth}`
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body)
      });
    } catch (error) {
      return fallback(0, 'Request Error', errorMessage(error));
    }

    if (response.status === 429 || response.status >= 500) {
      throw new ProviderError(
        `${method} ${path} failed with ${response.status}`,
        'TRANSIENT_ERROR',
        'wiki',
        { status: response.status }
      );
    }

    const text = await response.text();
    const contentType = response.headers.get('content-type') ?? '';

    if (contentType.includes('application/json')) {
      let data: unknown;
      try {
        data = JSON.parse(text);
      } catch {
        return fallback(response.status, 'Invalid JSON', text);
      }

      const errorBody = errorBodySchema.safeParse(data);
      if (errorBody.success && errorBody.data.statusCode >= 400) {
        const { statusCode, message = 'Unknown error' } = errorBody.data;
        return fallback(
          statusCode,
          statusCode === 403 ? 'Permission Denied' : `Error ${statusCode}`,
          message
        );
      }
      if (!response.ok) {
        return fallback(response.status, `Error ${response.status}`, text);
      }

      const parsed = schema.safeParse(data);
      if (!parsed.success) {
        return fallback(response.status, 'Unexpected Response', text);
      }
      return { kind: 'ok', data: parsed.data };
    }

    const { title, text: snippet } = describeHtml(text);
    return fallback(response.status, title, snippet);
  }
}
