/**
 * Jira Cloud Client
 *
 * REST v3 with basic auth (email + API token). Every call throws a typed
 * ProviderError so the caller's RetryPolicy can tell transient failures
 * from permanent ones.
 */

import { z } from 'zod';
import { sequenceRatio } from '@/core/roster';
import { classifyHttpStatus, networkError, ProviderError } from '../../errors';
import type { CreatedIssue, DuplicateMatch, IssueInput, TicketTracker } from '../types';
import { type AdfDocument, toAdfDocument } from './adf';

// ============================================================
// CONSTANTS
// ============================================================

const API_PREFIX = '/rest/api/3';

/** Jira rejects summaries longer than this */
export const MAX_SUMMARY_LENGTH = 255;

/** Tried in order when the preferred issue type is missing from the project */
export const ISSUE_TYPE_FALLBACKS = ['Story', 'Bug', 'Sub-task'] as const;

const DUE_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Open issues compared per duplicate check */
const DUPLICATE_SEARCH_LIMIT = 50;

// ============================================================
// RESPONSE SCHEMAS
// ============================================================

const projectSchema = z.object({
  issueTypes: z.array(z.object({ name: z.string() })).default([])
});

const userSearchSchema = z.array(
  z.object({
    accountId: z.string().optional(),
    displayName: z.string().default('')
  })
);

const createdIssueSchema = z.object({
  id: z.string(),
  key: z.string()
});

const searchSchema = z.object({
  issues: z
    .array(
      z.object({
        key: z.string(),
        fields: z.object({
          summary: z.string().default(''),
          assignee: z.object({ displayName: z.string() }).nullish()
        })
      })
    )
    .default([])
});

const myselfSchema = z.object({ accountId: z.string() });

// ============================================================
// TYPES
// ============================================================

export interface JiraClientOptions {
  baseUrl: string;
  email: string;
  apiToken: string;
  projectKey: string;
  issueType?: string;
  labels?: string[];
  duplicateThreshold?: number;
  /** Injected for tests */
  fetch?: typeof fetch;
}

export interface JiraIssueFields {
  project: { key: string };
  summary: string;
  issuetype: { name: string };
  description?: AdfDocument;
  assignee?: { accountId: string };
  duedate?: string;
  labels?: string[];
}

interface RequestOptions {
  method?: 'GET' | 'POST';
  query?: Record<string, string>;
  body?: unknown;
}

// ============================================================
// FIELD BUILDING
// ============================================================

/**
 * Build the `fields` object of a create-issue request.
 * Summaries are capped, and due dates outside yyyy-MM-dd are left out.
 */
export function buildIssueFields(
  input: IssueInput,
  context: { projectKey: string; issueType: string; accountId: string | null; labels: string[] }
): JiraIssueFields {
  const fields: JiraIssueFields = {
    project: { key: context.projectKey },
    summary: input.summary.slice(0, MAX_SUMMARY_LENGTH),
    issuetype: { name: context.issueType }
  };

  if (input.description.trim()) fields.description = toAdfDocument(input.description);
  if (context.accountId) fields.assignee = { accountId: context.accountId };
  if (input.dueDate && DUE_DATE_PATTERN.test(input.dueDate)) fields.duedate = input.dueDate;
  if (context.labels.length > 0) fields.labels = context.labels;

  return fields;
}

/**
 * Pick the preferred issue type if the project has it, otherwise the first
 * available fallback, otherwise the project's first type.
 * Comparison ignores case; the project's spelling is returned.
 */
export function selectIssueType(available: string[], preferred: string): string {
  const find = (name: string) => available.find((type) => type.toLowerCase() === name.toLowerCase());

  const exact = find(preferred);
  if (exact) return exact;

  for (const fallback of ISSUE_TYPE_FALLBACKS) {
    const match = find(fallback);
    if (match) return match;
  }

  // Empty project listing: let the API reject the preferred type
  return available[0] ?? preferred;
}

/** Lowercased, whitespace-collapsed summary used for duplicate comparison */
export function normalizeSummary(summary: string): string {
  return summary.toLowerCase().replace(/\s+/g, ' ').trim();
}

/** Double-quoted JQL string literal */
export function jqlString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

// ============================================================
// CLIENT
// ============================================================

export class JiraClient implements TicketTracker {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private issueTypesCache: string[] | null = null;
  private readonly accountIdCache = new Map<string, string>();

  constructor(private readonly options: JiraClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchFn = options.fetch ?? fetch;
  }

  get isConfigured(): boolean {
    const { email, apiToken, projectKey } = this.options;
    return Boolean(this.baseUrl && email && apiToken && projectKey);
  }

  issueUrl(key: string): string {
    return `${this.baseUrl}/browse/${key}`;
  }

  // ----------------------------------------------------------
  // Issue types
  // ----------------------------------------------------------

  async getIssueTypes(): Promise<string[]> {
    if (this.issueTypesCache) return this.issueTypesCache;

    const project = await this.request(
      `/project/${encodeURIComponent(this.options.projectKey)}`,
      projectSchema
    );
    this.issueTypesCache = project.issueTypes.map((type) => type.name);
    return this.issueTypesCache;
  }

  async resolveIssueType(preferred: string): Promise<string> {
    return selectIssueType(await this.getIssueTypes(), preferred);
  }

  // ----------------------------------------------------------
  // Users
  // ----------------------------------------------------------

  /**
   * Look up an account id by display name.
   * An exact (case-insensitive) display name wins; otherwise the first result.
   */
  async findAccountId(displayName: string): Promise<string | null> {
    const cached = this.accountIdCache.get(displayName);
    if (cached) return cached;

    const users = await this.request('/user/search', userSearchSchema, {
      query: { query: displayName, maxResults: '10' }
    });

    const wanted = displayName.toLowerCase();
    const exact = users.find((user) => user.displayName.toLowerCase() === wanted);
    const accountId = (exact ?? users[0])?.accountId ?? null;

    if (accountId) this.accountIdCache.set(displayName, accountId);
    return accountId;
  }

  // ----------------------------------------------------------
  // Issues
  // ----------------------------------------------------------

  async createIssue(input: IssueInput): Promise<CreatedIssue> {
    this.assertConfigured();

    const issueType = await this.resolveIssueType(this.options.issueType ?? 'Task');
    const accountId = input.assignee ? await this.findAccountId(input.assignee) : null;

    const fields = buildIssueFields(input, {
      projectKey: this.options.projectKey,
      issueType,
      accountId,
      labels: this.options.labels ?? []
    });

    const created = await this.request('/issue', createdIssueSchema, {
      method: 'POST',
      body: { fields }
    });

    return {
      id: created.id,
      key: created.key,
      url: this.issueUrl(created.key),
      issueType,
      assigned: accountId !== null
    };
  }

  async findDuplicate(summary: string, assignee: string | null): Promise<DuplicateMatch | null> {
    this.assertConfigured();

    const clauses = [
      `project = ${jqlString(this.options.projectKey)}`,
      'resolution = Unresolved'
    ];
    for (const label of this.options.labels ?? []) {
      clauses.push(`labels = ${jqlString(label)}`);
    }
    const jql = `${clauses.join(' AND ')} ORDER BY created DESC`;

    const result = await this.request('/search/jql', searchSchema, {
      method: 'POST',
      body: { jql, fields: ['summary', 'assignee'], maxResults: DUPLICATE_SEARCH_LIMIT }
    });

    const threshold = this.options.duplicateThreshold ?? 0.85;
    const wanted = normalizeSummary(summary);
    const wantedAssignee = assignee?.toLowerCase() ?? null;

    let best: DuplicateMatch | null = null;
    for (const issue of result.issues) {
      const existingAssignee = issue.fields.assignee?.displayName.toLowerCase() ?? null;
      if (existingAssignee !== wantedAssignee) continue;

      const similarity = sequenceRatio(wanted, normalizeSummary(issue.fields.summary));
      if (similarity < threshold) continue;
      if (best && similarity <= best.similarity) continue;

      best = {
        key: issue.key,
        summary: issue.fields.summary,
        similarity,
        url: this.issueUrl(issue.key)
      };
    }

    return best;
  }

  async testConnection(): Promise<boolean> {
    if (!this.isConfigured) return false;
    try {
      await this.request('/myself', myselfSchema);
      return true;
    } catch {
      return false;
    }
  }

  // ----------------------------------------------------------
  // HTTP
  // ----------------------------------------------------------

  private assertConfigured(): void {
    if (!this.isConfigured) {
      throw new ProviderError('Jira client not configured', 'CONFIGURATION_ERROR', 'tracker');
    }
  }

  private async request<T>(
    path: string,
    schema: z.ZodType<T>,
    options: RequestOptions = {}
  ): Promise<T> {
    const url = new URL(`${this.baseUrl}${API_PREFIX}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const auth = Buffer.from(`${this.options.email}:${this.options.apiToken}`).toString('base64');
    const operation = `${options.method ?? 'GET'} ${path}`;

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: options.method ?? 'GET',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          Authorization: `Basic ${auth}`
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body)
      });
    } catch (error) {
      throw networkError('tracker', operation, error);
    }

    if (!response.ok) {
      const detail = (await response.text()).slice(0, 300);
      throw new ProviderError(
        `${operation} failed with ${response.status}: ${detail}`,
        classifyHttpStatus(response.status),
        'tracker',
        { status: response.status }
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ProviderError(
        `${operation} returned a body that is not JSON`,
        'REQUEST_ERROR',
        'tracker',
        { status: response.status, cause: error instanceof Error ? error : undefined }
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(
        `${operation} returned an unexpected body`,
        'REQUEST_ERROR',
        'tracker',
        { status: response.status }
      );
    }
    return parsed.data;
  }
}
