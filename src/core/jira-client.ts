import { SEARCH_FIELDS, SEARCH_PAGE_SIZE } from '../constants.js';
import { JiraApiError, getErrorMessage } from '../errors.js';
import { jiraIssueSchema, jiraSearchResponseSchema, type JiraIssue } from '../types/jira.js';
import type { Issue, SyncConfig } from '../types/sync.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { parseAdf } from './adf-parser.js';

export interface JiraClientOptions {
  host: string;
  token: string;
  user?: string;
  pageSize?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

/**
 * Source of the issues a sync run mirrors.
 */
export interface IssueSource {
  fetchIssues(jql: string): Promise<Issue[]>;
}

/**
 * Jira Cloud / Data Center REST client for the issue search endpoint.
 * Basic auth when a user is configured, otherwise a Bearer personal access token.
 */
export class JiraClient implements IssueSource {
  readonly baseUrl: string;
  private readonly authorization: string;
  private readonly pageSize: number;
  private readonly maxRetries?: number;
  private readonly retryDelayMs?: number;

  constructor(options: JiraClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.host);
    this.authorization = options.user
      ? `Basic ${Buffer.from(`${options.user}:${options.token}`).toString('base64')}`
      : `Bearer ${options.token}`;
    this.pageSize = options.pageSize ?? SEARCH_PAGE_SIZE;
    this.maxRetries = options.maxRetries;
    this.retryDelayMs = options.retryDelayMs;
  }

  static fromConfig(config: SyncConfig): JiraClient {
    return new JiraClient({ host: config.jiraHost, user: config.jiraUser, token: config.jiraToken });
  }

  /**
   * Run a JQL search and return every matching issue, following pagination.
   */
  async fetchIssues(jql: string): Promise<Issue[]> {
    const issues: Issue[] = [];
    let startAt = 0;

    while (true) {
      const page = await this.searchPage(jql, startAt);
      for (const raw of page.issues) {
        const parsed = jiraIssueSchema.safeParse(raw);
        if (!parsed.success) {
          logger.warn(`Skipping malformed issue record: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
          continue;
        }
        issues.push(this.toIssue(parsed.data));
      }

      startAt += page.issues.length;
      const total = page.total ?? startAt;
      if (page.issues.length === 0 || startAt >= total) break;
      logger.debug(`Fetched ${startAt}/${total} issues`);
    }

    return issues;
  }

  toIssue(raw: JiraIssue): Issue {
    const { fields } = raw;
    const issue: Issue = {
      key: raw.key,
      summary: fields.summary,
      status: fields.status.name,
      link: `${this.baseUrl}/browse/${raw.key}`,
    };
    if (fields.priority) issue.priority = fields.priority.name;
    if (fields.issuetype) issue.issueType = fields.issuetype.name;
    if (fields.description !== undefined && fields.description !== null) {
      issue.description = parseAdf(fields.description);
    }
    if (fields.created) issue.created = fields.created;
    if (fields.updated) issue.updated = fields.updated;
    return issue;
  }

  private async searchPage(jql: string, startAt: number) {
    const url = new URL(`${this.baseUrl}/rest/api/3/search`);
    url.searchParams.set('jql', jql);
    url.searchParams.set('fields', SEARCH_FIELDS.join(','));
    url.searchParams.set('startAt', String(startAt));
    url.searchParams.set('maxResults', String(this.pageSize));
    const endpoint = url.toString();

    const body = await withRetry(
      () => this.getJson(endpoint),
      'Jira search',
      { maxRetries: this.maxRetries, baseDelayMs: this.retryDelayMs, shouldRetry: isRetryable },
    );

    const parsed = jiraSearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new JiraApiError('Unexpected Jira search response', {
        endpoint,
        context: { problems: parsed.error.issues.map(issue => issue.message) },
      });
    }
    return parsed.data;
  }

  private async getJson(endpoint: string): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(endpoint, {
        headers: {
          Accept: 'application/json',
          Authorization: this.authorization,
        },
      });
    } catch (err) {
      throw new JiraApiError(`Jira request failed: ${getErrorMessage(err)}`, { cause: err, endpoint });
    }

    if (!response.ok) {
      const text = await response.text();
      throw new JiraApiError(`Jira API error ${response.status}: ${text || response.statusText}`, {
        statusCode: response.status,
        endpoint,
      });
    }

    try {
      return await response.json();
    } catch (err) {
      throw new JiraApiError('Jira returned a response that is not JSON', { cause: err, endpoint });
    }
  }
}

// Network failures (no status), rate limiting and server errors are transient
function isRetryable(err: Error): boolean {
  if (!(err instanceof JiraApiError)) return false;
  if (err.statusCode === undefined) return err.cause !== undefined;
  return err.statusCode === 429 || err.statusCode >= 500;
}

export function normalizeBaseUrl(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}
