/**
 * Redmine Adapter
 *
 * Talks to the Redmine REST API: checks credentials, fetches reference data
 * (projects, trackers, priorities) and creates issues. Every failure is
 * reclassified into the error taxonomy in ./errors.ts; nothing is retried.
 */

import { z } from 'zod';
import type { Connection, IssueDraft, Logger, ReferenceItem } from '../../types/index.js';
import { DEFAULT_PRIORITY_ID } from '../../runtime/constants.js';
import { consoleLogger } from '../../runtime/logger.js';
import type { HttpResponse, HttpSession } from './session.js';
import {
  RedmineApiError,
  RedmineAuthError,
  RedmineConnectionError,
  RedmineError,
  RedmineValidationError,
  describeTransportError,
} from './errors.js';

// =============================================================================
// CONSTANTS
// =============================================================================

/** Read and credential checks */
export const READ_TIMEOUT_MS = 10_000;
/** Issue creation may run server-side workflow hooks */
export const CREATE_TIMEOUT_MS = 30_000;

// =============================================================================
// REDMINE API SCHEMAS
// =============================================================================

const CurrentUserResponseSchema = z.object({
  user: z.object({ login: z.string() }).passthrough(),
});

const ProjectsResponseSchema = z.object({
  projects: z.array(z.object({
    id: z.number(),
    name: z.string(),
    identifier: z.string().optional(),
  })),
});

const TrackersResponseSchema = z.object({
  trackers: z.array(z.object({
    id: z.number(),
    name: z.string(),
  })),
});

const PrioritiesResponseSchema = z.object({
  issue_priorities: z.array(z.object({
    id: z.number(),
    name: z.string(),
    is_default: z.boolean().optional(),
  })),
});

const CreatedIssueSchema = z.object({
  issue: z.object({
    id: z.number(),
    subject: z.string().optional(),
  }).passthrough(),
}).passthrough();

const ValidationErrorsSchema = z.object({
  errors: z.array(z.string()),
});

export type CreatedIssue = z.infer<typeof CreatedIssueSchema>;

export interface RedmineIssuePayload {
  issue: {
    project_id: string;
    subject: string;
    tracker_id: number;
    priority_id: number;
    description?: string;
  };
}

export interface RedmineClientOptions {
  log?: Logger;
}

// =============================================================================
// REDMINE CLIENT
// =============================================================================

export class RedmineClient {
  readonly name = 'redmine';
  readonly baseUrl: string;

  private session: HttpSession;
  private apiKey: string;
  private log: Logger;

  /**
   * @param session - borrowed from the host; never closed here
   * @param connection - already normalized (see normalizeRedmineUrl)
   */
  constructor(session: HttpSession, connection: Connection, options: RedmineClientOptions = {}) {
    this.session = session;
    this.baseUrl = connection.baseUrl;
    this.apiKey = connection.apiKey;
    this.log = options.log ?? consoleLogger;
  }

  get headers(): Record<string, string> {
    return {
      'X-Redmine-API-Key': this.apiKey,
      'Content-Type': 'application/json',
    };
  }

  // ===========================================================================
  // CONNECTION
  // ===========================================================================

  /**
   * Check the URL and API key by fetching the current user.
   *
   * Any 2xx counts as success; the body is only logged.
   */
  async validateConnection(): Promise<true> {
    try {
      const response = await this.send('GET', '/users/current.json', READ_TIMEOUT_MS);

      if (response.status === 401) {
        await this.discardBody(response);
        throw new RedmineAuthError();
      }
      if (!response.ok) {
        await this.discardBody(response);
        throw new RedmineConnectionError(`API error: ${response.status}`);
      }

      const user = CurrentUserResponseSchema.safeParse(parseJson(await this.readBody(response)));
      const login = user.success ? user.data.user.login : 'unknown user';
      this.log.debug(`Connected to ${this.baseUrl} as ${login}`);

      return true;
    } catch (error) {
      throw this.reclassify(error);
    }
  }

  // ===========================================================================
  // REFERENCE DATA
  // ===========================================================================

  async listProjects(): Promise<ReferenceItem[]> {
    const { projects } = await this.getCollection('/projects.json', ProjectsResponseSchema);
    return projects.map(p => ({ id: p.identifier || String(p.id), name: p.name }));
  }

  async listTrackers(): Promise<ReferenceItem[]> {
    const { trackers } = await this.getCollection('/trackers.json', TrackersResponseSchema);
    return trackers.map(t => ({ id: t.id, name: t.name }));
  }

  async listPriorities(): Promise<ReferenceItem[]> {
    const { issue_priorities } = await this.getCollection('/issue_priorities.json', PrioritiesResponseSchema);
    return issue_priorities.map(p => (
      p.is_default === undefined
        ? { id: p.id, name: p.name }
        : { id: p.id, name: p.name, isDefault: p.is_default }
    ));
  }

  // ===========================================================================
  // ISSUES
  // ===========================================================================

  async createIssue(draft: IssueDraft): Promise<CreatedIssue> {
    if (!draft.subject.trim()) {
      throw new RedmineValidationError(['Subject cannot be blank']);
    }

    const payload = buildIssuePayload(draft);

    try {
      const response = await this.send('POST', '/issues.json', CREATE_TIMEOUT_MS, payload);

      if (response.status === 401) {
        await this.discardBody(response);
        throw new RedmineAuthError();
      }
      if (response.status === 422) {
        const parsed = ValidationErrorsSchema.safeParse(parseJson(await this.readBody(response)));
        throw new RedmineValidationError(parsed.success ? parsed.data.errors : []);
      }
      if (!response.ok) {
        await this.discardBody(response);
        throw new RedmineApiError(`Failed to create issue: ${response.status}`, response.status);
      }

      const text = await this.readBody(response);
      const created = CreatedIssueSchema.safeParse(parseJson(text));
      if (!created.success) {
        throw new RedmineApiError(`Unexpected response creating issue: ${response.status}`, response.status);
      }

      this.log.debug(`Created issue: ${text}`);
      return created.data;
    } catch (error) {
      throw this.reclassify(error);
    }
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private async send(
    method: 'GET' | 'POST',
    path: string,
    timeoutMs: number,
    body?: unknown,
  ): Promise<HttpResponse> {
    const url = `${this.baseUrl}${path}`;
    this.log.debug(`${method} ${url}`);

    try {
      return await this.session.fetch(url, {
        method,
        headers: this.headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new RedmineConnectionError(`Connection failed: ${describeTransportError(error)}`, { cause: error });
    }
  }

  /** The body arrives after the headers, so a timeout can still fire here. */
  private async readBody(response: HttpResponse): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw new RedmineConnectionError(`Connection failed: ${describeTransportError(error)}`, { cause: error });
    }
  }

  /**
   * Read and drop an error body. An unread body keeps its pooled socket
   * busy, and the session's close() waits on it.
   */
  private async discardBody(response: HttpResponse): Promise<void> {
    try {
      await response.text();
    } catch (error) {
      this.log.debug(`Could not read error body: ${describeTransportError(error)}`);
    }
  }

  private async getCollection<T>(path: string, schema: z.ZodType<T>): Promise<T> {
    try {
      const response = await this.send('GET', path, READ_TIMEOUT_MS);
      if (!response.ok) {
        await this.discardBody(response);
        throw new RedmineConnectionError(`API error: ${response.status}`);
      }

      const parsed = schema.safeParse(parseJson(await this.readBody(response)));
      if (!parsed.success) {
        throw new RedmineConnectionError(`Unexpected response from ${path}`);
      }
      return parsed.data;
    } catch (error) {
      throw this.reclassify(error);
    }
  }

  private reclassify(error: unknown): RedmineError {
    if (error instanceof RedmineError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    this.log.error(`Unexpected error talking to ${this.baseUrl}: ${message}`);
    return new RedmineConnectionError(`Unexpected error: ${message}`, { cause: error });
  }
}

// =============================================================================
// PAYLOADS
// =============================================================================

/**
 * Build the `POST /issues.json` body. Priority falls back to Normal (2);
 * an empty description is left out.
 */
export function buildIssuePayload(draft: IssueDraft): RedmineIssuePayload {
  const issue: RedmineIssuePayload['issue'] = {
    project_id: draft.projectId,
    subject: draft.subject,
    tracker_id: draft.trackerId,
    priority_id: draft.priorityId ?? DEFAULT_PRIORITY_ID,
  };

  if (draft.description) {
    issue.description = draft.description;
  }

  return { issue };
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export default RedmineClient;
