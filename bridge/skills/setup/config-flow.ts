/**
 * Setup Flow
 *
 * Two-step setup for a Redmine installation:
 *   1. `user`     - URL + API key, checked against the server, then the
 *                   reference lists are fetched
 *   2. `defaults` - default project, tracker and priority picked from
 *                   those lists
 *
 * Every failure re-shows the current form with an error key; nothing is
 * retried automatically. A URL that is already configured aborts the flow.
 */

import { z } from 'zod';
import type {
  Connection,
  InstallationData,
  Logger,
  ReferenceData,
  ReferenceItem,
} from '../../types/index.js';
import { RedmineClient } from '../../integrations/redmine/adapter.js';
import type { HttpSession } from '../../integrations/redmine/session.js';
import { RedmineAuthError, RedmineConnectionError } from '../../integrations/redmine/errors.js';
import { normalizeRedmineUrl } from '../../integrations/redmine/url.js';
import {
  CONF_API_KEY,
  CONF_DEFAULT_PRIORITY_ID,
  CONF_DEFAULT_PROJECT_ID,
  CONF_DEFAULT_TRACKER_ID,
  CONF_REDMINE_URL,
} from '../../runtime/constants.js';
import { consoleLogger } from '../../runtime/logger.js';
import { selectDefaults } from './defaults.js';
import type { DefaultSelections } from './defaults.js';

// =============================================================================
// TYPES
// =============================================================================

export type SetupStepId = 'user' | 'defaults';

export type SetupErrorKey =
  | 'invalid_auth'
  | 'cannot_connect'
  | 'cannot_fetch_options'
  | 'unknown'
  | 'required'
  | 'invalid_selection';

export type SetupAbortReason = 'already_configured' | 'missing_credentials';

export interface UserStepInput {
  [CONF_REDMINE_URL]: string;
  [CONF_API_KEY]: string;
}

export interface DefaultsStepInput {
  [CONF_DEFAULT_PROJECT_ID]?: string;
  [CONF_DEFAULT_TRACKER_ID]?: string | number;
  [CONF_DEFAULT_PRIORITY_ID]?: string | number;
}

export interface SelectOption {
  value: string;
  label: string;
}

export type FormField =
  | { name: string; type: 'text' | 'password'; required: true; suggested?: string }
  | { name: string; type: 'select'; required: true; options: SelectOption[]; suggested?: string };

/** Field name (or `base` for the whole form) to error key */
export type FormErrors = Record<string, SetupErrorKey>;

export type FlowResult =
  | { type: 'form'; stepId: SetupStepId; fields: FormField[]; errors: FormErrors }
  | { type: 'create_entry'; title: string; uniqueId: string; data: InstallationData }
  | { type: 'abort'; reason: SetupAbortReason };

/** What the flow needs from a Redmine client */
export type RedmineSetupApi = Pick<
  RedmineClient,
  'validateConnection' | 'listProjects' | 'listTrackers' | 'listPriorities'
>;

export interface SetupFlowDeps {
  /** Shared session, borrowed from the host */
  session: HttpSession;
  /** Whether an installation with this normalized URL already exists */
  isConfigured: (uniqueId: string) => boolean | Promise<boolean>;
  log?: Logger;
  createClient?: (session: HttpSession, connection: Connection, log: Logger) => RedmineSetupApi;
}

// =============================================================================
// SCHEMAS
// =============================================================================

const DefaultsSchema = z.object({
  [CONF_DEFAULT_PROJECT_ID]: z.string().trim().min(1),
  [CONF_DEFAULT_TRACKER_ID]: z.coerce.number().int().positive(),
  [CONF_DEFAULT_PRIORITY_ID]: z.coerce.number().int().positive(),
});

// =============================================================================
// REFERENCE DATA
// =============================================================================

/**
 * Fetch projects, trackers and priorities one after the other.
 */
export async function fetchReferenceData(client: RedmineSetupApi): Promise<ReferenceData> {
  const projects = await client.listProjects();
  const trackers = await client.listTrackers();
  const priorities = await client.listPriorities();
  return { projects, trackers, priorities };
}

// =============================================================================
// FLOW
// =============================================================================

export class RedmineSetupFlow {
  private deps: SetupFlowDeps;
  private log: Logger;
  private connection: Connection | undefined;
  private reference: ReferenceData | undefined;

  constructor(deps: SetupFlowDeps) {
    this.deps = deps;
    this.log = deps.log ?? consoleLogger;
  }

  /** The step whose form is currently shown */
  get currentStep(): SetupStepId {
    return this.connection && this.reference ? 'defaults' : 'user';
  }

  // ===========================================================================
  // STEP 1: credentials
  // ===========================================================================

  async stepUser(input?: UserStepInput): Promise<FlowResult> {
    if (!input) {
      return this.userForm({});
    }

    // A new submission always starts over from the credentials
    this.connection = undefined;
    this.reference = undefined;

    const redmineUrl = normalizeRedmineUrl(input[CONF_REDMINE_URL]);
    const connection: Connection = { baseUrl: redmineUrl, apiKey: input[CONF_API_KEY] };
    const client = this.createClient(connection);

    try {
      await client.validateConnection();
    } catch (error) {
      if (error instanceof RedmineAuthError) {
        this.log.error(`Authentication failed: ${error.message}`);
        return this.userForm({ [CONF_API_KEY]: 'invalid_auth' }, input);
      }
      if (error instanceof RedmineConnectionError) {
        this.log.error(`Connection failed to ${redmineUrl}: ${error.message}`);
        return this.userForm({ [CONF_REDMINE_URL]: 'cannot_connect' }, input);
      }
      this.log.error(`Unexpected exception: ${errorMessage(error)}`);
      return this.userForm({ base: 'unknown' }, input);
    }

    if (await this.deps.isConfigured(redmineUrl)) {
      return { type: 'abort', reason: 'already_configured' };
    }

    let reference: ReferenceData;
    try {
      reference = await fetchReferenceData(client);
    } catch (error) {
      if (error instanceof RedmineConnectionError) {
        this.log.error(`Failed to fetch options from ${redmineUrl}: ${error.message}`);
        return this.userForm({ base: 'cannot_fetch_options' }, input);
      }
      this.log.error(`Unexpected exception: ${errorMessage(error)}`);
      return this.userForm({ base: 'unknown' }, input);
    }

    this.connection = connection;
    this.reference = reference;
    return this.stepDefaults();
  }

  // ===========================================================================
  // STEP 2: defaults
  // ===========================================================================

  async stepDefaults(input?: DefaultsStepInput): Promise<FlowResult> {
    const { connection, reference } = this;
    if (!connection || !reference) {
      return { type: 'abort', reason: 'missing_credentials' };
    }

    const defaults = selectDefaults(reference);
    if (!input) {
      return this.defaultsForm(reference, defaults, {});
    }

    const parsed = DefaultsSchema.safeParse({
      [CONF_DEFAULT_PROJECT_ID]: input[CONF_DEFAULT_PROJECT_ID] ?? defaults.project,
      [CONF_DEFAULT_TRACKER_ID]: input[CONF_DEFAULT_TRACKER_ID] ?? defaults.tracker,
      [CONF_DEFAULT_PRIORITY_ID]: input[CONF_DEFAULT_PRIORITY_ID] ?? defaults.priority,
    });

    if (!parsed.success) {
      const errors: FormErrors = {};
      for (const issue of parsed.error.issues) {
        const field = String(issue.path[0]);
        errors[field] = field === CONF_DEFAULT_PROJECT_ID ? 'required' : 'invalid_selection';
      }
      return this.defaultsForm(reference, defaults, errors);
    }

    const choice = parsed.data;
    const errors: FormErrors = {};
    if (!isOffered(reference.projects, choice[CONF_DEFAULT_PROJECT_ID])) {
      errors[CONF_DEFAULT_PROJECT_ID] = 'invalid_selection';
    }
    if (!isOffered(reference.trackers, choice[CONF_DEFAULT_TRACKER_ID])) {
      errors[CONF_DEFAULT_TRACKER_ID] = 'invalid_selection';
    }
    if (!isOffered(reference.priorities, choice[CONF_DEFAULT_PRIORITY_ID])) {
      errors[CONF_DEFAULT_PRIORITY_ID] = 'invalid_selection';
    }
    if (Object.keys(errors).length > 0) {
      return this.defaultsForm(reference, defaults, errors);
    }

    // Another setup may have finished for this URL in the meantime
    if (await this.deps.isConfigured(connection.baseUrl)) {
      return { type: 'abort', reason: 'already_configured' };
    }

    this.log.info(`Redmine setup complete for ${connection.baseUrl}`);

    return {
      type: 'create_entry',
      title: `Redmine (${connection.baseUrl})`,
      uniqueId: connection.baseUrl,
      data: {
        [CONF_REDMINE_URL]: connection.baseUrl,
        [CONF_API_KEY]: connection.apiKey,
        [CONF_DEFAULT_PROJECT_ID]: choice[CONF_DEFAULT_PROJECT_ID],
        [CONF_DEFAULT_TRACKER_ID]: choice[CONF_DEFAULT_TRACKER_ID],
        [CONF_DEFAULT_PRIORITY_ID]: choice[CONF_DEFAULT_PRIORITY_ID],
      },
    };
  }

  // ===========================================================================
  // FORMS
  // ===========================================================================

  private userForm(errors: FormErrors, previous?: UserStepInput): FlowResult {
    return {
      type: 'form',
      stepId: 'user',
      fields: [
        { name: CONF_REDMINE_URL, type: 'text', required: true, suggested: previous?.[CONF_REDMINE_URL] },
        { name: CONF_API_KEY, type: 'password', required: true },
      ],
      errors,
    };
  }

  private defaultsForm(reference: ReferenceData, defaults: DefaultSelections, errors: FormErrors): FlowResult {
    return {
      type: 'form',
      stepId: 'defaults',
      fields: [
        { name: CONF_DEFAULT_PROJECT_ID, type: 'select', required: true, options: toOptions(reference.projects) },
        {
          name: CONF_DEFAULT_TRACKER_ID,
          type: 'select',
          required: true,
          options: toOptions(reference.trackers),
          suggested: defaults.tracker,
        },
        {
          name: CONF_DEFAULT_PRIORITY_ID,
          type: 'select',
          required: true,
          options: toOptions(reference.priorities),
          suggested: defaults.priority,
        },
      ],
      errors,
    };
  }

  private createClient(connection: Connection): RedmineSetupApi {
    if (this.deps.createClient) {
      return this.deps.createClient(this.deps.session, connection, this.log);
    }
    return new RedmineClient(this.deps.session, connection, { log: this.log });
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function toOptions(items: ReferenceItem[]): SelectOption[] {
  return items.map(item => ({ value: String(item.id), label: item.name }));
}

/** An empty list offers nothing to check against, so any value passes. */
function isOffered(items: ReferenceItem[], value: string | number): boolean {
  return items.length === 0 || items.some(item => String(item.id) === String(value));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
