/**
 * Integration lifecycle
 *
 * Loads persisted installations into the host, registers the
 * `redmine.create_issue` service once, and turns service calls into
 * Redmine issues using each installation's defaults.
 */

import { z } from 'zod';
import type { InstallationData, InstallationEntry, IssueDraft, Logger } from '../types/index.js';
import { RedmineClient } from '../integrations/redmine/adapter.js';
import type { CreatedIssue } from '../integrations/redmine/adapter.js';
import type { HttpSession } from '../integrations/redmine/session.js';
import { RedmineAuthError, RedmineError } from '../integrations/redmine/errors.js';
import {
  ATTR_DESCRIPTION,
  ATTR_PRIORITY_ID,
  ATTR_PROJECT_ID,
  ATTR_SUBJECT,
  ATTR_TRACKER_ID,
  CONF_API_KEY,
  CONF_DEFAULT_PRIORITY_ID,
  CONF_DEFAULT_PROJECT_ID,
  CONF_DEFAULT_TRACKER_ID,
  CONF_REDMINE_URL,
  DEFAULT_PRIORITY_ID,
  DOMAIN,
  SERVICE_CREATE_ISSUE,
} from './constants.js';
import { ServiceRegistry, ServiceValidationError } from './services.js';
import type { ServiceCall, ServiceResponse } from './services.js';

// =============================================================================
// SERVICE SCHEMA
// =============================================================================

export const CREATE_ISSUE_SCHEMA = z.object({
  [ATTR_SUBJECT]: z.string().refine(s => s.trim().length > 0, { message: 'must not be empty' }),
  [ATTR_PROJECT_ID]: z.string().min(1).optional(),
  [ATTR_DESCRIPTION]: z.string().optional(),
  [ATTR_TRACKER_ID]: z.coerce.number().int().positive().optional(),
  [ATTR_PRIORITY_ID]: z.coerce.number().int().positive().optional(),
}).strict();

export type CreateIssueCallData = z.infer<typeof CREATE_ISSUE_SCHEMA>;

// =============================================================================
// HOST
// =============================================================================

/** What the service handler needs from a Redmine client */
export type RedmineIssueApi = Pick<RedmineClient, 'createIssue'>;

export interface LoadedInstallation {
  client: RedmineIssueApi;
  config: InstallationData;
}

export interface BridgeHost {
  services: ServiceRegistry;
  session: HttpSession;
  log: Logger;
  /** Loaded installations by entry id, in load order */
  installations: Map<string, LoadedInstallation>;
  createClient?: (session: HttpSession, config: InstallationData, log: Logger) => RedmineIssueApi;
}

export function createHost(session: HttpSession, log: Logger): BridgeHost {
  return {
    services: new ServiceRegistry(),
    session,
    log,
    installations: new Map(),
  };
}

// =============================================================================
// LIFECYCLE
// =============================================================================

/**
 * Load one installation and make sure the create_issue service exists.
 */
export function setupEntry(host: BridgeHost, entry: InstallationEntry): boolean {
  const client = host.createClient
    ? host.createClient(host.session, entry.data, host.log)
    : new RedmineClient(
      host.session,
      { baseUrl: entry.data[CONF_REDMINE_URL], apiKey: entry.data[CONF_API_KEY] },
      { log: host.log },
    );

  host.installations.set(entry.entryId, { client, config: entry.data });

  // Only register the service once
  if (!host.services.hasService(DOMAIN, SERVICE_CREATE_ISSUE)) {
    host.services.register(
      DOMAIN,
      SERVICE_CREATE_ISSUE,
      (call: ServiceCall<CreateIssueCallData>) => handleCreateIssue(host, call.data),
      CREATE_ISSUE_SCHEMA,
    );
  }

  return true;
}

/**
 * Unload an installation; the service goes away with the last one.
 */
export function unloadEntry(host: BridgeHost, entryId: string): boolean {
  const removed = host.installations.delete(entryId);

  if (host.installations.size === 0) {
    host.services.remove(DOMAIN, SERVICE_CREATE_ISSUE);
  }

  return removed;
}

// =============================================================================
// SERVICE HANDLER
// =============================================================================

/**
 * Merge call data over the installation defaults. Priority falls back to
 * the stored default, then to Normal.
 */
export function buildIssueDraft(data: CreateIssueCallData, config: InstallationData): IssueDraft {
  const draft: IssueDraft = {
    projectId: data[ATTR_PROJECT_ID] ?? config[CONF_DEFAULT_PROJECT_ID],
    subject: data[ATTR_SUBJECT],
    trackerId: data[ATTR_TRACKER_ID] ?? config[CONF_DEFAULT_TRACKER_ID],
    priorityId: data[ATTR_PRIORITY_ID] ?? config[CONF_DEFAULT_PRIORITY_ID] ?? DEFAULT_PRIORITY_ID,
  };

  const description = data[ATTR_DESCRIPTION];
  if (description !== undefined) {
    draft.description = description;
  }

  return draft;
}

export async function handleCreateIssue(host: BridgeHost, data: CreateIssueCallData): Promise<ServiceResponse> {
  const installation = firstInstallation(host);
  if (!installation) {
    throw new ServiceValidationError('not_loaded');
  }

  const draft = buildIssueDraft(data, installation.config);

  let result: CreatedIssue;
  try {
    result = await installation.client.createIssue(draft);
  } catch (error) {
    if (error instanceof RedmineAuthError) {
      throw new ServiceValidationError('auth_error', {}, { cause: error });
    }
    if (error instanceof RedmineError) {
      throw new ServiceValidationError('api_error', { error: error.message }, { cause: error });
    }
    throw error;
  }

  host.log.info(`Created Redmine issue #${result.issue.id}: ${draft.subject}`);

  return {
    issue_id: result.issue.id,
    subject: result.issue.subject ?? draft.subject,
    issue: result.issue,
  };
}

/** Calls go to the first loaded installation */
function firstInstallation(host: BridgeHost): LoadedInstallation | undefined {
  for (const installation of host.installations.values()) {
    return installation;
  }
  return undefined;
}
