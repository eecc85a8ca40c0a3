/**
 * English labels and messages for the setup forms and the create_issue service.
 */

export const FIELD_LABELS: Record<string, string> = {
  redmine_url: 'Redmine URL',
  api_key: 'API key',
  default_project_id: 'Default project',
  default_tracker_id: 'Default tracker',
  default_priority_id: 'Default priority',
};

export const SETUP_ERRORS: Record<string, string> = {
  invalid_auth: 'Invalid API key',
  cannot_connect: 'Failed to connect to Redmine',
  cannot_fetch_options: 'Connected, but could not fetch projects, trackers or priorities',
  unknown: 'Unexpected error',
  required: 'This field is required',
  invalid_selection: 'Pick one of the listed options',
};

export const SETUP_ABORTS: Record<string, string> = {
  already_configured: 'This Redmine instance is already configured',
  missing_credentials: 'Enter the Redmine URL and API key first',
};

export const SERVICE_ERRORS: Record<string, string> = {
  auth_error: 'Redmine authentication failed. Check the API key.',
  api_error: 'Failed to create Redmine issue: {error}',
  not_loaded: 'No Redmine installation is configured',
  invalid_service_data: 'Invalid service data: {error}',
};

/**
 * Look up a message and fill in `{placeholders}`. Unknown keys come back as is.
 */
export function translate(
  table: Record<string, string>,
  key: string,
  placeholders: Record<string, string> = {},
): string {
  const template = table[key] ?? key;
  return template.replace(/\{(\w+)\}/g, (match, name: string) => placeholders[name] ?? match);
}
