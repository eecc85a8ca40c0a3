/**
 * Constants shared by the setup flow, the service handler and the CLI.
 */

export const DOMAIN = 'redmine';

// Persisted configuration keys
export const CONF_REDMINE_URL = 'redmine_url';
export const CONF_API_KEY = 'api_key';
export const CONF_DEFAULT_PROJECT_ID = 'default_project_id';
export const CONF_DEFAULT_TRACKER_ID = 'default_tracker_id';
export const CONF_DEFAULT_PRIORITY_ID = 'default_priority_id';

// Service attributes
export const ATTR_PROJECT_ID = 'project_id';
export const ATTR_SUBJECT = 'subject';
export const ATTR_DESCRIPTION = 'description';
export const ATTR_TRACKER_ID = 'tracker_id';
export const ATTR_PRIORITY_ID = 'priority_id';

export const SERVICE_CREATE_ISSUE = 'create_issue';

export const DEFAULT_TRACKER_ID = 1;
/** Redmine's stock "Normal" priority */
export const DEFAULT_PRIORITY_ID = 2;
