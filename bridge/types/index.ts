/**
 * Redmine Bridge Type Definitions
 *
 * Shared types for the transport adapter, the setup flow and the host runtime.
 */

// =============================================================================
// CONNECTION
// =============================================================================

export interface Connection {
  /** Normalized base URL: explicit http(s) scheme, no trailing slash */
  readonly baseUrl: string;
  readonly apiKey: string;
}

// =============================================================================
// ISSUES
// =============================================================================

export interface IssueDraft {
  /** Project identifier (string slug or numeric ID) */
  projectId: string;
  subject: string;
  trackerId: number;
  description?: string;
  priorityId?: number;
}

// =============================================================================
// REFERENCE DATA
// =============================================================================

export interface ReferenceItem {
  id: string | number;
  name: string;
  /** Only reported for priorities */
  isDefault?: boolean;
}

export interface ReferenceData {
  projects: ReferenceItem[];
  trackers: ReferenceItem[];
  priorities: ReferenceItem[];
}

// =============================================================================
// INSTALLATIONS
// =============================================================================

/** The persisted record, one per installation. Keys match the wire format. */
export interface InstallationData {
  redmine_url: string;
  api_key: string;
  default_project_id: string;
  default_tracker_id: number;
  /** Absent from records written before priorities were selectable */
  default_priority_id?: number;
}

export interface InstallationEntry {
  entryId: string;
  /** Normalized base URL; no two entries share one */
  uniqueId: string;
  title: string;
  data: InstallationData;
  createdAt: string;
}

// =============================================================================
// LOGGING
// =============================================================================

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  error: (message: string) => void;
}
