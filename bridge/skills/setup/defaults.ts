/**
 * Default selections for the setup defaults form.
 */

import type { ReferenceData, ReferenceItem } from '../../types/index.js';
import { DEFAULT_PRIORITY_ID, DEFAULT_TRACKER_ID } from '../../runtime/constants.js';

export interface DefaultSelections {
  /** Never pre-selected: the user must pick a project */
  project: undefined;
  tracker: string;
  priority: string;
}

/**
 * First tracker in server order; the priority the server flags as default,
 * else the first priority, else Normal.
 */
export function selectDefaults(reference: ReferenceData): DefaultSelections {
  return {
    project: undefined,
    tracker: selectDefaultTracker(reference.trackers),
    priority: selectDefaultPriority(reference.priorities),
  };
}

export function selectDefaultTracker(trackers: ReferenceItem[]): string {
  const first = trackers[0];
  return first ? String(first.id) : String(DEFAULT_TRACKER_ID);
}

export function selectDefaultPriority(priorities: ReferenceItem[]): string {
  const flagged = priorities.find(p => p.isDefault === true);
  if (flagged) return String(flagged.id);

  const first = priorities[0];
  return first ? String(first.id) : String(DEFAULT_PRIORITY_ID);
}
