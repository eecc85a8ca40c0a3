/**
 * Installation store
 *
 * Persists one entry per configured Redmine installation in a JSON file.
 * Entries are keyed by a generated entry id and made unique by their
 * normalized URL.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { InstallationData, InstallationEntry } from '../types/index.js';
import { hasScheme } from '../integrations/redmine/url.js';
import {
  CONF_API_KEY,
  CONF_DEFAULT_PRIORITY_ID,
  CONF_DEFAULT_PROJECT_ID,
  CONF_DEFAULT_TRACKER_ID,
  CONF_REDMINE_URL,
} from './constants.js';

// =============================================================================
// SCHEMAS
// =============================================================================

export const InstallationDataSchema = z.object({
  [CONF_REDMINE_URL]: z.string().refine(hasScheme, { message: 'must start with http:// or https://' }),
  [CONF_API_KEY]: z.string().min(1),
  [CONF_DEFAULT_PROJECT_ID]: z.string().min(1),
  [CONF_DEFAULT_TRACKER_ID]: z.number().int().positive(),
  [CONF_DEFAULT_PRIORITY_ID]: z.number().int().positive().optional(),
});

const InstallationEntrySchema = z.object({
  entryId: z.string().min(1),
  uniqueId: z.string().min(1),
  title: z.string(),
  data: InstallationDataSchema,
  createdAt: z.string(),
});

const StoreFileSchema = z.object({
  version: z.literal(1),
  entries: z.array(InstallationEntrySchema),
});

// =============================================================================
// ERRORS
// =============================================================================

export class DuplicateInstallationError extends Error {
  readonly uniqueId: string;

  constructor(uniqueId: string) {
    super(`Redmine at ${uniqueId} is already configured`);
    this.name = 'DuplicateInstallationError';
    this.uniqueId = uniqueId;
  }
}

export class InstallationStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InstallationStoreError';
  }
}

// =============================================================================
// STORE
// =============================================================================

export interface InstallationStoreDeps {
  readFile: (path: string, encoding: 'utf-8') => Promise<string>;
  writeFile: (path: string, content: string) => Promise<void>;
  /** Entry id generator */
  generateId?: () => string;
  now?: () => Date;
}

export class InstallationStore {
  private path: string;
  private deps: InstallationStoreDeps;

  constructor(path: string, deps: InstallationStoreDeps) {
    this.path = path;
    this.deps = deps;
  }

  async list(): Promise<InstallationEntry[]> {
    return this.load();
  }

  async get(entryId: string): Promise<InstallationEntry | undefined> {
    const entries = await this.load();
    return entries.find(e => e.entryId === entryId);
  }

  async findByUniqueId(uniqueId: string): Promise<InstallationEntry | undefined> {
    const entries = await this.load();
    return entries.find(e => e.uniqueId === uniqueId);
  }

  async hasUniqueId(uniqueId: string): Promise<boolean> {
    return (await this.findByUniqueId(uniqueId)) !== undefined;
  }

  /**
   * Persist a new installation. Refuses a second entry for the same URL.
   */
  async create(title: string, uniqueId: string, data: InstallationData): Promise<InstallationEntry> {
    const entries = await this.load();
    if (entries.some(e => e.uniqueId === uniqueId)) {
      throw new DuplicateInstallationError(uniqueId);
    }

    const entry: InstallationEntry = {
      entryId: (this.deps.generateId ?? randomUUID)(),
      uniqueId,
      title,
      data: InstallationDataSchema.parse(data),
      createdAt: (this.deps.now?.() ?? new Date()).toISOString(),
    };

    await this.save([...entries, entry]);
    return entry;
  }

  /**
   * Remove an installation. Returns false when no such entry exists.
   */
  async remove(entryId: string): Promise<boolean> {
    const entries = await this.load();
    const remaining = entries.filter(e => e.entryId !== entryId);
    if (remaining.length === entries.length) {
      return false;
    }
    await this.save(remaining);
    return true;
  }

  // ===========================================================================
  // FILE I/O
  // ===========================================================================

  private async load(): Promise<InstallationEntry[]> {
    let content: string;
    try {
      content = await this.deps.readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw new InstallationStoreError(`Failed to read ${this.path}`, { cause: error });
    }

    if (!content.trim()) return [];

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new InstallationStoreError(`${this.path} is not valid JSON`, { cause: error });
    }

    const parsed = StoreFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown problem';
      throw new InstallationStoreError(`${this.path} is malformed (${where})`);
    }
    return parsed.data.entries;
  }

  private async save(entries: InstallationEntry[]): Promise<void> {
    const content = JSON.stringify({ version: 1, entries }, null, 2) + '\n';
    await this.deps.writeFile(this.path, content);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
