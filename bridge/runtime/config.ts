/**
 * Runtime configuration
 *
 * `bridge.config.json` is optional. Missing keys take their defaults and
 * REDMINE_BRIDGE_VERIFY_SSL overrides the file's `verifySsl`.
 */

import { z } from 'zod';
import { DEFAULT_VERIFY_SSL } from '../integrations/redmine/session.js';

// =============================================================================
// SCHEMA
// =============================================================================

export const DEFAULT_CONFIG_PATH = './bridge.config.json';
export const DEFAULT_INSTALLATIONS_FILE = './state/installations.json';

export const RuntimeConfigSchema = z.object({
  installationsFile: z.string().min(1).default(DEFAULT_INSTALLATIONS_FILE),
  verifySsl: z.boolean().default(DEFAULT_VERIFY_SSL),
}).strict();

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// LOADING
// =============================================================================

/**
 * Load the runtime configuration. A missing file yields the defaults.
 */
export async function loadConfig(
  configPath: string,
  readFileFn: (path: string, encoding: 'utf-8') => Promise<string>,
  env: NodeJS.ProcessEnv = process.env,
): Promise<RuntimeConfig> {
  let raw: unknown = {};
  try {
    const content = await readFileFn(configPath, 'utf-8');
    if (content.trim()) {
      raw = JSON.parse(content);
    }
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`${configPath} is not valid JSON`, { cause: error });
    }
    if (!isMissingFile(error)) {
      throw new ConfigError(`Failed to read ${configPath}`, { cause: error });
    }
  }

  const parsed = RuntimeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
      .join('; ');
    throw new ConfigError(`Invalid config ${configPath}: ${details}`);
  }

  const verifySsl = parseBooleanEnv(env.REDMINE_BRIDGE_VERIFY_SSL);
  return verifySsl === undefined ? parsed.data : { ...parsed.data, verifySsl };
}

/**
 * Read a `true`/`false` environment flag. Anything else leaves the config alone.
 */
export function parseBooleanEnv(value: string | undefined): boolean | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      return undefined;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
