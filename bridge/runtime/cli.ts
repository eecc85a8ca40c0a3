/**
 * CLI — Command parsing and dispatch for redmine-bridge
 *
 * The standalone host: it owns the HTTP session and the installation
 * store, drives the setup flow from prompts, and calls the
 * `redmine.create_issue` service.
 */

import { resolve } from 'path';
import type { Logger } from '../types/index.js';
import type { HttpSession, HttpSessionOptions } from '../integrations/redmine/session.js';
import { normalizeRedmineUrl } from '../integrations/redmine/url.js';
import { RedmineSetupFlow } from '../skills/setup/config-flow.js';
import type { FlowResult, FormField } from '../skills/setup/config-flow.js';
import { loadConfig, DEFAULT_CONFIG_PATH } from './config.js';
import type { RuntimeConfig } from './config.js';
import { InstallationStore } from './installations.js';
import { createHost, setupEntry, unloadEntry } from './integration.js';
import type { PromptOptions } from './prompt.js';
import { ServiceValidationError } from './services.js';
import { FIELD_LABELS, SERVICE_ERRORS, SETUP_ABORTS, SETUP_ERRORS, translate } from './strings.js';
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

// =============================================================================
// TYPES
// =============================================================================

export type CliCommand = 'setup' | 'create-issue' | 'list' | 'remove' | 'help';

export interface ParsedArgs {
  command: CliCommand;
  configPath: string;
  /** `--name=value` options other than --config */
  options: Record<string, string>;
}

export interface CliDeps {
  /** Read a file from disk */
  readFile: (path: string, encoding: 'utf-8') => Promise<string>;
  /** Write a file to disk, creating its directory */
  writeFile: (path: string, content: string) => Promise<void>;
  /** Current working directory */
  cwd: string;
  /** Environment, for config overrides */
  env: NodeJS.ProcessEnv;
  /** Console output */
  log: (message: string) => void;
  /** Console error */
  error: (message: string) => void;
  /** Ask one question and return the answer */
  prompt: (question: string, options?: PromptOptions) => Promise<string>;
  /** Build the shared HTTP session */
  createSession: (options: HttpSessionOptions) => HttpSession;
  /** Logger handed to the flow, the clients and the service */
  logger: Logger;
}

type FormResult = Extract<FlowResult, { type: 'form' }>;

// =============================================================================
// CONSTANTS
// =============================================================================

export const HELP_TEXT = `
redmine-bridge - create Redmine issues from automations

Usage: redmine-bridge <command> [options]

Commands:
  setup          Connect a Redmine installation (interactive)
  create-issue   Create an issue with the configured defaults
  list           Show configured installations
  remove         Remove a configured installation
  help           Show this help

Options:
  --config=<path>        Path to config file (default: bridge.config.json)
  --subject=<text>       Issue subject (create-issue, required)
  --project=<id>         Project identifier (create-issue)
  --tracker=<id>         Tracker id (create-issue)
  --priority=<id>        Priority id (create-issue)
  --description=<text>   Issue description (create-issue)
  --url=<url>            Redmine URL (remove)

Examples:
  redmine-bridge setup
  redmine-bridge create-issue --subject="Water leak in basement"
  redmine-bridge remove --url=https://redmine.example.com
`;

const VALID_COMMANDS: ReadonlySet<string> = new Set<CliCommand>(['setup', 'create-issue', 'list', 'remove', 'help']);

// =============================================================================
// PARSING
// =============================================================================

/**
 * Parse CLI arguments into structured form.
 *
 * @param argv - process.argv.slice(2)
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const command = resolveCommand(argv[0]);
  const options: Record<string, string> = {};
  let configPath = DEFAULT_CONFIG_PATH;

  for (const arg of argv.slice(command === 'help' ? 0 : 1)) {
    const match = /^--([\w-]+)=(.*)$/s.exec(arg);
    if (!match) continue;
    const [, name, value] = match;
    if (name === 'config') {
      configPath = value || DEFAULT_CONFIG_PATH;
    } else {
      options[name] = value;
    }
  }

  return { command, configPath, options };
}

/**
 * Resolve a raw command string to a CliCommand.
 * Returns 'help' for undefined/empty and --help/-h.
 * Throws for unknown commands.
 */
export function resolveCommand(raw: string | undefined): CliCommand {
  if (raw === undefined || raw === '' || raw === '--help' || raw === '-h') return 'help';
  if (raw.startsWith('--')) return 'help';
  if (isCommand(raw)) return raw;
  throw new Error(`Unknown command: ${raw}`);
}

function isCommand(raw: string): raw is CliCommand {
  return VALID_COMMANDS.has(raw);
}

// =============================================================================
// COMMAND HANDLERS
// =============================================================================

/**
 * Walk the setup flow with prompts and persist the resulting installation.
 */
export async function runSetup(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const config = await loadRuntimeConfig(args, deps);
  const store = openStore(config, deps);
  const session = deps.createSession({ verifySsl: config.verifySsl });

  try {
    const flow = new RedmineSetupFlow({
      session,
      isConfigured: uniqueId => store.hasUniqueId(uniqueId),
      log: deps.logger,
    });

    let result = await flow.stepUser();
    while (result.type === 'form') {
      printForm(result, deps);
      const answers = await askFields(result.fields, deps);
      result = result.stepId === 'user'
        ? await flow.stepUser({
          [CONF_REDMINE_URL]: answers[CONF_REDMINE_URL] ?? '',
          [CONF_API_KEY]: answers[CONF_API_KEY] ?? '',
        })
        : await flow.stepDefaults({
          [CONF_DEFAULT_PROJECT_ID]: answers[CONF_DEFAULT_PROJECT_ID],
          [CONF_DEFAULT_TRACKER_ID]: answers[CONF_DEFAULT_TRACKER_ID],
          [CONF_DEFAULT_PRIORITY_ID]: answers[CONF_DEFAULT_PRIORITY_ID],
        });
    }

    if (result.type === 'abort') {
      deps.error(translate(SETUP_ABORTS, result.reason));
      return 1;
    }

    const entry = await store.create(result.title, result.uniqueId, result.data);
    deps.log(`Saved ${entry.title}`);
    return 0;
  } finally {
    await session.close();
  }
}

/**
 * Load every installation and call redmine.create_issue once.
 */
export async function runCreateIssue(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const subject = args.options.subject;
  if (!subject) {
    deps.error('Missing --subject=<text>');
    return 1;
  }

  const config = await loadRuntimeConfig(args, deps);
  const entries = await openStore(config, deps).list();
  if (entries.length === 0) {
    deps.error(SERVICE_ERRORS.not_loaded);
    deps.error('Run "redmine-bridge setup" first.');
    return 1;
  }

  const data: Record<string, string> = { [ATTR_SUBJECT]: subject };
  const optional: Array<[string, string]> = [
    ['project', ATTR_PROJECT_ID],
    ['tracker', ATTR_TRACKER_ID],
    ['priority', ATTR_PRIORITY_ID],
    ['description', ATTR_DESCRIPTION],
  ];
  for (const [option, field] of optional) {
    const value = args.options[option];
    if (value !== undefined) data[field] = value;
  }

  const session = deps.createSession({ verifySsl: config.verifySsl });
  const host = createHost(session, deps.logger);

  try {
    for (const entry of entries) {
      setupEntry(host, entry);
    }
    await host.services.call(DOMAIN, SERVICE_CREATE_ISSUE, data);
    return 0;
  } catch (error) {
    if (error instanceof ServiceValidationError) {
      deps.error(error.message);
      return 1;
    }
    throw error;
  } finally {
    for (const entry of entries) {
      unloadEntry(host, entry.entryId);
    }
    await session.close();
  }
}

/**
 * List configured installations with their defaults. The API key is not shown.
 */
export async function runList(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const config = await loadRuntimeConfig(args, deps);
  const entries = await openStore(config, deps).list();

  if (entries.length === 0) {
    deps.log('No Redmine installations configured. Run "redmine-bridge setup" first.');
    return 0;
  }

  for (const entry of entries) {
    const data = entry.data;
    deps.log(entry.title);
    deps.log(`  project: ${data[CONF_DEFAULT_PROJECT_ID]}`);
    deps.log(`  tracker: ${data[CONF_DEFAULT_TRACKER_ID]}`);
    deps.log(`  priority: ${data[CONF_DEFAULT_PRIORITY_ID] ?? DEFAULT_PRIORITY_ID}`);
  }
  return 0;
}

/**
 * Remove the installation for a URL.
 */
export async function runRemove(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const url = args.options.url;
  if (!url) {
    deps.error('Missing --url=<url>');
    return 1;
  }

  const config = await loadRuntimeConfig(args, deps);
  const store = openStore(config, deps);
  const uniqueId = normalizeRedmineUrl(url);
  const entry = await store.findByUniqueId(uniqueId);

  if (!entry) {
    deps.error(`No installation configured for ${uniqueId}`);
    return 1;
  }

  await store.remove(entry.entryId);
  deps.log(`Removed ${entry.title}`);
  return 0;
}

// =============================================================================
// HELPERS
// =============================================================================

function loadRuntimeConfig(args: ParsedArgs, deps: CliDeps): Promise<RuntimeConfig> {
  return loadConfig(resolve(deps.cwd, args.configPath), deps.readFile, deps.env);
}

function openStore(config: RuntimeConfig, deps: CliDeps): InstallationStore {
  return new InstallationStore(resolve(deps.cwd, config.installationsFile), {
    readFile: deps.readFile,
    writeFile: deps.writeFile,
  });
}

function printForm(form: FormResult, deps: CliDeps): void {
  deps.log('');
  for (const [field, key] of Object.entries(form.errors)) {
    const message = translate(SETUP_ERRORS, key);
    deps.error(field === 'base' ? message : `${labelFor(field)}: ${message}`);
  }
}

async function askFields(fields: FormField[], deps: CliDeps): Promise<Record<string, string>> {
  const answers: Record<string, string> = {};

  for (const field of fields) {
    if (field.type === 'select') {
      deps.log(`${labelFor(field.name)}:`);
      for (const option of field.options) {
        deps.log(`  ${option.value}) ${option.label}`);
      }
    }

    const hint = field.suggested ? ` [${field.suggested}]` : '';
    const secret = field.type === 'password';
    const answer = (await deps.prompt(`${labelFor(field.name)}${hint}: `, { secret })).trim();
    answers[field.name] = answer || field.suggested || '';
  }

  return answers;
}

function labelFor(field: string): string {
  return translate(FIELD_LABELS, field);
}

/**
 * Main CLI dispatch — parse args, run command, return exit code.
 */
export async function dispatch(argv: string[], deps: CliDeps): Promise<number> {
  try {
    const args = parseArgs(argv);

    switch (args.command) {
      case 'setup':
        return await runSetup(args, deps);

      case 'create-issue':
        return await runCreateIssue(args, deps);

      case 'list':
        return await runList(args, deps);

      case 'remove':
        return await runRemove(args, deps);

      case 'help':
        deps.log(HELP_TEXT);
        return 0;
    }
  } catch (error) {
    deps.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}
