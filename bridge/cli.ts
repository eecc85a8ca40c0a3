#!/usr/bin/env node

/**
 * redmine-bridge CLI entry point
 *
 * Bin entry for `redmine-bridge`. Delegates to runtime/cli.ts for all logic.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { dispatch } from './runtime/cli.js';
import { createConsoleLogger } from './runtime/logger.js';
import { createPrompter } from './runtime/prompt.js';
import { createHttpSession } from './integrations/redmine/session.js';

const prompter = createPrompter(process.stdin, process.stdout, Boolean(process.stdin.isTTY));

const exitCode = await dispatch(process.argv.slice(2), {
  readFile: (path: string, encoding: 'utf-8') => readFile(path, encoding),
  writeFile: async (path: string, content: string) => {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
  },
  cwd: process.cwd(),
  env: process.env,
  log: (msg: string) => console.log(msg),
  error: (msg: string) => console.error(msg),
  prompt: prompter.prompt,
  createSession: createHttpSession,
  logger: createConsoleLogger(),
}).finally(() => prompter.close());

process.exit(exitCode);
