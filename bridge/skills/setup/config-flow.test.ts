import { describe, it, expect, vi } from 'vitest';
import { RedmineSetupFlow, fetchReferenceData } from './config-flow.js';
import type { FlowResult, RedmineSetupApi, SetupFlowDeps } from './config-flow.js';
import type { HttpResponse, HttpSession } from '../../integrations/redmine/session.js';
import { RedmineConnectionError } from '../../integrations/redmine/errors.js';
import type { Logger } from '../../types/index.js';

// =============================================================================
// FIXTURES
// =============================================================================

function makeResponse(status: number, body: unknown = {}): HttpResponse {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: '',
    text: () => Promise.resolve(text),
  };
}

type Routes = Record<string, HttpResponse | Error>;

function makeRoutes(overrides: Routes = {}): Routes {
  return {
    '/users/current.json': makeResponse(200, { user: { id: 1, login: 'admin' } }),
    '/projects.json': makeResponse(200, {
      projects: [
        { id: 1, name: 'Home', identifier: 'home' },
        { id: 2, name: 'Garage', identifier: 'garage' },
      ],
    }),
    '/trackers.json': makeResponse(200, {
      trackers: [{ id: 1, name: 'Bug' }, { id: 2, name: 'Feature' }],
    }),
    '/issue_priorities.json': makeResponse(200, {
      issue_priorities: [
        { id: 1, name: 'Low' },
        { id: 2, name: 'Normal', is_default: true },
        { id: 3, name: 'High' },
      ],
    }),
    ...overrides,
  };
}

/** A session that answers by request path */
function makeSession(routes: Routes) {
  const fetch = vi.fn<HttpSession['fetch']>(async (url) => {
    const route = routes[new URL(url).pathname];
    if (route === undefined) throw new TypeError('fetch failed');
    if (route instanceof Error) throw route;
    return route;
  });
  const session: HttpSession = {
    fetch,
    close: vi.fn<HttpSession['close']>().mockResolvedValue(undefined),
  };
  return { session, fetch };
}

function makeLog(): Logger {
  return { debug: vi.fn(), info: vi.fn(), error: vi.fn() };
}

function makeFlow(routes: Routes = makeRoutes(), overrides: Partial<SetupFlowDeps> = {}) {
  const { session, fetch } = makeSession(routes);
  const log = makeLog();
  const flow = new RedmineSetupFlow({
    session,
    isConfigured: () => false,
    log,
    ...overrides,
  });
  return { flow, fetch, log };
}

const CREDENTIALS = { redmine_url: 'https://redmine.example.com', api_key: 'test-api-key' };

function expectForm(result: FlowResult) {
  if (result.type !== 'form') {
    throw new Error(`expected a form, got ${result.type}`);
  }
  return result;
}

// =============================================================================
// TESTS: credentials step
// =============================================================================

describe('RedmineSetupFlow', () => {
  describe('stepUser', () => {
    it('shows the credentials form', async () => {
      const { flow, fetch } = makeFlow();
      const result = await flow.stepUser();

      expect(result).toEqual({
        type: 'form',
        stepId: 'user',
        fields: [
          { name: 'redmine_url', type: 'text', required: true, suggested: undefined },
          { name: 'api_key', type: 'password', required: true },
        ],
        errors: {},
      });
      expect(fetch).not.toHaveBeenCalled();
    });

    it('moves to the defaults form after validating and fetching options', async () => {
      const { flow } = makeFlow();
      const result = expectForm(await flow.stepUser(CREDENTIALS));

      expect(result.stepId).toBe('defaults');
      expect(result.errors).toEqual({});
      expect(result.fields).toEqual([
        {
          name: 'default_project_id',
          type: 'select',
          required: true,
          options: [{ value: 'home', label: 'Home' }, { value: 'garage', label: 'Garage' }],
        },
        {
          name: 'default_tracker_id',
          type: 'select',
          required: true,
          options: [{ value: '1', label: 'Bug' }, { value: '2', label: 'Feature' }],
          suggested: '1',
        },
        {
          name: 'default_priority_id',
          type: 'select',
          required: true,
          options: [{ value: '1', label: 'Low' }, { value: '2', label: 'Normal' }, { value: '3', label: 'High' }],
          suggested: '2',
        },
      ]);
      expect(flow.currentStep).toBe('defaults');
    });

    it('validates first, then fetches the lists one after another', async () => {
      const { flow, fetch } = makeFlow();
      await flow.stepUser(CREDENTIALS);

      expect(fetch.mock.calls.map(c => c[0])).toEqual([
        'https://redmine.example.com/users/current.json',
        'https://redmine.example.com/projects.json',
        'https://redmine.example.com/trackers.json',
        'https://redmine.example.com/issue_priorities.json',
      ]);
    });

    it('normalizes the URL before calling the server', async () => {
      const { flow, fetch } = makeFlow();
      await flow.stepUser({ redmine_url: 'redmine.example.com//', api_key: 'test-api-key' });

      expect(fetch.mock.calls[0][0]).toBe('http://redmine.example.com/users/current.json');
    });

    it('flags the API key on an auth failure', async () => {
      const { flow, fetch } = makeFlow(makeRoutes({ '/users/current.json': makeResponse(401) }));
      const result = expectForm(await flow.stepUser({ redmine_url: 'redmine.example.com/', api_key: 'wrong' }));

      expect(result.stepId).toBe('user');
      expect(result.errors).toEqual({ api_key: 'invalid_auth' });
      expect(result.fields[0]).toEqual({ name: 'redmine_url', type: 'text', required: true, suggested: 'redmine.example.com/' });
      expect(fetch).toHaveBeenCalledTimes(1);
      expect(flow.currentStep).toBe('user');
    });

    it('flags the URL on a connection failure', async () => {
      const { flow, log } = makeFlow(makeRoutes({ '/users/current.json': makeResponse(500) }));
      const result = expectForm(await flow.stepUser(CREDENTIALS));

      expect(result.stepId).toBe('user');
      expect(result.errors).toEqual({ redmine_url: 'cannot_connect' });
      expect(log.error).toHaveBeenCalledWith('Connection failed to https://redmine.example.com: API error: 500');
    });

    it('flags the URL when the server cannot be reached', async () => {
      const { flow } = makeFlow(makeRoutes({ '/users/current.json': new TypeError('fetch failed') }));
      const result = expectForm(await flow.stepUser(CREDENTIALS));

      expect(result.errors).toEqual({ redmine_url: 'cannot_connect' });
    });

    it('reports an unexpected failure on the whole form', async () => {
      const client: RedmineSetupApi = {
        validateConnection: vi.fn().mockRejectedValue(new Error('boom')),
        listProjects: vi.fn(),
        listTrackers: vi.fn(),
        listPriorities: vi.fn(),
      };
      const { flow, log } = makeFlow(makeRoutes(), { createClient: () => client });
      const result = expectForm(await flow.stepUser(CREDENTIALS));

      expect(result.stepId).toBe('user');
      expect(result.errors).toEqual({ base: 'unknown' });
      expect(log.error).toHaveBeenCalledWith('Unexpected exception: boom');
    });

    it('reports cannot_fetch_options when a list fails', async () => {
      const { flow, fetch } = makeFlow(makeRoutes({ '/trackers.json': makeResponse(500) }));
      const result = expectForm(await flow.stepUser(CREDENTIALS));

      expect(result.stepId).toBe('user');
      expect(result.errors).toEqual({ base: 'cannot_fetch_options' });
      expect(fetch).toHaveBeenCalledTimes(3);
      expect(flow.currentStep).toBe('user');
    });

    it('reports unknown when a list fails unexpectedly', async () => {
      const client: RedmineSetupApi = {
        validateConnection: vi.fn().mockResolvedValue(true),
        listProjects: vi.fn().mockRejectedValue(new RangeError('bad list')),
        listTrackers: vi.fn(),
        listPriorities: vi.fn(),
      };
      const { flow } = makeFlow(makeRoutes(), { createClient: () => client });
      const result = expectForm(await flow.stepUser(CREDENTIALS));

      expect(result.errors).toEqual({ base: 'unknown' });
    });

    it('validates again when the user retries', async () => {
      const routes = makeRoutes({ '/users/current.json': makeResponse(401) });
      const { flow, fetch } = makeFlow(routes);

      expectForm(await flow.stepUser({ ...CREDENTIALS, api_key: 'wrong' }));
      routes['/users/current.json'] = makeResponse(200, { user: { login: 'admin' } });
      const result = expectForm(await flow.stepUser(CREDENTIALS));

      expect(result.stepId).toBe('defaults');
      expect(fetch.mock.calls.filter(c => c[0].endsWith('/users/current.json'))).toHaveLength(2);
      expect(fetch.mock.calls[1][1].headers['X-Redmine-API-Key']).toBe('test-api-key');
    });

    it('aborts when the URL is already configured', async () => {
      const isConfigured = vi.fn((uniqueId: string) => uniqueId === 'https://redmine.example.com');
      const { flow, fetch } = makeFlow(makeRoutes(), { isConfigured });

      const result = await flow.stepUser({ redmine_url: 'https://redmine.example.com/', api_key: 'test-api-key' });
      expect(result).toEqual({ type: 'abort', reason: 'already_configured' });
      expect(isConfigured).toHaveBeenCalledWith('https://redmine.example.com');
      expect(fetch).toHaveBeenCalledTimes(1);
    });
  });

  // ===========================================================================
  // TESTS: defaults step
  // ===========================================================================

  describe('stepDefaults', () => {
    it('aborts without validated credentials', async () => {
      const { flow } = makeFlow();
      expect(await flow.stepDefaults({ default_project_id: 'home' })).toEqual({
        type: 'abort',
        reason: 'missing_credentials',
      });
    });

    it('creates the entry from the chosen values', async () => {
      const { flow } = makeFlow();
      await flow.stepUser({ redmine_url: 'redmine.example.com/', api_key: 'test-api-key' });

      const result = await flow.stepDefaults({
        default_project_id: 'garage',
        default_tracker_id: '2',
        default_priority_id: '3',
      });

      expect(result).toEqual({
        type: 'create_entry',
        title: 'Redmine (http://redmine.example.com)',
        uniqueId: 'http://redmine.example.com',
        data: {
          redmine_url: 'http://redmine.example.com',
          api_key: 'test-api-key',
          default_project_id: 'garage',
          default_tracker_id: 2,
          default_priority_id: 3,
        },
      });
    });

    it('falls back to the suggested tracker and priority', async () => {
      const { flow } = makeFlow();
      await flow.stepUser(CREDENTIALS);

      const result = await flow.stepDefaults({ default_project_id: 'home' });
      expect(result.type).toBe('create_entry');
      if (result.type === 'create_entry') {
        expect(result.data.default_tracker_id).toBe(1);
        expect(result.data.default_priority_id).toBe(2);
      }
    });

    it('suggests Normal when the server lists no priorities', async () => {
      const { flow } = makeFlow(makeRoutes({
        '/issue_priorities.json': makeResponse(200, { issue_priorities: [] }),
      }));
      const form = expectForm(await flow.stepUser(CREDENTIALS));

      expect(form.fields[2]).toEqual({
        name: 'default_priority_id',
        type: 'select',
        required: true,
        options: [],
        suggested: '2',
      });
    });

    it('requires a project', async () => {
      const { flow } = makeFlow();
      await flow.stepUser(CREDENTIALS);

      const result = expectForm(await flow.stepDefaults({ default_tracker_id: 1 }));
      expect(result.stepId).toBe('defaults');
      expect(result.errors).toEqual({ default_project_id: 'required' });
    });

    it('rejects values that were not offered', async () => {
      const { flow } = makeFlow();
      await flow.stepUser(CREDENTIALS);

      const result = expectForm(await flow.stepDefaults({
        default_project_id: 'attic',
        default_tracker_id: '9',
        default_priority_id: 2,
      }));
      expect(result.errors).toEqual({
        default_project_id: 'invalid_selection',
        default_tracker_id: 'invalid_selection',
      });
    });

    it('rejects ids that are not positive integers', async () => {
      const { flow } = makeFlow();
      await flow.stepUser(CREDENTIALS);

      const result = expectForm(await flow.stepDefaults({
        default_project_id: 'home',
        default_tracker_id: 'bug',
        default_priority_id: '0',
      }));
      expect(result.errors).toEqual({
        default_tracker_id: 'invalid_selection',
        default_priority_id: 'invalid_selection',
      });
    });

    it('aborts if the URL was configured while the form was open', async () => {
      const isConfigured = vi.fn().mockReturnValueOnce(false).mockReturnValueOnce(true);
      const { flow } = makeFlow(makeRoutes(), { isConfigured });
      await flow.stepUser(CREDENTIALS);

      expect(await flow.stepDefaults({ default_project_id: 'home' })).toEqual({
        type: 'abort',
        reason: 'already_configured',
      });
    });
  });

  // ===========================================================================
  // TESTS: duplicate installations
  // ===========================================================================

  describe('duplicate detection', () => {
    it('aborts a second setup of the same normalized URL', async () => {
      const configured = new Set<string>();
      const isConfigured = (uniqueId: string) => configured.has(uniqueId);

      const first = makeFlow(makeRoutes(), { isConfigured }).flow;
      await first.stepUser({ redmine_url: 'redmine.example.com', api_key: 'test-api-key' });
      const entry = await first.stepDefaults({ default_project_id: 'home' });
      if (entry.type !== 'create_entry') throw new Error('first setup did not finish');
      configured.add(entry.uniqueId);

      const second = makeFlow(makeRoutes(), { isConfigured }).flow;
      const result = await second.stepUser({ redmine_url: 'http://redmine.example.com///', api_key: 'test-api-key' });

      expect(result).toEqual({ type: 'abort', reason: 'already_configured' });
      expect(configured.size).toBe(1);
    });
  });
});

// =============================================================================
// TESTS: fetchReferenceData
// =============================================================================

describe('fetchReferenceData', () => {
  it('stops at the first failing list', async () => {
    const client: RedmineSetupApi = {
      validateConnection: vi.fn(),
      listProjects: vi.fn().mockResolvedValue([]),
      listTrackers: vi.fn().mockRejectedValue(new RedmineConnectionError('API error: 500')),
      listPriorities: vi.fn(),
    };

    await expect(fetchReferenceData(client)).rejects.toBeInstanceOf(RedmineConnectionError);
    expect(client.listPriorities).not.toHaveBeenCalled();
  });
});
