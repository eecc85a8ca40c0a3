/**
 * Shared HTTP session
 *
 * The host owns one session and lends it to every RedmineClient. The
 * client never creates or closes it.
 */

import { Agent, fetch as undiciFetch } from 'undici';
import type { Dispatcher } from 'undici';

// =============================================================================
// TYPES
// =============================================================================

export interface HttpRequestInit {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export interface HttpSession {
  fetch(url: string, init: HttpRequestInit): Promise<HttpResponse>;
  /** Release pooled connections. Only the session's owner calls this. */
  close(): Promise<void>;
}

export interface HttpSessionOptions {
  /**
   * Verify TLS certificates. Off by default: Redmine is usually
   * self-hosted, often behind a self-signed certificate.
   */
  verifySsl?: boolean;
  /** Use this dispatcher instead of building a keep-alive Agent */
  dispatcher?: Dispatcher;
}

export const DEFAULT_VERIFY_SSL = false;

const KEEP_ALIVE_TIMEOUT_MS = 30_000;

// =============================================================================
// FACTORY
// =============================================================================

export function createHttpSession(options: HttpSessionOptions = {}): HttpSession {
  const verifySsl = options.verifySsl ?? DEFAULT_VERIFY_SSL;
  const dispatcher = options.dispatcher ?? new Agent({
    keepAliveTimeout: KEEP_ALIVE_TIMEOUT_MS,
    connect: { rejectUnauthorized: verifySsl },
  });

  return {
    fetch: (url, init) => undiciFetch(url, { ...init, dispatcher }),
    close: async () => {
      await dispatcher.close();
    },
  };
}
