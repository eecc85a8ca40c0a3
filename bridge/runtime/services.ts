/**
 * Service registry
 *
 * The host side of service calls: handlers are registered under
 * `domain.service` together with the schema their call data must satisfy.
 */

import type { z } from 'zod';
import { SERVICE_ERRORS, translate } from './strings.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ServiceCall<T> {
  domain: string;
  service: string;
  data: T;
}

export type ServiceResponse = Record<string, unknown> | undefined;

export type ServiceHandler<T> = (call: ServiceCall<T>) => Promise<ServiceResponse>;

// =============================================================================
// ERRORS
// =============================================================================

/**
 * A service call that failed in a way the caller can act on. Carries a
 * message key from SERVICE_ERRORS and its placeholders.
 */
export class ServiceValidationError extends Error {
  readonly translationKey: string;
  readonly placeholders: Record<string, string>;

  constructor(translationKey: string, placeholders: Record<string, string> = {}, options?: { cause?: unknown }) {
    super(translate(SERVICE_ERRORS, translationKey, placeholders), options);
    this.name = 'ServiceValidationError';
    this.translationKey = translationKey;
    this.placeholders = placeholders;
  }
}

export class ServiceNotFoundError extends Error {
  constructor(domain: string, service: string) {
    super(`Service ${domain}.${service} not found`);
    this.name = 'ServiceNotFoundError';
  }
}

// =============================================================================
// REGISTRY
// =============================================================================

export class ServiceRegistry {
  private services = new Map<string, (data: unknown) => Promise<ServiceResponse>>();

  hasService(domain: string, service: string): boolean {
    return this.services.has(key(domain, service));
  }

  /** Register (or replace) a handler. */
  register<T>(
    domain: string,
    service: string,
    handler: ServiceHandler<T>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): void {
    this.services.set(key(domain, service), async (data: unknown) => {
      const parsed = schema.safeParse(data);
      if (!parsed.success) {
        const detail = parsed.error.issues
          .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
          .join('; ');
        throw new ServiceValidationError('invalid_service_data', { error: detail });
      }
      return handler({ domain, service, data: parsed.data });
    });
  }

  remove(domain: string, service: string): boolean {
    return this.services.delete(key(domain, service));
  }

  async call(domain: string, service: string, data: unknown): Promise<ServiceResponse> {
    const invoke = this.services.get(key(domain, service));
    if (!invoke) {
      throw new ServiceNotFoundError(domain, service);
    }
    return invoke(data);
  }

  list(): string[] {
    return Array.from(this.services.keys());
  }
}

function key(domain: string, service: string): string {
  return `${domain}.${service}`;
}
