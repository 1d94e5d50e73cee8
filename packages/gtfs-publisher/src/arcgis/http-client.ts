/**
 * Portal HTTP Client
 *
 * Posts form or multipart requests to the portal REST API and validates the
 * JSON that comes back.
 *
 * Every failure surfaces as a RemoteCallError:
 * - transport failure (DNS, connection reset), including while reading the body
 * - non-2xx status
 * - a 200 response carrying an `{ error }` body, which the portal uses for
 *   most application errors
 * - a body that is not JSON or does not match the expected schema
 *
 * There are no retries and no client-side timeout: a failed call is final.
 */

import type { z } from 'zod';
import { RemoteCallError, toError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import { PortalErrorSchema } from './schemas.js';

const log = createLogger({ module: 'portal-http' });

export type FormValue = string | number | boolean;

export interface PortalHttpClientConfig {
  /** Token appended to every request */
  readonly token: string;

  /** User-Agent header */
  readonly userAgent: string;

  /** fetch implementation, injectable for tests */
  readonly fetch: typeof fetch;
}

export class PortalHttpClient {
  private readonly config: PortalHttpClientConfig;

  constructor(config: Pick<PortalHttpClientConfig, 'token'> & Partial<PortalHttpClientConfig>) {
    this.config = {
      userAgent: 'gtfs-publisher/0.1',
      fetch: globalThis.fetch,
      ...config,
    };
  }

  /**
   * POST url-encoded parameters and parse the response
   *
   * @param operation - Name used in error messages and logs
   */
  async postForm<S extends z.ZodTypeAny>(
    operation: string,
    url: string,
    params: Readonly<Record<string, FormValue>>,
    schema: S
  ): Promise<z.infer<S>> {
    const body = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      body.set(key, String(value));
    }
    body.set('f', 'json');
    body.set('token', this.config.token);

    return this.send(operation, url, body, schema);
  }

  /**
   * POST multipart form data (file uploads) and parse the response
   */
  async postMultipart<S extends z.ZodTypeAny>(
    operation: string,
    url: string,
    form: FormData,
    schema: S
  ): Promise<z.infer<S>> {
    form.set('f', 'json');
    form.set('token', this.config.token);
    return this.send(operation, url, form, schema);
  }

  private async send<S extends z.ZodTypeAny>(
    operation: string,
    url: string,
    body: URLSearchParams | FormData,
    schema: S
  ): Promise<z.infer<S>> {
    log.debug('Portal request', { operation, url });

    let response: Response;
    try {
      response = await this.config.fetch(url, {
        method: 'POST',
        headers: { 'User-Agent': this.config.userAgent },
        body,
      });
    } catch (error) {
      throw new RemoteCallError(operation, `network error: ${toError(error).message}`);
    }

    if (!response.ok) {
      throw new RemoteCallError(operation, `HTTP ${response.status} ${response.statusText}`.trim(), response.status);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new RemoteCallError(operation, `failed to read response: ${toError(error).message}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new RemoteCallError(operation, `invalid JSON response: ${toError(error).message}`);
    }

    const portalError = PortalErrorSchema.safeParse(data);
    if (portalError.success) {
      const { code, message, details } = portalError.data.error;
      throw new RemoteCallError(operation, message ?? 'unknown portal error', code, details ?? []);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new RemoteCallError(
        operation,
        'unexpected response shape',
        undefined,
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    return parsed.data;
  }
}
