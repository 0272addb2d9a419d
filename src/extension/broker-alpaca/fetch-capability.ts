/**
 * Fetch-backed host HTTP capability
 *
 * Node implementation of the capability a host hands the plugin, used by the
 * development host. Each exchange gets its own AbortController deadline taken
 * from the request's timeout_ms. Transport failures are answered with an
 * encoded status-0 response rather than a rejection.
 */

import { describeError, httpRequestSchema, type HostHttp, type HttpResponse } from './http.js';

export interface FetchCapabilityOptions {
  /** Injectable for testing */
  fetchFn?: typeof globalThis.fetch;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function createFetchCapability(options: FetchCapabilityOptions = {}): HostHttp {
  const fetchFn = options.fetchFn ?? globalThis.fetch;

  return async (payload: Uint8Array): Promise<Uint8Array> => {
    const request = httpRequestSchema.parse(JSON.parse(decoder.decode(payload)));

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), request.timeout_ms);

    let response: HttpResponse;
    try {
      const res = await fetchFn(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body ?? undefined,
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      res.headers.forEach((value, key) => {
        headers[key] = value;
      });

      response = { status: res.status, headers, body: await res.text(), error: null };
    } catch (err) {
      const error = err instanceof Error && err.name === 'AbortError'
        ? `Request timed out after ${request.timeout_ms}ms: ${request.method} ${request.url}`
        : describeError(err);
      response = { status: 0, headers: {}, body: '', error };
    } finally {
      clearTimeout(timer);
    }

    return encoder.encode(JSON.stringify(response));
  };
}
