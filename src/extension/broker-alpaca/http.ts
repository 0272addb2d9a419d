/**
 * HTTP transport shim
 *
 * The plugin does no network I/O of its own. The host hands it a capability
 * that takes a JSON-encoded request and answers with a JSON-encoded response;
 * this module wraps that exchange so callers always get a response back.
 */

import { z, ZodError } from 'zod';

export const httpRequestSchema = z.object({
  method: z.enum(['GET', 'POST', 'PUT', 'DELETE']),
  url: z.string(),
  headers: z.record(z.string(), z.string()),
  body: z.string().nullable(),
  timeout_ms: z.number().int().positive(),
});

export type HttpRequest = z.infer<typeof httpRequestSchema>;
export type HttpMethod = HttpRequest['method'];

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
  /** Set when the exchange itself failed (status is then 0) */
  error: string | null;
}

/** Host-provided capability: encoded HttpRequest in, encoded HttpResponse out */
export type HostHttp = (request: Uint8Array) => Promise<Uint8Array>;

const httpResponseSchema = z.object({
  status: z.number().int(),
  headers: z.record(z.string(), z.string()).default({}),
  body: z.string(),
  error: z.string().nullish(),
});

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Max body characters echoed back in a decode error */
const BODY_PREVIEW_CHARS = 200;

export function describeError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}

function failedResponse(error: string): HttpResponse {
  return { status: 0, headers: {}, body: '', error };
}

/**
 * Run one exchange through the host. Never rejects: a failed call or an
 * undecodable reply comes back as status 0 with `error` populated.
 */
export async function execute(host: HostHttp, request: HttpRequest): Promise<HttpResponse> {
  let reply: Uint8Array;
  try {
    reply = await host(encoder.encode(JSON.stringify(request)));
  } catch (err) {
    return failedResponse(`HTTP request failed: ${describeError(err)}`);
  }

  try {
    const parsed = httpResponseSchema.parse(JSON.parse(decoder.decode(reply)));
    return {
      status: parsed.status,
      headers: parsed.headers,
      body: parsed.body,
      error: parsed.error ?? null,
    };
  } catch (err) {
    return failedResponse(`Failed to parse response: ${describeError(err)}`);
  }
}

export function isSuccess(response: HttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

/** Decode the body into the schema's shape, or throw with a preview of the body */
export function parseJsonBody<S extends z.ZodTypeAny>(response: HttpResponse, schema: S): z.infer<S> {
  try {
    return schema.parse(JSON.parse(response.body));
  } catch (err) {
    throw new Error(
      `JSON parse error: ${describeError(err)} - body: ${response.body.slice(0, BODY_PREVIEW_CHARS)}`,
    );
  }
}
