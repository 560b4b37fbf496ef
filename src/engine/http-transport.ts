/**
 * HTTP transport - sends one resolved request and captures the raw response.
 *
 * Any status code counts as a response; only failures to get one
 * (network errors, timeouts, cancellation) are errors.
 */

import type { HttpMethod, TemplateValue } from '@/shared/types/project-types';
import type { HttpResponseData } from '@/shared/types/record-types';
import { TransportError } from '../shared/errors';
import { toErrorMessage } from '../shared/error-utils';

/** Methods that carry a JSON body when one is defined */
const BODY_METHODS: ReadonlySet<HttpMethod> = new Set<HttpMethod>(['POST', 'PUT', 'PATCH']);

export interface HttpCall {
  method: HttpMethod;
  url: string;
  headers: Readonly<Record<string, string>>;
  body?: TemplateValue;
}

export interface SendOptions {
  /** 0 or undefined disables the timeout */
  timeoutMs?: number;
  /** Operator cancellation */
  signal?: AbortSignal;
}

export interface HttpTransport {
  send(call: HttpCall, options?: SendOptions): Promise<HttpResponseData>;
}

/**
 * Parse a response body as JSON, keeping the raw text when it is not JSON.
 */
export function parseBody(text: string): { body: unknown; parseError?: string } {
  if (text === '') {
    return { body: '' };
  }

  try {
    const body: unknown = JSON.parse(text);
    return { body };
  } catch {
    return text === 'null'
      ? { body: null }
      : { body: text, parseError: `invalid JSON response: ${text}` };
  }
}

/**
 * Transport backed by the runtime's fetch.
 */
export class FetchTransport implements HttpTransport {
  async send(call: HttpCall, options: SendOptions = {}): Promise<HttpResponseData> {
    const controller = new AbortController();
    let timedOut = false;

    const onCancel = () => controller.abort();
    if (options.signal?.aborted) {
      throw new TransportError('aborted', call.url, 'Request cancelled before it was sent');
    }
    options.signal?.addEventListener('abort', onCancel, { once: true });

    const timeoutId = options.timeoutMs && options.timeoutMs > 0
      ? setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, options.timeoutMs)
      : undefined;

    const headers: Record<string, string> = { ...call.headers };
    let payload: string | undefined;
    if (call.body !== undefined && BODY_METHODS.has(call.method)) {
      payload = JSON.stringify(call.body);
      if (!Object.keys(headers).some(name => name.toLowerCase() === 'content-type')) {
        headers['content-type'] = 'application/json';
      }
    }

    const start = Date.now();
    try {
      const response = await fetch(call.url, {
        method: call.method,
        headers,
        body: payload,
        signal: controller.signal,
      });
      const text = await response.text();
      const durationMs = Date.now() - start;

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        responseHeaders[name] = value;
      });

      const parsed = parseBody(text);
      return {
        status: response.status,
        statusText: response.statusText,
        headers: responseHeaders,
        body: parsed.body,
        text,
        durationMs,
        ...(parsed.parseError !== undefined ? { parseError: parsed.parseError } : {}),
      };
    } catch (error: unknown) {
      if (timedOut) {
        throw new TransportError('timeout', call.url, `no response after ${options.timeoutMs}ms: ${call.url}`);
      }
      if (options.signal?.aborted) {
        throw new TransportError('aborted', call.url, 'Request cancelled while waiting for the response');
      }
      throw new TransportError('network', call.url, describeNetworkError(error));
    } finally {
      if (timeoutId !== undefined) clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onCancel);
    }
  }
}

/**
 * fetch reports most failures as `TypeError: fetch failed` with the useful part in `cause`.
 */
function describeNetworkError(error: unknown): string {
  const message = toErrorMessage(error);
  if (error instanceof Error && error.cause !== undefined) {
    return `${message} (${toErrorMessage(error.cause)})`;
  }
  return message;
}
