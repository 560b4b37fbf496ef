/**
 * HTTP URL pattern matcher for the mock server.
 * Serves canned exchanges through a fetch-compatible `handle()` and records every request.
 */

import type { HttpExchange, HttpScenario, HttpMatchResult, RecordedRequest } from './types/http-exchange-types';

function abortError(): Error {
  const error = new Error('This operation was aborted');
  error.name = 'AbortError';
  return error;
}

/** Settles only when the signal aborts */
function waitForAbort(signal: AbortSignal | null | undefined): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (!signal) return;
    if (signal.aborted) {
      reject(abortError());
      return;
    }
    signal.addEventListener('abort', () => reject(abortError()), { once: true });
  });
}

/**
 * HttpMock - matches HTTP requests to canned exchanges.
 */
export class HttpMock {
  private exchanges: HttpExchange[] = [];
  private requests: RecordedRequest[] = [];

  addScenario(scenario: HttpScenario): void {
    this.exchanges.push(...scenario.exchanges);
  }

  addExchange(exchange: HttpExchange): void {
    this.exchanges.push(exchange);
  }

  match(method: string, url: string): HttpMatchResult | null {
    const { pathname, queryParams } = this.parseUrl(url);

    for (const ex of this.exchanges) {
      if (ex.method.toUpperCase() !== method.toUpperCase()) continue;
      if (!this.pathMatches(pathname, ex.urlPattern)) continue;
      if (ex.queryPatterns && !this.queryMatches(queryParams, ex.queryPatterns)) continue;

      const isText = ex.text !== undefined;
      return {
        exchange: ex,
        body: ex.text ?? (ex.body === undefined ? '' : JSON.stringify(ex.body)),
        status: ex.status,
        headers: {
          ...(isText || ex.body === undefined ? {} : { 'content-type': 'application/json' }),
          ...ex.headers,
        },
      };
    }

    return null;
  }

  /**
   * fetch-compatible entry point. Unmatched requests get a 404.
   */
  async handle(input: string | URL | Request, init: RequestInit = {}): Promise<Response> {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const method = (init.method ?? 'GET').toUpperCase();
    const recorded = this.record(method, url, init);

    if (init.signal?.aborted) {
      throw abortError();
    }

    const result = this.match(method, url);
    if (!result) {
      return new Response(JSON.stringify({ error: `No exchange for ${method} ${recorded.pathname}` }), {
        status: 404,
        headers: { 'content-type': 'application/json' },
      });
    }

    const exchange = result.exchange;
    if (exchange.failure === 'network') {
      throw new TypeError('fetch failed', { cause: new Error(`connect ECONNREFUSED ${new URL(url).host}`) });
    }
    if (exchange.hang) {
      return waitForAbort(init.signal);
    }

    exchange.onRequest?.(recorded);
    // Null-body statuses (204, 304) reject any body, even an empty one
    return new Response(result.body === '' ? null : result.body, {
      status: result.status,
      headers: result.headers,
    });
  }

  getRequests(): RecordedRequest[] {
    return [...this.requests];
  }

  getLastRequest(): RecordedRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  getExchangeCount(): number {
    return this.exchanges.length;
  }

  reset(): void {
    this.exchanges = [];
    this.requests = [];
  }

  private record(method: string, url: string, init: RequestInit): RecordedRequest {
    const { pathname, queryParams } = this.parseUrl(url);
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, name) => {
      headers[name] = value;
    });

    const recorded: RecordedRequest = {
      method,
      url,
      pathname,
      query: Object.fromEntries(queryParams),
      headers,
      ...(typeof init.body === 'string' ? { body: init.body } : {}),
    };
    this.requests.push(recorded);
    return recorded;
  }

  private parseUrl(url: string): { pathname: string; queryParams: Map<string, string> } {
    const parsed = new URL(url);
    return { pathname: parsed.pathname.toLowerCase(), queryParams: new Map(parsed.searchParams) };
  }

  private pathMatches(requestPath: string, pattern: string): boolean {
    const normalizedPattern = pattern.toLowerCase().split('?')[0];

    // Exact match
    if (requestPath === normalizedPattern) return true;

    // Wildcard match: pattern contains *
    if (normalizedPattern.includes('*')) {
      const regex = new RegExp(
        '^' + normalizedPattern.replace(/\*/g, '[^/]*') + '$'
      );
      return regex.test(requestPath);
    }

    return false;
  }

  private queryMatches(
    actual: Map<string, string>,
    patterns: Record<string, string>
  ): boolean {
    // All pattern keys must be present in actual (subset match)
    for (const [key, expectedValue] of Object.entries(patterns)) {
      const actualValue = actual.get(key);
      if (actualValue === undefined) return false;
      if (expectedValue !== '*' && actualValue !== expectedValue) return false;
    }
    return true;
  }
}
