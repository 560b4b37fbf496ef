/**
 * HTTP exchange types for the mock server.
 * Canned responses the mock fetch serves to the request runner under test.
 */

/** A single canned HTTP exchange */
export interface HttpExchange {
  id: string;
  method: string;
  /** URL path pattern; `*` matches one path segment */
  urlPattern: string;
  /** Query parameter patterns for matching (subset match, `*` matches any value) */
  queryPatterns?: Record<string, string>;
  /** Response status code */
  status: number;
  /** JSON response body */
  body?: unknown;
  /** Raw response text; takes precedence over `body` */
  text?: string;
  /** Response headers */
  headers?: Record<string, string>;
  /** Fail like an unreachable host instead of responding */
  failure?: 'network';
  /** Never respond; the request only ends when its signal aborts */
  hang?: boolean;
  /** Called with the request just before the response is returned */
  onRequest?: (request: RecordedRequest) => void;
}

/** A named group of exchanges */
export interface HttpScenario {
  name: string;
  exchanges: HttpExchange[];
}

/** Result from HTTP mock matching */
export interface HttpMatchResult {
  exchange: HttpExchange;
  body: string;
  status: number;
  headers: Record<string, string>;
}

/** A request as the mock received it */
export interface RecordedRequest {
  method: string;
  url: string;
  pathname: string;
  query: Record<string, string>;
  /** Header names are lower case */
  headers: Record<string, string>;
  body?: string;
}
