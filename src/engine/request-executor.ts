/**
 * RequestExecutor - runs one HTTP request definition end to end.
 *
 *   1. snapshot the variables
 *   2. resolve api base, endpoint, headers, params and body against the snapshot
 *   3. compose the URL
 *   4. send (no retry)
 *   5. on any response, apply the named callback to the live store
 *   6. return the ExecutionResult; appending it to the log is the caller's job
 *
 * Failures local to the request come back inside the result and never touch the store.
 */

import type { HttpRequestDefinition, ResolvedRequest } from '@/shared/types/project-types';
import type { CallbackReport, ExecutionResult, ExecutionStatus, HttpResponseData } from '@/shared/types/record-types';
import { config } from '../shared/config';
import { ERROR_TransportFailure, ERROR_UnboundVariable } from '../shared/error-codes';
import { RequestCancelledError } from '../shared/errors';
import { toErrorDetail, type ErrorDetail } from '../shared/error-utils';
import { createLogger } from '../shared/logger';
import { FetchTransport, type HttpTransport } from './http-transport';
import { deepFreeze, type Project } from './project';
import { resolveLabel, resolveRecord, resolveString, resolveValue } from './template-resolver';
import type { VariableLookup, VariableStore } from './variable-store';

const logger = createLogger('RequestExecutor');

export interface ExecuteOptions {
  /** Operator cancellation; once aborted no callback runs */
  signal?: AbortSignal;
  /** Overrides the configured timeout for this call */
  timeoutMs?: number;
}

export interface RequestExecutorOptions {
  transport?: HttpTransport;
  timeoutMs?: number;
}

/**
 * Append query parameters to a URL that may already carry a query string.
 */
export function composeUrl(apiBase: string, endpoint: string, params: Readonly<Record<string, string>>): string {
  const url = apiBase + endpoint;
  const query = new URLSearchParams(params).toString();
  if (!query) return url;
  return url + (url.includes('?') ? '&' : '?') + query;
}

/**
 * Resolve every templated field of a definition against one variable snapshot.
 * Throws UnboundVariableError on the first missing variable; nothing partial is returned.
 */
export function resolveRequest(
  definition: HttpRequestDefinition,
  apiBase: string,
  vars: VariableLookup,
): ResolvedRequest {
  const base = resolveString(apiBase, vars, 'api_base');
  const endpoint = resolveString(definition.endpoint, vars, 'endpoint');
  const headers = resolveRecord(definition.headers, vars, 'headers');
  const params = resolveRecord(definition.params, vars, 'params');
  const body = definition.body === undefined ? undefined : resolveValue(definition.body, vars, 'body');

  return {
    desc: resolveLabel(definition.desc, vars),
    method: definition.method,
    apiBase: base,
    endpoint,
    url: composeUrl(base, endpoint, params),
    headers,
    params,
    ...(body !== undefined ? { body } : {}),
  };
}

interface ResultFields {
  status: ExecutionStatus;
  endpoint: string;
  request: ResolvedRequest | null;
  response: HttpResponseData | null;
  error?: ErrorDetail;
  callback?: CallbackReport;
}

function buildResult(definition: HttpRequestDefinition, timestamp: string, fields: ResultFields): ExecutionResult {
  return deepFreeze({
    kind: 'http' as const,
    description: fields.request?.desc ?? definition.desc,
    method: definition.method,
    endpointTemplate: definition.endpoint,
    endpoint: fields.endpoint,
    url: fields.request?.url ?? null,
    request: fields.request,
    status: fields.status,
    statusCode: fields.response?.status ?? null,
    response: fields.response,
    timestamp,
    ...(fields.error ? { error: fields.error } : {}),
    ...(fields.callback ? { callback: fields.callback } : {}),
  });
}

export class RequestExecutor {
  private transport: HttpTransport;
  private timeoutMs: number;

  constructor(options: RequestExecutorOptions = {}) {
    this.transport = options.transport ?? new FetchTransport();
    this.timeoutMs = options.timeoutMs ?? config.http.timeoutMs;
  }

  async execute(
    definition: HttpRequestDefinition,
    project: Project,
    variables: VariableStore,
    options: ExecuteOptions = {},
  ): Promise<ExecutionResult> {
    const timestamp = new Date().toISOString();
    const snapshot = variables.snapshot();

    let request: ResolvedRequest;
    try {
      request = resolveRequest(definition, project.apiBase, snapshot);
    } catch (err: unknown) {
      const error = toErrorDetail(err, ERROR_UnboundVariable);
      logger.warn(`${definition.desc}: ${error.message}`);
      return buildResult(definition, timestamp, {
        status: 'resolution-failed',
        endpoint: definition.endpoint,
        request: null,
        response: null,
        error,
      });
    }

    if (options.signal?.aborted) {
      return this.cancelled(definition, timestamp, request, null);
    }

    logger.debug(`Sending ${request.method} ${request.url}`);

    let response: HttpResponseData;
    try {
      response = await this.transport.send(
        { method: request.method, url: request.url, headers: request.headers, body: request.body },
        { signal: options.signal, timeoutMs: options.timeoutMs ?? this.timeoutMs },
      );
    } catch (err: unknown) {
      const error = toErrorDetail(err, ERROR_TransportFailure);
      if (options.signal?.aborted) {
        return this.cancelled(definition, timestamp, request, null);
      }
      logger.warn(`${definition.desc}: ${error.message}`);
      return buildResult(definition, timestamp, {
        status: 'transport-failed',
        endpoint: request.endpoint,
        request,
        response: null,
        error,
      });
    }

    logger.debug(`Received ${response.status} from ${request.url} in ${response.durationMs}ms`);

    // Cancelled while the response was in flight: keep it, but leave the store alone
    if (options.signal?.aborted) {
      return this.cancelled(definition, timestamp, request, response);
    }

    // The callback sees the objects that get logged; it may only write variables
    deepFreeze(request);
    deepFreeze(response);
    const callback = definition.callback
      ? this.applyCallback(definition.callback, project, request, response, variables)
      : undefined;

    return buildResult(definition, timestamp, {
      status: 'completed',
      endpoint: request.endpoint,
      request,
      response,
      callback,
    });
  }

  private applyCallback(
    name: string,
    project: Project,
    request: ResolvedRequest,
    response: HttpResponseData,
    variables: VariableStore,
  ): CallbackReport {
    const outcome = project.callbacks.invoke(name, request, response, variables);
    if (outcome.ok) {
      return { name, applied: true };
    }

    logger.error(`${request.desc}: ${outcome.error.message}`);
    return { name, applied: false, error: toErrorDetail(outcome.error, outcome.error.code) };
  }

  private cancelled(
    definition: HttpRequestDefinition,
    timestamp: string,
    request: ResolvedRequest,
    response: HttpResponseData | null,
  ): ExecutionResult {
    const error = new RequestCancelledError(definition.desc);
    logger.info(error.message);
    return buildResult(definition, timestamp, {
      status: 'cancelled',
      endpoint: request.endpoint,
      request,
      response,
      error: toErrorDetail(error, error.code),
    });
  }
}
