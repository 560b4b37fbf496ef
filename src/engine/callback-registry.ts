/**
 * CallbackRegistry - named response callbacks supplied by the host application.
 *
 * A callback receives the resolved request and the raw response and may only
 * call `variables.set(...)`. It runs synchronously against a staged copy of the
 * store: either all of its writes land or none do.
 */

import type { ResolvedRequest } from '@/shared/types/project-types';
import type { ExecutionResult, HttpResponseData } from '@/shared/types/record-types';
import { CallbackFailureError, ConfigInvalidError } from '../shared/errors';
import { toErrorMessage } from '../shared/error-utils';
import { createLogger } from '../shared/logger';
import type { VariableAccess, VariableStore } from './variable-store';

const logger = createLogger('CallbackRegistry');

export type ResponseCallback = (
  request: ResolvedRequest,
  response: HttpResponseData,
  variables: VariableAccess,
) => void;

/**
 * Computes the short instruction line shown under the request menu.
 * Returns null when there is nothing to show.
 */
export type MenuHint = (
  variables: ReadonlyMap<string, string>,
  lastResult: ExecutionResult | null,
) => string | null;

export type CallbackOutcome =
  | { ok: true }
  | { ok: false; error: CallbackFailureError };

/** A name referenced by a project, checked against the registry at load time */
export interface CallbackReference {
  name: string;
  kind: 'callback' | 'menu hint';
  /** Where the reference appears, e.g. `requests[2] (Create product)` */
  location: string;
}

export class CallbackRegistry {
  private callbacks: Map<string, ResponseCallback> = new Map();
  private menuHints: Map<string, MenuHint> = new Map();

  register(name: string, callback: ResponseCallback): this {
    if (this.callbacks.has(name)) {
      throw new Error(`Callback '${name}' is already registered`);
    }
    this.callbacks.set(name, callback);
    return this;
  }

  registerMenuHint(name: string, hint: MenuHint): this {
    if (this.menuHints.has(name)) {
      throw new Error(`Menu hint '${name}' is already registered`);
    }
    this.menuHints.set(name, hint);
    return this;
  }

  has(name: string): boolean {
    return this.callbacks.has(name);
  }

  hasMenuHint(name: string): boolean {
    return this.menuHints.has(name);
  }

  names(): string[] {
    return Array.from(this.callbacks.keys());
  }

  /**
   * Fail fast on references to unregistered names.
   * Every missing name is reported, not just the first.
   */
  assertRegistered(references: CallbackReference[], source: string): void {
    const issues = references
      .filter(ref => ref.kind === 'callback' ? !this.callbacks.has(ref.name) : !this.menuHints.has(ref.name))
      .map(ref => `${ref.location}: ${ref.kind} "${ref.name}" is not registered`);

    if (issues.length > 0) {
      throw new ConfigInvalidError(source, issues);
    }
  }

  /**
   * Apply a callback to the live store, all-or-nothing.
   * Never throws for a failing callback; the failure is returned instead.
   */
  invoke(
    name: string,
    request: ResolvedRequest,
    response: HttpResponseData,
    store: VariableStore,
  ): CallbackOutcome {
    const callback = this.callbacks.get(name);
    if (!callback) {
      return {
        ok: false,
        error: new CallbackFailureError(name, null, 'not registered'),
      };
    }

    try {
      store.applyAtomically(staged => {
        const returned: unknown = callback(request, response, staged);
        // Writes made after an await would escape the commit
        if (returned instanceof Promise) {
          returned.catch((err: unknown) => logger.warn(`Async callback "${name}" rejected: ${toErrorMessage(err)}`));
          throw new Error('callbacks must be synchronous');
        }
      });
      return { ok: true };
    } catch (err: unknown) {
      return { ok: false, error: new CallbackFailureError(name, err, toErrorMessage(err)) };
    }
  }

  /** Run a menu hint; a failing hint yields an explanatory line rather than an exception */
  menuHint(
    name: string,
    variables: ReadonlyMap<string, string>,
    lastResult: ExecutionResult | null,
  ): string | null {
    const hint = this.menuHints.get(name);
    if (!hint) return null;

    try {
      return hint(variables, lastResult);
    } catch (err: unknown) {
      return `Menu hint "${name}" failed: ${toErrorMessage(err)}`;
    }
  }
}
