/**
 * Callbacks shipped with the workbench.
 * Hosts register their own next to these with `registry.register(name, fn)`.
 */

import type { MenuHint, ResponseCallback } from './callback-registry';
import { CallbackRegistry } from './callback-registry';

/** Advance `next_id` so the next create request uses a fresh id */
export const incrementId: ResponseCallback = (_request, _response, variables) => {
  const current = variables.get('next_id') ?? '1';
  if (!/^-?\d+$/.test(current)) {
    throw new Error(`next_id is not an integer: "${current}"`);
  }
  variables.set('next_id', (BigInt(current) + 1n).toString());
};

/** Remember the `id` of the object the server just returned as `last_id` */
export const captureId: ResponseCallback = (_request, response, variables) => {
  const body = response.body;
  if (body === null || typeof body !== 'object' || Array.isArray(body) || !('id' in body)) {
    return;
  }

  const id = body.id;
  if (typeof id === 'string' || typeof id === 'number') {
    variables.set('last_id', String(id));
  }
};

/** List the current variables under the menu */
export const showVariables: MenuHint = (variables) => {
  if (variables.size === 0) {
    return 'No variables set';
  }
  return Array.from(variables.entries())
    .map(([name, value]) => `${name}=${value}`)
    .join('  ');
};

export function registerBuiltinCallbacks(registry: CallbackRegistry): CallbackRegistry {
  return registry
    .register('increment_id', incrementId)
    .register('capture_id', captureId)
    .registerMenuHint('show_variables', showVariables);
}

export function createDefaultRegistry(): CallbackRegistry {
  return registerBuiltinCallbacks(new CallbackRegistry());
}
