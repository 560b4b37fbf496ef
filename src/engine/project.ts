/**
 * Project - an immutable, validated project definition plus its callbacks.
 *
 * Lives for the whole process. Sessions create their own VariableStore from it,
 * so the same project can be reused across any number of runs.
 */

import * as path from 'path';
import type {
  HttpRequestDefinition,
  ProjectDefinition,
  RequestDefinition,
  SocketRequestDefinition,
} from '@/shared/types/project-types';
import type { CallbackRegistry } from './callback-registry';
import { VariableStore } from './variable-store';

/** Freeze a value and everything reachable from it */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class Project {
  readonly name: string;
  readonly projectDir: string;
  /** Output directory, placeholders already resolved against the initial variables */
  readonly outputDir: string;
  readonly apiBase: string;
  readonly initialVariables: Readonly<Record<string, string>>;
  readonly requests: readonly RequestDefinition[];
  readonly menuCallback?: string;
  readonly callbacks: CallbackRegistry;

  constructor(definition: ProjectDefinition, projectDir: string, outputDir: string, callbacks: CallbackRegistry) {
    this.name = definition.name;
    this.projectDir = projectDir;
    this.outputDir = path.resolve(projectDir, outputDir);
    this.apiBase = definition.apiBase;
    this.initialVariables = deepFreeze({ ...definition.variables });
    this.requests = deepFreeze([...definition.requests]);
    this.menuCallback = definition.menuCallback;
    this.callbacks = callbacks;
    Object.freeze(this);
  }

  createVariableStore(): VariableStore {
    return new VariableStore(this.initialVariables);
  }

  httpRequests(): HttpRequestDefinition[] {
    return this.requests.filter((request): request is HttpRequestDefinition => request.kind === 'http');
  }

  socketRequests(): SocketRequestDefinition[] {
    return this.requests.filter((request): request is SocketRequestDefinition => request.kind === 'socket');
  }

  /** Look a request up by its description */
  findRequest(desc: string): RequestDefinition | undefined {
    return this.requests.find(request => request.desc === desc);
  }
}
