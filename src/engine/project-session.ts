/**
 * ProjectSession - the operator loop's view of one loaded project.
 *
 * HTTP requests go through a queue so exactly one execution (send → callback → append)
 * is in progress at a time. Socket monitors run beside the queue and only share the
 * ResponseLogger with it.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { HttpRequestDefinition, SocketRequestDefinition } from '@/shared/types/project-types';
import type { ExecutionResult } from '@/shared/types/record-types';
import { config } from '../shared/config';
import { toErrorMessage } from '../shared/error-utils';
import { createLogger, type Logger } from '../shared/logger';
import type { Project } from './project';
import { RequestExecutor, type ExecuteOptions } from './request-executor';
import type { ResponseLogger } from './response-logger';
import { createSocketIoConnection } from './socket-io-connection';
import { SocketMonitor, type MonitorSocketFactory } from './socket-monitor';
import { resolveRecord, resolveString, resolveValue } from './template-resolver';
import { VariableStore } from './variable-store';

const baseLogger = createLogger('ProjectSession');

export interface ProjectSessionOptions {
  project: Project;
  responseLogger: ResponseLogger;
  executor?: RequestExecutor;
  variables?: VariableStore;
  socketFactory?: MonitorSocketFactory;
  /** Write the live variables back to the project file after each request */
  persistVariables?: boolean;
  /** File that receives persisted variables; defaults to the project's own project.json */
  projectFile?: string;
  reconnectDelayMs?: number;
}

export class ProjectSession {
  readonly project: Project;
  readonly variables: VariableStore;
  readonly responseLogger: ResponseLogger;

  private executor: RequestExecutor;
  private socketFactory: MonitorSocketFactory;
  private persistVariables: boolean;
  private projectFile: string;
  private reconnectDelayMs?: number;
  private monitors: SocketMonitor[] = [];
  private queue: Promise<void> = Promise.resolve();
  private last: ExecutionResult | null = null;
  private logger: Logger;

  constructor(options: ProjectSessionOptions) {
    this.project = options.project;
    this.responseLogger = options.responseLogger;
    this.variables = options.variables ?? options.project.createVariableStore();
    this.executor = options.executor ?? new RequestExecutor();
    this.socketFactory = options.socketFactory ?? createSocketIoConnection;
    this.persistVariables = options.persistVariables ?? config.output.persistVariables;
    this.projectFile = options.projectFile ?? path.join(options.project.projectDir, config.projects.fileName);
    this.reconnectDelayMs = options.reconnectDelayMs;
    this.logger = baseLogger.child(options.project.name);
  }

  /** Most recent completed execution, whatever its status */
  get lastResult(): ExecutionResult | null {
    return this.last;
  }

  /**
   * Run one HTTP request after every earlier one has finished.
   * Rejects only when the result could not be written to the log.
   */
  run(definition: HttpRequestDefinition, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const next = this.queue.then(() => this.runNow(definition, options));
    this.queue = next.then(() => undefined, () => undefined);
    return next;
  }

  private async runNow(definition: HttpRequestDefinition, options: ExecuteOptions): Promise<ExecutionResult> {
    const result = await this.executor.execute(definition, this.project, this.variables, options);
    this.last = result;
    this.responseLogger.append(result);

    if (this.persistVariables && result.callback?.applied) {
      this.saveVariables();
    }
    return result;
  }

  /**
   * Resolve a Socket.IO definition against the current variables and start monitoring it.
   * Throws UnboundVariableError when the definition refers to an unknown variable.
   */
  startMonitor(definition: SocketRequestDefinition): SocketMonitor {
    const snapshot = this.variables.snapshot();
    const emitOnConnect = definition.emitOnConnect
      ? {
          event: definition.emitOnConnect.event,
          data: resolveValue(definition.emitOnConnect.data, snapshot, `emit_on_connect.${definition.emitOnConnect.event}`),
        }
      : undefined;

    const monitor = new SocketMonitor({
      endpoint: resolveString(definition.endpoint, snapshot, 'endpoint'),
      namespace: definition.namespace === undefined ? undefined : resolveString(definition.namespace, snapshot, 'namespace'),
      params: resolveRecord(definition.params, snapshot, 'params'),
      emitOnConnect,
      writer: this.responseLogger,
      socketFactory: this.socketFactory,
      reconnectDelayMs: this.reconnectDelayMs,
    });

    this.monitors.push(monitor);
    this.logger.info(`Monitoring ${monitor.source}`);
    monitor.start();
    return monitor;
  }

  activeMonitors(): SocketMonitor[] {
    return [...this.monitors];
  }

  stopMonitors(): void {
    for (const monitor of this.monitors) {
      monitor.stop();
    }
    this.monitors = [];
  }

  /** Footer text from the project's menu hint, or null when it has none */
  menuHint(): string | null {
    if (!this.project.menuCallback) return null;
    return this.project.callbacks.menuHint(this.project.menuCallback, this.variables.snapshot(), this.last);
  }

  /** Resolves once every queued request has finished */
  idle(): Promise<void> {
    return this.queue;
  }

  private saveVariables(): void {
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.projectFile, 'utf8'));
      const document = raw !== null && typeof raw === 'object' && !Array.isArray(raw) ? { ...raw } : {};
      fs.writeFileSync(
        this.projectFile,
        JSON.stringify({ ...document, variables: this.variables.toJSON() }, null, 2) + '\n',
        'utf8',
      );
      this.logger.debug(`Saved ${this.variables.names().length} variable(s) to ${this.projectFile}`);
    } catch (err: unknown) {
      this.logger.error(`Failed to save variables to ${this.projectFile}: ${toErrorMessage(err)}`);
    }
  }
}
