/**
 * Test helpers for the mock server - convenience functions for test setup.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { HttpRequestDefinition, RequestDefinition } from '@/shared/types/project-types';
import { CallbackRegistry } from '../engine/callback-registry';
import { Project } from '../engine/project';
import { MemorySink, ResponseLogger } from '../engine/response-logger';
import { HttpMock } from './http-mock';
import { installFetchMock } from './fetch-stub';
import { MockSocketFactory } from './mock-monitor-socket';

export const TEST_API_BASE = 'http://api.test';

export interface TestProjectOptions {
  name?: string;
  apiBase?: string;
  variables?: Record<string, string>;
  requests?: RequestDefinition[];
  menuCallback?: string;
  callbacks?: CallbackRegistry;
  projectDir?: string;
  outputPath?: string;
}

export function httpRequest(overrides: Partial<HttpRequestDefinition> = {}): HttpRequestDefinition {
  return {
    kind: 'http',
    desc: 'Get item',
    method: 'GET',
    endpoint: '/items/1',
    ...overrides,
  };
}

export function createTestProject(options: TestProjectOptions = {}): Project {
  const projectDir = options.projectDir ?? path.join(os.tmpdir(), 'workbench-test-project');
  return new Project(
    {
      name: options.name ?? 'test-project',
      outputPath: options.outputPath ?? 'output',
      apiBase: options.apiBase ?? TEST_API_BASE,
      variables: options.variables ?? {},
      requests: options.requests ?? [],
      ...(options.menuCallback ? { menuCallback: options.menuCallback } : {}),
    },
    projectDir,
    options.outputPath ?? 'output',
    options.callbacks ?? new CallbackRegistry(),
  );
}

export interface MockEnvironment {
  httpMock: HttpMock;
  sockets: MockSocketFactory;
  sink: MemorySink;
  responseLogger: ResponseLogger;
  cleanup: () => void;
}

/**
 * Route fetch to a fresh HttpMock and collect records in memory.
 */
export function createMockEnvironment(): MockEnvironment {
  const httpMock = new HttpMock();
  const fetchSpy = installFetchMock(httpMock);
  const sink = new MemorySink();

  return {
    httpMock,
    sockets: new MockSocketFactory(),
    sink,
    responseLogger: new ResponseLogger([sink]),
    cleanup: () => {
      fetchSpy.mockRestore();
      httpMock.reset();
      sink.clear();
    },
  };
}

/** Fresh empty directory under the OS temp dir */
export function createTempDir(prefix = 'workbench-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
