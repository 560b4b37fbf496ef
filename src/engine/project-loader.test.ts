/**
 * Unit Tests for project loading
 */

import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { deepMerge, discoverProjects, loadProject, parseProjectDefinition } from './project-loader';
import { createDefaultRegistry } from './builtin-callbacks';
import { CallbackRegistry } from './callback-registry';
import { ConfigInvalidError } from '../shared/errors';
import { createTempDir, removeTempDir } from '../mock-server/test-helpers';

function writeProject(dir: string, document: unknown): void {
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, 'project.json'), JSON.stringify(document), 'utf8');
}

function loadIssues(dir: string, registry: CallbackRegistry = createDefaultRegistry()): string[] {
  try {
    loadProject(dir, registry);
  } catch (err: unknown) {
    if (err instanceof ConfigInvalidError) return err.issues;
    throw err;
  }
  throw new Error('Expected the project to be rejected');
}

describe('deepMerge', () => {
  it('merges objects key by key and replaces everything else', () => {
    expect(deepMerge(
      { a: 1, nested: { x: 1, y: 2 }, list: [1, 2] },
      { nested: { y: 3 }, list: [3], b: 2 },
    )).toEqual({ a: 1, nested: { x: 1, y: 3 }, list: [3], b: 2 });
  });
});

describe('parseProjectDefinition', () => {
  it('fills defaults and converts scalar values to strings', () => {
    const definition = parseProjectDefinition(
      {
        name: 'shop',
        variables: { next_id: 1, debug: true },
        requests: [{ params: { limit: 10 } }],
      },
      'inline',
    );

    expect(definition).toEqual({
      name: 'shop',
      outputPath: '',
      apiBase: '',
      variables: { next_id: '1', debug: 'true' },
      requests: [{ kind: 'http', desc: 'GET /', method: 'GET', endpoint: '/', params: { limit: '10' } }],
    });
  });

  it('reports schema problems with their paths', () => {
    expect(() => parseProjectDefinition({}, 'inline')).toThrow('Invalid project inline:\n  - name: Required');
  });

  it('rejects unknown methods and socket entries without an endpoint', () => {
    let caught: unknown;
    try {
      parseProjectDefinition(
        { name: 'x', requests: [{ method: 'TRACE' }, { method: 'Socket.IO' }] },
        'inline',
      );
    } catch (err: unknown) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigInvalidError);
    if (caught instanceof ConfigInvalidError) {
      expect(caught.issues).toEqual([
        'requests[0]: unsupported method "TRACE" (expected GET, POST, PUT, PATCH, DELETE, Socket.IO)',
        'requests[1]: Socket.IO entries need an endpoint',
      ]);
    }
  });

  it('accepts lower-case HTTP methods', () => {
    const definition = parseProjectDefinition({ name: 'x', requests: [{ method: 'post', endpoint: '/a' }] }, 'inline');

    expect(definition.requests[0]).toEqual({ kind: 'http', desc: 'POST /a', method: 'POST', endpoint: '/a' });
  });

  it('reads Socket.IO entries', () => {
    const definition = parseProjectDefinition(
      {
        name: 'x',
        requests: [{
          desc: 'Live prices',
          method: 'Socket.IO',
          endpoint: 'http://ws.test',
          namespace: '/prices',
          params: { token: '{{token}}' },
          emit_on_connect: { subscribe: { room: 'all' } },
        }],
      },
      'inline',
    );

    expect(definition.requests[0]).toEqual({
      kind: 'socket',
      desc: 'Live prices',
      endpoint: 'http://ws.test',
      namespace: '/prices',
      params: { token: '{{token}}' },
      emitOnConnect: { event: 'subscribe', data: { room: 'all' } },
    });
  });

  it('takes a single emit_on_connect event', () => {
    expect(() => parseProjectDefinition(
      { name: 'x', requests: [{ method: 'Socket.IO', endpoint: 'http://ws.test', emit_on_connect: { a: 1, b: 2 } }] },
      'inline',
    )).toThrow('requests[0]: emit_on_connect takes a single event, got 2');
  });
});

describe('loadProject', () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('loads a project and resolves its output path', () => {
    const dir = path.join(root, 'shop');
    writeProject(dir, {
      name: 'shop',
      output_path: 'output/{{env}}',
      api_base: 'http://api.test',
      variables: { env: 'staging', next_id: '1' },
      callback_menu: 'show_variables',
      requests: [
        { desc: 'Create product', method: 'POST', endpoint: '/products', body: { price: '{{next_id}}' }, callback: 'increment_id' },
        { desc: 'Events', method: 'Socket.IO', endpoint: 'http://ws.test' },
      ],
    });

    const project = loadProject(dir, createDefaultRegistry());

    expect(project.name).toBe('shop');
    expect(project.projectDir).toBe(dir);
    expect(project.outputDir).toBe(path.join(dir, 'output', 'staging'));
    expect(project.apiBase).toBe('http://api.test');
    expect(project.menuCallback).toBe('show_variables');
    expect(project.httpRequests().map(request => request.desc)).toEqual(['Create product']);
    expect(project.socketRequests().map(request => request.desc)).toEqual(['Events']);
    expect(project.findRequest('Create product')?.kind).toBe('http');
    expect(Object.isFrozen(project.requests[0])).toBe(true);
  });

  it('lists every unregistered callback', () => {
    const dir = path.join(root, 'broken');
    writeProject(dir, {
      name: 'broken',
      callback_menu: 'menu_missing',
      requests: [
        { desc: 'A', callback: 'first_missing' },
        { desc: 'B', callback: 'increment_id' },
        { desc: 'C', callback: 'second_missing' },
      ],
    });

    expect(loadIssues(dir)).toEqual([
      'requests[0] (A): callback "first_missing" is not registered',
      'requests[2] (C): callback "second_missing" is not registered',
      'callback_menu: menu hint "menu_missing" is not registered',
    ]);
  });

  it('merges the base project under the child', () => {
    writeProject(path.join(root, 'base'), {
      name: 'base',
      api_base: 'http://api.test',
      variables: { a: '1', b: '2' },
      requests: [{ desc: 'Shared', endpoint: '/shared' }],
    });
    const dir = path.join(root, 'child');
    writeProject(dir, { name: 'child', base_project: '../base', variables: { b: '3' } });

    const project = loadProject(dir, createDefaultRegistry());

    expect(project.name).toBe('child');
    expect(project.apiBase).toBe('http://api.test');
    expect(project.initialVariables).toEqual({ a: '1', b: '3' });
    expect(project.requests.map(request => request.desc)).toEqual(['Shared']);
  });

  it('detects base project cycles', () => {
    writeProject(path.join(root, 'a'), { name: 'a', base_project: '../b' });
    writeProject(path.join(root, 'b'), { name: 'b', base_project: '../a' });

    const issues = loadIssues(path.join(root, 'a'));

    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('base_project cycle: ')).toBe(true);
  });

  it('rejects a missing file and invalid JSON', () => {
    expect(loadIssues(path.join(root, 'nowhere'))).toEqual(['file not found']);

    const dir = path.join(root, 'bad');
    fs.mkdirSync(dir);
    fs.writeFileSync(path.join(dir, 'project.json'), '{ "name": ', 'utf8');
    const issues = loadIssues(dir);
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('not valid JSON: ')).toBe(true);
  });

  it('rejects an output path that names an unknown variable', () => {
    const dir = path.join(root, 'out');
    writeProject(dir, { name: 'out', output_path: 'logs/{{run}}' });

    expect(loadIssues(dir)).toEqual(['Unbound variable "run" in output_path']);
  });
});

describe('discoverProjects', () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('finds sub-directories that contain a project file', () => {
    writeProject(path.join(root, 'beta'), { name: 'Beta API' });
    writeProject(path.join(root, 'alpha'), { name: 'Alpha API' });
    fs.mkdirSync(path.join(root, 'empty'));

    expect(discoverProjects(root)).toEqual([
      { dir: path.join(root, 'alpha'), name: 'Alpha API' },
      { dir: path.join(root, 'beta'), name: 'Beta API' },
    ]);
  });

  it('includes the root itself and marks unreadable files', () => {
    writeProject(root, { name: 'Root' });
    fs.mkdirSync(path.join(root, 'broken'));
    fs.writeFileSync(path.join(root, 'broken', 'project.json'), 'nope', 'utf8');

    const found = discoverProjects(root);

    expect(found[0]).toEqual({ dir: root, name: 'Root' });
    expect(found[1].dir).toBe(path.join(root, 'broken'));
    expect(found[1].name.startsWith('(unreadable: ')).toBe(true);
  });

  it('returns nothing for a missing directory', () => {
    expect(discoverProjects(path.join(root, 'missing'))).toEqual([]);
  });
});
