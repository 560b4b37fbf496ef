/**
 * Project loading - reads project.json, merges its base project, validates it
 * and checks every callback reference against the registry.
 *
 * Any problem is a ConfigInvalidError listing all issues found; a project that
 * loads is safe to run.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import {
  HTTP_METHODS,
  SOCKET_IO_METHOD,
  type HttpMethod,
  type ProjectDefinition,
  type RequestDefinition,
  type TemplateValue,
} from '../shared/types/project-types';
import { config } from '../shared/config';
import { ConfigInvalidError, UnboundVariableError } from '../shared/errors';
import { toErrorMessage } from '../shared/error-utils';
import { createLogger } from '../shared/logger';
import type { CallbackReference, CallbackRegistry } from './callback-registry';
import { Project } from './project';
import { resolveString } from './template-resolver';
import { VariableStore } from './variable-store';

const logger = createLogger('ProjectLoader');

// =============================================================================
// Schema
// =============================================================================

/** Scalars are accepted where strings are expected and stored as strings */
const scalarString = z.union([z.string(), z.number(), z.boolean()]).transform(value => String(value));

const templateValueSchema: z.ZodType<TemplateValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(templateValueSchema),
    z.record(templateValueSchema),
  ])
);

const rawRequestSchema = z.object({
  desc: z.string().optional(),
  method: z.string().default('GET'),
  endpoint: z.string().optional(),
  namespace: z.string().optional(),
  headers: z.record(scalarString).optional(),
  params: z.record(scalarString).optional(),
  body: templateValueSchema.optional(),
  callback: z.string().min(1).optional(),
  emit_on_connect: z.record(templateValueSchema).optional(),
});

const rawProjectSchema = z.object({
  name: z.string().min(1),
  output_path: z.string().default(''),
  api_base: z.string().default(''),
  variables: z.record(scalarString).default({}),
  requests: z.array(rawRequestSchema).default([]),
  callback_menu: z.string().min(1).optional(),
  base_project: z.string().optional(),
});

type RawRequest = z.infer<typeof rawRequestSchema>;

export interface LoadProjectOptions {
  fileName?: string;
}

export interface DiscoveredProject {
  dir: string;
  name: string;
}

// =============================================================================
// Reading and merging
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Merge `override` onto `base`: objects merge key by key, anything else is replaced.
 */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override;
  }

  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = key in base ? deepMerge(base[key], value) : value;
  }
  return merged;
}

function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new ConfigInvalidError(filePath, ['file not found']);
  }

  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    return parsed;
  } catch (err: unknown) {
    throw new ConfigInvalidError(filePath, [`not valid JSON: ${toErrorMessage(err)}`]);
  }
}

/**
 * Read a project file and fold in its base project chain (base first).
 */
function readWithBase(projectDir: string, fileName: string, visited: string[] = []): unknown {
  const filePath = path.join(projectDir, fileName);
  if (visited.includes(filePath)) {
    throw new ConfigInvalidError(filePath, [`base_project cycle: ${[...visited, filePath].join(' -> ')}`]);
  }

  const raw = readJsonFile(filePath);
  if (!isPlainObject(raw) || typeof raw.base_project !== 'string' || raw.base_project === '') {
    return raw;
  }

  const baseDir = path.resolve(projectDir, raw.base_project);
  const base = readWithBase(baseDir, fileName, [...visited, filePath]);
  const own: Record<string, unknown> = { ...raw };
  delete own.base_project;
  return deepMerge(base, own);
}

// =============================================================================
// Conversion
// =============================================================================

function toRequestDefinition(raw: RawRequest, index: number, issues: string[]): RequestDefinition | null {
  const method = raw.method.trim();
  const location = `requests[${index}]`;

  if (method === SOCKET_IO_METHOD) {
    if (!raw.endpoint) {
      issues.push(`${location}: Socket.IO entries need an endpoint`);
      return null;
    }

    const events = Object.entries(raw.emit_on_connect ?? {});
    if (events.length > 1) {
      issues.push(`${location}: emit_on_connect takes a single event, got ${events.length}`);
      return null;
    }

    return {
      kind: 'socket',
      desc: raw.desc || `${SOCKET_IO_METHOD} ${raw.endpoint}`,
      endpoint: raw.endpoint,
      ...(raw.namespace ? { namespace: raw.namespace } : {}),
      ...(raw.params ? { params: raw.params } : {}),
      ...(events.length === 1 ? { emitOnConnect: { event: events[0][0], data: events[0][1] } } : {}),
    };
  }

  const verb = HTTP_METHODS.find(candidate => candidate === method.toUpperCase());
  if (!verb) {
    issues.push(`${location}: unsupported method "${raw.method}" (expected ${[...HTTP_METHODS, SOCKET_IO_METHOD].join(', ')})`);
    return null;
  }

  const endpoint = raw.endpoint ?? '/';
  return {
    kind: 'http',
    desc: raw.desc || `${verb} ${endpoint}`,
    method: verb satisfies HttpMethod,
    endpoint,
    ...(raw.headers ? { headers: raw.headers } : {}),
    ...(raw.params ? { params: raw.params } : {}),
    ...(raw.body !== undefined ? { body: raw.body } : {}),
    ...(raw.callback ? { callback: raw.callback } : {}),
  };
}

/**
 * Validate an already-parsed project document.
 */
export function parseProjectDefinition(raw: unknown, source: string): ProjectDefinition {
  const parsed = rawProjectSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigInvalidError(
      source,
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const issues: string[] = [];
  const requests: RequestDefinition[] = [];
  parsed.data.requests.forEach((request, index) => {
    const definition = toRequestDefinition(request, index, issues);
    if (definition) requests.push(definition);
  });

  if (issues.length > 0) {
    throw new ConfigInvalidError(source, issues);
  }

  return {
    name: parsed.data.name,
    outputPath: parsed.data.output_path,
    apiBase: parsed.data.api_base,
    variables: parsed.data.variables,
    requests,
    ...(parsed.data.callback_menu ? { menuCallback: parsed.data.callback_menu } : {}),
  };
}

/** Every callback name a project refers to */
export function collectCallbackReferences(definition: ProjectDefinition): CallbackReference[] {
  const references: CallbackReference[] = [];
  definition.requests.forEach((request, index) => {
    if (request.kind === 'http' && request.callback) {
      references.push({
        name: request.callback,
        kind: 'callback',
        location: `requests[${index}] (${request.desc})`,
      });
    }
  });
  if (definition.menuCallback) {
    references.push({ name: definition.menuCallback, kind: 'menu hint', location: 'callback_menu' });
  }
  return references;
}

/**
 * Build a Project from a validated definition.
 * Fails when a callback is missing or the output path names an unknown variable.
 */
export function createProject(
  definition: ProjectDefinition,
  projectDir: string,
  callbacks: CallbackRegistry,
  source: string = projectDir,
): Project {
  callbacks.assertRegistered(collectCallbackReferences(definition), source);

  let outputDir: string;
  try {
    outputDir = resolveString(definition.outputPath, new VariableStore(definition.variables), 'output_path');
  } catch (err: unknown) {
    if (err instanceof UnboundVariableError) {
      throw new ConfigInvalidError(source, [err.message]);
    }
    throw err;
  }

  return new Project(definition, projectDir, outputDir, callbacks);
}

/**
 * Load `<projectDir>/project.json` (and its base project) into a Project.
 */
export function loadProject(
  projectDir: string,
  callbacks: CallbackRegistry,
  options: LoadProjectOptions = {},
): Project {
  const fileName = options.fileName ?? config.projects.fileName;
  const absoluteDir = path.resolve(projectDir);
  const source = path.join(absoluteDir, fileName);

  const raw = readWithBase(absoluteDir, fileName);
  const definition = parseProjectDefinition(raw, source);
  const project = createProject(definition, absoluteDir, callbacks, source);

  logger.info(`Loaded project "${project.name}" with ${project.requests.length} request(s) from ${source}`);
  return project;
}

/**
 * Find project directories: `rootDir` itself and its direct sub-directories
 * that contain a project file.
 */
export function discoverProjects(rootDir: string, fileName: string = config.projects.fileName): DiscoveredProject[] {
  const root = path.resolve(rootDir);
  if (!fs.existsSync(root)) {
    return [];
  }

  const candidates = [
    root,
    ...fs.readdirSync(root, { withFileTypes: true })
      .filter(entry => entry.isDirectory())
      .map(entry => path.join(root, entry.name))
      .sort(),
  ];

  return candidates
    .filter(dir => fs.existsSync(path.join(dir, fileName)))
    .map(dir => ({ dir, name: readProjectName(path.join(dir, fileName)) }));
}

function readProjectName(filePath: string): string {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    return isPlainObject(raw) && typeof raw.name === 'string' ? raw.name : '(unnamed)';
  } catch (err: unknown) {
    return `(unreadable: ${toErrorMessage(err)})`;
  }
}
