/**
 * TemplateResolver - replaces `{{identifier}}` placeholders in value trees.
 *
 * Single pass, left to right: an inserted value is never scanned again, so a
 * variable holding `{{other}}` is sent literally and resolution always terminates.
 * Resolution is pure; it reads the lookup and returns a fresh copy.
 */

import type { TemplateRecord, TemplateValue } from '@/shared/types/project-types';
import { UnboundVariableError } from '../shared/errors';
import type { VariableLookup } from './variable-store';

/** Identifiers are case-sensitive, letters, digits and underscores */
const PLACEHOLDER_PATTERN = /\{\{([A-Za-z0-9_]+)\}\}/g;

/**
 * Resolve every placeholder in a single string.
 * Throws UnboundVariableError naming the variable and `fieldPath`.
 */
export function resolveString(template: string, vars: VariableLookup, fieldPath: string): string {
  if (!template.includes('{{')) {
    return template;
  }

  return template.replace(PLACEHOLDER_PATTERN, (_placeholder, name: string) => {
    const value = vars.get(name);
    if (value === undefined) {
      throw new UnboundVariableError(name, fieldPath);
    }
    return value;
  });
}

/**
 * Fill the placeholders that have a value and leave the rest as written.
 * For display text such as request descriptions, where a gap is not an error.
 */
export function resolveLabel(template: string, vars: VariableLookup): string {
  if (!template.includes('{{')) {
    return template;
  }

  return template.replace(PLACEHOLDER_PATTERN, (placeholder, name: string) => vars.get(name) ?? placeholder);
}

/**
 * Resolve a nested value. Numbers, booleans and null pass through unchanged,
 * arrays keep their order and object keys are copied as-is.
 */
export function resolveValue(value: TemplateValue, vars: VariableLookup, fieldPath: string): TemplateValue {
  if (typeof value === 'string') {
    return resolveString(value, vars, fieldPath);
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => resolveValue(item, vars, `${fieldPath}[${index}]`));
  }

  if (value !== null && typeof value === 'object') {
    const resolved: { [key: string]: TemplateValue } = {};
    for (const [key, item] of Object.entries(value)) {
      resolved[key] = resolveValue(item, vars, `${fieldPath}.${key}`);
    }
    return resolved;
  }

  return value;
}

/** Resolve a flat mapping of string templates (params, headers) */
export function resolveRecord(
  record: Readonly<TemplateRecord> | undefined,
  vars: VariableLookup,
  fieldPath: string,
): Record<string, string> {
  const resolved: Record<string, string> = {};
  if (!record) return resolved;

  for (const [key, template] of Object.entries(record)) {
    resolved[key] = resolveString(template, vars, `${fieldPath}.${key}`);
  }
  return resolved;
}

/**
 * List the distinct variable names a value refers to, in order of first appearance.
 */
export function findPlaceholders(value: TemplateValue | Readonly<TemplateRecord> | undefined): string[] {
  const names = new Set<string>();

  const visit = (node: unknown): void => {
    if (typeof node === 'string') {
      for (const match of node.matchAll(PLACEHOLDER_PATTERN)) {
        names.add(match[1]);
      }
    } else if (Array.isArray(node)) {
      node.forEach(visit);
    } else if (node !== null && typeof node === 'object') {
      Object.values(node).forEach(visit);
    }
  };

  visit(value);
  return Array.from(names);
}
