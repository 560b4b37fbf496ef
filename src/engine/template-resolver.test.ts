/**
 * Unit Tests for template resolution
 */

import { describe, it, expect, jest } from '@jest/globals';
import { findPlaceholders, resolveLabel, resolveRecord, resolveString, resolveValue } from './template-resolver';
import { VariableStore } from './variable-store';
import { UnboundVariableError } from '../shared/errors';
import { ERROR_UnboundVariable } from '../shared/error-codes';

describe('resolveString', () => {
  const vars = new VariableStore({ id: '42', name: 'widget', a: '{{b}}', b: 'x' });

  it('replaces every placeholder', () => {
    expect(resolveString('/items/{{id}}/{{name}}', vars, 'endpoint')).toBe('/items/42/widget');
  });

  it('uses the same value for repeated placeholders', () => {
    expect(resolveString('{{id}}-{{id}}', vars, 'endpoint')).toBe('42-42');
  });

  it('does not re-scan inserted values', () => {
    expect(resolveString('{{a}}', vars, 'body')).toBe('{{b}}');
  });

  it('leaves text that is not a placeholder alone', () => {
    expect(resolveString('{{ id }} {id} {{}} {{id-x}}', vars, 'body')).toBe('{{ id }} {id} {{}} {{id-x}}');
  });

  it('treats identifiers as case-sensitive', () => {
    expect(() => resolveString('{{ID}}', vars, 'endpoint')).toThrow(UnboundVariableError);
  });

  it('does not read variables when there is no placeholder', () => {
    const get = jest.fn((_name: string): string | undefined => undefined);

    expect(resolveString('desc', { get }, 'params.sort')).toBe('desc');
    expect(get).not.toHaveBeenCalled();
  });

  it('names the variable and field path when a variable is missing', () => {
    let caught: unknown;
    try {
      resolveString('{{id}}/{{missing}}', vars, 'body.price');
    } catch (err: unknown) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(UnboundVariableError);
    if (caught instanceof UnboundVariableError) {
      expect(caught.variable).toBe('missing');
      expect(caught.fieldPath).toBe('body.price');
      expect(caught.code).toBe(ERROR_UnboundVariable);
      expect(caught.message).toBe('Unbound variable "missing" in body.price');
    }
  });

  it('is idempotent for the same input', () => {
    expect(resolveString('{{name}}', vars, 'x')).toBe(resolveString('{{name}}', vars, 'x'));
  });
});

describe('resolveLabel', () => {
  it('leaves placeholders without a value as written', () => {
    const vars = new VariableStore({ id: '3' });

    expect(resolveLabel('Delete {{id}} for {{owner}}', vars)).toBe('Delete 3 for {{owner}}');
  });

  it('does not read variables when there is nothing to fill', () => {
    const get = jest.fn((_name: string): string | undefined => undefined);

    expect(resolveLabel('List products', { get })).toBe('List products');
    expect(get).not.toHaveBeenCalled();
  });
});

describe('resolveValue', () => {
  const vars = new VariableStore({ price: '10', tag: 'new' });

  it('resolves nested objects and arrays', () => {
    const resolved = resolveValue(
      { price: '{{price}}', tags: ['{{tag}}', 'fixed'], meta: { count: 3, active: true, note: null } },
      vars,
      'body',
    );

    expect(resolved).toEqual({ price: '10', tags: ['new', 'fixed'], meta: { count: 3, active: true, note: null } });
  });

  it('never templates object keys', () => {
    expect(resolveValue({ '{{tag}}': '{{tag}}' }, vars, 'body')).toEqual({ '{{tag}}': 'new' });
  });

  it('returns a copy and leaves the input untouched', () => {
    const input = { price: '{{price}}' };
    const resolved = resolveValue(input, vars, 'body');

    expect(resolved).not.toBe(input);
    expect(input).toEqual({ price: '{{price}}' });
  });

  it('reports array positions in the field path', () => {
    expect(() => resolveValue({ items: ['ok', '{{nope}}'] }, vars, 'body'))
      .toThrow('Unbound variable "nope" in body.items[1]');
  });
});

describe('resolveRecord', () => {
  it('resolves each value with its key in the path', () => {
    const vars = new VariableStore({ token: 'test-secret' });

    expect(resolveRecord({ Authorization: 'Bearer {{token}}' }, vars, 'headers'))
      .toEqual({ Authorization: 'Bearer test-secret' });
    expect(() => resolveRecord({ sort: '{{order}}' }, vars, 'params'))
      .toThrow('Unbound variable "order" in params.sort');
  });

  it('returns an empty record for undefined', () => {
    expect(resolveRecord(undefined, new VariableStore(), 'params')).toEqual({});
  });
});

describe('findPlaceholders', () => {
  it('lists distinct names in order of first appearance', () => {
    expect(findPlaceholders({ a: '{{x}}/{{y}}', b: ['{{x}}', '{{z}}'], c: 5 })).toEqual(['x', 'y', 'z']);
  });

  it('returns nothing for plain values', () => {
    expect(findPlaceholders('plain')).toEqual([]);
    expect(findPlaceholders(undefined)).toEqual([]);
  });
});
