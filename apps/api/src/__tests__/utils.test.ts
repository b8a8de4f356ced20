import { describe, it, expect } from 'vitest';
import { TimeoutError, withTimeout } from '../utils/async';
import { parseJsonLenient } from '../utils/json';
import { buildTable, declaredForeignKeys, isIntegerType, parseRef } from '../utils/schema';
import { cosineSimilarity, pluralize, singularize, tokenSimilarity } from '../utils/similarity';

describe('similarity', () => {
  it('singularizes and pluralizes table names', () => {
    expect(singularize('categories')).toBe('category');
    expect(singularize('orders')).toBe('order');
    expect(singularize('staff')).toBe('staff');
    expect(singularize('statuses')).toBe('status');
    expect(singularize('addresses')).toBe('address');
    expect(singularize('boxes')).toBe('box');
    expect(singularize('branches')).toBe('branch');
    expect(singularize('cases')).toBe('case');
    expect(pluralize('category')).toBe('categories');
    expect(pluralize('day')).toBe('days');
    expect(pluralize('box')).toBe('boxes');
    expect(pluralize('customer')).toBe('customers');
  });

  it('scores token overlap', () => {
    expect(tokenSimilarity('parent_node_id', 'parent_node')).toBeCloseTo(2 / 3);
    expect(tokenSimilarity('User_ID', 'user_id')).toBe(1);
    expect(tokenSimilarity('customer_id', 'orders')).toBe(0);
  });

  it('computes cosine similarity', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vector length mismatch (1 vs 2)');
  });
});

describe('schema helpers', () => {
  it('recognises integer types', () => {
    expect(isIntegerType('INT(11) UNSIGNED')).toBe(true);
    expect(isIntegerType('bigserial')).toBe(true);
    expect(isIntegerType('numeric(10,2)')).toBe(false);
  });

  it('parses table.column references', () => {
    expect(parseRef('orders.id')).toEqual({ table: 'orders', column: 'id' });
    expect(parseRef('orders')).toBeNull();
    expect(parseRef('.id')).toBeNull();
  });

  it('keeps column flags and the foreign-key map in sync', () => {
    const table = buildTable({
      name: 'orders',
      rowCount: -4,
      columns: [
        { name: 'id', dataType: 'integer', isPrimaryKey: true },
        { name: 'customer_id', dataType: 'integer' }
      ],
      foreignKeys: { customer_id: 'customers.id' }
    });

    expect(table.primaryKeys).toEqual(['id']);
    expect(table.rowCount).toBe(0);
    expect(table.columns[1]).toMatchObject({ isForeignKey: true, foreignKeyRef: 'customers.id', isNullable: true });
    expect(declaredForeignKeys({ orders: table })).toEqual(new Map([['orders.customer_id', 'customers.id']]));
  });
});

describe('parseJsonLenient', () => {
  it('parses plain, fenced and embedded JSON', () => {
    expect(parseJsonLenient('{"a":1}')).toEqual({ a: 1 });
    expect(parseJsonLenient('```json\n{"a":2}\n```')).toEqual({ a: 2 });
    expect(parseJsonLenient('Result: {"a":"}{"} done')).toEqual({ a: '}{' });
  });

  it('returns undefined when nothing parses', () => {
    expect(parseJsonLenient('no json here')).toBeUndefined();
    expect(parseJsonLenient('{"a": ')).toBeUndefined();
  });
});

describe('withTimeout', () => {
  it('resolves with the wrapped value', async () => {
    await expect(withTimeout(Promise.resolve(5), 50)).resolves.toBe(5);
  });

  it('rejects with TimeoutError when the promise is too slow', async () => {
    const never = new Promise<number>(() => undefined);
    await expect(withTimeout(never, 5, 'Probe')).rejects.toThrow(new TimeoutError('Probe', 5));
  });
});
