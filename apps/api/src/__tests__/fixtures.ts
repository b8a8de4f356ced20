import type { RelationshipCandidate, Schema } from '../types/schema';
import { buildSchema } from '../utils/schema';

export const makeCandidate = (
  sourceColumn: string,
  confidence: number,
  overrides: Partial<RelationshipCandidate> = {}
): RelationshipCandidate => ({
  sourceTable: 'orders',
  sourceColumn,
  targetTable: 'customers',
  targetColumn: 'id',
  confidence,
  relationshipType: 'many-to-one',
  evidence: ['test evidence'],
  ...overrides
});

export const customersAndOrders = (declared = false): Schema =>
  buildSchema([
    {
      name: 'customers',
      columns: [
        { name: 'id', dataType: 'integer', isPrimaryKey: true },
        { name: 'name', dataType: 'varchar(100)', isNullable: false }
      ]
    },
    {
      name: 'orders',
      columns: [
        { name: 'id', dataType: 'integer', isPrimaryKey: true },
        { name: 'customer_id', dataType: 'integer', foreignKeyRef: declared ? 'customers.id' : undefined }
      ]
    }
  ]);

export const ordersWithItems = (): Schema =>
  buildSchema([
    { name: 'orders', columns: [{ name: 'id', dataType: 'integer', isPrimaryKey: true }] },
    { name: 'products', columns: [{ name: 'id', dataType: 'integer', isPrimaryKey: true }] },
    {
      name: 'order_items',
      columns: [
        { name: 'order_id', dataType: 'integer' },
        { name: 'product_id', dataType: 'integer' }
      ]
    }
  ]);
