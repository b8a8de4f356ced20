import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { analyzeSchema } from '../analyzer';
import { generateDbml, mapDbmlType, sanitizeName } from '../output/dbml';
import { addTableGroups, autoTableGroups } from '../output/groups';
import { buildAnalysisWorkbook } from '../output/workbook';
import type { VerifiedRelationship } from '../types/schema';
import { buildSchema } from '../utils/schema';
import { RuleBasedOracle } from '../verify/oracle';
import { customersAndOrders } from './fixtures';

const blogSchema = buildSchema([
  {
    name: 'users',
    rowCount: 1200,
    columns: [
      { name: 'id', dataType: 'integer', isPrimaryKey: true },
      { name: 'email', dataType: 'varchar(255)', isNullable: false, unique: true },
      { name: 'status', dataType: 'varchar(20)', defaultValue: 'active' }
    ]
  },
  {
    name: 'posts',
    columns: [
      { name: 'id', dataType: 'integer', isPrimaryKey: true },
      { name: 'user_id', dataType: 'integer', foreignKeyRef: 'users.id' }
    ]
  }
]);

const relationship = (overrides: Partial<VerifiedRelationship> = {}): VerifiedRelationship => ({
  sourceTable: 'posts',
  sourceColumn: 'user_id',
  targetTable: 'users',
  targetColumn: 'id',
  confidence: 0.9,
  llmConfidence: 0.9,
  relationshipType: 'foreign_key',
  cardinality: 'N:1',
  explanation: 'Posts are written by users',
  isValid: true,
  source: 'inferred',
  ...overrides
});

describe('generateDbml', () => {
  it('renders tables, indexes, notes and valid refs', () => {
    const dbml = generateDbml(blogSchema, [relationship(), relationship({ sourceColumn: 'id', isValid: false })]);

    expect(dbml.split('\n')).toEqual([
      '// Database Schema',
      '// Generated by schema-lens',
      '// https://dbdiagram.io/d',
      '',
      'Project "Database Schema" {',
      "  database_type: 'PostgreSQL'",
      "  Note: 'Automatically generated database schema'",
      '}',
      '',
      'Table users {',
      '  id int [pk]',
      '  email varchar [not null, unique]',
      "  status varchar [default: 'active']",
      '',
      '  Indexes {',
      '    (id) [pk]',
      '    email [unique]',
      '  }',
      '',
      "  Note: '1,200 rows'",
      '}',
      '',
      'Table posts {',
      '  id int [pk]',
      "  user_id int [note: 'FK to users.id']",
      '',
      '  Indexes {',
      '    (id) [pk]',
      '  }',
      '}',
      '',
      '// Relationships',
      '',
      '// N:1 relationships',
      'Ref: posts.user_id > users.id // Posts are written by users',
      '',
      '',
      '// Schema statistics',
      '// Tables: 2',
      '// Columns: 5',
      '// Relationships: 1'
    ]);
  });

  it('truncates long explanations and maps cardinalities to ref symbols', () => {
    const dbml = generateDbml(blogSchema, [
      relationship({ cardinality: '1:1', explanation: 'x'.repeat(60) }),
      relationship({ sourceColumn: 'id', cardinality: 'N:M', explanation: '' })
    ]);
    const refs = dbml.split('\n').filter(line => line.startsWith('Ref:'));
    expect(refs).toEqual([`Ref: posts.user_id - users.id // ${'x'.repeat(50)}...`, 'Ref: posts.id <> users.id']);
  });

  it('honours project name and feature switches', () => {
    const dbml = generateDbml(blogSchema, [], {
      projectName: 'blog',
      databaseType: 'MySQL',
      includeIndexes: false,
      includeNotes: false
    });
    expect(dbml).toContain('Project blog {');
    expect(dbml).toContain("  database_type: 'MySQL'");
    expect(dbml).not.toContain('Indexes {');
    expect(dbml).not.toContain('rows');
    expect(dbml).not.toContain('// Relationships');
  });
});

describe('dbml helpers', () => {
  it('maps SQL types with a varchar default', () => {
    expect(mapDbmlType('INTEGER')).toBe('int');
    expect(mapDbmlType('timestamp with time zone')).toBe('timestamptz');
    expect(mapDbmlType('DECIMAL(10,2)')).toBe('decimal');
    expect(mapDbmlType('geography')).toBe('varchar');
  });

  it('quotes names with special characters', () => {
    expect(sanitizeName('order_items')).toBe('order_items');
    expect(sanitizeName('order items')).toBe('"order items"');
  });
});

describe('table groups', () => {
  it('groups tables by shared prefix and finds junction tables', () => {
    const schema = buildSchema([
      { name: 'user_profiles', columns: [{ name: 'id', dataType: 'integer', isPrimaryKey: true }] },
      { name: 'user_roles', columns: [{ name: 'id', dataType: 'integer', isPrimaryKey: true }] },
      {
        name: 'tags_posts',
        columns: [
          { name: 'tag_id', dataType: 'integer', foreignKeyRef: 'tags.id' },
          { name: 'post_id', dataType: 'integer' }
        ]
      },
      {
        name: 'orders',
        columns: [
          { name: 'id', dataType: 'integer', isPrimaryKey: true },
          { name: 'customer_id', dataType: 'integer', foreignKeyRef: 'customers.id' },
          { name: 'note', dataType: 'text' }
        ]
      }
    ]);

    expect(autoTableGroups(schema)).toEqual({ user_tables: ['user_profiles', 'user_roles'] });

    const linked = relationship({ sourceTable: 'tags_posts', sourceColumn: 'post_id', targetTable: 'posts' });
    expect(autoTableGroups(schema, [linked])).toEqual({
      user_tables: ['user_profiles', 'user_roles'],
      junction_tables: ['tags_posts']
    });
  });

  it('inserts groups after the project block', () => {
    const dbml = ['Project p {', '  x', '}', '', 'Table a {', '}'].join('\n');
    expect(addTableGroups(dbml, { user_tables: ['user_profiles', 'user_roles'] }).split('\n')).toEqual([
      'Project p {',
      '  x',
      '}',
      '',
      '// Table groups',
      '',
      'TableGroup user_tables {',
      '  user_profiles',
      '  user_roles',
      '}',
      '',
      'Table a {',
      '}'
    ]);
    expect(addTableGroups(dbml, {})).toBe(dbml);
  });

  it('quotes group members whose names need it', () => {
    const lines = addTableGroups('Table a {\n}', { order_tables: ['order items', 'order-notes', 'order_lines'] }).split('\n');
    expect(lines.slice(0, 8)).toEqual([
      '',
      '// Table groups',
      '',
      'TableGroup order_tables {',
      '  "order items"',
      '  "order-notes"',
      '  order_lines',
      '}'
    ]);
  });
});

describe('buildAnalysisWorkbook', () => {
  it('writes tables, relationships and candidates sheets', async () => {
    const result = await analyzeSchema(customersAndOrders(), { oracle: new RuleBasedOracle() });
    const workbook = XLSX.read(buildAnalysisWorkbook(result), { type: 'buffer' });

    expect(workbook.SheetNames).toEqual(['Tables', 'Relationships', 'Candidates']);
    const relationships = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets.Relationships);
    expect(relationships).toHaveLength(1);
    expect(relationships[0]).toMatchObject({ source: 'orders.customer_id', target: 'customers.id', origin: 'inferred' });
  });
});
