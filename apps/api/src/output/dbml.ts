import type { Cardinality, Column, Schema, Table, VerifiedRelationship } from '../types/schema';
import { countColumns } from '../utils/schema';

export type DbmlOptions = {
  projectName?: string;
  databaseType?: string;
  includeIndexes?: boolean;
  includeNotes?: boolean;
};

const TYPE_MAP: Record<string, string> = {
  integer: 'int',
  int: 'int',
  bigint: 'bigint',
  smallint: 'int',
  tinyint: 'int',
  mediumint: 'int',
  serial: 'int',
  bigserial: 'bigint',
  decimal: 'decimal',
  numeric: 'decimal',
  real: 'float',
  float: 'float',
  double: 'float',
  'double precision': 'float',
  'character varying': 'varchar',
  varchar: 'varchar',
  character: 'char',
  char: 'char',
  text: 'text',
  tinytext: 'text',
  mediumtext: 'text',
  longtext: 'text',
  boolean: 'boolean',
  bool: 'boolean',
  date: 'date',
  datetime: 'datetime',
  timestamp: 'timestamp',
  'timestamp without time zone': 'timestamp',
  'timestamp with time zone': 'timestamptz',
  time: 'time',
  json: 'json',
  jsonb: 'jsonb',
  uuid: 'uuid',
  blob: 'blob'
};

const REF_SYMBOLS: Record<Cardinality, string> = {
  '1:1': '-',
  '1:N': '<',
  'N:1': '>',
  'N:M': '<>'
};

export const mapDbmlType = (dataType: string) => TYPE_MAP[dataType.toLowerCase().split('(')[0].trim()] ?? 'varchar';

export const sanitizeName = (name: string) => (/[^a-zA-Z0-9_]/.test(name) ? `"${name.replace(/"/g, '\\"')}"` : name);

const quote = (value: string) => `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;

const oneLine = (text: string) => text.replace(/\s+/g, ' ').trim();

const columnLine = (column: Column) => {
  const settings: string[] = [];
  if (column.isPrimaryKey) settings.push('pk');
  if (!column.isNullable && !column.isPrimaryKey) settings.push('not null');
  if (column.unique && !column.isPrimaryKey) settings.push('unique');
  if (column.defaultValue) settings.push(`default: ${quote(column.defaultValue)}`);
  if (column.isForeignKey && column.foreignKeyRef) settings.push(`note: ${quote(`FK to ${column.foreignKeyRef}`)}`);

  const line = `  ${sanitizeName(column.name)} ${mapDbmlType(column.dataType)}`;
  return settings.length ? `${line} [${settings.join(', ')}]` : line;
};

const tableBlock = (table: Table, includeIndexes: boolean, includeNotes: boolean) => {
  const lines = [`Table ${sanitizeName(table.name)} {`, ...table.columns.map(columnLine)];

  const uniques = table.columns.filter(c => c.unique && !c.isPrimaryKey);
  if (includeIndexes && (table.primaryKeys.length || uniques.length)) {
    lines.push('', '  Indexes {');
    if (table.primaryKeys.length) lines.push(`    (${table.primaryKeys.map(sanitizeName).join(', ')}) [pk]`);
    uniques.forEach(c => lines.push(`    ${sanitizeName(c.name)} [unique]`));
    lines.push('  }');
  }

  if (includeNotes && table.rowCount > 0) {
    lines.push('', `  Note: '${table.rowCount.toLocaleString('en-US')} rows'`);
  }

  lines.push('}', '');
  return lines;
};

const refLine = (rel: VerifiedRelationship) => {
  const line =
    `Ref: ${sanitizeName(rel.sourceTable)}.${sanitizeName(rel.sourceColumn)} ` +
    `${REF_SYMBOLS[rel.cardinality]} ` +
    `${sanitizeName(rel.targetTable)}.${sanitizeName(rel.targetColumn)}`;
  const explanation = oneLine(rel.explanation);
  if (!explanation) return line;
  return `${line} // ${explanation.length > 50 ? `${explanation.slice(0, 50)}...` : explanation}`;
};

const refSection = (relationships: readonly VerifiedRelationship[]) => {
  const grouped = new Map<Cardinality, VerifiedRelationship[]>();
  for (const rel of relationships) {
    if (!rel.isValid) continue;
    grouped.set(rel.cardinality, [...(grouped.get(rel.cardinality) ?? []), rel]);
  }
  if (!grouped.size) return [];

  const lines = ['// Relationships', ''];
  grouped.forEach((rels, cardinality) => {
    lines.push(`// ${cardinality} relationships`, ...rels.map(refLine), '');
  });
  return lines;
};

/**
 * Renders the schema and its relationships as DBML for dbdiagram.io.
 * Only relationships marked valid produce `Ref:` lines.
 */
export const generateDbml = (
  schema: Schema,
  relationships: readonly VerifiedRelationship[],
  options: DbmlOptions = {}
) => {
  const {
    projectName = 'Database Schema',
    databaseType = 'PostgreSQL',
    includeIndexes = true,
    includeNotes = true
  } = options;

  const lines = [
    `// ${projectName}`,
    '// Generated by schema-lens',
    '// https://dbdiagram.io/d',
    '',
    `Project ${sanitizeName(projectName)} {`,
    `  database_type: ${quote(databaseType)}`,
    "  Note: 'Automatically generated database schema'",
    '}',
    ''
  ];

  Object.values(schema).forEach(table => lines.push(...tableBlock(table, includeIndexes, includeNotes)));
  lines.push(...refSection(relationships));

  if (includeNotes) {
    lines.push(
      '',
      '// Schema statistics',
      `// Tables: ${Object.keys(schema).length}`,
      `// Columns: ${countColumns(schema)}`,
      `// Relationships: ${relationships.filter(r => r.isValid).length}`
    );
  }

  return lines.join('\n');
};
