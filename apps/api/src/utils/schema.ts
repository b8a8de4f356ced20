import type { Column, ColumnSummary, SampleRow, Schema, Table } from '../types/schema';

export type ColumnInput = Partial<Omit<Column, 'name' | 'dataType'>> & {
  name: string;
  dataType: string;
};

export type TableInput = {
  name: string;
  columns: ColumnInput[];
  foreignKeys?: Record<string, string>;
  rowCount?: number;
  sampleRows?: SampleRow[];
};

const INTEGER_TYPES = new Set([
  'int',
  'integer',
  'bigint',
  'smallint',
  'tinyint',
  'mediumint',
  'int2',
  'int4',
  'int8',
  'serial',
  'bigserial',
  'smallserial',
  'serial4',
  'serial8'
]);

// "INT(11) UNSIGNED" -> "int"
const baseType = (dataType: string) => dataType.toLowerCase().split('(')[0].trim().split(/\s+/)[0] ?? '';

export const isIntegerType = (dataType: string) => INTEGER_TYPES.has(baseType(dataType));

export const parseRef = (ref: string) => {
  const dot = ref.indexOf('.');
  if (dot <= 0 || dot === ref.length - 1) return null;
  return { table: ref.slice(0, dot), column: ref.slice(dot + 1) };
};

/**
 * Builds a Table, keeping the primary-key list and the declared foreign-key map
 * consistent with the per-column flags whichever side the caller filled in.
 */
export const buildTable = (input: TableInput): Table => {
  const foreignKeys: Record<string, string> = { ...(input.foreignKeys ?? {}) };
  for (const col of input.columns) {
    if (col.foreignKeyRef && !foreignKeys[col.name]) foreignKeys[col.name] = col.foreignKeyRef;
  }

  const columns: Column[] = input.columns.map(col => {
    const ref = foreignKeys[col.name];
    const isPrimaryKey = col.isPrimaryKey ?? false;
    return {
      name: col.name,
      dataType: col.dataType,
      isNullable: col.isNullable ?? !isPrimaryKey,
      isPrimaryKey,
      isForeignKey: Boolean(ref),
      foreignKeyRef: ref,
      unique: col.unique ?? false,
      defaultValue: col.defaultValue
    };
  });

  return {
    name: input.name,
    columns,
    primaryKeys: columns.filter(c => c.isPrimaryKey).map(c => c.name),
    foreignKeys,
    rowCount: Math.max(0, input.rowCount ?? 0),
    sampleRows: input.sampleRows
  };
};

export const buildSchema = (tables: TableInput[]): Schema => {
  const schema: Record<string, Table> = {};
  for (const table of tables) schema[table.name] = buildTable(table);
  return schema;
};

export const getColumn = (table: Table | undefined, name: string) => table?.columns.find(c => c.name === name);

export const hasColumn = (schema: Schema, table: string, column: string) =>
  Boolean(getColumn(schema[table], column));

export const summarizeColumns = (table: Table | undefined): ColumnSummary[] =>
  (table?.columns ?? []).map(c => ({
    name: c.name,
    type: c.dataType,
    nullable: c.isNullable,
    primaryKey: c.isPrimaryKey
  }));

/** Declared foreign keys keyed by "table.column". */
export const declaredForeignKeys = (schema: Schema): Map<string, string> => {
  const fks = new Map<string, string>();
  for (const table of Object.values(schema)) {
    for (const [column, ref] of Object.entries(table.foreignKeys)) {
      fks.set(`${table.name}.${column}`, ref);
    }
  }
  return fks;
};

export const countColumns = (schema: Schema) =>
  Object.values(schema).reduce((acc, table) => acc + table.columns.length, 0);
