import pkg from 'node-sql-parser';
import { IngestError, errorMessage } from '../errors';
import type { Schema } from '../types/schema';
import { type ColumnInput, type TableInput, buildSchema } from '../utils/schema';

const { Parser } = pkg;

type Node = Record<string, unknown>;

const isNode = (value: unknown): value is Node => typeof value === 'object' && value !== null && !Array.isArray(value);

const asArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

// Identifiers come back as plain strings or nested { expr: { value } } / { column } nodes depending on dialect.
const readName = (value: unknown): string | undefined => {
  if (typeof value === 'string') return value;
  if (!isNode(value)) return undefined;
  return readName(value.column) ?? readName(value.expr) ?? readName(value.value) ?? readName(value.table);
};

const readTableName = (value: unknown): string | undefined => {
  const first = Array.isArray(value) ? value[0] : value;
  if (typeof first === 'string') return first;
  return isNode(first) ? readName(first.table) : undefined;
};

const readDataType = (definition: unknown) => {
  if (!isNode(definition)) return 'unknown';
  const base = typeof definition.dataType === 'string' ? definition.dataType : 'unknown';
  const length = typeof definition.length === 'number' ? definition.length : undefined;
  const scale = typeof definition.scale === 'number' ? definition.scale : undefined;
  if (length === undefined) return base;
  return scale === undefined ? `${base}(${length})` : `${base}(${length},${scale})`;
};

const readDefault = (value: unknown): string | undefined => {
  if (!isNode(value)) return undefined;
  const inner = value.value;
  if (typeof inner === 'string' || typeof inner === 'number' || typeof inner === 'boolean') return String(inner);
  if (isNode(inner)) {
    if (typeof inner.value === 'string' || typeof inner.value === 'number' || typeof inner.value === 'boolean') {
      return String(inner.value);
    }
    const fn = readName(inner.name);
    if (fn) return `${fn}()`;
  }
  return undefined;
};

const readReference = (value: unknown) => {
  if (!isNode(value)) return undefined;
  const table = readTableName(value.table);
  const column = readName(asArray(value.definition)[0]);
  return table && column ? `${table}.${column}` : undefined;
};

const flag = (value: unknown) => typeof value === 'string' && value.length > 0;

const normalizeDialect = (dialect: string) => {
  const d = dialect.toLowerCase();
  if (d === 'postgres' || d === 'postgresql') return 'postgresql';
  if (d === 'mysql') return 'mysql';
  if (d === 'mariadb') return 'mariadb';
  if (d === 'sqlite') return 'sqlite';
  return 'postgresql';
};

const readCreateTable = (node: Node): TableInput | null => {
  const name = readTableName(node.table);
  if (!name) return null;

  const columns: ColumnInput[] = [];
  const primaryKeys = new Set<string>();
  const uniques = new Set<string>();
  const foreignKeys: Record<string, string> = {};

  for (const def of asArray(node.create_definitions)) {
    if (!isNode(def)) continue;

    if (def.resource === 'column') {
      const columnName = readName(def.column);
      if (!columnName) continue;
      const nullable = isNode(def.nullable) ? def.nullable.type : undefined;
      // Older grammars fold both keywords into unique_or_primary.
      const uniqueOrPrimary = typeof def.unique_or_primary === 'string' ? def.unique_or_primary.toLowerCase() : '';
      const isPrimaryKey = flag(def.primary_key) || uniqueOrPrimary.includes('primary');
      columns.push({
        name: columnName,
        dataType: readDataType(def.definition),
        isPrimaryKey,
        isNullable: !isPrimaryKey && nullable !== 'not null',
        unique: flag(def.unique) || (uniqueOrPrimary !== '' && !uniqueOrPrimary.includes('primary')),
        defaultValue: readDefault(def.default_val)
      });
      const ref = readReference(def.reference_definition);
      if (ref) foreignKeys[columnName] = ref;
      continue;
    }

    if (def.resource === 'constraint') {
      const kind = String(def.constraint_type ?? '').toLowerCase();
      const names = asArray(def.definition).map(readName).filter((n): n is string => Boolean(n));
      if (kind === 'primary key') names.forEach(n => primaryKeys.add(n));
      else if (kind.startsWith('unique') && names.length === 1) uniques.add(names[0]);
      else if (kind === 'foreign key' && names.length === 1) {
        const ref = readReference(def.reference_definition);
        if (ref) foreignKeys[names[0]] = ref;
      }
    }
  }

  return {
    name,
    columns: columns.map(c => {
      const isPrimaryKey = c.isPrimaryKey || primaryKeys.has(c.name);
      return {
        ...c,
        isPrimaryKey,
        isNullable: isPrimaryKey ? false : c.isNullable,
        unique: c.unique || uniques.has(c.name)
      };
    }),
    foreignKeys,
    rowCount: 0
  };
};

/** Parses CREATE TABLE statements into a Schema, keeping keys, uniqueness, defaults and references. */
export const ingestDDL = (ddl: string, dialect = 'postgresql'): Schema => {
  const parser = new Parser();
  let ast: unknown;
  try {
    ast = parser.astify(ddl, { database: normalizeDialect(dialect) });
  } catch (err) {
    throw new IngestError(`Could not parse DDL: ${errorMessage(err)}`);
  }

  const tables: TableInput[] = [];
  for (const node of Array.isArray(ast) ? ast : [ast]) {
    if (!isNode(node) || node.type !== 'create' || node.keyword !== 'table') continue;
    const table = readCreateTable(node);
    if (table) tables.push(table);
  }

  return buildSchema(tables);
};
