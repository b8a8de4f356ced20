import { Client } from 'pg';
import mysql, { type RowDataPacket } from 'mysql2/promise';
import Database from 'better-sqlite3';
import type { SampleRow, Schema } from '../types/schema';
import { type ColumnInput, type TableInput, buildSchema } from '../utils/schema';

export type IntrospectOptions = {
  sampleRows?: number;
};

const DEFAULT_SAMPLE_ROWS = 5;

// Introspected identifiers are spliced into COUNT/SELECT statements, so quote them.
const quoteIdent = (name: string, quote: '"' | '`') => `${quote}${name.split(quote).join(quote + quote)}${quote}`;

const groupBy = <T>(rows: T[], key: (row: T) => string) => {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const k = key(row);
    groups.set(k, [...(groups.get(k) ?? []), row]);
  }
  return groups;
};

type InformationColumn = {
  table_name: string;
  column_name: string;
  data_type: string;
  is_nullable: string;
  column_default: string | null;
};

type KeyUsage = {
  table_name: string;
  column_name: string;
  constraint_type: string;
  foreign_table_name: string | null;
  foreign_column_name: string | null;
};

const assembleTables = (columns: InformationColumn[], keys: KeyUsage[]) => {
  const keysByTable = groupBy(keys, k => k.table_name);
  const tables: TableInput[] = [];

  for (const [tableName, tableColumns] of groupBy(columns, c => c.table_name)) {
    const tableKeys = keysByTable.get(tableName) ?? [];
    const has = (column: string, type: string) =>
      tableKeys.some(k => k.column_name === column && k.constraint_type.toUpperCase() === type);
    const foreignKeys: Record<string, string> = {};
    for (const k of tableKeys) {
      if (k.constraint_type.toUpperCase() === 'FOREIGN KEY' && k.foreign_table_name && k.foreign_column_name) {
        foreignKeys[k.column_name] = `${k.foreign_table_name}.${k.foreign_column_name}`;
      }
    }

    const cols: ColumnInput[] = tableColumns.map(c => ({
      name: c.column_name,
      dataType: c.data_type,
      isNullable: c.is_nullable.toUpperCase() === 'YES',
      isPrimaryKey: has(c.column_name, 'PRIMARY KEY'),
      unique: has(c.column_name, 'UNIQUE'),
      defaultValue: c.column_default ?? undefined
    }));

    tables.push({ name: tableName, columns: cols, foreignKeys });
  }

  return tables;
};

export const ingestPostgres = async (connectionString: string, options: IntrospectOptions = {}): Promise<Schema> => {
  const sampleLimit = options.sampleRows ?? DEFAULT_SAMPLE_ROWS;
  const client = new Client({ connectionString });
  await client.connect();

  try {
    const cols = await client.query<InformationColumn>(
      `SELECT c.table_name, c.column_name, c.data_type, c.is_nullable, c.column_default
       FROM information_schema.columns c
       JOIN information_schema.tables t
         ON t.table_schema = c.table_schema AND t.table_name = c.table_name
       WHERE c.table_schema = 'public' AND t.table_type = 'BASE TABLE'
       ORDER BY c.table_name, c.ordinal_position;`
    );

    const keys = await client.query<KeyUsage>(
      `SELECT kcu.table_name, kcu.column_name, tc.constraint_type,
              ccu.table_name AS foreign_table_name, ccu.column_name AS foreign_column_name
       FROM information_schema.table_constraints tc
       JOIN information_schema.key_column_usage kcu
         ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
       LEFT JOIN information_schema.constraint_column_usage ccu
         ON tc.constraint_type = 'FOREIGN KEY' AND ccu.constraint_name = tc.constraint_name
       WHERE tc.table_schema = 'public'
         AND tc.constraint_type IN ('PRIMARY KEY', 'FOREIGN KEY', 'UNIQUE');`
    );

    const tables = assembleTables(cols.rows, keys.rows);
    for (const table of tables) {
      const ident = quoteIdent(table.name, '"');
      const count = await client.query<{ count: string }>(`SELECT COUNT(*) AS count FROM ${ident}`);
      table.rowCount = Number(count.rows[0]?.count ?? 0);
      if (sampleLimit > 0) {
        const sample = await client.query<SampleRow>(`SELECT * FROM ${ident} LIMIT ${sampleLimit}`);
        table.sampleRows = sample.rows;
      }
    }

    return buildSchema(tables);
  } finally {
    await client.end();
  }
};

export const ingestMySQL = async (connectionString: string, options: IntrospectOptions = {}): Promise<Schema> => {
  const sampleLimit = options.sampleRows ?? DEFAULT_SAMPLE_ROWS;
  const conn = await mysql.createConnection(connectionString);

  try {
    const [cols] = await conn.query<(InformationColumn & RowDataPacket)[]>(
      `SELECT c.table_name AS table_name, c.column_name AS column_name, c.column_type AS data_type,
              c.is_nullable AS is_nullable, c.column_default AS column_default
       FROM information_schema.columns c
       JOIN information_schema.tables t
         ON t.table_schema = c.table_schema AND t.table_name = c.table_name
       WHERE c.table_schema = DATABASE() AND t.table_type = 'BASE TABLE'
       ORDER BY c.table_name, c.ordinal_position;`
    );

    const [keys] = await conn.query<(KeyUsage & RowDataPacket)[]>(
      `SELECT kcu.table_name AS table_name, kcu.column_name AS column_name, tc.constraint_type AS constraint_type,
              kcu.referenced_table_name AS foreign_table_name, kcu.referenced_column_name AS foreign_column_name
       FROM information_schema.table_constraints tc
       JOIN information_schema.key_column_usage kcu
         ON tc.constraint_name = kcu.constraint_name
        AND tc.table_schema = kcu.table_schema
        AND tc.table_name = kcu.table_name
       WHERE tc.table_schema = DATABASE()
         AND tc.constraint_type IN ('PRIMARY KEY', 'FOREIGN KEY', 'UNIQUE');`
    );

    const tables = assembleTables(cols, keys);
    for (const table of tables) {
      const ident = quoteIdent(table.name, '`');
      const [count] = await conn.query<({ count: number } & RowDataPacket)[]>(`SELECT COUNT(*) AS count FROM ${ident}`);
      table.rowCount = Number(count[0]?.count ?? 0);
      if (sampleLimit > 0) {
        const [sample] = await conn.query<RowDataPacket[]>(`SELECT * FROM ${ident} LIMIT ${sampleLimit}`);
        table.sampleRows = sample.map(row => ({ ...row }));
      }
    }

    return buildSchema(tables);
  } finally {
    await conn.end();
  }
};

type PragmaColumn = { name: string; type: string; notnull: number; dflt_value: string | null; pk: number };
type PragmaForeignKey = { table: string; from: string; to: string | null };
type PragmaIndex = { name: string; unique: number; origin: string };
type PragmaIndexColumn = { name: string | null };

export const ingestSQLite = async (filePath: string, options: IntrospectOptions = {}): Promise<Schema> => {
  const sampleLimit = options.sampleRows ?? DEFAULT_SAMPLE_ROWS;
  const db = new Database(filePath, { readonly: true, fileMustExist: true });

  try {
    const names = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY rowid")
      .all();
    const primaryKeyOf = (table: string) =>
      db
        .prepare<[], PragmaColumn>(`PRAGMA table_info(${quoteIdent(table, '"')})`)
        .all()
        .find(col => col.pk > 0)?.name;

    const tables: TableInput[] = names.map(({ name }) => {
      const ident = quoteIdent(name, '"');
      const columns = db.prepare<[], PragmaColumn>(`PRAGMA table_info(${ident})`).all();
      const fks = db.prepare<[], PragmaForeignKey>(`PRAGMA foreign_key_list(${ident})`).all();
      const indexes = db.prepare<[], PragmaIndex>(`PRAGMA index_list(${ident})`).all();

      const uniqueColumns = new Set<string>();
      for (const index of indexes) {
        if (!index.unique || index.origin === 'pk') continue;
        const indexColumns = db.prepare<[], PragmaIndexColumn>(`PRAGMA index_info(${quoteIdent(index.name, '"')})`).all();
        if (indexColumns.length === 1 && indexColumns[0].name) uniqueColumns.add(indexColumns[0].name);
      }

      const primaryKey = (col: PragmaColumn) => col.pk > 0;
      const foreignKeys: Record<string, string> = {};
      for (const fk of fks) {
        // A reference without a column list points at the parent's primary key.
        const targetColumn = fk.to ?? primaryKeyOf(fk.table);
        if (targetColumn) foreignKeys[fk.from] = `${fk.table}.${targetColumn}`;
      }

      const count = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${ident}`).get();
      const sampleRows = sampleLimit > 0
        ? db.prepare<[number], SampleRow>(`SELECT * FROM ${ident} LIMIT ?`).all(sampleLimit)
        : undefined;

      return {
        name,
        columns: columns.map(col => ({
          name: col.name,
          dataType: col.type || 'unknown',
          isNullable: !col.notnull && !primaryKey(col),
          isPrimaryKey: primaryKey(col),
          unique: uniqueColumns.has(col.name),
          defaultValue: col.dflt_value ?? undefined
        })),
        foreignKeys,
        rowCount: count?.count ?? 0,
        sampleRows
      };
    });

    return buildSchema(tables);
  } finally {
    db.close();
  }
};
