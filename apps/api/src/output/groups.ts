import type { Schema, VerifiedRelationship } from '../types/schema';
import { sanitizeName } from './dbml';

export type TableGroups = Record<string, string[]>;

/**
 * Groups tables sharing a name prefix (`user_profile`, `user_roles` -> `user_tables`)
 * and collects junction tables: at least two foreign-key columns making up more
 * than half of the table.
 */
export const autoTableGroups = (schema: Schema, relationships: readonly VerifiedRelationship[] = []): TableGroups => {
  const groups: TableGroups = {};

  const byPrefix = new Map<string, string[]>();
  for (const name of Object.keys(schema)) {
    const parts = name.split('_');
    if (parts.length < 2) continue;
    byPrefix.set(parts[0], [...(byPrefix.get(parts[0]) ?? []), name]);
  }
  byPrefix.forEach((tables, prefix) => {
    if (tables.length > 1) groups[`${prefix}_tables`] = tables;
  });

  const linkedColumns = new Set(
    relationships.filter(r => r.isValid).map(r => `${r.sourceTable}.${r.sourceColumn}`)
  );
  const junctions = Object.values(schema)
    .filter(table => {
      if (!table.columns.length) return false;
      const fkCount = table.columns.filter(c => c.isForeignKey || linkedColumns.has(`${table.name}.${c.name}`)).length;
      return fkCount >= 2 && fkCount / table.columns.length > 0.5;
    })
    .map(table => table.name);
  if (junctions.length) groups.junction_tables = junctions;

  return groups;
};

/** Inserts `TableGroup` blocks right after the `Project` block. */
export const addTableGroups = (dbml: string, groups: TableGroups) => {
  const entries = Object.entries(groups);
  if (!entries.length) return dbml;

  const lines = dbml.split('\n');
  const projectStart = lines.findIndex(line => line.startsWith('Project '));
  const projectEnd = projectStart === -1 ? -1 : lines.findIndex((line, i) => i > projectStart && line.trim() === '}');
  const insertAt = projectEnd === -1 ? 0 : projectEnd + 1;

  const groupLines = ['', '// Table groups'];
  for (const [name, tables] of entries) {
    groupLines.push('', `TableGroup ${sanitizeName(name)} {`, ...tables.map(t => `  ${sanitizeName(t)}`), '}');
  }

  lines.splice(insertAt, 0, ...groupLines);
  return lines.join('\n');
};
