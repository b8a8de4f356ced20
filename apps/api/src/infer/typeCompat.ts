import type { RelationshipCandidate, Schema } from '../types/schema';
import { isIntegerType } from '../utils/schema';
import { pluralize, singularize } from '../utils/similarity';

const TYPE_CONFIDENCE = 0.6;

export const nameReferencesTable = (columnName: string, tableName: string) => {
  const column = columnName.toLowerCase();
  const table = tableName.toLowerCase();
  return [table, pluralize(table), singularize(table)].some(form => form.length > 0 && column.includes(form));
};

export const detectByTypeCompatibility = (schema: Schema): RelationshipCandidate[] => {
  const candidates: RelationshipCandidate[] = [];
  const tables = Object.values(schema);

  for (const source of tables) {
    for (const column of source.columns) {
      if (!isIntegerType(column.dataType)) continue;

      for (const target of tables) {
        if (target.name === source.name) continue;
        if (!nameReferencesTable(column.name, target.name)) continue;

        for (const targetColumn of target.columns) {
          if (!targetColumn.isPrimaryKey || !isIntegerType(targetColumn.dataType)) continue;
          candidates.push({
            sourceTable: source.name,
            sourceColumn: column.name,
            targetTable: target.name,
            targetColumn: targetColumn.name,
            confidence: TYPE_CONFIDENCE,
            relationshipType: 'many-to-one',
            evidence: [
              `Compatible integer types (${column.dataType} -> ${targetColumn.dataType})`,
              `Column name references table '${target.name}'`
            ]
          });
        }
      }
    }
  }

  return candidates;
};
