import type { RelationshipCandidate, Schema, Table } from '../types/schema';
import { getColumn } from '../utils/schema';
import { pluralize, singularize, tokenSimilarity } from '../utils/similarity';

const FK_SUFFIXES = ['_id', '_fk', '_ref', '_code', '_key'];
const FK_PREFIXES = ['fk_', 'ref_', 'parent_', 'child_'];
const FK_TOKENS = new Set(['id', 'code', 'key', 'ref']);

const EXACT_CONFIDENCE = 0.9;
const SINGULAR_CONFIDENCE = 0.85;
const SIMILARITY_THRESHOLD = 0.6;

/** Returns a label for the first foreign-key naming pattern the column matches. */
export const matchFkPattern = (columnName: string): string | null => {
  const name = columnName.toLowerCase();
  const suffix = FK_SUFFIXES.find(s => name.endsWith(s));
  if (suffix) return `suffix '${suffix}'`;
  const prefix = FK_PREFIXES.find(p => name.startsWith(p));
  if (prefix) return `prefix '${prefix}'`;
  if (name.includes('_')) {
    const token = name.split('_').find(t => FK_TOKENS.has(t));
    if (token) return `token '${token}'`;
  }
  return null;
};

// The `_id` path targets an `id` column; tables keyed differently fall back to a lone primary key.
const idColumnOf = (table: Table) => {
  const id = table.columns.find(c => c.name.toLowerCase() === 'id');
  if (id) return id.name;
  return table.primaryKeys.length === 1 ? table.primaryKeys[0] : null;
};

type TableGuess = { name: string; confidence: number; reason: string };

const guessesFromIdSuffix = (columnName: string): TableGuess[] => {
  const name = columnName.toLowerCase();
  if (!name.endsWith('_id')) return [];
  const stripped = name.slice(0, -3);
  if (!stripped) return [];

  const guesses: TableGuess[] = [{ name: stripped, confidence: EXACT_CONFIDENCE, reason: 'exact table name' }];
  const plural = pluralize(stripped);
  if (plural !== stripped) guesses.push({ name: plural, confidence: EXACT_CONFIDENCE, reason: 'plural table name' });
  if (stripped.endsWith('s')) {
    const singular = singularize(stripped);
    if (singular !== stripped) guesses.push({ name: singular, confidence: SINGULAR_CONFIDENCE, reason: 'singular table name' });
  }
  return guesses;
};

export const detectByPatterns = (schema: Schema): RelationshipCandidate[] => {
  const candidates: RelationshipCandidate[] = [];
  const tablesByLowerName = new Map(Object.values(schema).map(t => [t.name.toLowerCase(), t]));

  for (const source of Object.values(schema)) {
    for (const column of source.columns) {
      const pattern = matchFkPattern(column.name);
      if (!pattern) continue;

      const baseEvidence = [`Column name '${column.name}' matches foreign-key pattern ${pattern}`];
      if (column.unique && !column.isPrimaryKey) baseEvidence.push(`Column '${column.name}' has a unique constraint`);

      for (const guess of guessesFromIdSuffix(column.name)) {
        const target = tablesByLowerName.get(guess.name);
        if (!target || target.name === source.name) continue;
        const targetColumn = idColumnOf(target);
        if (!targetColumn) continue;

        candidates.push({
          sourceTable: source.name,
          sourceColumn: column.name,
          targetTable: target.name,
          targetColumn,
          confidence: guess.confidence,
          relationshipType: 'many-to-one',
          evidence: [...baseEvidence, `Pattern resolves to table '${target.name}' (${guess.reason})`]
        });
      }

      for (const target of Object.values(schema)) {
        const similarity = tokenSimilarity(column.name, target.name);
        if (similarity <= SIMILARITY_THRESHOLD) continue;

        for (const pk of target.primaryKeys) {
          if (!getColumn(target, pk)) continue;
          candidates.push({
            sourceTable: source.name,
            sourceColumn: column.name,
            targetTable: target.name,
            targetColumn: pk,
            confidence: similarity,
            relationshipType: 'many-to-one',
            evidence: [...baseEvidence, `Name similar to table '${target.name}' (${similarity.toFixed(2)})`]
          });
        }
      }
    }
  }

  return candidates;
};
