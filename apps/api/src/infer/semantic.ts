import type { EmbeddingProvider } from '../embedding/provider';
import { EmbeddingError } from '../errors';
import type { Column, RelationshipCandidate, Schema } from '../types/schema';
import { clamp01, cosineSimilarity } from '../utils/similarity';

export type SemanticOptions = {
  threshold: number;
  discount: number;
};

export const DEFAULT_SEMANTIC_OPTIONS: SemanticOptions = { threshold: 0.7, discount: 0.8 };

type ColumnEntry = { table: string; column: Column; text: string };

export const describeColumn = (table: string, column: Column) => {
  const text = `${table} ${column.name} ${column.dataType}`;
  return column.isPrimaryKey ? `${text} primary key identifier` : text;
};

const buildCandidate = (
  fk: ColumnEntry,
  pk: ColumnEntry,
  similarity: number,
  discount: number
): RelationshipCandidate => ({
  sourceTable: fk.table,
  sourceColumn: fk.column.name,
  targetTable: pk.table,
  targetColumn: pk.column.name,
  confidence: clamp01(similarity * discount),
  relationshipType: 'many-to-one',
  evidence: [
    `High semantic similarity (${similarity.toFixed(2)})`,
    `'${pk.column.name}' is the primary key of '${pk.table}'`
  ]
});

/**
 * Embeds one descriptor per column and compares every pair exhaustively.
 * Only pairs where exactly one side is a primary key are informative.
 */
export const detectBySemanticSimilarity = async (
  schema: Schema,
  provider: EmbeddingProvider,
  options: SemanticOptions = DEFAULT_SEMANTIC_OPTIONS
): Promise<RelationshipCandidate[]> => {
  const entries: ColumnEntry[] = [];
  for (const table of Object.values(schema)) {
    for (const column of table.columns) {
      entries.push({ table: table.name, column, text: describeColumn(table.name, column) });
    }
  }
  if (entries.length < 2) return [];

  const vectors = await provider.embed(entries.map(e => e.text));
  if (vectors.length !== entries.length) {
    throw new EmbeddingError(`Embedding provider returned ${vectors.length} vectors for ${entries.length} texts`);
  }
  const dimensions = vectors[0].length;
  if (!dimensions || vectors.some(v => v.length !== dimensions)) {
    throw new EmbeddingError('Embedding provider returned vectors of inconsistent length');
  }

  const candidates: RelationshipCandidate[] = [];
  for (let i = 0; i < entries.length; i++) {
    for (let j = i + 1; j < entries.length; j++) {
      const a = entries[i];
      const b = entries[j];
      if (a.table === b.table) continue;

      const similarity = cosineSimilarity(vectors[i], vectors[j]);
      if (similarity <= options.threshold) continue;

      if (a.column.isPrimaryKey && !b.column.isPrimaryKey) {
        candidates.push(buildCandidate(b, a, similarity, options.discount));
      } else if (b.column.isPrimaryKey && !a.column.isPrimaryKey) {
        candidates.push(buildCandidate(a, b, similarity, options.discount));
      }
    }
  }

  return candidates;
};
