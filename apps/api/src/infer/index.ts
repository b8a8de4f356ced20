import type { EmbeddingProvider } from '../embedding/provider';
import { errorMessage } from '../errors';
import { componentLogger } from '../logger';
import type { RelationshipCandidate, Schema } from '../types/schema';
import { declaredForeignKeys } from '../utils/schema';
import { consolidateCandidates, validateCandidates } from './consolidate';
import { detectByPatterns } from './patterns';
import { rankCandidates } from './rank';
import { DEFAULT_SEMANTIC_OPTIONS, detectBySemanticSimilarity, type SemanticOptions } from './semantic';
import { detectByTypeCompatibility } from './typeCompat';

const log = componentLogger('detector');

export type DetectionOptions = {
  embeddings?: EmbeddingProvider | null;
  semantic?: SemanticOptions;
};

export type DetectionResult = {
  candidates: RelationshipCandidate[];
  counts: { pattern: number; semantic: number; type: number; dropped: number };
  warnings: string[];
};

/**
 * Runs the pattern, semantic and type detectors in that order, then validates,
 * consolidates and ranks their combined output. A failing embedding provider
 * only removes the semantic detector's contribution.
 */
export const detectRelationships = async (
  schema: Schema,
  options: DetectionOptions = {}
): Promise<DetectionResult> => {
  const warnings: string[] = [];

  const pattern = detectByPatterns(schema);

  let semantic: RelationshipCandidate[] = [];
  if (options.embeddings) {
    try {
      semantic = await detectBySemanticSimilarity(schema, options.embeddings, options.semantic ?? DEFAULT_SEMANTIC_OPTIONS);
    } catch (err) {
      const message = `Semantic similarity skipped: ${errorMessage(err)}`;
      log.warn({ provider: options.embeddings.name, err: errorMessage(err) }, 'Embedding provider failed');
      warnings.push(message);
    }
  } else {
    warnings.push('Semantic similarity skipped: no embedding provider configured');
  }

  const types = detectByTypeCompatibility(schema);

  const { kept, dropped } = validateCandidates(schema, [...pattern, ...semantic, ...types]);
  if (dropped.length) warnings.push(`Dropped ${dropped.length} candidates with unknown columns or out-of-range confidence`);

  const consolidated = consolidateCandidates(kept, declaredForeignKeys(schema));
  const candidates = rankCandidates(consolidated);

  log.info(
    { pattern: pattern.length, semantic: semantic.length, type: types.length, consolidated: candidates.length },
    'Relationship detection finished'
  );

  return {
    candidates,
    counts: { pattern: pattern.length, semantic: semantic.length, type: types.length, dropped: dropped.length },
    warnings
  };
};
