import { componentLogger } from '../logger';
import type { RelationshipCandidate, Schema } from '../types/schema';
import { hasColumn } from '../utils/schema';

const log = componentLogger('consolidator');

export const candidateKey = (c: RelationshipCandidate) =>
  `${c.sourceTable}.${c.sourceColumn}->${c.targetTable}.${c.targetColumn}`;

/**
 * Drops candidates already declared as foreign keys, then merges candidates that
 * share the same source and target columns. The merged confidence is the strongest
 * signal seen; evidence is the ordered union. Output order follows first appearance.
 */
export const consolidateCandidates = (
  candidates: readonly RelationshipCandidate[],
  declared: ReadonlyMap<string, string> = new Map()
): RelationshipCandidate[] => {
  const merged = new Map<string, { candidate: RelationshipCandidate; evidence: Set<string> }>();

  for (const candidate of candidates) {
    if (declared.has(`${candidate.sourceTable}.${candidate.sourceColumn}`)) continue;

    const key = candidateKey(candidate);
    const existing = merged.get(key);
    if (!existing) {
      merged.set(key, { candidate, evidence: new Set(candidate.evidence) });
      continue;
    }

    candidate.evidence.forEach(e => existing.evidence.add(e));
    if (candidate.confidence > existing.candidate.confidence) {
      existing.candidate = { ...existing.candidate, confidence: candidate.confidence };
    }
  }

  return Array.from(merged.values(), ({ candidate, evidence }) => ({
    ...candidate,
    evidence: Array.from(evidence)
  }));
};

export type CandidateValidation = {
  kept: RelationshipCandidate[];
  dropped: RelationshipCandidate[];
};

/** Separates candidates that reference tables or columns missing from the schema. */
export const validateCandidates = (
  schema: Schema,
  candidates: readonly RelationshipCandidate[]
): CandidateValidation => {
  const kept: RelationshipCandidate[] = [];
  const dropped: RelationshipCandidate[] = [];

  for (const candidate of candidates) {
    const wellFormed =
      hasColumn(schema, candidate.sourceTable, candidate.sourceColumn) &&
      hasColumn(schema, candidate.targetTable, candidate.targetColumn) &&
      Number.isFinite(candidate.confidence) &&
      candidate.confidence >= 0 &&
      candidate.confidence <= 1;

    if (wellFormed) {
      kept.push(candidate);
    } else {
      log.warn({ candidate: candidateKey(candidate) }, 'Dropping candidate that does not match the schema');
      dropped.push(candidate);
    }
  }

  return { kept, dropped };
};
