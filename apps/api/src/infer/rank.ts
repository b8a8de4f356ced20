import type { RelationshipCandidate } from '../types/schema';

export const HIGH_CONFIDENCE = 0.8;
export const MEDIUM_CONFIDENCE = 0.6;

// Array.prototype.sort is stable, so ties keep their consolidated order.
export const rankCandidates = (candidates: readonly RelationshipCandidate[]): RelationshipCandidate[] =>
  [...candidates].sort((a, b) => b.confidence - a.confidence);

export const confidenceTier = (confidence: number): 'high' | 'medium' | 'low' => {
  if (confidence >= HIGH_CONFIDENCE) return 'high';
  if (confidence >= MEDIUM_CONFIDENCE) return 'medium';
  return 'low';
};

export const formatPercent = (value: number) => `${(value * 100).toFixed(1)}%`;

const arrow = (c: RelationshipCandidate) => `${c.sourceTable}.${c.sourceColumn} → ${c.targetTable}.${c.targetColumn}`;

export const buildDetectionReport = (candidates: readonly RelationshipCandidate[]) => {
  const high = candidates.filter(c => confidenceTier(c.confidence) === 'high');
  const medium = candidates.filter(c => confidenceTier(c.confidence) === 'medium');
  const low = candidates.filter(c => confidenceTier(c.confidence) === 'low');

  const lines = ['='.repeat(80), 'DETECTED RELATIONSHIPS', '='.repeat(80)];

  if (high.length) {
    lines.push('', 'HIGH CONFIDENCE (>= 80%)', '-'.repeat(40));
    for (const c of high) {
      lines.push('', arrow(c), `  Confidence: ${formatPercent(c.confidence)}`, `  Type: ${c.relationshipType}`, '  Evidence:');
      c.evidence.forEach(e => lines.push(`    - ${e}`));
    }
  }

  if (medium.length) {
    lines.push('', 'MEDIUM CONFIDENCE (60-79%)', '-'.repeat(40));
    for (const c of medium) {
      lines.push('', arrow(c), `  Confidence: ${formatPercent(c.confidence)}`);
    }
  }

  if (low.length) {
    lines.push('', 'LOW CONFIDENCE (< 60%)', '-'.repeat(40));
    lines.push(`Found ${low.length} low-confidence relationships`);
  }

  lines.push('', `Total relationships detected: ${candidates.length}`);
  return lines.join('\n');
};
