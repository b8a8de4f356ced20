import { formatPercent } from '../infer/rank';
import type { VerifiedRelationship } from '../types/schema';

const truncate = (text: string, max: number) => (text.length > max ? `${text.slice(0, max)}...` : text);

export const buildVerificationReport = (verified: readonly VerifiedRelationship[]) => {
  const valid = verified.filter(v => v.isValid);
  const invalid = verified.filter(v => !v.isValid);

  const lines = ['', '='.repeat(80), 'VERIFICATION REPORT', '='.repeat(80), '', `VALID relationships: ${valid.length}`, '='.repeat(40)];

  for (const rel of valid) {
    lines.push(
      '',
      `${rel.sourceTable}.${rel.sourceColumn} → ${rel.targetTable}.${rel.targetColumn}`,
      `  Cardinality: ${rel.cardinality}`,
      `  Oracle confidence: ${formatPercent(rel.llmConfidence)}`,
      `  Explanation: ${truncate(rel.explanation, 100)}`
    );
  }

  if (invalid.length) {
    lines.push('', '', `INVALID relationships: ${invalid.length}`, '='.repeat(40));
    for (const rel of invalid) {
      lines.push(
        '',
        `${rel.sourceTable}.${rel.sourceColumn} → ${rel.targetTable}.${rel.targetColumn}`,
        `  Reason: ${truncate(rel.explanation, 100)}`
      );
    }
  }

  return lines.join('\n');
};
