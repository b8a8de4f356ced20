import type { ColumnSummary, RelationshipCandidate, SampleRow } from '../types/schema';

export type VerificationRequest = {
  candidate: RelationshipCandidate;
  sourceColumns: ColumnSummary[];
  targetColumns: ColumnSummary[];
  sampleRows?: Record<string, readonly SampleRow[]>;
};

const json = (value: unknown) => JSON.stringify(value, null, 2);

export const buildVerificationPrompt = ({ candidate, sourceColumns, targetColumns, sampleRows }: VerificationRequest) => {
  let prompt = `
You are a database modeling expert. Decide whether the following proposed relationship between two columns is a real foreign-key relationship.

PROPOSED RELATIONSHIP:
- Source table: ${candidate.sourceTable}
- Source column: ${candidate.sourceColumn}
- Target table: ${candidate.targetTable}
- Target column: ${candidate.targetColumn}
- Detector confidence: ${candidate.confidence.toFixed(2)}
- Evidence: ${candidate.evidence.join('; ')}

SOURCE TABLE (${candidate.sourceTable}) COLUMNS:
${json(sourceColumns)}

TARGET TABLE (${candidate.targetTable}) COLUMNS:
${json(targetColumns)}
`;

  if (sampleRows && Object.keys(sampleRows).length) {
    prompt += `
SAMPLE DATA:
${candidate.sourceTable}: ${json(sampleRows[candidate.sourceTable] ?? [])}
${candidate.targetTable}: ${json(sampleRows[candidate.targetTable] ?? [])}
`;
  }

  prompt += `
Respond with JSON:
{
  "is_valid": true | false,
  "confidence": 0.0-1.0,
  "relationship_type": "foreign_key" | "junction_table" | "none",
  "cardinality": "1:1" | "1:N" | "N:1" | "N:M",
  "explanation": "short explanation",
  "recommendation": "suggested action"
}

Consider:
1. Do the column names suggest a relationship?
2. Are the data types compatible?
3. Does the cardinality make sense for the domain?
4. Does the sample data support it?
`;

  return prompt;
};
