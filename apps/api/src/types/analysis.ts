import type { RelationshipCandidate, Schema, VerifiedRelationship } from './schema';

export type AnalysisReports = {
  detection: string;
  verification: string;
};

export type AnalysisResult = {
  generatedAt: string;
  oracle: string;
  schema: Schema;
  candidates: RelationshipCandidate[];
  verified: VerifiedRelationship[];
  /** Declared foreign keys followed by verified inferences. */
  relationships: VerifiedRelationship[];
  stats: {
    tables: number;
    columns: number;
    rows: number;
    declared: number;
    inferredValid: number;
  };
  reports: AnalysisReports;
  dbml: string;
  warnings: string[];
};
