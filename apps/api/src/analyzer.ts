import type { EmbeddingProvider } from './embedding/provider';
import { EmptySchemaError } from './errors';
import { detectRelationships } from './infer';
import { buildDetectionReport } from './infer/rank';
import type { SemanticOptions } from './infer/semantic';
import { componentLogger } from './logger';
import { type DbmlOptions, generateDbml } from './output/dbml';
import { addTableGroups, autoTableGroups } from './output/groups';
import type { AnalysisResult } from './types/analysis';
import type { Schema, VerifiedRelationship } from './types/schema';
import { countColumns, declaredForeignKeys, parseRef } from './utils/schema';
import { verifyCandidates, type VerifyOptions } from './verify';
import type { Oracle } from './verify/oracle';
import { buildVerificationReport } from './verify/report';

const log = componentLogger('analyzer');

export type AnalyzerDeps = {
  oracle: Oracle;
  embeddings?: EmbeddingProvider | null;
};

export type AnalyzeOptions = {
  semantic?: SemanticOptions;
  verify?: Omit<VerifyOptions, 'sleep'>;
  dbml?: DbmlOptions;
  tableGroups?: boolean;
  sleep?: (ms: number) => Promise<void>;
};

export const declaredRelationships = (schema: Schema): VerifiedRelationship[] => {
  const relationships: VerifiedRelationship[] = [];
  declaredForeignKeys(schema).forEach((ref, key) => {
    const source = parseRef(key);
    const target = parseRef(ref);
    if (!source || !target) return;
    relationships.push({
      sourceTable: source.table,
      sourceColumn: source.column,
      targetTable: target.table,
      targetColumn: target.column,
      confidence: 1,
      llmConfidence: 1,
      relationshipType: 'foreign_key',
      cardinality: 'N:1',
      explanation: 'Declared foreign key constraint',
      isValid: true,
      source: 'declared'
    });
  });
  return relationships;
};

/** Detects, verifies and renders the relationships of one schema. */
export const analyzeSchema = async (
  schema: Schema,
  deps: AnalyzerDeps,
  options: AnalyzeOptions = {}
): Promise<AnalysisResult> => {
  const tables = Object.values(schema);
  if (!tables.length) throw new EmptySchemaError();

  const detection = await detectRelationships(schema, {
    embeddings: deps.embeddings,
    semantic: options.semantic
  });

  const verified = await verifyCandidates(detection.candidates, deps.oracle, schema, {
    ...options.verify,
    sleep: options.sleep
  });

  const declared = declaredRelationships(schema);
  const relationships = [...declared, ...verified];

  let dbml = generateDbml(schema, relationships, options.dbml);
  if (options.tableGroups ?? true) dbml = addTableGroups(dbml, autoTableGroups(schema, relationships));

  const inferredValid = verified.filter(r => r.isValid).length;
  log.info(
    { tables: tables.length, candidates: detection.candidates.length, verified: verified.length, inferredValid },
    'Schema analysis finished'
  );

  return {
    generatedAt: new Date().toISOString(),
    oracle: deps.oracle.name,
    schema,
    candidates: detection.candidates,
    verified,
    relationships,
    stats: {
      tables: tables.length,
      columns: countColumns(schema),
      rows: tables.reduce((sum, t) => sum + t.rowCount, 0),
      declared: declared.length,
      inferredValid
    },
    reports: {
      detection: buildDetectionReport(detection.candidates),
      verification: buildVerificationReport(verified)
    },
    dbml,
    warnings: detection.warnings
  };
};
