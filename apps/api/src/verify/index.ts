import { errorMessage } from '../errors';
import { componentLogger } from '../logger';
import { rankCandidates } from '../infer/rank';
import type { RelationshipCandidate, SampleRow, Schema, VerifiedRelationship } from '../types/schema';
import { sleep as defaultSleep, withTimeout } from '../utils/async';
import { summarizeColumns } from '../utils/schema';
import { type ExternalOracleBackend, LlmOracle, type Oracle, type OracleJudgment, RuleBasedOracle } from './oracle';
import type { VerificationRequest } from './prompt';

const log = componentLogger('verifier');

export const DEFAULT_MAX_VERIFICATIONS = 10;
export const DEFAULT_ORACLE_TIMEOUT_MS = 30_000;
export const DEFAULT_ORACLE_DELAY_MS = 500;

export const FALLBACK_JUDGMENT: OracleJudgment = {
  isValid: false,
  confidence: 0.5,
  relationshipType: 'none',
  cardinality: '1:N',
  explanation: 'unparseable oracle response'
};

export type VerifyOptions = {
  maxVerifications?: number;
  timeoutMs?: number;
  delayMs?: number;
  /** Sample rows per table; defaults to the rows captured during introspection. */
  sampleRows?: Record<string, readonly SampleRow[]>;
  sleep?: (ms: number) => Promise<void>;
};

const sampleRowsFor = (
  schema: Schema,
  candidate: RelationshipCandidate,
  override?: Record<string, readonly SampleRow[]>
) => {
  const rows: Record<string, readonly SampleRow[]> = {};
  for (const table of [candidate.sourceTable, candidate.targetTable]) {
    const sample = override?.[table] ?? schema[table]?.sampleRows;
    if (sample?.length) rows[table] = sample;
  }
  return Object.keys(rows).length ? rows : undefined;
};

const judgeSafely = async (oracle: Oracle, request: VerificationRequest, timeoutMs: number) => {
  const controller = new AbortController();
  try {
    return await withTimeout(oracle.judge(request, controller.signal), timeoutMs, `Oracle ${oracle.name}`);
  } catch (err) {
    controller.abort();
    const { candidate } = request;
    log.warn(
      { oracle: oracle.name, source: `${candidate.sourceTable}.${candidate.sourceColumn}`, err: errorMessage(err) },
      'Oracle call failed, using fallback judgment'
    );
    return FALLBACK_JUDGMENT;
  }
};

export const toVerified = (candidate: RelationshipCandidate, judgment: OracleJudgment): VerifiedRelationship => ({
  sourceTable: candidate.sourceTable,
  sourceColumn: candidate.sourceColumn,
  targetTable: candidate.targetTable,
  targetColumn: candidate.targetColumn,
  confidence: candidate.confidence,
  llmConfidence: judgment.confidence,
  relationshipType: judgment.relationshipType,
  cardinality: judgment.cardinality,
  explanation: judgment.explanation,
  isValid: judgment.isValid,
  source: 'inferred'
});

/**
 * Asks the oracle about the top candidates, one call each and in rank order.
 * A call that throws, times out or returns garbage yields the fallback judgment.
 */
export const verifyCandidates = async (
  candidates: readonly RelationshipCandidate[],
  oracle: Oracle,
  schema: Schema,
  options: VerifyOptions = {}
): Promise<VerifiedRelationship[]> => {
  const {
    maxVerifications = DEFAULT_MAX_VERIFICATIONS,
    timeoutMs = DEFAULT_ORACLE_TIMEOUT_MS,
    delayMs = DEFAULT_ORACLE_DELAY_MS,
    sleep = defaultSleep
  } = options;

  const selected = rankCandidates(candidates).slice(0, Math.max(0, maxVerifications));
  const verified: VerifiedRelationship[] = [];

  for (const [index, candidate] of selected.entries()) {
    if (index > 0 && oracle.throttled && delayMs > 0) await sleep(delayMs);

    log.debug(
      { oracle: oracle.name, step: `${index + 1}/${selected.length}` },
      `Verifying ${candidate.sourceTable}.${candidate.sourceColumn} -> ${candidate.targetTable}.${candidate.targetColumn}`
    );

    const judgment = await judgeSafely(
      oracle,
      {
        candidate,
        sourceColumns: summarizeColumns(schema[candidate.sourceTable]),
        targetColumns: summarizeColumns(schema[candidate.targetTable]),
        sampleRows: sampleRowsFor(schema, candidate, options.sampleRows)
      },
      timeoutMs
    );
    verified.push(toVerified(candidate, judgment));
  }

  return verified;
};

export type OracleSelection = {
  enabled: boolean;
  backend: ExternalOracleBackend | null;
  timeoutMs?: number;
};

/**
 * Picks the oracle for a whole run. The external backend is used only when it is
 * enabled and its model answers a probe; otherwise the rule-based oracle is used.
 */
export const createOracle = async ({ enabled, backend, timeoutMs = DEFAULT_ORACLE_TIMEOUT_MS }: OracleSelection): Promise<Oracle> => {
  if (!enabled || !backend) {
    log.info('External oracle disabled, using rule-based verification');
    return new RuleBasedOracle();
  }

  try {
    await withTimeout(backend.probe(), timeoutMs, `Probe ${backend.name}`);
    log.info({ oracle: backend.name }, 'External oracle available');
    return new LlmOracle(backend.name, backend.complete);
  } catch (err) {
    log.warn({ oracle: backend.name, err: errorMessage(err) }, 'External oracle unavailable, using rule-based verification');
    return new RuleBasedOracle();
  }
};
