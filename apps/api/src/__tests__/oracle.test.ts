import { describe, it, expect, vi } from 'vitest';
import { OracleError } from '../errors';
import { LlmOracle, parseJudgment, RuleBasedOracle } from '../verify/oracle';
import type { VerificationRequest } from '../verify/prompt';
import { makeCandidate } from './fixtures';

const request = (candidate = makeCandidate('customer_id', 0.75)): VerificationRequest => ({
  candidate,
  sourceColumns: [{ name: 'customer_id', type: 'integer', nullable: true, primaryKey: false }],
  targetColumns: [{ name: 'id', type: 'integer', nullable: false, primaryKey: true }]
});

describe('RuleBasedOracle', () => {
  const oracle = new RuleBasedOracle();

  it('accepts confident _id -> id links as many-to-one', async () => {
    const judgment = await oracle.judge(request());
    expect(judgment).toEqual({
      isValid: true,
      confidence: 0.75,
      relationshipType: 'foreign_key',
      cardinality: 'N:1',
      explanation: 'Rule-based verification: test evidence'
    });
  });

  it('rejects candidates at or below 70% confidence', async () => {
    expect((await oracle.judge(request(makeCandidate('customer_id', 0.5)))).isValid).toBe(false);
    expect((await oracle.judge(request(makeCandidate('customer_id', 0.7)))).isValid).toBe(false);
  });

  it('uses unique evidence for one-to-one and defaults to one-to-many', async () => {
    const unique = makeCandidate('email_ref', 0.8, { evidence: ["Column 'email_ref' has a unique constraint"] });
    expect((await oracle.judge(request(unique))).cardinality).toBe('1:1');

    const plain = makeCandidate('owner', 0.8, { targetColumn: 'user_key' });
    expect((await oracle.judge(request(plain))).cardinality).toBe('1:N');
  });

  it('is not throttled', () => {
    expect(oracle.throttled).toBe(false);
    expect(oracle.name).toBe('rules');
  });
});

describe('parseJudgment', () => {
  it('reads fenced JSON and appends the recommendation', () => {
    const text = [
      '```json',
      '{"is_valid": true, "confidence": 0.92, "relationship_type": "foreign_key", "cardinality": "N:1",',
      ' "explanation": "Orders belong to customers", "recommendation": "Add a FK constraint"}',
      '```'
    ].join('\n');

    expect(parseJudgment(text)).toEqual({
      isValid: true,
      confidence: 0.92,
      relationshipType: 'foreign_key',
      cardinality: 'N:1',
      explanation: 'Orders belong to customers Recommendation: Add a FK constraint'
    });
  });

  it('extracts JSON wrapped in prose and fills optional fields', () => {
    const text = 'Sure! {"is_valid": false, "confidence": "0.3", "cardinality": "1:N"} Hope this helps';
    expect(parseJudgment(text)).toEqual({
      isValid: false,
      confidence: 0.3,
      relationshipType: 'foreign_key',
      cardinality: '1:N',
      explanation: ''
    });
  });

  it('throws OracleError for text that is not JSON', () => {
    expect(() => parseJudgment('I think so')).toThrow(new OracleError('Oracle response is not JSON'));
  });

  it('throws OracleError for JSON with the wrong shape', () => {
    expect(() => parseJudgment('{"is_valid": "yes", "confidence": 0.4, "cardinality": "1:N"}')).toThrow(/unexpected shape/);
    expect(() => parseJudgment('{"is_valid": true, "confidence": 4, "cardinality": "1:N"}')).toThrow(OracleError);
  });

  it('rejects confidences that are not numbers or numeric strings', () => {
    for (const confidence of ['null', '""', 'true', '[]', '"high"']) {
      const text = `{"is_valid": true, "confidence": ${confidence}, "cardinality": "N:1"}`;
      expect(() => parseJudgment(text)).toThrow(OracleError);
    }
  });
});

describe('LlmOracle', () => {
  it('sends the verification prompt and parses the reply', async () => {
    const complete = vi.fn(async (_prompt: string) =>
      '{"is_valid": true, "confidence": 0.8, "relationship_type": "foreign_key", "cardinality": "N:1", "explanation": "ok"}'
    );
    const oracle = new LlmOracle('fake-llm', complete);

    const judgment = await oracle.judge(request());
    expect(judgment.isValid).toBe(true);
    expect(judgment.explanation).toBe('ok');
    expect(oracle.throttled).toBe(true);

    const prompt = complete.mock.calls[0][0];
    expect(prompt).toContain('- Source column: customer_id');
    expect(prompt).toContain('- Target table: customers');
  });

  it('includes sample rows when they are provided', async () => {
    const complete = vi.fn(async (_prompt: string) => '{"is_valid": false, "confidence": 0.1, "cardinality": "1:N"}');
    await new LlmOracle('fake-llm', complete).judge({
      ...request(),
      sampleRows: { orders: [{ id: 1, customer_id: 7 }] }
    });
    expect(complete.mock.calls[0][0]).toContain('SAMPLE DATA:');
  });

  it('rejects empty replies', async () => {
    const oracle = new LlmOracle('fake-llm', async () => '');
    await expect(oracle.judge(request())).rejects.toThrow('Oracle returned an empty response');
  });
});
