import { type GoogleGenAI, Type } from '@google/genai';
import { z } from 'zod';
import { OracleError } from '../errors';
import { CARDINALITIES, type Cardinality, LINK_KINDS, type LinkKind } from '../types/schema';
import { parseJsonLenient } from '../utils/json';
import { buildVerificationPrompt, type VerificationRequest } from './prompt';

export type OracleJudgment = {
  isValid: boolean;
  confidence: number;
  relationshipType: LinkKind;
  cardinality: Cardinality;
  explanation: string;
};

export interface Oracle {
  readonly name: string;
  /** External oracles are throttled between calls; local ones are not. */
  readonly throttled: boolean;
  /** `signal` aborts when the verifier gives up on the call. */
  judge(request: VerificationRequest, signal?: AbortSignal): Promise<OracleJudgment>;
}

export class RuleBasedOracle implements Oracle {
  readonly name = 'rules';
  readonly throttled = false;

  async judge({ candidate }: VerificationRequest): Promise<OracleJudgment> {
    let cardinality: Cardinality = '1:N';
    if (candidate.sourceColumn.endsWith('_id') && candidate.targetColumn === 'id') {
      cardinality = 'N:1';
    } else if (candidate.evidence.some(e => e.toLowerCase().includes('unique'))) {
      cardinality = '1:1';
    }

    return {
      isValid: candidate.confidence > 0.7,
      confidence: candidate.confidence,
      relationshipType: 'foreign_key',
      cardinality,
      explanation: `Rule-based verification: ${candidate.evidence.join(', ')}`
    };
  }
}

// Models sometimes quote numbers; anything else non-numeric is a malformed reply.
const ConfidenceSchema = z
  .union([z.number(), z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number)])
  .pipe(z.number().min(0).max(1));

const JudgmentSchema = z.object({
  is_valid: z.boolean(),
  confidence: ConfidenceSchema,
  relationship_type: z.enum(LINK_KINDS).catch('foreign_key'),
  cardinality: z.enum(CARDINALITIES),
  explanation: z.string().default(''),
  recommendation: z.string().optional()
});

export const parseJudgment = (text: string): OracleJudgment => {
  const raw = parseJsonLenient(text);
  if (raw === undefined) throw new OracleError('Oracle response is not JSON');

  const parsed = JudgmentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new OracleError(`Oracle response has unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const { is_valid, confidence, relationship_type, cardinality, explanation, recommendation } = parsed.data;
  return {
    isValid: is_valid,
    confidence,
    relationshipType: relationship_type,
    cardinality,
    explanation: recommendation ? `${explanation} Recommendation: ${recommendation}`.trim() : explanation
  };
};

export type CompletionTransport = (prompt: string, signal?: AbortSignal) => Promise<string>;

export class LlmOracle implements Oracle {
  readonly throttled = true;

  constructor(
    readonly name: string,
    private readonly complete: CompletionTransport
  ) {}

  async judge(request: VerificationRequest, signal?: AbortSignal): Promise<OracleJudgment> {
    const text = await this.complete(buildVerificationPrompt(request), signal);
    if (!text) throw new OracleError('Oracle returned an empty response');
    return parseJudgment(text);
  }
}

export type ExternalOracleBackend = {
  name: string;
  complete: CompletionTransport;
  /** Resolves when the model is reachable. */
  probe: () => Promise<unknown>;
};

export const geminiBackend = (ai: GoogleGenAI, model: string): ExternalOracleBackend => ({
  name: `gemini:${model}`,
  probe: () => ai.models.get({ model }),
  complete: async (prompt, signal) => {
    const response = await ai.models.generateContent({
      model,
      contents: prompt,
      config: {
        abortSignal: signal,
        responseMimeType: 'application/json',
        responseSchema: {
          type: Type.OBJECT,
          properties: {
            is_valid: { type: Type.BOOLEAN },
            confidence: { type: Type.NUMBER },
            relationship_type: { type: Type.STRING, enum: [...LINK_KINDS] },
            cardinality: { type: Type.STRING, enum: [...CARDINALITIES] },
            explanation: { type: Type.STRING },
            recommendation: { type: Type.STRING }
          },
          required: ['is_valid', 'confidence', 'cardinality', 'explanation']
        }
      }
    });
    return response.text || '';
  }
});
