import type { GoogleGenAI } from '@google/genai';
import { EmbeddingError } from '../errors';

export interface EmbeddingProvider {
  readonly name: string;
  embed(texts: string[]): Promise<number[][]>;
}

export class GeminiEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;

  constructor(
    private readonly ai: GoogleGenAI,
    private readonly model: string
  ) {
    this.name = `gemini:${model}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (!texts.length) return [];
    const response = await this.ai.models.embedContent({
      model: this.model,
      contents: texts
    });

    const vectors = (response.embeddings ?? []).map(e => e.values ?? []);
    if (vectors.length !== texts.length) {
      throw new EmbeddingError(`Expected ${texts.length} embeddings, received ${vectors.length}`);
    }
    return vectors;
  }
}

export const createEmbeddingProvider = (ai: GoogleGenAI | null, model: string): EmbeddingProvider | null =>
  ai ? new GeminiEmbeddingProvider(ai, model) : null;
