import { GoogleGenAI } from '@google/genai';
import { createApp } from './app';
import { loadConfig, loadEnv } from './config';
import { createEmbeddingProvider } from './embedding/provider';
import { logger } from './logger';
import { createOracle } from './verify';
import { geminiBackend } from './verify/oracle';

loadEnv();
const config = loadConfig();
logger.level = config.logLevel;

const ai = config.geminiApiKey ? new GoogleGenAI({ apiKey: config.geminiApiKey }) : null;

const oracle = await createOracle({
  enabled: config.oracle.enabled,
  backend: ai ? geminiBackend(ai, config.geminiModel) : null,
  timeoutMs: config.oracle.timeoutMs
});

const app = createApp({
  oracle,
  embeddings: createEmbeddingProvider(ai, config.embeddingModel),
  sampleRows: config.sampleRows,
  analyze: {
    semantic: config.semantic,
    verify: {
      maxVerifications: config.oracle.maxVerifications,
      timeoutMs: config.oracle.timeoutMs,
      delayMs: config.oracle.delayMs
    }
  }
});

app.listen(config.port, () => {
  logger.info({ port: config.port, oracle: oracle.name }, `Schema Lens API running on ${config.port}`);
});
