import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes');

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  GEMINI_EMBEDDING_MODEL: z.string().min(1).default('gemini-embedding-001'),
  ORACLE_ENABLED: booleanFlag.default('true'),
  // setTimeout treats delays above 2^31-1 as 1ms
  ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().max(2_147_483_647).default(30000),
  ORACLE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  MAX_VERIFICATIONS: z.coerce.number().int().min(0).default(10),
  SEMANTIC_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  SEMANTIC_DISCOUNT: z.coerce.number().min(0).max(1).default(0.8),
  SAMPLE_ROWS: z.coerce.number().int().min(0).default(5),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export type AppConfig = {
  port: number;
  geminiApiKey?: string;
  geminiModel: string;
  embeddingModel: string;
  oracle: {
    enabled: boolean;
    timeoutMs: number;
    delayMs: number;
    maxVerifications: number;
  };
  semantic: {
    threshold: number;
    discount: number;
  };
  sampleRows: number;
  logLevel: string;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const blanksRemoved = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''));
  const parsed = ConfigSchema.safeParse(blanksRemoved);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const c = parsed.data;
  return {
    port: c.PORT,
    geminiApiKey: c.GEMINI_API_KEY,
    geminiModel: c.GEMINI_MODEL,
    embeddingModel: c.GEMINI_EMBEDDING_MODEL,
    oracle: {
      enabled: c.ORACLE_ENABLED,
      timeoutMs: c.ORACLE_TIMEOUT_MS,
      delayMs: c.ORACLE_DELAY_MS,
      maxVerifications: c.MAX_VERIFICATIONS
    },
    semantic: {
      threshold: c.SEMANTIC_THRESHOLD,
      discount: c.SEMANTIC_DISCOUNT
    },
    sampleRows: c.SAMPLE_ROWS,
    logLevel: c.LOG_LEVEL
  };
};

export const loadEnv = () => {
  // Load root .env if present
  dotenv.config({ path: path.join(__dirname, '../../../.env') });
  // Fallback to local .env
  dotenv.config();
};
