import express, { type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { z } from 'zod';

import { analyzeSchema, type AnalyzeOptions } from './analyzer';
import type { EmbeddingProvider } from './embedding/provider';
import { AppError, errorMessage } from './errors';
import { DEFAULT_SEMANTIC_OPTIONS } from './infer/semantic';
import { ingestDDL } from './ingest/ddl';
import { ingestMySQL, ingestPostgres, ingestSQLite } from './ingest/db';
import { componentLogger } from './logger';
import { buildAnalysisWorkbook } from './output/workbook';
import { loadSampleSchema } from './samples';
import type { Schema } from './types/schema';
import type { Oracle } from './verify/oracle';

const log = componentLogger('api');

export type AppDeps = {
  oracle: Oracle;
  embeddings?: EmbeddingProvider | null;
  analyze?: AnalyzeOptions;
  sampleRows?: number;
};

const FormatSchema = z.enum(['json', 'dbml', 'report', 'xlsx']).default('json');
type Format = z.infer<typeof FormatSchema>;

const RequestOptionsSchema = z
  .object({
    maxVerifications: z.number().int().min(0).optional(),
    semanticThreshold: z.number().min(0).max(1).optional(),
    projectName: z.string().min(1).optional(),
    tableGroups: z.boolean().optional()
  })
  .default({});
type RequestOptions = z.infer<typeof RequestOptionsSchema>;

const DdlBodySchema = z.object({
  ddl: z.string().min(1, 'DDL is required'),
  dialect: z.string().optional(),
  options: RequestOptionsSchema
});

const DbBodySchema = z.object({
  dbType: z.enum(['postgres', 'mysql']),
  connectionString: z.string().min(1, 'connectionString is required'),
  options: RequestOptionsSchema
});

const validationError = (error: z.ZodError) =>
  new AppError(error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; '), 400);

const parseBody = <S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> => {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) throw validationError(parsed.error);
  return parsed.data;
};

const parseFormat = (value: unknown): Format => {
  const parsed = FormatSchema.safeParse(typeof value === 'string' ? value.toLowerCase() : value);
  if (!parsed.success) throw validationError(parsed.error);
  return parsed.data;
};

export const createApp = (deps: AppDeps) => {
  const app = express();
  const upload = multer();

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  const mergeOptions = (requested: RequestOptions = {}): AnalyzeOptions => {
    const base = deps.analyze ?? {};
    const semantic = base.semantic ?? DEFAULT_SEMANTIC_OPTIONS;
    return {
      ...base,
      semantic: requested.semanticThreshold === undefined ? base.semantic : { ...semantic, threshold: requested.semanticThreshold },
      verify: requested.maxVerifications === undefined ? base.verify : { ...base.verify, maxVerifications: requested.maxVerifications },
      dbml: requested.projectName ? { ...base.dbml, projectName: requested.projectName } : base.dbml,
      tableGroups: requested.tableGroups ?? base.tableGroups
    };
  };

  const respond = async (res: Response, schema: Schema, format: Format, requested?: RequestOptions) => {
    const result = await analyzeSchema(schema, { oracle: deps.oracle, embeddings: deps.embeddings }, mergeOptions(requested));

    if (format === 'dbml') {
      res.type('text/plain').send(result.dbml);
      return;
    }
    if (format === 'report') {
      res.type('text/plain').send(`${result.reports.detection}\n${result.reports.verification}`);
      return;
    }
    if (format === 'xlsx') {
      res.setHeader('Content-Disposition', 'attachment; filename="schema-analysis.xlsx"');
      res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
      res.send(buildAnalysisWorkbook(result));
      return;
    }
    res.json(result);
  };

  const fail = (res: Response, err: unknown, fallback: string) => {
    if (err instanceof AppError) {
      res.status(err.status).json({ error: err.message });
      return;
    }
    log.error({ err: errorMessage(err) }, fallback);
    res.status(500).json({ error: errorMessage(err) || fallback });
  };

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true, oracle: deps.oracle.name, embeddings: deps.embeddings?.name ?? null });
  });

  app.post('/api/analyze/ddl', async (req, res) => {
    try {
      const format = parseFormat(req.query.format);
      const { ddl, dialect, options } = parseBody(DdlBodySchema, req.body);
      await respond(res, ingestDDL(ddl, dialect || 'postgresql'), format, options);
    } catch (err) {
      fail(res, err, 'DDL analysis failed');
    }
  });

  app.post('/api/analyze/db', async (req, res) => {
    try {
      const format = parseFormat(req.query.format);
      const { dbType, connectionString, options } = parseBody(DbBodySchema, req.body);
      const introspect = { sampleRows: deps.sampleRows };
      const schema = dbType === 'postgres'
        ? await ingestPostgres(connectionString, introspect)
        : await ingestMySQL(connectionString, introspect);
      await respond(res, schema, format, options);
    } catch (err) {
      fail(res, err, 'Database analysis failed');
    }
  });

  app.post('/api/analyze/sqlite', upload.single('file'), async (req, res) => {
    try {
      const format = parseFormat(req.query.format);
      const file = req.file;
      if (!file) throw new AppError('SQLite file required', 400);

      const tmpPath = path.join(os.tmpdir(), `schema-lens-${Date.now()}-${Math.random().toString(36).slice(2, 8)}.db`);
      await fs.writeFile(tmpPath, file.buffer);
      try {
        const schema = await ingestSQLite(tmpPath, { sampleRows: deps.sampleRows });
        await respond(res, schema, format);
      } finally {
        await fs.rm(tmpPath, { force: true });
      }
    } catch (err) {
      fail(res, err, 'SQLite analysis failed');
    }
  });

  app.get('/api/samples', async (req, res) => {
    try {
      await respond(res, loadSampleSchema(), parseFormat(req.query.format));
    } catch (err) {
      fail(res, err, 'Failed to load samples');
    }
  });

  return app;
};
