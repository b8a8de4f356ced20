import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { ingestDDL } from './ingest/ddl';
import type { Schema } from './types/schema';

const samplesDir = path.join(path.dirname(fileURLToPath(import.meta.url)), '../samples');

export const loadSampleDDL = (name = 'store') => fs.readFileSync(path.join(samplesDir, `${name}.sql`), 'utf8');

export const loadSampleSchema = (name = 'store'): Schema => ingestDDL(loadSampleDDL(name), 'postgresql');
