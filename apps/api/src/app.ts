import express from 'express';
import cors from 'cors';
import multer from 'multer';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import { type ExtractorConfig, configFromEnv } from './config';
import { countByEntity, extractBatch, extractEvidence, formatSummary } from './extract';
import { InvalidRequestError, parseExtractionRequest } from './extract/request';
import { DatabaseOpenError } from './ingest/db';
import {
  buildEvidenceWorkbook,
  isOutputFormat,
  outputFileName,
  renderCsv,
  toOutputRecord,
  writeRecordsFile
} from './output';
import { ENTITY_TYPES, type ExtractionReport } from './types/evidence';

export type AppOptions = {
  evidenceDir?: string;
  config?: ExtractorConfig;
};

const statusFor = (err: unknown) => {
  if (err instanceof InvalidRequestError) return 400;
  if (err instanceof DatabaseOpenError) return 422;
  return 500;
};

const messageOf = (err: unknown, fallback: string) => (err instanceof Error && err.message) || fallback;

const reportBody = (report: ExtractionReport, database: string) => ({
  database,
  counts: report.counts,
  tablesScanned: report.tablesScanned,
  skipped: report.skipped,
  records: report.records.map(toOutputRecord)
});

const parseFormat = (value: unknown) => {
  const format = String(value || 'json').toLowerCase();
  if (!isOutputFormat(format)) throw new InvalidRequestError(`Unsupported format: ${format}`);
  return format;
};

const isStringList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.length > 0 && value.every(v => typeof v === 'string');

// Batch paths are resolved inside the evidence directory and may not leave it.
const resolveEvidencePath = (evidenceDir: string, requested: string) => {
  const resolved = path.resolve(evidenceDir, requested);
  const rel = path.relative(evidenceDir, resolved);
  if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) {
    throw new InvalidRequestError(`Path is outside the evidence directory: ${requested}`);
  }
  return resolved;
};

export const createApp = (options: AppOptions = {}) => {
  const app = express();
  const upload = multer();
  const evidenceDir = path.resolve(options.evidenceDir || process.env.EVIDENCE_DIR || path.join(process.cwd(), 'data'));
  const config = options.config ?? configFromEnv();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.post('/api/extract', upload.single('file'), async (req, res) => {
    const file = req.file;
    if (!file) return res.status(400).json({ error: 'SQLite file required' });

    const tmpPath = path.join(os.tmpdir(), `evidence-${Date.now()}-${Math.random().toString(36).slice(2, 8)}.db`);
    try {
      const format = parseFormat(req.query.format);
      const request = parseExtractionRequest(req.query.entities, req.query.limit, process.env.SCAN_LIMIT);

      await fs.writeFile(tmpPath, file.buffer);
      const report = extractEvidence(tmpPath, request, config);
      const database = file.originalname;
      console.log(`[api] ${database}: ${formatSummary(report)}`);

      const baseName = path.parse(database).name.replace(/\s+/g, '_') || 'evidence';
      if (format === 'csv') {
        res.setHeader('Content-Disposition', `attachment; filename="${baseName}.ground_truth.csv"`);
        res.type('text/csv').send(renderCsv(report.records));
        return;
      }
      if (format === 'xlsx') {
        res.setHeader('Content-Disposition', `attachment; filename="${baseName}.ground_truth.xlsx"`);
        res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
        res.send(buildEvidenceWorkbook({ ...report, database }));
        return;
      }

      res.json(reportBody(report, database));
    } catch (err) {
      res.status(statusFor(err)).json({ error: messageOf(err, 'Extraction failed') });
    } finally {
      await fs.rm(tmpPath, { force: true });
    }
  });

  app.post('/api/extract/batch', async (req, res) => {
    try {
      const body: Record<string, unknown> = req.body || {};
      const paths = body.paths;
      if (!isStringList(paths)) {
        return res.status(400).json({ error: 'paths must be a non-empty array of strings' });
      }

      const request = parseExtractionRequest(body.entities, body.limit, process.env.SCAN_LIMIT);
      const format = parseFormat(body.format);
      if (body.outDir !== undefined && typeof body.outDir !== 'string') {
        throw new InvalidRequestError('outDir must be a string');
      }
      const outDir = body.outDir === undefined ? null : resolveEvidencePath(evidenceDir, body.outDir);
      const files = paths.map(p => resolveEvidencePath(evidenceDir, p));
      const batch = extractBatch(files, request, config);

      // One <relative path>.ground_truth.<format> file per readable database.
      const outputs: (string | null)[] = [];
      for (const [i, result] of batch.entries()) {
        if (!outDir || !result.ok) {
          outputs.push(null);
          continue;
        }
        const rel = path.relative(evidenceDir, files[i]);
        const outPath = path.join(outDir, outputFileName(rel, format));
        await writeRecordsFile({ ...result.report, database: rel }, outPath);
        outputs.push(path.relative(evidenceDir, outPath));
      }

      const counts = countByEntity([]);
      batch.forEach(result => {
        if (result.ok) ENTITY_TYPES.forEach(t => (counts[t] += result.report.counts[t]));
      });
      const succeeded = batch.filter(result => result.ok).length;

      res.json({
        results: batch.map((result, i) =>
          result.ok
            ? { ok: true, ...reportBody(result.report, paths[i]), ...(outputs[i] ? { output: outputs[i] } : {}) }
            : { ok: false, database: paths[i], error: result.error }
        ),
        summary: { databases: batch.length, succeeded, failed: batch.length - succeeded, counts }
      });
    } catch (err) {
      res.status(statusFor(err)).json({ error: messageOf(err, 'Batch extraction failed') });
    }
  });

  return app;
};
