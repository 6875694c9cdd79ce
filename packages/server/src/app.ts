import { promises as fs } from 'node:fs';
import path from 'node:path';

import {
  formMetadataSchema,
  rankForms,
  recommendationsFor,
  scenarioSchema,
  type FormTestEngine,
  type Logger
} from '@formprobe/core';
import express, { type Express } from 'express';
import { z } from 'zod';

export interface AppOptions {
  artifactsRoot: string;
  logger: Logger;
}

const RUN_ID_PATTERN = /^[\w-]+$/;

const synthesizeBodySchema = z.object({
  metadata: formMetadataSchema,
  scenario: scenarioSchema.default('valid'),
  seed: z.number().int().optional()
});

const createRunBodySchema = z.object({
  metadata: formMetadataSchema,
  scenarios: z.array(scenarioSchema).min(1).default(['valid']),
  seed: z.number().int().optional()
});

export function createApp(engine: FormTestEngine, options: AppOptions): Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.post('/synthesize', async (req, res) => {
    const parsed = synthesizeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      const { metadata, scenario, seed } = parsed.data;
      res.json(await engine.synthesize(metadata, scenario, seed));
    } catch (error) {
      options.logger.error('synthesis failed', { error: error instanceof Error ? error.message : String(error) });
      res.status(500).json({
        error: error instanceof Error ? error.message : String(error)
      });
    }
  });

  app.post('/runs', (req, res) => {
    const parsed = createRunBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const { metadata, scenarios, seed } = parsed.data;
    const runs = engine.submitRun(metadata, scenarios, { seed });
    res.status(202).json({ runs });
  });

  app.get('/runs', (_req, res) => {
    res.json({ runs: engine.listRuns() });
  });

  app.get('/runs/:id', (req, res) => {
    const run = engine.getRun(req.params.id);
    if (!run) {
      res.status(404).json({ error: 'Run not found' });
      return;
    }
    res.json(run);
  });

  app.post('/runs/:id/cancel', (req, res) => {
    const ack = engine.cancelRun(req.params.id);
    if (ack.outcome === 'not-found') {
      res.status(404).json(ack);
      return;
    }
    res.json(ack);
  });

  app.get('/runs/:id/artifacts/:name', async (req, res) => {
    const root = path.resolve(options.artifactsRoot);
    const runDir = path.resolve(root, req.params.id);
    const artifactPath = path.resolve(runDir, req.params.name);
    const contained = runDir.startsWith(root + path.sep) && artifactPath.startsWith(runDir + path.sep);
    if (!RUN_ID_PATTERN.test(req.params.id) || !contained) {
      res.status(400).json({ error: 'Invalid artifact path' });
      return;
    }

    try {
      await fs.access(artifactPath);
      res.sendFile(artifactPath);
    } catch {
      res.status(404).json({ error: 'Artifact not found' });
    }
  });

  app.get('/metrics', (_req, res) => {
    const metrics = engine.aggregatedMetrics();
    res.json({ metrics, recommendations: recommendationsFor(metrics) });
  });

  app.get('/forms', (_req, res) => {
    res.json({ forms: rankForms(engine.aggregatedMetrics()) });
  });

  app.get('/forms/:formId/runs', (req, res) => {
    res.json({ runs: engine.runsForForm(req.params.formId) });
  });

  app.get('/forms/:formId/metrics', (req, res) => {
    const metrics = engine.formMetrics(req.params.formId);
    if (!metrics) {
      res.status(404).json({ error: 'No finished runs for form' });
      return;
    }
    res.json({ formId: req.params.formId, ...metrics });
  });

  app.get('/scenarios', (_req, res) => {
    res.json({ scenarios: engine.scenarios() });
  });

  app.get('/field-types', (_req, res) => {
    res.json({ fieldTypes: engine.fieldTypes() });
  });

  return app;
}
