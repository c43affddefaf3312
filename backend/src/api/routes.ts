import { Router, type Response } from 'express';
import { z } from 'zod';
import { sessionCommandSchema } from '../domain/commands.js';
import { listEntryKinds } from '../services/entrySchemaRegistry.js';
import { RenderGateway } from '../services/renderGateway.js';
import {
  applyCommand,
  importYaml,
  outlineSession,
  previewYaml,
  renderSession,
  SessionStore,
  validateSession,
} from '../services/sessionService.js';
import { COLORS, LANGUAGES, listTemplates, THEMES } from '../services/templateCatalog.js';
import { yamlFileName } from '../services/yamlSerializer.js';

const importBodySchema = z.object({
  yaml: z.string().min(1, 'yaml is required.'),
});

export interface ApiDependencies {
  store: SessionStore;
  gateway: RenderGateway;
  exportDir?: string;
}

function readBody<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  res: Response,
): z.infer<S> | null {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    res.status(400).json({
      error: 'Invalid request body.',
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '<body>'}: ${issue.message}`,
      ),
    });
    return null;
  }
  return parsed.data;
}

export function createApiRouter({ store, gateway, exportDir }: ApiDependencies): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    const available = await gateway.healthCheck();
    res.json({ ok: true, renderer: { mode: gateway.mode, available } });
  });

  router.get('/entry-kinds', (_req, res) => {
    res.json({ entryKinds: listEntryKinds() });
  });

  router.get('/templates', (_req, res) => {
    res.json({ templates: listTemplates() });
  });

  router.get('/design-options', (_req, res) => {
    res.json({ themes: THEMES, colors: COLORS, languages: LANGUAGES });
  });

  router.post('/sessions', (_req, res) => {
    const session = store.create();
    res.status(201).json({ session });
  });

  router.get('/sessions/:id', (req, res) => {
    res.json({ session: store.require(req.params.id) });
  });

  router.delete('/sessions/:id', (req, res) => {
    if (!store.delete(req.params.id)) {
      res.status(404).json({ error: 'Session not found.' });
      return;
    }
    res.status(204).end();
  });

  router.get('/sessions/:id/outline', (req, res) => {
    const session = store.require(req.params.id);
    res.json({ sections: outlineSession(session) });
  });

  router.post('/sessions/:id/commands', (req, res) => {
    const session = store.require(req.params.id);
    const command = readBody(sessionCommandSchema, req.body, res);
    if (!command) {
      return;
    }

    const outcome = applyCommand(session, command);
    res.json(outcome);
  });

  router.get('/sessions/:id/validation', (req, res) => {
    const session = store.require(req.params.id);
    res.json(validateSession(session));
  });

  router.get('/sessions/:id/yaml', (req, res) => {
    const session = store.require(req.params.id);
    const yaml = previewYaml(session);
    if (req.query.download !== undefined) {
      res.attachment(yamlFileName(session.cv));
    }
    res.type('text/yaml').send(yaml);
  });

  router.post('/sessions/:id/import', (req, res) => {
    const session = store.require(req.params.id);
    const body = readBody(importBodySchema, req.body, res);
    if (!body) {
      return;
    }

    res.json({ session: importYaml(session, body.yaml) });
  });

  router.post('/sessions/:id/render', async (req, res) => {
    const session = store.require(req.params.id);
    const outcome = await renderSession(session, gateway, exportDir);

    switch (outcome.status) {
      case 'invalid':
        res.status(422).json({ error: 'CV is not valid.', errors: outcome.errors });
        return;
      case 'failed':
        res.status(502).json({ error: outcome.message });
        return;
      default:
        res.attachment(outcome.fileName);
        res.type('application/pdf').send(outcome.pdf);
    }
  });

  return router;
}
