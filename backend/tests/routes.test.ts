import assert from 'node:assert/strict';
import { once } from 'node:events';
import test from 'node:test';
import { z } from 'zod';
import { createServerApp } from '../src/index.js';
import type { RenderGateway } from '../src/services/renderGateway.js';
import { SessionStore } from '../src/services/sessionService.js';
import { FakeGateway } from './helpers.js';

const createdSession = z.object({ session: z.object({ id: z.string() }) });

interface RunningApp {
  baseUrl: string;
  store: SessionStore;
  close(): Promise<void>;
}

async function startApp(gateway: RenderGateway): Promise<RunningApp> {
  const store = new SessionStore();
  const server = createServerApp({ store, gateway }).listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected the test server to listen on a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}/api`,
    store,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

function withApp(
  gateway: RenderGateway,
  run: (app: RunningApp) => Promise<void>,
): () => Promise<void> {
  return async () => {
    const app = await startApp(gateway);
    try {
      await run(app);
    } finally {
      await app.close();
    }
  };
}

const renders = () =>
  new FakeGateway({ success: true, message: 'CV rendered successfully', artifact: Buffer.from('%PDF-fake') });

async function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

async function newSession(baseUrl: string): Promise<string> {
  const response = await fetch(`${baseUrl}/sessions`, { method: 'POST' });
  assert.equal(response.status, 201);
  return createdSession.parse(await response.json()).session.id;
}

async function fillMinimalCv(baseUrl: string, sessionId: string): Promise<void> {
  const commands = `${baseUrl}/sessions/${sessionId}/commands`;
  await postJson(commands, { type: 'setIdentity', field: 'name', value: 'Jane Doe' });
  await postJson(commands, { type: 'addEntry', section: 'experience' });

  const outline = z
    .object({ sections: z.array(z.object({ entries: z.array(z.object({ id: z.string() })) })) })
    .parse(await (await fetch(`${baseUrl}/sessions/${sessionId}/outline`)).json());
  const entryId = outline.sections[0].entries[0].id;

  await postJson(commands, { type: 'setField', section: 'experience', entryId, key: 'company', value: 'Acme' });
  await postJson(commands, { type: 'setField', section: 'experience', entryId, key: 'position', value: 'Engineer' });
}

test('api: health reports the renderer', withApp(renders(), async ({ baseUrl }) => {
  const response = await fetch(`${baseUrl}/health`);
  assert.deepEqual(await response.json(), { ok: true, renderer: { mode: 'local', available: true } });
}));

test('api: catalog endpoints', withApp(renders(), async ({ baseUrl }) => {
  const kinds = z
    .object({ entryKinds: z.array(z.object({ name: z.string() })) })
    .parse(await (await fetch(`${baseUrl}/entry-kinds`)).json());
  assert.equal(kinds.entryKinds.length, 7);

  const templates = z
    .object({ templates: z.array(z.object({ id: z.string() })) })
    .parse(await (await fetch(`${baseUrl}/templates`)).json());
  assert.deepEqual(templates.templates.map((template) => template.id), ['classic', 'moderncv', 'sb2nov', 'engineeringresumes']);

  const options = await (await fetch(`${baseUrl}/design-options`)).json();
  assert.deepEqual(options, {
    themes: ['classic', 'moderncv', 'sb2nov', 'engineeringresumes'],
    colors: ['blue', 'green', 'red', 'purple', 'orange'],
    languages: ['english', 'spanish', 'french', 'german', 'portuguese'],
  });
}));

test('api: building, previewing and rendering a CV', withApp(renders(), async ({ baseUrl }) => {
  const sessionId = await newSession(baseUrl);
  await fillMinimalCv(baseUrl, sessionId);

  const validation = await (await fetch(`${baseUrl}/sessions/${sessionId}/validation`)).json();
  assert.deepEqual(validation, { ok: true, errors: [] });

  const preview = await fetch(`${baseUrl}/sessions/${sessionId}/yaml`);
  assert.match(preview.headers.get('content-type') ?? '', /^text\/yaml/);
  assert.equal(
    await preview.text(),
    [
      'cv:',
      '  name: Jane Doe',
      '  sections:',
      '    experience:',
      '      - company: Acme',
      '        position: Engineer',
      'design:',
      '  theme: classic',
      'locale:',
      '  language: english',
      '',
    ].join('\n'),
  );

  const download = await fetch(`${baseUrl}/sessions/${sessionId}/yaml?download`);
  assert.equal(download.headers.get('content-disposition'), 'attachment; filename="Jane_Doe_CV.yaml"');

  const rendered = await fetch(`${baseUrl}/sessions/${sessionId}/render`, { method: 'POST' });
  assert.equal(rendered.status, 200);
  assert.equal(rendered.headers.get('content-type'), 'application/pdf');
  assert.equal(rendered.headers.get('content-disposition'), 'attachment; filename="Jane_Doe_CV.pdf"');
  assert.equal(await rendered.text(), '%PDF-fake');
}));

test('api: invalid documents are refused before rendering', withApp(renders(), async ({ baseUrl }) => {
  const sessionId = await newSession(baseUrl);
  const response = await fetch(`${baseUrl}/sessions/${sessionId}/render`, { method: 'POST' });

  assert.equal(response.status, 422);
  assert.deepEqual(await response.json(), { error: 'CV is not valid.', errors: ['CV name is required'] });
}));

test(
  'api: renderer failures become a bad gateway',
  withApp(new FakeGateway({ success: false, message: 'Renderer failed - no PDF file generated' }), async ({ baseUrl }) => {
    const sessionId = await newSession(baseUrl);
    await fillMinimalCv(baseUrl, sessionId);

    const response = await fetch(`${baseUrl}/sessions/${sessionId}/render`, { method: 'POST' });
    assert.equal(response.status, 502);
    assert.deepEqual(await response.json(), { error: 'Renderer failed - no PDF file generated' });
  }),
);

test('api: malformed commands are rejected with their issues', withApp(renders(), async ({ baseUrl }) => {
  const sessionId = await newSession(baseUrl);
  const response = await postJson(`${baseUrl}/sessions/${sessionId}/commands`, {
    type: 'removeSocialNetwork',
    index: -1,
  });

  assert.equal(response.status, 400);
  const body = z.object({ error: z.string(), issues: z.array(z.string()) }).parse(await response.json());
  assert.equal(body.error, 'Invalid request body.');
  assert.equal(body.issues.length, 1);
  assert.ok(body.issues[0].startsWith('index: '));
}));

test('api: commands that cannot apply are client errors', withApp(renders(), async ({ baseUrl }) => {
  const sessionId = await newSession(baseUrl);
  const commands = `${baseUrl}/sessions/${sessionId}/commands`;

  const missingEntry = await postJson(commands, {
    type: 'setField',
    section: 'experience',
    entryId: 'entry_nope',
    key: 'company',
    value: 'Acme',
  });
  assert.equal(missingEntry.status, 400);
  assert.deepEqual(await missingEntry.json(), { error: "Entry entry_nope not found in section 'experience'." });

  const unknownTemplate = await postJson(commands, { type: 'loadTemplate', templateId: 'nope' });
  assert.equal(unknownTemplate.status, 404);
  assert.deepEqual(await unknownTemplate.json(), { error: 'Unknown template: nope' });
}));

test('api: loading a template through a command', withApp(renders(), async ({ baseUrl, store }) => {
  const sessionId = await newSession(baseUrl);
  const response = await postJson(`${baseUrl}/sessions/${sessionId}/commands`, {
    type: 'loadTemplate',
    templateId: 'sb2nov',
  });

  const body = z.object({ changed: z.boolean(), notice: z.string() }).parse(await response.json());
  assert.deepEqual(body, { changed: true, notice: 'Loaded template SB2Nov.' });
  assert.deepEqual(store.require(sessionId).design, { theme: 'sb2nov' });
}));

test('api: YAML import', withApp(renders(), async ({ baseUrl, store }) => {
  const sessionId = await newSession(baseUrl);
  const importUrl = `${baseUrl}/sessions/${sessionId}/import`;

  const ok = await postJson(importUrl, { yaml: 'cv:\n  name: Jane Doe\n  sections:\n    skills:\n      - label: Languages\n        details: Go\n' });
  assert.equal(ok.status, 200);
  const session = store.require(sessionId);
  assert.equal(session.mode, 'builder');
  assert.equal(session.cv.sections.skills[0]._kind, 'OneLineEntry');

  const broken = await postJson(importUrl, { yaml: 'cv: [unclosed' });
  assert.equal(broken.status, 400);
  const body = z.object({ error: z.string() }).parse(await broken.json());
  assert.ok(body.error.startsWith('Invalid YAML: '));
  assert.equal(store.require(sessionId).cv.name, 'Jane Doe');

  const empty = await postJson(importUrl, {});
  assert.equal(empty.status, 400);
}));

test('api: unknown sessions and routes', withApp(renders(), async ({ baseUrl }) => {
  const missing = await fetch(`${baseUrl}/sessions/session_missing`);
  assert.equal(missing.status, 404);
  assert.deepEqual(await missing.json(), { error: 'Session not found: session_missing' });

  const deleted = await fetch(`${baseUrl}/sessions/session_missing`, { method: 'DELETE' });
  assert.equal(deleted.status, 404);
  assert.deepEqual(await deleted.json(), { error: 'Session not found.' });

  const unknown = await fetch(`${baseUrl}/nowhere`);
  assert.equal(unknown.status, 404);
  assert.deepEqual(await unknown.json(), { error: 'Not found' });
}));

test('api: sessions can be deleted', withApp(renders(), async ({ baseUrl, store }) => {
  const sessionId = await newSession(baseUrl);
  const response = await fetch(`${baseUrl}/sessions/${sessionId}`, { method: 'DELETE' });

  assert.equal(response.status, 204);
  assert.equal(store.get(sessionId), undefined);
}));

test('api: malformed JSON bodies are client errors', withApp(renders(), async ({ baseUrl }) => {
  const sessionId = await newSession(baseUrl);
  const response = await fetch(`${baseUrl}/sessions/${sessionId}/commands`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: '{"type": ',
  });
  assert.equal(response.status, 400);
}));
