import cors from 'cors';
import express from 'express';
import type { Server } from 'node:http';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { createApiRouter } from './api/routes.js';
import {
  CommandError,
  SerializationError,
  SessionNotFoundError,
  TemplateNotFoundError,
  YamlImportError,
} from './domain/errors.js';
import { createRenderGateway, RenderGateway } from './services/renderGateway.js';
import { SessionStore } from './services/sessionService.js';
import { loadConfig } from './utils/config.js';

export interface ServerOptions {
  store?: SessionStore;
  gateway?: RenderGateway;
  exportDir?: string;
}

function statusFor(err: unknown): number {
  if (err instanceof SessionNotFoundError || err instanceof TemplateNotFoundError) {
    return 404;
  }
  if (err instanceof CommandError || err instanceof YamlImportError) {
    return 400;
  }
  // body-parser errors carry their own 4xx status.
  if (
    typeof err === 'object'
    && err !== null
    && 'status' in err
    && typeof err.status === 'number'
    && err.status >= 400
    && err.status < 500
  ) {
    return err.status;
  }
  return 500;
}

export function createServerApp(options: ServerOptions = {}): express.Express {
  const config = loadConfig();

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '4mb' }));

  app.use(
    '/api',
    createApiRouter({
      store: options.store ?? new SessionStore({ maxIdleMs: config.sessionIdleMs }),
      gateway: options.gateway ?? createRenderGateway(config.render),
      exportDir: options.exportDir ?? config.exportPdfDir,
    }),
  );

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction,
    ) => {
      const status = statusFor(err);
      const message = err instanceof Error ? err.message : 'Unknown error';
      if (status === 500) {
        // eslint-disable-next-line no-console
        console.error(err instanceof SerializationError ? `Serialization defect: ${message}` : err);
      }
      res.status(status).json({ error: message });
    },
  );

  return app;
}

export async function startServer(port?: number): Promise<Server> {
  const config = loadConfig();
  const app = createServerApp();
  const listenPort = port ?? config.port;

  return new Promise((resolve) => {
    const server = app.listen(listenPort, () => {
      // eslint-disable-next-line no-console
      console.log(`CV builder backend running at http://127.0.0.1:${listenPort}`);
      // eslint-disable-next-line no-console
      console.log(`Rendering via ${config.render.mode} renderer`);
      resolve(server);
    });
  });
}

async function main(): Promise<void> {
  await startServer();
}

const isDirectRun =
  process.argv[1] !== undefined &&
  path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isDirectRun) {
  main().catch((error) => {
    // eslint-disable-next-line no-console
    console.error(error);
    process.exit(1);
  });
}
