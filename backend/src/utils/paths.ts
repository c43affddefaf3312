import fs from 'node:fs';
import fsp from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

const cwd = process.cwd();
const configuredBackendRoot = process.env.CV_BUILDER_BACKEND_ROOT;
const configuredCatalogDir = process.env.CV_BUILDER_CATALOG_DIR;
const configuredWorkRoot = process.env.CV_BUILDER_WORK_ROOT;

const inferredBackendRoot =
  path.basename(cwd) === 'backend' ? cwd : path.join(cwd, 'backend');

export const BACKEND_ROOT = configuredBackendRoot ?? inferredBackendRoot;
export const CATALOG_DIR = configuredCatalogDir ?? path.join(BACKEND_ROOT, 'data');
export const ENTRY_KINDS_FILE = path.join(CATALOG_DIR, 'entry-kinds.json');
export const TEMPLATES_FILE = path.join(CATALOG_DIR, 'templates.json');
export const RENDER_WORK_ROOT = configuredWorkRoot ?? os.tmpdir();

export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

/** Creates a fresh, empty directory for one render invocation. */
export async function createRenderWorkspace(root = RENDER_WORK_ROOT): Promise<string> {
  ensureDir(root);
  return fsp.mkdtemp(path.join(root, 'cv-render-'));
}
