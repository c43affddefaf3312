import fs from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';
import { RenderMode, RenderResult } from '../domain/types.js';
import { createRenderWorkspace, RENDER_WORK_ROOT } from '../utils/paths.js';
import { CommandNotFoundError, ProcessResult, runProcess } from '../utils/shell.js';

export const LOCAL_RENDER_TIMEOUT_MS = 60_000;
export const REMOTE_RENDER_TIMEOUT_MS = 30_000;
export const HEALTH_CHECK_TIMEOUT_MS = 5_000;

// Where the renderer CLI writes its output, relative to its working directory.
export const RENDER_OUTPUT_DIR = 'rendercv_output';
export const RENDER_INPUT_FILE = 'cv.yaml';

export interface RenderGateway {
  readonly mode: RenderMode;
  render(yamlText: string): Promise<RenderResult>;
  healthCheck(): Promise<boolean>;
}

export interface LocalRenderOptions {
  command: string;
  // Arguments placed before the `render` subcommand, e.g. ['-m', 'rendercv'].
  args: string[];
  workRoot?: string;
  timeoutMs?: number;
  keepWorkspace?: boolean;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface RemoteRenderOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export type RenderGatewayConfig =
  | ({ mode: 'local' } & LocalRenderOptions)
  | ({ mode: 'api' } & RemoteRenderOptions);

function formatSeconds(ms: number): string {
  return `${ms / 1000}s`;
}

function withDiagnostics(message: string, run: ProcessResult, includeStdout: boolean): string {
  let result = message;
  if (run.stderr.trim()) {
    result += `\n\nError:\n${run.stderr}`;
  }
  if (includeStdout && run.stdout.trim()) {
    result += `\n\nOutput:\n${run.stdout}`;
  }
  return result;
}

async function findPdf(outputDir: string): Promise<string | null> {
  const files = await fsp.readdir(outputDir);
  const pdf = files.filter((file) => file.toLowerCase().endsWith('.pdf')).sort()[0];
  return pdf ? path.join(outputDir, pdf) : null;
}

/**
 * Runs the renderer CLI in a fresh directory per call. The produced PDF is the
 * source of truth: the renderer can exit non-zero (or print undecodable
 * console output) and still write a valid PDF, so its exit status is ignored.
 */
export class LocalRenderGateway implements RenderGateway {
  readonly mode = 'local' as const;

  private readonly workRoot: string;

  private readonly timeoutMs: number;

  constructor(private readonly options: LocalRenderOptions) {
    this.workRoot = options.workRoot ?? RENDER_WORK_ROOT;
    this.timeoutMs = options.timeoutMs ?? LOCAL_RENDER_TIMEOUT_MS;
  }

  async render(yamlText: string): Promise<RenderResult> {
    let workDir: string | null = null;
    try {
      workDir = await createRenderWorkspace(this.workRoot);
      return await this.renderInWorkspace(workDir, yamlText);
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        return {
          success: false,
          message: `Renderer not installed: '${error.command}' was not found. Install it with: pip install rendercv`,
        };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, message: `Error rendering CV: ${message}` };
    } finally {
      if (workDir && !this.options.keepWorkspace) {
        await fsp.rm(workDir, { recursive: true, force: true });
      }
    }
  }

  private async renderInWorkspace(workDir: string, yamlText: string): Promise<RenderResult> {
    const inputPath = path.join(workDir, RENDER_INPUT_FILE);
    await fsp.writeFile(inputPath, yamlText, 'utf8');

    const run = await runProcess(
      this.options.command,
      [...this.options.args, 'render', inputPath],
      workDir,
      this.timeoutMs,
    );

    if (run.timedOut) {
      return {
        success: false,
        message: `Renderer timed out (>${formatSeconds(this.timeoutMs)})`,
      };
    }

    const outputDir = path.join(workDir, RENDER_OUTPUT_DIR);
    if (!fs.existsSync(outputDir)) {
      return {
        success: false,
        message: withDiagnostics('Renderer failed - no output folder created', run, true),
      };
    }

    const pdfPath = await findPdf(outputDir);
    if (!pdfPath) {
      return {
        success: false,
        message: withDiagnostics('Renderer failed - no PDF file generated', run, false),
      };
    }

    const artifact = await fsp.readFile(pdfPath);
    return {
      success: true,
      message: `CV rendered successfully: ${path.basename(pdfPath)}`,
      artifact,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const run = await runProcess(
        this.options.command,
        [...this.options.args, '--version'],
        process.cwd(),
        HEALTH_CHECK_TIMEOUT_MS,
      );
      return run.exitCode === 0;
    } catch {
      return false;
    }
  }
}

// Aborted fetches reject with a DOMException, which is not always an Error instance.
function isTimeout(error: unknown): boolean {
  return (
    typeof error === 'object'
    && error !== null
    && 'name' in error
    && (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

// fetch reports network failures as a TypeError caused by a socket-level error.
function isConnectionFailure(error: unknown): boolean {
  if (!(error instanceof TypeError)) {
    return false;
  }
  const cause: unknown = error.cause;
  return (
    typeof cause === 'object'
    && cause !== null
    && 'code' in cause
    && typeof cause.code === 'string'
  );
}

export class RemoteRenderGateway implements RenderGateway {
  readonly mode = 'api' as const;

  private readonly baseUrl: string;

  private readonly timeoutMs: number;

  private readonly fetchImpl: FetchLike;

  constructor(options: RemoteRenderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? REMOTE_RENDER_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async render(yamlText: string): Promise<RenderResult> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/render`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ yaml: yamlText }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        const text = await response.text();
        return { success: false, message: `API error (${response.status}): ${text}` };
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (contentType.includes('application/pdf')) {
        return {
          success: true,
          message: 'CV rendered successfully',
          artifact: Buffer.from(await response.arrayBuffer()),
        };
      }

      const pdfUrl = await this.readPdfUrl(response);
      if (!pdfUrl) {
        return { success: false, message: 'Unexpected API response format' };
      }
      return await this.download(new URL(pdfUrl, `${this.baseUrl}/`).href);
    } catch (error) {
      if (isTimeout(error)) {
        return { success: false, message: 'API request timed out' };
      }
      if (isConnectionFailure(error)) {
        return { success: false, message: `Cannot connect to API at ${this.baseUrl}` };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, message: `API error: ${message}` };
    }
  }

  private async readPdfUrl(response: Response): Promise<string | null> {
    const text = await response.text();
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return null;
    }
    if (typeof body !== 'object' || body === null || !('pdf_url' in body)) {
      return null;
    }
    return typeof body.pdf_url === 'string' && body.pdf_url ? body.pdf_url : null;
  }

  private async download(pdfUrl: string): Promise<RenderResult> {
    const response = await this.fetchImpl(pdfUrl, {
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      return { success: false, message: `Failed to download PDF: ${response.status}` };
    }
    return {
      success: true,
      message: 'CV rendered successfully',
      artifact: Buffer.from(await response.arrayBuffer()),
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/health`, {
        signal: AbortSignal.timeout(HEALTH_CHECK_TIMEOUT_MS),
      });
      return response.ok;
    } catch {
      return false;
    }
  }
}

export function createRenderGateway(config: RenderGatewayConfig): RenderGateway {
  if (config.mode === 'api') {
    return new RemoteRenderGateway(config);
  }
  return new LocalRenderGateway(config);
}
