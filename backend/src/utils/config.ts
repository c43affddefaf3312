import { z } from 'zod';
import type { RenderGatewayConfig } from '../services/renderGateway.js';
import { RENDER_WORK_ROOT } from './paths.js';

export const DEFAULT_SESSION_IDLE_MS = 24 * 60 * 60 * 1000;

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(4100),
    CV_BUILDER_RENDER_MODE: z.enum(['local', 'api']).default('local'),
    CV_BUILDER_RENDER_API_URL: optionalText.pipe(z.string().url().optional()),
    CV_BUILDER_RENDERER_COMMAND: optionalText,
    CV_BUILDER_RENDERER_ARGS: z.string().optional(),
    CV_BUILDER_RENDER_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    CV_BUILDER_EXPORT_DIR: optionalText,
    CV_BUILDER_SESSION_IDLE_MS: z.coerce.number().int().positive().default(DEFAULT_SESSION_IDLE_MS),
  })
  .superRefine((env, ctx) => {
    if (env.CV_BUILDER_RENDER_MODE === 'api' && !env.CV_BUILDER_RENDER_API_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CV_BUILDER_RENDER_API_URL'],
        message: 'CV_BUILDER_RENDER_API_URL is required when CV_BUILDER_RENDER_MODE=api',
      });
    }
  });

export interface AppConfig {
  port: number;
  render: RenderGatewayConfig;
  exportPdfDir?: string;
  sessionIdleMs: number;
}

function splitArgs(raw: string | undefined): string[] {
  if (raw === undefined) {
    return ['-m', 'rendercv'];
  }
  return raw.split(/\s+/).filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  const render: RenderGatewayConfig =
    values.CV_BUILDER_RENDER_MODE === 'api' && values.CV_BUILDER_RENDER_API_URL
      ? {
          mode: 'api',
          baseUrl: values.CV_BUILDER_RENDER_API_URL,
          timeoutMs: values.CV_BUILDER_RENDER_TIMEOUT_MS,
        }
      : {
          mode: 'local',
          command: values.CV_BUILDER_RENDERER_COMMAND ?? 'python',
          args: splitArgs(values.CV_BUILDER_RENDERER_ARGS),
          workRoot: RENDER_WORK_ROOT,
          timeoutMs: values.CV_BUILDER_RENDER_TIMEOUT_MS,
        };

  return {
    port: values.PORT,
    render,
    exportPdfDir: values.CV_BUILDER_EXPORT_DIR,
    sessionIdleMs: values.CV_BUILDER_SESSION_IDLE_MS,
  };
}
