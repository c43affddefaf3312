import fs from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';
import { fileStem } from '../utils/fileNames.js';
import { fileTimestamp } from '../utils/time.js';

export function defaultPdfFileName(date = new Date()): string {
  return `cv_${fileTimestamp(date)}.pdf`;
}

/** `Jane Doe` -> `Jane_Doe_CV.pdf`; falls back to a timestamped name. */
export function pdfFileNameFor(cvName: string, date = new Date()): string {
  if (!cvName.trim()) {
    return defaultPdfFileName(date);
  }
  return `${fileStem(cvName)}_CV.pdf`;
}

export interface ExportOptions {
  directory?: string;
  fileName?: string;
}

export async function savePdf(
  pdf: Buffer,
  directory: string,
  fileName = defaultPdfFileName(),
): Promise<string> {
  await fsp.mkdir(directory, { recursive: true });
  const targetPath = path.join(directory, fileStem(fileName));
  if (fs.existsSync(targetPath)) {
    await fsp.unlink(targetPath);
  }
  await fsp.writeFile(targetPath, pdf);
  return targetPath;
}

export async function exportPdf(
  pdf: Buffer,
  options: ExportOptions,
): Promise<{ exportedPath?: string; warning?: string }> {
  const targetDir = options.directory?.trim();
  if (!targetDir) {
    return {};
  }

  try {
    const exportedPath = await savePdf(pdf, targetDir, options.fileName);
    return { exportedPath };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      warning: `Failed to export PDF to ${targetDir}: ${message}`,
    };
  }
}
