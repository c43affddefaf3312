const MAX_STEM_LENGTH = 140;
const FALLBACK_STEM = 'cv';

/**
 * Turns free text into the stem the renderer uses for its own output files:
 * words joined by underscores, without path separators or characters that
 * are invalid in Windows file names.
 */
export function fileStem(input: string): string {
  const stem = input
    .replace(/[\\/:*?"<>|]/g, ' ')
    .trim()
    .split(/\s+/)
    .join('_')
    .slice(0, MAX_STEM_LENGTH)
    .replace(/_+$/, '');
  return stem || FALLBACK_STEM;
}
