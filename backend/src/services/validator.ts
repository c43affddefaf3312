import { DEFAULT_ENTRY_KIND, ValidationResult } from '../domain/types.js';
import { requiredFields } from './entrySchemaRegistry.js';

/** Anything shaped like a CV; documents arriving over the wire are checked structurally. */
export interface ValidatableCv {
  name?: unknown;
  sections?: unknown;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isEmptyValue(value: unknown): boolean {
  return (
    value === undefined
    || value === null
    || value === ''
    || (Array.isArray(value) && value.length === 0)
  );
}

function entryKindOf(entry: Record<string, unknown>): string {
  const kind = entry._kind;
  return typeof kind === 'string' && kind ? kind : DEFAULT_ENTRY_KIND;
}

export function validateDocument(cv: ValidatableCv): ValidationResult {
  const errors: string[] = [];

  if (typeof cv.name !== 'string' || !cv.name) {
    errors.push('CV name is required');
  }

  const sections = cv.sections ?? {};
  if (!isRecord(sections)) {
    errors.push('Sections must be a dictionary');
    return { ok: false, errors };
  }

  for (const [sectionName, entries] of Object.entries(sections)) {
    if (!Array.isArray(entries)) {
      errors.push(`Section '${sectionName}' must contain a list of entries`);
      continue;
    }

    entries.forEach((entry: unknown, index) => {
      const position = index + 1;
      if (!isRecord(entry)) {
        errors.push(`Entry ${position} in section '${sectionName}' must be a dictionary`);
        return;
      }

      for (const field of requiredFields(entryKindOf(entry))) {
        if (isEmptyValue(entry[field])) {
          errors.push(
            `Entry ${position} in section '${sectionName}' is missing required field: ${field}`,
          );
        }
      }
    });
  }

  return { ok: errors.length === 0, errors };
}
