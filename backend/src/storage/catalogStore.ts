import fs from 'node:fs';
import { z } from 'zod';
import { EntryFieldSpec, IDENTITY_FIELDS, Template } from '../domain/types.js';
import { ENTRY_KINDS_FILE, TEMPLATES_FILE } from '../utils/paths.js';

const fieldSpecSchema = z.object({
  key: z.string().min(1),
  label: z.string().min(1),
  required: z.boolean(),
  valueType: z.enum(['text', 'multilineText', 'listOfText']),
  helpText: z.string().optional(),
});

const entryKindsSchema = z.record(z.array(fieldSpecSchema));

const designSchema = z.object({
  theme: z.string().min(1),
  color: z.string().nullable().optional(),
  templates: z.record(z.string()).nullable().optional(),
  disablePageNumbering: z.boolean().nullable().optional(),
});

const templateSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().min(1),
  description: z.string(),
  design: designSchema,
  recommendedSections: z.array(z.string().min(1)),
  guidedFields: z.array(
    z.object({
      key: z.enum(IDENTITY_FIELDS),
      label: z.string().min(1),
      inputKind: z.enum(['text', 'email', 'url']),
      required: z.boolean(),
    }),
  ),
});

const templatesSchema = z.array(templateSchema);

function readCatalogFile<S extends z.ZodTypeAny>(filePath: string, schema: S): z.infer<S> {
  const raw = fs.readFileSync(filePath, 'utf8');
  const result = schema.safeParse(JSON.parse(raw));
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Malformed catalog file ${filePath}: ${details}`);
  }
  return result.data;
}

export function loadEntryKindDefinitions(
  filePath = ENTRY_KINDS_FILE,
): Record<string, EntryFieldSpec[]> {
  return readCatalogFile(filePath, entryKindsSchema);
}

export function loadTemplateDefinitions(filePath = TEMPLATES_FILE): Template[] {
  const templates = readCatalogFile(filePath, templatesSchema);
  const seen = new Set<string>();
  for (const template of templates) {
    if (seen.has(template.id)) {
      throw new Error(`Malformed catalog file ${filePath}: duplicate template id ${template.id}`);
    }
    seen.add(template.id);
  }
  return templates;
}
