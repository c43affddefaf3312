import { z } from 'zod';
import { IDENTITY_FIELDS } from './types.js';

const sectionName = z.string().trim().min(1);
const entryId = z.string().min(1);
const fieldKey = z.string().trim().min(1);
const listIndex = z.number().int().nonnegative();

const entryTarget = { section: sectionName, entryId };

export const designPatchSchema = z.object({
  theme: z.string().trim().min(1).optional(),
  color: z.string().nullable().optional(),
  templates: z.record(z.string()).nullable().optional(),
  disablePageNumbering: z.boolean().nullable().optional(),
});

export const localePatchSchema = z.object({
  language: z.string().trim().min(1).optional(),
  dateStyle: z.string().nullable().optional(),
  translations: z.record(z.string()).nullable().optional(),
});

export const settingsPatchSchema = z.object({
  currentDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected an ISO date (YYYY-MM-DD)')
    .nullable()
    .optional(),
  boldKeywords: z.array(z.string()).optional(),
  renderCommand: z.record(z.unknown()).nullable().optional(),
});

export const sessionCommandSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('setIdentity'),
    field: z.enum(IDENTITY_FIELDS),
    value: z.string(),
  }),
  z.object({
    type: z.literal('addSocialNetwork'),
    network: z.string().trim().min(1),
    username: z.string().trim().min(1),
  }),
  z.object({ type: z.literal('removeSocialNetwork'), index: listIndex }),
  z.object({ type: z.literal('addCustomConnection'), connection: z.record(z.string()) }),
  z.object({ type: z.literal('removeCustomConnection'), index: listIndex }),
  z.object({ type: z.literal('addEntry'), section: sectionName, kind: z.string().min(1).optional() }),
  z.object({ type: z.literal('removeEntry'), ...entryTarget }),
  z.object({
    type: z.literal('setField'),
    ...entryTarget,
    key: fieldKey,
    value: z.union([z.string(), z.array(z.string())]),
  }),
  z.object({ type: z.literal('setListField'), ...entryTarget, key: fieldKey, text: z.string() }),
  z.object({ type: z.literal('addSchemaField'), ...entryTarget, key: fieldKey }),
  z.object({ type: z.literal('addCustomField'), ...entryTarget, key: z.string() }),
  z.object({ type: z.literal('removeField'), ...entryTarget, key: fieldKey }),
  z.object({ type: z.literal('selectEntry'), ...entryTarget }),
  z.object({ type: z.literal('clearSelection') }),
  z.object({ type: z.literal('updateDesign'), design: designPatchSchema }),
  z.object({ type: z.literal('updateLocale'), locale: localePatchSchema }),
  z.object({ type: z.literal('updateSettings'), settings: settingsPatchSchema }),
  z.object({ type: z.literal('loadTemplate'), templateId: z.string().min(1) }),
  z.object({ type: z.literal('switchToBuilder') }),
  z.object({ type: z.literal('reset') }),
]);

export type SessionCommand = z.infer<typeof sessionCommandSchema>;
export type DesignPatch = z.infer<typeof designPatchSchema>;
export type LocalePatch = z.infer<typeof localePatchSchema>;
export type SettingsPatch = z.infer<typeof settingsPatchSchema>;
