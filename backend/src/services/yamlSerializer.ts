import { isPair, isScalar, parseDocument, stringify, visit } from 'yaml';
import { z } from 'zod';
import { SerializationError, YamlImportError } from '../domain/errors.js';
import {
  CustomConnection,
  CvDocument,
  DEFAULT_ENTRY_KIND,
  DesignConfig,
  Entry,
  FieldValue,
  IdentityField,
  LocaleConfig,
  RenderDocument,
  RenderSettings,
  SocialNetwork,
} from '../domain/types.js';
import { fileStem } from '../utils/fileNames.js';
import { setOwn } from '../utils/records.js';
import {
  createEmptyDocument,
  createEntry,
  isInternalField,
  putSection,
} from './documentModel.js';
import { listEntryKinds } from './entrySchemaRegistry.js';
import { isEmptyValue, isRecord } from './validator.js';

export const DEFAULT_THEME = 'classic';
export const DEFAULT_LANGUAGE = 'english';

const OPTIONAL_IDENTITY_FIELDS: Exclude<IdentityField, 'name'>[] = [
  'headline',
  'location',
  'email',
  'phone',
  'website',
  'photo',
];

const YAML_OPTIONS = {
  indent: 2,
  lineWidth: 0,
  blockQuote: 'literal',
  aliasDuplicateObjects: false,
} as const;

export type ExternalEntry = Record<string, FieldValue>;

export interface ExternalCv {
  name: string;
  headline?: string;
  location?: string;
  email?: string;
  phone?: string;
  website?: string;
  photo?: string;
  social_networks?: SocialNetwork[];
  custom_connections?: CustomConnection[];
  sections?: Record<string, ExternalEntry[]>;
}

export interface ExternalDesign {
  theme?: string;
  templates?: Record<string, string>;
  color?: string;
  disable_page_numbering?: boolean;
}

export interface ExternalLocale {
  language?: string;
  date_style?: string;
  translations?: Record<string, string>;
}

export interface ExternalSettings {
  current_date?: string;
  bold_keywords?: string[];
  render_command?: Record<string, unknown>;
}

export interface ExternalRenderDocument {
  cv: ExternalCv;
  design: ExternalDesign;
  locale: ExternalLocale;
  settings?: ExternalSettings;
}

// Config values that carry no information: unset, blank, or an empty collection.
function isUnset(value: unknown): boolean {
  if (isEmptyValue(value)) {
    return true;
  }
  return isRecord(value) && Object.keys(value).length === 0;
}

export function cleanEntry(entry: Entry, sectionName: string): ExternalEntry {
  if (!isRecord(entry)) {
    throw new SerializationError('Entry is not a record', sectionName);
  }

  const cleaned: ExternalEntry = {};
  for (const [key, value] of Object.entries(entry)) {
    if (isInternalField(key) || isEmptyValue(value)) {
      continue;
    }
    setOwn(cleaned, key, value);
  }
  return cleaned;
}

function cleanSections(sections: Record<string, Entry[]>): Record<string, ExternalEntry[]> {
  const cleaned: Record<string, ExternalEntry[]> = {};
  for (const [sectionName, entries] of Object.entries(sections)) {
    if (!Array.isArray(entries)) {
      throw new SerializationError('Section does not contain a list of entries', sectionName);
    }
    const kept = entries
      .map((entry) => cleanEntry(entry, sectionName))
      .filter((entry) => Object.keys(entry).length > 0);
    if (kept.length > 0) {
      setOwn(cleaned, sectionName, kept);
    }
  }
  return cleaned;
}

export function cleanCv(cv: CvDocument): ExternalCv {
  const external: ExternalCv = { name: cv.name };

  for (const field of OPTIONAL_IDENTITY_FIELDS) {
    if (cv[field]) {
      external[field] = cv[field];
    }
  }
  if (cv.socialNetworks.length > 0) {
    external.social_networks = cv.socialNetworks;
  }
  if (cv.customConnections.length > 0) {
    external.custom_connections = cv.customConnections;
  }

  const sections = cleanSections(cv.sections);
  if (Object.keys(sections).length > 0) {
    external.sections = sections;
  }
  return external;
}

export function normalizeDesign(design: DesignConfig): ExternalDesign {
  const external: ExternalDesign = {};
  if (!isUnset(design.theme)) {
    external.theme = design.theme;
  }
  if (design.templates && !isUnset(design.templates)) {
    external.templates = design.templates;
  }
  if (design.color) {
    external.color = design.color;
  }
  if (typeof design.disablePageNumbering === 'boolean') {
    external.disable_page_numbering = design.disablePageNumbering;
  }
  return Object.keys(external).length > 0 ? external : { theme: DEFAULT_THEME };
}

export function normalizeLocale(locale: LocaleConfig): ExternalLocale {
  const external: ExternalLocale = {};
  if (!isUnset(locale.language)) {
    external.language = locale.language;
  }
  if (locale.dateStyle) {
    external.date_style = locale.dateStyle;
  }
  if (locale.translations && !isUnset(locale.translations)) {
    external.translations = locale.translations;
  }
  return Object.keys(external).length > 0 ? external : { language: DEFAULT_LANGUAGE };
}

export function normalizeSettings(settings: RenderSettings): ExternalSettings | undefined {
  const external: ExternalSettings = {};
  if (settings.currentDate) {
    external.current_date = settings.currentDate;
  }
  if (settings.boldKeywords.length > 0) {
    external.bold_keywords = settings.boldKeywords;
  }
  if (settings.renderCommand && !isUnset(settings.renderCommand)) {
    external.render_command = settings.renderCommand;
  }
  return Object.keys(external).length > 0 ? external : undefined;
}

export function buildRenderDocument(
  cv: CvDocument,
  design?: DesignConfig,
  locale?: LocaleConfig,
  settings?: RenderSettings,
): RenderDocument {
  const document: RenderDocument = {
    cv,
    design: design ?? { theme: DEFAULT_THEME },
    locale: locale ?? { language: DEFAULT_LANGUAGE },
  };
  if (settings && normalizeSettings(settings)) {
    document.settings = settings;
  }
  return document;
}

export function toExternalDocument(document: RenderDocument): ExternalRenderDocument {
  const copy = structuredClone(document);
  const external: ExternalRenderDocument = {
    cv: cleanCv(copy.cv),
    design: normalizeDesign(copy.design),
    locale: normalizeLocale(copy.locale),
  };
  const settings = copy.settings ? normalizeSettings(copy.settings) : undefined;
  if (settings) {
    external.settings = settings;
  }
  return external;
}

export function toExternalYaml(document: RenderDocument): string {
  return stringify(toExternalDocument(document), YAML_OPTIONS);
}

export function yamlFileName(cv: Pick<CvDocument, 'name'>): string {
  return `${fileStem(cv.name)}_CV.yaml`;
}

const scalarSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const fieldValueSchema = z.union([scalarSchema, z.array(scalarSchema)]).nullable();

const parsedDocumentSchema = z.object({
  cv: z.object({
    name: scalarSchema.nullable().optional(),
    headline: scalarSchema.nullable().optional(),
    location: scalarSchema.nullable().optional(),
    email: scalarSchema.nullable().optional(),
    phone: scalarSchema.nullable().optional(),
    website: scalarSchema.nullable().optional(),
    photo: scalarSchema.nullable().optional(),
    social_networks: z.array(z.record(scalarSchema)).nullable().optional(),
    custom_connections: z.array(z.record(scalarSchema)).nullable().optional(),
    sections: z.record(z.array(z.record(fieldValueSchema))).nullable().optional(),
  }),
  design: z
    .object({
      theme: z.string().nullable().optional(),
      templates: z.record(z.string()).nullable().optional(),
      color: z.string().nullable().optional(),
      disable_page_numbering: z.boolean().nullable().optional(),
    })
    .nullable()
    .optional(),
  locale: z
    .object({
      language: z.string().nullable().optional(),
      date_style: z.string().nullable().optional(),
      translations: z.record(z.string()).nullable().optional(),
    })
    .nullable()
    .optional(),
  settings: z
    .object({
      current_date: scalarSchema.nullable().optional(),
      bold_keywords: z.array(scalarSchema).nullable().optional(),
      render_command: z.record(z.unknown()).nullable().optional(),
    })
    .nullable()
    .optional(),
});

export type ParsedRenderDocument = z.infer<typeof parsedDocumentSchema>;

// Keys whose values keep their YAML type; every other scalar is text.
const TYPED_KEYS = new Set(['disable_page_numbering', 'render_command']);

function underTypedKey(path: readonly unknown[]): boolean {
  return path.some(
    (ancestor) =>
      isPair(ancestor)
      && isScalar(ancestor.key)
      && typeof ancestor.key.value === 'string'
      && TYPED_KEYS.has(ancestor.key.value),
  );
}

/**
 * Reads the YAML text and returns its data with number and boolean scalars
 * replaced by their source text, so `+15551234567`, `2020.10` or `0123` are
 * imported as written.
 */
function readYamlText(text: string): unknown {
  const document = parseDocument(text);
  if (document.errors.length > 0) {
    throw new YamlImportError(`Invalid YAML: ${document.errors[0].message}`);
  }

  visit(document, {
    Scalar(key, node, path) {
      if (key === 'key' || node.source === undefined) {
        return;
      }
      if (typeof node.value !== 'number' && typeof node.value !== 'boolean') {
        return;
      }
      if (!underTypedKey(path)) {
        node.value = node.source;
      }
    },
  });

  return document.toJS();
}

/** Parses external YAML. Internal bookkeeping is not reconstructed here. */
export function fromExternalYaml(text: string): ParsedRenderDocument {
  const raw = readYamlText(text);

  const result = parsedDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new YamlImportError(
      'YAML does not match the CV document schema',
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Picks the kind whose required fields are all filled in, preferring the kind
 * that requires the most fields.
 */
export function inferEntryKind(record: Record<string, unknown>): string {
  let best: { name: string; score: number } | null = null;
  for (const kind of listEntryKinds()) {
    const required = kind.fields.filter((field) => field.required);
    if (required.length === 0 || required.some((field) => isEmptyValue(record[field.key]))) {
      continue;
    }
    if (!best || required.length > best.score) {
      best = { name: kind.name, score: required.length };
    }
  }
  return best?.name ?? DEFAULT_ENTRY_KIND;
}

export interface ImportedDocument {
  cv: CvDocument;
  design: DesignConfig;
  locale: LocaleConfig;
  settings: RenderSettings;
}

export function importRenderDocument(parsed: ParsedRenderDocument): ImportedDocument {
  const cv = createEmptyDocument();
  const source = parsed.cv;

  cv.name = source.name ?? '';
  for (const field of OPTIONAL_IDENTITY_FIELDS) {
    cv[field] = source[field] ?? '';
  }
  cv.socialNetworks = (source.social_networks ?? []).map((record) => ({
    network: record.network ?? '',
    username: record.username ?? '',
  }));
  cv.customConnections = (source.custom_connections ?? []).map((record) => ({ ...record }));

  for (const [sectionName, records] of Object.entries(source.sections ?? {})) {
    const entries: Entry[] = [];
    const taken = new Set<string>();
    for (const record of records) {
      const entry = createEntry(inferEntryKind(record), taken);
      taken.add(entry._id);
      for (const [key, value] of Object.entries(record)) {
        if (!isInternalField(key) && value !== null) {
          setOwn<FieldValue>(entry, key, value);
        }
      }
      entries.push(entry);
    }
    if (entries.length > 0) {
      putSection(cv, sectionName, entries);
    }
  }

  const design = parsed.design ?? {};
  const locale = parsed.locale ?? {};
  const settings = parsed.settings ?? {};

  return {
    cv,
    design: {
      theme: design.theme ?? DEFAULT_THEME,
      color: design.color ?? null,
      templates: design.templates ?? null,
      disablePageNumbering: design.disable_page_numbering ?? null,
    },
    locale: {
      language: locale.language ?? DEFAULT_LANGUAGE,
      dateStyle: locale.date_style ?? null,
      translations: locale.translations ?? null,
    },
    settings: {
      currentDate: settings.current_date ?? null,
      boldKeywords: settings.bold_keywords ?? [],
      renderCommand: settings.render_command ?? null,
    },
  };
}
