export const INTERNAL_FIELD_PREFIX = '_';

export type EntryKindName =
  | 'EducationEntry'
  | 'ExperienceEntry'
  | 'NormalEntry'
  | 'PublicationEntry'
  | 'OneLineEntry'
  | 'BulletEntry'
  | 'TextEntry';

export const DEFAULT_ENTRY_KIND: EntryKindName = 'NormalEntry';

export type FieldValueType = 'text' | 'multilineText' | 'listOfText';

export interface EntryFieldSpec {
  key: string;
  label: string;
  required: boolean;
  valueType: FieldValueType;
  helpText?: string;
}

export interface EntryKind {
  readonly name: string;
  readonly displayName: string;
  readonly fields: readonly EntryFieldSpec[];
}

export type FieldValue = string | string[];

/**
 * One item of a section. Keys starting with {@link INTERNAL_FIELD_PREFIX} are
 * UI bookkeeping and never leave the process; everything else, schema field or
 * user-defined, is content.
 */
export interface Entry {
  _id: string;
  _kind: string;
  [field: string]: FieldValue;
}

export interface SocialNetwork {
  network: string;
  username: string;
}

export type CustomConnection = Record<string, string>;

export const IDENTITY_FIELDS = [
  'name',
  'headline',
  'location',
  'email',
  'phone',
  'website',
  'photo',
] as const;

export type IdentityField = (typeof IDENTITY_FIELDS)[number];

export interface CvDocument {
  name: string;
  headline: string;
  location: string;
  email: string;
  phone: string;
  website: string;
  photo: string;
  socialNetworks: SocialNetwork[];
  customConnections: CustomConnection[];
  sections: Record<string, Entry[]>;
}

export type ThemeName = 'classic' | 'moderncv' | 'sb2nov' | 'engineeringresumes';

export interface DesignConfig {
  theme: string;
  color?: string | null;
  // Renderer template snippet per entry kind, e.g. { TextEntry: '...' }.
  templates?: Record<string, string> | null;
  disablePageNumbering?: boolean | null;
}

export interface LocaleConfig {
  language: string;
  dateStyle?: string | null;
  translations?: Record<string, string> | null;
}

export interface RenderSettings {
  currentDate?: string | null;
  boldKeywords: string[];
  renderCommand?: Record<string, unknown> | null;
}

export interface RenderDocument {
  cv: CvDocument;
  design: DesignConfig;
  locale: LocaleConfig;
  settings?: RenderSettings;
}

export type GuidedInputKind = 'text' | 'email' | 'url';

export interface GuidedField {
  key: IdentityField;
  label: string;
  inputKind: GuidedInputKind;
  required: boolean;
}

export interface Template {
  id: string;
  displayName: string;
  description: string;
  design: DesignConfig;
  recommendedSections: string[];
  guidedFields: GuidedField[];
}

export interface ValidationResult {
  ok: boolean;
  errors: string[];
}

export type RenderMode = 'local' | 'api';

export interface RenderResult {
  success: boolean;
  message: string;
  artifact?: Buffer;
}

export type SessionMode = 'template' | 'builder';

export interface EntrySelection {
  sectionName: string;
  entryId: string;
}

export interface CvSession {
  id: string;
  mode: SessionMode | null;
  selectedTemplateId: string | null;
  cv: CvDocument;
  design: DesignConfig;
  locale: LocaleConfig;
  settings: RenderSettings;
  selection: EntrySelection | null;
  createdAt: string;
  updatedAt: string;
}

export interface SectionOutline {
  name: string;
  title: string;
  entries: Array<{
    id: string;
    kind: string;
    label: string;
    customFields: string[];
  }>;
}
