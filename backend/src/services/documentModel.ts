import { customAlphabet } from 'nanoid';
import { CommandError } from '../domain/errors.js';
import {
  CvDocument,
  Entry,
  FieldValue,
  INTERNAL_FIELD_PREFIX,
  SectionOutline,
} from '../domain/types.js';
import { ownValue, setOwn } from '../utils/records.js';
import { findFieldSpec, lookupEntryKind } from './entrySchemaRegistry.js';

const shortId = customAlphabet('1234567890abcdefghijklmnopqrstuvwxyz', 8);

const labelFields = ['company', 'institution', 'name', 'title'];

export function createEmptyDocument(): CvDocument {
  return {
    name: '',
    headline: '',
    location: '',
    email: '',
    phone: '',
    website: '',
    photo: '',
    socialNetworks: [],
    customConnections: [],
    sections: {},
  };
}

export function isInternalField(key: string): boolean {
  return key.startsWith(INTERNAL_FIELD_PREFIX);
}

function readField(entry: Entry, key: string): FieldValue | undefined {
  return ownValue<FieldValue>(entry, key);
}

// Section names are free text, so lookups must not fall through to Object.prototype.
export function sectionEntries(cv: CvDocument, sectionName: string): Entry[] | undefined {
  return ownValue(cv.sections, sectionName);
}

export function putSection(cv: CvDocument, sectionName: string, entries: Entry[]): void {
  setOwn(cv.sections, sectionName, entries);
}

export function createEntry(kind: string, takenIds: ReadonlySet<string> = new Set()): Entry {
  let id = `entry_${shortId()}`;
  while (takenIds.has(id)) {
    id = `entry_${shortId()}`;
  }
  return { _id: id, _kind: kind };
}

export function addEntry(cv: CvDocument, sectionName: string, kind: string): Entry {
  const entries = sectionEntries(cv, sectionName) ?? [];
  const entry = createEntry(kind, new Set(entries.map((item) => item._id)));
  entries.push(entry);
  putSection(cv, sectionName, entries);
  return entry;
}

export function findEntry(
  cv: CvDocument,
  sectionName: string,
  entryId: string,
): Entry | undefined {
  return sectionEntries(cv, sectionName)?.find((entry) => entry._id === entryId);
}

/**
 * Removes an entry by id. A section left without entries is dropped from the
 * document.
 */
export function removeEntry(cv: CvDocument, sectionName: string, entryId: string): boolean {
  const entries = sectionEntries(cv, sectionName);
  if (!entries) {
    return false;
  }

  const index = entries.findIndex((entry) => entry._id === entryId);
  if (index < 0) {
    return false;
  }

  entries.splice(index, 1);
  if (entries.length === 0) {
    delete cv.sections[sectionName];
  }
  return true;
}

function assertContentKey(key: string): void {
  if (isInternalField(key)) {
    throw new CommandError(`Field '${key}' is reserved for internal use.`);
  }
}

export function setField(entry: Entry, key: string, value: FieldValue): void {
  assertContentKey(key);
  setOwn<FieldValue>(entry, key, value);
}

export function parseListText(rawText: string): string[] {
  return rawText
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function setListField(entry: Entry, key: string, rawText: string): string[] {
  const items = parseListText(rawText);
  setField(entry, key, items);
  return items;
}

/** Adds a schema field with its empty default; false when already present. */
export function addSchemaField(entry: Entry, key: string): boolean {
  const spec = findFieldSpec(entry._kind, key);
  if (!spec) {
    throw new CommandError(`'${key}' is not a field of ${entry._kind}.`);
  }
  if (readField(entry, key) !== undefined) {
    return false;
  }
  setOwn<FieldValue>(entry, key, spec.valueType === 'listOfText' ? [] : '');
  return true;
}

/** Adds every schema field of the entry's kind that is not present yet. */
export function fillSchemaFields(entry: Entry): string[] {
  return lookupEntryKind(entry._kind)
    .fields.filter((field) => addSchemaField(entry, field.key))
    .map((field) => field.key);
}

export function addCustomField(entry: Entry, rawKey: string): boolean {
  const key = rawKey.trim();
  if (!key) {
    throw new CommandError('Field name is required.');
  }
  assertContentKey(key);
  if (readField(entry, key) !== undefined) {
    return false;
  }
  setOwn<FieldValue>(entry, key, '');
  return true;
}

export function removeField(entry: Entry, key: string): boolean {
  assertContentKey(key);
  if (findFieldSpec(entry._kind, key)?.required) {
    throw new CommandError(`'${key}' is required for ${entry._kind} and cannot be removed.`);
  }
  if (readField(entry, key) === undefined) {
    return false;
  }
  delete entry[key];
  return true;
}

export function customFieldKeys(entry: Entry): string[] {
  const schemaKeys = new Set(lookupEntryKind(entry._kind).fields.map((field) => field.key));
  return Object.keys(entry).filter((key) => !isInternalField(key) && !schemaKeys.has(key));
}

export function entryDisplayLabel(entry: Entry, index: number): string {
  for (const key of labelFields) {
    const value = readField(entry, key);
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }
  return `Entry ${index + 1}`;
}

export function sectionTitle(sectionName: string): string {
  return sectionName
    .replace(/_/g, ' ')
    .split(' ')
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1) : word))
    .join(' ');
}

export function outlineDocument(cv: CvDocument): SectionOutline[] {
  return Object.entries(cv.sections).map(([name, entries]) => ({
    name,
    title: sectionTitle(name),
    entries: entries.map((entry, index) => ({
      id: entry._id,
      kind: entry._kind,
      label: entryDisplayLabel(entry, index),
      customFields: customFieldKeys(entry),
    })),
  }));
}
