import { EntryFieldSpec, EntryKind, EntryKindName } from '../domain/types.js';
import { loadEntryKindDefinitions } from '../storage/catalogStore.js';

let cachedRegistry: Map<string, EntryKind> | null = null;

export function entryKindDisplayName(kindName: string): string {
  return kindName.replace(/Entry$/, '');
}

function registry(): Map<string, EntryKind> {
  if (cachedRegistry) {
    return cachedRegistry;
  }

  const definitions = loadEntryKindDefinitions();
  const kinds = new Map<string, EntryKind>();
  for (const [name, fields] of Object.entries(definitions)) {
    kinds.set(name, {
      name,
      displayName: entryKindDisplayName(name),
      fields: fields.map((field) => ({ ...field })),
    });
  }
  cachedRegistry = kinds;
  return cachedRegistry;
}

/** Unknown kinds resolve to a kind without fields rather than failing. */
export function lookupEntryKind(kindName: string): EntryKind {
  return (
    registry().get(kindName) ?? {
      name: kindName,
      displayName: entryKindDisplayName(kindName),
      fields: [],
    }
  );
}

export function listEntryKinds(): EntryKind[] {
  return [...registry().values()];
}

export function requiredFields(kindName: string): string[] {
  return lookupEntryKind(kindName)
    .fields.filter((field) => field.required)
    .map((field) => field.key);
}

export function findFieldSpec(kindName: string, key: string): EntryFieldSpec | undefined {
  return lookupEntryKind(kindName).fields.find((field) => field.key === key);
}

export function suggestEntryKind(sectionName: string): EntryKindName {
  const normalized = sectionName.toLowerCase();
  if (normalized.includes('experience')) {
    return 'ExperienceEntry';
  }
  if (normalized.includes('education')) {
    return 'EducationEntry';
  }
  if (normalized.includes('skill')) {
    return 'OneLineEntry';
  }
  return 'NormalEntry';
}
