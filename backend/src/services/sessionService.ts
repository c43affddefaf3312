import { customAlphabet } from 'nanoid';
import {
  DesignPatch,
  LocalePatch,
  SessionCommand,
  SettingsPatch,
} from '../domain/commands.js';
import { CommandError, SessionNotFoundError } from '../domain/errors.js';
import {
  CvSession,
  Entry,
  SectionOutline,
  ValidationResult,
} from '../domain/types.js';
import { DEFAULT_SESSION_IDLE_MS } from '../utils/config.js';
import { nowIso } from '../utils/time.js';
import {
  addCustomField,
  addEntry,
  addSchemaField,
  createEmptyDocument,
  fillSchemaFields,
  findEntry,
  outlineDocument,
  removeEntry,
  removeField,
  setField,
  setListField,
} from './documentModel.js';
import { suggestEntryKind } from './entrySchemaRegistry.js';
import { exportPdf, pdfFileNameFor } from './pdfExportService.js';
import { RenderGateway } from './renderGateway.js';
import { instantiateTemplate } from './templateCatalog.js';
import { validateDocument } from './validator.js';
import {
  buildRenderDocument,
  DEFAULT_LANGUAGE,
  DEFAULT_THEME,
  fromExternalYaml,
  importRenderDocument,
  toExternalYaml,
} from './yamlSerializer.js';

const sessionId = customAlphabet('1234567890abcdefghijklmnopqrstuvwxyz', 16);

export function createSession(id = `session_${sessionId()}`): CvSession {
  const now = nowIso();
  return {
    id,
    mode: null,
    selectedTemplateId: null,
    cv: createEmptyDocument(),
    design: { theme: DEFAULT_THEME },
    locale: { language: DEFAULT_LANGUAGE },
    settings: { boldKeywords: [] },
    selection: null,
    createdAt: now,
    updatedAt: now,
  };
}

export interface SessionStoreOptions {
  // Sessions not touched for this long are dropped.
  maxIdleMs?: number;
  now?: () => number;
}

/** In-memory sessions, evicted once idle for longer than `maxIdleMs`. */
export class SessionStore {
  private readonly sessions = new Map<string, CvSession>();

  private readonly lastSeen = new Map<string, number>();

  private readonly maxIdleMs: number;

  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.maxIdleMs = options.maxIdleMs ?? DEFAULT_SESSION_IDLE_MS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): CvSession {
    this.evictIdle();
    const session = createSession();
    this.sessions.set(session.id, session);
    this.lastSeen.set(session.id, this.now());
    return session;
  }

  get(id: string): CvSession | undefined {
    const session = this.sessions.get(id);
    if (!session) {
      return undefined;
    }
    if (this.isIdle(id)) {
      this.delete(id);
      return undefined;
    }
    this.lastSeen.set(id, this.now());
    return session;
  }

  require(id: string): CvSession {
    const session = this.get(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    return session;
  }

  delete(id: string): boolean {
    this.lastSeen.delete(id);
    return this.sessions.delete(id);
  }

  /** Drops idle sessions and returns their ids. */
  evictIdle(): string[] {
    const evicted = [...this.lastSeen.keys()].filter((id) => this.isIdle(id));
    for (const id of evicted) {
      this.delete(id);
    }
    if (evicted.length > 0) {
      // eslint-disable-next-line no-console
      console.log(`Evicted ${evicted.length} idle session(s)`);
    }
    return evicted;
  }

  private isIdle(id: string): boolean {
    const seen = this.lastSeen.get(id);
    return seen !== undefined && this.now() - seen > this.maxIdleMs;
  }
}

export interface CommandOutcome {
  session: CvSession;
  // True when the document changed and any view of it should be refreshed.
  changed: boolean;
  notice?: string;
}

function requireEntry(session: CvSession, section: string, entryId: string): Entry {
  const entry = findEntry(session.cv, section, entryId);
  if (!entry) {
    throw new CommandError(`Entry ${entryId} not found in section '${section}'.`);
  }
  return entry;
}

function removeAt<T>(items: T[], index: number, label: string): void {
  if (index >= items.length) {
    throw new CommandError(`No ${label} at position ${index + 1}.`);
  }
  items.splice(index, 1);
}

function applyDesignPatch(session: CvSession, patch: DesignPatch): void {
  if (patch.theme !== undefined) {
    session.design.theme = patch.theme;
  }
  if (patch.color !== undefined) {
    session.design.color = patch.color;
  }
  if (patch.templates !== undefined) {
    session.design.templates = patch.templates;
  }
  if (patch.disablePageNumbering !== undefined) {
    session.design.disablePageNumbering = patch.disablePageNumbering;
  }
}

function applyLocalePatch(session: CvSession, patch: LocalePatch): void {
  if (patch.language !== undefined) {
    session.locale.language = patch.language;
  }
  if (patch.dateStyle !== undefined) {
    session.locale.dateStyle = patch.dateStyle;
  }
  if (patch.translations !== undefined) {
    session.locale.translations = patch.translations;
  }
}

function applySettingsPatch(session: CvSession, patch: SettingsPatch): void {
  if (patch.currentDate !== undefined) {
    session.settings.currentDate = patch.currentDate;
  }
  if (patch.boldKeywords !== undefined) {
    session.settings.boldKeywords = patch.boldKeywords.map((word) => word.trim()).filter(Boolean);
  }
  if (patch.renderCommand !== undefined) {
    session.settings.renderCommand = patch.renderCommand;
  }
}

function resetSession(session: CvSession): void {
  const fresh = createSession(session.id);
  session.mode = null;
  session.selectedTemplateId = null;
  session.cv = fresh.cv;
  session.design = fresh.design;
  session.locale = fresh.locale;
  session.settings = fresh.settings;
  session.selection = null;
}

function execute(session: CvSession, command: SessionCommand): Omit<CommandOutcome, 'session'> {
  switch (command.type) {
    case 'setIdentity':
      session.cv[command.field] = command.value;
      return { changed: true };

    case 'addSocialNetwork':
      session.cv.socialNetworks.push({ network: command.network, username: command.username });
      return { changed: true };

    case 'removeSocialNetwork':
      removeAt(session.cv.socialNetworks, command.index, 'social network');
      return { changed: true };

    case 'addCustomConnection':
      session.cv.customConnections.push({ ...command.connection });
      return { changed: true };

    case 'removeCustomConnection':
      removeAt(session.cv.customConnections, command.index, 'custom connection');
      return { changed: true };

    case 'addEntry': {
      const entry = addEntry(
        session.cv,
        command.section,
        command.kind ?? suggestEntryKind(command.section),
      );
      // Template forms show every schema field of an entry up front.
      if (session.mode === 'template') {
        fillSchemaFields(entry);
      }
      session.selection = { sectionName: command.section, entryId: entry._id };
      return { changed: true };
    }

    case 'removeEntry': {
      if (!removeEntry(session.cv, command.section, command.entryId)) {
        throw new CommandError(
          `Entry ${command.entryId} not found in section '${command.section}'.`,
        );
      }
      if (session.selection?.entryId === command.entryId) {
        session.selection = null;
      }
      return { changed: true };
    }

    case 'setField':
      setField(requireEntry(session, command.section, command.entryId), command.key, command.value);
      return { changed: true };

    case 'setListField':
      setListField(
        requireEntry(session, command.section, command.entryId),
        command.key,
        command.text,
      );
      return { changed: true };

    case 'addSchemaField': {
      const entry = requireEntry(session, command.section, command.entryId);
      return { changed: addSchemaField(entry, command.key) };
    }

    case 'addCustomField': {
      const entry = requireEntry(session, command.section, command.entryId);
      const key = command.key.trim();
      return addCustomField(entry, key)
        ? { changed: true, notice: `Field '${key}' added.` }
        : { changed: false, notice: `Field '${key}' already exists.` };
    }

    case 'removeField': {
      const entry = requireEntry(session, command.section, command.entryId);
      return { changed: removeField(entry, command.key) };
    }

    case 'selectEntry':
      requireEntry(session, command.section, command.entryId);
      session.selection = { sectionName: command.section, entryId: command.entryId };
      return { changed: true };

    case 'clearSelection':
      session.selection = null;
      return { changed: true };

    case 'updateDesign':
      applyDesignPatch(session, command.design);
      return { changed: true };

    case 'updateLocale':
      applyLocalePatch(session, command.locale);
      return { changed: true };

    case 'updateSettings':
      applySettingsPatch(session, command.settings);
      return { changed: true };

    case 'loadTemplate': {
      const instance = instantiateTemplate(command.templateId);
      session.mode = 'template';
      session.selectedTemplateId = instance.template.id;
      session.design = instance.design;
      session.cv = instance.cv;
      session.selection = null;
      return { changed: true, notice: `Loaded template ${instance.template.displayName}.` };
    }

    case 'switchToBuilder':
      session.mode = 'builder';
      session.selectedTemplateId = null;
      return { changed: true };

    case 'reset':
      resetSession(session);
      return { changed: true };

    default: {
      const unreachable: never = command;
      throw new CommandError(`Unsupported command: ${JSON.stringify(unreachable)}`);
    }
  }
}

/** Applies one edit to the session in place. */
export function applyCommand(session: CvSession, command: SessionCommand): CommandOutcome {
  const outcome = execute(session, command);
  if (outcome.changed) {
    session.updatedAt = nowIso();
  }
  return { session, ...outcome };
}

export function outlineSession(session: CvSession): SectionOutline[] {
  return outlineDocument(session.cv);
}

export function validateSession(session: CvSession): ValidationResult {
  return validateDocument(session.cv);
}

export function previewYaml(session: CvSession): string {
  return toExternalYaml(
    buildRenderDocument(session.cv, session.design, session.locale, session.settings),
  );
}

/**
 * Replaces the session's content with an imported document. Parse failures
 * throw before anything is touched.
 */
export function importYaml(session: CvSession, yamlText: string): CvSession {
  const imported = importRenderDocument(fromExternalYaml(yamlText));
  session.cv = imported.cv;
  session.design = imported.design;
  session.locale = imported.locale;
  session.settings = imported.settings;
  session.mode = 'builder';
  session.selectedTemplateId = null;
  session.selection = null;
  session.updatedAt = nowIso();
  return session;
}

export type RenderOutcome =
  | { status: 'invalid'; errors: string[] }
  | { status: 'failed'; message: string }
  | {
      status: 'rendered';
      message: string;
      pdf: Buffer;
      fileName: string;
      exportedPath?: string;
    };

export async function renderSession(
  session: CvSession,
  gateway: RenderGateway,
  exportDir?: string,
): Promise<RenderOutcome> {
  const validation = validateSession(session);
  if (!validation.ok) {
    return { status: 'invalid', errors: validation.errors };
  }

  const result = await gateway.render(previewYaml(session));
  if (!result.success || !result.artifact) {
    // eslint-disable-next-line no-console
    console.warn(`Render failed for ${session.id} (${gateway.mode}): ${result.message}`);
    return { status: 'failed', message: result.message };
  }

  const fileName = pdfFileNameFor(session.cv.name);
  let message = result.message;
  const exported = await exportPdf(result.artifact, { directory: exportDir, fileName });
  if (exported.exportedPath) {
    message = `${message} Exported PDF to ${exported.exportedPath}.`;
  }
  if (exported.warning) {
    message = `${message} ${exported.warning}`;
  }

  return {
    status: 'rendered',
    message,
    pdf: result.artifact,
    fileName,
    exportedPath: exported.exportedPath,
  };
}
