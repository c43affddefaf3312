export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}

export class TemplateNotFoundError extends Error {
  constructor(readonly templateId: string) {
    super(`Unknown template: ${templateId}`);
    this.name = 'TemplateNotFoundError';
  }
}

/** A session command that cannot be applied to the current document. */
export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

/** Raised when the in-memory document breaks a structural invariant. */
export class SerializationError extends Error {
  constructor(
    message: string,
    readonly section?: string,
  ) {
    super(section === undefined ? message : `${message} (section '${section}')`);
    this.name = 'SerializationError';
  }
}

export class YamlImportError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'YamlImportError';
  }
}
