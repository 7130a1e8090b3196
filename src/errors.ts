export class TimetableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidFilterError extends TimetableError {
  constructor(
    readonly value: string,
    readonly allowed: readonly string[]
  ) {
    super(`Unknown day filter "${value}". Expected one of: ${allowed.join(", ")}`);
  }
}

export class InvalidReferenceInstantError extends TimetableError {
  constructor(readonly value: string, reason?: string | null) {
    super(`Invalid reference instant "${value}"${reason ? `: ${reason}` : ""}`);
  }
}

/* Raised by the document source when the page cannot be read or downloaded */
export class DocumentSourceError extends TimetableError {
  constructor(readonly source: string, message: string) {
    super(message);
  }
}
