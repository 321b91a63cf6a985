/** Extraction failed outright (model unreachable, auth failure). The whole check is meaningless. */
export class ExtractionUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionUnavailableError';
  }
}

/** Caller input rejected before any work starts. */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

/** Claims and verdicts do not pair up. Always a programming error. */
export class ReportIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReportIntegrityError';
  }
}
