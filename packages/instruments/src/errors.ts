/**
 * A venue field no longer matches the encoding the normalizers rely on
 * (futures expiry dates, filter payloads). Aborts the parse run.
 */
export class FormatError extends Error {
  constructor(
    message: string,
    public readonly input: string
  ) {
    super(message);
    this.name = 'FormatError';
  }
}

/**
 * A segment document failed schema validation.
 */
export class DocumentValidationError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly issues: { message: string; path: string }[]
  ) {
    super(message);
    this.name = 'DocumentValidationError';
  }
}

/**
 * A segment document is not valid JSON.
 */
export class DocumentParseError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'DocumentParseError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
