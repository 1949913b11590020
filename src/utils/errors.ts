export type ReportErrorKind = "DecodeError" | "ParseError" | "SchemaError";

/**
 * Base class for failures that abort a report build
 */
export abstract class ReportBuildError extends Error {
  abstract readonly kind: ReportErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The upload payload is not valid base64
 */
export class DecodeError extends ReportBuildError {
  readonly kind = "DecodeError";
}

/**
 * The decoded bytes are not a readable spreadsheet
 */
export class ParseError extends ReportBuildError {
  readonly kind = "ParseError";
}

/**
 * The sheet is narrower than the column template requires
 */
export class SchemaError extends ReportBuildError {
  readonly kind = "SchemaError";
}
