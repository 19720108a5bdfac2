export type ErrorCode =
  | "INVALID_INPUT"
  | "CONFIG_UNREADABLE"
  | "CATALOG_UNREADABLE"
  | "INCOMPLETE_RUN";

/** Base class for faults of the harness itself. Task failures are reported as outcomes, never thrown. */
export class HarnessError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends HarnessError {}

export class ConfigError extends HarnessError {}

export class CatalogError extends HarnessError {}
