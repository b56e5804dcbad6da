export class QueryDeckError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "QueryDeckError";
  }
}

export class ConfigError extends QueryDeckError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class RegistryError extends QueryDeckError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "RegistryError";
  }
}

export class SqlFileNotFoundError extends QueryDeckError {
  constructor(
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(`Smoke test not found: ${filePath}`, cause);
    this.name = "SqlFileNotFoundError";
  }
}

export class DuneError extends QueryDeckError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DuneError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  registry: "REGISTRY_ERROR",
  dune: "DUNE_ERROR",
  smoke: "SMOKE_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends QueryDeckError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}
