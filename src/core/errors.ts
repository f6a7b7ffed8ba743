export class ArchweaveError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "ArchweaveError";
  }
}

export class ConfigError extends ArchweaveError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class DocumentError extends ArchweaveError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DocumentError";
  }
}

// =============================================================================
// CONSTRUCTION ERRORS
// =============================================================================

export type NamedEntityKind = "component" | "endpoint" | "behavioral unit" | "contract";

/** "an endpoint", "a component"; capitalized for the start of a sentence. */
export function describeEntity(entity: string, capitalized = false): string {
  const article = /^[aeiou]/i.test(entity) ? "an" : "a";
  return `${capitalized ? article.charAt(0).toUpperCase() + article.slice(1) : article} ${entity}`;
}

export class CompositionError extends ArchweaveError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "CompositionError";
  }
}

export class DuplicateNameError extends CompositionError {
  constructor(
    public readonly entity: NamedEntityKind,
    public readonly entityName: string,
    public readonly owner: string,
  ) {
    super(`${describeEntity(entity, true)} named '${entityName}' already exists in '${owner}'.`);
    this.name = "DuplicateNameError";
  }
}

export class UnknownEndpointError extends CompositionError {
  constructor(
    public readonly endpointName: string,
    public readonly componentName: string,
  ) {
    super(`No endpoint named '${endpointName}' found on component '${componentName}'.`);
    this.name = "UnknownEndpointError";
  }
}

export class UnknownContractError extends CompositionError {
  constructor(
    public readonly contractName: string,
    public readonly componentName: string,
  ) {
    super(`No contract named '${contractName}' found on component '${componentName}'.`);
    this.name = "UnknownContractError";
  }
}

export class InvalidBehavioralUnitError extends CompositionError {
  constructor(
    public readonly unitName: string,
    reason: string,
  ) {
    super(`Behavioral unit '${unitName}' is invalid: ${reason}`);
    this.name = "InvalidBehavioralUnitError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  document: "DOCUMENT_ERROR",
  composition: "COMPOSITION_ERROR",
  export: "EXPORT_ERROR",
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

export class UserFacingError extends ArchweaveError {
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
