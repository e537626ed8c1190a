/**
 * Error types for attribute store operations
 *
 * Invariants:
 * - Expected conditions (absence, invalid ids, rejected writes) never throw
 * - Thrown errors are contract violations or adapter failures
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all attribute store errors
 */
export abstract class AttributeStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an entity type is empty or not a valid name
 */
export class InvalidEntityTypeError extends AttributeStoreError {
  readonly code = "E_TYPE";

  constructor(
    public readonly entityType: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid entity type "${entityType}": ${reason}`, options);
  }
}

/**
 * Thrown when an entity type is outside the configured closed set
 */
export class UnknownEntityTypeError extends AttributeStoreError {
  readonly code = "E_UNKNOWN_TYPE";

  constructor(
    public readonly entityType: string,
    options?: ErrorOptions
  ) {
    super(`Unknown entity type: ${entityType}`, options);
  }
}

/**
 * Thrown when store options fail validation
 */
export class ConfigError extends AttributeStoreError {
  readonly code = "E_CONFIG";

  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: ErrorOptions
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
  }
}

/**
 * Thrown when a backing store operation fails
 */
export class BackendError extends AttributeStoreError {
  readonly code = "E_BACKEND";

  constructor(
    public readonly operation: string,
    public readonly entityType: string,
    options?: ErrorOptions
  ) {
    super(`Backing store ${operation} failed for type "${entityType}"`, options);
  }
}

/**
 * Thrown when an entity document cannot be found
 */
export class DocumentNotFoundError extends AttributeStoreError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Document not found: ${filePath}`, options);
  }
}

/**
 * Thrown when an entity document read fails
 */
export class DocumentReadError extends AttributeStoreError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read document: ${filePath}`, options);
  }
}

/**
 * Thrown when an entity document write fails
 */
export class DocumentWriteError extends AttributeStoreError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write document: ${filePath}`, options);
  }
}

/**
 * Thrown when an entity document removal fails
 */
export class DocumentRemoveError extends AttributeStoreError {
  readonly code = "REMOVE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to remove document: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends AttributeStoreError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when listing files in a directory fails
 */
export class ListFilesError extends AttributeStoreError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list files in directory: ${dirPath}`, options);
  }
}

/**
 * Extract the errno code (ENOENT, EPERM, ...) from an unknown error
 */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Message of an unknown error value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Whether an error signals caller misuse rather than a storage failure
 */
export function isContractViolation(err: unknown): boolean {
  return err instanceof InvalidEntityTypeError || err instanceof UnknownEntityTypeError;
}
