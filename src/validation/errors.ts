import { formatPath } from '../document/path.js';
import type { EurePath } from '../document/path.js';
import type { ValidationError } from './diagnostics.js';
import { formatDiagnostic } from './diagnostics.js';

export type DocumentErrorKind =
  | 'path-not-found'
  | 'already-assigned'
  | 'expected-map'
  | 'expected-array'
  | 'expected-tuple'
  | 'array-index-invalid'
  | 'tuple-index-invalid'
  | 'builder-finished'
  | 'unknown-node';

/**
 * Thrown on builder misuse and on read-mode navigation failures.
 * For `path-not-found`, `path` is the prefix that did resolve.
 */
export class DocumentError extends Error {
  public readonly kind: DocumentErrorKind;
  public readonly path: EurePath;

  constructor(kind: DocumentErrorKind, path: EurePath, message: string) {
    super(`Document error at [${formatPath(path)}]: ${message}`);
    this.name = 'DocumentError';
    this.kind = kind;
    this.path = path;
    Object.setPrototypeOf(this, DocumentError.prototype);
  }
}

export type SchemaErrorKind =
  | 'conflicting-type-annotations'
  | 'invalid-type-expression'
  | 'malformed-constraint'
  | 'duplicate-field'
  | 'duplicate-variant'
  | 'dangling-reference'
  | 'empty-variant';

/**
 * Thrown when a schema cannot be extracted from a document.
 */
export class SchemaError extends Error {
  public readonly kind: SchemaErrorKind;
  public readonly path: EurePath;

  constructor(kind: SchemaErrorKind, path: EurePath, message: string) {
    super(`Schema error at [${formatPath(path)}]: ${message}`);
    this.name = 'SchemaError';
    this.kind = kind;
    this.path = path;
    Object.setPrototypeOf(this, SchemaError.prototype);
  }
}

export type ValidatorErrorKind =
  | 'invalid-options'
  | 'corrupt-schema'
  | 'unknown-root-type'
  | 'reference-cycle';

/**
 * Thrown when validation cannot start: bad options or a schema whose
 * structure is broken. Ordinary mismatches are returned as diagnostics.
 */
export class ValidatorError extends Error {
  public readonly kind: ValidatorErrorKind;

  constructor(kind: ValidatorErrorKind, message: string) {
    super(message);
    this.name = 'ValidatorError';
    this.kind = kind;
    Object.setPrototypeOf(this, ValidatorError.prototype);
  }
}

/**
 * Thrown by the check facade in strict mode when the document has errors.
 */
export class DocumentValidationError extends Error {
  public readonly errors: readonly ValidationError[];

  constructor(errors: readonly ValidationError[]) {
    const summary = errors.map((e) => `  ${formatDiagnostic(e)}`).join('\n');
    super(`Document validation failed:\n${summary}`);
    this.name = 'DocumentValidationError';
    this.errors = errors;
    Object.setPrototypeOf(this, DocumentValidationError.prototype);
  }
}

/**
 * Thrown when a document file cannot be read or parsed.
 */
export class DocumentLoadError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DocumentLoadError';
    Object.setPrototypeOf(this, DocumentLoadError.prototype);
  }
}

/**
 * Thrown when a value has no representation in a bridge's target format.
 */
export class BridgeError extends Error {
  public readonly path: EurePath;

  constructor(path: EurePath, message: string) {
    super(`Cannot convert [${formatPath(path)}]: ${message}`);
    this.name = 'BridgeError';
    this.path = path;
    Object.setPrototypeOf(this, BridgeError.prototype);
  }
}
