import type { NodeId } from '../document/node.js';
import { formatPath } from '../document/path.js';
import type { EurePath } from '../document/path.js';
import type { SchemaNodeId } from '../schema/types.js';

export type ValidationErrorKind =
  | 'type-mismatch'
  | 'missing-field'
  | 'unknown-field'
  | 'out-of-range'
  | 'not-multiple-of'
  | 'length-out-of-bounds'
  | 'pattern-mismatch'
  | 'language-mismatch'
  | 'array-length-out-of-bounds'
  | 'array-not-unique'
  | 'arity-mismatch'
  | 'literal-mismatch'
  | 'missing-variant-tag'
  | 'unknown-variant'
  | 'ambiguous-variant'
  | 'no-variant-matched'
  | 'conflicting-variant-tags'
  | 'invalid-variant-tag'
  | 'dangling-reference'
  | 'recursion-limit';

/** `structural` errors come from the schema walk, `completeness` from the hole sweep. */
export type ValidationPass = 'structural' | 'completeness';

export interface ValidationError {
  readonly kind: ValidationErrorKind;
  readonly path: EurePath;
  /** Human-readable one-line description. */
  readonly title: string;
  readonly nodeId: NodeId;
  readonly schemaNodeId: SchemaNodeId;
  readonly pass: ValidationPass;
}

export type ValidationWarningKind = 'deprecated-field';

export interface ValidationWarning {
  readonly kind: ValidationWarningKind;
  readonly path: EurePath;
  readonly title: string;
  readonly nodeId: NodeId;
  readonly schemaNodeId: SchemaNodeId;
}

export interface ValidationResult {
  readonly errors: readonly ValidationError[];
  readonly warnings: readonly ValidationWarning[];
  /** No errors from either pass. */
  readonly isValid: boolean;
  /** No holes left that the schema requires. */
  readonly isComplete: boolean;
}

/**
 * Renders a diagnostic as `[path] title`.
 */
export function formatDiagnostic(diagnostic: ValidationError | ValidationWarning): string {
  return `[${formatPath(diagnostic.path)}] ${diagnostic.title}`;
}
