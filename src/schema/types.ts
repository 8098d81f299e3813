import type { KeyValue } from '../document/key.js';
import type { Value } from '../document/value.js';
import type { Brand } from '../types.js';
import type { RenameRule } from '../utils.js';
import type { Rational } from './rational.js';

/** Handle into one schema document's node arena. */
export type SchemaNodeId = Brand<number, 'SchemaNodeId'>;

export const asSchemaNodeId = (value: number): SchemaNodeId => value as SchemaNodeId;

/**
 * One end of a numeric range.
 */
export type Bound<T> =
  | { readonly kind: 'unbounded' }
  | { readonly kind: 'inclusive'; readonly value: T }
  | { readonly kind: 'exclusive'; readonly value: T };

export const UNBOUNDED: Bound<never> = { kind: 'unbounded' };

/**
 * Text constraints. Lengths count Unicode code points. `pattern` is searched
 * (unanchored) in the value. `language` restricts the text's language tag:
 * `plaintext` accepts only plain strings, any other name accepts code tagged
 * with that name or code whose language is implicit.
 */
export interface TextSchema {
  readonly kind: 'text';
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: string;
  readonly language?: string;
}

export interface IntegerSchema {
  readonly kind: 'integer';
  readonly min: Bound<bigint>;
  readonly max: Bound<bigint>;
  readonly multipleOf?: bigint;
}

/** Float constraints, held as exact rationals. */
export interface FloatSchema {
  readonly kind: 'float';
  readonly min: Bound<Rational>;
  readonly max: Bound<Rational>;
  readonly multipleOf?: Rational;
}

/** A declared field, addressed by the same key the data uses. */
export interface RecordField {
  readonly key: KeyValue;
  readonly schema: SchemaNodeId;
  readonly optional: boolean;
}

export type UnknownFieldsPolicy = 'deny' | 'allow';

export interface RecordSchema {
  readonly kind: 'record';
  readonly fields: readonly RecordField[];
  readonly unknownFields: UnknownFieldsPolicy;
  /** Type of every undeclared field (`$cascade-type`); overrides `unknownFields`. */
  readonly cascade?: SchemaNodeId;
}

export interface ArraySchema {
  readonly kind: 'array';
  readonly item: SchemaNodeId;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly unique: boolean;
}

export interface MapSchema {
  readonly kind: 'map';
  readonly key: SchemaNodeId;
  readonly value: SchemaNodeId;
}

export interface TupleSchema {
  readonly kind: 'tuple';
  readonly elements: readonly SchemaNodeId[];
}

/**
 * How a union value names its variant.
 *
 * - `external`: `{ variantName: content }`
 * - `internal`: `{ <tag>: "variantName", ...content fields }`
 * - `adjacent`: `{ <tag>: "variantName", <content>: content }`
 * - `tagged`  : only the `$variant` extension
 * - `untagged`: none; the first variant the value validates against
 *
 * The `$variant` extension is honored under every representation.
 */
export type VariantRepr =
  | { readonly kind: 'external' }
  | { readonly kind: 'internal'; readonly tag: string }
  | { readonly kind: 'adjacent'; readonly tag: string; readonly content: string }
  | { readonly kind: 'tagged' }
  | { readonly kind: 'untagged' };

export interface UnionVariant {
  readonly name: string;
  readonly schema: SchemaNodeId;
}

export interface UnionSchema {
  readonly kind: 'union';
  readonly variants: readonly UnionVariant[];
  readonly repr: VariantRepr;
}

export type SchemaNodeContent =
  | TextSchema
  | IntegerSchema
  | FloatSchema
  | { readonly kind: 'boolean' }
  | { readonly kind: 'null' }
  | { readonly kind: 'any' }
  | { readonly kind: 'literal'; readonly value: Value }
  | RecordSchema
  | ArraySchema
  | MapSchema
  | TupleSchema
  | UnionSchema
  | { readonly kind: 'reference'; readonly name: string };

export type SchemaKind = SchemaNodeContent['kind'];

/**
 * Descriptive data attached to a schema node. It never affects validation
 * results, except that `deprecated` fields produce a warning.
 */
export interface SchemaMetadata {
  readonly description?: string;
  readonly deprecated: boolean;
  readonly default?: Value;
  readonly examples?: readonly Value[];
  /** Unrecognized extension annotations, kept verbatim. */
  readonly extensions: Readonly<Record<string, Value>>;
}

export const EMPTY_METADATA: SchemaMetadata = { deprecated: false, extensions: {} };

export interface SchemaNode {
  readonly content: SchemaNodeContent;
  readonly metadata: SchemaMetadata;
}

/** Informational naming options (`$rename`, `$rename-all`). */
export interface NamingOptions {
  readonly rename?: string;
  readonly renameAll?: RenameRule;
}
