import type { Document } from '../document/document.js';
import { formatKey, keyId } from '../document/key.js';
import type { KeyValue } from '../document/key.js';
import type { NodeId } from '../document/node.js';
import { segmentForKey } from '../document/path.js';
import type { EurePath } from '../document/path.js';
import { PLAINTEXT, primitiveKindName, valueEquals, valueKindName } from '../document/value.js';
import type { PrimitiveValue, Value, ValueKindName } from '../document/value.js';
import { resolveValidateOptions } from '../options.js';
import type { ValidateOptions } from '../options.js';
import { compare, formatRational, fromBigInt, fromNumber, isMultipleOf } from '../schema/rational.js';
import type { Rational } from '../schema/rational.js';
import type { SchemaDocument } from '../schema/schema-document.js';
import type {
  ArraySchema,
  Bound,
  FloatSchema,
  IntegerSchema,
  RecordSchema,
  SchemaNodeContent,
  SchemaNodeId,
  TextSchema,
  TupleSchema,
} from '../schema/types.js';
import { checkCompleteness } from './completeness.js';
import { ValidationContext } from './context.js';
import type { ValidationResult } from './diagnostics.js';
import { ValidatorError } from './errors.js';
import { validateUnion } from './union.js';

// ---------------------------------------------------------------------------
// Schema sweep
// ---------------------------------------------------------------------------

function childIds(content: SchemaNodeContent): SchemaNodeId[] {
  switch (content.kind) {
    case 'record':
      return [...content.fields.map((f) => f.schema), ...(content.cascade === undefined ? [] : [content.cascade])];
    case 'array':
      return [content.item];
    case 'map':
      return [content.key, content.value];
    case 'tuple':
      return [...content.elements];
    case 'union':
      return content.variants.map((v) => v.schema);
    default:
      return [];
  }
}

/**
 * Rejects schemas whose structure cannot be walked: ids outside the arena,
 * patterns that do not compile, and reference chains that never reach a
 * structural node. Dangling references are left to the walk.
 */
function sweepSchema(schema: SchemaDocument, ctx: ValidationContext): void {
  const inRange = (id: SchemaNodeId): boolean =>
    Number.isInteger(id) && schema.get(id) !== undefined;

  if (!inRange(schema.root)) {
    throw new ValidatorError('corrupt-schema', `Schema root ${schema.root} is outside the node arena`);
  }
  for (const [name, id] of schema.types) {
    if (!inRange(id)) {
      throw new ValidatorError('corrupt-schema', `Type "${name}" points at missing node ${id}`);
    }
  }
  schema.nodes.forEach((node, index) => {
    for (const child of childIds(node.content)) {
      if (!inRange(child)) {
        throw new ValidatorError('corrupt-schema', `Schema node ${index} points at missing node ${child}`);
      }
    }
    if (node.content.kind === 'text' && node.content.pattern !== undefined) {
      try {
        ctx.pattern(node.content.pattern);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ValidatorError('corrupt-schema', `Schema node ${index} has an invalid pattern: ${reason}`);
      }
    }
  });

  for (const name of schema.types.keys()) {
    const seen = new Set<string>();
    let current: string | undefined = name;
    while (current !== undefined) {
      if (seen.has(current)) {
        throw new ValidatorError(
          'reference-cycle',
          `Type "${name}" is a cycle of references: ${[...seen, current].join(' -> ')}`,
        );
      }
      seen.add(current);
      const id = schema.lookupType(current);
      const content = id === undefined ? undefined : schema.node(id).content;
      current = content?.kind === 'reference' ? content.name : undefined;
    }
  }
}

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

function formatRange<T>(min: Bound<T>, max: Bound<T>, show: (value: T) => string): string {
  const lower = min.kind === 'unbounded' ? '(-∞' : `${min.kind === 'inclusive' ? '[' : '('}${show(min.value)}`;
  const upper = max.kind === 'unbounded' ? '∞)' : `${show(max.value)}${max.kind === 'inclusive' ? ']' : ')'}`;
  return `${lower}, ${upper}`;
}

function formatLengths(min: number | undefined, max: number | undefined): string {
  return `${min ?? 0}..${max === undefined ? '' : max}`;
}

function describePrimitive(value: PrimitiveValue): string {
  switch (value.type) {
    case 'null':
      return 'null';
    case 'boolean':
    case 'float':
      return String(value.value);
    case 'integer':
      return value.value.toString();
    case 'text':
      return JSON.stringify(value.value);
  }
}

/** True when `cmp` (value compared with the bound) satisfies the lower bound. */
function aboveMin<T>(bound: Bound<T>, cmp: (limit: T) => number): boolean {
  if (bound.kind === 'unbounded') return true;
  const c = cmp(bound.value);
  return bound.kind === 'inclusive' ? c >= 0 : c > 0;
}

function belowMax<T>(bound: Bound<T>, cmp: (limit: T) => number): boolean {
  if (bound.kind === 'unbounded') return true;
  const c = cmp(bound.value);
  return bound.kind === 'inclusive' ? c <= 0 : c < 0;
}

function keyToPrimitive(key: KeyValue): PrimitiveValue | undefined {
  if (typeof key === 'string') return { type: 'text', value: key, language: PLAINTEXT };
  if (typeof key === 'bigint') return { type: 'integer', value: key };
  if (typeof key === 'boolean') return { type: 'boolean', value: key };
  return undefined;
}

function keyToValue(key: KeyValue): Value {
  const primitive = keyToPrimitive(key);
  if (primitive !== undefined) return { kind: 'primitive', value: primitive };
  return { kind: 'tuple', items: typeof key === 'object' ? key.tuple.map(keyToValue) : [] };
}

// ---------------------------------------------------------------------------
// Walk
// ---------------------------------------------------------------------------

/**
 * Walks a document against a schema, one dispatcher over schema node kinds.
 * Diagnostics are collected in the context; nothing is thrown once the
 * schema has passed the sweep.
 */
export class SchemaValidator {
  constructor(readonly ctx: ValidationContext) {}

  get doc(): Document {
    return this.ctx.doc;
  }

  get schema(): SchemaDocument {
    return this.ctx.schema;
  }

  /** A validator over a forked context, for trial runs. */
  fork(): SchemaValidator {
    return new SchemaValidator(this.ctx.fork());
  }

  /**
   * Follows references from `schemaId`. Returns `undefined` for a dangling
   * reference.
   */
  resolveSchema(schemaId: SchemaNodeId): SchemaNodeId | undefined {
    let current = schemaId;
    for (;;) {
      const content = this.schema.node(current).content;
      if (content.kind !== 'reference') return current;
      const target = this.schema.lookupType(content.name);
      if (target === undefined) return undefined;
      current = target;
    }
  }

  validateNode(nodeId: NodeId, schemaId: SchemaNodeId, depth: number, optional = false): void {
    const { ctx, doc } = this;
    if (depth > ctx.options.maxDepth) {
      ctx.error(
        'recursion-limit',
        nodeId,
        schemaId,
        `Nesting depth exceeds the limit of ${ctx.options.maxDepth}.`,
      );
      return;
    }
    const node = doc.node(nodeId);
    if (node.content.kind === 'hole') {
      ctx.bindHole(nodeId, { schemaNodeId: schemaId, optional });
      return;
    }
    const content = this.schema.node(schemaId).content;
    switch (content.kind) {
      case 'any':
        return;
      case 'reference': {
        const target = this.schema.lookupType(content.name);
        if (target === undefined) {
          ctx.error('dangling-reference', nodeId, schemaId, `Type "${content.name}" is not declared.`);
          return;
        }
        this.validateNode(nodeId, target, depth, optional);
        return;
      }
      case 'text':
      case 'integer':
      case 'float':
      case 'boolean':
      case 'null': {
        if (node.content.kind !== 'primitive') {
          this.typeMismatch(nodeId, schemaId, content.kind, this.kindOf(nodeId));
          return;
        }
        this.checkPrimitive(node.content.value, content, nodeId, schemaId);
        return;
      }
      case 'literal':
        if (!valueEquals(doc.toValue(nodeId), content.value)) {
          ctx.error('literal-mismatch', nodeId, schemaId, 'Value does not equal the expected literal.');
        }
        return;
      case 'record':
        this.validateRecord(nodeId, content, schemaId, depth);
        return;
      case 'array':
        this.validateArray(nodeId, content, schemaId, depth);
        return;
      case 'map':
        this.validateMap(nodeId, content.key, content.value, schemaId, depth);
        return;
      case 'tuple':
        this.validateTuple(nodeId, content, schemaId, depth);
        return;
      case 'union':
        validateUnion(this, nodeId, content, schemaId, depth);
        return;
    }
  }

  /** Kind of a document node as named in diagnostics. */
  kindOf(nodeId: NodeId): ValueKindName {
    const { content } = this.doc.node(nodeId);
    return content.kind === 'primitive' ? primitiveKindName(content.value) : content.kind;
  }

  typeMismatch(nodeId: NodeId, schemaId: SchemaNodeId, expected: string, found: string, path?: EurePath): void {
    this.ctx.error('type-mismatch', nodeId, schemaId, `Expected ${expected}, found ${found}.`, path);
  }

  // -------------------------------------------------------------------------
  // Primitives
  // -------------------------------------------------------------------------

  /**
   * Kind check and constraints for a primitive. `path` overrides the node's
   * own path, for map keys.
   */
  checkPrimitive(
    value: PrimitiveValue,
    schema: SchemaNodeContent,
    nodeId: NodeId,
    schemaId: SchemaNodeId,
    path?: EurePath,
  ): void {
    const found = primitiveKindName(value);
    switch (schema.kind) {
      case 'boolean':
      case 'null':
        if (value.type !== schema.kind) this.typeMismatch(nodeId, schemaId, schema.kind, found, path);
        return;
      case 'text':
        if (value.type !== 'text') {
          this.typeMismatch(nodeId, schemaId, 'text', found, path);
          return;
        }
        this.checkText(value, schema, nodeId, schemaId, path);
        return;
      case 'integer':
        if (value.type !== 'integer') {
          this.typeMismatch(nodeId, schemaId, 'integer', found, path);
          return;
        }
        this.checkInteger(value.value, schema, nodeId, schemaId, path);
        return;
      case 'float':
        if (value.type === 'integer') {
          this.checkFloat(fromBigInt(value.value), schema, describePrimitive(value), nodeId, schemaId, path);
        } else if (value.type === 'float') {
          this.checkFloatNumber(value.value, schema, nodeId, schemaId, path);
        } else {
          this.typeMismatch(nodeId, schemaId, 'float', found, path);
        }
        return;
      default:
        this.typeMismatch(nodeId, schemaId, schema.kind, found, path);
    }
  }

  private checkText(
    value: Extract<PrimitiveValue, { type: 'text' }>,
    schema: TextSchema,
    nodeId: NodeId,
    schemaId: SchemaNodeId,
    path?: EurePath,
  ): void {
    const { ctx } = this;
    if (schema.language !== undefined) {
      const { language } = value;
      const ok =
        schema.language === 'plaintext'
          ? language.kind === 'plaintext'
          : language.kind === 'implicit' || (language.kind === 'tagged' && language.tag === schema.language);
      if (!ok) {
        const actual = language.kind === 'tagged' ? language.tag : language.kind;
        ctx.error(
          'language-mismatch',
          nodeId,
          schemaId,
          `Expected text in language "${schema.language}", found "${actual}".`,
          path,
        );
      }
    }
    const length = [...value.value].length;
    if (
      (schema.minLength !== undefined && length < schema.minLength) ||
      (schema.maxLength !== undefined && length > schema.maxLength)
    ) {
      ctx.error(
        'length-out-of-bounds',
        nodeId,
        schemaId,
        `Text length ${length} is outside ${formatLengths(schema.minLength, schema.maxLength)}.`,
        path,
      );
    }
    if (schema.pattern !== undefined && !ctx.pattern(schema.pattern).test(value.value)) {
      ctx.error(
        'pattern-mismatch',
        nodeId,
        schemaId,
        `Text does not match pattern /${schema.pattern}/.`,
        path,
      );
    }
  }

  private checkInteger(
    value: bigint,
    schema: IntegerSchema,
    nodeId: NodeId,
    schemaId: SchemaNodeId,
    path?: EurePath,
  ): void {
    const cmp = (limit: bigint): number => (value < limit ? -1 : value > limit ? 1 : 0);
    if (!aboveMin(schema.min, cmp) || !belowMax(schema.max, cmp)) {
      const range = formatRange(schema.min, schema.max, (v) => v.toString());
      this.ctx.error('out-of-range', nodeId, schemaId, `${value} is not in range ${range}.`, path);
    }
    if (schema.multipleOf !== undefined && value % schema.multipleOf !== 0n) {
      this.ctx.error(
        'not-multiple-of',
        nodeId,
        schemaId,
        `${value} is not a multiple of ${schema.multipleOf}.`,
        path,
      );
    }
  }

  private checkFloatNumber(
    value: number,
    schema: FloatSchema,
    nodeId: NodeId,
    schemaId: SchemaNodeId,
    path?: EurePath,
  ): void {
    if (Number.isFinite(value)) {
      this.checkFloat(fromNumber(value), schema, String(value), nodeId, schemaId, path);
      return;
    }
    // NaN fails every bound; infinities lie beyond every finite bound.
    const hasMin = schema.min.kind !== 'unbounded';
    const hasMax = schema.max.kind !== 'unbounded';
    const outOfRange = Number.isNaN(value)
      ? hasMin || hasMax
      : value > 0
        ? hasMax
        : hasMin;
    if (outOfRange) {
      const range = formatRange(schema.min, schema.max, formatRational);
      this.ctx.error('out-of-range', nodeId, schemaId, `${value} is not in range ${range}.`, path);
    }
    if (schema.multipleOf !== undefined) {
      this.ctx.error(
        'not-multiple-of',
        nodeId,
        schemaId,
        `${value} is not a multiple of ${formatRational(schema.multipleOf)}.`,
        path,
      );
    }
  }

  private checkFloat(
    value: Rational,
    schema: FloatSchema,
    shown: string,
    nodeId: NodeId,
    schemaId: SchemaNodeId,
    path?: EurePath,
  ): void {
    const cmp = (limit: Rational): number => compare(value, limit);
    if (!aboveMin(schema.min, cmp) || !belowMax(schema.max, cmp)) {
      const range = formatRange(schema.min, schema.max, formatRational);
      this.ctx.error('out-of-range', nodeId, schemaId, `${shown} is not in range ${range}.`, path);
    }
    if (schema.multipleOf !== undefined && !isMultipleOf(value, schema.multipleOf)) {
      this.ctx.error(
        'not-multiple-of',
        nodeId,
        schemaId,
        `${shown} is not a multiple of ${formatRational(schema.multipleOf)}.`,
        path,
      );
    }
  }

  // -------------------------------------------------------------------------
  // Composites
  // -------------------------------------------------------------------------

  /**
   * Checks a map node against a record. Keys in `exclude` (an internal union
   * tag) are neither fields nor unknown.
   */
  validateRecord(
    nodeId: NodeId,
    record: RecordSchema,
    schemaId: SchemaNodeId,
    depth: number,
    exclude: ReadonlySet<string> = new Set(),
  ): void {
    const { ctx, doc } = this;
    const { content } = doc.node(nodeId);
    if (content.kind !== 'map') {
      this.typeMismatch(nodeId, schemaId, 'record', this.kindOf(nodeId));
      return;
    }
    const declared = new Set<string>();
    for (const field of record.fields) {
      declared.add(keyId(field.key));
      const child = content.map.get(field.key);
      if (child === undefined) {
        if (!field.optional) {
          ctx.error(
            'missing-field',
            nodeId,
            field.schema,
            `Required field ${formatKey(field.key)} is missing.`,
            [...doc.pathOf(nodeId), segmentForKey(field.key)],
          );
        }
        continue;
      }
      if (this.schema.node(field.schema).metadata.deprecated) {
        ctx.warn('deprecated-field', child, field.schema, `Field ${formatKey(field.key)} is deprecated.`);
      }
      this.validateNode(child, field.schema, depth + 1, field.optional);
    }
    if (record.cascade === undefined && record.unknownFields === 'allow') return;
    for (const { key, id } of content.map.entries()) {
      if (declared.has(keyId(key)) || (typeof key === 'string' && exclude.has(key))) continue;
      if (record.cascade !== undefined) {
        this.validateNode(id, record.cascade, depth + 1);
        continue;
      }
      ctx.error('unknown-field', id, schemaId, `Unknown field ${formatKey(key)}.`);
    }
  }

  private validateArray(nodeId: NodeId, array: ArraySchema, schemaId: SchemaNodeId, depth: number): void {
    const { ctx, doc } = this;
    const { content } = doc.node(nodeId);
    if (content.kind !== 'array') {
      this.typeMismatch(nodeId, schemaId, 'array', this.kindOf(nodeId));
      return;
    }
    const count = content.items.length;
    if (
      (array.minLength !== undefined && count < array.minLength) ||
      (array.maxLength !== undefined && count > array.maxLength)
    ) {
      ctx.error(
        'array-length-out-of-bounds',
        nodeId,
        schemaId,
        `Array has ${count} items, expected ${formatLengths(array.minLength, array.maxLength)}.`,
      );
    }
    for (const item of content.items) {
      this.validateNode(item, array.item, depth + 1);
    }
    if (array.unique) {
      const values = content.items.map((item) => doc.toValue(item));
      for (let i = 0; i < values.length; i++) {
        const j = values.findIndex((other, k) => k > i && valueEquals(values[i], other));
        if (j !== -1) {
          ctx.error('array-not-unique', nodeId, schemaId, `Items ${i} and ${j} are equal.`);
          return;
        }
      }
    }
  }

  private validateMap(
    nodeId: NodeId,
    keySchema: SchemaNodeId,
    valueSchema: SchemaNodeId,
    schemaId: SchemaNodeId,
    depth: number,
  ): void {
    const { content } = this.doc.node(nodeId);
    if (content.kind !== 'map') {
      this.typeMismatch(nodeId, schemaId, 'map', this.kindOf(nodeId));
      return;
    }
    for (const { key, id } of content.map.entries()) {
      this.validateKey(key, keySchema, id, this.doc.pathOf(id));
      this.validateNode(id, valueSchema, depth + 1);
    }
  }

  /** Checks a map key, reported at the entry's path. */
  private validateKey(key: KeyValue, schemaId: SchemaNodeId, entryId: NodeId, path: EurePath): void {
    const resolved = this.resolveSchema(schemaId);
    if (resolved === undefined) {
      this.ctx.error('dangling-reference', entryId, schemaId, 'Key type is not declared.', path);
      return;
    }
    const schema = this.schema.node(resolved).content;
    const primitive = keyToPrimitive(key);
    switch (schema.kind) {
      case 'any':
        return;
      case 'literal':
        if (!valueEquals(keyToValue(key), schema.value)) {
          this.ctx.error('literal-mismatch', entryId, resolved, `Key ${formatKey(key)} does not equal the expected literal.`, path);
        }
        return;
      case 'tuple':
        if (typeof key !== 'object') {
          this.typeMismatch(entryId, resolved, 'tuple', valueKindName(keyToValue(key)), path);
          return;
        }
        this.validateTupleKey(key.tuple, schema, resolved, entryId, path);
        return;
      default:
        if (primitive === undefined) {
          this.typeMismatch(entryId, resolved, schema.kind, 'tuple', path);
          return;
        }
        this.checkPrimitive(primitive, schema, entryId, resolved, path);
    }
  }

  private validateTupleKey(
    items: readonly KeyValue[],
    schema: TupleSchema,
    schemaId: SchemaNodeId,
    entryId: NodeId,
    path: EurePath,
  ): void {
    if (items.length !== schema.elements.length) {
      this.ctx.error(
        'arity-mismatch',
        entryId,
        schemaId,
        `Expected a tuple of ${schema.elements.length}, found ${items.length}.`,
        path,
      );
    }
    const overlap = Math.min(items.length, schema.elements.length);
    for (let i = 0; i < overlap; i++) {
      this.validateKey(items[i], schema.elements[i], entryId, path);
    }
  }

  private validateTuple(nodeId: NodeId, tuple: TupleSchema, schemaId: SchemaNodeId, depth: number): void {
    const { content } = this.doc.node(nodeId);
    if (content.kind !== 'tuple') {
      this.typeMismatch(nodeId, schemaId, 'tuple', this.kindOf(nodeId));
      return;
    }
    if (content.items.length !== tuple.elements.length) {
      this.ctx.error(
        'arity-mismatch',
        nodeId,
        schemaId,
        `Expected a tuple of ${tuple.elements.length}, found ${content.items.length}.`,
      );
    }
    const overlap = Math.min(content.items.length, tuple.elements.length);
    for (let i = 0; i < overlap; i++) {
      this.validateNode(content.items[i], tuple.elements[i], depth + 1);
    }
  }
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Validates `doc` against `schema`.
 *
 * Mismatches are returned as diagnostics. Throws {@link ValidatorError} when
 * the options are invalid, the schema is structurally corrupt, `rootType`
 * is not registered, or a named type is a cycle of references.
 *
 * @example
 * ```typescript
 * const result = validate(doc, schema, { unionTagMode: 'lenient' });
 * for (const e of result.errors) console.log(formatDiagnostic(e));
 * ```
 */
export function validate(doc: Document, schema: SchemaDocument, options: ValidateOptions = {}): ValidationResult {
  const resolved = resolveValidateOptions(options);
  const ctx = new ValidationContext(doc, schema, resolved);
  sweepSchema(schema, ctx);

  let root = schema.root;
  if (resolved.rootType !== undefined) {
    const id = schema.lookupType(resolved.rootType);
    if (id === undefined) {
      throw new ValidatorError('unknown-root-type', `Type "${resolved.rootType}" is not declared.`);
    }
    root = id;
  }

  new SchemaValidator(ctx).validateNode(doc.root, root, 0);
  const missing = checkCompleteness(doc, ctx.holes);
  const errors = [...ctx.errors, ...missing];
  return {
    errors,
    warnings: [...ctx.warnings],
    isValid: errors.length === 0,
    isComplete: missing.length === 0,
  };
}
