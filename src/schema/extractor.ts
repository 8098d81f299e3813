import type { Document } from '../document/document.js';
import { keyName } from '../document/key.js';
import type { NodeId } from '../document/node.js';
import { seg } from '../document/path.js';
import type { EurePath } from '../document/path.js';
import type { PrimitiveValue, Value } from '../document/value.js';
import { isRenameRule } from '../utils.js';
import { SchemaError } from '../validation/errors.js';
import { compare, fromBigInt, fromNumber } from './rational.js';
import type { Rational } from './rational.js';
import { SchemaBuilder } from './schema-document.js';
import type { SchemaDocument } from './schema-document.js';
import { isTypePathLiteral, parseTypeExpression } from './type-expression.js';
import type { TypeExpression } from './type-expression.js';
import { UNBOUNDED } from './types.js';
import type {
  Bound,
  NamingOptions,
  RecordField,
  SchemaMetadata,
  SchemaNodeContent,
  SchemaNodeId,
  UnionVariant,
  VariantRepr,
} from './types.js';

export interface ExtractedSchema {
  readonly schema: SchemaDocument;
  /** True when the source held declarations only, no example data. */
  readonly isPureSchema: boolean;
}

// ---------------------------------------------------------------------------
// Annotation vocabulary
// ---------------------------------------------------------------------------

/** Annotations that decide the kind of a schema node on their own. */
const TYPE_ANNOTATIONS = ['type', 'literal', 'variants', 'union', 'array', 'key', 'value', 'elements'];

const NUMERIC_CONSTRAINTS = ['min', 'max', 'exclusive-min', 'exclusive-max', 'range', 'multiple-of'];
const LENGTH_CONSTRAINTS = ['min-length', 'max-length', 'length'];

const RECOGNIZED = new Set([
  ...TYPE_ANNOTATIONS,
  ...NUMERIC_CONSTRAINTS,
  ...LENGTH_CONSTRAINTS,
  'optional',
  'variant-repr',
  'unknown-fields',
  'cascade-type',
  'pattern',
  'unique',
  'description',
  'deprecated',
  'default',
  'examples',
  'rename',
  'rename-all',
]);

/** Data-side union tag, never read as an annotation. */
const VARIANT_TAG = 'variant';
const ROOT_ONLY = new Set(['types', 'schema']);

/** Annotations that only apply to one kind, and the kind they need. */
const KIND_SPECIFIC: ReadonlyArray<readonly [string, SchemaNodeContent['kind']]> = [
  ['array', 'array'],
  ['key', 'map'],
  ['value', 'map'],
  ['elements', 'tuple'],
  ['literal', 'literal'],
  ['variants', 'union'],
  ['union', 'union'],
  ['variant-repr', 'union'],
  ['unknown-fields', 'record'],
  ['cascade-type', 'record'],
];

const CONSTRAINTS_BY_KIND: Partial<Record<SchemaNodeContent['kind'], readonly string[]>> = {
  text: [...LENGTH_CONSTRAINTS, 'pattern'],
  integer: NUMERIC_CONSTRAINTS,
  float: NUMERIC_CONSTRAINTS,
  array: [...LENGTH_CONSTRAINTS, 'unique'],
};

const ALL_CONSTRAINTS = [...NUMERIC_CONSTRAINTS, ...LENGTH_CONSTRAINTS, 'pattern', 'unique'];

/**
 * Where a node sits relative to the schema being built.
 *
 * - `root`      : the document root; a map always becomes a record.
 * - `field`     : a record field; unannotated data is skipped.
 * - `annotation`: inside an annotation that expects a type (`$array`,
 *   `$types.X`, a variant); bare text is read as a type expression.
 */
type Position = 'root' | 'field' | 'annotation';

type ResolvedKind = TypeExpression | { readonly kind: 'synthesized-record' };

// ---------------------------------------------------------------------------
// Extractor
// ---------------------------------------------------------------------------

class SchemaExtractor {
  private readonly builder = new SchemaBuilder();
  private readonly references: Array<{ name: string; path: EurePath }> = [];
  /** Cascade types in force, innermost last; `undefined` shields a declaration. */
  private readonly cascades: Array<SchemaNodeId | undefined> = [];

  constructor(private readonly doc: Document) {}

  run(): ExtractedSchema {
    const { doc } = this;
    const rootNode = doc.node(doc.root);

    const schemaRef = rootNode.extensions.get('schema');
    if (schemaRef !== undefined) this.builder.setSchemaRef(this.requireText(schemaRef, '$schema'));

    const rootNaming = this.naming(doc.root);
    if (rootNaming.renameAll !== undefined) this.builder.setNaming({ renameAll: rootNaming.renameAll });

    const types = rootNode.extensions.get('types');
    if (types !== undefined) this.extractRegistry(types);

    const root = this.extractType(doc.root, 'root') ?? this.builder.add({ kind: 'any' });

    for (const ref of this.references) {
      if (!this.builder.hasType(ref.name)) {
        throw new SchemaError(
          'dangling-reference',
          ref.path,
          `Type "${ref.name}" is not declared in $types`,
        );
      }
    }

    return { schema: this.builder.build(root), isPureSchema: this.isPure(doc.root) };
  }

  // -------------------------------------------------------------------------
  // Registry
  // -------------------------------------------------------------------------

  private extractRegistry(typesId: NodeId): void {
    const content = this.doc.node(typesId).content;
    if (content.kind !== 'map') {
      throw new SchemaError('malformed-constraint', this.doc.pathOf(typesId), '$types must be a map');
    }
    // Register every name first so declarations may refer to each other.
    const entries = [...content.map.entries()].map(({ key, id }) => {
      const name = keyName(key);
      const slot = this.builder.reserve();
      this.builder.registerType(name, slot, this.naming(id));
      return { slot, id };
    });
    for (const { slot, id } of entries) {
      this.extractType(id, 'annotation', slot);
    }
  }

  // -------------------------------------------------------------------------
  // Type nodes
  // -------------------------------------------------------------------------

  /**
   * Builds the schema node for `id`, or fills the reserved node `into`.
   * Returns `undefined` for unannotated data in field position.
   */
  private extractType(id: NodeId, position: Position, into?: SchemaNodeId): SchemaNodeId | undefined {
    if (position !== 'annotation') return this.extractOwnType(id, position, into);
    // Declarations inside annotations are outside any cascade.
    this.cascades.push(undefined);
    const result = this.extractOwnType(id, position, into);
    this.cascades.pop();
    return result;
  }

  private extractOwnType(id: NodeId, position: Position, into?: SchemaNodeId): SchemaNodeId | undefined {
    const resolved = this.resolveKind(id, position);
    if (resolved === undefined) return undefined;
    const content = this.buildContent(id, resolved, position);
    if (content === undefined) return undefined;
    this.checkApplicable(id, content.kind);
    if (into === undefined) return this.builder.add(content, this.metadata(id));
    this.builder.fill(into, content, this.metadata(id));
    return into;
  }

  private resolveKind(id: NodeId, position: Position): ResolvedKind | undefined {
    const { doc } = this;
    const node = doc.node(id);
    const path = doc.pathOf(id);

    let expr: TypeExpression | undefined;
    const typeId = this.annotation(id, 'type');
    if (typeId !== undefined) expr = this.requireTypeExpression(typeId);

    const text = this.textOf(id);
    if (text !== undefined && isTypePathLiteral(text)) {
      if (expr !== undefined) {
        throw new SchemaError(
          'conflicting-type-annotations',
          path,
          `$type and the type path "${text}" both declare a type`,
        );
      }
      expr = parseTypeExpression(text);
    } else if (text !== undefined && position === 'annotation' && expr === undefined) {
      expr = parseTypeExpression(text);
      if (expr === undefined) {
        throw new SchemaError('invalid-type-expression', path, `"${text}" is not a type expression`);
      }
    }

    // Structural annotations imply a kind when no explicit type is given.
    let implied: TypeExpression['kind'] | undefined;
    const implications: ReadonlyArray<readonly [string, TypeExpression['kind']]> = [
      ['literal', 'literal'],
      ['variants', 'union'],
      ['union', 'union'],
      ['array', 'array'],
      ['key', 'map'],
      ['value', 'map'],
      ['elements', 'tuple'],
    ];
    for (const [name, kind] of implications) {
      if (this.annotation(id, name) === undefined) continue;
      const current = expr?.kind ?? implied;
      if (current !== undefined && current !== kind) {
        throw new SchemaError(
          'conflicting-type-annotations',
          path,
          `$${name} implies ${kind}, but the node is declared as ${current}`,
        );
      }
      implied = kind;
    }
    if (expr !== undefined) return expr;
    if (implied !== undefined && implied !== 'text' && implied !== 'reference') return { kind: implied };

    const annotated = this.hasAnnotations(id);
    if (node.content.kind === 'map') {
      // An empty map holding only annotations declares an untyped field.
      const untyped =
        position === 'field' &&
        annotated &&
        node.content.map.size === 0 &&
        this.annotation(id, 'unknown-fields') === undefined &&
        this.annotation(id, 'cascade-type') === undefined;
      if (!untyped) return { kind: 'synthesized-record' };
    }
    if (position === 'annotation') {
      throw new SchemaError('invalid-type-expression', path, `Expected a type, found ${node.content.kind}`);
    }
    if (position === 'root' || annotated) return { kind: 'any' };
    return undefined;
  }

  private buildContent(
    id: NodeId,
    resolved: ResolvedKind,
    position: Position,
  ): SchemaNodeContent | undefined {
    switch (resolved.kind) {
      case 'text':
        return {
          kind: 'text',
          ...this.lengths(id),
          ...(this.annotation(id, 'pattern') !== undefined && { pattern: this.pattern(id) }),
          ...(resolved.language !== undefined && { language: resolved.language }),
        };
      case 'integer':
        return { kind: 'integer', ...this.integerConstraints(id) };
      case 'float':
        return { kind: 'float', ...this.floatConstraints(id) };
      case 'boolean':
      case 'null':
      case 'any':
        return { kind: resolved.kind };
      case 'literal': {
        const literal = this.annotation(id, 'literal');
        if (literal === undefined) {
          throw new SchemaError('malformed-constraint', this.doc.pathOf(id), 'literal type requires $literal');
        }
        return { kind: 'literal', value: this.doc.toValue(literal) };
      }
      case 'array': {
        const item = this.annotation(id, 'array');
        return {
          kind: 'array',
          item: item === undefined ? this.builder.add({ kind: 'any' }) : this.annotatedType(item),
          ...this.lengths(id),
          unique: this.flag(id, 'unique'),
        };
      }
      case 'map': {
        const key = this.annotation(id, 'key');
        const value = this.annotation(id, 'value');
        return {
          kind: 'map',
          key: key === undefined ? this.builder.add({ kind: 'any' }) : this.annotatedType(key),
          value: value === undefined ? this.builder.add({ kind: 'any' }) : this.annotatedType(value),
        };
      }
      case 'tuple':
        return { kind: 'tuple', elements: this.elements(id) };
      case 'union':
        return this.union(id);
      case 'reference':
        this.references.push({ name: resolved.name, path: this.referencePath(id) });
        return { kind: 'reference', name: resolved.name };
      case 'record':
        return this.record(id, 'record', position);
      case 'synthesized-record':
        return this.record(id, 'synthesized', position);
    }
  }

  /** Type of a node in annotation position; never omitted. */
  private annotatedType(id: NodeId): SchemaNodeId {
    return this.extractType(id, 'annotation') ?? this.builder.add({ kind: 'any' });
  }

  private referencePath(id: NodeId): EurePath {
    const typeId = this.annotation(id, 'type');
    return this.doc.pathOf(typeId ?? id);
  }

  // -------------------------------------------------------------------------
  // Composite kinds
  // -------------------------------------------------------------------------

  private record(
    id: NodeId,
    origin: 'record' | 'synthesized',
    position: Position,
  ): SchemaNodeContent | undefined {
    const { content } = this.doc.node(id);
    const cascadeId = this.annotation(id, 'cascade-type');
    const cascade = cascadeId === undefined ? this.cascades.at(-1) : this.annotatedType(cascadeId);
    const fields: RecordField[] = [];
    let hasData = false;
    this.cascades.push(cascade);
    if (content.kind === 'map') {
      for (const { key, id: child } of content.map.entries()) {
        const schema = this.extractType(child, 'field');
        if (schema === undefined) {
          hasData = true;
          continue;
        }
        fields.push({ key, schema, optional: this.flag(child, 'optional') });
      }
    }
    this.cascades.pop();
    const policyId = this.annotation(id, 'unknown-fields');
    if (
      origin === 'synthesized' &&
      position === 'field' &&
      fields.length === 0 &&
      policyId === undefined &&
      cascadeId === undefined
    ) {
      return undefined;
    }

    let unknownFields: 'deny' | 'allow' = hasData ? 'allow' : 'deny';
    if (policyId !== undefined) {
      const policy = this.textOf(policyId);
      if (policy !== 'deny' && policy !== 'allow') {
        throw new SchemaError(
          'malformed-constraint',
          this.doc.pathOf(policyId),
          '$unknown-fields must be "deny" or "allow"',
        );
      }
      unknownFields = policy;
    }
    return this.builder.record(fields, unknownFields, this.doc.pathOf(id), cascade);
  }

  private elements(id: NodeId): SchemaNodeId[] {
    const elementsId = this.annotation(id, 'elements');
    if (elementsId === undefined) return [];
    const { content } = this.doc.node(elementsId);
    if (content.kind !== 'array' && content.kind !== 'tuple') {
      throw new SchemaError(
        'malformed-constraint',
        this.doc.pathOf(elementsId),
        '$elements must be an array or tuple of types',
      );
    }
    return content.items.map((item) => this.annotatedType(item));
  }

  private union(id: NodeId): SchemaNodeContent {
    const path = this.doc.pathOf(id);
    const listId = this.annotation(id, 'union');
    if (listId !== undefined) return this.unionOfTypes(id, listId);
    const variantsId = this.annotation(id, 'variants');
    if (variantsId === undefined) {
      throw new SchemaError('malformed-constraint', path, 'union type requires $variants');
    }
    const { content } = this.doc.node(variantsId);
    if (content.kind !== 'map') {
      throw new SchemaError('malformed-constraint', this.doc.pathOf(variantsId), '$variants must be a map');
    }
    const repr = this.variantRepr(id);
    const variants: UnionVariant[] = [];
    for (const { key, id: variantId } of content.map.entries()) {
      const schema = this.annotatedType(variantId);
      const variantContent = this.builder.content(schema);
      if (
        repr.kind === 'adjacent' &&
        variantContent?.kind === 'record' &&
        variantContent.fields.length === 0
      ) {
        throw new SchemaError(
          'empty-variant',
          this.doc.pathOf(variantId),
          `Variant "${keyName(key)}" has no fields, but adjacent representation requires content`,
        );
      }
      variants.push({ name: keyName(key), schema });
    }
    return this.builder.union(variants, repr, this.doc.pathOf(variantsId));
  }

  /** `$union: [.integer, .text]`: an untagged union named after its members. */
  private unionOfTypes(id: NodeId, listId: NodeId): SchemaNodeContent {
    const variantsId = this.annotation(id, 'variants');
    if (variantsId !== undefined) {
      throw new SchemaError(
        'conflicting-type-annotations',
        this.doc.pathOf(id),
        '$union and $variants cannot both declare the union',
      );
    }
    const reprId = this.annotation(id, 'variant-repr');
    if (reprId !== undefined) {
      throw new SchemaError('malformed-constraint', this.doc.pathOf(reprId), '$variant-repr does not apply to $union');
    }
    const { content } = this.doc.node(listId);
    if ((content.kind !== 'array' && content.kind !== 'tuple') || content.items.length === 0) {
      throw new SchemaError(
        'malformed-constraint',
        this.doc.pathOf(listId),
        '$union must be a non-empty list of types',
      );
    }
    const variants = content.items.map((item, index) => ({
      name: this.memberName(item, index),
      schema: this.annotatedType(item),
    }));
    return this.builder.union(variants, { kind: 'untagged' }, this.doc.pathOf(listId));
  }

  private memberName(id: NodeId, index: number): string {
    const text = this.textOf(id);
    const expr = text === undefined ? undefined : parseTypeExpression(text);
    if (expr === undefined) return String(index);
    if (expr.kind === 'reference') return expr.name;
    if (expr.kind === 'text' && expr.language !== undefined) return `text.${expr.language}`;
    return expr.kind;
  }

  private variantRepr(id: NodeId): VariantRepr {
    const reprId = this.annotation(id, 'variant-repr');
    if (reprId === undefined) return { kind: 'external' };
    const malformed = (): never => {
      throw new SchemaError(
        'malformed-constraint',
        this.doc.pathOf(reprId),
        '$variant-repr must be "external", "tagged", "untagged", { tag } or { tag, content }',
      );
    };
    const text = this.textOf(reprId);
    if (text === 'external' || text === 'tagged' || text === 'untagged') return { kind: text };
    const { content } = this.doc.node(reprId);
    if (content.kind !== 'map') return malformed();
    const tagId = content.map.get('tag');
    const tag = tagId === undefined ? undefined : this.textOf(tagId);
    if (tag === undefined) return malformed();
    const contentId = content.map.get('content');
    if (contentId === undefined) return content.map.size === 1 ? { kind: 'internal', tag } : malformed();
    const contentName = this.textOf(contentId);
    if (contentName === undefined || content.map.size !== 2 || contentName === tag) return malformed();
    return { kind: 'adjacent', tag, content: contentName };
  }

  // -------------------------------------------------------------------------
  // Constraints
  // -------------------------------------------------------------------------

  private checkApplicable(id: NodeId, kind: SchemaNodeContent['kind']): void {
    const allowed = CONSTRAINTS_BY_KIND[kind] ?? [];
    for (const name of ALL_CONSTRAINTS) {
      const ann = this.annotation(id, name);
      if (ann !== undefined && !allowed.includes(name)) {
        throw new SchemaError('malformed-constraint', this.doc.pathOf(ann), `$${name} does not apply to ${kind}`);
      }
    }
    for (const [name, needed] of KIND_SPECIFIC) {
      const ann = this.annotation(id, name);
      if (ann !== undefined && needed !== kind) {
        throw new SchemaError('malformed-constraint', this.doc.pathOf(ann), `$${name} does not apply to ${kind}`);
      }
    }
  }

  private lengths(id: NodeId): { minLength?: number; maxLength?: number } {
    let min = this.length(id, 'min-length');
    let max = this.length(id, 'max-length');
    const pair = this.pair(id, 'length', (ann, what) => this.lengthValue(ann, what));
    if (pair !== undefined) {
      if (min !== undefined || max !== undefined) {
        throw new SchemaError(
          'malformed-constraint',
          this.annotationPath(id, 'length'),
          '$length cannot be combined with $min-length or $max-length',
        );
      }
      [min, max] = pair;
    }
    if (min !== undefined && max !== undefined && min > max) {
      throw new SchemaError(
        'malformed-constraint',
        this.annotationPath(id, pair === undefined ? 'min-length' : 'length'),
        `Minimum length ${min} exceeds maximum length ${max}`,
      );
    }
    return {
      ...(min !== undefined && { minLength: min }),
      ...(max !== undefined && { maxLength: max }),
    };
  }

  private length(id: NodeId, name: string): number | undefined {
    const ann = this.annotation(id, name);
    return ann === undefined ? undefined : this.lengthValue(ann, `$${name}`);
  }

  private lengthValue(ann: NodeId, what: string): number {
    const value = this.primitiveOf(ann);
    if (value?.type !== 'integer' || value.value < 0n) {
      throw new SchemaError('malformed-constraint', this.doc.pathOf(ann), `${what} must be a non-negative integer`);
    }
    return Number(value.value);
  }

  /** Ends of a `[min, max]` pair annotation; a null end is open. */
  private pair<T>(
    id: NodeId,
    name: string,
    parse: (ann: NodeId, what: string) => T,
  ): [T | undefined, T | undefined] | undefined {
    const ann = this.annotation(id, name);
    if (ann === undefined) return undefined;
    const { content } = this.doc.node(ann);
    if ((content.kind !== 'array' && content.kind !== 'tuple') || content.items.length !== 2) {
      throw new SchemaError('malformed-constraint', this.doc.pathOf(ann), `$${name} must be a pair [min, max]`);
    }
    const end = (item: NodeId, index: number): T | undefined =>
      this.primitiveOf(item)?.type === 'null' ? undefined : parse(item, `$${name}[${index}]`);
    return [end(content.items[0], 0), end(content.items[1], 1)];
  }

  private pattern(id: NodeId): string {
    const ann = this.annotation(id, 'pattern');
    const path = this.annotationPath(id, 'pattern');
    const source = ann === undefined ? undefined : this.textOf(ann);
    if (source === undefined) throw new SchemaError('malformed-constraint', path, '$pattern must be text');
    try {
      new RegExp(source, 'u');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SchemaError('malformed-constraint', path, `Invalid pattern: ${reason}`);
    }
    return source;
  }

  private integerConstraints(id: NodeId): {
    min: Bound<bigint>;
    max: Bound<bigint>;
    multipleOf?: bigint;
  } {
    const parse = (ann: NodeId, what: string): bigint => {
      const value = this.primitiveOf(ann);
      if (value?.type !== 'integer') {
        throw new SchemaError('malformed-constraint', this.doc.pathOf(ann), `${what} must be an integer`);
      }
      return value.value;
    };
    const read = (name: string): bigint | undefined => {
      const ann = this.annotation(id, name);
      return ann === undefined ? undefined : parse(ann, `$${name}`);
    };
    const range = this.pair(id, 'range', parse);
    const min = this.bound(id, 'min', read, range);
    const max = this.bound(id, 'max', read, range);
    const multipleOf = read('multiple-of');
    if (multipleOf !== undefined && multipleOf <= 0n) {
      throw new SchemaError('malformed-constraint', this.annotationPath(id, 'multiple-of'), '$multiple-of must be positive');
    }
    if (min.kind !== 'unbounded' && max.kind !== 'unbounded' && min.value > max.value) {
      throw new SchemaError(
        'malformed-constraint',
        this.annotationPath(id, range === undefined ? 'min' : 'range'),
        'Lower bound exceeds upper bound',
      );
    }
    return { min, max, ...(multipleOf !== undefined && { multipleOf }) };
  }

  private floatConstraints(id: NodeId): {
    min: Bound<Rational>;
    max: Bound<Rational>;
    multipleOf?: Rational;
  } {
    const parse = (ann: NodeId, what: string): Rational => {
      const value = this.primitiveOf(ann);
      if (value?.type === 'integer') return fromBigInt(value.value);
      if (value?.type === 'float' && Number.isFinite(value.value)) return fromNumber(value.value);
      throw new SchemaError('malformed-constraint', this.doc.pathOf(ann), `${what} must be a finite number`);
    };
    const read = (name: string): Rational | undefined => {
      const ann = this.annotation(id, name);
      return ann === undefined ? undefined : parse(ann, `$${name}`);
    };
    const range = this.pair(id, 'range', parse);
    const min = this.bound(id, 'min', read, range);
    const max = this.bound(id, 'max', read, range);
    const multipleOf = read('multiple-of');
    if (multipleOf !== undefined && multipleOf.num <= 0n) {
      throw new SchemaError('malformed-constraint', this.annotationPath(id, 'multiple-of'), '$multiple-of must be positive');
    }
    if (min.kind !== 'unbounded' && max.kind !== 'unbounded' && compare(min.value, max.value) > 0) {
      throw new SchemaError(
        'malformed-constraint',
        this.annotationPath(id, range === undefined ? 'min' : 'range'),
        'Lower bound exceeds upper bound',
      );
    }
    return { min, max, ...(multipleOf !== undefined && { multipleOf }) };
  }

  private bound<T>(
    id: NodeId,
    side: 'min' | 'max',
    read: (name: string) => T | undefined,
    range: readonly [T | undefined, T | undefined] | undefined,
  ): Bound<T> {
    const inclusive = read(side);
    const exclusive = read(`exclusive-${side}`);
    if (range !== undefined) {
      if (inclusive !== undefined || exclusive !== undefined) {
        throw new SchemaError(
          'malformed-constraint',
          this.annotationPath(id, 'range'),
          `$range cannot be combined with $${side} or $exclusive-${side}`,
        );
      }
      const end = range[side === 'min' ? 0 : 1];
      return end === undefined ? UNBOUNDED : { kind: 'inclusive', value: end };
    }
    if (inclusive !== undefined && exclusive !== undefined) {
      throw new SchemaError(
        'malformed-constraint',
        this.annotationPath(id, `exclusive-${side}`),
        `$${side} and $exclusive-${side} cannot both be set`,
      );
    }
    if (inclusive !== undefined) return { kind: 'inclusive', value: inclusive };
    if (exclusive !== undefined) return { kind: 'exclusive', value: exclusive };
    return UNBOUNDED;
  }

  // -------------------------------------------------------------------------
  // Metadata and naming
  // -------------------------------------------------------------------------

  private metadata(id: NodeId): SchemaMetadata {
    const { doc } = this;
    const descriptionId = this.annotation(id, 'description');
    const defaultId = this.annotation(id, 'default');
    const examplesId = this.annotation(id, 'examples');
    let examples: Value[] | undefined;
    if (examplesId !== undefined) {
      const value = doc.toValue(examplesId);
      if (value.kind !== 'array') {
        throw new SchemaError('malformed-constraint', doc.pathOf(examplesId), '$examples must be an array');
      }
      examples = [...value.items];
    }
    const extensions: Array<[string, Value]> = [];
    const isRoot = id === doc.root;
    for (const [name, ext] of doc.node(id).extensions) {
      if (RECOGNIZED.has(name) || name === VARIANT_TAG) continue;
      if (isRoot && ROOT_ONLY.has(name)) continue;
      extensions.push([name, doc.toValue(ext)]);
    }
    return {
      deprecated: this.flag(id, 'deprecated'),
      extensions: Object.fromEntries(extensions),
      ...(descriptionId !== undefined && { description: this.requireText(descriptionId, '$description') }),
      ...(defaultId !== undefined && { default: doc.toValue(defaultId) }),
      ...(examples !== undefined && { examples }),
    };
  }

  private naming(id: NodeId): NamingOptions {
    const renameId = this.annotation(id, 'rename');
    const renameAllId = this.annotation(id, 'rename-all');
    const rename = renameId === undefined ? undefined : this.requireText(renameId, '$rename');
    const renameAll = renameAllId === undefined ? undefined : this.requireText(renameAllId, '$rename-all');
    if (renameAll !== undefined && !isRenameRule(renameAll)) {
      throw new SchemaError(
        'malformed-constraint',
        this.doc.pathOf(renameAllId ?? id),
        `Unknown rename rule "${renameAll}"`,
      );
    }
    return {
      ...(rename !== undefined && { rename }),
      ...(renameAll !== undefined && { renameAll }),
    };
  }

  // -------------------------------------------------------------------------
  // Node helpers
  // -------------------------------------------------------------------------

  private annotation(id: NodeId, name: string): NodeId | undefined {
    return this.doc.node(id).extensions.get(name);
  }

  private annotationPath(id: NodeId, name: string): EurePath {
    return [...this.doc.pathOf(id), seg.ext(name)];
  }

  private hasAnnotations(id: NodeId): boolean {
    for (const name of this.doc.node(id).extensions.keys()) {
      if (RECOGNIZED.has(name)) return true;
    }
    return false;
  }

  private primitiveOf(id: NodeId): PrimitiveValue | undefined {
    const { content } = this.doc.node(id);
    return content.kind === 'primitive' ? content.value : undefined;
  }

  private textOf(id: NodeId): string | undefined {
    const value = this.primitiveOf(id);
    return value?.type === 'text' ? value.value : undefined;
  }

  private requireText(id: NodeId, what: string): string {
    const text = this.textOf(id);
    if (text === undefined) {
      throw new SchemaError('malformed-constraint', this.doc.pathOf(id), `${what} must be text`);
    }
    return text;
  }

  private requireTypeExpression(id: NodeId): TypeExpression {
    const text = this.textOf(id);
    const expr = text === undefined ? undefined : parseTypeExpression(text);
    if (expr === undefined) {
      throw new SchemaError(
        'invalid-type-expression',
        this.doc.pathOf(id),
        text === undefined ? '$type must be text' : `"${text}" is not a type expression`,
      );
    }
    return expr;
  }

  private flag(id: NodeId, name: string): boolean {
    const ann = this.annotation(id, name);
    if (ann === undefined) return false;
    const value = this.primitiveOf(ann);
    if (value?.type !== 'boolean') {
      throw new SchemaError('malformed-constraint', this.doc.pathOf(ann), `$${name} must be a boolean`);
    }
    return value.value;
  }

  // -------------------------------------------------------------------------
  // Purity
  // -------------------------------------------------------------------------

  /** Walks plain content only; extension subtrees are declarations. */
  private isPure(id: NodeId): boolean {
    const { content } = this.doc.node(id);
    switch (content.kind) {
      case 'hole':
        return true;
      case 'primitive':
        return content.value.type === 'text' && isTypePathLiteral(content.value.value);
      case 'array':
      case 'tuple':
        return false;
      case 'map':
        return [...content.map.entries()].every((entry) => this.isPure(entry.id));
    }
  }
}

/**
 * Builds a schema from the annotations embedded in `doc`.
 *
 * Throws {@link SchemaError} when an annotation is malformed, a type is
 * declared twice in conflicting ways, or a reference names an undeclared
 * type.
 *
 * @example
 * ```typescript
 * const { schema, isPureSchema } = extractSchema(documentFromJson({
 *   name: '.text',
 *   age: { $type: 'integer', $min: 0 },
 * }));
 * ```
 */
export function extractSchema(doc: Document): ExtractedSchema {
  return new SchemaExtractor(doc).run();
}
