import { formatKey, keyId } from '../document/key.js';
import type { EurePath } from '../document/path.js';
import type { PrimitiveValue, Value } from '../document/value.js';
import type { JsonObject, JsonValue } from '../types.js';
import { SchemaError } from '../validation/errors.js';
import { formatRational } from './rational.js';
import { asSchemaNodeId, EMPTY_METADATA } from './types.js';
import type {
  Bound,
  NamingOptions,
  RecordField,
  SchemaMetadata,
  SchemaNode,
  SchemaNodeContent,
  SchemaNodeId,
  UnionVariant,
  UnknownFieldsPolicy,
  VariantRepr,
} from './types.js';

/**
 * Arena of schema nodes plus the registry of named types. Nodes refer to each
 * other by id; named types are referenced by name, so the graph may be cyclic
 * only through `reference` nodes.
 */
export class SchemaDocument {
  constructor(
    public readonly nodes: readonly SchemaNode[],
    public readonly root: SchemaNodeId,
    public readonly types: ReadonlyMap<string, SchemaNodeId>,
    public readonly naming: NamingOptions = {},
    public readonly typeNaming: ReadonlyMap<string, NamingOptions> = new Map(),
    public readonly schemaRef?: string,
  ) {}

  /** Node at `id`, or `undefined` when the id is outside the arena. */
  get(id: SchemaNodeId): SchemaNode | undefined {
    return this.nodes[id];
  }

  node(id: SchemaNodeId): SchemaNode {
    const node = this.get(id);
    if (node === undefined) throw new RangeError(`Schema node ${id} is out of range`);
    return node;
  }

  lookupType(name: string): SchemaNodeId | undefined {
    return this.types.get(name);
  }

  /**
   * Structural form that does not depend on arena layout or registry order.
   * Two schemas describing the same types have deep-equal canonical forms.
   */
  toCanonical(): JsonObject {
    const types: JsonObject = {};
    for (const name of [...this.types.keys()].sort()) {
      const id = this.types.get(name);
      if (id !== undefined) types[name] = this.canonicalNode(id);
    }
    const typeNaming: JsonObject = {};
    for (const name of [...this.typeNaming.keys()].sort()) {
      const naming = this.typeNaming.get(name);
      if (naming !== undefined) typeNaming[name] = canonicalNaming(naming);
    }
    const out: JsonObject = {
      root: this.canonicalNode(this.root),
      types,
      naming: canonicalNaming(this.naming),
      typeNaming,
    };
    if (this.schemaRef !== undefined) out.schemaRef = this.schemaRef;
    return out;
  }

  private canonicalNode(id: SchemaNodeId): JsonValue {
    const { content, metadata } = this.node(id);
    const out: JsonObject = { kind: content.kind };
    switch (content.kind) {
      case 'text':
        if (content.minLength !== undefined) out.minLength = content.minLength;
        if (content.maxLength !== undefined) out.maxLength = content.maxLength;
        if (content.pattern !== undefined) out.pattern = content.pattern;
        if (content.language !== undefined) out.language = content.language;
        break;
      case 'integer':
        out.min = canonicalBound(content.min, (v) => v.toString());
        out.max = canonicalBound(content.max, (v) => v.toString());
        if (content.multipleOf !== undefined) out.multipleOf = content.multipleOf.toString();
        break;
      case 'float':
        out.min = canonicalBound(content.min, formatRational);
        out.max = canonicalBound(content.max, formatRational);
        if (content.multipleOf !== undefined) out.multipleOf = formatRational(content.multipleOf);
        break;
      case 'boolean':
      case 'null':
      case 'any':
        break;
      case 'literal':
        out.value = canonicalValue(content.value);
        break;
      case 'record':
        out.unknownFields = content.unknownFields;
        out.fields = content.fields.map((f) => ({
          key: formatKey(f.key),
          optional: f.optional,
          schema: this.canonicalNode(f.schema),
        }));
        if (content.cascade !== undefined) out.cascade = this.canonicalNode(content.cascade);
        break;
      case 'array':
        out.item = this.canonicalNode(content.item);
        if (content.minLength !== undefined) out.minLength = content.minLength;
        if (content.maxLength !== undefined) out.maxLength = content.maxLength;
        out.unique = content.unique;
        break;
      case 'map':
        out.key = this.canonicalNode(content.key);
        out.value = this.canonicalNode(content.value);
        break;
      case 'tuple':
        out.elements = content.elements.map((e) => this.canonicalNode(e));
        break;
      case 'union':
        out.repr = { ...content.repr };
        out.variants = content.variants.map((v) => ({
          name: v.name,
          schema: this.canonicalNode(v.schema),
        }));
        break;
      case 'reference':
        out.name = content.name;
        break;
    }
    out.metadata = canonicalMetadata(metadata);
    return out;
  }
}

function canonicalBound<T>(bound: Bound<T>, show: (value: T) => string): JsonValue {
  return bound.kind === 'unbounded' ? 'unbounded' : `${bound.kind}:${show(bound.value)}`;
}

function canonicalNaming(naming: NamingOptions): JsonObject {
  const out: JsonObject = {};
  if (naming.rename !== undefined) out.rename = naming.rename;
  if (naming.renameAll !== undefined) out.renameAll = naming.renameAll;
  return out;
}

function canonicalMetadata(metadata: SchemaMetadata): JsonObject {
  const out: JsonObject = { deprecated: metadata.deprecated };
  if (metadata.description !== undefined) out.description = metadata.description;
  if (metadata.default !== undefined) out.default = canonicalValue(metadata.default);
  if (metadata.examples !== undefined) out.examples = metadata.examples.map(canonicalValue);
  out.extensions = canonicalExtensions(metadata.extensions);
  return out;
}

function canonicalPrimitive(value: PrimitiveValue): JsonValue {
  switch (value.type) {
    case 'null':
      return null;
    case 'boolean':
      return value.value;
    case 'integer':
      return `int:${value.value.toString()}`;
    case 'float':
      return `float:${String(value.value)}`;
    case 'text': {
      const lang = value.language.kind === 'tagged' ? value.language.tag : value.language.kind;
      return `${lang}:${value.value}`;
    }
  }
}

function canonicalData(value: Value): JsonValue {
  switch (value.kind) {
    case 'hole':
      return { hole: value.label ?? null };
    case 'primitive':
      return canonicalPrimitive(value.value);
    case 'array':
      return value.items.map(canonicalValue);
    case 'tuple':
      return { tuple: value.items.map(canonicalValue) };
    case 'map':
      return { map: value.entries.map(([k, v]) => [formatKey(k), canonicalValue(v)]) };
  }
}

function canonicalValue(value: Value): JsonValue {
  const data = canonicalData(value);
  if (value.extensions === undefined) return data;
  return { data, extensions: canonicalExtensions(value.extensions) };
}

function canonicalExtensions(extensions: Readonly<Record<string, Value>>): JsonObject {
  return Object.fromEntries(
    Object.entries(extensions)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, value]): [string, JsonValue] => [name, canonicalValue(value)]),
  );
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

const PLACEHOLDER: SchemaNodeContent = { kind: 'any' };

/**
 * Mutable construction API for {@link SchemaDocument}. Record and union
 * constructors enforce unique field and variant names.
 */
export class SchemaBuilder {
  private readonly nodes: SchemaNode[] = [];
  private readonly types = new Map<string, SchemaNodeId>();
  private readonly typeNaming = new Map<string, NamingOptions>();
  private naming: NamingOptions = {};
  private schemaRef?: string;

  add(content: SchemaNodeContent, metadata: SchemaMetadata = EMPTY_METADATA): SchemaNodeId {
    const id = asSchemaNodeId(this.nodes.length);
    this.nodes.push({ content, metadata });
    return id;
  }

  /** Allocates a node to be filled later with {@link fill}. */
  reserve(): SchemaNodeId {
    return this.add(PLACEHOLDER);
  }

  fill(id: SchemaNodeId, content: SchemaNodeContent, metadata: SchemaMetadata = EMPTY_METADATA): void {
    if (this.nodes[id] === undefined) throw new RangeError(`Schema node ${id} is out of range`);
    this.nodes[id] = { content, metadata };
  }

  content(id: SchemaNodeId): SchemaNodeContent | undefined {
    return this.nodes[id]?.content;
  }

  record(
    fields: readonly RecordField[],
    unknownFields: UnknownFieldsPolicy = 'deny',
    path: EurePath = [],
    cascade?: SchemaNodeId,
  ): SchemaNodeContent {
    const seen = new Set<string>();
    for (const field of fields) {
      const id = keyId(field.key);
      if (seen.has(id)) {
        throw new SchemaError('duplicate-field', path, `Field ${formatKey(field.key)} is declared twice`);
      }
      seen.add(id);
    }
    return { kind: 'record', fields, unknownFields, ...(cascade !== undefined && { cascade }) };
  }

  union(
    variants: readonly UnionVariant[],
    repr: VariantRepr = { kind: 'external' },
    path: EurePath = [],
  ): SchemaNodeContent {
    const seen = new Set<string>();
    for (const variant of variants) {
      if (seen.has(variant.name)) {
        throw new SchemaError('duplicate-variant', path, `Variant "${variant.name}" is declared twice`);
      }
      seen.add(variant.name);
    }
    return { kind: 'union', variants, repr };
  }

  registerType(name: string, id: SchemaNodeId, naming?: NamingOptions): void {
    this.types.set(name, id);
    if (naming !== undefined && (naming.rename !== undefined || naming.renameAll !== undefined)) {
      this.typeNaming.set(name, naming);
    }
  }

  hasType(name: string): boolean {
    return this.types.has(name);
  }

  setNaming(naming: NamingOptions): void {
    this.naming = naming;
  }

  setSchemaRef(ref: string): void {
    this.schemaRef = ref;
  }

  build(root: SchemaNodeId): SchemaDocument {
    return new SchemaDocument(
      [...this.nodes],
      root,
      new Map(this.types),
      this.naming,
      new Map(this.typeNaming),
      this.schemaRef,
    );
  }
}
