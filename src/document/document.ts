import { DocumentError } from '../validation/errors.js';
import type { KeyValue } from './key.js';
import { asNodeId, NodeMap } from './node.js';
import type { Node, NodeContent, NodeId } from './node.js';
import { formatPath, MAX_TUPLE_INDEX, seg, segmentForKey } from './path.js';
import type { EurePath, PathSegment } from './path.js';
import type { PrimitiveValue, Value } from './value.js';

// ---------------------------------------------------------------------------
// Read mode
// ---------------------------------------------------------------------------

/**
 * Immutable tree of nodes. Produced by {@link DocumentBuilder.finish},
 * {@link Document.fromValue} or a format bridge.
 */
export class Document {
  /** @internal Use {@link DocumentBuilder} or {@link Document.fromValue}. */
  constructor(
    private readonly nodes: readonly Node[],
    private readonly paths: readonly EurePath[],
    public readonly root: NodeId,
  ) {}

  /** Number of nodes, the root included. */
  get size(): number {
    return this.nodes.length;
  }

  /**
   * Dereferences a node id. Throws `DocumentError(unknown-node)` for ids this
   * document did not issue.
   */
  node(id: NodeId): Node {
    const node = this.nodes[id];
    if (node === undefined) {
      throw new DocumentError('unknown-node', [], `Node ${id} does not belong to this document`);
    }
    return node;
  }

  /** Path from the root to `id`. */
  pathOf(id: NodeId): EurePath {
    this.node(id);
    return this.paths[id] ?? [];
  }

  /** Child of `parent` addressed by one segment, or `undefined`. */
  child(parent: NodeId, segment: PathSegment): NodeId | undefined {
    const node = this.node(parent);
    const { content } = node;
    switch (segment.kind) {
      case 'extension':
        return node.extensions.get(segment.name);
      case 'ident':
        return content.kind === 'map' ? content.map.get(segment.name) : undefined;
      case 'value':
        return content.kind === 'map' ? content.map.get(segment.key) : undefined;
      case 'tuple-index':
        return content.kind === 'tuple' ? content.items[segment.index] : undefined;
      case 'array-index':
        return content.kind === 'array' && segment.index !== undefined
          ? content.items[segment.index]
          : undefined;
    }
  }

  /** Follows `path` from `from` (default: the root). Returns `undefined` on a miss. */
  find(path: EurePath, from: NodeId = this.root): NodeId | undefined {
    let current: NodeId | undefined = from;
    for (const segment of path) {
      if (current === undefined) return undefined;
      current = this.child(current, segment);
    }
    return current;
  }

  /**
   * Like {@link find}, but throws `DocumentError(path-not-found)` carrying the
   * prefix that did resolve.
   */
  resolve(path: EurePath, from: NodeId = this.root): NodeId {
    let current = from;
    for (let i = 0; i < path.length; i++) {
      const next = this.child(current, path[i]);
      if (next === undefined) {
        throw new DocumentError(
          'path-not-found',
          path.slice(0, i),
          `No node at ${formatPath(path)}`,
        );
      }
      current = next;
    }
    return current;
  }

  /** Projects the subtree at `id` to a {@link Value}. */
  toValue(id: NodeId = this.root): Value {
    const node = this.node(id);
    const data = this.contentToValue(node.content);
    if (node.extensions.size === 0) return data;
    // fromEntries defines own properties, so `__proto__` stays a name.
    const extensions = Object.fromEntries(
      [...node.extensions].map(([name, child]): [string, Value] => [name, this.toValue(child)]),
    );
    return { ...data, extensions };
  }

  private contentToValue(content: NodeContent): Value {
    switch (content.kind) {
      case 'hole':
        return content.label === undefined ? { kind: 'hole' } : { kind: 'hole', label: content.label };
      case 'primitive':
        return { kind: 'primitive', value: content.value };
      case 'array':
        return { kind: 'array', items: content.items.map((i) => this.toValue(i)) };
      case 'tuple':
        return { kind: 'tuple', items: content.items.map((i) => this.toValue(i)) };
      case 'map':
        return {
          kind: 'map',
          entries: [...content.map.entries()].map(({ key, id }) => [key, this.toValue(id)] as const),
        };
    }
  }

  /** Builds a document whose {@link toValue} equals `value`. */
  static fromValue(value: Value): Document {
    const builder = new DocumentBuilder();
    builder.setValue(builder.root, value);
    return builder.finish();
  }
}

// ---------------------------------------------------------------------------
// Construction mode
// ---------------------------------------------------------------------------

type BuilderContent =
  | { kind: 'hole'; label?: string }
  | { kind: 'primitive'; value: PrimitiveValue }
  | { kind: 'map'; map: NodeMap }
  | { kind: 'array'; items: NodeId[] }
  | { kind: 'tuple'; items: NodeId[] };

interface BuilderNode {
  content: BuilderContent;
  extensions: Map<string, NodeId>;
  /** False until content is assigned explicitly or by navigation. */
  bound: boolean;
  path: EurePath;
}

/**
 * Mutable construction API. Nodes are created unbound (an unlabelled hole)
 * and take their shape either from a `bind*` call or from navigation through
 * them. Once {@link finish} is called every method throws
 * `DocumentError(builder-finished)`.
 *
 * @example
 * ```typescript
 * const b = new DocumentBuilder();
 * const port = b.navigate([seg.ident('server'), seg.ident('port')]);
 * b.bindPrimitive(port, prim.int(8080));
 * const doc = b.finish();
 * ```
 */
export class DocumentBuilder {
  private readonly nodes: BuilderNode[] = [];
  private finished = false;
  public readonly root: NodeId;

  constructor() {
    this.root = this.create([]);
  }

  private create(path: EurePath): NodeId {
    const id = asNodeId(this.nodes.length);
    this.nodes.push({ content: { kind: 'hole' }, extensions: new Map(), bound: false, path });
    return id;
  }

  private get(id: NodeId): BuilderNode {
    if (this.finished) {
      throw new DocumentError('builder-finished', [], 'The builder has already been finished');
    }
    const node = this.nodes[id];
    if (node === undefined) {
      throw new DocumentError('unknown-node', [], `Node ${id} does not belong to this builder`);
    }
    return node;
  }

  private requireMap(node: BuilderNode): NodeMap {
    if (!node.bound) this.assign(node, { kind: 'map', map: new NodeMap() });
    if (node.content.kind !== 'map') {
      throw new DocumentError('expected-map', node.path, `Expected a map, found ${node.content.kind}`);
    }
    return node.content.map;
  }

  private requireArray(node: BuilderNode): NodeId[] {
    if (!node.bound) this.assign(node, { kind: 'array', items: [] });
    if (node.content.kind !== 'array') {
      throw new DocumentError('expected-array', node.path, `Expected an array, found ${node.content.kind}`);
    }
    return node.content.items;
  }

  private requireTuple(node: BuilderNode): NodeId[] {
    if (!node.bound) this.assign(node, { kind: 'tuple', items: [] });
    if (node.content.kind !== 'tuple') {
      throw new DocumentError('expected-tuple', node.path, `Expected a tuple, found ${node.content.kind}`);
    }
    return node.content.items;
  }

  private assign(node: BuilderNode, content: BuilderContent): void {
    if (node.bound) {
      throw new DocumentError('already-assigned', node.path, 'Node content is already assigned');
    }
    node.content = content;
    node.bound = true;
  }

  /** Path from the root to `id`. */
  pathOf(id: NodeId): EurePath {
    return this.get(id).path;
  }

  /**
   * Child of `parent` at `segment`, created when missing. An absent array
   * index always appends.
   */
  child(parent: NodeId, segment: PathSegment): NodeId {
    const node = this.get(parent);
    switch (segment.kind) {
      case 'extension':
        return node.extensions.get(segment.name) ?? this.addExtension(parent, segment.name);
      case 'ident':
        return this.requireMap(node).get(segment.name) ?? this.addMapChild(parent, segment.name);
      case 'value':
        return this.requireMap(node).get(segment.key) ?? this.addMapChild(parent, segment.key);
      case 'tuple-index': {
        const existing = this.requireTuple(node)[segment.index];
        return existing ?? this.addTupleElement(parent, segment.index);
      }
      case 'array-index': {
        if (segment.index === undefined) return this.addArrayElement(parent);
        const existing = this.requireArray(node)[segment.index];
        return existing ?? this.addArrayElement(parent, segment.index);
      }
    }
  }

  /** Follows `path` from `from`, creating intermediate nodes on demand. */
  navigate(path: EurePath, from: NodeId = this.root): NodeId {
    return path.reduce((current, segment) => this.child(current, segment), from);
  }

  addMapChild(parent: NodeId, key: KeyValue): NodeId {
    const node = this.get(parent);
    const map = this.requireMap(node);
    const path = [...node.path, segmentForKey(key)];
    if (map.has(key)) {
      throw new DocumentError('already-assigned', path, 'Map key is already present');
    }
    const id = this.create(path);
    map.insert(key, id);
    return id;
  }

  addExtension(parent: NodeId, name: string): NodeId {
    const node = this.get(parent);
    const path = [...node.path, seg.ext(name)];
    if (node.extensions.has(name)) {
      throw new DocumentError('already-assigned', path, `Extension $${name} is already present`);
    }
    const id = this.create(path);
    node.extensions.set(name, id);
    return id;
  }

  /** Appends an element. A given `index` must equal the current length. */
  addArrayElement(parent: NodeId, index?: number): NodeId {
    const node = this.get(parent);
    const items = this.requireArray(node);
    if (index !== undefined && index !== items.length) {
      throw new DocumentError(
        'array-index-invalid',
        [...node.path, seg.index(index)],
        `Array index ${index} is not the next free slot (${items.length})`,
      );
    }
    const id = this.create([...node.path, seg.index(items.length)]);
    items.push(id);
    return id;
  }

  /** Appends an element at `index`, which must equal the current arity. */
  addTupleElement(parent: NodeId, index: number): NodeId {
    const node = this.get(parent);
    const items = this.requireTuple(node);
    if (index !== items.length || index > MAX_TUPLE_INDEX) {
      throw new DocumentError(
        'tuple-index-invalid',
        node.path,
        `Tuple index ${index} is not the next free slot (${items.length})`,
      );
    }
    const id = this.create([...node.path, seg.tuple(index)]);
    items.push(id);
    return id;
  }

  bindPrimitive(id: NodeId, value: PrimitiveValue): void {
    this.assign(this.get(id), { kind: 'primitive', value });
  }

  bindHole(id: NodeId, label?: string): void {
    this.assign(this.get(id), label === undefined ? { kind: 'hole' } : { kind: 'hole', label });
  }

  bindMap(id: NodeId): void {
    this.assign(this.get(id), { kind: 'map', map: new NodeMap() });
  }

  bindArray(id: NodeId): void {
    this.assign(this.get(id), { kind: 'array', items: [] });
  }

  bindTuple(id: NodeId): void {
    this.assign(this.get(id), { kind: 'tuple', items: [] });
  }

  /** Binds `id` and everything below it from a {@link Value}. */
  setValue(id: NodeId, value: Value): void {
    switch (value.kind) {
      case 'hole':
        this.bindHole(id, value.label);
        break;
      case 'primitive':
        this.bindPrimitive(id, value.value);
        break;
      case 'map':
        this.bindMap(id);
        for (const [key, child] of value.entries) {
          this.setValue(this.addMapChild(id, key), child);
        }
        break;
      case 'array':
        this.bindArray(id);
        for (const item of value.items) {
          this.setValue(this.addArrayElement(id), item);
        }
        break;
      case 'tuple':
        this.bindTuple(id);
        value.items.forEach((item, i) => this.setValue(this.addTupleElement(id, i), item));
        break;
    }
    for (const [name, ext] of Object.entries(value.extensions ?? {})) {
      this.setValue(this.addExtension(id, name), ext);
    }
  }

  /** Freezes the builder and returns the finished document. */
  finish(): Document {
    this.get(this.root);
    this.finished = true;
    const nodes = this.nodes.map((n): Node => ({
      content: n.content,
      extensions: new Map(n.extensions),
    }));
    return new Document(
      nodes,
      this.nodes.map((n) => n.path),
      this.root,
    );
  }
}
