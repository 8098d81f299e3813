import type { Brand } from '../types.js';
import { keyId } from './key.js';
import type { KeyValue } from './key.js';
import type { PrimitiveValue } from './value.js';

/** Handle into one document's node table. Never valid across documents. */
export type NodeId = Brand<number, 'NodeId'>;

export const asNodeId = (value: number): NodeId => value as NodeId;

export interface MapEntry {
  readonly key: KeyValue;
  readonly id: NodeId;
}

/** Read-only view of a {@link NodeMap}, as exposed by a finished document. */
export interface ReadonlyNodeMap {
  readonly size: number;
  get(key: KeyValue): NodeId | undefined;
  has(key: KeyValue): boolean;
  entries(): IterableIterator<MapEntry>;
  keys(): KeyValue[];
}

/**
 * Ordered map from key to child node. Keys are unique; an identifier and the
 * text key of the same spelling are the same key.
 */
export class NodeMap implements ReadonlyNodeMap {
  private readonly byKey = new Map<string, MapEntry>();

  get size(): number {
    return this.byKey.size;
  }

  get(key: KeyValue): NodeId | undefined {
    return this.byKey.get(keyId(key))?.id;
  }

  has(key: KeyValue): boolean {
    return this.byKey.has(keyId(key));
  }

  entries(): IterableIterator<MapEntry> {
    return this.byKey.values();
  }

  keys(): KeyValue[] {
    return [...this.byKey.values()].map((e) => e.key);
  }

  /**
   * Adds an entry. Returns false without changing the map when the key is
   * already present.
   */
  insert(key: KeyValue, id: NodeId): boolean {
    const k = keyId(key);
    if (this.byKey.has(k)) return false;
    this.byKey.set(k, { key, id });
    return true;
  }
}

export type NodeContent =
  | { readonly kind: 'hole'; readonly label?: string }
  | { readonly kind: 'primitive'; readonly value: PrimitiveValue }
  | { readonly kind: 'map'; readonly map: ReadonlyNodeMap }
  | { readonly kind: 'array'; readonly items: readonly NodeId[] }
  | { readonly kind: 'tuple'; readonly items: readonly NodeId[] };

export interface Node {
  readonly content: NodeContent;
  /** Extension namespace (`$name` → node), separate from plain map keys. */
  readonly extensions: ReadonlyMap<string, NodeId>;
}

export function isHole(node: Node): boolean {
  return node.content.kind === 'hole';
}
