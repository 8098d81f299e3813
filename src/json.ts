import { DocumentBuilder } from './document/document.js';
import type { Document } from './document/document.js';
import type { NodeId } from './document/node.js';
import type { EurePath } from './document/path.js';
import { prim } from './document/value.js';
import type { PrimitiveValue } from './document/value.js';
import type { JsonValue } from './types.js';
import { BridgeError } from './validation/errors.js';

/** Object keys with this prefix map to the extension namespace. */
const EXTENSION_PREFIX = '$';

function isExtensionKey(key: string): boolean {
  return key.length > EXTENSION_PREFIX.length && key.startsWith(EXTENSION_PREFIX);
}

/**
 * Builds a document from a parsed JSON value.
 *
 * - Object keys starting with `$` become extensions (`"$type"` → `$type`).
 * - Safe integers become integers; every other number becomes a float.
 * - Strings become plaintext.
 *
 * @example
 * ```typescript
 * const doc = documentFromJson({ name: '.text', $types: { Id: '.integer' } });
 * ```
 */
export function documentFromJson(json: JsonValue): Document {
  const builder = new DocumentBuilder();
  fill(builder, builder.root, json);
  return builder.finish();
}

function fill(builder: DocumentBuilder, id: NodeId, value: JsonValue): void {
  if (value === null) {
    builder.bindPrimitive(id, prim.null());
  } else if (typeof value === 'boolean') {
    builder.bindPrimitive(id, prim.bool(value));
  } else if (typeof value === 'number') {
    builder.bindPrimitive(id, Number.isSafeInteger(value) ? prim.int(value) : prim.float(value));
  } else if (typeof value === 'string') {
    builder.bindPrimitive(id, prim.text(value));
  } else if (Array.isArray(value)) {
    builder.bindArray(id);
    for (const item of value) fill(builder, builder.addArrayElement(id), item);
  } else {
    builder.bindMap(id);
    for (const [key, child] of Object.entries(value)) {
      const childId = isExtensionKey(key)
        ? builder.addExtension(id, key.slice(EXTENSION_PREFIX.length))
        : builder.addMapChild(id, key);
      fill(builder, childId, child);
    }
  }
}

/**
 * Projects a document subtree to JSON, the inverse of {@link documentFromJson}.
 *
 * Throws {@link BridgeError} for values JSON cannot hold: holes, tuple keys,
 * keys that collide once stringified, integers beyond the safe range,
 * non-finite floats, and extensions on anything but a map.
 */
export function documentToJson(doc: Document, id: NodeId = doc.root): JsonValue {
  const node = doc.node(id);
  const { content } = node;
  const path = doc.pathOf(id);
  if (node.extensions.size > 0 && content.kind !== 'map') {
    throw new BridgeError(path, `Extensions on a ${content.kind} have no JSON form`);
  }
  switch (content.kind) {
    case 'hole':
      throw new BridgeError(path, 'Holes have no JSON form');
    case 'primitive':
      return primitiveToJson(content.value, path);
    case 'array':
    case 'tuple':
      return content.items.map((item) => documentToJson(doc, item));
    case 'map': {
      const entries: Array<[string, JsonValue]> = [];
      const seen = new Set<string>();
      for (const { key, id: child } of content.map.entries()) {
        if (typeof key === 'object') {
          throw new BridgeError(doc.pathOf(child), 'Tuple keys have no JSON form');
        }
        const name = typeof key === 'string' ? key : String(key);
        if (isExtensionKey(name)) {
          throw new BridgeError(doc.pathOf(child), `Key "${name}" would read back as an extension`);
        }
        if (seen.has(name)) {
          throw new BridgeError(doc.pathOf(child), `Key "${name}" collides with another key`);
        }
        seen.add(name);
        entries.push([name, documentToJson(doc, child)]);
      }
      for (const [name, ext] of node.extensions) {
        entries.push([`${EXTENSION_PREFIX}${name}`, documentToJson(doc, ext)]);
      }
      // Own properties only: a `__proto__` key must not reach the setter.
      return Object.fromEntries(entries);
    }
  }
}

function primitiveToJson(value: PrimitiveValue, path: EurePath): JsonValue {
  switch (value.type) {
    case 'null':
      return null;
    case 'boolean':
    case 'text':
      return value.value;
    case 'integer': {
      const n = Number(value.value);
      if (!Number.isSafeInteger(n)) {
        throw new BridgeError(path, `Integer ${value.value} exceeds the safe JSON range`);
      }
      return n;
    }
    case 'float':
      if (!Number.isFinite(value.value)) {
        throw new BridgeError(path, `${value.value} has no JSON form`);
      }
      return value.value;
  }
}
