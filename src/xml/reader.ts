import { XMLParser } from 'fast-xml-parser';
import { DocumentBuilder } from '../document/document.js';
import type { Document } from '../document/document.js';
import type { NodeId } from '../document/node.js';
import { prim } from '../document/value.js';
import type { PrimitiveValue } from '../document/value.js';
import { BridgeError } from '../validation/errors.js';

const ATTRIBUTE_PREFIX = '@_';
const TEXT_KEY = '#text';
const TYPE_ATTRIBUTE = `${ATTRIBUTE_PREFIX}type`;
const INTEGER_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

type RawNode = Record<string, unknown>;

function isRawNode(value: unknown): value is RawNode {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Normalises the XML encoding declaration to UTF-8.
 *
 * The input is already a decoded JS string, so any other declared encoding is
 * misleading and makes `fast-xml-parser` reject the document.
 */
function normalizeXmlEncodingDeclaration(content: string): string {
  return content.replace(/(<\?xml\b[^?]*?)\s+encoding=["'][^"']*["']/i, '$1 encoding="UTF-8"');
}

export interface XmlReadOptions {
  /**
   * Element names that always read as arrays, even when they occur once.
   * @default []
   */
  arrayElements?: readonly string[];
}

function makeParser(arrayElements: readonly string[]): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_KEY,
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseTagValue: false,
    parseAttributeValue: false,
    allowBooleanAttributes: true,
    trimValues: true,
    isArray: (name, _jpath, _isLeafNode, isAttribute) => !isAttribute && arrayElements.includes(name),
  });
}

/**
 * Reads XML text into a document. The single top-level element is the root;
 * its name is not part of the document.
 *
 * - Child elements become map entries; repeated elements, and those listed
 *   in `arrayElements`, become arrays.
 * - Attributes become extensions on the element's node.
 * - Text content becomes plaintext, unless the element's `type` attribute
 *   names `integer`, `float`, `boolean` or `null` (a leading `.` is allowed)
 *   and the text parses as one; `<port type="integer">8080</port>` reads as
 *   the integer 8080. Untyped text is never coerced.
 *
 * Throws {@link BridgeError} for mixed content and documents with several
 * top-level elements. Malformed XML is reported by the parser's own error.
 */
export function documentFromXml(text: string, options: XmlReadOptions = {}): Document {
  const { arrayElements = [] } = options;
  const parsed: unknown = makeParser(arrayElements).parse(normalizeXmlEncodingDeclaration(text), true);
  if (!isRawNode(parsed)) throw new BridgeError([], 'XML has no root element');
  const roots = Object.entries(parsed);
  if (roots.length !== 1) {
    throw new BridgeError([], `Expected one root element, found ${roots.length}`);
  }
  const builder = new DocumentBuilder();
  fill(builder, builder.root, roots[0][1]);
  return builder.finish();
}

function fill(builder: DocumentBuilder, id: NodeId, raw: unknown): void {
  if (typeof raw === 'string') {
    builder.bindPrimitive(id, prim.text(raw));
    return;
  }
  if (typeof raw === 'boolean') {
    builder.bindPrimitive(id, prim.bool(raw));
    return;
  }
  if (Array.isArray(raw)) {
    builder.bindArray(id);
    for (const item of raw) fill(builder, builder.addArrayElement(id), item);
    return;
  }
  if (!isRawNode(raw)) {
    throw new BridgeError(builder.pathOf(id), `Unexpected parser output: ${String(raw)}`);
  }

  const entries = Object.entries(raw);
  const children = entries.filter(([key]) => !key.startsWith(ATTRIBUTE_PREFIX) && key !== TEXT_KEY);
  const textContent = raw[TEXT_KEY];

  if (textContent !== undefined) {
    if (children.length > 0) {
      throw new BridgeError(builder.pathOf(id), 'Mixed content has no document form');
    }
    builder.bindPrimitive(id, typedLeaf(String(textContent), raw[TYPE_ATTRIBUTE]));
  } else if (children.length === 0 && declaredType(raw[TYPE_ATTRIBUTE]) === 'null') {
    builder.bindPrimitive(id, prim.null());
  } else {
    builder.bindMap(id);
    for (const [key, value] of children) fill(builder, builder.addMapChild(id, key), value);
  }

  for (const [key, value] of entries) {
    if (!key.startsWith(ATTRIBUTE_PREFIX)) continue;
    fill(builder, builder.addExtension(id, key.slice(ATTRIBUTE_PREFIX.length)), value);
  }
}

/** Leaf text read as the primitive its `type` attribute names, when it parses as one. */
function typedLeaf(text: string, declared: unknown): PrimitiveValue {
  switch (declaredType(declared)) {
    case 'integer':
      if (INTEGER_RE.test(text)) return prim.int(BigInt(text));
      break;
    case 'float':
      if (FLOAT_RE.test(text)) return prim.float(Number(text));
      break;
    case 'boolean':
      if (text === 'true' || text === 'false') return prim.bool(text === 'true');
      break;
    case 'null':
      if (text === '') return prim.null();
      break;
  }
  return prim.text(text);
}

function declaredType(declared: unknown): string | undefined {
  return typeof declared === 'string' ? declared.replace(/^\./, '') : undefined;
}
