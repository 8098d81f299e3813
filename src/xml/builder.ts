import { create } from 'xmlbuilder2';
import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces.js';
import type { Document } from '../document/document.js';
import { formatKey } from '../document/key.js';
import type { NodeId } from '../document/node.js';
import type { PrimitiveValue } from '../document/value.js';
import { BridgeError } from '../validation/errors.js';

export interface XmlWriteOptions {
  /**
   * Name of the element that wraps the document root.
   * @default 'document'
   */
  rootElement?: string;
  /**
   * Indent nested elements, one per line.
   * @default false
   */
  prettyPrint?: boolean;
  /**
   * Emit the `<?xml ...?>` prolog before the root element.
   * @default true
   */
  xmlDeclaration?: boolean;
  /**
   * Encoding named in the prolog.
   * @default 'UTF-8'
   */
  encoding?: string;
}

const XML_NAME_RE = /^[A-Za-z_][\w.-]*$/;

function primitiveText(value: PrimitiveValue): string {
  switch (value.type) {
    case 'null':
      return '';
    case 'integer':
      return value.value.toString();
    default:
      return String(value.value);
  }
}

/**
 * Serializes a document to XML.
 *
 * - Map entries become child elements named after their keys.
 * - Array values become repeated elements with the same name.
 * - Primitive extensions become attributes (`$unit` → `unit="..."`).
 * - Primitives become text content.
 *
 * Throws {@link BridgeError} for holes, tuples, nested arrays, non-primitive
 * extensions and keys that are not XML names.
 */
export function documentToXml(doc: Document, options: XmlWriteOptions = {}): string {
  const { rootElement = 'document', prettyPrint = false, xmlDeclaration = true, encoding = 'UTF-8' } = options;

  if (!XML_NAME_RE.test(rootElement)) {
    throw new BridgeError([], `"${rootElement}" is not an XML element name`);
  }

  // headless drops the prolog create() would otherwise print.
  const xml = create(xmlDeclaration ? { version: '1.0', encoding } : {});
  buildElement(xml.ele(rootElement), doc, doc.root);
  return xml.end({ prettyPrint, headless: !xmlDeclaration });
}

function buildElement(element: XMLBuilder, doc: Document, id: NodeId): void {
  const node = doc.node(id);

  for (const [name, extId] of node.extensions) {
    const ext = doc.node(extId).content;
    if (ext.kind !== 'primitive') {
      throw new BridgeError(doc.pathOf(extId), 'Only primitive extensions map to XML attributes');
    }
    element.att(name, primitiveText(ext.value));
  }

  const { content } = node;
  switch (content.kind) {
    case 'primitive':
      if (content.value.type !== 'null') element.txt(primitiveText(content.value));
      return;
    case 'map':
      for (const { key, id: childId } of content.map.entries()) {
        if (typeof key !== 'string' || !XML_NAME_RE.test(key)) {
          throw new BridgeError(doc.pathOf(childId), `Key ${formatKey(key)} is not an XML element name`);
        }
        const child = doc.node(childId).content;
        if (child.kind === 'array') {
          // Multiple occurrences
          for (const item of child.items) {
            if (doc.node(item).content.kind === 'array') {
              throw new BridgeError(doc.pathOf(item), 'Nested arrays have no XML form');
            }
            buildElement(element.ele(key), doc, item);
          }
        } else {
          buildElement(element.ele(key), doc, childId);
        }
      }
      return;
    case 'array':
      throw new BridgeError(doc.pathOf(id), 'An array needs a named parent element');
    case 'tuple':
      throw new BridgeError(doc.pathOf(id), 'Tuples have no XML form');
    case 'hole':
      throw new BridgeError(doc.pathOf(id), 'Holes have no XML form');
  }
}
