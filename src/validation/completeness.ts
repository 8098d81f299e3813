import type { Document } from '../document/document.js';
import type { NodeId } from '../document/node.js';
import type { HoleBinding } from './context.js';
import type { ValidationError } from './diagnostics.js';

/**
 * Sweeps the document for holes the structural pass bound to a schema and
 * reports each non-optional one as `missing-field`. Runs over the document,
 * not the schema, so every hole is visited once in document order.
 */
export function checkCompleteness(
  doc: Document,
  holes: ReadonlyMap<NodeId, HoleBinding>,
): ValidationError[] {
  const errors: ValidationError[] = [];
  const visit = (id: NodeId): void => {
    const { content } = doc.node(id);
    switch (content.kind) {
      case 'hole': {
        const binding = holes.get(id);
        if (binding !== undefined && !binding.optional) {
          errors.push({
            kind: 'missing-field',
            path: doc.pathOf(id),
            title:
              content.label === undefined
                ? 'Required value is a hole.'
                : `Required value is the unfilled hole !${content.label}.`,
            nodeId: id,
            schemaNodeId: binding.schemaNodeId,
            pass: 'completeness',
          });
        }
        return;
      }
      case 'primitive':
        return;
      case 'map':
        for (const entry of content.map.entries()) visit(entry.id);
        return;
      case 'array':
      case 'tuple':
        content.items.forEach(visit);
        return;
    }
  };
  visit(doc.root);
  return errors;
}
