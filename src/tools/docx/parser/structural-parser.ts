/**
 * Structural Parser
 * Turns part bytes into a DOM tree and checks the root element against the
 * declared schema kind.
 */

import { NAMESPACES } from '../constants.js';
import { decodeXmlBytes, parseXml } from '../dom.js';
import { DocxError, DocxErrorCode, errorMessage } from '../errors.js';
import type { PackagePart, PartGraph, SchemaKind, StructuralParser } from '../types.js';

/** Expected root element local name per schema kind. */
export const SCHEMA_ROOT_ELEMENTS: Record<SchemaKind, string> = {
  document: 'document',
  styles: 'styles',
  comments: 'comments',
  header: 'hdr',
  footer: 'ftr',
};

export class DomStructuralParser implements StructuralParser {
  parse(bytes: Uint8Array, schemaKind: SchemaKind): Document {
    let doc: Document;
    try {
      doc = parseXml(decodeXmlBytes(bytes));
    } catch (error) {
      throw new DocxError(`Cannot parse ${schemaKind} part: ${errorMessage(error)}`, DocxErrorCode.MALFORMED_PART, {
        schemaKind,
      });
    }

    const expected = SCHEMA_ROOT_ELEMENTS[schemaKind];
    const root = doc ? doc.documentElement : null;
    if (!root || root.localName !== expected || root.namespaceURI !== NAMESPACES.W) {
      const found = root ? `{${root.namespaceURI ?? ''}}${root.localName}` : 'no root element';
      throw new DocxError(
        `Cannot parse ${schemaKind} part: expected root w:${expected}, found ${found}`,
        DocxErrorCode.MALFORMED_PART,
        { schemaKind },
      );
    }
    return doc;
  }
}

export const defaultStructuralParser: StructuralParser = new DomStructuralParser();

/**
 * Read a part through the graph and parse it, returning the root element.
 * Parse failures carry the part name in their message and context.
 */
export function parsePartRoot(
  graph: PartGraph,
  parser: StructuralParser,
  part: PackagePart,
  schemaKind: SchemaKind,
): Element {
  try {
    return parser.parse(graph.bytes(part), schemaKind).documentElement;
  } catch (error) {
    if (error instanceof DocxError && error.code === DocxErrorCode.MALFORMED_PART) {
      throw new DocxError(`${part.partName}: ${error.message}`, error.code, {
        ...error.context,
        partName: part.partName,
      });
    }
    throw error;
  }
}
