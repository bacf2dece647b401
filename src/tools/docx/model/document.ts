/**
 * The assembled WordprocessingML document.
 *
 * Everything except the styles part is resolved by `assembleDocument` before
 * this object exists; the header/footer policy is built as the last step of
 * construction because it reads the finished model.
 *
 * @module docx/model/document
 */

import { RELATIONSHIP_TYPES } from '../constants.js';
import { DocxError, DocxErrorCode, errorMessage } from '../errors.js';
import { parsePartRoot } from '../parser/structural-parser.js';
import type { AssemblyDiagnostic, PackagePart, PartGraph, SchemaKind, StructuralParser } from '../types.js';
import type { Comment } from './comment.js';
import { HeaderFooterPolicy, type HeaderFooterSource } from './header-footer-policy.js';
import { logger } from '../../../utils/logger.js';
import { Hyperlink } from './hyperlink.js';
import { type DocumentLookup, PartLookup } from './lookup.js';
import { Paragraph } from './paragraph.js';
import { DocxStyles } from './styles.js';
import { Table } from './table.js';

export type BodyElement = Paragraph | Table;

export interface DocxDocumentInit {
  graph: PartGraph;
  parser: StructuralParser;
  corePart: PackagePart;
  document: Document;
  body: Element;
  bodyElements: BodyElement[];
  lookup: DocumentLookup;
  embeds: PackagePart[];
  diagnostics: AssemblyDiagnostic[];
}

/** Memo slot for the lazily parsed styles part. */
type StylesSlot =
  | { state: 'idle' }
  | { state: 'resolving' }
  | { state: 'resolved'; styles: DocxStyles };

export class DocxDocument implements HeaderFooterSource {
  private readonly graph: PartGraph;
  private readonly parser: StructuralParser;
  private readonly corePart: PackagePart;
  private readonly document: Document;
  private readonly body: Element;
  private readonly bodyElements: readonly BodyElement[];
  private readonly lookup: DocumentLookup;
  private readonly embeds: readonly PackagePart[];
  private readonly diagnostics: readonly AssemblyDiagnostic[];
  private stylesSlot: StylesSlot = { state: 'idle' };

  /** Handles the different headers/footers for first, even and other pages. */
  readonly headerFooterPolicy: HeaderFooterPolicy;

  constructor(init: DocxDocumentInit) {
    this.graph = init.graph;
    this.parser = init.parser;
    this.corePart = init.corePart;
    this.document = init.document;
    this.body = init.body;
    this.bodyElements = Object.freeze([...init.bodyElements]);
    this.lookup = init.lookup;
    this.embeds = Object.freeze([...init.embeds]);
    this.diagnostics = Object.freeze([...init.diagnostics]);
    this.headerFooterPolicy = new HeaderFooterPolicy(this);
  }

  getCorePart(): PackagePart {
    return this.corePart;
  }

  /** The parsed main document part. */
  getDocument(): Document {
    return this.document;
  }

  getDocumentBody(): Element {
    return this.body;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Body
  // ═══════════════════════════════════════════════════════════════════

  /** Paragraphs and tables in source order. */
  getBodyElements(): readonly BodyElement[] {
    return this.bodyElements;
  }

  getParagraphs(): Paragraph[] {
    return this.bodyElements.filter((el): el is Paragraph => el instanceof Paragraph);
  }

  getTables(): Table[] {
    return this.bodyElements.filter((el): el is Table => el instanceof Table);
  }

  // ═══════════════════════════════════════════════════════════════════
  // Lookups
  // ═══════════════════════════════════════════════════════════════════

  getHyperlinks(): Hyperlink[] {
    return this.lookup.getHyperlinks();
  }

  findHyperlink(id: string): Hyperlink | undefined {
    return this.lookup.findHyperlink(id);
  }

  /** Comments in the order of the comments part. */
  getComments(): Comment[] {
    return this.lookup.getComments();
  }

  getCommentMap(): ReadonlyMap<string, Comment> {
    return this.lookup.getCommentMap();
  }

  findComment(id: string): Comment | undefined {
    return this.lookup.findComment(id);
  }

  /**
   * Part targeted by a relationship of the main document part.
   * @throws DocxError UNKNOWN_RELATIONSHIP_ID, EXTERNAL_TARGET or PART_NOT_FOUND
   */
  getPartById(id: string): PackagePart {
    return this.graph.resolveTarget(this.graph.relationshipById(this.corePart, id));
  }

  /** Embedded objects: oleObject targets first, then package targets. */
  getAllEmbeds(): readonly PackagePart[] {
    return this.embeds;
  }

  /** Per-item failures recorded while assembling. */
  getDiagnostics(): readonly AssemblyDiagnostic[] {
    return this.diagnostics;
  }

  getHeaderFooterPolicy(): HeaderFooterPolicy {
    return this.headerFooterPolicy;
  }

  parsePart(part: PackagePart, schemaKind: SchemaKind): Element {
    return parsePartRoot(this.graph, this.parser, part, schemaKind);
  }

  /**
   * Lookup for the body of a non-main part, such as a header, whose r:id
   * references resolve against that part's own relationships.
   */
  getPartLookup(part: PackagePart): PartLookup {
    const lookup = new PartLookup(this.lookup);
    for (const rel of this.graph.relationshipsByType(part, RELATIONSHIP_TYPES.HYPERLINK)) {
      let url = '';
      try {
        url = this.graph.resolveTargetUri(rel);
      } catch (error) {
        logger.warning(`Cannot resolve relationship "${rel.id}" of ${part.partName}: ${errorMessage(error)}`);
      }
      lookup.addHyperlink(new Hyperlink(rel.id, url));
    }
    return lookup;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Styles
  // ═══════════════════════════════════════════════════════════════════

  /**
   * The styles part, parsed on first call and memoised.
   *
   * @throws DocxError CARDINALITY_VIOLATION unless exactly one styles relationship exists
   */
  getStyles(): DocxStyles {
    switch (this.stylesSlot.state) {
      case 'resolved':
        return this.stylesSlot.styles;
      case 'resolving':
        throw new DocxError('Styles requested while they are being resolved', DocxErrorCode.STYLES_RESOLUTION_REENTRY);
      case 'idle':
        break;
    }

    this.stylesSlot = { state: 'resolving' };
    try {
      const styles = this.resolveStyles();
      this.stylesSlot = { state: 'resolved', styles };
      return styles;
    } catch (error) {
      this.stylesSlot = { state: 'idle' };
      throw error;
    }
  }

  private resolveStyles(): DocxStyles {
    const rels = this.graph.relationshipsByType(this.corePart, RELATIONSHIP_TYPES.STYLES);
    if (rels.length !== 1) {
      throw new DocxError(
        `Expecting one styles part, but found ${rels.length}`,
        DocxErrorCode.CARDINALITY_VIOLATION,
        { relationshipType: RELATIONSHIP_TYPES.STYLES, found: rels.length },
      );
    }
    const part = this.graph.resolveTarget(rels[0]);
    return new DocxStyles(this.parsePart(part, 'styles'), part.partName);
  }
}
