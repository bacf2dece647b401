/**
 * Document assembly: resolves the main document part's relationship graph
 * into a `DocxDocument`.
 *
 * Order of work:
 *   1. parse the main part and find <w:body>
 *   2. wrap body paragraphs and tables in source order
 *   3. hyperlink relationships → Hyperlink values
 *   4. the comments relationship → comments indexed by w:id
 *   5. oleObject then package relationships → embedded parts
 *   6. the document itself builds its header/footer policy last
 * Styles are left for `DocxDocument.getStyles()`.
 *
 * @module docx/model/assembler
 */

import { EMBED_RELATIONSHIP_TYPES, MAIN_CONTENT_TYPES, RELATIONSHIP_TYPES } from '../constants.js';
import { findBody, getElementChildren, isWordElement } from '../dom.js';
import { DocxError, DocxErrorCode, errorMessage } from '../errors.js';
import { defaultStructuralParser, parsePartRoot } from '../parser/structural-parser.js';
import type {
  AssemblyDiagnostic,
  AssemblyOptions,
  BodyOwner,
  PackagePart,
  PartGraph,
  Relationship,
  StructuralParser,
} from '../types.js';
import { logger } from '../../../utils/logger.js';
import { Comment } from './comment.js';
import { DocxDocument, type BodyElement } from './document.js';
import { Hyperlink } from './hyperlink.js';
import { DocumentLookup } from './lookup.js';
import { Paragraph } from './paragraph.js';
import { Table } from './table.js';

interface AssemblyContext {
  graph: PartGraph;
  parser: StructuralParser;
  corePart: PackagePart;
  lookup: DocumentLookup;
  diagnostics: AssemblyDiagnostic[];
  options: AssemblyOptions;
}

/**
 * Assemble the document model of a package.
 *
 * @throws DocxError on structural failures; per-item failures become
 *   diagnostics unless the matching strict option is set
 */
export function assembleDocument(graph: PartGraph, options: AssemblyOptions = {}): DocxDocument {
  const parser = options.parser ?? defaultStructuralParser;
  const corePart = graph.getCorePart();

  if (!MAIN_CONTENT_TYPES.includes(corePart.contentType)) {
    throw new DocxError(
      `Main part ${corePart.partName} has unsupported content type "${corePart.contentType}"`,
      DocxErrorCode.UNSUPPORTED_CONTENT_TYPE,
      { partName: corePart.partName, contentType: corePart.contentType },
    );
  }

  const root = parseRootPart(graph, parser, corePart);
  const body = findBody(root.ownerDocument);
  if (!body) {
    throw new DocxError(`${corePart.partName}: missing <w:body>`, DocxErrorCode.MALFORMED_ROOT_PART, {
      partName: corePart.partName,
    });
  }

  const ctx: AssemblyContext = {
    graph,
    parser,
    corePart,
    lookup: new DocumentLookup(),
    diagnostics: [],
    options,
  };

  const bodyElements = wrapBodyElements(body, ctx.lookup);
  collectHyperlinks(ctx);
  collectComments(ctx);
  const embeds = collectEmbeds(ctx);

  logger.debug(
    `Assembled ${corePart.partName}: ${bodyElements.length} body elements, ` +
      `${ctx.lookup.getHyperlinks().length} hyperlinks, ${ctx.lookup.getComments().length} comments, ` +
      `${embeds.length} embeds, ${ctx.diagnostics.length} diagnostics`,
  );

  return new DocxDocument({
    graph,
    parser,
    corePart,
    document: root.ownerDocument,
    body,
    bodyElements,
    lookup: ctx.lookup,
    embeds,
    diagnostics: ctx.diagnostics,
  });
}

function parseRootPart(graph: PartGraph, parser: StructuralParser, corePart: PackagePart): Element {
  try {
    return parsePartRoot(graph, parser, corePart, 'document');
  } catch (error) {
    if (error instanceof DocxError && error.code === DocxErrorCode.MALFORMED_PART) {
      throw new DocxError(error.message, DocxErrorCode.MALFORMED_ROOT_PART, error.context);
    }
    throw error;
  }
}

function wrapBodyElements(body: Element, owner: BodyOwner): BodyElement[] {
  const elements: BodyElement[] = [];
  for (const child of getElementChildren(body)) {
    if (isWordElement(child, 'p')) {
      elements.push(new Paragraph(child, owner));
    } else if (isWordElement(child, 'tbl')) {
      elements.push(new Table(child, owner));
    }
  }
  return elements;
}

/**
 * Record a per-item failure, or throw it when the caller asked for strictness.
 */
function reportItemFailure(ctx: AssemblyContext, rel: Relationship, error: unknown, strict: boolean | undefined): void {
  const message = errorMessage(error);
  if (strict) {
    throw new DocxError(
      `Cannot resolve relationship "${rel.id}": ${message}`,
      DocxErrorCode.PER_ITEM_RESOLUTION_FAILURE,
      { relationshipId: rel.id, relationshipType: rel.type },
    );
  }
  logger.warning(`Cannot resolve relationship "${rel.id}" (${rel.type}): ${message}`);
  ctx.diagnostics.push({
    code: DocxErrorCode.PER_ITEM_RESOLUTION_FAILURE,
    relationshipId: rel.id,
    relationshipType: rel.type,
    message,
  });
}

function collectHyperlinks(ctx: AssemblyContext): void {
  for (const rel of ctx.graph.relationshipsByType(ctx.corePart, RELATIONSHIP_TYPES.HYPERLINK)) {
    let url = '';
    try {
      url = ctx.graph.resolveTargetUri(rel);
    } catch (error) {
      reportItemFailure(ctx, rel, error, ctx.options.strictHyperlinks);
    }
    ctx.lookup.addHyperlink(new Hyperlink(rel.id, url));
  }
}

function collectComments(ctx: AssemblyContext): void {
  const rels = ctx.graph.relationshipsByType(ctx.corePart, RELATIONSHIP_TYPES.COMMENTS);
  if (rels.length === 0) return;

  if (rels.length > 1) {
    const ids = rels.map((rel) => rel.id);
    if (ctx.options.strictComments) {
      throw new DocxError(
        `Expecting at most one comments part, but found ${rels.length}`,
        DocxErrorCode.MULTIPLE_COMMENTS_PARTS,
        { relationshipIds: ids },
      );
    }
    logger.warning(`Found ${rels.length} comments relationships (${ids.join(', ')}); using "${rels[0].id}"`);
  }

  const part = ctx.graph.resolveTarget(rels[0]);
  const root = parsePartRoot(ctx.graph, ctx.parser, part, 'comments');

  for (const node of getElementChildren(root).filter((child) => isWordElement(child, 'comment'))) {
    const comment = new Comment(node);
    if (ctx.lookup.addComment(comment)) continue;

    if (ctx.options.strictComments) {
      throw new DocxError(`Duplicate comment id "${comment.id}" in ${part.partName}`, DocxErrorCode.DUPLICATE_COMMENT_ID, {
        partName: part.partName,
        commentId: comment.id,
      });
    }
    logger.warning(`Duplicate comment id "${comment.id}" in ${part.partName}; keeping the first`);
    ctx.diagnostics.push({
      code: DocxErrorCode.DUPLICATE_COMMENT_ID,
      relationshipId: rels[0].id,
      relationshipType: rels[0].type,
      message: `Duplicate comment id "${comment.id}"`,
    });
  }
}

function collectEmbeds(ctx: AssemblyContext): PackagePart[] {
  const embeds: PackagePart[] = [];
  for (const type of EMBED_RELATIONSHIP_TYPES) {
    for (const rel of ctx.graph.relationshipsByType(ctx.corePart, type)) {
      try {
        embeds.push(ctx.graph.resolveTarget(rel));
      } catch (error) {
        reportItemFailure(ctx, rel, error, ctx.options.strictEmbeds);
      }
    }
  }
  return embeds;
}
