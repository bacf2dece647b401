/**
 * Type definitions for the DOCX document model.
 * Single source of truth for the seams between package, parser and model.
 */

import type { DocxErrorCode } from './errors.js';
import type { Comment } from './model/comment.js';
import type { Hyperlink } from './model/hyperlink.js';

// ═══════════════════════════════════════════════════════════════════════
// Package graph
// ═══════════════════════════════════════════════════════════════════════

export type TargetMode = 'Internal' | 'External';

/** A typed, identified edge from a source part (or the package root) to a target. */
export interface Relationship {
    id: string;
    type: string;
    /** Raw Target attribute, unresolved. */
    target: string;
    targetMode: TargetMode;
    /** Part name of the source, "/" for package-level relationships. */
    sourcePartName: string;
}

export interface PackagePart {
    /** Absolute OPC part name, e.g. "/word/document.xml". */
    partName: string;
    contentType: string;
}

/**
 * Read access to the parts of a package and the relationships between them.
 * Every query answers in relationship declaration order.
 */
export interface PartGraph {
    /** The target of the package-level officeDocument relationship. */
    getCorePart(): PackagePart;
    relationshipsByType(source: PackagePart, type: string): Relationship[];
    /** @throws DocxError UNKNOWN_RELATIONSHIP_ID */
    relationshipById(source: PackagePart, id: string): Relationship;
    /** @throws DocxError EXTERNAL_TARGET or PART_NOT_FOUND */
    resolveTarget(rel: Relationship): PackagePart;
    /** Absolute target URI: the external URI, or the resolved part name. */
    resolveTargetUri(rel: Relationship): string;
    bytes(part: PackagePart): Uint8Array;
}

// ═══════════════════════════════════════════════════════════════════════
// Structural parsing
// ═══════════════════════════════════════════════════════════════════════

export type SchemaKind = 'document' | 'styles' | 'comments' | 'header' | 'footer';

export interface StructuralParser {
    /** @throws DocxError MALFORMED_PART */
    parse(bytes: Uint8Array, schemaKind: SchemaKind): Document;
}

// ═══════════════════════════════════════════════════════════════════════
// Assembly
// ═══════════════════════════════════════════════════════════════════════

export interface AssemblyOptions {
    /** Throw MULTIPLE_COMMENTS_PARTS / DUPLICATE_COMMENT_ID instead of taking the first. */
    strictComments?: boolean;
    /** Throw on a hyperlink whose target cannot be resolved. */
    strictHyperlinks?: boolean;
    /** Throw on an embedded object whose part cannot be resolved. */
    strictEmbeds?: boolean;
    parser?: StructuralParser;
}

export interface AssemblyDiagnostic {
    code: DocxErrorCode;
    relationshipId: string;
    relationshipType: string;
    message: string;
}

/** Id lookups a body element needs from the document that owns it. */
export interface BodyOwner {
    findHyperlink(id: string): Hyperlink | undefined;
    findComment(id: string): Comment | undefined;
}

// ═══════════════════════════════════════════════════════════════════════
// Outline (used by the inspect command and read_docx_model tool)
// ═══════════════════════════════════════════════════════════════════════

export interface BlockOutline {
    bodyIndex: number;
    type: 'paragraph' | 'table';
    style: string | null;
    text: string;
}

export interface HeaderFooterOutline {
    kind: 'header' | 'footer';
    type: string;
    relationshipId: string;
    partName: string;
    text: string;
}

export interface DocumentOutline {
    corePart: string;
    blocks: BlockOutline[];
    hyperlinks: Array<{ id: string; url: string }>;
    comments: Array<{ id: string; author: string | null; text: string }>;
    embeds: PackagePart[];
    styles: { count: number } | { error: string };
    headersFooters: HeaderFooterOutline[];
    diagnostics: AssemblyDiagnostic[];
}
