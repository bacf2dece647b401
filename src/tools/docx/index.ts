/**
 * DOCX Document Model: public API
 *
 * Re-exports only the symbols that external consumers need.
 *
 * @module docx
 */

// ── Reading ─────────────────────────────────────────────────────────────────
export { openDocx, describeDocument, formatOutline } from './read.js';
export { assembleDocument } from './model/assembler.js';

// ── Package / parser ────────────────────────────────────────────────────────
export { OpcPackage } from './package/opc-package.js';
export { DomStructuralParser, defaultStructuralParser } from './parser/structural-parser.js';

// ── Model ───────────────────────────────────────────────────────────────────
export { DocxDocument, type BodyElement } from './model/document.js';
export { Paragraph } from './model/paragraph.js';
export { Table } from './model/table.js';
export { Hyperlink } from './model/hyperlink.js';
export { Comment } from './model/comment.js';
export { DocxStyles } from './model/styles.js';
export { HeaderFooter, type HeaderFooterKind, type HeaderFooterType } from './model/header-footer.js';
export { HeaderFooterPolicy } from './model/header-footer-policy.js';

// ── Constants ───────────────────────────────────────────────────────────────
export { CONTENT_TYPES, RELATIONSHIP_TYPES } from './constants.js';

// ── Types ───────────────────────────────────────────────────────────────────
export type {
  AssemblyDiagnostic,
  AssemblyOptions,
  BodyOwner,
  DocumentOutline,
  PackagePart,
  PartGraph,
  Relationship,
  SchemaKind,
  StructuralParser,
} from './types.js';

// ── Errors ──────────────────────────────────────────────────────────────────
export { DocxError, DocxErrorCode, isDocxError } from './errors.js';
