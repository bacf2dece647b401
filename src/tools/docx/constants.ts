/**
 * DOCX constants: format identifiers matched bit-for-bit against package
 * metadata.
 */

// ═══════════════════════════════════════════════════════════════════════
// XML namespaces
// ═══════════════════════════════════════════════════════════════════════

export const NAMESPACES = {
    W: 'http://schemas.openxmlformats.org/wordprocessingml/2006/main',
    R: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
    RELS: 'http://schemas.openxmlformats.org/package/2006/relationships',
    CONTENT_TYPES: 'http://schemas.openxmlformats.org/package/2006/content-types',
} as const;

// ═══════════════════════════════════════════════════════════════════════
// Relationship types
// ═══════════════════════════════════════════════════════════════════════

export const RELATIONSHIP_TYPES = {
    OFFICE_DOCUMENT: `${NAMESPACES.R}/officeDocument`,
    HEADER: `${NAMESPACES.R}/header`,
    FOOTER: `${NAMESPACES.R}/footer`,
    STYLES: `${NAMESPACES.R}/styles`,
    HYPERLINK: `${NAMESPACES.R}/hyperlink`,
    COMMENTS: `${NAMESPACES.R}/comments`,
    OLE_OBJECT: `${NAMESPACES.R}/oleObject`,
    PACKAGE: `${NAMESPACES.R}/package`,
} as const;

/** Embedding relationship types, in the order their targets are concatenated. */
export const EMBED_RELATIONSHIP_TYPES = [
    RELATIONSHIP_TYPES.OLE_OBJECT,
    RELATIONSHIP_TYPES.PACKAGE,
] as const;

// ═══════════════════════════════════════════════════════════════════════
// Content types
// ═══════════════════════════════════════════════════════════════════════

export const CONTENT_TYPES = {
    MAIN: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml',
    MACRO_ENABLED_MAIN: 'application/vnd.ms-word.document.macroEnabled.main+xml',
    TEMPLATE_MAIN: 'application/vnd.openxmlformats-officedocument.wordprocessingml.template.main+xml',
    MACRO_ENABLED_TEMPLATE_MAIN: 'application/vnd.ms-word.template.macroEnabledTemplate.main+xml',
    HEADER: 'application/vnd.openxmlformats-officedocument.wordprocessingml.header+xml',
    FOOTER: 'application/vnd.openxmlformats-officedocument.wordprocessingml.footer+xml',
    STYLES: 'application/vnd.openxmlformats-officedocument.wordprocessingml.styles+xml',
    COMMENTS: 'application/vnd.openxmlformats-officedocument.wordprocessingml.comments+xml',
    RELATIONSHIPS: 'application/vnd.openxmlformats-package.relationships+xml',
} as const;

/** Content types accepted for the root (main document) part. */
export const MAIN_CONTENT_TYPES: readonly string[] = [
    CONTENT_TYPES.MAIN,
    CONTENT_TYPES.MACRO_ENABLED_MAIN,
    CONTENT_TYPES.TEMPLATE_MAIN,
    CONTENT_TYPES.MACRO_ENABLED_TEMPLATE_MAIN,
];

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

// ═══════════════════════════════════════════════════════════════════════
// Package paths
// ═══════════════════════════════════════════════════════════════════════

export const DOCX_PATHS = {
    CONTENT_TYPES: '[Content_Types].xml',
    PACKAGE_ROOT: '/',
    ROOT_RELS: '/_rels/.rels',
} as const;
