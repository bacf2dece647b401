/**
 * OPC package over a PizZip archive.
 *
 * The whole archive is held in memory, so every query is synchronous.
 * Relationship parts are parsed on first use and cached per source part.
 *
 * @module docx/package/opc-package
 */

import PizZip from 'pizzip';
import { DEFAULT_CONTENT_TYPE, DOCX_PATHS, RELATIONSHIP_TYPES } from '../constants.js';
import { decodeXmlBytes } from '../dom.js';
import { DocxError, DocxErrorCode, errorMessage } from '../errors.js';
import type { PackagePart, PartGraph, Relationship } from '../types.js';
import { ContentTypes } from './content-types.js';
import { parseRelationships } from './relationships.js';
import { getRelationshipsPartName, normalizePartName, partNameKey, resolvePartName } from './part-names.js';

const PACKAGE_ROOT_PART: PackagePart = { partName: DOCX_PATHS.PACKAGE_ROOT, contentType: '' };

export class OpcPackage implements PartGraph {
  /** partNameKey → ZIP entry name */
  private readonly entries = new Map<string, string>();
  private readonly relationshipCache = new Map<string, Relationship[]>();

  private constructor(
    private readonly zip: PizZip,
    private readonly contentTypes: ContentTypes,
  ) {
    for (const [name, file] of Object.entries(zip.files)) {
      if (!file.dir) this.entries.set(partNameKey(name), name);
    }
  }

  /**
   * Open a package from raw bytes.
   * @throws DocxError INVALID_PACKAGE when the bytes are not a ZIP or carry no content types
   */
  static fromBytes(bytes: Uint8Array): OpcPackage {
    let zip: PizZip;
    try {
      zip = new PizZip(bytes);
    } catch (error) {
      throw new DocxError(`Not a ZIP package: ${errorMessage(error)}`, DocxErrorCode.INVALID_PACKAGE);
    }

    const contentTypesEntry = zip.file(DOCX_PATHS.CONTENT_TYPES);
    if (!contentTypesEntry) {
      throw new DocxError('Invalid DOCX: missing [Content_Types].xml', DocxErrorCode.INVALID_PACKAGE);
    }
    const contentTypes = ContentTypes.parse(decodeXmlBytes(contentTypesEntry.asUint8Array()));
    return new OpcPackage(zip, contentTypes);
  }

  // ═══════════════════════════════════════════════════════════════════
  // Parts
  // ═══════════════════════════════════════════════════════════════════

  hasPart(partName: string): boolean {
    return this.entries.has(partNameKey(partName));
  }

  getPart(partName: string): PackagePart | null {
    if (!this.hasPart(partName)) return null;
    const normalized = normalizePartName(partName);
    return {
      partName: normalized,
      contentType: this.contentTypes.getContentType(normalized) ?? DEFAULT_CONTENT_TYPE,
    };
  }

  bytes(part: PackagePart): Uint8Array {
    const entryName = this.entries.get(partNameKey(part.partName));
    const entry = entryName ? this.zip.file(entryName) : null;
    if (!entry) {
      throw new DocxError(`Part not found: ${part.partName}`, DocxErrorCode.PART_NOT_FOUND, {
        partName: part.partName,
      });
    }
    return entry.asUint8Array();
  }

  // ═══════════════════════════════════════════════════════════════════
  // Relationships
  // ═══════════════════════════════════════════════════════════════════

  getPackageRelationships(): Relationship[] {
    return this.getRelationships(PACKAGE_ROOT_PART);
  }

  getRelationships(source: PackagePart): Relationship[] {
    const key = source.partName === DOCX_PATHS.PACKAGE_ROOT ? source.partName : partNameKey(source.partName);
    const cached = this.relationshipCache.get(key);
    if (cached) return cached;

    const relsPart = this.getPart(getRelationshipsPartName(source.partName));
    const relationships = relsPart
      ? parseRelationships(decodeXmlBytes(this.bytes(relsPart)), source.partName)
      : [];
    this.relationshipCache.set(key, relationships);
    return relationships;
  }

  getCorePart(): PackagePart {
    const [officeDocument] = this.getPackageRelationships().filter(
      (rel) => rel.type === RELATIONSHIP_TYPES.OFFICE_DOCUMENT,
    );
    if (!officeDocument) {
      throw new DocxError('Invalid DOCX: no officeDocument relationship in _rels/.rels', DocxErrorCode.INVALID_PACKAGE);
    }
    return this.resolveTarget(officeDocument);
  }

  relationshipsByType(source: PackagePart, type: string): Relationship[] {
    return this.getRelationships(source).filter((rel) => rel.type === type);
  }

  relationshipById(source: PackagePart, id: string): Relationship {
    const rel = this.getRelationships(source).find((candidate) => candidate.id === id);
    if (!rel) {
      throw new DocxError(
        `No relationship with id "${id}" on ${source.partName}`,
        DocxErrorCode.UNKNOWN_RELATIONSHIP_ID,
        { sourcePartName: source.partName, id },
      );
    }
    return rel;
  }

  resolveTarget(rel: Relationship): PackagePart {
    if (rel.targetMode === 'External') {
      throw new DocxError(
        `Relationship "${rel.id}" points outside the package: ${rel.target}`,
        DocxErrorCode.EXTERNAL_TARGET,
        { relationshipId: rel.id, target: rel.target },
      );
    }
    const part = rel.target ? this.getPart(resolvePartName(rel.sourcePartName, rel.target)) : null;
    if (!part) {
      throw new DocxError(
        `Target of relationship "${rel.id}" not found in package: ${rel.target || '(empty)'}`,
        DocxErrorCode.PART_NOT_FOUND,
        { relationshipId: rel.id, target: rel.target, sourcePartName: rel.sourcePartName },
      );
    }
    return part;
  }

  resolveTargetUri(rel: Relationship): string {
    const target = rel.target.trim();
    if (!target || /\s/.test(target)) {
      throw new DocxError(
        `Relationship "${rel.id}" has an unusable target: "${rel.target}"`,
        DocxErrorCode.INVALID_RELATIONSHIP_TARGET,
        { relationshipId: rel.id, target: rel.target },
      );
    }
    return rel.targetMode === 'External' ? target : resolvePartName(rel.sourcePartName, target);
  }
}
