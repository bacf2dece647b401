/**
 * OPC part name utilities
 *
 * Pure functions over part names ("/word/document.xml") and relationship
 * targets. Part names compare case-insensitively.
 *
 * @module docx/package/part-names
 */

import path from 'path';
import { DOCX_PATHS } from '../constants.js';

/** Normalise to an absolute, slash-separated part name. */
export function normalizePartName(name: string): string {
  const withSlash = name.startsWith('/') ? name : `/${name}`;
  return path.posix.normalize(withSlash);
}

/** Case-insensitive key for part name lookups. */
export function partNameKey(partName: string): string {
  return normalizePartName(partName).toLowerCase();
}

/** ZIP entry path for a part name (no leading slash). */
export function toZipPath(partName: string): string {
  return normalizePartName(partName).slice(1);
}

/**
 * Part name of the relationships part that belongs to `sourcePartName`.
 * "/word/document.xml" → "/word/_rels/document.xml.rels", "/" → "/_rels/.rels".
 */
export function getRelationshipsPartName(sourcePartName: string): string {
  if (sourcePartName === DOCX_PATHS.PACKAGE_ROOT) return DOCX_PATHS.ROOT_RELS;
  const normalized = normalizePartName(sourcePartName);
  return path.posix.join(path.posix.dirname(normalized), '_rels', `${path.posix.basename(normalized)}.rels`);
}

/**
 * Resolve an internal relationship target against its source part.
 * Absolute targets are taken as they are; a fragment is dropped.
 */
export function resolvePartName(sourcePartName: string, target: string): string {
  const [withoutFragment] = target.split('#');
  if (withoutFragment.startsWith('/')) return normalizePartName(withoutFragment);
  const baseDir = sourcePartName === DOCX_PATHS.PACKAGE_ROOT
    ? DOCX_PATHS.PACKAGE_ROOT
    : path.posix.dirname(normalizePartName(sourcePartName));
  return normalizePartName(path.posix.join(baseDir, withoutFragment));
}

/** Lower-case extension without the dot, or "" when the name has none. */
export function getExtension(partName: string): string {
  return path.posix.extname(partName).slice(1).toLowerCase();
}
