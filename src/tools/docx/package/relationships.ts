/**
 * DOCX relationship parsing: turn a .rels part into
 * ordered relationship records.
 */

import { nodeListToArray, parseXml } from '../dom.js';
import { DocxError, DocxErrorCode, errorMessage } from '../errors.js';
import type { Relationship } from '../types.js';

/**
 * Parse a relationships part. Records keep declaration order.
 *
 * A missing Target is kept as "" so that resolving it fails per item;
 * a missing Id or Type, or a repeated Id, makes the package invalid.
 */
export function parseRelationships(relsXml: string, sourcePartName: string): Relationship[] {
    let relsDom: Document;
    try {
        relsDom = parseXml(relsXml);
    } catch (error) {
        throw new DocxError(
            `Invalid relationships part for ${sourcePartName}: ${errorMessage(error)}`,
            DocxErrorCode.INVALID_PACKAGE,
            { sourcePartName },
        );
    }

    const seen = new Set<string>();
    const relationships: Relationship[] = [];

    for (const rel of nodeListToArray(relsDom.getElementsByTagName('Relationship'))) {
        const id = rel.getAttribute('Id');
        const type = rel.getAttribute('Type');
        if (!id || !type) {
            throw new DocxError(
                `Relationship without Id or Type in ${sourcePartName}`,
                DocxErrorCode.INVALID_PACKAGE,
                { sourcePartName, id, type },
            );
        }
        if (seen.has(id)) {
            throw new DocxError(
                `Duplicate relationship id "${id}" in ${sourcePartName}`,
                DocxErrorCode.INVALID_PACKAGE,
                { sourcePartName, id },
            );
        }
        seen.add(id);

        relationships.push({
            id,
            type,
            target: rel.getAttribute('Target') ?? '',
            targetMode: rel.getAttribute('TargetMode') === 'External' ? 'External' : 'Internal',
            sourcePartName,
        });
    }

    return relationships;
}
