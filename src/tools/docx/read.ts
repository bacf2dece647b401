/**
 * DOCX reading utilities
 * Opens DOCX files from disk and builds compact outlines of the assembled model.
 */

import fs from 'fs/promises';
import { DocxErrorCode, errorMessage, withErrorContext } from './errors.js';
import { assembleDocument } from './model/assembler.js';
import type { DocxDocument } from './model/document.js';
import { OpcPackage } from './package/opc-package.js';
import type { AssemblyOptions, DocumentOutline, HeaderFooterOutline } from './types.js';

/**
 * Read a .docx file and assemble its document model.
 */
export async function openDocx(filePath: string, options: AssemblyOptions = {}): Promise<DocxDocument> {
    const bytes = await withErrorContext(
        async () => new Uint8Array(await fs.readFile(filePath)),
        DocxErrorCode.DOCX_READ_FAILED,
        { path: filePath },
    );
    return assembleDocument(OpcPackage.fromBytes(bytes), options);
}

function describeStyles(document: DocxDocument): DocumentOutline['styles'] {
    try {
        return { count: document.getStyles().getStyleIds().length };
    } catch (error) {
        return { error: errorMessage(error) };
    }
}

/**
 * Return a token-efficient outline of an assembled document.
 * A styles cardinality failure is reported in the outline instead of thrown.
 */
export function describeDocument(document: DocxDocument): DocumentOutline {
    const headersFooters: HeaderFooterOutline[] = document
        .getHeaderFooterPolicy()
        .getAll()
        .map((hf) => ({
            kind: hf.kind,
            type: hf.type,
            relationshipId: hf.relationshipId,
            partName: hf.partName,
            text: hf.getText(),
        }));

    return {
        corePart: document.getCorePart().partName,
        blocks: document.getBodyElements().map((el, bodyIndex) => ({
            bodyIndex,
            type: el.kind,
            style: el.getStyleId(),
            text: el.getText(),
        })),
        hyperlinks: document.getHyperlinks().map(({ id, url }) => ({ id, url })),
        comments: document.getComments().map((comment) => ({
            id: comment.id,
            author: comment.author,
            text: comment.getText(),
        })),
        embeds: [...document.getAllEmbeds()],
        styles: describeStyles(document),
        headersFooters,
        diagnostics: [...document.getDiagnostics()],
    };
}

/**
 * Format an outline for terminal output.
 */
export function formatOutline(outline: DocumentOutline): string {
    const lines: string[] = [];

    lines.push(`Main part: ${outline.corePart}`);
    lines.push(`Body: ${outline.blocks.length} elements`);
    for (const block of outline.blocks) {
        const style = block.style ? ` [${block.style}]` : '';
        lines.push(`  ${block.bodyIndex}: ${block.type}${style} ${JSON.stringify(block.text)}`);
    }

    lines.push(`Hyperlinks: ${outline.hyperlinks.length}`);
    for (const link of outline.hyperlinks) {
        lines.push(`  ${link.id} -> ${link.url || '(unresolved)'}`);
    }

    lines.push(`Comments: ${outline.comments.length}`);
    for (const comment of outline.comments) {
        lines.push(`  #${comment.id} ${comment.author ?? '(no author)'}: ${JSON.stringify(comment.text)}`);
    }

    lines.push(`Embeds: ${outline.embeds.length}`);
    for (const embed of outline.embeds) {
        lines.push(`  ${embed.partName} (${embed.contentType})`);
    }

    lines.push('count' in outline.styles ? `Styles: ${outline.styles.count}` : `Styles: error: ${outline.styles.error}`);

    lines.push(`Headers/footers: ${outline.headersFooters.length}`);
    for (const hf of outline.headersFooters) {
        lines.push(`  ${hf.kind} ${hf.type} ${hf.partName} ${JSON.stringify(hf.text)}`);
    }

    if (outline.diagnostics.length > 0) {
        lines.push(`Diagnostics: ${outline.diagnostics.length}`);
        for (const diagnostic of outline.diagnostics) {
            lines.push(`  ${diagnostic.code} ${diagnostic.relationshipId}: ${diagnostic.message}`);
        }
    }

    return lines.join('\n');
}
