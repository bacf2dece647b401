import { loadConfig, toAssemblyOptions } from '../config.js';
import { toErrorResponse } from '../error-handlers.js';
import { describeDocument, formatOutline, openDocx, type DocxDocument, type HeaderFooter } from '../tools/docx/index.js';
import {
    GetDocxCommentArgsSchema,
    GetDocxHeaderFooterArgsSchema,
    GetDocxHyperlinkArgsSchema,
    GetDocxPartArgsSchema,
    GetDocxStylesArgsSchema,
    ReadDocxModelArgsSchema,
} from '../tools/schemas.js';
import type { ServerResult } from '../types.js';

function textResult(text: string): ServerResult {
    return { content: [{ type: 'text', text }] };
}

function jsonResult(value: unknown): ServerResult {
    return textResult(JSON.stringify(value, null, 2));
}

function notFound(message: string): ServerResult {
    return { content: [{ type: 'text', text: message }], isError: true };
}

async function open(filePath: string): Promise<DocxDocument> {
    return openDocx(filePath, toAssemblyOptions(loadConfig()));
}

/**
 * Handle read_docx_model command
 */
export async function handleReadDocxModel(args: unknown): Promise<ServerResult> {
    try {
        const parsed = ReadDocxModelArgsSchema.parse(args);
        const outline = describeDocument(await open(parsed.path));
        return parsed.format === 'json' ? jsonResult(outline) : textResult(formatOutline(outline));
    } catch (error) {
        return toErrorResponse(error);
    }
}

/**
 * Handle get_docx_comment command
 */
export async function handleGetDocxComment(args: unknown): Promise<ServerResult> {
    try {
        const parsed = GetDocxCommentArgsSchema.parse(args);
        const comment = (await open(parsed.path)).findComment(parsed.commentId);
        if (!comment) {
            return notFound(`No comment with id ${parsed.commentId}`);
        }
        return jsonResult({
            id: comment.id,
            author: comment.author,
            initials: comment.initials,
            date: comment.date,
            text: comment.getText(),
        });
    } catch (error) {
        return toErrorResponse(error);
    }
}

/**
 * Handle get_docx_hyperlink command
 */
export async function handleGetDocxHyperlink(args: unknown): Promise<ServerResult> {
    try {
        const parsed = GetDocxHyperlinkArgsSchema.parse(args);
        const link = (await open(parsed.path)).findHyperlink(parsed.relationshipId);
        if (!link) {
            return notFound(`No hyperlink with relationship id ${parsed.relationshipId}`);
        }
        return jsonResult({ id: link.id, url: link.url });
    } catch (error) {
        return toErrorResponse(error);
    }
}

/**
 * Handle get_docx_part command
 */
export async function handleGetDocxPart(args: unknown): Promise<ServerResult> {
    try {
        const parsed = GetDocxPartArgsSchema.parse(args);
        const part = (await open(parsed.path)).getPartById(parsed.relationshipId);
        return jsonResult({ partName: part.partName, contentType: part.contentType });
    } catch (error) {
        return toErrorResponse(error);
    }
}

/**
 * Handle get_docx_styles command
 */
export async function handleGetDocxStyles(args: unknown): Promise<ServerResult> {
    try {
        const parsed = GetDocxStylesArgsSchema.parse(args);
        const styles = (await open(parsed.path)).getStyles();
        return jsonResult({
            partName: styles.partName,
            styles: styles.getStyleIds().map((styleId) => ({ styleId, name: styles.getStyleName(styleId) })),
        });
    } catch (error) {
        return toErrorResponse(error);
    }
}

function describeHeaderFooter(hf: HeaderFooter | null): { type: string; partName: string; text: string } | null {
    return hf ? { type: hf.type, partName: hf.partName, text: hf.getText() } : null;
}

/**
 * Handle get_docx_header_footer command
 */
export async function handleGetDocxHeaderFooter(args: unknown): Promise<ServerResult> {
    try {
        const parsed = GetDocxHeaderFooterArgsSchema.parse(args);
        const policy = (await open(parsed.path)).getHeaderFooterPolicy();
        return jsonResult({
            page: parsed.page,
            titlePage: policy.isTitlePage(),
            header: describeHeaderFooter(policy.getHeader(parsed.page)),
            footer: describeHeaderFooter(policy.getFooter(parsed.page)),
        });
    } catch (error) {
        return toErrorResponse(error);
    }
}
