import {Server} from "@modelcontextprotocol/sdk/server/index.js";
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    ListResourcesRequestSchema,
    ListResourceTemplatesRequestSchema,
    ListPromptsRequestSchema,
    type CallToolRequest,
    type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import type {ZodTypeAny} from "zod";
import {zodToJsonSchema} from "zod-to-json-schema";

import {
    ReadDocxModelArgsSchema,
    GetDocxCommentArgsSchema,
    GetDocxHyperlinkArgsSchema,
    GetDocxPartArgsSchema,
    GetDocxStylesArgsSchema,
    GetDocxHeaderFooterArgsSchema,
} from './tools/schemas.js';
import * as handlers from './handlers/index.js';
import {createErrorResponse} from './error-handlers.js';
import type {ServerResult} from './types.js';
import {VERSION} from './version.js';
import {logToStderr} from './utils/logger.js';
import {isRecord, isStringArray} from './utils/type-guards.js';

const PATH_GUIDANCE = `Always use absolute paths to .docx files. Relative paths resolve against the server's working directory.`;

function toInputSchema(schema: ZodTypeAny): Tool['inputSchema'] {
    const json: unknown = zodToJsonSchema(schema);
    if (!isRecord(json) || !isRecord(json.properties)) {
        return {type: "object", properties: {}};
    }
    return {
        type: "object",
        properties: json.properties,
        ...(isStringArray(json.required) ? {required: json.required} : {}),
    };
}

export function listTools(): Tool[] {
    return [
        {
            name: "read_docx_model",
            description: `
                Open a .docx file and return an outline of its assembled document model:
                body paragraphs and tables in order, hyperlinks, comments, embedded objects,
                the styles count, headers/footers of the final section and any per-item
                resolution diagnostics.

                format: "text" (default) for a compact listing, "json" for the full outline.
                ${PATH_GUIDANCE}`,
            inputSchema: toInputSchema(ReadDocxModelArgsSchema),
            annotations: {
                title: "Read DOCX Model",
                readOnlyHint: true,
            },
        },
        {
            name: "get_docx_comment",
            description: `
                Look up a comment by its w:id and return its author, initials, date and text.
                ${PATH_GUIDANCE}`,
            inputSchema: toInputSchema(GetDocxCommentArgsSchema),
            annotations: {
                title: "Get DOCX Comment",
                readOnlyHint: true,
            },
        },
        {
            name: "get_docx_hyperlink",
            description: `
                Look up a hyperlink of the main document part by relationship id (e.g. "rId4")
                and return its target URL.
                ${PATH_GUIDANCE}`,
            inputSchema: toInputSchema(GetDocxHyperlinkArgsSchema),
            annotations: {
                title: "Get DOCX Hyperlink",
                readOnlyHint: true,
            },
        },
        {
            name: "get_docx_part",
            description: `
                Resolve a relationship id of the main document part to the package part it
                targets. Fails for unknown ids, external targets and missing parts.
                ${PATH_GUIDANCE}`,
            inputSchema: toInputSchema(GetDocxPartArgsSchema),
            annotations: {
                title: "Get DOCX Part",
                readOnlyHint: true,
            },
        },
        {
            name: "get_docx_styles",
            description: `
                List the style ids and display names of the document's styles part.
                Fails unless the main part has exactly one styles relationship.
                ${PATH_GUIDANCE}`,
            inputSchema: toInputSchema(GetDocxStylesArgsSchema),
            annotations: {
                title: "Get DOCX Styles",
                readOnlyHint: true,
            },
        },
        {
            name: "get_docx_header_footer",
            description: `
                Return the header and footer that apply to a page number (1-based) in the
                document's final section, honouring the title page setting.
                ${PATH_GUIDANCE}`,
            inputSchema: toInputSchema(GetDocxHeaderFooterArgsSchema),
            annotations: {
                title: "Get DOCX Header/Footer",
                readOnlyHint: true,
            },
        },
    ];
}

/**
 * Dispatch a tool call to its handler.
 */
export async function callTool(name: string, args: unknown): Promise<ServerResult> {
    switch (name) {
        case "read_docx_model":
            return handlers.handleReadDocxModel(args);
        case "get_docx_comment":
            return handlers.handleGetDocxComment(args);
        case "get_docx_hyperlink":
            return handlers.handleGetDocxHyperlink(args);
        case "get_docx_part":
            return handlers.handleGetDocxPart(args);
        case "get_docx_styles":
            return handlers.handleGetDocxStyles(args);
        case "get_docx_header_footer":
            return handlers.handleGetDocxHeaderFooter(args);
        default:
            return createErrorResponse(`Unknown tool: ${name}`);
    }
}

export const server = new Server(
    {
        name: "docx-model",
        version: VERSION,
    },
    {
        capabilities: {
            tools: {},
            resources: {},
            prompts: {},
        },
    },
);

server.setRequestHandler(ListResourcesRequestSchema, async () => ({resources: []}));
server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => ({resourceTemplates: []}));
server.setRequestHandler(ListPromptsRequestSchema, async () => ({prompts: []}));

server.setRequestHandler(ListToolsRequestSchema, async () => {
    logToStderr('debug', 'Generating tools list...');
    return {tools: listTools()};
});

server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest): Promise<ServerResult> => {
    const {name, arguments: args} = request.params;
    const startTime = Date.now();
    try {
        return await callTool(name, args);
    } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        logToStderr('error', `Error in ${name} handler: ${errorMessage}`);
        return createErrorResponse(errorMessage);
    } finally {
        logToStderr('debug', `${name} finished in ${Date.now() - startTime}ms`);
    }
});
