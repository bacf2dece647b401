import { ZodError } from 'zod';
import { DocxError } from './tools/docx/errors.js';
import type { ServerResult } from './types.js';
import { logToStderr } from './utils/logger.js';

/**
 * Build a tool error response.
 */
export function createErrorResponse(message: string): ServerResult {
    return {
        content: [{ type: 'text', text: `Error: ${message}` }],
        isError: true,
    };
}

/**
 * Turn a thrown value into a tool error response. DocxErrors keep their code.
 */
export function toErrorResponse(error: unknown): ServerResult {
    if (error instanceof DocxError) {
        logToStderr('debug', `Tool failed with ${error.code}: ${error.message}`);
        return createErrorResponse(`[${error.code}] ${error.message}`);
    }
    if (error instanceof ZodError) {
        return createErrorResponse(
            `Invalid arguments: ${error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')}`,
        );
    }
    logToStderr('error', `Unexpected tool failure: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    return createErrorResponse(error instanceof Error ? error.message : String(error));
}
