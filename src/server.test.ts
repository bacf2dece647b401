import { describe, expect, it } from 'vitest';
import { callTool, listTools } from './server.js';

describe('server', () => {
    it('lists the read-only docx tools', () => {
        const tools = listTools();
        expect(tools.map((tool) => tool.name)).toEqual([
            'read_docx_model',
            'get_docx_comment',
            'get_docx_hyperlink',
            'get_docx_part',
            'get_docx_styles',
            'get_docx_header_footer',
        ]);
        expect(tools.every((tool) => tool.annotations?.readOnlyHint === true)).toBe(true);
    });

    it('derives input schemas from the argument schemas', () => {
        const comment = listTools().find((tool) => tool.name === 'get_docx_comment');
        expect(comment?.inputSchema).toEqual({
            type: 'object',
            properties: { path: { type: 'string' }, commentId: { type: 'string' } },
            required: ['path', 'commentId'],
        });
    });

    it('answers unknown tools with an error result', async () => {
        expect(await callTool('write_docx', {})).toEqual({
            content: [{ type: 'text', text: 'Error: Unknown tool: write_docx' }],
            isError: true,
        });
    });
});
