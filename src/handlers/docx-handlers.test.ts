import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import type { ServerResult } from '../types.js';
import { removeFixtures, sampleDocument, writeFixture } from '../test/docx-fixtures.js';
import {
    handleGetDocxComment,
    handleGetDocxHeaderFooter,
    handleGetDocxHyperlink,
    handleGetDocxPart,
    handleGetDocxStyles,
    handleReadDocxModel,
} from './docx-handlers.js';

function textOf(result: ServerResult): string {
    const [first] = result.content;
    return first?.type === 'text' ? first.text : '';
}

function jsonOf(result: ServerResult): unknown {
    return JSON.parse(textOf(result));
}

describe('docx handlers', () => {
    let filePath: string;

    beforeAll(async () => {
        filePath = await writeFixture(sampleDocument());
    });

    afterAll(removeFixtures);

    it('reads the model as text by default', async () => {
        const result = await handleReadDocxModel({ path: filePath });
        expect(result.isError).toBeUndefined();
        expect(textOf(result).split('\n')[0]).toBe('Main part: /word/document.xml');
    });

    it('reads the model as JSON', async () => {
        const result = await handleReadDocxModel({ path: filePath, format: 'json' });
        expect(jsonOf(result)).toMatchObject({
            corePart: '/word/document.xml',
            hyperlinks: [{ id: 'rId3', url: 'https://example.com' }],
            styles: { count: 2 },
        });
    });

    it('returns a comment by id', async () => {
        expect(jsonOf(await handleGetDocxComment({ path: filePath, commentId: '0' }))).toEqual({
            id: '0',
            author: 'Alice',
            initials: null,
            date: null,
            text: 'Looks good',
        });
    });

    it('flags a missing comment', async () => {
        const result = await handleGetDocxComment({ path: filePath, commentId: '9' });
        expect(result.isError).toBe(true);
        expect(textOf(result)).toBe('No comment with id 9');
    });

    it('returns a hyperlink by relationship id', async () => {
        expect(jsonOf(await handleGetDocxHyperlink({ path: filePath, relationshipId: 'rId3' }))).toEqual({
            id: 'rId3',
            url: 'https://example.com',
        });
    });

    it('resolves a part by relationship id', async () => {
        expect(jsonOf(await handleGetDocxPart({ path: filePath, relationshipId: 'rId4' }))).toEqual({
            partName: '/word/header1.xml',
            contentType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.header+xml',
        });
    });

    it('reports model errors with their code', async () => {
        const result = await handleGetDocxPart({ path: filePath, relationshipId: 'rId404' });
        expect(result.isError).toBe(true);
        expect(textOf(result)).toBe(
            'Error: [UNKNOWN_RELATIONSHIP_ID] No relationship with id "rId404" on /word/document.xml',
        );
    });

    it('lists styles', async () => {
        expect(jsonOf(await handleGetDocxStyles({ path: filePath }))).toEqual({
            partName: '/word/styles.xml',
            styles: [
                { styleId: 'Normal', name: 'Normal name' },
                { styleId: 'Title', name: 'Title name' },
            ],
        });
    });

    it('selects the header and footer for a page', async () => {
        expect(jsonOf(await handleGetDocxHeaderFooter({ path: filePath, page: 2 }))).toEqual({
            page: 2,
            titlePage: false,
            header: { type: 'default', partName: '/word/header1.xml', text: 'Top' },
            footer: null,
        });
    });

    it('rejects invalid arguments', async () => {
        const result = await handleGetDocxStyles({});
        expect(result.isError).toBe(true);
        expect(textOf(result)).toBe('Error: Invalid arguments: path: Required');
    });
});
