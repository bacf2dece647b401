/**
 * DOM utilities for WordprocessingML XML.
 *
 * XML parsing and navigation. No package I/O:
 * every function works on in-memory DOM nodes.
 *
 * Uses @xmldom/xmldom for parsing so that the document order of nodes is
 * always preserved.
 */

import { DOMParser } from '@xmldom/xmldom';
import { NAMESPACES } from './constants.js';

// ═══════════════════════════════════════════════════════════════════════
// XML parse
// ═══════════════════════════════════════════════════════════════════════

/**
 * Parse an XML string. Warnings are thrown as well as errors: the parser
 * reports a mismatched end tag as a warning and would otherwise repair it.
 */
export function parseXml(xmlStr: string): Document {
    const parser = new DOMParser({
        errorHandler: {
            warning: (msg: string) => {
                throw new Error(msg);
            },
            error: (msg: string) => {
                throw new Error(msg);
            },
            fatalError: (msg: string) => {
                throw new Error(msg);
            },
        },
    });
    return parser.parseFromString(xmlStr, 'application/xml');
}

/**
 * Decode part bytes as text. UTF-16 is detected from its byte order mark;
 * a UTF-8 BOM is dropped by the decoder.
 */
export function decodeXmlBytes(bytes: Uint8Array): string {
    if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
        return new TextDecoder('utf-16le').decode(bytes);
    }
    if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
        return new TextDecoder('utf-16be').decode(bytes);
    }
    return new TextDecoder('utf-8').decode(bytes);
}

// ═══════════════════════════════════════════════════════════════════════
// Generic DOM helpers
// ═══════════════════════════════════════════════════════════════════════

/**
 * Convert any NodeList / HTMLCollection-like object into a real array.
 */
export function nodeListToArray<T extends Node = Node>(
    nl: { length: number; item(index: number): T | null },
): T[] {
    const arr: T[] = [];
    for (let i = 0; i < nl.length; i++) {
        const n = nl.item(i);
        if (n) arr.push(n);
    }
    return arr;
}

function isElement(node: Node): node is Element {
    return node.nodeType === 1;
}

/** Direct element children, in document order. */
export function getElementChildren(node: Node): Element[] {
    return nodeListToArray(node.childNodes).filter(isElement);
}

/** True for a WordprocessingML element with the given local name. */
export function isWordElement(node: Node, localName: string): node is Element {
    return isElement(node) && node.localName === localName && node.namespaceURI === NAMESPACES.W;
}

export function findWordChild(node: Node, localName: string): Element | null {
    return getElementChildren(node).find((child) => isWordElement(child, localName)) ?? null;
}

export function findWordChildren(node: Node, localName: string): Element[] {
    return getElementChildren(node).filter((child) => isWordElement(child, localName));
}

/** Every WordprocessingML descendant with the given local name, in document order. */
export function findWordDescendants(node: Element | Document, localName: string): Element[] {
    return nodeListToArray(node.getElementsByTagNameNS(NAMESPACES.W, localName));
}

/** Read a w:-namespaced attribute, or null if absent. */
export function getWordAttribute(el: Element, localName: string): string | null {
    if (el.hasAttributeNS(NAMESPACES.W, localName)) {
        return el.getAttributeNS(NAMESPACES.W, localName);
    }
    return null;
}

/** Read an r:-namespaced attribute (relationship reference), or null if absent. */
export function getRelationshipAttribute(el: Element, localName: string): string | null {
    if (el.hasAttributeNS(NAMESPACES.R, localName)) {
        return el.getAttributeNS(NAMESPACES.R, localName);
    }
    return null;
}

// ═══════════════════════════════════════════════════════════════════════
// Body access
// ═══════════════════════════════════════════════════════════════════════

/** Return the single <w:body> element of a parsed document part, or null. */
export function findBody(doc: Document): Element | null {
    return findWordChild(doc.documentElement, 'body');
}

// ═══════════════════════════════════════════════════════════════════════
// Text helpers
// ═══════════════════════════════════════════════════════════════════════

/** Concatenate the run text of a paragraph: <w:t>, plus tabs and breaks. */
export function getParagraphText(p: Element): string {
    let out = '';
    for (const run of findWordDescendants(p, 'r')) {
        for (const child of getElementChildren(run)) {
            if (child.namespaceURI !== NAMESPACES.W) continue;
            switch (child.localName) {
                case 't':
                    out += child.textContent ?? '';
                    break;
                case 'tab':
                    out += '\t';
                    break;
                case 'br':
                case 'cr':
                    out += '\n';
                    break;
            }
        }
    }
    return out;
}

/** Read the style id from <w:pPr>/<w:pStyle>/@w:val, or null if absent. */
export function getParagraphStyle(p: Element): string | null {
    const pPr = findWordChild(p, 'pPr');
    const pStyle = pPr ? findWordChild(pPr, 'pStyle') : null;
    return pStyle ? getWordAttribute(pStyle, 'val') : null;
}

/** Read the style id from <w:tblPr>/<w:tblStyle>/@w:val, or null if absent. */
export function getTableStyle(tbl: Element): string | null {
    const tblPr = findWordChild(tbl, 'tblPr');
    const tblStyle = tblPr ? findWordChild(tblPr, 'tblStyle') : null;
    return tblStyle ? getWordAttribute(tblStyle, 'val') : null;
}
