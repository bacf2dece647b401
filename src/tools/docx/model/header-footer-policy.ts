/**
 * Header/footer selection for the document's final section.
 *
 * Reads the <w:sectPr> that closes the body, resolves each
 * <w:headerReference>/<w:footerReference> through the document's
 * relationships and answers which header or footer applies to a page.
 */

import { findWordChild, findWordChildren, getElementChildren, getRelationshipAttribute, getWordAttribute, isWordElement } from '../dom.js';
import { DocxError, DocxErrorCode } from '../errors.js';
import type { BodyOwner, PackagePart, SchemaKind } from '../types.js';
import { HeaderFooter, type HeaderFooterKind, type HeaderFooterType } from './header-footer.js';

/** What the policy needs from the document it is built for. */
export interface HeaderFooterSource {
  getDocumentBody(): Element;
  getPartById(id: string): PackagePart;
  parsePart(part: PackagePart, schemaKind: SchemaKind): Element;
  /** Hyperlinks of `part` itself, comments of the document. */
  getPartLookup(part: PackagePart): BodyOwner;
}

type Variants = Partial<Record<HeaderFooterType, HeaderFooter>>;

const REFERENCE_ELEMENTS: Record<HeaderFooterKind, string> = {
  header: 'headerReference',
  footer: 'footerReference',
};

function toHeaderFooterType(value: string | null): HeaderFooterType {
  return value === 'first' || value === 'even' ? value : 'default';
}

/** A w:titlePg / on-off element is on unless w:val says otherwise. */
function isOn(el: Element | null): boolean {
  if (!el) return false;
  const val = getWordAttribute(el, 'val');
  return val === null || !['0', 'false', 'off'].includes(val);
}

export class HeaderFooterPolicy {
  private readonly headers: Variants;
  private readonly footers: Variants;
  private readonly titlePage: boolean;

  constructor(source: HeaderFooterSource) {
    const sectPr = getElementChildren(source.getDocumentBody())
      .filter((child) => isWordElement(child, 'sectPr'))
      .pop();

    this.titlePage = sectPr ? isOn(findWordChild(sectPr, 'titlePg')) : false;
    this.headers = sectPr ? HeaderFooterPolicy.readVariants(source, sectPr, 'header') : {};
    this.footers = sectPr ? HeaderFooterPolicy.readVariants(source, sectPr, 'footer') : {};
  }

  private static readVariants(source: HeaderFooterSource, sectPr: Element, kind: HeaderFooterKind): Variants {
    const variants: Variants = {};
    for (const ref of findWordChildren(sectPr, REFERENCE_ELEMENTS[kind])) {
      const relationshipId = getRelationshipAttribute(ref, 'id');
      if (!relationshipId) {
        throw new DocxError(`w:${REFERENCE_ELEMENTS[kind]} without r:id`, DocxErrorCode.MALFORMED_ROOT_PART);
      }
      const type = toHeaderFooterType(getWordAttribute(ref, 'type'));
      const part = source.getPartById(relationshipId);
      const root = source.parsePart(part, kind);
      variants[type] = new HeaderFooter(kind, type, relationshipId, part.partName, root, source.getPartLookup(part));
    }
    return variants;
  }

  isTitlePage(): boolean {
    return this.titlePage;
  }

  getDefaultHeader(): HeaderFooter | null {
    return this.headers.default ?? null;
  }

  getFirstPageHeader(): HeaderFooter | null {
    return this.headers.first ?? null;
  }

  getEvenPageHeader(): HeaderFooter | null {
    return this.headers.even ?? null;
  }

  getDefaultFooter(): HeaderFooter | null {
    return this.footers.default ?? null;
  }

  getFirstPageFooter(): HeaderFooter | null {
    return this.footers.first ?? null;
  }

  getEvenPageFooter(): HeaderFooter | null {
    return this.footers.even ?? null;
  }

  /** Header for a 1-based page number. */
  getHeader(pageNumber: number): HeaderFooter | null {
    return this.select(this.headers, pageNumber);
  }

  /** Footer for a 1-based page number. */
  getFooter(pageNumber: number): HeaderFooter | null {
    return this.select(this.footers, pageNumber);
  }

  /** Every resolved header and footer, headers first. */
  getAll(): HeaderFooter[] {
    const order: HeaderFooterType[] = ['default', 'first', 'even'];
    return [
      ...order.map((type) => this.headers[type]),
      ...order.map((type) => this.footers[type]),
    ].filter((hf): hf is HeaderFooter => hf !== undefined);
  }

  private select(variants: Variants, pageNumber: number): HeaderFooter | null {
    if (pageNumber === 1 && this.titlePage && variants.first) return variants.first;
    if (pageNumber % 2 === 0 && variants.even) return variants.even;
    return variants.default ?? null;
  }
}
