import { findWordChildren } from '../dom.js';
import type { BodyOwner } from '../types.js';
import { Paragraph } from './paragraph.js';

export type HeaderFooterKind = 'header' | 'footer';

/** The w:type of a header/footer reference. */
export type HeaderFooterType = 'default' | 'first' | 'even';

/**
 * A parsed header (<w:hdr>) or footer (<w:ftr>) part.
 */
export class HeaderFooter {
  constructor(
    readonly kind: HeaderFooterKind,
    readonly type: HeaderFooterType,
    readonly relationshipId: string,
    readonly partName: string,
    private readonly root: Element,
    private readonly owner: BodyOwner,
  ) {}

  getRoot(): Element {
    return this.root;
  }

  /** Top-level paragraphs of the part. */
  getParagraphs(): Paragraph[] {
    return findWordChildren(this.root, 'p').map((p) => new Paragraph(p, this.owner));
  }

  getText(): string {
    return this.getParagraphs()
      .map((p) => p.getText())
      .join('\n');
  }
}
