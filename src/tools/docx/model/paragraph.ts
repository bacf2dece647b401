import { findWordDescendants, getParagraphStyle, getParagraphText, getRelationshipAttribute, getWordAttribute } from '../dom.js';
import type { BodyOwner } from '../types.js';
import type { Comment } from './comment.js';
import type { Hyperlink } from './hyperlink.js';

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}

/**
 * A <w:p> element. Hyperlink and comment references are resolved through the
 * owning document's lookups; a reference with no match is skipped.
 */
export class Paragraph {
  readonly kind = 'paragraph' as const;

  constructor(
    private readonly node: Element,
    private readonly owner: BodyOwner,
  ) {}

  getNode(): Element {
    return this.node;
  }

  getText(): string {
    return getParagraphText(this.node);
  }

  getStyleId(): string | null {
    return getParagraphStyle(this.node);
  }

  /** r:id values of the <w:hyperlink> elements, in document order. */
  getHyperlinkIds(): string[] {
    return findWordDescendants(this.node, 'hyperlink')
      .map((el) => getRelationshipAttribute(el, 'id'))
      .filter((id): id is string => id !== null);
  }

  getHyperlinks(): Hyperlink[] {
    return this.getHyperlinkIds()
      .map((id) => this.owner.findHyperlink(id))
      .filter(isDefined);
  }

  /** w:id values of the <w:commentReference> elements, in document order. */
  getCommentIds(): string[] {
    return findWordDescendants(this.node, 'commentReference')
      .map((el) => getWordAttribute(el, 'id'))
      .filter((id): id is string => id !== null);
  }

  getComments(): Comment[] {
    return this.getCommentIds()
      .map((id) => this.owner.findComment(id))
      .filter(isDefined);
  }
}
