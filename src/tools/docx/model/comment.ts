import { findWordChildren, getParagraphText, getWordAttribute } from '../dom.js';

/**
 * A <w:comment> from the shared comments part, identified by its own w:id.
 */
export class Comment {
  readonly id: string;
  readonly author: string | null;
  readonly initials: string | null;
  readonly date: string | null;

  constructor(private readonly node: Element) {
    this.id = getWordAttribute(node, 'id') ?? '';
    this.author = getWordAttribute(node, 'author');
    this.initials = getWordAttribute(node, 'initials');
    this.date = getWordAttribute(node, 'date');
  }

  getNode(): Element {
    return this.node;
  }

  /** Paragraph texts joined by newlines. */
  getText(): string {
    return findWordChildren(this.node, 'p').map(getParagraphText).join('\n');
  }
}
