import type { BodyOwner } from '../types.js';
import type { Comment } from './comment.js';
import type { Hyperlink } from './hyperlink.js';

/**
 * Id-indexed hyperlinks and comments of one document.
 *
 * Body wrappers hold this object rather than the document itself. It is
 * filled during assembly and only read afterwards.
 */
export class DocumentLookup implements BodyOwner {
  private readonly hyperlinks = new Map<string, Hyperlink>();
  private readonly comments = new Map<string, Comment>();

  /** Returns false, leaving the first entry in place, when the id is taken. */
  addHyperlink(hyperlink: Hyperlink): boolean {
    if (this.hyperlinks.has(hyperlink.id)) return false;
    this.hyperlinks.set(hyperlink.id, hyperlink);
    return true;
  }

  /** Returns false, leaving the first entry in place, when the id is taken. */
  addComment(comment: Comment): boolean {
    if (this.comments.has(comment.id)) return false;
    this.comments.set(comment.id, comment);
    return true;
  }

  findHyperlink(id: string): Hyperlink | undefined {
    return this.hyperlinks.get(id);
  }

  findComment(id: string): Comment | undefined {
    return this.comments.get(id);
  }

  /** Insertion order. */
  getHyperlinks(): Hyperlink[] {
    return [...this.hyperlinks.values()];
  }

  /** Insertion order. */
  getComments(): Comment[] {
    return [...this.comments.values()];
  }

  getCommentMap(): ReadonlyMap<string, Comment> {
    return this.comments;
  }
}

/**
 * Lookup for the body of a header or footer part. Hyperlink ids are scoped
 * to that part's relationships; comments belong to the document.
 */
export class PartLookup implements BodyOwner {
  private readonly hyperlinks = new Map<string, Hyperlink>();

  constructor(private readonly document: BodyOwner) {}

  /** Returns false, leaving the first entry in place, when the id is taken. */
  addHyperlink(hyperlink: Hyperlink): boolean {
    if (this.hyperlinks.has(hyperlink.id)) return false;
    this.hyperlinks.set(hyperlink.id, hyperlink);
    return true;
  }

  findHyperlink(id: string): Hyperlink | undefined {
    return this.hyperlinks.get(id);
  }

  findComment(id: string): Comment | undefined {
    return this.document.findComment(id);
  }
}
