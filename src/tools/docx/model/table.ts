import { findWordChildren, findWordDescendants, getTableStyle } from '../dom.js';
import type { BodyOwner } from '../types.js';
import { Paragraph } from './paragraph.js';

/**
 * A <w:tbl> element of the body.
 */
export class Table {
  readonly kind = 'table' as const;

  constructor(
    private readonly node: Element,
    private readonly owner: BodyOwner,
  ) {}

  getNode(): Element {
    return this.node;
  }

  getStyleId(): string | null {
    return getTableStyle(this.node);
  }

  /**
   * Cell text per row. A cell's text is its trimmed, non-empty paragraph
   * texts joined with a space.
   */
  getRows(): string[][] {
    return findWordChildren(this.node, 'tr').map((row) =>
      findWordChildren(row, 'tc').map((cell) =>
        findWordDescendants(cell, 'p')
          .map((p) => new Paragraph(p, this.owner).getText().trim())
          .filter((text) => text.length > 0)
          .join(' '),
      ),
    );
  }

  /** Every paragraph inside the table's cells, nested tables included. */
  getParagraphs(): Paragraph[] {
    return findWordDescendants(this.node, 'p').map((p) => new Paragraph(p, this.owner));
  }

  /** Rows joined by newlines, cells by tabs. */
  getText(): string {
    return this.getRows()
      .map((cells) => cells.join('\t'))
      .join('\n');
  }
}
