import { findWordChild, findWordChildren, getWordAttribute } from '../dom.js';

/**
 * The parsed styles part: the <w:styles> root plus an index of its
 * <w:style> definitions by w:styleId.
 */
export class DocxStyles {
  private readonly byId = new Map<string, Element>();

  constructor(
    private readonly root: Element,
    readonly partName: string,
  ) {
    for (const style of findWordChildren(root, 'style')) {
      const styleId = getWordAttribute(style, 'styleId');
      if (styleId !== null && !this.byId.has(styleId)) {
        this.byId.set(styleId, style);
      }
    }
  }

  getRoot(): Element {
    return this.root;
  }

  getStyleIds(): string[] {
    return [...this.byId.keys()];
  }

  getStyle(styleId: string): Element | undefined {
    return this.byId.get(styleId);
  }

  /** Display name from <w:name w:val>, or null if the style or name is absent. */
  getStyleName(styleId: string): string | null {
    const style = this.byId.get(styleId);
    const name = style ? findWordChild(style, 'name') : null;
    return name ? getWordAttribute(name, 'val') : null;
  }
}
