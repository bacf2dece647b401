/**
 * [Content_Types].xml reader.
 *
 * Override entries are keyed by part name, Default entries by extension.
 * An Override wins over a Default.
 *
 * @module docx/package/content-types
 */

import { nodeListToArray, parseXml } from '../dom.js';
import { DocxError, DocxErrorCode, errorMessage } from '../errors.js';
import { getExtension, partNameKey } from './part-names.js';

export class ContentTypes {
  private readonly defaults = new Map<string, string>();
  private readonly overrides = new Map<string, string>();

  static parse(xml: string): ContentTypes {
    let doc: Document;
    try {
      doc = parseXml(xml);
    } catch (error) {
      throw new DocxError(`Invalid [Content_Types].xml: ${errorMessage(error)}`, DocxErrorCode.INVALID_PACKAGE);
    }

    const contentTypes = new ContentTypes();
    for (const el of nodeListToArray(doc.getElementsByTagName('Default'))) {
      const extension = el.getAttribute('Extension');
      const contentType = el.getAttribute('ContentType');
      if (extension && contentType) {
        contentTypes.defaults.set(extension.toLowerCase(), contentType);
      }
    }
    for (const el of nodeListToArray(doc.getElementsByTagName('Override'))) {
      const partName = el.getAttribute('PartName');
      const contentType = el.getAttribute('ContentType');
      if (partName && contentType) {
        contentTypes.overrides.set(partNameKey(partName), contentType);
      }
    }
    return contentTypes;
  }

  getContentType(partName: string): string | null {
    return this.overrides.get(partNameKey(partName)) ?? this.defaults.get(getExtension(partName)) ?? null;
  }
}
