import { describe, expect, it } from 'vitest';
import { catchError } from '../../../test/docx-fixtures.js';
import { DocxErrorCode, isDocxError } from '../errors.js';
import { ContentTypes } from './content-types.js';

const XML =
  '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
  '<Default Extension="xml" ContentType="application/xml"/>' +
  '<Default Extension="PNG" ContentType="image/png"/>' +
  '<Override PartName="/word/document.xml" ContentType="application/vnd.test.main"/>' +
  '</Types>';

describe('ContentTypes', () => {
  const types = ContentTypes.parse(XML);

  it('prefers an Override over the extension Default', () => {
    expect(types.getContentType('/word/document.xml')).toBe('application/vnd.test.main');
  });

  it('matches part names case-insensitively', () => {
    expect(types.getContentType('/WORD/Document.xml')).toBe('application/vnd.test.main');
  });

  it('falls back to the Default for the extension', () => {
    expect(types.getContentType('/word/styles.xml')).toBe('application/xml');
    expect(types.getContentType('/word/media/a.png')).toBe('image/png');
  });

  it('returns null when nothing matches', () => {
    expect(types.getContentType('/word/embeddings/x.bin')).toBeNull();
  });

  it('rejects unparseable XML as an invalid package', () => {
    const caught = catchError(() => ContentTypes.parse('<Types><Default></Types>'));
    expect(isDocxError(caught, DocxErrorCode.INVALID_PACKAGE)).toBe(true);
  });
});
