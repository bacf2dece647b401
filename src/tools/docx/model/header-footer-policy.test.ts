import { describe, expect, it } from 'vitest';
import { CONTENT_TYPES, RELATIONSHIP_TYPES } from '../constants.js';
import { DocxErrorCode, isDocxError } from '../errors.js';
import { OpcPackage } from '../package/opc-package.js';
import {
  catchError,
  commentedParagraphXml,
  commentsXml,
  DOCUMENT_PART,
  DocxFixture,
  footerXml,
  headerXml,
  hyperlinkParagraphXml,
  paragraphXml,
  R_NS,
  sectPrXml,
  type SectionReference,
  W_NS,
} from '../../../test/docx-fixtures.js';
import { assembleDocument } from './assembler.js';
import type { DocxDocument } from './document.js';

function withHeadersAndFooters(bodyXml: string): DocxFixture {
  return DocxFixture.withDocument(bodyXml)
    .part('/word/header1.xml', headerXml('Default header'), CONTENT_TYPES.HEADER)
    .part('/word/header2.xml', headerXml('First header'), CONTENT_TYPES.HEADER)
    .part('/word/header3.xml', headerXml('Even header'), CONTENT_TYPES.HEADER)
    .part('/word/footer1.xml', footerXml('Default footer'), CONTENT_TYPES.FOOTER)
    .rel(DOCUMENT_PART, { id: 'rId10', type: RELATIONSHIP_TYPES.HEADER, target: 'header1.xml' })
    .rel(DOCUMENT_PART, { id: 'rId11', type: RELATIONSHIP_TYPES.HEADER, target: 'header2.xml' })
    .rel(DOCUMENT_PART, { id: 'rId12', type: RELATIONSHIP_TYPES.FOOTER, target: 'footer1.xml' })
    .rel(DOCUMENT_PART, { id: 'rId13', type: RELATIONSHIP_TYPES.HEADER, target: 'header3.xml' });
}

const ALL_REFERENCES: SectionReference[] = [
  { kind: 'header', type: 'default', relationshipId: 'rId10' },
  { kind: 'header', type: 'first', relationshipId: 'rId11' },
  { kind: 'footer', type: 'default', relationshipId: 'rId12' },
  { kind: 'header', type: 'even', relationshipId: 'rId13' },
];

function assemble(fixture: DocxFixture): DocxDocument {
  return assembleDocument(OpcPackage.fromBytes(fixture.build()));
}

describe('HeaderFooterPolicy', () => {
  describe('with a title page', () => {
    const policy = assemble(withHeadersAndFooters(paragraphXml('body') + sectPrXml(ALL_REFERENCES, true)))
      .getHeaderFooterPolicy();

    it('reads the variants of the final section', () => {
      expect(policy.isTitlePage()).toBe(true);
      expect(policy.getDefaultHeader()?.getText()).toBe('Default header');
      expect(policy.getFirstPageHeader()?.getText()).toBe('First header');
      expect(policy.getEvenPageHeader()?.getText()).toBe('Even header');
      expect(policy.getDefaultFooter()?.partName).toBe('/word/footer1.xml');
      expect(policy.getFirstPageFooter()).toBeNull();
      expect(policy.getEvenPageFooter()).toBeNull();
    });

    it('selects the header for a page number', () => {
      expect(policy.getHeader(1)?.type).toBe('first');
      expect(policy.getHeader(2)?.type).toBe('even');
      expect(policy.getHeader(3)?.type).toBe('default');
    });

    it('falls back to the default footer', () => {
      expect(policy.getFooter(1)?.getText()).toBe('Default footer');
      expect(policy.getFooter(2)?.getText()).toBe('Default footer');
    });

    it('lists headers before footers', () => {
      expect(policy.getAll().map((hf) => `${hf.kind}:${hf.type}:${hf.relationshipId}`)).toEqual([
        'header:default:rId10',
        'header:first:rId11',
        'header:even:rId13',
        'footer:default:rId12',
      ]);
    });
  });

  it('uses the default header on page one without a title page', () => {
    const policy = assemble(withHeadersAndFooters(paragraphXml('body') + sectPrXml(ALL_REFERENCES))).getHeaderFooterPolicy();
    expect(policy.isTitlePage()).toBe(false);
    expect(policy.getHeader(1)?.getText()).toBe('Default header');
  });

  it('treats w:titlePg w:val="0" as off', () => {
    const sectPr =
      '<w:sectPr><w:headerReference w:type="first" r:id="rId11"/><w:titlePg w:val="0"/></w:sectPr>';
    const policy = assemble(withHeadersAndFooters(paragraphXml('body') + sectPr)).getHeaderFooterPolicy();
    expect(policy.isTitlePage()).toBe(false);
    expect(policy.getHeader(1)).toBeNull();
  });

  it('ignores section properties nested in paragraphs', () => {
    const nested = '<w:p><w:pPr><w:sectPr><w:headerReference w:type="default" r:id="rId99"/></w:sectPr></w:pPr></w:p>';
    const policy = assemble(withHeadersAndFooters(nested + paragraphXml('body'))).getHeaderFooterPolicy();
    expect(policy.getAll()).toEqual([]);
    expect(policy.getHeader(1)).toBeNull();
  });

  it('fails assembly on a reference to an unknown relationship', () => {
    const sectPr = sectPrXml([{ kind: 'footer', type: 'default', relationshipId: 'rId77' }]);
    const error = catchError(() => assemble(withHeadersAndFooters(paragraphXml('body') + sectPr)));
    expect(isDocxError(error, DocxErrorCode.UNKNOWN_RELATIONSHIP_ID)).toBe(true);
  });

  it('fails assembly on a reference without r:id', () => {
    const sectPr = '<w:sectPr><w:headerReference w:type="default"/></w:sectPr>';
    const error = catchError(() => assemble(withHeadersAndFooters(paragraphXml('body') + sectPr)));
    expect(error).toMatchObject({
      code: DocxErrorCode.MALFORMED_ROOT_PART,
      message: 'w:headerReference without r:id',
    });
  });

  it('fails assembly when a header part has the wrong root', () => {
    const fixture = withHeadersAndFooters(paragraphXml('body') + sectPrXml(ALL_REFERENCES)).part(
      '/word/header1.xml',
      footerXml('not a header'),
      CONTENT_TYPES.HEADER,
    );
    const error = catchError(() => assemble(fixture));
    expect(error).toMatchObject({ code: DocxErrorCode.MALFORMED_PART, context: { partName: '/word/header1.xml' } });
  });

  it('resolves header hyperlinks against the header part relationships', () => {
    const header =
      `<w:hdr xmlns:w="${W_NS}" xmlns:r="${R_NS}">` +
      hyperlinkParagraphXml('rId1', 'header link') +
      commentedParagraphXml('0', 'noted') +
      '</w:hdr>';
    const fixture = DocxFixture.withDocument(
      hyperlinkParagraphXml('rId1', 'body link') +
        sectPrXml([{ kind: 'header', type: 'default', relationshipId: 'rId10' }]),
    )
      .rel(DOCUMENT_PART, { id: 'rId1', type: RELATIONSHIP_TYPES.HYPERLINK, target: 'https://body.example', external: true })
      .part('/word/header1.xml', header, CONTENT_TYPES.HEADER)
      .rel(DOCUMENT_PART, { id: 'rId10', type: RELATIONSHIP_TYPES.HEADER, target: 'header1.xml' })
      .rel('/word/header1.xml', { id: 'rId1', type: RELATIONSHIP_TYPES.HYPERLINK, target: 'https://header.example', external: true })
      .part('/word/comments.xml', commentsXml([{ id: '0', author: 'Alice', text: 'Check' }]), CONTENT_TYPES.COMMENTS)
      .rel(DOCUMENT_PART, { id: 'rId20', type: RELATIONSHIP_TYPES.COMMENTS, target: 'comments.xml' });
    const doc = assemble(fixture);
    const paragraphs = doc.getHeaderFooterPolicy().getDefaultHeader()?.getParagraphs() ?? [];

    expect(paragraphs[0].getHyperlinks().map((link) => link.url)).toEqual(['https://header.example']);
    expect(paragraphs[1].getComments().map((comment) => comment.author)).toEqual(['Alice']);
    expect(doc.getParagraphs()[0].getHyperlinks().map((link) => link.url)).toEqual(['https://body.example']);
  });
});
