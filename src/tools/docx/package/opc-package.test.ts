import { describe, expect, it } from 'vitest';
import { CONTENT_TYPES, RELATIONSHIP_TYPES } from '../constants.js';
import { DocxError, DocxErrorCode, isDocxError } from '../errors.js';
import { catchError, DOCUMENT_PART, DocxFixture, paragraphXml } from '../../../test/docx-fixtures.js';
import { OpcPackage } from './opc-package.js';

function samplePackage(): OpcPackage {
  const bytes = DocxFixture.withDocument(paragraphXml('Hello'))
    .part('/word/embeddings/object1.bin', new Uint8Array([1, 2, 3]))
    .rel(DOCUMENT_PART, { id: 'rId3', type: RELATIONSHIP_TYPES.HYPERLINK, target: 'https://example.com/a', external: true })
    .rel(DOCUMENT_PART, { id: 'rId4', type: RELATIONSHIP_TYPES.OLE_OBJECT, target: 'embeddings/object1.bin' })
    .rel(DOCUMENT_PART, { id: 'rId5', type: RELATIONSHIP_TYPES.HYPERLINK, target: 'https://example.com/b', external: true })
    .rel(DOCUMENT_PART, { id: 'rId6', type: RELATIONSHIP_TYPES.OLE_OBJECT, target: 'embeddings/missing.bin' })
    .rel(DOCUMENT_PART, { id: 'rId7', type: RELATIONSHIP_TYPES.HYPERLINK, target: 'not a uri', external: true })
    .build();
  return OpcPackage.fromBytes(bytes);
}

describe('OpcPackage', () => {
  it('rejects bytes that are not a ZIP archive', () => {
    const error = catchError(() => OpcPackage.fromBytes(new TextEncoder().encode('plain text')));
    expect(error).toBeInstanceOf(DocxError);
    expect(isDocxError(error, DocxErrorCode.INVALID_PACKAGE)).toBe(true);
  });

  it('rejects a package without [Content_Types].xml', () => {
    const bytes = DocxFixture.withDocument(paragraphXml('x')).withoutContentTypes().build();
    expect(() => OpcPackage.fromBytes(bytes)).toThrow('Invalid DOCX: missing [Content_Types].xml');
  });

  it('finds the core part through the officeDocument relationship', () => {
    expect(samplePackage().getCorePart()).toEqual({
      partName: '/word/document.xml',
      contentType: CONTENT_TYPES.MAIN,
    });
  });

  it('fails without an officeDocument relationship', () => {
    const bytes = new DocxFixture().part(DOCUMENT_PART, '<x/>', CONTENT_TYPES.MAIN).build();
    const error = catchError(() => OpcPackage.fromBytes(bytes).getCorePart());
    expect(isDocxError(error, DocxErrorCode.INVALID_PACKAGE)).toBe(true);
  });

  it('answers relationshipsByType in declaration order', () => {
    const pkg = samplePackage();
    const ids = pkg.relationshipsByType(pkg.getCorePart(), RELATIONSHIP_TYPES.HYPERLINK).map((rel) => rel.id);
    expect(ids).toEqual(['rId3', 'rId5', 'rId7']);
  });

  it('reports unknown relationship ids', () => {
    const pkg = samplePackage();
    const error = catchError(() => pkg.relationshipById(pkg.getCorePart(), 'rId99'));
    expect(isDocxError(error, DocxErrorCode.UNKNOWN_RELATIONSHIP_ID)).toBe(true);
  });

  it('resolves internal targets to parts, falling back to octet-stream', () => {
    const pkg = samplePackage();
    const part = pkg.resolveTarget(pkg.relationshipById(pkg.getCorePart(), 'rId4'));
    expect(part).toEqual({ partName: '/word/embeddings/object1.bin', contentType: 'application/octet-stream' });
    expect([...pkg.bytes(part)]).toEqual([1, 2, 3]);
  });

  it('refuses to resolve external or missing targets to parts', () => {
    const pkg = samplePackage();
    const core = pkg.getCorePart();
    const external = catchError(() => pkg.resolveTarget(pkg.relationshipById(core, 'rId3')));
    const missing = catchError(() => pkg.resolveTarget(pkg.relationshipById(core, 'rId6')));
    expect(isDocxError(external, DocxErrorCode.EXTERNAL_TARGET)).toBe(true);
    expect(isDocxError(missing, DocxErrorCode.PART_NOT_FOUND)).toBe(true);
  });

  it('resolves target URIs', () => {
    const pkg = samplePackage();
    const core = pkg.getCorePart();
    expect(pkg.resolveTargetUri(pkg.relationshipById(core, 'rId3'))).toBe('https://example.com/a');
    expect(pkg.resolveTargetUri(pkg.relationshipById(core, 'rId4'))).toBe('/word/embeddings/object1.bin');
    const error = catchError(() => pkg.resolveTargetUri(pkg.relationshipById(core, 'rId7')));
    expect(isDocxError(error, DocxErrorCode.INVALID_RELATIONSHIP_TARGET)).toBe(true);
  });

  it('looks parts up case-insensitively', () => {
    const pkg = samplePackage();
    expect(pkg.hasPart('/WORD/Document.xml')).toBe(true);
    expect(pkg.getPart('/word/nothing.xml')).toBeNull();
  });
});
