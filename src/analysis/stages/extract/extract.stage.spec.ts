import { ExtractStage } from './extract.stage';
import { AnalysisWarningType } from '../../common/types';
import { InMemoryPageSource } from '../../../testing/in-memory-page-source';

describe('ExtractStage', () => {
  it('extracts every document in input order', async () => {
    const source = new InMemoryPageSource({
      'b.pdf': [{ pageNumber: 1, text: 'B text' }],
      'a.pdf': [
        { pageNumber: 1, text: 'A one' },
        { pageNumber: 2, text: 'A two' },
      ],
    });
    const stage = new ExtractStage(source);

    const result = await stage.execute({
      folderPath: 'pdfs',
      documents: [
        { filename: 'b.pdf', title: 'B' },
        { filename: 'a.pdf', title: 'A' },
      ],
    });

    expect(result.documents.map((d) => d.documentId)).toEqual([
      'b.pdf',
      'a.pdf',
    ]);
    expect(result.totalPages).toBe(3);
    expect(result.warnings).toEqual([]);
    expect(source.requestedPaths).toEqual(['pdfs/b.pdf', 'pdfs/a.pdf']);
  });

  it('skips unreadable documents with a warning', async () => {
    const stage = new ExtractStage(
      new InMemoryPageSource({ 'a.pdf': [{ pageNumber: 1, text: 'text' }] }),
    );

    const result = await stage.execute({
      folderPath: 'pdfs',
      documents: [
        { filename: 'gone.pdf', title: 'Gone' },
        { filename: 'a.pdf', title: 'A' },
      ],
    });

    expect(result.documents.map((d) => d.documentId)).toEqual(['a.pdf']);
    expect(result.emptyDocuments).toEqual(['gone.pdf']);
    expect(result.warnings).toEqual([
      {
        type: AnalysisWarningType.EXTRACTION_EMPTY,
        documentId: 'gone.pdf',
        message: 'File not found: pdfs/gone.pdf',
      },
    ]);
  });

  it('flags documents whose pages carry no text', async () => {
    const stage = new ExtractStage(
      new InMemoryPageSource({
        'scan.pdf': [
          { pageNumber: 1, text: '' },
          { pageNumber: 2, text: '  \n ' },
        ],
      }),
    );

    const result = await stage.execute({
      folderPath: 'pdfs',
      documents: [{ filename: 'scan.pdf', title: 'Scan' }],
    });

    expect(result.emptyDocuments).toEqual(['scan.pdf']);
    expect(result.warnings[0].type).toBe(AnalysisWarningType.EXTRACTION_EMPTY);
    expect(result.documents).toHaveLength(1);
  });

  it('propagates unexpected errors', async () => {
    const stage = new ExtractStage({
      extract: () => Promise.reject(new TypeError('boom')),
    });

    await expect(
      stage.execute({
        folderPath: 'pdfs',
        documents: [{ filename: 'a.pdf', title: 'A' }],
      }),
    ).rejects.toThrow('boom');
  });
});
