import {
  readGenerateQuizRequest,
  readMetadataUpdate,
  readQuestionOrder,
  readQuizListQuery,
  toDocumentView,
} from './quiz-requests';
import { SourceDocument } from '../interfaces';

describe('quiz request readers', () => {
  describe('readGenerateQuizRequest', () => {
    it('should fill defaults and map fileId to the document id', () => {
      expect(readGenerateQuizRequest({ title: 'Cells', fileId: 'doc-1' })).toEqual({
        title: 'Cells',
        description: undefined,
        text: undefined,
        documentId: 'doc-1',
        requestedCount: 10,
        types: ['multiple_choice', 'true_false'],
        difficulty: 'medium',
        isPublic: undefined,
      });
    });

    it('should turn a non-numeric count into NaN', () => {
      expect(readGenerateQuizRequest({ requestedCount: '5' }).requestedCount).toBeNaN();
    });

    it('should reject unknown question types', () => {
      expect(() => readGenerateQuizRequest({ types: ['matching'] })).toThrow('Unknown question type: matching');
    });

    it('should reject an unknown difficulty', () => {
      expect(() => readGenerateQuizRequest({ difficulty: 'brutal' })).toThrow(
        'Difficulty must be easy, medium or hard',
      );
    });
  });

  describe('readMetadataUpdate', () => {
    it('should keep only the fields that were sent', () => {
      expect(readMetadataUpdate({ title: 'New', description: null, extra: 1 })).toEqual({
        title: 'New',
        description: null,
      });
    });

    it('should reject a non-boolean isPublic', () => {
      expect(() => readMetadataUpdate({ isPublic: 'yes' })).toThrow('isPublic must be a boolean');
    });
  });

  it('should require an array of ids for reordering', () => {
    expect(readQuestionOrder({ questionIds: ['a', 'b'] })).toEqual(['a', 'b']);
    expect(() => readQuestionOrder({ questionIds: ['a', 2] })).toThrow('questionIds must be an array of question ids');
  });

  describe('readQuizListQuery', () => {
    it('should read paging and filters', () => {
      expect(readQuizListQuery(new URLSearchParams('page=2&perPage=x&status=draft&search=cell'))).toEqual({
        page: 2,
        perPage: undefined,
        status: 'draft',
        search: 'cell',
      });
    });

    it('should reject an unknown status', () => {
      expect(() => readQuizListQuery(new URLSearchParams('status=deleted'))).toThrow(
        'Status must be draft, published or archived',
      );
    });
  });

  describe('toDocumentView', () => {
    const document: SourceDocument = {
      id: 'doc-1',
      ownerId: 'user-1',
      originalFilename: 'cells.txt',
      extension: 'txt',
      mimeType: 'text/plain',
      sizeBytes: 12,
      contentHash: 'abc',
      storageKey: 'user-1/doc-1.txt',
      status: 'success',
      text: 'Cells divide.',
      error: null,
      wordCount: 2,
      pageCount: null,
      createdAt: '2026-03-01T00:00:00.000Z',
      extractedAt: '2026-03-01T00:00:01.000Z',
    };

    it('should hide the storage key and text by default', () => {
      const view = toDocumentView(document);

      expect(view).not.toHaveProperty('storageKey');
      expect(view).not.toHaveProperty('text');
      expect(view.originalFilename).toBe('cells.txt');
    });

    it('should include text on request', () => {
      expect(toDocumentView(document, true).text).toBe('Cells divide.');
    });
  });
});
