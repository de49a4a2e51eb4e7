import { createHash } from 'crypto';
import { DocumentService, DocumentOwner } from './document.service';
import { FileStorage } from './file-storage.service';
import { TextExtractorService } from './text-extractor.service';
import { InMemoryDocumentStore, InMemoryQuizStore } from '../db/memory-stores';
import {
  ExtractionFailedError,
  ForbiddenError,
  NotFoundError,
  UnsupportedFormatError,
  ValidationError,
} from '../errors/app-errors';
import { Quiz, UploadedFile } from '../interfaces';

class MemoryFileStorage implements FileStorage {
  readonly files = new Map<string, Buffer>();

  async save(key: string, data: Buffer): Promise<void> {
    this.files.set(key, data);
  }

  async read(key: string): Promise<Buffer> {
    const data = this.files.get(key);
    if (!data) throw new Error(`ENOENT: ${key}`);
    return data;
  }

  async remove(key: string): Promise<void> {
    this.files.delete(key);
  }
}

const PREMIUM: DocumentOwner = { id: 'user-1', plan: 'premium' };
const LESSON = 'Cells are the basic unit of life.';

function textFile(content: string, filename = 'lesson.txt'): UploadedFile {
  return { filename, mimeType: 'text/plain', data: Buffer.from(content) };
}

describe('DocumentService', () => {
  let documents: InMemoryDocumentStore;
  let quizzes: InMemoryQuizStore;
  let storage: MemoryFileStorage;
  let service: DocumentService;

  beforeEach(() => {
    documents = new InMemoryDocumentStore();
    quizzes = new InMemoryQuizStore();
    storage = new MemoryFileStorage();
    service = new DocumentService(documents, quizzes, storage, new TextExtractorService(), {
      maxUploadBytes: 1024,
      clock: () => new Date('2026-02-10T09:00:00.000Z'),
    });
  });

  describe('upload', () => {
    it('should store the bytes and extract the text', async () => {
      const document = await service.upload(PREMIUM, textFile(LESSON));

      expect(document).toMatchObject({
        ownerId: 'user-1',
        originalFilename: 'lesson.txt',
        extension: 'txt',
        mimeType: 'text/plain',
        sizeBytes: 33,
        contentHash: createHash('sha256').update(LESSON).digest('hex'),
        storageKey: `user-1/${document.id}.txt`,
        status: 'success',
        text: LESSON,
        wordCount: 7,
        error: null,
        extractedAt: '2026-02-10T09:00:00.000Z',
      });
      expect(storage.files.get(document.storageKey)?.toString()).toBe(LESSON);
    });

    it('should require a plan with document upload', async () => {
      await expect(service.upload({ id: 'user-2', plan: 'free' }, textFile(LESSON))).rejects.toBeInstanceOf(
        ForbiddenError,
      );
      expect(storage.files.size).toBe(0);
    });

    it('should reject unsupported formats before storing anything', async () => {
      await expect(service.upload(PREMIUM, textFile(LESSON, 'slides.pptx'))).rejects.toBeInstanceOf(
        UnsupportedFormatError,
      );
      expect(storage.files.size).toBe(0);
    });

    it('should reject empty and oversized files', async () => {
      await expect(service.upload(PREMIUM, textFile(''))).rejects.toThrow('File is empty');
      await expect(service.upload(PREMIUM, textFile('x'.repeat(1025)))).rejects.toThrow(
        'File exceeds the 1024 byte upload limit',
      );
    });

    it('should keep a failed document with the extraction error', async () => {
      const document = await service.upload(PREMIUM, textFile(' \n '));

      expect(document.status).toBe('failed');
      expect(document.error).toBe('No text could be extracted from the document');
      expect(document.text).toBeNull();
    });
  });

  describe('getReadyText', () => {
    it('should return the extracted text', async () => {
      const document = await service.upload(PREMIUM, textFile(LESSON));

      await expect(service.getReadyText('user-1', document.id)).resolves.toBe(LESSON);
    });

    it('should raise ExtractionFailed for failed documents', async () => {
      const document = await service.upload(PREMIUM, textFile(' \n '));

      const error = await service.getReadyText('user-1', document.id).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExtractionFailedError);
      expect(error).toHaveProperty('message', 'No text could be extracted from the document');
    });

    it('should extract pending documents on demand', async () => {
      await storage.save('user-1/doc-9.md', Buffer.from('# Mitosis\n\nCells **divide** in two.'));
      await documents.insert({
        id: 'doc-9',
        ownerId: 'user-1',
        originalFilename: 'mitosis.md',
        extension: 'md',
        mimeType: null,
        sizeBytes: 36,
        contentHash: 'hash',
        storageKey: 'user-1/doc-9.md',
        status: 'pending',
        text: null,
        error: null,
        wordCount: null,
        pageCount: null,
        createdAt: '2026-02-10T08:00:00.000Z',
        extractedAt: null,
      });

      const text = await service.getReadyText('user-1', 'doc-9');

      expect(text).toBe('Mitosis Cells divide in two.');
      expect((await documents.findById('doc-9'))?.status).toBe('success');
    });
  });

  describe('get', () => {
    it('should hide documents from other users', async () => {
      const document = await service.upload(PREMIUM, textFile(LESSON));

      await expect(service.get('user-2', document.id)).rejects.toBeInstanceOf(ForbiddenError);
      await expect(service.get('user-1', 'missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('delete', () => {
    it('should remove the record and the bytes', async () => {
      const document = await service.upload(PREMIUM, textFile(LESSON));

      await service.delete('user-1', document.id);

      expect(storage.files.size).toBe(0);
      await expect(service.get('user-1', document.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should keep documents that a quiz was generated from', async () => {
      const document = await service.upload(PREMIUM, textFile(LESSON));
      const quiz: Quiz = {
        id: 'quiz-1',
        ownerId: 'user-1',
        title: 'Cells',
        description: null,
        status: 'draft',
        isPublic: false,
        shareToken: null,
        difficulty: 'easy',
        questionTypes: ['true_false'],
        questions: [],
        source: { kind: 'document', documentId: document.id },
        generation: null,
        viewCount: 0,
        createdAt: '2026-02-10T09:00:00.000Z',
        updatedAt: '2026-02-10T09:00:00.000Z',
        publishedAt: null,
        archivedAt: null,
      };
      await quizzes.insert(quiz);

      const error = await service.delete('user-1', document.id).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty('message', 'Document is the source of 1 quiz and cannot be deleted');
      expect(storage.files.size).toBe(1);
    });
  });

  describe('list', () => {
    it('should page the owner documents', async () => {
      await service.upload(PREMIUM, textFile(LESSON, 'a.txt'));
      await service.upload(PREMIUM, textFile(LESSON, 'b.txt'));
      await service.upload({ id: 'user-2', plan: 'school' }, textFile(LESSON, 'c.txt'));

      const page = await service.list('user-1', 1, 1);

      expect(page).toMatchObject({ page: 1, perPage: 1, total: 2, pages: 2, hasNext: true, hasPrev: false });
      expect(page.items).toHaveLength(1);
    });
  });
});
