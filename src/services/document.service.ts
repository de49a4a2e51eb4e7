/**
 * Document Service
 *
 * Upload, text extraction and lookup of lesson documents. Bytes go to file
 * storage, the record and its extracted text to the document store.
 * Extraction runs right after upload so generation can reuse the text.
 */

import { Injectable } from '@nestjs/common';
import { createHash, randomUUID } from 'crypto';
import { Page, Plan, SourceDocument, UploadedFile } from '../interfaces';
import { DocumentStore, QuizStore } from '../db/stores';
import { getRepositories } from '../db/repositories';
import { getAppConfig } from '../config/app.config';
import { planHasFeature } from '../config/plans';
import {
  ExtractionFailedError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../errors/app-errors';
import { FileStorage, LocalFileStorage } from './file-storage.service';
import { TextExtractorService, requireDocumentExtension } from './text-extractor.service';

export interface DocumentOwner {
  id: string;
  plan: Plan;
}

export interface DocumentServiceOptions {
  maxUploadBytes?: number;
  clock?: () => Date;
}

@Injectable()
export class DocumentService {
  private readonly documents: DocumentStore;
  private readonly quizzes: QuizStore;
  private readonly storage: FileStorage;
  private readonly extractor: TextExtractorService;
  private readonly maxUploadBytes: number;
  private readonly clock: () => Date;

  constructor(
    documents?: DocumentStore,
    quizzes?: QuizStore,
    storage?: FileStorage,
    extractor?: TextExtractorService,
    options: DocumentServiceOptions = {},
  ) {
    this.documents = documents || getRepositories().documents;
    this.quizzes = quizzes || getRepositories().quizzes;
    this.storage = storage || new LocalFileStorage();
    this.extractor = extractor || new TextExtractorService();
    this.maxUploadBytes = options.maxUploadBytes ?? getAppConfig().maxUploadBytes;
    this.clock = options.clock || (() => new Date());
  }

  /**
   * Store the file and extract its text. A document whose extraction
   * failed is still returned, with status `failed` and the reason.
   */
  async upload(owner: DocumentOwner, file: UploadedFile): Promise<SourceDocument> {
    if (!planHasFeature(owner.plan, 'document_upload')) {
      throw new ForbiddenError('Document upload requires a premium or school plan');
    }

    const extension = requireDocumentExtension(file.filename);
    if (file.data.length === 0) {
      throw new ValidationError('File is empty', { field: 'file' });
    }
    if (file.data.length > this.maxUploadBytes) {
      throw new ValidationError(`File exceeds the ${this.maxUploadBytes} byte upload limit`, {
        field: 'file',
        maxBytes: this.maxUploadBytes,
      });
    }

    const id = randomUUID();
    const storageKey = `${owner.id}/${id}.${extension}`;
    await this.storage.save(storageKey, file.data);

    const document = await this.documents.insert({
      id,
      ownerId: owner.id,
      originalFilename: file.filename,
      extension,
      mimeType: file.mimeType,
      sizeBytes: file.data.length,
      contentHash: createHash('sha256').update(file.data).digest('hex'),
      storageKey,
      status: 'pending',
      text: null,
      error: null,
      wordCount: null,
      pageCount: null,
      createdAt: this.clock().toISOString(),
      extractedAt: null,
    });
    console.log(`[DocumentService] Stored ${document.originalFilename} as ${document.id} (${document.sizeBytes} bytes)`);

    return this.runExtraction(document, file.data);
  }

  async get(ownerId: string, documentId: string): Promise<SourceDocument> {
    const document = await this.documents.findById(documentId);
    if (!document) {
      throw new NotFoundError('Document');
    }
    if (document.ownerId !== ownerId) {
      throw new ForbiddenError('You do not own this document');
    }
    return document;
  }

  async list(ownerId: string, page: number = 1, perPage: number = 20): Promise<Page<SourceDocument>> {
    const safePage = Math.max(1, Math.floor(page));
    const safePerPage = Math.min(100, Math.max(1, Math.floor(perPage)));
    const slice = await this.documents.listByOwner(ownerId, safePage, safePerPage);
    const pages = Math.ceil(slice.total / safePerPage);

    return {
      items: slice.items,
      page: safePage,
      perPage: safePerPage,
      total: slice.total,
      pages,
      hasNext: safePage < pages,
      hasPrev: safePage > 1,
    };
  }

  /**
   * Documents that a quiz was generated from are kept
   */
  async delete(ownerId: string, documentId: string): Promise<void> {
    const document = await this.get(ownerId, documentId);

    const references = await this.quizzes.countBySourceDocument(document.id);
    if (references > 0) {
      throw new ValidationError(
        `Document is the source of ${references} quiz${references === 1 ? '' : 'zes'} and cannot be deleted`,
        { references },
      );
    }

    await this.storage.remove(document.storageKey);
    await this.documents.delete(document.id);
    console.log(`[DocumentService] Deleted document ${document.id}`);
  }

  /**
   * Extracted text for generation. Pending documents are extracted now;
   * failed ones raise the recorded error.
   */
  async getReadyText(ownerId: string, documentId: string): Promise<string> {
    let document = await this.get(ownerId, documentId);

    if (document.status === 'pending') {
      document = await this.runExtraction(document, await this.storage.read(document.storageKey));
    }

    if (document.status === 'failed' || document.text === null) {
      throw new ExtractionFailedError(document.error ?? 'Text extraction failed');
    }
    return document.text;
  }

  private async runExtraction(document: SourceDocument, data: Buffer): Promise<SourceDocument> {
    try {
      const extracted = await this.extractor.extract(data, document.extension);
      return await this.documents.update({
        ...document,
        status: 'success',
        text: extracted.text,
        error: null,
        wordCount: extracted.wordCount,
        pageCount: extracted.pageCount,
        extractedAt: this.clock().toISOString(),
      });
    } catch (error) {
      if (!(error instanceof ExtractionFailedError)) {
        throw error;
      }
      console.warn(`[DocumentService] Extraction failed for ${document.id}: ${error.message}`);
      return this.documents.update({
        ...document,
        status: 'failed',
        text: null,
        error: error.message,
        extractedAt: this.clock().toISOString(),
      });
    }
  }
}
