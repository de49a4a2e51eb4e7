/**
 * Uploaded source documents and their extracted text
 */

export type DocumentExtension = 'txt' | 'md' | 'pdf' | 'docx';

export const DOCUMENT_EXTENSIONS: readonly DocumentExtension[] = ['txt', 'md', 'pdf', 'docx'];

export type ExtractionStatus = 'pending' | 'success' | 'failed';

export interface SourceDocument {
  id: string;
  ownerId: string;
  originalFilename: string;
  extension: DocumentExtension;
  mimeType: string | null;
  sizeBytes: number;
  /** sha-256 of the stored bytes, hex */
  contentHash: string;
  storageKey: string;
  status: ExtractionStatus;
  text: string | null;
  error: string | null;
  wordCount: number | null;
  pageCount: number | null;
  createdAt: string;
  extractedAt: string | null;
}

/**
 * A file as received from a multipart upload
 */
export interface UploadedFile {
  filename: string;
  mimeType: string | null;
  data: Buffer;
}

export interface ExtractedText {
  text: string;
  wordCount: number;
  charCount: number;
  pageCount: number | null;
}

export type ExtractionOutcome =
  | { status: 'success'; result: ExtractedText }
  | { status: 'failed'; error: string };
