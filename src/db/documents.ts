/**
 * Documents Repository
 *
 * Metadata and extracted text of uploaded files. The bytes themselves are
 * kept by FileStorageService.
 */

import { query } from './index';
import { DocumentExtension, DOCUMENT_EXTENSIONS, ExtractionStatus, SourceDocument } from '../interfaces';
import { DocumentStore, PageSlice } from './stores';

export interface DbDocument {
  id: string;
  owner_id: string;
  original_filename: string;
  extension: string;
  mime_type: string | null;
  size_bytes: number;
  content_hash: string;
  storage_key: string;
  status: string;
  text: string | null;
  error: string | null;
  word_count: number | null;
  page_count: number | null;
  created_at: Date;
  extracted_at: Date | null;
}

function toExtension(value: string): DocumentExtension {
  const match = DOCUMENT_EXTENSIONS.find(ext => ext === value);
  if (!match) {
    throw new Error(`Unknown document extension in database: ${value}`);
  }
  return match;
}

function toStatus(value: string): ExtractionStatus {
  return value === 'success' || value === 'failed' ? value : 'pending';
}

export function toSourceDocument(row: DbDocument): SourceDocument {
  return {
    id: row.id,
    ownerId: row.owner_id,
    originalFilename: row.original_filename,
    extension: toExtension(row.extension),
    mimeType: row.mime_type,
    sizeBytes: row.size_bytes,
    contentHash: row.content_hash,
    storageKey: row.storage_key,
    status: toStatus(row.status),
    text: row.text,
    error: row.error,
    wordCount: row.word_count,
    pageCount: row.page_count,
    createdAt: row.created_at.toISOString(),
    extractedAt: row.extracted_at ? row.extracted_at.toISOString() : null,
  };
}

export async function insert(document: SourceDocument): Promise<SourceDocument> {
  const result = await query<DbDocument>(
    `INSERT INTO documents (
       id, owner_id, original_filename, extension, mime_type, size_bytes, content_hash,
       storage_key, status, text, error, word_count, page_count, created_at, extracted_at
     ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)
     RETURNING *`,
    [
      document.id,
      document.ownerId,
      document.originalFilename,
      document.extension,
      document.mimeType,
      document.sizeBytes,
      document.contentHash,
      document.storageKey,
      document.status,
      document.text,
      document.error,
      document.wordCount,
      document.pageCount,
      document.createdAt,
      document.extractedAt,
    ]
  );
  return toSourceDocument(result.rows[0]);
}

/**
 * Only extraction fields change after upload
 */
export async function update(document: SourceDocument): Promise<SourceDocument> {
  const result = await query<DbDocument>(
    `UPDATE documents
     SET status = $2, text = $3, error = $4, word_count = $5, page_count = $6, extracted_at = $7
     WHERE id = $1
     RETURNING *`,
    [
      document.id,
      document.status,
      document.text,
      document.error,
      document.wordCount,
      document.pageCount,
      document.extractedAt,
    ]
  );
  if (!result.rows[0]) {
    throw new Error(`Document ${document.id} does not exist`);
  }
  return toSourceDocument(result.rows[0]);
}

export async function findById(id: string): Promise<SourceDocument | null> {
  const result = await query<DbDocument>('SELECT * FROM documents WHERE id = $1', [id]);
  return result.rows[0] ? toSourceDocument(result.rows[0]) : null;
}

export async function listByOwner(
  ownerId: string,
  page: number,
  perPage: number
): Promise<PageSlice<SourceDocument>> {
  const [rows, count] = await Promise.all([
    query<DbDocument>(
      'SELECT * FROM documents WHERE owner_id = $1 ORDER BY created_at DESC LIMIT $2 OFFSET $3',
      [ownerId, perPage, (page - 1) * perPage]
    ),
    query<{ count: string }>('SELECT COUNT(*) AS count FROM documents WHERE owner_id = $1', [ownerId]),
  ]);

  return {
    items: rows.rows.map(toSourceDocument),
    total: parseInt(count.rows[0]?.count ?? '0', 10),
  };
}

export async function remove(id: string): Promise<boolean> {
  const result = await query('DELETE FROM documents WHERE id = $1', [id]);
  return (result.rowCount ?? 0) > 0;
}

export const postgresDocumentStore: DocumentStore = {
  insert,
  update,
  findById,
  listByOwner,
  delete: remove,
};
