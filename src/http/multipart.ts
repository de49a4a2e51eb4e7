/**
 * Single-file multipart uploads
 */

import * as http from 'http';
import busboy from 'busboy';
import { UploadedFile } from '../interfaces';
import { ValidationError } from '../errors/app-errors';

export const UPLOAD_FIELD = 'file';

/**
 * Read the `file` field of a multipart/form-data request into memory.
 * Other fields are ignored; a file over `maxBytes` is rejected.
 */
export function readUploadedFile(req: http.IncomingMessage, maxBytes: number): Promise<UploadedFile> {
  const contentType = req.headers['content-type'] ?? '';
  if (!contentType.toLowerCase().startsWith('multipart/form-data')) {
    return Promise.reject(new ValidationError('Expected a multipart/form-data upload'));
  }

  return new Promise((resolve, reject) => {
    let parser: busboy.Busboy;
    try {
      parser = busboy({ headers: req.headers, limits: { files: 1, fileSize: maxBytes } });
    } catch (error) {
      reject(new ValidationError(error instanceof Error ? error.message : 'Malformed multipart request'));
      return;
    }

    let file: UploadedFile | null = null;
    let failure: Error | null = null;

    parser.on('file', (name, stream, info) => {
      if (name !== UPLOAD_FIELD) {
        stream.resume();
        return;
      }

      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('limit', () => {
        failure = new ValidationError(`File exceeds the ${maxBytes} byte upload limit`, {
          field: UPLOAD_FIELD,
          maxBytes,
        });
      });
      stream.on('end', () => {
        file = {
          filename: info.filename || '',
          mimeType: info.mimeType || null,
          data: Buffer.concat(chunks),
        };
      });
    });

    parser.on('error', (error: unknown) => {
      reject(new ValidationError(error instanceof Error ? error.message : 'Malformed multipart request'));
    });

    parser.on('close', () => {
      if (failure) {
        reject(failure);
      } else if (!file) {
        reject(new ValidationError(`Missing "${UPLOAD_FIELD}" field`, { field: UPLOAD_FIELD }));
      } else {
        resolve(file);
      }
    });

    req.pipe(parser);
  });
}
