import { Injectable, Logger } from '@nestjs/common';
import mammoth from 'mammoth';
import { DOCUMENT_EXTENSIONS, DocumentExtension, ExtractedText } from '../interfaces';
import { ExtractionFailedError, UnsupportedFormatError } from '../errors/app-errors';

export function isDocumentExtension(value: string): value is DocumentExtension {
  return DOCUMENT_EXTENSIONS.some(ext => ext === value);
}

/**
 * Lowercased extension without the dot; empty when there is none
 */
export function fileExtension(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot + 1).toLowerCase() : '';
}

export function requireDocumentExtension(filename: string): DocumentExtension {
  const ext = fileExtension(filename);
  if (!isDocumentExtension(ext)) {
    throw new UnsupportedFormatError(ext, DOCUMENT_EXTENSIONS);
  }
  return ext;
}

/**
 * Markdown syntax that carries no lesson content
 */
export function stripMarkdown(text: string): string {
  return text
    .replace(/^```.*$/gm, '')
    .replace(/!\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/\[([^\]]+)\]\([^)]*\)/g, '$1')
    .replace(/^\s{0,3}#{1,6}\s+/gm, '')
    .replace(/^\s{0,3}>\s?/gm, '')
    .replace(/^\s*(?:[-*+]|\d+\.)\s+/gm, '')
    .replace(/(\*\*|__)(.+?)\1/g, '$2')
    .replace(/\*(.+?)\*/g, '$1')
    .replace(/(^|\W)_(.+?)_(?=\W|$)/g, '$1$2')
    .replace(/`([^`]+)`/g, '$1');
}

export function cleanText(text: string): string {
  return text
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(word => word.length > 0).length;
}

/**
 * Text Extractor
 *
 * Raw text from txt, md, pdf and docx files. pdf-parse is loaded on first
 * use; it reads a bundled test file when required as a top-level module.
 */
@Injectable()
export class TextExtractorService {
  private readonly logger = new Logger(TextExtractorService.name);

  async extract(data: Buffer, extension: DocumentExtension): Promise<ExtractedText> {
    let parsed: { raw: string; pageCount: number | null };
    try {
      parsed = await this.parse(data, extension);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(`Failed to parse ${extension} document: ${message}`);
      throw new ExtractionFailedError(`Failed to parse ${extension} document: ${message}`);
    }

    const text = cleanText(parsed.raw);
    if (!text) {
      throw new ExtractionFailedError('No text could be extracted from the document');
    }

    return { text, wordCount: countWords(text), charCount: text.length, pageCount: parsed.pageCount };
  }

  /**
   * Validate the file name and extract in one step
   */
  async extractFile(filename: string, data: Buffer): Promise<ExtractedText> {
    return this.extract(data, requireDocumentExtension(filename));
  }

  private async parse(data: Buffer, extension: DocumentExtension): Promise<{ raw: string; pageCount: number | null }> {
    switch (extension) {
      case 'pdf': {
        const { default: parsePdf } = await import('pdf-parse');
        const result = await parsePdf(data);
        return { raw: result.text, pageCount: Math.max(1, result.numpages || 1) };
      }
      case 'docx': {
        const result = await mammoth.extractRawText({ buffer: data });
        return { raw: result.value, pageCount: null };
      }
      case 'md':
        return { raw: stripMarkdown(data.toString('utf-8')), pageCount: null };
      case 'txt':
        return { raw: data.toString('utf-8'), pageCount: null };
    }
  }
}
