/**
 * JSON bodies to typed requests. Shape errors become ValidationError;
 * range and business rules are left to the services.
 */

import {
  Difficulty,
  GenerateQuizRequest,
  QuestionType,
  QuizListQuery,
  QuizMetadataUpdate,
  QuizStatus,
  SourceDocument,
  isDifficulty,
  isQuestionType,
  isQuizStatus,
} from '../interfaces';
import { ValidationError } from '../errors/app-errors';
import { JsonObject, optionalBoolean, optionalString, queryInt } from './request-utils';

export const DEFAULT_QUESTION_COUNT = 10;
export const DEFAULT_QUESTION_TYPES: QuestionType[] = ['multiple_choice', 'true_false'];
export const DEFAULT_DIFFICULTY: Difficulty = 'medium';

function readQuestionTypes(value: unknown): QuestionType[] {
  if (value === undefined) return [...DEFAULT_QUESTION_TYPES];
  if (!Array.isArray(value)) {
    throw new ValidationError('At least one valid question type is required', { field: 'types' });
  }

  const types: QuestionType[] = [];
  for (const item of value) {
    if (!isQuestionType(item)) {
      throw new ValidationError(`Unknown question type: ${String(item)}`, { field: 'types' });
    }
    types.push(item);
  }
  return types;
}

function readDifficulty(value: unknown, fallback: Difficulty): Difficulty;
function readDifficulty(value: unknown, fallback?: undefined): Difficulty | undefined;
function readDifficulty(value: unknown, fallback?: Difficulty): Difficulty | undefined {
  if (value === undefined) return fallback;
  if (!isDifficulty(value)) {
    throw new ValidationError('Difficulty must be easy, medium or hard', { field: 'difficulty' });
  }
  return value;
}

function readDescription(body: JsonObject): string | null | undefined {
  const value = body.description;
  if (value === undefined || value === null || typeof value === 'string') return value;
  throw new ValidationError('Description must be a string', { field: 'description' });
}

/**
 * `POST /api/quizzes`. The source is `text` or `fileId`.
 */
export function readGenerateQuizRequest(body: JsonObject): GenerateQuizRequest {
  const count = body.requestedCount;

  return {
    title: optionalString(body, 'title') ?? '',
    description: readDescription(body),
    text: optionalString(body, 'text'),
    documentId: optionalString(body, 'fileId'),
    // Non-numbers fail the count check downstream
    requestedCount: count === undefined ? DEFAULT_QUESTION_COUNT : typeof count === 'number' ? count : NaN,
    types: readQuestionTypes(body.types),
    difficulty: readDifficulty(body.difficulty, DEFAULT_DIFFICULTY),
    isPublic: optionalBoolean(body, 'isPublic'),
  };
}

export function readMetadataUpdate(body: JsonObject): QuizMetadataUpdate {
  const update: QuizMetadataUpdate = {};

  if (body.title !== undefined) {
    if (typeof body.title !== 'string') {
      throw new ValidationError('Title must be a string', { field: 'title' });
    }
    update.title = body.title;
  }

  const description = readDescription(body);
  if (description !== undefined) update.description = description;

  const difficulty = readDifficulty(body.difficulty);
  if (difficulty) update.difficulty = difficulty;

  if (body.isPublic !== undefined) {
    if (typeof body.isPublic !== 'boolean') {
      throw new ValidationError('isPublic must be a boolean', { field: 'isPublic' });
    }
    update.isPublic = body.isPublic;
  }

  return update;
}

export function readQuestionOrder(body: JsonObject): string[] {
  const ids = body.questionIds;
  if (!Array.isArray(ids) || !ids.every((id): id is string => typeof id === 'string')) {
    throw new ValidationError('questionIds must be an array of question ids', { field: 'questionIds' });
  }
  return ids;
}

export function readQuizListQuery(params: URLSearchParams): Partial<QuizListQuery> {
  const rawStatus = params.get('status');
  let status: QuizStatus | undefined;
  if (rawStatus !== null) {
    if (!isQuizStatus(rawStatus)) {
      throw new ValidationError('Status must be draft, published or archived', { field: 'status' });
    }
    status = rawStatus;
  }

  return {
    page: queryInt(params, 'page'),
    perPage: queryInt(params, 'perPage'),
    status,
    search: params.get('search') ?? undefined,
  };
}

export type DocumentView = Omit<SourceDocument, 'storageKey' | 'text'> & { text?: string | null };

/**
 * Storage keys stay server-side; text only on the single-document read
 */
export function toDocumentView(document: SourceDocument, includeText: boolean = false): DocumentView {
  const { storageKey: _storageKey, text, ...rest } = document;
  return includeText ? { ...rest, text } : rest;
}
