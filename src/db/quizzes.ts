/**
 * Quizzes Repository
 *
 * A quiz row plus its ordered question rows. Writes replace the whole
 * question list inside one transaction.
 */

import { query, transaction, PoolClient } from './index';
import {
  GenerationMetadata,
  Question,
  QuestionBase,
  QuestionType,
  Quiz,
  QuizListQuery,
  QuizSource,
  isBloomLevel,
  isDifficulty,
  isQuestionType,
  isQuizStatus,
} from '../interfaces';
import { PageSlice, QuizStore } from './stores';

export interface DbQuiz {
  id: string;
  owner_id: string;
  title: string;
  description: string | null;
  status: string;
  is_public: boolean;
  share_token: string | null;
  difficulty: string;
  question_types: unknown;
  source_text: string | null;
  source_document_id: string | null;
  generation: unknown;
  view_count: number;
  created_at: Date;
  updated_at: Date;
  published_at: Date | null;
  archived_at: Date | null;
}

export interface DbQuestion {
  id: string;
  quiz_id: string;
  position: number;
  type: string;
  difficulty: string;
  prompt: string;
  options: unknown;
  correct_answer: string | null;
  explanation: string | null;
  topic: string | null;
  keywords: unknown;
  bloom_level: string | null;
  confidence: number | null;
  source_sentence: string | null;
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function toGeneration(value: unknown): GenerationMetadata | null {
  if (!isRecord(value)) return null;
  const { backends, requestedCount, durationMs, attempts } = value;
  if (typeof requestedCount !== 'number' || typeof durationMs !== 'number') return null;
  return {
    backends: stringArray(backends),
    requestedCount,
    durationMs,
    attempts: typeof attempts === 'number' ? attempts : 1,
  };
}

export function toQuestion(row: DbQuestion): Question {
  const type = row.type;
  if (!isQuestionType(type)) {
    throw new Error(`Unknown question type in database: ${type}`);
  }

  const base: QuestionBase = {
    id: row.id,
    prompt: row.prompt,
    difficulty: isDifficulty(row.difficulty) ? row.difficulty : 'medium',
    explanation: row.explanation,
    topic: row.topic,
    keywords: Array.isArray(row.keywords) ? stringArray(row.keywords) : null,
    bloomLevel: isBloomLevel(row.bloom_level) ? row.bloom_level : null,
    confidence: row.confidence,
    sourceSentence: row.source_sentence,
  };

  switch (type) {
    case 'multiple_choice':
      return { ...base, type: 'multiple_choice', options: stringArray(row.options), correctAnswer: row.correct_answer ?? '' };
    case 'true_false':
      return { ...base, type: 'true_false', correctAnswer: row.correct_answer === 'true' };
    case 'short_answer':
      return { ...base, type: 'short_answer', correctAnswer: row.correct_answer ?? '' };
    case 'essay':
      return { ...base, type: 'essay', correctAnswer: row.correct_answer };
  }
}

function serializeAnswer(question: Question): string | null {
  if (question.type === 'true_false') {
    return question.correctAnswer ? 'true' : 'false';
  }
  return question.correctAnswer;
}

export function toQuiz(row: DbQuiz, questionRows: DbQuestion[]): Quiz {
  const source: QuizSource = row.source_document_id
    ? { kind: 'document', documentId: row.source_document_id }
    : { kind: 'text', text: row.source_text ?? '' };

  return {
    id: row.id,
    ownerId: row.owner_id,
    title: row.title,
    description: row.description,
    status: isQuizStatus(row.status) ? row.status : 'draft',
    isPublic: row.is_public,
    shareToken: row.share_token,
    difficulty: isDifficulty(row.difficulty) ? row.difficulty : 'medium',
    questionTypes: stringArray(row.question_types).filter((t): t is QuestionType => isQuestionType(t)),
    questions: [...questionRows].sort((a, b) => a.position - b.position).map(toQuestion),
    source,
    generation: toGeneration(row.generation),
    viewCount: row.view_count,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
    publishedAt: row.published_at ? row.published_at.toISOString() : null,
    archivedAt: row.archived_at ? row.archived_at.toISOString() : null,
  };
}

function quizParams(quiz: Quiz): unknown[] {
  return [
    quiz.id,
    quiz.ownerId,
    quiz.title,
    quiz.description,
    quiz.status,
    quiz.isPublic,
    quiz.shareToken,
    quiz.difficulty,
    JSON.stringify(quiz.questionTypes),
    quiz.source.kind === 'text' ? quiz.source.text : null,
    quiz.source.kind === 'document' ? quiz.source.documentId : null,
    quiz.generation ? JSON.stringify(quiz.generation) : null,
    quiz.viewCount,
    quiz.createdAt,
    quiz.updatedAt,
    quiz.publishedAt,
    quiz.archivedAt,
  ];
}

async function writeQuestions(client: PoolClient, quiz: Quiz): Promise<void> {
  await client.query('DELETE FROM questions WHERE quiz_id = $1', [quiz.id]);

  for (const [position, question] of quiz.questions.entries()) {
    await client.query(
      `INSERT INTO questions (
         id, quiz_id, position, type, difficulty, prompt, options, correct_answer,
         explanation, topic, keywords, bloom_level, confidence, source_sentence
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)`,
      [
        question.id,
        quiz.id,
        position,
        question.type,
        question.difficulty,
        question.prompt,
        question.type === 'multiple_choice' ? JSON.stringify(question.options) : null,
        serializeAnswer(question),
        question.explanation,
        question.topic,
        question.keywords ? JSON.stringify(question.keywords) : null,
        question.bloomLevel,
        question.confidence,
        question.sourceSentence,
      ]
    );
  }
}

async function loadQuestions(quizIds: string[]): Promise<Map<string, DbQuestion[]>> {
  const grouped = new Map<string, DbQuestion[]>();
  if (quizIds.length === 0) return grouped;

  const result = await query<DbQuestion>(
    'SELECT * FROM questions WHERE quiz_id = ANY($1) ORDER BY quiz_id, position',
    [quizIds]
  );
  for (const row of result.rows) {
    const list = grouped.get(row.quiz_id) ?? [];
    list.push(row);
    grouped.set(row.quiz_id, list);
  }
  return grouped;
}

export async function insert(quiz: Quiz): Promise<Quiz> {
  await transaction(async (client) => {
    await client.query(
      `INSERT INTO quizzes (
         id, owner_id, title, description, status, is_public, share_token, difficulty,
         question_types, source_text, source_document_id, generation, view_count,
         created_at, updated_at, published_at, archived_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17)`,
      quizParams(quiz)
    );
    await writeQuestions(client, quiz);
  });
  return quiz;
}

export async function save(quiz: Quiz): Promise<Quiz> {
  await transaction(async (client) => {
    const result = await client.query(
      `UPDATE quizzes SET
         owner_id = $2, title = $3, description = $4, status = $5, is_public = $6,
         share_token = $7, difficulty = $8, question_types = $9, source_text = $10,
         source_document_id = $11, generation = $12, view_count = $13, created_at = $14,
         updated_at = $15, published_at = $16, archived_at = $17
       WHERE id = $1`,
      quizParams(quiz)
    );
    if (result.rowCount === 0) {
      throw new Error(`Quiz ${quiz.id} does not exist`);
    }
    await writeQuestions(client, quiz);
  });
  return quiz;
}

async function findOne(whereClause: string, value: string): Promise<Quiz | null> {
  const result = await query<DbQuiz>(`SELECT * FROM quizzes WHERE ${whereClause} = $1`, [value]);
  const row = result.rows[0];
  if (!row) return null;

  const questions = await loadQuestions([row.id]);
  return toQuiz(row, questions.get(row.id) ?? []);
}

export async function findById(id: string): Promise<Quiz | null> {
  return findOne('id', id);
}

export async function findByShareToken(token: string): Promise<Quiz | null> {
  return findOne('share_token', token);
}

export async function listByOwner(ownerId: string, listQuery: QuizListQuery): Promise<PageSlice<Quiz>> {
  const conditions = ['owner_id = $1'];
  const params: unknown[] = [ownerId];

  if (listQuery.status) {
    params.push(listQuery.status);
    conditions.push(`status = $${params.length}`);
  }
  if (listQuery.search && listQuery.search.trim()) {
    params.push(`%${listQuery.search.trim()}%`);
    conditions.push(`title ILIKE $${params.length}`);
  }

  const where = conditions.join(' AND ');
  const [rows, count] = await Promise.all([
    query<DbQuiz>(
      `SELECT * FROM quizzes WHERE ${where} ORDER BY created_at DESC LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, listQuery.perPage, (listQuery.page - 1) * listQuery.perPage]
    ),
    query<{ count: string }>(`SELECT COUNT(*) AS count FROM quizzes WHERE ${where}`, params),
  ]);

  const questions = await loadQuestions(rows.rows.map(r => r.id));

  return {
    items: rows.rows.map(row => toQuiz(row, questions.get(row.id) ?? [])),
    total: parseInt(count.rows[0]?.count ?? '0', 10),
  };
}

export async function incrementViewCount(id: string): Promise<number> {
  const result = await query<{ view_count: number }>(
    'UPDATE quizzes SET view_count = view_count + 1 WHERE id = $1 RETURNING view_count',
    [id]
  );
  return result.rows[0]?.view_count ?? 0;
}

export async function countBySourceDocument(documentId: string): Promise<number> {
  const result = await query<{ count: string }>(
    'SELECT COUNT(*) AS count FROM quizzes WHERE source_document_id = $1',
    [documentId]
  );
  return parseInt(result.rows[0]?.count ?? '0', 10);
}

export const postgresQuizStore: QuizStore = {
  insert,
  save,
  findById,
  findByShareToken,
  listByOwner,
  incrementViewCount,
  countBySourceDocument,
};
