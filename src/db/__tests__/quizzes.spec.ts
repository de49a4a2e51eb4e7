/**
 * Tests for the Quizzes Repository
 *
 * Edge cases covered:
 * - Question rows come back in position order whatever the row order
 * - True/false answers round-trip through the text column
 * - List filters add numbered parameters in order
 */

import * as quizzes from '../quizzes';
import * as db from '../index';
import { Quiz } from '../../interfaces';

jest.mock('../index');

const mockQuery = db.query as jest.MockedFunction<typeof db.query>;
const mockTransaction = db.transaction as jest.MockedFunction<typeof db.transaction>;

function result<T extends object>(rows: T[]) {
  return { rows, command: 'SELECT', rowCount: rows.length, oid: 0, fields: [] };
}

const created = new Date('2026-03-01T09:00:00Z');

const quizRow: quizzes.DbQuiz = {
  id: 'quiz-1',
  owner_id: 'user-1',
  title: 'Cells',
  description: null,
  status: 'published',
  is_public: true,
  share_token: 'share-abc',
  difficulty: 'easy',
  question_types: ['true_false', 'multiple_choice', 'bogus'],
  source_text: null,
  source_document_id: 'doc-1',
  generation: { backends: ['heuristic'], requestedCount: 2, durationMs: 40 },
  view_count: 3,
  created_at: created,
  updated_at: created,
  published_at: created,
  archived_at: null,
};

const questionRow = (overrides: Partial<quizzes.DbQuestion>): quizzes.DbQuestion => ({
  id: 'q-1',
  quiz_id: 'quiz-1',
  position: 0,
  type: 'true_false',
  difficulty: 'easy',
  prompt: 'The nucleus holds DNA.',
  options: null,
  correct_answer: 'true',
  explanation: null,
  topic: null,
  keywords: null,
  bloom_level: 'remember',
  confidence: 0.7,
  source_sentence: null,
  ...overrides,
});

describe('Quizzes Repository', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('toQuiz', () => {
    it('should map rows and order questions by position', () => {
      const quiz = quizzes.toQuiz(quizRow, [
        questionRow({ id: 'q-2', position: 1, type: 'multiple_choice', options: ['A', 'B'], correct_answer: 'B' }),
        questionRow({ id: 'q-1', position: 0, correct_answer: 'false' }),
      ]);

      expect(quiz.questions.map(q => q.id)).toEqual(['q-1', 'q-2']);
      expect(quiz.questions[0]).toMatchObject({ type: 'true_false', correctAnswer: false });
      expect(quiz.questions[1]).toMatchObject({ type: 'multiple_choice', options: ['A', 'B'], correctAnswer: 'B' });
      expect(quiz.source).toEqual({ kind: 'document', documentId: 'doc-1' });
      expect(quiz.questionTypes).toEqual(['true_false', 'multiple_choice']);
      expect(quiz.generation).toEqual({ backends: ['heuristic'], requestedCount: 2, durationMs: 40, attempts: 1 });
      expect(quiz.publishedAt).toBe('2026-03-01T09:00:00.000Z');
    });

    it('should reject unknown question types', () => {
      expect(() => quizzes.toQuestion(questionRow({ type: 'matching' }))).toThrow(
        'Unknown question type in database: matching',
      );
    });
  });

  describe('findById', () => {
    it('should load the quiz and its questions', async () => {
      mockQuery.mockResolvedValueOnce(result([quizRow])).mockResolvedValueOnce(result([questionRow({})]));

      const quiz = await quizzes.findById('quiz-1');

      expect(quiz?.questions).toHaveLength(1);
      expect(mockQuery.mock.calls[1]).toEqual([
        'SELECT * FROM questions WHERE quiz_id = ANY($1) ORDER BY quiz_id, position',
        [['quiz-1']],
      ]);
    });

    it('should return null without querying questions', async () => {
      mockQuery.mockResolvedValueOnce(result([]));

      expect(await quizzes.findById('missing')).toBeNull();
      expect(mockQuery).toHaveBeenCalledTimes(1);
    });
  });

  describe('listByOwner', () => {
    it('should number filter parameters in order', async () => {
      mockQuery.mockResolvedValueOnce(result([])).mockResolvedValueOnce(result([{ count: '7' }]));

      const page = await quizzes.listByOwner('user-1', { page: 2, perPage: 5, status: 'draft', search: ' cell ' });

      expect(page).toEqual({ items: [], total: 7 });
      const [listSql, listParams] = mockQuery.mock.calls[0];
      expect(listSql).toBe(
        'SELECT * FROM quizzes WHERE owner_id = $1 AND status = $2 AND title ILIKE $3 ORDER BY created_at DESC LIMIT $4 OFFSET $5',
      );
      expect(listParams).toEqual(['user-1', 'draft', '%cell%', 5, 5]);
      expect(mockQuery.mock.calls[1][1]).toEqual(['user-1', 'draft', '%cell%']);
    });
  });

  describe('save', () => {
    const mockClient = {
      query: jest.fn(),
    };

    beforeEach(() => {
      mockTransaction.mockImplementation(async (callback) => {
        return callback(mockClient as any);
      });
    });

    it('should replace the question rows', async () => {
      const quiz: Quiz = quizzes.toQuiz(quizRow, [questionRow({})]);
      mockClient.query.mockResolvedValue({ rowCount: 1, rows: [] });

      await quizzes.save(quiz);

      expect(mockClient.query.mock.calls[1]).toEqual(['DELETE FROM questions WHERE quiz_id = $1', ['quiz-1']]);
      const insertParams = mockClient.query.mock.calls[2][1];
      expect(insertParams.slice(0, 4)).toEqual(['q-1', 'quiz-1', 0, 'true_false']);
      expect(insertParams[7]).toBe('true');
    });

    it('should fail when the quiz row is gone', async () => {
      const quiz: Quiz = quizzes.toQuiz(quizRow, []);
      mockClient.query.mockResolvedValueOnce({ rowCount: 0, rows: [] });

      await expect(quizzes.save(quiz)).rejects.toThrow('Quiz quiz-1 does not exist');
    });
  });
});
