import { Injectable, Logger } from '@nestjs/common';
import { randomBytes, randomUUID } from 'crypto';
import {
  Difficulty,
  GenerationMetadata,
  Page,
  PublicQuestion,
  PublicQuizView,
  Question,
  QuestionBase,
  QuestionType,
  Quiz,
  QuizListQuery,
  QuizMetadataUpdate,
  QuizSource,
  isDifficulty,
} from '../interfaces';
import { QuizStore } from '../db/stores';
import { getRepositories } from '../db/repositories';
import { ForbiddenError, NotFoundError, ValidationError } from '../errors/app-errors';
import { assertEditable, assertTransition } from './quiz-lifecycle';
import { normalizeQuestion, normalizeQuestionText, questionToRaw } from './question-normalizer';

export const MAX_TITLE_LENGTH = 200;
export const DEFAULT_PER_PAGE = 20;
export const MAX_PER_PAGE = 100;

export interface NewQuizInput {
  ownerId: string;
  title: string;
  description?: string | null;
  isPublic?: boolean;
  difficulty: Difficulty;
  questionTypes: QuestionType[];
  source: QuizSource;
  questions: Question[];
  generation: GenerationMetadata | null;
}

// API field names accepted when editing a question, mapped to the keys
// normalizeQuestion reads first
const EDITABLE_QUESTION_FIELDS: Record<string, string> = {
  type: 'type',
  prompt: 'question',
  question: 'question',
  difficulty: 'difficulty',
  options: 'options',
  correctAnswer: 'correct_answer',
  correct_answer: 'correct_answer',
  explanation: 'explanation',
  topic: 'topic',
  keywords: 'keywords',
  bloomLevel: 'bloom_level',
  bloom_level: 'bloom_level',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateTitle(title: unknown): string {
  const trimmed = typeof title === 'string' ? title.trim() : '';
  if (!trimmed) {
    throw new ValidationError('Title is required', { field: 'title' });
  }
  if (trimmed.length > MAX_TITLE_LENGTH) {
    throw new ValidationError(`Title must be at most ${MAX_TITLE_LENGTH} characters`, { field: 'title' });
  }
  return trimmed;
}

function cleanDescription(description: string | null | undefined): string | null {
  const trimmed = description?.trim();
  return trimmed ? trimmed : null;
}

export function mintShareToken(): string {
  return randomBytes(24).toString('base64url');
}

function toPublicQuestion(question: Question): PublicQuestion {
  const base: Omit<QuestionBase, 'explanation' | 'confidence' | 'sourceSentence'> = {
    id: question.id,
    prompt: question.prompt,
    difficulty: question.difficulty,
    topic: question.topic,
    keywords: question.keywords,
    bloomLevel: question.bloomLevel,
  };

  switch (question.type) {
    case 'multiple_choice':
      return { ...base, type: question.type, options: [...question.options] };
    case 'true_false':
      return { ...base, type: question.type };
    case 'short_answer':
      return { ...base, type: question.type };
    case 'essay':
      return { ...base, type: question.type };
  }
}

/**
 * Quiz view for anonymous visitors: no answers, explanations or
 * generator internals
 */
export function toPublicQuizView(quiz: Quiz): PublicQuizView {
  return {
    id: quiz.id,
    title: quiz.title,
    description: quiz.description,
    difficulty: quiz.difficulty,
    questionCount: quiz.questions.length,
    questions: quiz.questions.map(toPublicQuestion),
    publishedAt: quiz.publishedAt,
    viewCount: quiz.viewCount,
  };
}

/**
 * Quiz aggregate
 *
 * Owns the quiz record and its ordered questions. Every mutation loads the
 * quiz, checks ownership and status, then saves the whole aggregate.
 */
@Injectable()
export class QuizService {
  private readonly logger = new Logger(QuizService.name);
  private readonly store: QuizStore;
  private readonly clock: () => Date;

  constructor(store?: QuizStore, clock?: () => Date) {
    this.store = store || getRepositories().quizzes;
    this.clock = clock || (() => new Date());
  }

  async createFromGeneration(input: NewQuizInput): Promise<Quiz> {
    const now = this.clock().toISOString();
    const quiz: Quiz = {
      id: randomUUID(),
      ownerId: input.ownerId,
      title: validateTitle(input.title),
      description: cleanDescription(input.description),
      status: 'draft',
      isPublic: input.isPublic ?? false,
      shareToken: null,
      difficulty: input.difficulty,
      questionTypes: [...input.questionTypes],
      questions: input.questions,
      source: input.source,
      generation: input.generation,
      viewCount: 0,
      createdAt: now,
      updatedAt: now,
      publishedAt: null,
      archivedAt: null,
    };

    const saved = await this.store.insert(quiz);
    this.logger.log(`Quiz ${saved.id} created with ${saved.questions.length} questions`);
    return saved;
  }

  /**
   * Load a quiz on behalf of its owner
   */
  async getOwned(ownerId: string, quizId: string): Promise<Quiz> {
    const quiz = await this.store.findById(quizId);
    if (!quiz) {
      throw new NotFoundError('Quiz');
    }
    if (quiz.ownerId !== ownerId) {
      throw new ForbiddenError('You do not own this quiz');
    }
    return quiz;
  }

  async list(ownerId: string, query: Partial<QuizListQuery> = {}): Promise<Page<Quiz>> {
    const page = Math.max(1, Math.floor(query.page ?? 1));
    const perPage = Math.min(MAX_PER_PAGE, Math.max(1, Math.floor(query.perPage ?? DEFAULT_PER_PAGE)));

    const slice = await this.store.listByOwner(ownerId, {
      page,
      perPage,
      status: query.status,
      search: query.search?.trim() || undefined,
    });

    const pages = Math.ceil(slice.total / perPage);
    return {
      items: slice.items,
      page,
      perPage,
      total: slice.total,
      pages,
      hasNext: page < pages,
      hasPrev: page > 1,
    };
  }

  async updateMetadata(ownerId: string, quizId: string, update: QuizMetadataUpdate): Promise<Quiz> {
    const quiz = await this.getOwned(ownerId, quizId);
    assertEditable(quiz.status);

    if (update.title !== undefined) {
      quiz.title = validateTitle(update.title);
    }
    if (update.description !== undefined) {
      quiz.description = cleanDescription(update.description);
    }
    if (update.difficulty !== undefined) {
      if (!isDifficulty(update.difficulty)) {
        throw new ValidationError('Difficulty must be easy, medium or hard', { field: 'difficulty' });
      }
      quiz.difficulty = update.difficulty;
    }
    if (update.isPublic !== undefined && update.isPublic !== quiz.isPublic) {
      quiz.isPublic = update.isPublic;
      // Sharing follows the flag while published
      if (quiz.status === 'published') {
        quiz.shareToken = quiz.isPublic ? mintShareToken() : null;
      }
    }

    return this.save(quiz);
  }

  /**
   * `questionIds` must list every question of the quiz exactly once
   */
  async reorderQuestions(ownerId: string, quizId: string, questionIds: string[]): Promise<Quiz> {
    const quiz = await this.getOwned(ownerId, quizId);
    assertEditable(quiz.status);

    const byId = new Map(quiz.questions.map(q => [q.id, q]));
    const unique = new Set(questionIds);
    if (unique.size !== questionIds.length || questionIds.length !== quiz.questions.length) {
      throw new ValidationError('Question order must list every question exactly once');
    }

    const reordered: Question[] = [];
    for (const id of questionIds) {
      const question = byId.get(id);
      if (!question) {
        throw new ValidationError(`Unknown question id: ${id}`);
      }
      reordered.push(question);
    }

    quiz.questions = reordered;
    return this.save(quiz);
  }

  async addQuestion(ownerId: string, quizId: string, raw: unknown): Promise<Quiz> {
    const quiz = await this.getOwned(ownerId, quizId);
    assertEditable(quiz.status);

    const question = normalizeQuestion(raw, {
      type: quiz.questionTypes[0] ?? 'short_answer',
      difficulty: quiz.difficulty,
    });
    if (!question) {
      throw new ValidationError('Question is missing a prompt or a valid answer');
    }
    this.assertUniquePrompt(quiz, question);

    quiz.questions.push(question);
    if (!quiz.questionTypes.includes(question.type)) {
      quiz.questionTypes.push(question.type);
    }
    return this.save(quiz);
  }

  /**
   * Merge the changed fields into the question and re-validate it as a whole
   */
  async updateQuestion(ownerId: string, quizId: string, questionId: string, patch: unknown): Promise<Quiz> {
    if (!isRecord(patch)) {
      throw new ValidationError('Question update must be an object');
    }

    const quiz = await this.getOwned(ownerId, quizId);
    assertEditable(quiz.status);

    const index = quiz.questions.findIndex(q => q.id === questionId);
    if (index < 0) {
      throw new NotFoundError('Question');
    }
    const existing = quiz.questions[index];

    const merged = questionToRaw(existing);
    for (const [field, value] of Object.entries(patch)) {
      if (Object.hasOwn(EDITABLE_QUESTION_FIELDS, field)) {
        merged[EDITABLE_QUESTION_FIELDS[field]] = value;
      }
    }

    const updated = normalizeQuestion(merged, {
      type: existing.type,
      difficulty: existing.difficulty,
      id: existing.id,
    });
    if (!updated) {
      throw new ValidationError('Question is missing a prompt or a valid answer');
    }
    this.assertUniquePrompt(quiz, updated);

    quiz.questions[index] = updated;
    return this.save(quiz);
  }

  async removeQuestion(ownerId: string, quizId: string, questionId: string): Promise<Quiz> {
    const quiz = await this.getOwned(ownerId, quizId);
    assertEditable(quiz.status);

    const remaining = quiz.questions.filter(q => q.id !== questionId);
    if (remaining.length === quiz.questions.length) {
      throw new NotFoundError('Question');
    }
    if (remaining.length === 0 && quiz.status === 'published') {
      throw new ValidationError('A published quiz must keep at least one question');
    }

    quiz.questions = remaining;
    return this.save(quiz);
  }

  async publish(ownerId: string, quizId: string): Promise<Quiz> {
    const quiz = await this.getOwned(ownerId, quizId);
    assertTransition(quiz.status, 'published');

    if (quiz.questions.length === 0) {
      throw new ValidationError('A quiz needs at least one question to be published');
    }

    quiz.status = 'published';
    quiz.publishedAt = this.clock().toISOString();
    quiz.shareToken = quiz.isPublic ? mintShareToken() : null;

    const saved = await this.save(quiz);
    this.logger.log(`Quiz ${quiz.id} published${quiz.isPublic ? ' with a share link' : ''}`);
    return saved;
  }

  async archive(ownerId: string, quizId: string): Promise<Quiz> {
    const quiz = await this.getOwned(ownerId, quizId);
    assertTransition(quiz.status, 'archived');

    quiz.status = 'archived';
    quiz.archivedAt = this.clock().toISOString();
    quiz.shareToken = null;

    const saved = await this.save(quiz);
    this.logger.log(`Quiz ${quiz.id} archived`);
    return saved;
  }

  /**
   * Public read through a share token. Counts the view.
   */
  async getShared(shareToken: string): Promise<PublicQuizView> {
    const quiz = shareToken ? await this.store.findByShareToken(shareToken) : null;
    if (!quiz || quiz.status !== 'published' || !quiz.isPublic) {
      throw new NotFoundError('Quiz');
    }

    quiz.viewCount = await this.store.incrementViewCount(quiz.id);
    return toPublicQuizView(quiz);
  }

  private assertUniquePrompt(quiz: Quiz, question: Question): void {
    const key = normalizeQuestionText(question.prompt);
    const clash = quiz.questions.some(q => q.id !== question.id && normalizeQuestionText(q.prompt) === key);
    if (clash) {
      throw new ValidationError('The quiz already has this question');
    }
  }

  private save(quiz: Quiz): Promise<Quiz> {
    quiz.updatedAt = this.clock().toISOString();
    return this.store.save(quiz);
  }
}
