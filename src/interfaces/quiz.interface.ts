/**
 * Quiz and question model.
 *
 * A quiz owns an ordered list of questions. Questions are a tagged union on
 * `type`, so the shape of `correctAnswer` follows from the question kind.
 */

export type QuestionType = 'multiple_choice' | 'true_false' | 'short_answer' | 'essay';

export const QUESTION_TYPES: readonly QuestionType[] = [
  'multiple_choice',
  'true_false',
  'short_answer',
  'essay',
];

export type Difficulty = 'easy' | 'medium' | 'hard';

export const DIFFICULTIES: readonly Difficulty[] = ['easy', 'medium', 'hard'];

/**
 * Bloom's taxonomy level the question targets
 */
export type BloomLevel = 'remember' | 'understand' | 'apply' | 'analyze' | 'evaluate' | 'create';

export const BLOOM_LEVELS: readonly BloomLevel[] = [
  'remember',
  'understand',
  'apply',
  'analyze',
  'evaluate',
  'create',
];

export interface QuestionBase {
  id: string;
  prompt: string;
  difficulty: Difficulty;
  explanation: string | null;
  topic: string | null;
  keywords: string[] | null;
  bloomLevel: BloomLevel | null;
  /** Generator confidence in [0, 1] */
  confidence: number | null;
  /** Sentence of the source text the question was drawn from */
  sourceSentence: string | null;
}

export interface MultipleChoiceQuestion extends QuestionBase {
  type: 'multiple_choice';
  options: string[];
  /** Always one of `options` */
  correctAnswer: string;
}

export interface TrueFalseQuestion extends QuestionBase {
  type: 'true_false';
  correctAnswer: boolean;
}

export interface ShortAnswerQuestion extends QuestionBase {
  type: 'short_answer';
  correctAnswer: string;
}

export interface EssayQuestion extends QuestionBase {
  type: 'essay';
  /** Grading guidance, if the generator produced any */
  correctAnswer: string | null;
}

export type Question =
  | MultipleChoiceQuestion
  | TrueFalseQuestion
  | ShortAnswerQuestion
  | EssayQuestion;

export type QuizStatus = 'draft' | 'published' | 'archived';

export const QUIZ_STATUSES: readonly QuizStatus[] = ['draft', 'published', 'archived'];

export type QuizSource =
  | { kind: 'text'; text: string }
  | { kind: 'document'; documentId: string };

/**
 * Recorded with every generated quiz
 */
export interface GenerationMetadata {
  backends: string[];
  requestedCount: number;
  durationMs: number;
  attempts: number;
}

export interface Quiz {
  id: string;
  ownerId: string;
  title: string;
  description: string | null;
  status: QuizStatus;
  isPublic: boolean;
  /** Set only while published and public */
  shareToken: string | null;
  difficulty: Difficulty;
  questionTypes: QuestionType[];
  questions: Question[];
  source: QuizSource;
  generation: GenerationMetadata | null;
  viewCount: number;
  createdAt: string;
  updatedAt: string;
  publishedAt: string | null;
  archivedAt: string | null;
}

/**
 * Input accepted by the quiz generation pipeline.
 * Exactly one of `text` or `documentId` must be set.
 */
export interface GenerateQuizRequest {
  title: string;
  description?: string | null;
  text?: string;
  documentId?: string;
  requestedCount: number;
  types: QuestionType[];
  difficulty: Difficulty;
  isPublic?: boolean;
}

export interface QuizMetadataUpdate {
  title?: string;
  description?: string | null;
  difficulty?: Difficulty;
  isPublic?: boolean;
}

export interface QuizListQuery {
  page: number;
  perPage: number;
  status?: QuizStatus;
  search?: string;
}

export interface Page<T> {
  items: T[];
  page: number;
  perPage: number;
  total: number;
  pages: number;
  hasNext: boolean;
  hasPrev: boolean;
}

export type PublicQuestion =
  | Omit<MultipleChoiceQuestion, 'correctAnswer' | 'explanation' | 'confidence' | 'sourceSentence'>
  | Omit<TrueFalseQuestion, 'correctAnswer' | 'explanation' | 'confidence' | 'sourceSentence'>
  | Omit<ShortAnswerQuestion, 'correctAnswer' | 'explanation' | 'confidence' | 'sourceSentence'>
  | Omit<EssayQuestion, 'correctAnswer' | 'explanation' | 'confidence' | 'sourceSentence'>;

/**
 * What an anonymous visitor sees through a share token
 */
export interface PublicQuizView {
  id: string;
  title: string;
  description: string | null;
  difficulty: Difficulty;
  questionCount: number;
  questions: PublicQuestion[];
  publishedAt: string | null;
  viewCount: number;
}

export function isQuestionType(value: unknown): value is QuestionType {
  return typeof value === 'string' && QUESTION_TYPES.some(type => type === value);
}

export function isDifficulty(value: unknown): value is Difficulty {
  return typeof value === 'string' && DIFFICULTIES.some(level => level === value);
}

export function isBloomLevel(value: unknown): value is BloomLevel {
  return typeof value === 'string' && BLOOM_LEVELS.some(level => level === value);
}

export function isQuizStatus(value: unknown): value is QuizStatus {
  return typeof value === 'string' && QUIZ_STATUSES.some(status => status === value);
}
