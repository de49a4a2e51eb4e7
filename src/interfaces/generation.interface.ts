/**
 * Question generation contracts.
 *
 * Backends return raw, loosely shaped records. The orchestrator normalizes
 * them into `Question` values, so a backend never has to agree on key names.
 */

import { Difficulty, Question, QuestionType } from './quiz.interface';

export interface GeneratorRequest {
  text: string;
  type: QuestionType;
  count: number;
  difficulty: Difficulty;
  /** Aborted when the generation deadline passes */
  signal: AbortSignal;
}

export interface QuestionGenerator {
  readonly name: string;
  isAvailable(): boolean;
  generate(request: GeneratorRequest): Promise<unknown[]>;
}

export interface GenerationRequest {
  text: string;
  requestedCount: number;
  types: QuestionType[];
  difficulty: Difficulty;
  timeoutMs?: number;
}

export interface BackendFailure {
  backend: string;
  type: QuestionType;
  message: string;
}

export interface GenerationResult {
  questions: Question[];
  /** Backends that contributed at least one question */
  backends: string[];
  failures: BackendFailure[];
  durationMs: number;
}

export type GenerationJobStatus = 'pending' | 'running' | 'succeeded' | 'failed';

export interface GenerationJob {
  id: string;
  ownerId: string;
  status: GenerationJobStatus;
  quizId: string | null;
  error: { code: string; message: string } | null;
  createdAt: string;
  updatedAt: string;
}
