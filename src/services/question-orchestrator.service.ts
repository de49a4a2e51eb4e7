import { Injectable, Logger } from '@nestjs/common';
import {
  BackendFailure,
  GenerationRequest,
  GenerationResult,
  Question,
  QuestionGenerator,
  QuestionType,
  isDifficulty,
  isQuestionType,
} from '../interfaces';
import { getAppConfig } from '../config/app.config';
import { GenerationFailedError, GenerationTimeoutError, ValidationError } from '../errors/app-errors';
import { dedupeQuestions, normalizeQuestion, normalizeQuestionText } from './question-normalizer';
import { OpenAIQuestionGenerator } from './generators/openai.generator';
import { AnthropicQuestionGenerator } from './generators/anthropic.generator';
import { HeuristicQuestionGenerator } from './generators/heuristic.generator';

export const MIN_SOURCE_CHARS = 100;
export const MAX_REQUESTED_QUESTIONS = 50;

/**
 * Questions wanted from each requested type
 */
interface TypeAllocation {
  type: QuestionType;
  count: number;
}

interface TypeOutcome {
  questions: Question[];
  backends: string[];
  failures: BackendFailure[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Count, types and difficulty; checked before any quota is taken
 */
export function validateGenerationOptions(
  options: Pick<GenerationRequest, 'requestedCount' | 'types' | 'difficulty'>,
): void {
  if (
    !Number.isInteger(options.requestedCount) ||
    options.requestedCount < 1 ||
    options.requestedCount > MAX_REQUESTED_QUESTIONS
  ) {
    throw new ValidationError(`Question count must be between 1 and ${MAX_REQUESTED_QUESTIONS}`, {
      field: 'requestedCount',
    });
  }
  if (!Array.isArray(options.types) || options.types.length === 0 || !options.types.every(isQuestionType)) {
    throw new ValidationError('At least one valid question type is required', { field: 'types' });
  }
  if (!isDifficulty(options.difficulty)) {
    throw new ValidationError('Difficulty must be easy, medium or hard', { field: 'difficulty' });
  }
}

export function validateSourceText(text: string): void {
  if (text.trim().length < MIN_SOURCE_CHARS) {
    throw new ValidationError(`Source text must be at least ${MIN_SOURCE_CHARS} characters`, {
      field: 'text',
    });
  }
}

export function validateGenerationRequest(request: GenerationRequest): void {
  validateSourceText(request.text);
  validateGenerationOptions(request);
}

/**
 * Split the count evenly over the types. The remainder goes to the
 * types listed first; types left with nothing are dropped.
 */
export function allocateCounts(requestedCount: number, types: QuestionType[]): TypeAllocation[] {
  const unique = [...new Set(types)];
  const base = Math.floor(requestedCount / unique.length);
  const remainder = requestedCount % unique.length;

  return unique
    .map((type, index) => ({ type, count: base + (index < remainder ? 1 : 0) }))
    .filter(allocation => allocation.count > 0);
}

/**
 * Question Generation Orchestrator
 *
 * Each requested type walks the backend chain (hosted models first, the
 * heuristic generator last) until its share of the count is filled.
 * A failing backend is recorded and the next one is tried. The whole call
 * runs under one deadline; passing it aborts in-flight requests.
 */
@Injectable()
export class QuestionOrchestratorService {
  private readonly logger = new Logger(QuestionOrchestratorService.name);
  private readonly generators: QuestionGenerator[];

  constructor(generators?: QuestionGenerator[]) {
    this.generators = generators || [
      new OpenAIQuestionGenerator(),
      new AnthropicQuestionGenerator(),
      new HeuristicQuestionGenerator(),
    ];
  }

  /**
   * Names of the backends that would be tried, in order
   */
  availableBackends(): string[] {
    return this.generators.filter(g => g.isAvailable()).map(g => g.name);
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    validateGenerationRequest(request);

    const generators = this.generators.filter(g => g.isAvailable());
    if (generators.length === 0) {
      throw new GenerationFailedError('No question generators are configured');
    }

    const timeoutMs = request.timeoutMs ?? getAppConfig().generationTimeoutMs;
    const controller = new AbortController();
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new GenerationTimeoutError(timeoutMs));
      }, timeoutMs);
    });

    try {
      const allocations = allocateCounts(request.requestedCount, request.types);
      const outcomes = await Promise.race([
        Promise.all(allocations.map(a => this.fillType(generators, request, a, controller.signal))),
        deadline,
      ]);

      const failures = outcomes.flatMap(o => o.failures);
      const questions = dedupeQuestions(outcomes.flatMap(o => o.questions)).slice(0, request.requestedCount);

      if (questions.length === 0) {
        this.logger.warn(`Generation produced no questions (${failures.length} backend failures)`);
        throw new GenerationFailedError('No questions could be generated from the source text', failures);
      }

      const backends = [...new Set(outcomes.flatMap(o => o.backends))];
      const durationMs = Date.now() - startTime;
      this.logger.log(
        `Generated ${questions.length}/${request.requestedCount} questions via ${backends.join(', ')} in ${durationMs}ms`,
      );

      return { questions, backends, failures, durationMs };
    } finally {
      clearTimeout(timer);
    }
  }

  private async fillType(
    generators: QuestionGenerator[],
    request: GenerationRequest,
    allocation: TypeAllocation,
    signal: AbortSignal,
  ): Promise<TypeOutcome> {
    const outcome: TypeOutcome = { questions: [], backends: [], failures: [] };
    const seen = new Set<string>();

    for (const generator of generators) {
      const remaining = allocation.count - outcome.questions.length;
      if (remaining <= 0 || signal.aborted) break;

      let raw: unknown[];
      try {
        raw = await generator.generate({
          text: request.text,
          type: allocation.type,
          count: remaining,
          difficulty: request.difficulty,
          signal,
        });
      } catch (error) {
        const message = errorMessage(error);
        this.logger.warn(`Backend ${generator.name} failed for ${allocation.type}: ${message}`);
        outcome.failures.push({ backend: generator.name, type: allocation.type, message });
        continue;
      }

      let accepted = 0;
      for (const item of raw) {
        if (accepted >= remaining) break;
        const question = normalizeQuestion(item, { type: allocation.type, difficulty: request.difficulty });
        // Backends sometimes label items with a type that was not asked for
        if (!question || question.type !== allocation.type) continue;

        const key = normalizeQuestionText(question.prompt);
        if (seen.has(key)) continue;
        seen.add(key);
        outcome.questions.push(question);
        accepted++;
      }

      if (accepted > 0) {
        outcome.backends.push(generator.name);
      }
    }

    return outcome;
  }
}
