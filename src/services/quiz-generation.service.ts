import { Injectable, Logger } from '@nestjs/common';
import {
  GenerateQuizRequest,
  GenerationJob,
  GenerationResult,
  QuotaReservation,
  Quiz,
  QuizSource,
} from '../interfaces';
import { GenerationTimeoutError, LimitExceededError, ValidationError } from '../errors/app-errors';
import { QuotaLedgerService } from './quota-ledger.service';
import { SubscriptionService } from './subscription.service';
import { DocumentService } from './document.service';
import {
  QuestionOrchestratorService,
  validateGenerationOptions,
  validateSourceText,
} from './question-orchestrator.service';
import { QuizService, validateTitle } from './quiz.service';
import { GenerationJobService } from './generation-job.service';

export const MAX_GENERATION_ATTEMPTS = 2;

/**
 * A request that passed validation and holds a quota unit
 */
interface ReservedRequest {
  userId: string;
  request: GenerateQuizRequest;
  reservation: QuotaReservation;
}

export function validateQuizRequest(request: GenerateQuizRequest): void {
  validateTitle(request.title);

  const hasText = typeof request.text === 'string' && request.text.trim() !== '';
  const hasDocument = typeof request.documentId === 'string' && request.documentId !== '';
  if (hasText === hasDocument) {
    throw new ValidationError('Provide either text or a document id', { field: 'text' });
  }
  if (hasText && request.text !== undefined) {
    validateSourceText(request.text);
  }

  validateGenerationOptions(request);
}

/**
 * Quiz Generation Pipeline
 *
 * validate → plan snapshot → quota reserve → source text → generate
 * (retried once on timeout) → persist. Any failure after the reservation
 * hands the quota unit back.
 */
@Injectable()
export class QuizGenerationService {
  private readonly logger = new Logger(QuizGenerationService.name);

  constructor(
    private readonly ledger: QuotaLedgerService,
    private readonly subscriptions: SubscriptionService,
    private readonly documents: DocumentService,
    private readonly orchestrator: QuestionOrchestratorService,
    private readonly quizzes: QuizService,
    private readonly jobs: GenerationJobService,
  ) {}

  async generateQuiz(userId: string, request: GenerateQuizRequest): Promise<Quiz> {
    const reserved = await this.reserve(userId, request);
    return this.complete(reserved);
  }

  /**
   * Validate and reserve now, generate in the background. Validation and
   * quota errors are thrown here rather than recorded on a job.
   */
  async enqueueQuiz(userId: string, request: GenerateQuizRequest): Promise<GenerationJob> {
    const reserved = await this.reserve(userId, request);
    return this.jobs.enqueue(userId, async () => (await this.complete(reserved)).id);
  }

  private async reserve(userId: string, request: GenerateQuizRequest): Promise<ReservedRequest> {
    validateQuizRequest(request);

    // Entitlement is read once; a billing event mid-request does not change it
    const plan = await this.subscriptions.getEffectivePlan(userId);

    const decision = await this.ledger.checkAndReserve(userId, plan);
    if (!decision.allowed) {
      throw new LimitExceededError(decision.used, decision.limit, decision.periodKey, decision.upgradeUrl);
    }

    return { userId, request, reservation: decision.reservation };
  }

  private async complete({ userId, request, reservation }: ReservedRequest): Promise<Quiz> {
    try {
      const { text, source } = await this.resolveSource(userId, request);
      const { result, attempts } = await this.generateWithRetry(text, request);

      return await this.quizzes.createFromGeneration({
        ownerId: userId,
        title: request.title,
        description: request.description,
        isPublic: request.isPublic,
        difficulty: request.difficulty,
        questionTypes: [...new Set(result.questions.map(q => q.type))],
        source,
        questions: result.questions,
        generation: {
          backends: result.backends,
          requestedCount: request.requestedCount,
          durationMs: result.durationMs,
          attempts,
        },
      });
    } catch (error) {
      await this.refund(reservation);
      throw error;
    }
  }

  private async resolveSource(
    userId: string,
    request: GenerateQuizRequest,
  ): Promise<{ text: string; source: QuizSource }> {
    if (request.documentId) {
      const text = await this.documents.getReadyText(userId, request.documentId);
      return { text, source: { kind: 'document', documentId: request.documentId } };
    }
    const text = request.text ?? '';
    return { text, source: { kind: 'text', text } };
  }

  private async generateWithRetry(
    text: string,
    request: GenerateQuizRequest,
  ): Promise<{ result: GenerationResult; attempts: number }> {
    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.orchestrator.generate({
          text,
          requestedCount: request.requestedCount,
          types: request.types,
          difficulty: request.difficulty,
        });
        return { result, attempts: attempt };
      } catch (error) {
        if (!(error instanceof GenerationTimeoutError) || attempt >= MAX_GENERATION_ATTEMPTS) {
          throw error;
        }
        this.logger.warn(`Generation attempt ${attempt} timed out, retrying`);
      }
    }
  }

  private async refund(reservation: QuotaReservation): Promise<void> {
    try {
      await this.ledger.refund(reservation);
    } catch (refundError) {
      this.logger.error(
        `Failed to refund quota for ${reservation.userId} in ${reservation.periodKey}`,
        refundError instanceof Error ? refundError.stack : String(refundError),
      );
    }
  }
}
