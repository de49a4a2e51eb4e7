/**
 * End-to-end generation flow with real services and in-memory stores.
 * Only the hosted model backends are left out.
 */

import 'reflect-metadata';
import { QuotaLedgerService, InMemoryUsageCounterStore } from '../services/quota-ledger.service';
import Stripe from 'stripe';
import { STRIPE_API_VERSION, SubscriptionService } from '../services/subscription.service';
import { DocumentService } from '../services/document.service';
import { QuestionOrchestratorService } from '../services/question-orchestrator.service';
import { QuizService } from '../services/quiz.service';
import { GenerationJobService } from '../services/generation-job.service';
import { QuizGenerationService } from '../services/quiz-generation.service';
import { HeuristicQuestionGenerator } from '../services/generators/heuristic.generator';
import { TextExtractorService } from '../services/text-extractor.service';
import { FileStorage } from '../services/file-storage.service';
import {
  InMemoryDocumentStore,
  InMemoryQuizStore,
  InMemorySubscriptionStore,
  InMemoryUserStore,
} from '../db/memory-stores';
import { LimitExceededError } from '../errors/app-errors';
import { GenerateQuizRequest } from '../interfaces';

const LESSON =
  'Photosynthesis converts light energy into chemical energy. ' +
  'Chlorophyll absorbs light energy inside the chloroplast. ' +
  'The chloroplast is the site of photosynthesis in plant cells. ' +
  'Glucose is produced during photosynthesis and stored as starch. ' +
  'Oxygen is released as a byproduct of photosynthesis.';

class NullStorage implements FileStorage {
  async save(): Promise<void> {}
  async read(): Promise<Buffer> {
    return Buffer.alloc(0);
  }
  async remove(): Promise<void> {}
}

describe('Quiz generation E2E', () => {
  const clock = () => new Date('2026-03-14T10:00:00.000Z');
  let ledger: QuotaLedgerService;
  let quizzes: QuizService;
  let pipeline: QuizGenerationService;
  let userId: string;

  const request: GenerateQuizRequest = {
    title: 'Photosynthesis basics',
    text: LESSON,
    requestedCount: 5,
    types: ['multiple_choice', 'true_false'],
    difficulty: 'medium',
  };

  beforeEach(async () => {
    const users = new InMemoryUserStore();
    const quizStore = new InMemoryQuizStore();
    const billing = {
      stripeSecretKey: null,
      stripeWebhookSecret: null,
      priceToPlan: {},
      checkoutSuccessUrl: 'http://localhost:3000/billing/success',
      checkoutCancelUrl: 'http://localhost:3000/pricing',
    };

    ledger = new QuotaLedgerService(new InMemoryUsageCounterStore(), clock);
    quizzes = new QuizService(quizStore, clock);
    pipeline = new QuizGenerationService(
      ledger,
      new SubscriptionService(
        new InMemorySubscriptionStore(),
        users,
        new Stripe('test-secret', { apiVersion: STRIPE_API_VERSION }),
        billing,
      ),
      new DocumentService(new InMemoryDocumentStore(), quizStore, new NullStorage(), new TextExtractorService(), {
        clock,
      }),
      new QuestionOrchestratorService([new HeuristicQuestionGenerator()]),
      quizzes,
      new GenerationJobService(clock),
    );

    userId = (await users.create({ email: 'free@example.com', name: 'Free User', passwordHash: 'hash' })).id;

    // Four quizzes already generated this month
    for (let i = 0; i < 4; i++) {
      await ledger.checkAndReserve(userId, 'free');
    }
  });

  it('should generate the fifth quiz of the month as a draft', async () => {
    const quiz = await pipeline.generateQuiz(userId, request);

    expect(quiz.status).toBe('draft');
    expect(quiz.ownerId).toBe(userId);
    expect(quiz.questions).toHaveLength(5);
    expect(quiz.questionTypes.sort()).toEqual(['multiple_choice', 'true_false']);
    expect(quiz.generation).toMatchObject({ backends: ['heuristic'], requestedCount: 5, attempts: 1 });

    const usage = await ledger.getUsage(userId, 'free');
    expect(usage).toMatchObject({ periodKey: '2026-03', used: 5, limit: 5, remaining: 0 });

    expect((await quizzes.getOwned(userId, quiz.id)).id).toBe(quiz.id);
  });

  it('should deny the sixth quiz and leave the count at five', async () => {
    await pipeline.generateQuiz(userId, request);

    await expect(pipeline.generateQuiz(userId, request)).rejects.toBeInstanceOf(LimitExceededError);

    const usage = await ledger.getUsage(userId, 'free');
    expect(usage.used).toBe(5);
    expect((await quizzes.list(userId, {})).total).toBe(1);
  });

  it('should refund the unit when generation is rejected after reserving', async () => {
    // Text passes the length check but has no sentence long enough to use
    const fragments = 'Short bit here. '.repeat(10);

    await expect(pipeline.generateQuiz(userId, { ...request, text: fragments })).rejects.toThrow(
      'No questions could be generated from the source text',
    );

    expect((await ledger.getUsage(userId, 'free')).used).toBe(4);
  });
});
