import { QuestionOrchestratorService, allocateCounts } from './question-orchestrator.service';
import { HeuristicQuestionGenerator } from './generators/heuristic.generator';
import { GenerationFailedError, GenerationTimeoutError, ValidationError } from '../errors/app-errors';
import { GenerationRequest, GeneratorRequest } from '../interfaces';

const LESSON =
  'Photosynthesis converts light energy into chemical energy. ' +
  'Chlorophyll absorbs light energy inside the chloroplast. ' +
  'The chloroplast is the site of photosynthesis in plant cells. ' +
  'Glucose is produced during photosynthesis and stored as starch. ' +
  'Oxygen is released as a byproduct of photosynthesis.';

function stub(name: string, impl: (request: GeneratorRequest) => Promise<unknown[]>, available = true) {
  return { name, isAvailable: () => available, generate: jest.fn(impl) };
}

describe('QuestionOrchestratorService', () => {
  const request = (overrides: Partial<GenerationRequest> = {}): GenerationRequest => ({
    text: LESSON,
    requestedCount: 3,
    types: ['short_answer'],
    difficulty: 'medium',
    timeoutMs: 1000,
    ...overrides,
  });

  describe('generate', () => {
    it('should deduplicate and cap at the requested count', async () => {
      const generator = stub('stub', async () => [
        { question: 'What is photosynthesis?', correct_answer: 'A process' },
        { question: 'what is  photosynthesis', correct_answer: 'A duplicate' },
        { question: 'What is glucose?', correct_answer: 'A sugar' },
        { question: 'What is oxygen?', correct_answer: 'A gas' },
        { question: 'What is starch?', correct_answer: 'Stored sugar' },
      ]);
      const orchestrator = new QuestionOrchestratorService([generator]);

      const result = await orchestrator.generate(request());

      expect(result.questions.map(q => q.prompt)).toEqual([
        'What is photosynthesis?',
        'What is glucose?',
        'What is oxygen?',
      ]);
      expect(result.backends).toEqual(['stub']);
      expect(result.failures).toEqual([]);
    });

    it('should fall back to the next backend when one fails', async () => {
      const primary = stub('primary', async () => {
        throw new Error('rate limited');
      });
      const fallback = stub('fallback', async () => [{ question: 'What is glucose?', answer: 'A sugar' }]);
      const orchestrator = new QuestionOrchestratorService([primary, fallback]);

      const result = await orchestrator.generate(request({ requestedCount: 1 }));

      expect(result.questions).toHaveLength(1);
      expect(result.backends).toEqual(['fallback']);
      expect(result.failures).toEqual([{ backend: 'primary', type: 'short_answer', message: 'rate limited' }]);
    });

    it('should ask the next backend only for the remainder', async () => {
      const primary = stub('primary', async () => [{ question: 'What is glucose?', answer: 'A sugar' }]);
      const fallback = stub('fallback', async () => [{ question: 'What is oxygen?', answer: 'A gas' }]);
      const orchestrator = new QuestionOrchestratorService([primary, fallback]);

      const result = await orchestrator.generate(request({ requestedCount: 2 }));

      expect(fallback.generate).toHaveBeenCalledWith(expect.objectContaining({ count: 1, type: 'short_answer' }));
      expect(result.backends).toEqual(['primary', 'fallback']);
      expect(result.questions.map(q => q.prompt)).toEqual(['What is glucose?', 'What is oxygen?']);
    });

    it('should drop records that cannot be normalized', async () => {
      const generator = stub('stub', async () => [
        { question: 'Missing an answer' },
        'not even an object',
        { question: 'What is starch?', correct_answer: 'Stored sugar' },
      ]);
      const orchestrator = new QuestionOrchestratorService([generator]);

      const result = await orchestrator.generate(request());

      expect(result.questions.map(q => q.prompt)).toEqual(['What is starch?']);
    });

    it('should only return the requested question types', async () => {
      const generator = stub('stub', async () => [
        { type: 'essay', question: 'Discuss photosynthesis.' },
        { type: 'true_false', question: 'Oxygen is released.', answer: 'true' },
        { question: 'Where does photosynthesis happen?', options: ['Chloroplast', 'Nucleus'], answer: 'A' },
      ]);
      const orchestrator = new QuestionOrchestratorService([generator]);

      const result = await orchestrator.generate(request({ types: ['multiple_choice'] }));

      expect(result.questions.map(q => q.type)).toEqual(['multiple_choice']);
      expect(result.questions[0]).toMatchObject({ prompt: 'Where does photosynthesis happen?', correctAnswer: 'Chloroplast' });
    });

    it('should skip unavailable backends', async () => {
      const offline = stub('offline', async () => [], false);
      const online = stub('online', async () => [{ question: 'What is starch?', answer: 'Stored sugar' }]);
      const orchestrator = new QuestionOrchestratorService([offline, online]);

      await orchestrator.generate(request({ requestedCount: 1 }));

      expect(offline.generate).not.toHaveBeenCalled();
      expect(orchestrator.availableBackends()).toEqual(['online']);
    });

    it('should fail with GenerationFailed when nothing was produced', async () => {
      const generator = stub('stub', async () => {
        throw new Error('model overloaded');
      });
      const orchestrator = new QuestionOrchestratorService([generator]);

      const error = await orchestrator.generate(request()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GenerationFailedError);
      expect(error).toMatchObject({
        failures: [{ backend: 'stub', type: 'short_answer', message: 'model overloaded' }],
        details: { failedBackends: [{ backend: 'stub', type: 'short_answer' }] },
      });
    });

    it('should fail with GenerationFailed when no backend is available', async () => {
      const orchestrator = new QuestionOrchestratorService([stub('offline', async () => [], false)]);

      await expect(orchestrator.generate(request())).rejects.toBeInstanceOf(GenerationFailedError);
    });

    it('should time out and abort in-flight backends', async () => {
      let seenSignal: AbortSignal | undefined;
      const hanging = stub(
        'hanging',
        req =>
          new Promise<unknown[]>((_, reject) => {
            seenSignal = req.signal;
            req.signal.addEventListener('abort', () => reject(new Error('aborted')));
          }),
      );
      const orchestrator = new QuestionOrchestratorService([hanging]);

      await expect(orchestrator.generate(request({ timeoutMs: 20 }))).rejects.toBeInstanceOf(GenerationTimeoutError);
      expect(seenSignal?.aborted).toBe(true);
    });

    it('should reject source text shorter than 100 characters', async () => {
      const orchestrator = new QuestionOrchestratorService([stub('stub', async () => [])]);

      await expect(orchestrator.generate(request({ text: 'Too short.' }))).rejects.toBeInstanceOf(ValidationError);
    });

    it.each([0, 51, 2.5])('should reject a requested count of %p', async requestedCount => {
      const orchestrator = new QuestionOrchestratorService([stub('stub', async () => [])]);

      await expect(orchestrator.generate(request({ requestedCount }))).rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject an empty type list', async () => {
      const orchestrator = new QuestionOrchestratorService([stub('stub', async () => [])]);

      await expect(orchestrator.generate(request({ types: [] }))).rejects.toBeInstanceOf(ValidationError);
    });

    it('should generate from the text alone with the heuristic backend', async () => {
      const orchestrator = new QuestionOrchestratorService([new HeuristicQuestionGenerator()]);

      const result = await orchestrator.generate(request({ requestedCount: 4, types: ['multiple_choice'] }));

      expect(result.questions).toHaveLength(4);
      expect(result.questions.every(q => q.type === 'multiple_choice')).toBe(true);
      expect(result.backends).toEqual(['heuristic']);
    });
  });

  describe('allocateCounts', () => {
    it('should give the remainder to the first types', () => {
      expect(allocateCounts(5, ['multiple_choice', 'true_false'])).toEqual([
        { type: 'multiple_choice', count: 3 },
        { type: 'true_false', count: 2 },
      ]);
    });

    it('should drop types that get nothing', () => {
      expect(allocateCounts(1, ['essay', 'true_false', 'short_answer'])).toEqual([{ type: 'essay', count: 1 }]);
    });

    it('should ignore repeated types', () => {
      expect(allocateCounts(4, ['essay', 'essay'])).toEqual([{ type: 'essay', count: 4 }]);
    });
  });
});
