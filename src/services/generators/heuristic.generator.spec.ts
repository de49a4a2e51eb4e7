import {
  HeuristicQuestionGenerator,
  extractKeyConcepts,
  negateStatement,
  splitSentences,
} from './heuristic.generator';
import { GeneratorRequest } from '../../interfaces';

const LESSON =
  'Photosynthesis converts light energy into chemical energy. ' +
  'Chlorophyll absorbs light energy inside the chloroplast. ' +
  'The chloroplast is the site of photosynthesis in plant cells. ' +
  'Glucose is produced during photosynthesis and stored as starch. ' +
  'Oxygen is released as a byproduct of photosynthesis.';

describe('HeuristicQuestionGenerator', () => {
  let generator: HeuristicQuestionGenerator;

  const request = (overrides: Partial<GeneratorRequest> = {}): GeneratorRequest => ({
    text: LESSON,
    type: 'multiple_choice',
    count: 3,
    difficulty: 'medium',
    signal: new AbortController().signal,
    ...overrides,
  });

  beforeEach(() => {
    generator = new HeuristicQuestionGenerator();
  });

  it('should always be available', () => {
    expect(generator.isAvailable()).toBe(true);
  });

  it('should blank the key term out of its sentence for multiple choice', async () => {
    const questions = await generator.generate(request());

    expect(questions).toHaveLength(3);
    expect(questions[0]).toMatchObject({
      type: 'multiple_choice',
      question: 'Which term best completes the sentence: "_____ converts light energy into chemical energy."',
      options: ['Photosynthesis', 'chloroplast', 'chlorophyll', 'absorbs'],
      correct_answer: 'Photosynthesis',
      source_sentence: 'Photosynthesis converts light energy into chemical energy.',
    });
    expect(questions[1]).toMatchObject({
      options: ['photosynthesis', 'energy', 'converts', 'chemical'],
      correct_answer: 'energy',
    });
  });

  it('should mix true and negated statements', async () => {
    const questions = await generator.generate(request({ type: 'true_false', count: 4 }));

    expect(questions.map(q => (q as { correct_answer: unknown }).correct_answer)).toEqual([true, true, true, false]);
    expect(questions[3]).toMatchObject({
      question: 'True or false: Glucose is not produced during photosynthesis and stored as starch.',
    });
  });

  it('should produce fill-in-the-blank short answers', async () => {
    const questions = await generator.generate(request({ type: 'short_answer', count: 1 }));

    expect(questions).toEqual([
      expect.objectContaining({
        question: 'Fill in the blank: _____ converts light energy into chemical energy.',
        correct_answer: 'Photosynthesis',
        confidence: 0.5,
      }),
    ]);
  });

  it('should return fewer questions than asked when the text runs out', async () => {
    const questions = await generator.generate(request({ type: 'essay', count: 50 }));

    expect(questions).toHaveLength(5);
  });

  it('should stop once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const questions = await generator.generate(request({ signal: controller.signal }));

    expect(questions).toEqual([]);
  });
});

describe('extractKeyConcepts', () => {
  it('should rank frequent terms first and skip stopwords', () => {
    expect(extractKeyConcepts(LESSON, 4)).toEqual(['photosynthesis', 'energy', 'light', 'chloroplast']);
  });

  it('should weight capitalized multi-word names', () => {
    expect(extractKeyConcepts('Scholars agree the Roman Empire expanded quickly.', 1)).toEqual(['Roman Empire']);
  });
});

describe('negateStatement', () => {
  it('should negate the first auxiliary verb', () => {
    expect(negateStatement('The heart is a muscle.')).toBe('The heart is not a muscle.');
  });

  it('should return null when there is no auxiliary verb', () => {
    expect(negateStatement('Birds fly south in winter.')).toBeNull();
  });
});

describe('splitSentences', () => {
  it('should drop fragments shorter than five words', () => {
    expect(splitSentences('Cells divide. Mitosis produces two identical daughter cells.')).toEqual([
      'Mitosis produces two identical daughter cells.',
    ]);
  });
});
