/**
 * Question normalization
 *
 * Generators return whatever shape they like: `question` or `question_text`,
 * options as a list or as an A/B/C/D map, answers as letters, indexes or
 * text. Everything is mapped onto the canonical `Question` union here.
 * Records that cannot be made valid are dropped (null), never patched up
 * with invented answers.
 */

import { randomUUID } from 'crypto';
import {
  BloomLevel,
  Difficulty,
  Question,
  QuestionBase,
  QuestionType,
  isBloomLevel,
  isDifficulty,
} from '../interfaces';

export interface NormalizeDefaults {
  type: QuestionType;
  difficulty: Difficulty;
  /** Keep this id instead of minting one (used when editing) */
  id?: string;
}

const PROMPT_KEYS = ['question', 'question_text', 'questionText', 'prompt', 'text', 'statement'];
const TYPE_KEYS = ['type', 'question_type', 'questionType'];
const ANSWER_KEYS = ['correct_answer', 'correctAnswer', 'answer', 'correct'];
const OPTION_KEYS = ['options', 'choices', 'answers'];

const TYPE_ALIASES: Record<string, QuestionType> = {
  multiple_choice: 'multiple_choice',
  multiplechoice: 'multiple_choice',
  mcq: 'multiple_choice',
  mc: 'multiple_choice',
  true_false: 'true_false',
  truefalse: 'true_false',
  tf: 'true_false',
  boolean: 'true_false',
  short_answer: 'short_answer',
  shortanswer: 'short_answer',
  short: 'short_answer',
  fill_in_the_blank: 'short_answer',
  essay: 'essay',
  long_answer: 'essay',
  open_ended: 'essay',
};

const TRUE_WORDS = new Set(['true', 't', 'yes', 'y', '1', 'correct']);
const FALSE_WORDS = new Set(['false', 'f', 'no', 'n', '0', 'incorrect']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstValue(raw: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    if (raw[key] !== undefined && raw[key] !== null) return raw[key];
  }
  return undefined;
}

function cleanString(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;
  const trimmed = value.replace(/\s+/g, ' ').trim();
  return trimmed.length > 0 ? trimmed : null;
}

function toQuestionType(value: unknown): QuestionType | null {
  if (typeof value !== 'string') return null;
  const key = value.trim().toLowerCase().replace(/[\s/-]+/g, '_');
  const compact = key.replace(/_/g, '');
  if (Object.hasOwn(TYPE_ALIASES, key)) return TYPE_ALIASES[key];
  if (Object.hasOwn(TYPE_ALIASES, compact)) return TYPE_ALIASES[compact];
  return null;
}

function toDifficulty(value: unknown): Difficulty | null {
  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : value;
  return isDifficulty(normalized) ? normalized : null;
}

function toBloomLevel(value: unknown): BloomLevel | null {
  if (typeof value !== 'string') return null;
  const normalized = value.trim().toLowerCase().replace(/^analyse$/, 'analyze');
  return isBloomLevel(normalized) ? normalized : null;
}

/**
 * Numeric confidence clamped to [0, 1]
 */
export function toConfidence(value: unknown): number | null {
  const numeric = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof numeric !== 'number' || !Number.isFinite(numeric)) return null;
  return Math.min(1, Math.max(0, numeric));
}

function toKeywords(value: unknown): string[] | null {
  const parts: unknown[] = typeof value === 'string' ? value.split(',') : Array.isArray(value) ? value : [];
  const keywords = parts.map(cleanString).filter((k): k is string => k !== null);
  return keywords.length > 0 ? keywords : null;
}

/**
 * Options as a list of strings, a list of {text} objects, or a letter map
 */
function toOptions(value: unknown): string[] {
  let candidates: unknown[] = [];
  if (Array.isArray(value)) {
    candidates = value.map(item => (isRecord(item) ? firstValue(item, ['text', 'option', 'label', 'value']) : item));
  } else if (isRecord(value)) {
    candidates = Object.keys(value).sort().map(key => value[key]);
  }

  const seen = new Set<string>();
  const options: string[] = [];
  for (const candidate of candidates) {
    const option = cleanString(candidate);
    if (option && !seen.has(option.toLowerCase())) {
      seen.add(option.toLowerCase());
      options.push(option);
    }
  }
  return options;
}

/**
 * Resolve a multiple choice answer against the options: exact text
 * (case-insensitive), a letter "A".."Z" optionally followed by ")" or ".",
 * or a zero-based index.
 */
function resolveChoice(answer: unknown, options: string[]): string | null {
  if (typeof answer === 'number') {
    return Number.isInteger(answer) && answer >= 0 && answer < options.length ? options[answer] : null;
  }

  const text = cleanString(answer);
  if (!text) return null;

  const exact = options.find(option => option.toLowerCase() === text.toLowerCase());
  if (exact) return exact;

  const letter = text.match(/^([A-Za-z])[).:]?$/) ?? text.match(/^([A-Za-z])[).:]\s+/);
  if (letter) {
    const index = letter[1].toUpperCase().charCodeAt(0) - 65;
    return index >= 0 && index < options.length ? options[index] : null;
  }

  return null;
}

function toBoolean(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  const text = typeof value === 'string' || typeof value === 'number' ? String(value).trim().toLowerCase() : null;
  if (text === null) return null;
  if (TRUE_WORDS.has(text)) return true;
  if (FALSE_WORDS.has(text)) return false;
  return null;
}

/**
 * Map one raw generator record onto a canonical question, or null when it
 * cannot be made valid.
 */
export function normalizeQuestion(raw: unknown, defaults: NormalizeDefaults): Question | null {
  if (!isRecord(raw)) return null;

  const prompt = cleanString(firstValue(raw, PROMPT_KEYS));
  if (!prompt) return null;

  const type = toQuestionType(firstValue(raw, TYPE_KEYS)) ?? defaults.type;
  const answer = firstValue(raw, ANSWER_KEYS);

  const base: QuestionBase = {
    id: defaults.id ?? randomUUID(),
    prompt,
    difficulty: toDifficulty(firstValue(raw, ['difficulty', 'difficulty_level'])) ?? defaults.difficulty,
    explanation: cleanString(firstValue(raw, ['explanation', 'rationale'])),
    topic: cleanString(firstValue(raw, ['topic'])),
    keywords: toKeywords(firstValue(raw, ['keywords', 'tags'])),
    bloomLevel: toBloomLevel(firstValue(raw, ['bloom_level', 'bloomLevel', 'bloom_taxonomy_level'])),
    confidence: toConfidence(firstValue(raw, ['confidence', 'confidence_score'])),
    sourceSentence: cleanString(firstValue(raw, ['source_sentence', 'sourceSentence'])),
  };

  switch (type) {
    case 'multiple_choice': {
      const options = toOptions(firstValue(raw, OPTION_KEYS));
      if (options.length < 2) return null;
      const correctAnswer = resolveChoice(answer, options);
      return correctAnswer ? { ...base, type, options, correctAnswer } : null;
    }
    case 'true_false': {
      const correctAnswer = toBoolean(answer);
      return correctAnswer === null ? null : { ...base, type, correctAnswer };
    }
    case 'short_answer': {
      const correctAnswer = cleanString(answer);
      return correctAnswer ? { ...base, type, correctAnswer } : null;
    }
    case 'essay':
      return { ...base, type, correctAnswer: cleanString(answer ?? firstValue(raw, ['rubric', 'guidance'])) };
  }
}

/**
 * Inverse of normalizeQuestion, for merging edits into an existing question
 */
export function questionToRaw(question: Question): Record<string, unknown> {
  return {
    type: question.type,
    question: question.prompt,
    difficulty: question.difficulty,
    options: question.type === 'multiple_choice' ? question.options : undefined,
    correct_answer: question.correctAnswer,
    explanation: question.explanation,
    topic: question.topic,
    keywords: question.keywords,
    bloom_level: question.bloomLevel,
    confidence: question.confidence,
    source_sentence: question.sourceSentence,
  };
}

/**
 * Text used to detect duplicates: lowercase, accents and punctuation
 * stripped, whitespace collapsed
 */
export function normalizeQuestionText(prompt: string): string {
  return prompt
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Keep the first question for each normalized prompt
 */
export function dedupeQuestions(questions: Question[]): Question[] {
  const seen = new Set<string>();
  return questions.filter(question => {
    const key = normalizeQuestionText(question.prompt);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
