/**
 * Prompt building and response parsing shared by the hosted model backends
 */

import { GeneratorRequest, QuestionType } from '../../interfaces';

// Keeps prompts inside the smaller model context windows
export const MAX_PROMPT_SOURCE_CHARS = 12_000;

export const SYSTEM_PROMPT =
  'You are an experienced teacher who writes clear, unambiguous quiz questions ' +
  'grounded only in the source text you are given. You always answer with JSON.';

const TYPE_INSTRUCTIONS: Record<QuestionType, string> = {
  multiple_choice:
    'multiple choice questions with exactly four options; "correct_answer" must repeat one option verbatim',
  true_false: 'true/false statements; "correct_answer" is a JSON boolean',
  short_answer: 'short answer questions whose "correct_answer" is a word or short phrase from the text',
  essay: 'open essay questions; "correct_answer" holds brief grading guidance',
};

export function buildGenerationPrompt(request: Pick<GeneratorRequest, 'text' | 'type' | 'count' | 'difficulty'>): string {
  const source = request.text.length > MAX_PROMPT_SOURCE_CHARS
    ? `${request.text.slice(0, MAX_PROMPT_SOURCE_CHARS)}\n[truncated]`
    : request.text;

  return [
    `Write ${request.count} ${request.difficulty} ${TYPE_INSTRUCTIONS[request.type]}.`,
    '',
    'Respond with a JSON object of the form {"questions": [...]} where every item has:',
    '"question", "type", "options" (multiple choice only), "correct_answer", "explanation",',
    '"topic", "keywords" (array of strings), "bloom_level" (remember, understand, apply,',
    'analyze, evaluate or create), "confidence" (0 to 1) and "source_sentence".',
    `Use "${request.type}" as the type of every question.`,
    '',
    'Source text:',
    '"""',
    source,
    '"""',
  ].join('\n');
}

function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) return trimmed;
  return trimmed
    .replace(/^```[a-zA-Z]*\n?/, '')
    .replace(/```$/, '')
    .trim();
}

function parseJson(text: string): unknown {
  const raw = stripCodeFences(text);
  try {
    return JSON.parse(raw);
  } catch {
    const first = raw.search(/[[{]/);
    const last = Math.max(raw.lastIndexOf('}'), raw.lastIndexOf(']'));
    if (first >= 0 && last > first) {
      return JSON.parse(raw.slice(first, last + 1));
    }
    throw new Error('Model response is not valid JSON');
  }
}

/**
 * Pull the list of raw question records out of a model reply.
 * Accepts a bare array or an object holding one under `questions`.
 */
export function parseQuestionPayload(content: string): unknown[] {
  const parsed = parseJson(content);

  if (Array.isArray(parsed)) {
    return parsed;
  }
  if (typeof parsed === 'object' && parsed !== null && 'questions' in parsed && Array.isArray(parsed.questions)) {
    return parsed.questions;
  }
  throw new Error('Model response does not contain a questions array');
}
