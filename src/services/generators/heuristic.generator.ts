/**
 * Heuristic question generator
 *
 * Template-based questions built from the text itself: key terms are picked
 * by frequency, then blanked out of the sentences that mention them. Needs
 * no network, so it is always available as the last backend in the chain.
 */

import { Injectable } from '@nestjs/common';
import { GeneratorRequest, QuestionGenerator } from '../../interfaces';
import stopwordList from './stopwords.json';

const STOPWORDS = new Set<string>(stopwordList);
const BLANK = '_____';
const MIN_SENTENCE_WORDS = 5;

interface Mention {
  concept: string;
  sentence: string;
  /** The concept as spelled in the sentence */
  surface: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function conceptPattern(concept: string): RegExp {
  return new RegExp(`\\b${escapeRegExp(concept)}\\b`, 'i');
}

export function splitSentences(text: string): string[] {
  return text
    .replace(/\s+/g, ' ')
    .split(/(?<=[.!?])\s+/)
    .map(sentence => sentence.trim())
    .filter(sentence => sentence.split(' ').length >= MIN_SENTENCE_WORDS);
}

/**
 * Rank candidate terms: capitalized multi-word names count double,
 * then single words of four or more letters that are not stopwords.
 * Ties go to the term seen first.
 */
export function extractKeyConcepts(text: string, limit: number = 20): string[] {
  const scores = new Map<string, { score: number; firstSeen: number }>();

  const add = (term: string, weight: number, index: number): void => {
    const entry = scores.get(term);
    if (entry) {
      entry.score += weight;
    } else {
      scores.set(term, { score: weight, firstSeen: index });
    }
  };

  for (const match of text.matchAll(/\b[A-Z][a-z]+(?:\s+[A-Z][a-z]+)+\b/g)) {
    add(match[0], 2, match.index ?? 0);
  }

  for (const match of text.matchAll(/\b[A-Za-z][A-Za-z-]{3,}\b/g)) {
    const word = match[0].toLowerCase();
    if (!STOPWORDS.has(word)) {
      add(word, 1, match.index ?? 0);
    }
  }

  return [...scores.entries()]
    .sort((a, b) => b[1].score - a[1].score || a[1].firstSeen - b[1].firstSeen)
    .slice(0, limit)
    .map(([term]) => term);
}

/**
 * Turn a statement false by negating its first auxiliary verb.
 * Null when there is nothing to negate.
 */
export function negateStatement(sentence: string): string | null {
  const match = sentence.match(/\b(is|are|was|were|can|will|has|have)\b/i);
  if (!match || match.index === undefined) return null;
  const end = match.index + match[0].length;
  return `${sentence.slice(0, end)} not${sentence.slice(end)}`;
}

@Injectable()
export class HeuristicQuestionGenerator implements QuestionGenerator {
  readonly name = 'heuristic';

  isAvailable(): boolean {
    return true;
  }

  async generate(request: GeneratorRequest): Promise<unknown[]> {
    const sentences = splitSentences(request.text);
    const concepts = extractKeyConcepts(request.text);
    const mentions = this.findMentions(concepts, sentences);
    const questions: Record<string, unknown>[] = [];

    for (let i = 0; i < mentions.length && questions.length < request.count; i++) {
      if (request.signal.aborted) break;

      const question = this.buildQuestion(request, mentions[i], i, concepts);
      if (question) questions.push(question);
    }

    return questions;
  }

  /**
   * One mention per concept, each in a sentence not used before
   */
  private findMentions(concepts: string[], sentences: string[]): Mention[] {
    const used = new Set<string>();
    const mentions: Mention[] = [];

    for (const concept of concepts) {
      const pattern = conceptPattern(concept);
      for (const sentence of sentences) {
        const match = sentence.match(pattern);
        if (match && !used.has(sentence)) {
          used.add(sentence);
          mentions.push({ concept, sentence, surface: match[0] });
          break;
        }
      }
    }
    return mentions;
  }

  private buildQuestion(
    request: GeneratorRequest,
    mention: Mention,
    index: number,
    concepts: string[]
  ): Record<string, unknown> | null {
    const blanked = mention.sentence.replace(conceptPattern(mention.concept), BLANK);
    const common = {
      type: request.type,
      difficulty: request.difficulty,
      topic: mention.concept,
      keywords: [mention.concept],
      source_sentence: mention.sentence,
    };

    switch (request.type) {
      case 'multiple_choice': {
        const distractors = concepts
          .filter(c => c !== mention.concept && !conceptPattern(c).test(mention.sentence))
          .slice(0, 3);
        if (distractors.length < 1) return null;

        const options = [...distractors];
        options.splice(index % (distractors.length + 1), 0, mention.surface);
        return {
          ...common,
          question: `Which term best completes the sentence: "${blanked}"`,
          options,
          correct_answer: mention.surface,
          explanation: `The text states: "${mention.sentence}"`,
          bloom_level: 'understand',
          confidence: 0.6,
        };
      }
      case 'true_false': {
        const negated = index % 2 === 1 ? negateStatement(mention.sentence) : null;
        return {
          ...common,
          question: `True or false: ${negated ?? mention.sentence}`,
          correct_answer: negated === null,
          explanation: `The text states: "${mention.sentence}"`,
          bloom_level: 'remember',
          confidence: 0.7,
        };
      }
      case 'short_answer':
        return {
          ...common,
          question: `Fill in the blank: ${blanked}`,
          correct_answer: mention.surface,
          explanation: `The text states: "${mention.sentence}"`,
          bloom_level: 'remember',
          confidence: 0.5,
        };
      case 'essay':
        return {
          ...common,
          question: `Explain the significance of ${mention.concept} as described in the text.`,
          correct_answer: `A strong answer discusses ${mention.concept} and draws on: "${mention.sentence}"`,
          bloom_level: 'analyze',
          confidence: 0.5,
        };
    }
  }
}
