/**
 * Quiz status transitions: draft → published → archived, or draft → archived.
 * Nothing leaves `archived`.
 */

import { QuizStatus } from '../interfaces';
import { ValidationError } from '../errors/app-errors';

export const QUIZ_TRANSITIONS: Record<QuizStatus, readonly QuizStatus[]> = {
  draft: ['published', 'archived'],
  published: ['archived'],
  archived: [],
};

export function canTransition(from: QuizStatus, to: QuizStatus): boolean {
  return QUIZ_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: QuizStatus, to: QuizStatus): void {
  if (!canTransition(from, to)) {
    throw new ValidationError(`Cannot move a quiz from ${from} to ${to}`, { from, to });
  }
}

/**
 * Questions and metadata are editable until the quiz is archived
 */
export function assertEditable(status: QuizStatus): void {
  if (status === 'archived') {
    throw new ValidationError('Archived quizzes cannot be edited', { status });
  }
}
