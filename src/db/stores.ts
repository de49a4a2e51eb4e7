/**
 * Persistence contracts.
 *
 * Services depend on these, not on pg. Postgres implementations live next
 * to this file; the in-memory ones back local development and tests.
 */

import { NewUser, UserRecord } from '../auth/auth.interface';
import {
  Plan,
  Quiz,
  QuizListQuery,
  SourceDocument,
  SubscriptionState,
} from '../interfaces';

export interface PageSlice<T> {
  items: T[];
  total: number;
}

export interface UserStore {
  create(input: NewUser): Promise<UserRecord>;
  findById(id: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  updatePlan(id: string, plan: Plan): Promise<void>;
  touchLogin(id: string): Promise<void>;
}

export interface DocumentStore {
  insert(document: SourceDocument): Promise<SourceDocument>;
  update(document: SourceDocument): Promise<SourceDocument>;
  findById(id: string): Promise<SourceDocument | null>;
  listByOwner(ownerId: string, page: number, perPage: number): Promise<PageSlice<SourceDocument>>;
  delete(id: string): Promise<boolean>;
}

export interface QuizStore {
  insert(quiz: Quiz): Promise<Quiz>;
  /** Replaces the quiz row and its full question list */
  save(quiz: Quiz): Promise<Quiz>;
  findById(id: string): Promise<Quiz | null>;
  findByShareToken(token: string): Promise<Quiz | null>;
  listByOwner(ownerId: string, query: QuizListQuery): Promise<PageSlice<Quiz>>;
  /** Returns the new view count */
  incrementViewCount(id: string): Promise<number>;
  countBySourceDocument(documentId: string): Promise<number>;
}

export interface SubscriptionStore {
  get(userId: string): Promise<SubscriptionState | null>;
  findByCustomerId(customerId: string): Promise<SubscriptionState | null>;
  isEventProcessed(eventId: string): Promise<boolean>;
  /**
   * Record `eventId` and store `state` in one step.
   * Returns false, without writing, when the event was already recorded.
   */
  applyEvent(eventId: string, eventType: string, state: SubscriptionState): Promise<boolean>;
}
