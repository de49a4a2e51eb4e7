/**
 * Store selection
 *
 * Postgres when DATABASE_URL is set, in-memory otherwise.
 */

import { isDatabaseEnabled } from './index';
import { DocumentStore, QuizStore, SubscriptionStore, UserStore } from './stores';
import {
  InMemoryDocumentStore,
  InMemoryQuizStore,
  InMemorySubscriptionStore,
  InMemoryUserStore,
} from './memory-stores';
import { postgresUserStore } from './users';
import { postgresDocumentStore } from './documents';
import { postgresQuizStore } from './quizzes';
import { postgresSubscriptionStore } from './subscriptions';

export interface Repositories {
  users: UserStore;
  documents: DocumentStore;
  quizzes: QuizStore;
  subscriptions: SubscriptionStore;
}

export function createRepositories(useDatabase: boolean = isDatabaseEnabled()): Repositories {
  if (useDatabase) {
    console.log('[DB] Using PostgreSQL stores');
    return {
      users: postgresUserStore,
      documents: postgresDocumentStore,
      quizzes: postgresQuizStore,
      subscriptions: postgresSubscriptionStore,
    };
  }

  console.log('[DB] DATABASE_URL not set - using in-memory stores');
  return {
    users: new InMemoryUserStore(),
    documents: new InMemoryDocumentStore(),
    quizzes: new InMemoryQuizStore(),
    subscriptions: new InMemorySubscriptionStore(),
  };
}

let repositories: Repositories | null = null;

/**
 * Process-wide stores, created on first use
 */
export function getRepositories(): Repositories {
  if (!repositories) {
    repositories = createRepositories();
  }
  return repositories;
}

export function resetRepositories(): void {
  repositories = null;
}
