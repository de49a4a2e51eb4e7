/**
 * In-memory stores
 *
 * Used when DATABASE_URL is unset and by the test suite. Values are cloned
 * on the way in and out so callers never share references with the store.
 */

import { randomUUID } from 'crypto';
import { NewUser, UserRecord } from '../auth/auth.interface';
import { Plan, Quiz, QuizListQuery, SourceDocument, SubscriptionState } from '../interfaces';
import { DocumentStore, PageSlice, QuizStore, SubscriptionStore, UserStore } from './stores';
import { ConflictError } from '../errors/app-errors';

function paginate<T>(items: T[], page: number, perPage: number): PageSlice<T> {
  const start = (page - 1) * perPage;
  return { items: items.slice(start, start + perPage), total: items.length };
}

/**
 * Newest first; insertion order breaks ties
 */
function newestFirst<T extends { createdAt: string }>(items: T[]): T[] {
  return [...items].reverse().sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt));
}

export class InMemoryUserStore implements UserStore {
  private readonly users = new Map<string, UserRecord>();

  async create(input: NewUser): Promise<UserRecord> {
    if (await this.findByEmail(input.email)) {
      throw new ConflictError('Email is already registered');
    }

    const user: UserRecord = {
      id: randomUUID(),
      email: input.email.toLowerCase(),
      name: input.name,
      passwordHash: input.passwordHash,
      plan: 'free',
      isActive: true,
      createdAt: new Date().toISOString(),
      lastLoginAt: null,
    };
    this.users.set(user.id, user);
    return structuredClone(user);
  }

  async findById(id: string): Promise<UserRecord | null> {
    const user = this.users.get(id);
    return user ? structuredClone(user) : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const needle = email.toLowerCase();
    for (const user of this.users.values()) {
      if (user.email === needle) return structuredClone(user);
    }
    return null;
  }

  async updatePlan(id: string, plan: Plan): Promise<void> {
    const user = this.users.get(id);
    if (user) user.plan = plan;
  }

  async touchLogin(id: string): Promise<void> {
    const user = this.users.get(id);
    if (user) user.lastLoginAt = new Date().toISOString();
  }
}

export class InMemoryDocumentStore implements DocumentStore {
  private readonly documents = new Map<string, SourceDocument>();

  async insert(document: SourceDocument): Promise<SourceDocument> {
    this.documents.set(document.id, structuredClone(document));
    return structuredClone(document);
  }

  async update(document: SourceDocument): Promise<SourceDocument> {
    return this.insert(document);
  }

  async findById(id: string): Promise<SourceDocument | null> {
    const document = this.documents.get(id);
    return document ? structuredClone(document) : null;
  }

  async listByOwner(ownerId: string, page: number, perPage: number): Promise<PageSlice<SourceDocument>> {
    const owned = [...this.documents.values()].filter(d => d.ownerId === ownerId);
    return paginate(newestFirst(owned).map(d => structuredClone(d)), page, perPage);
  }

  async delete(id: string): Promise<boolean> {
    return this.documents.delete(id);
  }
}

export class InMemoryQuizStore implements QuizStore {
  private readonly quizzes = new Map<string, Quiz>();

  async insert(quiz: Quiz): Promise<Quiz> {
    if (this.quizzes.has(quiz.id)) {
      throw new ConflictError(`Quiz ${quiz.id} already exists`);
    }
    this.quizzes.set(quiz.id, structuredClone(quiz));
    return structuredClone(quiz);
  }

  async save(quiz: Quiz): Promise<Quiz> {
    this.quizzes.set(quiz.id, structuredClone(quiz));
    return structuredClone(quiz);
  }

  async findById(id: string): Promise<Quiz | null> {
    const quiz = this.quizzes.get(id);
    return quiz ? structuredClone(quiz) : null;
  }

  async findByShareToken(token: string): Promise<Quiz | null> {
    for (const quiz of this.quizzes.values()) {
      if (quiz.shareToken === token) return structuredClone(quiz);
    }
    return null;
  }

  async listByOwner(ownerId: string, query: QuizListQuery): Promise<PageSlice<Quiz>> {
    const search = query.search?.trim().toLowerCase();
    const matching = [...this.quizzes.values()].filter(quiz =>
      quiz.ownerId === ownerId &&
      (!query.status || quiz.status === query.status) &&
      (!search || quiz.title.toLowerCase().includes(search))
    );
    return paginate(newestFirst(matching).map(q => structuredClone(q)), query.page, query.perPage);
  }

  async incrementViewCount(id: string): Promise<number> {
    const quiz = this.quizzes.get(id);
    if (!quiz) return 0;
    quiz.viewCount += 1;
    return quiz.viewCount;
  }

  async countBySourceDocument(documentId: string): Promise<number> {
    let count = 0;
    for (const quiz of this.quizzes.values()) {
      if (quiz.source.kind === 'document' && quiz.source.documentId === documentId) count++;
    }
    return count;
  }

}

export class InMemorySubscriptionStore implements SubscriptionStore {
  private readonly states = new Map<string, SubscriptionState>();
  private readonly processedEvents = new Set<string>();

  async get(userId: string): Promise<SubscriptionState | null> {
    const state = this.states.get(userId);
    return state ? { ...state } : null;
  }

  async findByCustomerId(customerId: string): Promise<SubscriptionState | null> {
    for (const state of this.states.values()) {
      if (state.customerId === customerId) return { ...state };
    }
    return null;
  }

  async isEventProcessed(eventId: string): Promise<boolean> {
    return this.processedEvents.has(eventId);
  }

  async applyEvent(eventId: string, _eventType: string, state: SubscriptionState): Promise<boolean> {
    // check-and-record happens without an await in between
    if (this.processedEvents.has(eventId)) {
      return false;
    }
    this.processedEvents.add(eventId);
    this.states.set(state.userId, { ...state });
    return true;
  }
}
