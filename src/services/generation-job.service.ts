/**
 * Generation Job Service
 *
 * Runs quiz generation in the background so the request can answer with a
 * job id straight away. Jobs live in process memory and move
 * pending → running → succeeded | failed. Finished jobs are pruned after
 * an hour.
 */

import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { GenerationJob } from '../interfaces';
import { NotFoundError, isAppError } from '../errors/app-errors';

export const JOB_RETENTION_MS = 60 * 60 * 1000;

/** Background work; resolves to the id of the created quiz */
export type GenerationWork = () => Promise<string>;

@Injectable()
export class GenerationJobService {
  private readonly logger = new Logger(GenerationJobService.name);
  private readonly jobs = new Map<string, GenerationJob>();
  private readonly running = new Map<string, Promise<void>>();
  private readonly clock: () => Date;

  constructor(clock?: () => Date) {
    this.clock = clock || (() => new Date());
  }

  enqueue(ownerId: string, work: GenerationWork): GenerationJob {
    this.prune();

    const now = this.clock().toISOString();
    const job: GenerationJob = {
      id: randomUUID(),
      ownerId,
      status: 'pending',
      quizId: null,
      error: null,
      createdAt: now,
      updatedAt: now,
    };
    this.jobs.set(job.id, job);
    this.running.set(job.id, this.run(job, work));

    return { ...job };
  }

  get(ownerId: string, jobId: string): GenerationJob {
    const job = this.jobs.get(jobId);
    if (!job || job.ownerId !== ownerId) {
      throw new NotFoundError('Job');
    }
    return { ...job };
  }

  /**
   * Resolves once the job has finished. Null for unknown ids.
   */
  async settled(jobId: string): Promise<GenerationJob | null> {
    await this.running.get(jobId);
    const job = this.jobs.get(jobId);
    return job ? { ...job } : null;
  }

  activeCount(): number {
    return this.running.size;
  }

  private async run(job: GenerationJob, work: GenerationWork): Promise<void> {
    // Let the caller see the job as pending first
    await Promise.resolve();
    this.update(job, { status: 'running' });

    try {
      const quizId = await work();
      this.update(job, { status: 'succeeded', quizId });
      this.logger.log(`Job ${job.id} succeeded with quiz ${quizId}`);
    } catch (error) {
      if (isAppError(error)) {
        this.update(job, { status: 'failed', error: { code: error.code, message: error.message } });
        this.logger.warn(`Job ${job.id} failed: ${error.code}`);
      } else {
        this.update(job, { status: 'failed', error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
        this.logger.error(`Job ${job.id} failed`, error instanceof Error ? error.stack : String(error));
      }
    } finally {
      this.running.delete(job.id);
    }
  }

  private update(job: GenerationJob, changes: Partial<GenerationJob>): void {
    Object.assign(job, changes, { updatedAt: this.clock().toISOString() });
  }

  private prune(): void {
    const cutoff = this.clock().getTime() - JOB_RETENTION_MS;
    for (const [id, job] of this.jobs) {
      const finished = job.status === 'succeeded' || job.status === 'failed';
      if (finished && Date.parse(job.updatedAt) < cutoff) {
        this.jobs.delete(id);
      }
    }
  }
}
