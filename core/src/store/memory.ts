import { JobConflictError, JobNotFoundError } from '../errors';
import type { AnalysisJob } from '../types';
import { assertConsistent, assertTransition, assertWritable } from './guard';
import type { JobChange, JobStore } from './types';

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Keeps frozen snapshots in a Map. Each update swaps the whole snapshot in
 * one synchronous step, so a concurrent reader never sees a half-applied change.
 */
export class InMemoryJobStore implements JobStore {
  private jobs = new Map<string, AnalysisJob>();

  async create(job: AnalysisJob): Promise<AnalysisJob> {
    if (this.jobs.has(job.id)) {
      throw new JobConflictError(`Analysis job already exists: ${job.id}`);
    }
    assertConsistent(job);
    const snapshot = deepFreeze(structuredClone(job));
    this.jobs.set(job.id, snapshot);
    return snapshot;
  }

  async get(id: string): Promise<AnalysisJob | null> {
    return this.jobs.get(id) ?? null;
  }

  async update(id: string, change: JobChange): Promise<AnalysisJob> {
    const existing = this.jobs.get(id);
    if (!existing) throw new JobNotFoundError(id);
    assertWritable(existing);

    const next = structuredClone(change(existing));
    next.updatedAt = new Date().toISOString();
    assertTransition(existing, next);

    const snapshot = deepFreeze(next);
    this.jobs.set(id, snapshot);
    return snapshot;
  }

  async list(): Promise<AnalysisJob[]> {
    return [...this.jobs.values()];
  }
}
