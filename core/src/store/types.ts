import type { AnalysisJob } from '../types';

/** Builds the next snapshot from the current one. Must not mutate its argument. */
export type JobChange = (current: AnalysisJob) => AnalysisJob;

/**
 * Persistence boundary for analysis jobs.
 *
 * `update` applies one change as a single snapshot replacement: readers see
 * either the old record or the new one. Changes to the same id are applied
 * one at a time, and records that reached `done` or `failed` reject writes.
 */
export interface JobStore {
  create(job: AnalysisJob): Promise<AnalysisJob>;
  get(id: string): Promise<AnalysisJob | null>;
  update(id: string, change: JobChange): Promise<AnalysisJob>;
  list(): Promise<AnalysisJob[]>;
}
