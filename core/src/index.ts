export * from './types';
export * from './errors';
export * from './logger';
export * from './config';
export * from './crypto/utils';
export * from './math/stats';
export * from './pipeline/stages';
export * from './pipeline/runner';
export * from './media/decode';
export * from './media/metadata';
export * from './media/source';
export * from './scorers';
export * from './fusion/fusion';
export * from './projection';
export * from './report';
export * from './store';
export * from './client/poller';

import { randomUUID } from 'crypto';
import { AnalysisConfig, resolveConfig } from './config';
import { JobNotFoundError } from './errors';
import { Logger, silentLogger } from './logger';
import { MediaReader } from './media/source';
import { CancelOutcome, JobRunner, StartOutcome } from './pipeline/runner';
import { JobResultView, JobStatusView, toResultView, toStatusView } from './projection';
import { buildReport, ForensicReport } from './report';
import { ScorerSet } from './scorers';
import { InMemoryJobStore, JobStore } from './store';
import { KeyedMutex } from './store/lock';
import { AnalysisJob, isTerminal, JobStatus, MediaReference } from './types';

export const RESULT_VERSION = '1.0.0';

export interface VeriframeOptions {
  store?: JobStore;
  config?: AnalysisConfig;
  readMedia?: MediaReader;
  scorers?: Partial<ScorerSet>;
  logger?: Logger;
}

/** A fresh job record: pending, no outputs yet. */
export function createJob(media: MediaReference, id: string = randomUUID()): AnalysisJob {
  const now = new Date().toISOString();
  return {
    id,
    media: { ...media },
    stage: 'pending',
    status: JobStatus.PENDING,
    result: { version: RESULT_VERSION, segments: [] },
    createdAt: now,
    updatedAt: now
  };
}

/**
 * Main Veriframe class
 * Submits media for analysis and answers status, result and report queries
 */
export class Veriframe {
  readonly store: JobStore;
  readonly config: AnalysisConfig;
  private runner: JobRunner;
  private logger: Logger;
  private submissions = new KeyedMutex();

  constructor(options: VeriframeOptions = {}) {
    this.store = options.store ?? new InMemoryJobStore();
    this.config = options.config ?? resolveConfig();
    this.logger = options.logger ?? silentLogger;
    this.runner = new JobRunner({
      store: this.store,
      config: this.config,
      readMedia: options.readMedia,
      scorers: options.scorers,
      logger: this.logger
    });
  }

  /**
   * Create a pending job for the media, or return the one already active
   * for the same media id. A running job that no runner has touched for
   * `staleAfterMs` is failed as abandoned and replaced.
   */
  submit(media: MediaReference): Promise<AnalysisJob> {
    return this.submissions.run(media.id, async () => {
      const jobs = await this.store.list();
      const active = jobs.find((job) => job.media.id === media.id && !isTerminal(job.status));
      if (active && !this.isOrphaned(active)) {
        this.logger.info('Reusing active analysis job', { jobId: active.id, mediaId: media.id });
        return active;
      }
      if (active) {
        await this.runner.cancel(active.id, 'Analysis abandoned');
        this.logger.warn('Replacing abandoned analysis job', { jobId: active.id, mediaId: media.id });
      }

      const job = await this.store.create(createJob(media));
      this.logger.info('Analysis job created', { jobId: job.id, mediaId: media.id });
      return job;
    });
  }

  private isOrphaned(job: AnalysisJob): boolean {
    if (job.status !== JobStatus.RUNNING || this.runner.isActive(job.id)) return false;
    return Date.now() - Date.parse(job.updatedAt) > this.config.staleAfterMs;
  }

  start(jobId: string): Promise<StartOutcome> {
    return this.runner.start(jobId);
  }

  /** Submit and start in one call */
  async analyze(media: MediaReference): Promise<StartOutcome> {
    const job = await this.submit(media);
    return this.runner.start(job.id);
  }

  async status(jobId: string): Promise<JobStatusView> {
    return toStatusView(await this.job(jobId));
  }

  async result(jobId: string): Promise<JobResultView> {
    return toResultView(await this.job(jobId));
  }

  /**
   * @throws ReportNotReadyError unless the job is done
   */
  async report(jobId: string): Promise<ForensicReport> {
    return buildReport(await this.job(jobId));
  }

  cancel(jobId: string, reason?: string): Promise<CancelOutcome> {
    return this.runner.cancel(jobId, reason);
  }

  waitFor(jobId: string): Promise<AnalysisJob> {
    return this.runner.waitFor(jobId);
  }

  async job(jobId: string): Promise<AnalysisJob> {
    const job = await this.store.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }
}

export default Veriframe;
