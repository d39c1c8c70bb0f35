import { setTimeout as sleep } from 'timers/promises';
import { AnalysisConfig, resolveConfig } from '../config';
import {
  AnalysisError,
  errorMessage,
  JobConflictError,
  JobImmutableError,
  JobNotFoundError
} from '../errors';
import { Logger, silentLogger } from '../logger';
import { MediaReader, readMediaFile } from '../media/source';
import { DEFAULT_SCORERS, ScorerSet } from '../scorers';
import type { JobStore } from '../store/types';
import { AnalysisJob, isTerminal, JobStatus, Stage } from '../types';
import { STAGE_PRODUCERS, StageContext } from './producers';
import { isWorkStage, nextStage } from './stages';

export interface JobRunnerOptions {
  store: JobStore;
  config?: AnalysisConfig;
  readMedia?: MediaReader;
  /** Replace individual scorers, e.g. with calibrated ones */
  scorers?: Partial<ScorerSet>;
  logger?: Logger;
}

export type StartOutcome =
  | { accepted: true; job: AnalysisJob; completion: Promise<AnalysisJob> }
  | { accepted: false; job: AnalysisJob; reason: string };

export interface CancelOutcome {
  cancelled: boolean;
  job: AnalysisJob;
}

/** Raised inside a run when the record was finished by someone else. */
class RunHalted extends Error {
  constructor(readonly status: JobStatus) {
    super(`run halted: job is ${status}`);
  }
}

function failed(job: AnalysisJob, message: string): AnalysisJob {
  return {
    ...job,
    status: JobStatus.FAILED,
    errorMessage: message || 'Analysis failed',
    completedAt: new Date().toISOString()
  };
}

/**
 * Drives analysis jobs through the stage sequence.
 *
 * Each job runs as its own async task with its stages strictly in order.
 * A stage's output is published together with the entry into the next
 * stage, in a single store update, so readers never see a stage's result
 * before the stage has finished.
 */
export class JobRunner {
  private readonly store: JobStore;
  private readonly config: AnalysisConfig;
  private readonly readMedia: MediaReader;
  private readonly scorers: ScorerSet;
  private readonly logger: Logger;
  private running = new Map<string, Promise<AnalysisJob>>();

  constructor(options: JobRunnerOptions) {
    this.store = options.store;
    this.config = options.config ?? resolveConfig();
    this.readMedia = options.readMedia ?? readMediaFile;
    this.scorers = { ...DEFAULT_SCORERS, ...options.scorers };
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Claim a pending job and run it in the background. Starting a job that
   * is already running or finished changes nothing and reports why.
   */
  async start(jobId: string): Promise<StartOutcome> {
    const current = await this.store.get(jobId);
    if (!current) throw new JobNotFoundError(jobId);
    if (current.status !== JobStatus.PENDING) {
      return this.rejectStart(current);
    }

    let claimed: AnalysisJob;
    try {
      claimed = await this.store.update(jobId, (job) => {
        if (job.status !== JobStatus.PENDING) {
          throw new JobConflictError(`Analysis job ${jobId} was already started`);
        }
        return { ...job, status: JobStatus.RUNNING, startedAt: new Date().toISOString() };
      });
    } catch (error) {
      if (error instanceof JobConflictError || error instanceof JobImmutableError) {
        return this.rejectStart((await this.store.get(jobId)) ?? current);
      }
      throw error;
    }

    this.logger.info('Analysis job started', { jobId, media: claimed.media.filename });

    const completion = this.drive(claimed);
    this.running.set(jobId, completion);
    const forget = (): void => {
      this.running.delete(jobId);
    };
    void completion.then(forget, forget);

    return { accepted: true, job: claimed, completion };
  }

  /**
   * Mark a job failed from outside the run. An active run notices at its
   * next stage boundary and stops.
   */
  async cancel(jobId: string, reason = 'Analysis cancelled'): Promise<CancelOutcome> {
    const current = await this.store.get(jobId);
    if (!current) throw new JobNotFoundError(jobId);
    if (isTerminal(current.status)) {
      return { cancelled: false, job: current };
    }
    try {
      const job = await this.store.update(jobId, (latest) => failed(latest, reason));
      this.logger.warn('Analysis job cancelled', { jobId, stage: job.stage, reason });
      return { cancelled: true, job };
    } catch (error) {
      if (error instanceof JobImmutableError) {
        return { cancelled: false, job: (await this.store.get(jobId)) ?? current };
      }
      throw error;
    }
  }

  /** Terminal snapshot for jobs this runner drives, current snapshot otherwise. */
  async waitFor(jobId: string): Promise<AnalysisJob> {
    const active = this.running.get(jobId);
    if (active) return active;
    const job = await this.store.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  isActive(jobId: string): boolean {
    return this.running.has(jobId);
  }

  get activeCount(): number {
    return this.running.size;
  }

  private rejectStart(job: AnalysisJob): StartOutcome {
    const reason = `Analysis job ${job.id} is already ${job.status}`;
    this.logger.info('Ignoring start of non-pending job', { jobId: job.id, status: job.status });
    return { accepted: false, job, reason };
  }

  private async drive(job: AnalysisJob): Promise<AnalysisJob> {
    const startedAt = Date.now();
    const ctx: StageContext = {
      job,
      config: this.config,
      scorers: this.scorers,
      readMedia: this.readMedia,
      result: structuredClone(job.result)
    };

    try {
      let stage: Stage = 'validating';
      await this.publish(job.id, (current) => ({ ...current, stage: 'validating' }));

      while (isWorkStage(stage)) {
        if (this.config.stageDelayMs > 0) {
          await sleep(this.config.stageDelayMs);
        }
        await this.checkpoint(job.id, startedAt);

        await STAGE_PRODUCERS[stage](ctx);

        const following = nextStage(stage);
        if (!following) break;
        const result = structuredClone(ctx.result);

        if (following === 'done') {
          await this.publish(job.id, (current) => this.finish(current, ctx, result));
        } else {
          await this.publish(job.id, (current) => ({ ...current, stage: following, result }));
          this.logger.debug('Stage complete', { jobId: job.id, stage, next: following });
        }
        stage = following;
      }
    } catch (error) {
      return this.fail(job.id, error);
    }

    const finished = await this.latest(job.id);
    this.logger.info('Analysis job finished', {
      jobId: job.id,
      overallScore: finished.overallScore,
      verdict: finished.verdict
    });
    return finished;
  }

  private finish(current: AnalysisJob, ctx: StageContext, result: AnalysisJob['result']): AnalysisJob {
    if (!ctx.fusion || !ctx.report) {
      throw new AnalysisError('Fusion and report must complete before the job is done', 'not_ready');
    }
    const { overallScore, verdict, ...fusion } = ctx.fusion;
    return {
      ...current,
      stage: 'done',
      status: JobStatus.DONE,
      result: { ...result, fusion, report: ctx.report },
      overallScore,
      verdict,
      completedAt: new Date().toISOString()
    };
  }

  private async checkpoint(jobId: string, startedAt: number): Promise<void> {
    const current = await this.latest(jobId);
    if (current.status !== JobStatus.RUNNING) {
      throw new RunHalted(current.status);
    }
    const { timeoutMs } = this.config;
    if (timeoutMs !== null && Date.now() - startedAt > timeoutMs) {
      throw new AnalysisError(`Analysis timed out after ${timeoutMs}ms`, 'timeout');
    }
  }

  private async publish(jobId: string, change: (current: AnalysisJob) => AnalysisJob): Promise<void> {
    try {
      await this.store.update(jobId, change);
    } catch (error) {
      if (error instanceof JobImmutableError) {
        const current = await this.latest(jobId);
        throw new RunHalted(current.status);
      }
      throw error;
    }
  }

  private async fail(jobId: string, error: unknown): Promise<AnalysisJob> {
    if (error instanceof RunHalted) {
      this.logger.info('Analysis run stopped', { jobId, status: error.status });
      return this.latest(jobId);
    }

    const message = errorMessage(error);
    try {
      const job = await this.store.update(jobId, (current) => failed(current, message));
      this.logger.warn('Analysis job failed', { jobId, stage: job.stage, error: message });
      return job;
    } catch (updateError) {
      if (updateError instanceof JobImmutableError) {
        return this.latest(jobId);
      }
      this.logger.error('Could not record analysis failure', {
        jobId,
        error: message,
        cause: errorMessage(updateError)
      });
      throw updateError;
    }
  }

  private async latest(jobId: string): Promise<AnalysisJob> {
    const job = await this.store.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }
}
