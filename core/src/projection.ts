import { overallPercentFor } from './fusion/fusion';
import { progressFor, stageLabel } from './pipeline/stages';
import { AnalysisJob, AnalysisResult, JobStatus, Stage, Verdict } from './types';

export interface JobStatusView {
  jobId: string;
  status: JobStatus;
  stage: Stage;
  progressPercent: number;
  label: string;
  errorMessage?: string;
  updatedAt: string;
}

export interface ReadyResultView {
  state: 'ready';
  jobId: string;
  overallScore: number;
  overallPercent: number;
  verdict: Verdict;
  result: AnalysisResult;
  completedAt?: string;
}

export interface PendingResultView {
  state: 'not_ready';
  jobId: string;
  status: JobStatus;
  stage: Stage;
  progressPercent: number;
}

export interface FailedResultView {
  state: 'failed';
  jobId: string;
  stage: Stage;
  errorMessage: string;
  completedAt?: string;
}

export type JobResultView = ReadyResultView | PendingResultView | FailedResultView;

/** What a polling client sees. Progress comes from the stage alone. */
export function toStatusView(job: AnalysisJob): JobStatusView {
  const view: JobStatusView = {
    jobId: job.id,
    status: job.status,
    stage: job.stage,
    progressPercent: progressFor(job.stage),
    label: job.status === JobStatus.FAILED ? 'Analysis failed' : stageLabel(job.stage),
    updatedAt: job.updatedAt
  };
  if (job.errorMessage) view.errorMessage = job.errorMessage;
  return view;
}

/**
 * Full results for finished jobs only. Partial results of a failed job stay
 * on the record for diagnostics and are not exposed here.
 */
export function toResultView(job: AnalysisJob): JobResultView {
  if (job.status === JobStatus.FAILED) {
    return {
      state: 'failed',
      jobId: job.id,
      stage: job.stage,
      errorMessage: job.errorMessage ?? 'Analysis failed',
      completedAt: job.completedAt
    };
  }
  if (job.status === JobStatus.DONE && job.overallScore !== undefined && job.verdict !== undefined) {
    return {
      state: 'ready',
      jobId: job.id,
      overallScore: job.overallScore,
      overallPercent: overallPercentFor(job.overallScore),
      verdict: job.verdict,
      result: job.result,
      completedAt: job.completedAt
    };
  }
  return {
    state: 'not_ready',
    jobId: job.id,
    status: job.status,
    stage: job.stage,
    progressPercent: progressFor(job.stage)
  };
}
