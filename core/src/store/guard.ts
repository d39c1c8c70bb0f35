import { InvalidTransitionError, JobImmutableError } from '../errors';
import { canAdvance, isStage } from '../pipeline/stages';
import { AnalysisJob, isTerminal, JobStatus } from '../types';

const STATUS_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  [JobStatus.PENDING]: [JobStatus.PENDING, JobStatus.RUNNING, JobStatus.FAILED],
  [JobStatus.RUNNING]: [JobStatus.RUNNING, JobStatus.DONE, JobStatus.FAILED],
  [JobStatus.DONE]: [],
  [JobStatus.FAILED]: []
};

export function assertWritable(job: AnalysisJob): void {
  if (isTerminal(job.status)) {
    throw new JobImmutableError(job.id, job.status);
  }
}

/**
 * Field invariants every stored snapshot must satisfy.
 */
export function assertConsistent(job: AnalysisJob): void {
  const done = job.status === JobStatus.DONE;
  const failed = job.status === JobStatus.FAILED;

  if ((job.stage === 'done') !== done) {
    throw new InvalidTransitionError(`Job ${job.id}: stage "done" and status "done" must go together`);
  }
  if ((job.overallScore !== undefined) !== done || (job.verdict !== undefined) !== done) {
    throw new InvalidTransitionError(`Job ${job.id}: overall score and verdict exist only once done`);
  }
  if (Boolean(job.errorMessage) !== failed) {
    throw new InvalidTransitionError(`Job ${job.id}: error message exists only once failed`);
  }
  if (job.status === JobStatus.PENDING && job.stage !== 'pending') {
    throw new InvalidTransitionError(`Job ${job.id}: a pending job cannot be in stage ${job.stage}`);
  }
}

/**
 * Checks a proposed write against the current snapshot: one stage forward at
 * most, legal status moves only, and nothing after a terminal status.
 */
export function assertTransition(previous: AnalysisJob, next: AnalysisJob): void {
  assertWritable(previous);

  if (next.id !== previous.id) {
    throw new InvalidTransitionError(`Job ${previous.id}: id cannot change`);
  }
  if (!isStage(next.stage) || !canAdvance(previous.stage, next.stage)) {
    throw new InvalidTransitionError(
      `Job ${previous.id}: cannot move from stage ${previous.stage} to ${next.stage}`
    );
  }
  if (!STATUS_TRANSITIONS[previous.status].includes(next.status)) {
    throw new InvalidTransitionError(
      `Job ${previous.id}: cannot move from status ${previous.status} to ${next.status}`
    );
  }
  assertConsistent(next);
}
