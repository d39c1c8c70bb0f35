import { createJob } from '../index';
import { toResultView, toStatusView } from '../projection';
import { AnalysisJob, JobStatus, Verdict } from '../types';
import { mediaFor, mp4Bytes } from './fixtures';

function pendingJob(): AnalysisJob {
  return { ...createJob(mediaFor('holiday.mp4', 'video/mp4', mp4Bytes()), 'job-1'), updatedAt: '2024-05-01T10:00:00.000Z' };
}

describe('Status/Result projection', () => {
  describe('toStatusView', () => {
    it('should show a pending job at zero progress', () => {
      expect(toStatusView(pendingJob())).toEqual({
        jobId: 'job-1',
        status: JobStatus.PENDING,
        stage: 'pending',
        progressPercent: 0,
        label: 'Initializing...',
        updatedAt: '2024-05-01T10:00:00.000Z'
      });
    });

    it('should derive progress from the stage', () => {
      const job: AnalysisJob = { ...pendingJob(), status: JobStatus.RUNNING, stage: 'infer_audio' };
      const view = toStatusView(job);

      expect(view.progressPercent).toBe(65);
      expect(view.label).toBe('Analyzing audio patterns...');
      expect(view.errorMessage).toBeUndefined();
    });

    it('should keep the stage of a failed job and show its error', () => {
      const job: AnalysisJob = {
        ...pendingJob(),
        status: JobStatus.FAILED,
        stage: 'lipsync',
        errorMessage: 'lipsync scorer: transcript is missing'
      };
      const view = toStatusView(job);

      expect(view.stage).toBe('lipsync');
      expect(view.progressPercent).toBe(75);
      expect(view.label).toBe('Analysis failed');
      expect(view.errorMessage).toBe('lipsync scorer: transcript is missing');
    });
  });

  describe('toResultView', () => {
    it('should report unfinished jobs as not ready', () => {
      const job: AnalysisJob = { ...pendingJob(), status: JobStatus.RUNNING, stage: 'fusion' };

      expect(toResultView(job)).toEqual({
        state: 'not_ready',
        jobId: 'job-1',
        status: JobStatus.RUNNING,
        stage: 'fusion',
        progressPercent: 85
      });
    });

    it('should expose the failure without partial results', () => {
      const job: AnalysisJob = {
        ...pendingJob(),
        status: JobStatus.FAILED,
        stage: 'extracting',
        errorMessage: 'Unreadable media: unrecognized container format',
        completedAt: '2024-05-01T10:00:02.000Z'
      };

      expect(toResultView(job)).toEqual({
        state: 'failed',
        jobId: 'job-1',
        stage: 'extracting',
        errorMessage: 'Unreadable media: unrecognized container format',
        completedAt: '2024-05-01T10:00:02.000Z'
      });
    });

    it('should return score, verdict and result once done', () => {
      const job: AnalysisJob = {
        ...pendingJob(),
        status: JobStatus.DONE,
        stage: 'done',
        overallScore: 0.685,
        verdict: Verdict.SUSPICIOUS,
        completedAt: '2024-05-01T10:00:05.000Z'
      };
      const view = toResultView(job);

      expect(view).toEqual({
        state: 'ready',
        jobId: 'job-1',
        overallScore: 0.685,
        overallPercent: 68.5,
        verdict: Verdict.SUSPICIOUS,
        result: job.result,
        completedAt: '2024-05-01T10:00:05.000Z'
      });
    });
  });
});
