import { ReportNotReadyError } from '../errors';
import { createJob } from '../index';
import { buildReport, summarize } from '../report';
import { AnalysisJob, JobStatus, MediaKind, Verdict } from '../types';
import { mediaFor, mp4Bytes, videoStream } from './fixtures';

function doneJob(): AnalysisJob {
  const job = createJob(mediaFor('holiday.mp4', 'video/mp4', mp4Bytes()), 'job-1');
  return {
    ...job,
    status: JobStatus.DONE,
    stage: 'done',
    overallScore: 0.685,
    verdict: Verdict.SUSPICIOUS,
    completedAt: '2024-05-01T10:00:05.000Z',
    result: {
      version: '1.0.0',
      metadata: {
        fileHash: 'sha256:abc',
        filename: 'holiday.mp4',
        mimeType: 'video/mp4',
        sizeBytes: 256,
        kind: MediaKind.VIDEO,
        stream: videoStream(20_000)
      },
      segments: [
        { startMs: 9000, endMs: 11800, segmentType: 'video', score: 0.74, reason: 'head pose' },
        { startMs: 1600, endMs: 4600, segmentType: 'video', score: 0.85, reason: 'blending' },
        { startMs: 1600, endMs: 3000, segmentType: 'audio', score: 0.6, reason: 'formants' }
      ],
      fusion: {
        overallPercent: 68.5,
        weights: { video: 0.5, audio: 0.3, lipsync: 0.2 },
        modalityScores: { video: 0.85, audio: 0.6, lipsync: 0.4 },
        agreement: 0.816,
        concerns: ['Visual manipulation artifacts detected', 'Synthetic audio patterns detected']
      },
      report: { summary: 'stored summary', readyForRendering: true }
    }
  };
}

describe('Report', () => {
  describe('summarize', () => {
    it('should describe each verdict tier', () => {
      expect(summarize({ overallScore: 0.12, verdict: Verdict.AUTHENTIC })).toBe(
        'This media appears AUTHENTIC with 88% confidence. No significant manipulation indicators detected.'
      );
      expect(summarize({ overallScore: 0.685, verdict: Verdict.SUSPICIOUS })).toBe(
        'This media is SUSPICIOUS with a 68.5% suspicion score. Some anomalies detected; manual review recommended.'
      );
      expect(summarize({ overallScore: 0.9, verdict: Verdict.LIKELY_FAKE })).toBe(
        'POTENTIAL DEEPFAKE detected with a 90% suspicion score. Multiple manipulation indicators found across video, audio, and lip-sync analysis.'
      );
    });
  });

  describe('buildReport', () => {
    it('should assemble a finished job', () => {
      const report = buildReport(doneJob());

      expect(report.version).toBe('2.0.0');
      expect(report.jobId).toBe('job-1');
      expect(report.generatedAt).toBe('2024-05-01T10:00:05.000Z');
      expect(report.media).toEqual({
        filename: 'holiday.mp4',
        mimeType: 'video/mp4',
        kind: MediaKind.VIDEO,
        fileHash: 'sha256:abc',
        durationMs: 20000,
        resolution: '1280x720'
      });
      expect(report.verdict).toEqual({
        label: Verdict.SUSPICIOUS,
        overallScore: 0.685,
        overallPercent: 68.5,
        summary: 'stored summary'
      });
      expect(report.weights).toEqual({ video: 0.5, audio: 0.3, lipsync: 0.2 });
      expect(report.agreement).toBe(0.816);
      expect(report.concerns).toHaveLength(2);
    });

    it('should order segments by start, then end', () => {
      const report = buildReport(doneJob());

      expect(report.segments.map((s) => s.reason)).toEqual(['formants', 'blending', 'head pose']);
    });

    it('should mark modalities without a result as not applicable', () => {
      expect(buildReport(doneJob()).analysis.lipsync).toEqual({
        applicable: false,
        score: 0,
        percent: 0,
        confidence: 0
      });
    });

    it('should refuse unfinished jobs', () => {
      const job = createJob(mediaFor('holiday.mp4', 'video/mp4', mp4Bytes()), 'job-1');

      expect(() => buildReport(job)).toThrow(ReportNotReadyError);
      expect(() => buildReport(job)).toThrow('Report for job job-1 is not available while the job is pending');
    });

    it('should refuse failed jobs', () => {
      const job: AnalysisJob = { ...doneJob(), status: JobStatus.FAILED, overallScore: undefined, verdict: undefined };

      expect(() => buildReport(job)).toThrow('not available while the job is failed');
    });
  });
});
