import { ReportNotReadyError } from './errors';
import { overallPercentFor } from './fusion/fusion';
import { toPercent } from './math/stats';
import {
  AnalysisJob,
  EvidenceSegment,
  FusionOutcome,
  FusionWeights,
  JobStatus,
  MediaKind,
  Modality,
  Verdict
} from './types';

export const REPORT_VERSION = '2.0.0';

export interface ModalityBreakdown {
  applicable: boolean;
  score: number;
  percent: number;
  confidence: number;
}

export interface ForensicReport {
  version: string;
  jobId: string;
  generatedAt: string;
  media: {
    filename: string;
    mimeType: string;
    kind: MediaKind | null;
    fileHash: string | null;
    durationMs: number | null;
    resolution: string | null;
  };
  verdict: {
    label: Verdict;
    overallScore: number;
    overallPercent: number;
    summary: string;
  };
  analysis: Record<Modality, ModalityBreakdown>;
  weights: FusionWeights | null;
  agreement: number | null;
  concerns: string[];
  segments: EvidenceSegment[];
}

/** One-line verdict summary shown at the top of a report. */
export function summarize(fusion: Pick<FusionOutcome, 'overallScore' | 'verdict'>): string {
  switch (fusion.verdict) {
    case Verdict.AUTHENTIC:
      return `This media appears AUTHENTIC with ${toPercent(1 - fusion.overallScore)}% confidence. No significant manipulation indicators detected.`;
    case Verdict.SUSPICIOUS:
      return `This media is SUSPICIOUS with a ${overallPercentFor(fusion.overallScore)}% suspicion score. Some anomalies detected; manual review recommended.`;
    case Verdict.LIKELY_FAKE:
      return `POTENTIAL DEEPFAKE detected with a ${overallPercentFor(fusion.overallScore)}% suspicion score. Multiple manipulation indicators found across video, audio, and lip-sync analysis.`;
  }
}

function breakdown(job: AnalysisJob, modality: Modality): ModalityBreakdown {
  const analysis = job.result[modality];
  if (!analysis) {
    return { applicable: false, score: 0, percent: 0, confidence: 0 };
  }
  return {
    applicable: analysis.applicable,
    score: analysis.score,
    percent: toPercent(analysis.score),
    confidence: analysis.confidence
  };
}

/**
 * Assemble the document a renderer turns into JSON, text or PDF.
 * Only finished jobs have a report.
 */
export function buildReport(job: AnalysisJob): ForensicReport {
  if (job.status !== JobStatus.DONE || job.overallScore === undefined || job.verdict === undefined) {
    throw new ReportNotReadyError(job.id, job.status);
  }

  const { metadata, fusion } = job.result;
  return {
    version: REPORT_VERSION,
    jobId: job.id,
    generatedAt: job.completedAt ?? job.updatedAt,
    media: {
      filename: job.media.filename,
      mimeType: job.media.mimeType,
      kind: metadata?.kind ?? null,
      fileHash: metadata?.fileHash ?? null,
      durationMs: metadata?.stream?.durationMs ?? null,
      resolution: metadata?.stream?.resolution ?? null
    },
    verdict: {
      label: job.verdict,
      overallScore: job.overallScore,
      overallPercent: overallPercentFor(job.overallScore),
      summary: job.result.report?.summary ?? summarize({ overallScore: job.overallScore, verdict: job.verdict })
    },
    analysis: {
      video: breakdown(job, 'video'),
      audio: breakdown(job, 'audio'),
      lipsync: breakdown(job, 'lipsync')
    },
    weights: fusion?.weights ?? null,
    agreement: fusion?.agreement ?? null,
    concerns: fusion?.concerns ?? [],
    segments: [...job.result.segments].sort((a, b) => a.startMs - b.startMs || a.endMs - b.endMs)
  };
}
