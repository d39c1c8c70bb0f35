import type { Stage } from '../pipeline/stages';

export type { Stage, WorkStage } from '../pipeline/stages';

export enum JobStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  DONE = 'done',
  FAILED = 'failed'
}

export enum Verdict {
  AUTHENTIC = 'AUTHENTIC',
  SUSPICIOUS = 'SUSPICIOUS',
  LIKELY_FAKE = 'LIKELY_FAKE'
}

export enum MediaKind {
  VIDEO = 'video',
  AUDIO = 'audio',
  IMAGE = 'image'
}

export const MODALITIES = ['video', 'audio', 'lipsync'] as const;

export type Modality = (typeof MODALITIES)[number];

/**
 * A stored upload, as handed over by the ingestion side.
 * The job keeps a copy of the reference; the file itself is owned elsewhere.
 */
export interface MediaReference {
  id: string;
  filename: string;
  storagePath: string;
  sizeBytes: number;
  mimeType: string;
  /** SHA-256 hex digest of the stored bytes */
  contentHash: string;
}

export interface StreamProperties {
  container: string;
  codec: string;
  resolution: string | null;
  width: number | null;
  height: number | null;
  fps: number | null;
  durationMs: number;
  bitrateKbps: number;
  audioChannels: number;
  sampleRate: number | null;
}

export interface TranscriptSummary {
  language: string | null;
  wordCount: number;
  speechRatio: number;
}

export interface MediaMetadata {
  /** `sha256:<hex>` */
  fileHash: string;
  filename: string;
  mimeType: string;
  sizeBytes: number;
  kind: MediaKind;
  stream?: StreamProperties;
  transcript?: TranscriptSummary;
}

export type ManipulationType = 'none' | 'face_swap' | 'face_reenactment' | 'lip_sync_manipulation';

export interface VideoArtifacts {
  boundaryArtifacts: boolean;
  temporalInconsistency: boolean;
  colorHistogramAnomaly: boolean;
  compressionArtifacts: boolean;
}

export interface VideoAnalysis {
  applicable: boolean;
  score: number;
  confidence: number;
  framesAnalyzed: number;
  facesDetected: number;
  faceDetectionConfidence: number;
  manipulationType: ManipulationType;
  manipulationMethod: string | null;
  blendingScore: number;
  artifacts: VideoArtifacts;
  suspiciousFrames: number;
  highConfidenceFakeFrames: number;
}

export type FormantConsistency = 'LOW' | 'NORMAL';

export interface AudioAnalysis {
  applicable: boolean;
  score: number;
  confidence: number;
  voiceCloningDetected: boolean;
  cloningMethod: string | null;
  sampleRate: number;
  durationAnalyzedMs: number;
  spectral: {
    mfccAnomalyScore: number;
    formantConsistency: FormantConsistency;
    pitchVariance: number;
    harmonicRatio: number;
  };
  voiceIdentity: {
    speakerEmbeddingDistance: number;
    naturalnessScore: number;
  };
}

export interface LipSyncAnalysis {
  applicable: boolean;
  score: number;
  confidence: number;
  mismatchDetected: boolean;
  /** Negative when the audio leads the video */
  syncOffsetMs: number;
  correlationScore: number;
  phonemeAccuracy: number;
  visemeMatchRate: number;
}

export interface EvidenceSegment {
  startMs: number;
  endMs: number;
  segmentType: Modality;
  score: number;
  reason: string;
}

export type FusionWeights = Record<Modality, number>;

export type ModalityScores = Record<Modality, number>;

export interface FusionOutcome {
  overallScore: number;
  overallPercent: number;
  verdict: Verdict;
  weights: FusionWeights;
  modalityScores: ModalityScores;
  agreement: number;
  concerns: string[];
}

/** One scorer invocation, as recorded in a job's result. */
export interface ModelRun {
  modality: Modality;
  modelName: string;
  modelVersion: string;
  score: number;
}

export interface ReportSummary {
  summary: string;
  readyForRendering: boolean;
}

export interface AnalysisResult {
  version: string;
  metadata?: MediaMetadata;
  video?: VideoAnalysis;
  audio?: AudioAnalysis;
  lipsync?: LipSyncAnalysis;
  segments: EvidenceSegment[];
  /** In stage order; one entry per finished modality stage */
  modelRuns?: ModelRun[];
  fusion?: Omit<FusionOutcome, 'overallScore' | 'verdict'>;
  report?: ReportSummary;
}

export interface AnalysisJob {
  id: string;
  media: MediaReference;
  stage: Stage;
  status: JobStatus;
  errorMessage?: string;
  result: AnalysisResult;
  overallScore?: number;
  verdict?: Verdict;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
}

export function isTerminal(status: JobStatus): boolean {
  return status === JobStatus.DONE || status === JobStatus.FAILED;
}
