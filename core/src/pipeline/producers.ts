import type { AnalysisConfig } from '../config';
import { AnalysisError, ScorerError } from '../errors';
import { fuseScores } from '../fusion/fusion';
import { probeStreams, summarizeTranscript, validateMedia } from '../media/metadata';
import type { MediaReader } from '../media/source';
import { summarize } from '../report';
import { modelRun, ScorerSet } from '../scorers';
import type { AnalysisJob, AnalysisResult, FusionOutcome, MediaMetadata, Modality, ReportSummary } from '../types';
import type { WorkStage } from './stages';

/**
 * Working state of one run. `result` is the runner's private draft; it
 * only becomes visible when the runner publishes it with the next stage.
 */
export interface StageContext {
  job: AnalysisJob;
  config: AnalysisConfig;
  scorers: ScorerSet;
  readMedia: MediaReader;
  result: AnalysisResult;
  content?: Buffer;
  fusion?: FusionOutcome;
  report?: ReportSummary;
}

export type StageProducer = (ctx: StageContext) => Promise<void> | void;

function requireMetadata(ctx: StageContext): MediaMetadata {
  if (!ctx.result.metadata) {
    throw new AnalysisError('Media metadata is missing; validation did not complete', 'input');
  }
  return ctx.result.metadata;
}

async function loadContent(ctx: StageContext): Promise<Buffer> {
  if (!ctx.content) {
    ctx.content = await ctx.readMedia(ctx.job.media);
  }
  return ctx.content;
}

function recordRun(ctx: StageContext, modality: Modality, score: number): void {
  ctx.result.modelRuns = [...(ctx.result.modelRuns ?? []), modelRun(modality, score)];
}

export const STAGE_PRODUCERS: Record<WorkStage, StageProducer> = {
  async validating(ctx) {
    const content = await loadContent(ctx);
    ctx.result.metadata = validateMedia(ctx.job.media, content);
  },

  async extracting(ctx) {
    const metadata = requireMetadata(ctx);
    const content = await loadContent(ctx);
    ctx.result.metadata = { ...metadata, stream: probeStreams(content, metadata) };
  },

  transcribing(ctx) {
    const metadata = requireMetadata(ctx);
    ctx.result.metadata = { ...metadata, transcript: summarizeTranscript(metadata) };
  },

  infer_video(ctx) {
    const output = ctx.scorers.video({ metadata: requireMetadata(ctx), config: ctx.config });
    ctx.result.video = output.result;
    ctx.result.segments.push(...output.segments);
    recordRun(ctx, 'video', output.result.score);
  },

  infer_audio(ctx) {
    const output = ctx.scorers.audio({ metadata: requireMetadata(ctx), config: ctx.config });
    ctx.result.audio = output.result;
    ctx.result.segments.push(...output.segments);
    recordRun(ctx, 'audio', output.result.score);
  },

  lipsync(ctx) {
    const output = ctx.scorers.lipsync({
      metadata: requireMetadata(ctx),
      config: ctx.config,
      video: ctx.result.video,
      audio: ctx.result.audio
    });
    ctx.result.lipsync = output.result;
    ctx.result.segments.push(...output.segments);
    recordRun(ctx, 'lipsync', output.result.score);
  },

  fusion(ctx) {
    const { video, audio, lipsync } = ctx.result;
    if (!video) throw new ScorerError('video', 'no score to fuse');
    if (!audio) throw new ScorerError('audio', 'no score to fuse');
    if (!lipsync) throw new ScorerError('lipsync', 'no score to fuse');
    ctx.fusion = fuseScores(
      { video: video.score, audio: audio.score, lipsync: lipsync.score },
      ctx.config.weights
    );
  },

  report(ctx) {
    if (!ctx.fusion) {
      throw new AnalysisError('Cannot prepare a report before fusion', 'not_ready');
    }
    ctx.report = { summary: summarize(ctx.fusion), readyForRendering: true };
  }
};
