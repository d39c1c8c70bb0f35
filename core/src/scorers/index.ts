import type { AudioAnalysis, LipSyncAnalysis, Modality, ModelRun, VideoAnalysis } from '../types';
import { scoreAudio } from './audio';
import { scoreLipSync } from './lipsync';
import type { Scorer } from './profile';
import { scoreVideo } from './video';

export * from './profile';
export * from './segments';
export { scoreVideo } from './video';
export { scoreAudio } from './audio';
export { scoreLipSync } from './lipsync';

export interface ScorerSet {
  video: Scorer<VideoAnalysis>;
  audio: Scorer<AudioAnalysis>;
  lipsync: Scorer<LipSyncAnalysis>;
}

export const DEFAULT_SCORERS: ScorerSet = {
  video: scoreVideo,
  audio: scoreAudio,
  lipsync: scoreLipSync
};

/** Names the simulated models report under; fixed so results stay reproducible. */
export const SCORER_MODELS: Record<Modality, { name: string; version: string }> = {
  video: { name: 'video-forensics-sim', version: '1.0.0' },
  audio: { name: 'audio-spoof-sim', version: '1.0.0' },
  lipsync: { name: 'lipsync-verifier-sim', version: '1.0.0' }
};

export function modelRun(modality: Modality, score: number): ModelRun {
  const model = SCORER_MODELS[modality];
  return { modality, modelName: model.name, modelVersion: model.version, score };
}
