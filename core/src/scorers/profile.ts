import type { ScoringConfig } from '../config';
import { SeededRandom } from '../crypto/utils';
import type {
  AudioAnalysis,
  EvidenceSegment,
  MediaMetadata,
  VideoAnalysis
} from '../types';

export interface ScorerInput {
  metadata: MediaMetadata;
  config: ScoringConfig;
  /** Prior stage outputs, for scorers that build on them */
  video?: VideoAnalysis;
  audio?: AudioAnalysis;
}

export interface ModalityOutput<T> {
  result: T;
  segments: EvidenceSegment[];
}

export type Scorer<T> = (input: ScorerInput) => ModalityOutput<T>;

/**
 * Whether the simulation treats a file as manipulated, and how strongly.
 * Every scorer derives its numbers from the same profile so the
 * modalities agree with each other.
 */
export interface ManipulationProfile {
  suspected: boolean;
  keywordMatch: boolean;
  baseScore: number;
}

export function manipulationProfile(metadata: MediaMetadata, config: ScoringConfig): ManipulationProfile {
  const rng = new SeededRandom(`${config.seed}:${metadata.fileHash}:profile`);
  const name = metadata.filename.toLowerCase();
  const keywordMatch = config.demoKeywords.some((keyword) => name.includes(keyword.toLowerCase()));
  const draw = rng.next();
  const suspected = keywordMatch || draw < config.baseFakeRate;
  const baseScore = suspected ? rng.uniform(0.78, 0.96) : rng.uniform(0.04, 0.22);

  return { suspected, keywordMatch, baseScore };
}

export function scorerRandom(input: ScorerInput, modality: string): SeededRandom {
  return new SeededRandom(`${input.config.seed}:${input.metadata.fileHash}:${modality}`);
}
