/**
 * Video forensics scorer.
 *
 * Simulates frame-level face manipulation analysis: frames sampled at
 * 5 fps, face detection, blending and temporal artifacts. Stills are
 * scored as a single frame.
 */

import { ScorerError } from '../errors';
import { clampUnit, roundTo } from '../math/stats';
import { ManipulationType, MediaKind, VideoAnalysis } from '../types';
import { manipulationProfile, ModalityOutput, ScorerInput, scorerRandom } from './profile';
import { placeSegments, SegmentTemplate } from './segments';

const SAMPLE_FPS = 5;

const MANIPULATION_TYPES: readonly ManipulationType[] = [
  'face_swap',
  'face_reenactment',
  'lip_sync_manipulation'
];

const MANIPULATION_METHODS = ['DeepFaceLab', 'FaceSwap', 'FSGAN', 'First Order Motion'];

const MANIPULATED_SEGMENTS: readonly SegmentTemplate[] = [
  {
    from: 0.08,
    to: 0.23,
    reason: 'Facial boundary blending artifacts - GAN-generated edges show inconsistent pixel gradients at jawline'
  },
  {
    from: 0.25,
    to: 0.34,
    score: 0.81,
    reason: 'Temporal flickering detected in eye region - irregular blink patterns inconsistent with natural eye movement'
  },
  {
    from: 0.45,
    to: 0.59,
    score: 0.74,
    reason: 'Unnatural head pose transitions - motion vectors show discontinuities inconsistent with physics'
  }
];

const BENIGN_SEGMENTS: readonly SegmentTemplate[] = [
  {
    from: 0.35,
    to: 0.46,
    score: 0.28,
    reason: 'Minor compression artifact detected - likely from video re-encoding (benign)'
  }
];

// Clean media above this base score still gets a benign note
const BENIGN_NOTE_THRESHOLD = 0.12;

function notApplicable(): VideoAnalysis {
  return {
    applicable: false,
    score: 0,
    confidence: 0,
    framesAnalyzed: 0,
    facesDetected: 0,
    faceDetectionConfidence: 0,
    manipulationType: 'none',
    manipulationMethod: null,
    blendingScore: 0,
    artifacts: {
      boundaryArtifacts: false,
      temporalInconsistency: false,
      colorHistogramAnomaly: false,
      compressionArtifacts: false
    },
    suspiciousFrames: 0,
    highConfidenceFakeFrames: 0
  };
}

export function scoreVideo(input: ScorerInput): ModalityOutput<VideoAnalysis> {
  const { metadata } = input;
  const stream = metadata.stream;
  if (!stream) {
    throw new ScorerError('video', 'stream properties are missing');
  }
  if (metadata.kind === MediaKind.AUDIO) {
    return { result: notApplicable(), segments: [] };
  }

  const profile = manipulationProfile(metadata, input.config);
  const rng = scorerRandom(input, 'video');
  const suspected = profile.suspected;

  const score = clampUnit(profile.baseScore + rng.uniform(-0.08, 0.08));
  const confidence = clampUnit(0.89 + rng.uniform(-0.05, 0.05));
  const framesAnalyzed = metadata.kind === MediaKind.IMAGE
    ? 1
    : Math.max(1, Math.round((stream.durationMs / 1000) * SAMPLE_FPS));
  const suspiciousFrames = Math.min(framesAnalyzed, suspected ? rng.int(15, 45) : rng.int(0, 5));

  const result: VideoAnalysis = {
    applicable: true,
    score,
    confidence,
    framesAnalyzed,
    facesDetected: rng.int(1, 3),
    faceDetectionConfidence: 0.97,
    manipulationType: suspected ? rng.pick(MANIPULATION_TYPES) : 'none',
    manipulationMethod: suspected ? rng.pick(MANIPULATION_METHODS) : null,
    blendingScore: roundTo(suspected ? rng.uniform(0.7, 0.95) : rng.uniform(0.05, 0.2), 3),
    artifacts: {
      boundaryArtifacts: suspected,
      temporalInconsistency: suspected && metadata.kind === MediaKind.VIDEO && rng.chance(0.7),
      colorHistogramAnomaly: suspected && rng.chance(0.5),
      compressionArtifacts: rng.chance(0.3)
    },
    suspiciousFrames,
    highConfidenceFakeFrames: suspected ? Math.min(suspiciousFrames, rng.int(8, 25)) : 0
  };

  const templates = suspected
    ? MANIPULATED_SEGMENTS
    : profile.baseScore > BENIGN_NOTE_THRESHOLD ? BENIGN_SEGMENTS : [];

  return {
    result,
    segments: placeSegments('video', templates, stream.durationMs, score)
  };
}
