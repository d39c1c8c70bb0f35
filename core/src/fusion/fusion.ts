import { DEFAULT_FUSION_WEIGHTS } from '../config';
import { clampUnit, roundTo, std, toPercent } from '../math/stats';
import { FusionOutcome, FusionWeights, MODALITIES, Modality, ModalityScores, Verdict } from '../types';

/**
 * Lower bounds (percent, inclusive) of the upper two tiers. Verdicts are
 * taken on the exact percentage; see overallPercentFor for the shown one.
 */
export const VERDICT_THRESHOLDS = {
  suspicious: 30,
  likelyFake: 70
} as const;

// A modality above this score is listed as a concern
const CONCERN_THRESHOLD = 0.5;

const CONCERN_TEXT: Record<Modality, string> = {
  video: 'Visual manipulation artifacts detected',
  audio: 'Synthetic audio patterns detected',
  lipsync: 'Audio-visual synchronization mismatch'
};

/**
 * Map an overall score, as a percentage, to its tier.
 * Boundary values belong to the upper tier.
 */
export function verdictFor(percent: number): Verdict {
  if (!Number.isFinite(percent) || percent < 0 || percent > 100) {
    throw new RangeError(`Score percentage must be within [0, 100], got ${percent}`);
  }
  if (percent < VERDICT_THRESHOLDS.suspicious) return Verdict.AUTHENTIC;
  if (percent < VERDICT_THRESHOLDS.likelyFake) return Verdict.SUSPICIOUS;
  return Verdict.LIKELY_FAKE;
}

/**
 * The one-decimal percentage shown beside a verdict. Rounding up never
 * carries a score into the next tier: 0.29996 shows as 29.9, not 30.
 */
export function overallPercentFor(score: number): number {
  const shown = toPercent(score);
  return verdictFor(shown) === verdictFor(score * 100) ? shown : roundTo(shown - 0.1, 1);
}

/**
 * Weighted sum in a fixed modality order, so the result does not depend on
 * which stage finished first or how the score object was assembled.
 */
export function weightedScore(scores: ModalityScores, weights: FusionWeights = DEFAULT_FUSION_WEIGHTS): number {
  let total = 0;
  for (const modality of MODALITIES) {
    total += weights[modality] * clampUnit(scores[modality]);
  }
  return clampUnit(total);
}

export function fuseScores(
  scores: ModalityScores,
  weights: FusionWeights = DEFAULT_FUSION_WEIGHTS
): FusionOutcome {
  const overallScore = weightedScore(scores, weights);
  const ordered = MODALITIES.map((modality) => scores[modality]);

  return {
    overallScore,
    overallPercent: overallPercentFor(overallScore),
    verdict: verdictFor(overallScore * 100),
    weights: { ...weights },
    modalityScores: {
      video: scores.video,
      audio: scores.audio,
      lipsync: scores.lipsync
    },
    agreement: roundTo(clampUnit(1 - std(ordered)), 3),
    concerns: MODALITIES.filter((modality) => scores[modality] > CONCERN_THRESHOLD).map(
      (modality) => CONCERN_TEXT[modality]
    )
  };
}
