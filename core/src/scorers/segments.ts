import { clampUnit, roundTo } from '../math/stats';
import type { EvidenceSegment, Modality } from '../types';

/** Segment position as fractions of the media duration. */
export interface SegmentTemplate {
  from: number;
  to: number;
  /** Fixed local score; when omitted the modality score is used */
  score?: number;
  reason: string;
}

export function placeSegments(
  segmentType: Modality,
  templates: readonly SegmentTemplate[],
  durationMs: number,
  modalityScore: number
): EvidenceSegment[] {
  if (durationMs <= 0) return [];

  const segments: EvidenceSegment[] = [];
  for (const template of templates) {
    const startMs = Math.round(template.from * durationMs);
    const endMs = Math.min(durationMs, Math.round(template.to * durationMs));
    if (startMs < 0 || endMs <= startMs) continue;
    segments.push({
      startMs,
      endMs,
      segmentType,
      score: roundTo(clampUnit(template.score ?? modalityScore), 3),
      reason: template.reason
    });
  }
  return segments;
}
