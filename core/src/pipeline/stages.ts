/**
 * Stage sequencer for analysis jobs.
 *
 * Every job walks the whole sequence in order. Failure is a status, not a
 * stage: a failed job keeps the stage it was in when it failed.
 */

export const STAGE_SEQUENCE = [
  'pending',
  'validating',
  'extracting',
  'transcribing',
  'infer_video',
  'infer_audio',
  'lipsync',
  'fusion',
  'report',
  'done',
] as const;

export type Stage = (typeof STAGE_SEQUENCE)[number];

/** Stages that run a producer; `pending` and `done` only mark the ends. */
export type WorkStage = Exclude<Stage, 'pending' | 'done'>;

interface StageDisplay {
  progress: number;
  label: string;
}

// Display projection only. Transitions never consult this table.
const STAGE_DISPLAY: Record<Stage, StageDisplay> = {
  pending: { progress: 0, label: 'Initializing...' },
  validating: { progress: 15, label: 'Validating file...' },
  extracting: { progress: 30, label: 'Extracting frames & audio...' },
  transcribing: { progress: 45, label: 'Transcribing audio...' },
  infer_video: { progress: 55, label: 'Analyzing video frames...' },
  infer_audio: { progress: 65, label: 'Analyzing audio patterns...' },
  lipsync: { progress: 75, label: 'Checking lip synchronization...' },
  fusion: { progress: 85, label: 'Fusing predictions...' },
  report: { progress: 95, label: 'Generating report...' },
  done: { progress: 100, label: 'Complete!' },
};

export function isStage(value: unknown): value is Stage {
  return typeof value === 'string' && (STAGE_SEQUENCE as readonly string[]).includes(value);
}

export function isWorkStage(stage: Stage): stage is WorkStage {
  return stage !== 'pending' && stage !== 'done';
}

export function stageIndex(stage: Stage): number {
  return STAGE_SEQUENCE.indexOf(stage);
}

/**
 * The stage that follows `stage`, or null once the sequence is exhausted.
 */
export function nextStage(stage: Stage): Stage | null {
  const index = stageIndex(stage);
  return index < STAGE_SEQUENCE.length - 1 ? STAGE_SEQUENCE[index + 1] : null;
}

/** True when `to` is `from` itself or its immediate successor. */
export function canAdvance(from: Stage, to: Stage): boolean {
  return from === to || nextStage(from) === to;
}

export function isAfter(stage: Stage, reference: Stage): boolean {
  return stageIndex(stage) > stageIndex(reference);
}

export function progressFor(stage: Stage): number {
  return STAGE_DISPLAY[stage].progress;
}

export function stageLabel(stage: Stage): string {
  return STAGE_DISPLAY[stage].label;
}
