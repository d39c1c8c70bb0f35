import { z } from 'zod';
import { ConfigError } from './errors';
import type { FusionWeights } from './types';

/**
 * Illustrative fusion weights. They are policy, not a trained result:
 * video leads because visual manipulation is the primary signal.
 */
export const DEFAULT_FUSION_WEIGHTS: FusionWeights = {
  video: 0.5,
  audio: 0.3,
  lipsync: 0.2
};

export const DEFAULT_DEMO_KEYWORDS = ['fake', 'deep', 'manipulated', 'synthetic', 'demo'];

const WEIGHT_SUM_TOLERANCE = 1e-6;

export const fusionWeightsSchema = z
  .object({
    video: z.number().min(0).max(1),
    audio: z.number().min(0).max(1),
    lipsync: z.number().min(0).max(1)
  })
  .refine(
    (w) => Math.abs(w.video + w.audio + w.lipsync - 1) <= WEIGHT_SUM_TOLERANCE,
    { message: 'fusion weights must sum to 1' }
  );

export const analysisConfigSchema = z.object({
  /** Mixed into every scorer's random stream. Same seed + same file = same result. */
  seed: z.string().min(1).default('veriframe-v1'),
  /** Wall-clock pause before each stage runs. */
  stageDelayMs: z.number().int().min(0).default(0),
  timeoutMs: z.number().int().positive().nullable().default(null),
  /**
   * A running job no process has touched for this long is treated as
   * orphaned. Keep it well above stageDelayMs.
   */
  staleAfterMs: z.number().int().positive().default(300_000),
  weights: fusionWeightsSchema.default(DEFAULT_FUSION_WEIGHTS),
  /** Share of media without a keyword match that the simulation treats as manipulated. */
  baseFakeRate: z.number().min(0).max(1).default(0.35),
  demoKeywords: z.array(z.string().min(1)).default(DEFAULT_DEMO_KEYWORDS)
});

export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;

export type AnalysisConfigInput = z.input<typeof analysisConfigSchema>;

export type ScoringConfig = Pick<AnalysisConfig, 'seed' | 'baseFakeRate' | 'demoKeywords'>;

export function resolveConfig(input: AnalysisConfigInput = {}): AnalysisConfig {
  const parsed = analysisConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid analysis configuration - ${details}`);
  }
  return parsed.data;
}

/** Parses `video,audio,lipsync`, e.g. `0.5,0.3,0.2`. */
export function parseWeights(value: string): FusionWeights {
  const parts = value.split(',').map((part) => Number(part.trim()));
  if (parts.length !== 3 || parts.some((n) => !Number.isFinite(n))) {
    throw new ConfigError(`Weights must be three numbers "video,audio,lipsync", got "${value}"`);
  }
  const [video, audio, lipsync] = parts;
  return { video, audio, lipsync };
}

function numberFrom(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

/**
 * Reads VERIFRAME_* variables. Values that are set but invalid fail
 * validation rather than falling back to defaults.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: AnalysisConfigInput = {}
): AnalysisConfig {
  const input: AnalysisConfigInput = {};

  if (env.VERIFRAME_SEED) input.seed = env.VERIFRAME_SEED;

  const delay = numberFrom(env.VERIFRAME_STAGE_DELAY_MS);
  if (delay !== undefined) input.stageDelayMs = delay;

  const timeout = numberFrom(env.VERIFRAME_TIMEOUT_MS);
  if (timeout !== undefined) input.timeoutMs = timeout;

  const staleAfter = numberFrom(env.VERIFRAME_STALE_AFTER_MS);
  if (staleAfter !== undefined) input.staleAfterMs = staleAfter;

  const fakeRate = numberFrom(env.VERIFRAME_FAKE_RATE);
  if (fakeRate !== undefined) input.baseFakeRate = fakeRate;

  if (env.VERIFRAME_WEIGHTS) input.weights = parseWeights(env.VERIFRAME_WEIGHTS);

  return resolveConfig({ ...input, ...overrides });
}
