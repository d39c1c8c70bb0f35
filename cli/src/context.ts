import path from 'path';
import {
  AnalysisConfigInput,
  configFromEnv,
  FileJobStore,
  parseWeights,
  Veriframe
} from '@veriframe/core';
import { loggerFor } from './logger';
import { DEFAULT_STORE_DIR } from './media';

export interface StoreOptions {
  store?: string;
  verbose?: boolean;
}

export interface PipelineOptions extends StoreOptions {
  seed?: string;
  weights?: string;
  delay?: string;
  timeout?: string;
}

function integerOption(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`--${name} must be a whole number of milliseconds, got "${value}"`);
  }
  return parsed;
}

/** Flags win over VERIFRAME_* variables; unset flags leave them alone. */
export function overridesFrom(options: PipelineOptions): AnalysisConfigInput {
  const overrides: AnalysisConfigInput = {};
  if (options.seed !== undefined) overrides.seed = options.seed;
  if (options.weights !== undefined) overrides.weights = parseWeights(options.weights);
  if (options.delay !== undefined) overrides.stageDelayMs = integerOption('delay', options.delay);
  if (options.timeout !== undefined) overrides.timeoutMs = integerOption('timeout', options.timeout);
  return overrides;
}

export function storeDirectory(options: StoreOptions): string {
  return path.resolve(options.store ?? process.env.VERIFRAME_STORE ?? DEFAULT_STORE_DIR);
}

export function openVeriframe(options: PipelineOptions): Veriframe {
  return new Veriframe({
    store: new FileJobStore(storeDirectory(options)),
    config: configFromEnv(process.env, overridesFrom(options)),
    logger: loggerFor(options.verbose)
  });
}
