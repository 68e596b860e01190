/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DEFAULT_SAMPLE_SEED, isValidSeed } from '../core/index.js';

export const DEFAULT_NUM_SAMPLES = 10;

export interface SamplerEnvConfig {
  numSamples: number;
  seed: number;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parses a base-10 integer, rejecting fractions, exponents and trailing text.
 */
export const parseInteger = (raw: string): number | undefined => {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : undefined;
};

const readEnvInteger = (
  env: NodeJS.ProcessEnv,
  name: string,
  accept: (value: number) => boolean,
): number | undefined => {
  const raw = env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = parseInteger(raw);
  return value !== undefined && accept(value) ? value : undefined;
};

export function resolveSamplerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SamplerEnvConfig {
  return {
    numSamples:
      readEnvInteger(env, 'LOG_SAMPLER_NUM_SAMPLES', (value) => value >= 0) ?? DEFAULT_NUM_SAMPLES,
    seed: readEnvInteger(env, 'LOG_SAMPLER_SEED', isValidSeed) ?? DEFAULT_SAMPLE_SEED,
  };
}
