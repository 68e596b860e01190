/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { parseInteger, resolveSamplerConfigFromEnv } from '../../src/config/sampler-config.js';

describe('parseInteger', () => {
  it('accepts signed base-10 integers with surrounding space', () => {
    expect(parseInteger('10')).toBe(10);
    expect(parseInteger(' -3 ')).toBe(-3);
    expect(parseInteger('+8')).toBe(8);
  });

  it('rejects anything else', () => {
    for (const raw of ['', '1.5', '1e3', '0x10', '12abc', 'NaN', '99999999999999999999']) {
      expect(parseInteger(raw)).toBeUndefined();
    }
  });
});

describe('resolveSamplerConfigFromEnv', () => {
  it('falls back to built-in defaults', () => {
    expect(resolveSamplerConfigFromEnv({})).toEqual({ numSamples: 10, seed: 42 });
  });

  it('reads overrides', () => {
    expect(
      resolveSamplerConfigFromEnv({ LOG_SAMPLER_NUM_SAMPLES: '5', LOG_SAMPLER_SEED: '9' }),
    ).toEqual({ numSamples: 5, seed: 9 });
  });

  it('ignores invalid overrides', () => {
    expect(
      resolveSamplerConfigFromEnv({ LOG_SAMPLER_NUM_SAMPLES: '-2', LOG_SAMPLER_SEED: 'abc' }),
    ).toEqual({ numSamples: 10, seed: 42 });
  });

  it('ignores seeds outside the unsigned 32-bit range', () => {
    expect(resolveSamplerConfigFromEnv({ LOG_SAMPLER_SEED: '-9' }).seed).toBe(42);
    expect(resolveSamplerConfigFromEnv({ LOG_SAMPLER_SEED: '4294967296' }).seed).toBe(42);
    expect(resolveSamplerConfigFromEnv({ LOG_SAMPLER_SEED: '4294967295' }).seed).toBe(4294967295);
  });
});
