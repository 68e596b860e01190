/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { pickSortedIndices, type DeterministicRng } from './random.js';
import { isJsonObject } from './json.js';
import type { JsonObject, JsonValue, SampledLogSummary } from './types.js';

const readSamples = (document: JsonObject): JsonValue[] | undefined => {
  const samples = document['samples'];
  if (samples === undefined || samples === null) {
    return undefined;
  }
  if (!Array.isArray(samples)) {
    throw new TypeError(`Log document "samples" must be an array, got ${typeof samples}.`);
  }
  return samples;
};

const requireObject = (parent: JsonObject, key: string, path: string): JsonObject => {
  const value = parent[key];
  if (!isJsonObject(value)) {
    throw new Error(`Log document is missing "${path}"; cannot update sample bookkeeping.`);
  }
  return value;
};

/**
 * Counts used for progress reporting; does not consume the random stream.
 */
export const describeSampling = (
  fileName: string,
  document: JsonValue,
  targetCount: number,
): SampledLogSummary => {
  const originalCount = isJsonObject(document) ? readSamples(document)?.length ?? 0 : 0;
  const reduced = originalCount > targetCount;
  return {
    fileName,
    originalCount,
    keptCount: reduced ? targetCount : originalCount,
    reduced,
  };
};

/**
 * Reduces `samples` to `targetCount` entries drawn from `rng` and rewrites the
 * summary counts to match. Documents already at or below the target, or with
 * no samples at all, come back as the same value with nothing touched.
 *
 * The input is never mutated. When a reduction is needed but `eval.dataset`
 * or `results` is absent, an error is thrown before any draw is made.
 */
export function sampleLogDocument<T extends JsonValue>(
  document: T,
  targetCount: number,
  rng: DeterministicRng,
): T | JsonObject {
  if (!isJsonObject(document)) {
    return document;
  }
  const source: JsonObject = document;
  const samples = readSamples(source);
  if (!samples || samples.length === 0 || samples.length <= targetCount) {
    return document;
  }

  const evalSection = requireObject(source, 'eval', 'eval');
  const dataset = requireObject(evalSection, 'dataset', 'eval.dataset');
  const results = requireObject(source, 'results', 'results');

  const positions = pickSortedIndices(rng, samples.length, targetCount);
  const sampleIds = Array.from({ length: targetCount }, (_, index) => index + 1);

  return {
    ...source,
    samples: positions.map((position) => samples[position]),
    eval: {
      ...evalSection,
      dataset: {
        ...dataset,
        samples: targetCount,
        sample_ids: sampleIds,
      },
    },
    results: {
      ...results,
      total_samples: targetCount,
      completed_samples: targetCount,
    },
  };
}
