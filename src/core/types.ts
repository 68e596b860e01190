/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LosslessNumber } from 'lossless-json';

/**
 * Numbers that do not survive a round trip through a double stay as
 * `LosslessNumber` and are written back with their original digits.
 */
export type JsonPrimitive = string | number | boolean | null | LosslessNumber;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * One evaluation run as stored under `logs/`. The sampler reads `samples`,
 * `eval.dataset` and `results`; everything else is carried through untouched.
 */
export type LogDocument = JsonObject;

/** File name -> sampled document, persisted as `logs/logs.json`. */
export type SampledIndex = Record<string, JsonValue>;

export interface SampledLogSummary {
  fileName: string;
  originalCount: number;
  keptCount: number;
  reduced: boolean;
}

export interface SampledBundleResult {
  outputDir: string;
  logsDir: string;
  indexPath: string;
  targetCount: number;
  seed: number;
  logs: SampledLogSummary[];
}
