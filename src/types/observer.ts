/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { SampledLogSummary } from '../core/types.js';

export type BundleStage = 'reset' | 'copy' | 'marker' | 'sample' | 'index';

export interface StageEvent {
  stage: BundleStage;
  message: string;
}

export interface LogProgress {
  current: number;
  total: number;
}

export interface BundleObserver {
  onStage?(event: StageEvent): void;
  onLogDiscovered?(info: { fileNames: string[] }): void;
  onLogSampled?(summary: SampledLogSummary, progress: LogProgress): void;
}
