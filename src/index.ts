/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './core/index.js';
export * from './types/index.js';
export { assembleSampledBundle, createConsoleObserver, type SampledBundleOptions } from './runner/index.js';
export { resolveSamplerConfigFromEnv, DEFAULT_NUM_SAMPLES } from './config/sampler-config.js';
export { main as runCli } from './cli/main.js';
