/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types.js';
export * from './random.js';
export * from './json.js';
export * from './sampler.js';
export * from './logging.js';
