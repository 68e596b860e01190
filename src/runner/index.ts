/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export {
  assembleSampledBundle,
  type SampledBundleOptions,
  INDEX_FILE_NAME,
  LOGS_DIR_NAME,
  NO_JEKYLL_MARKER,
  STATIC_ENTRIES,
} from './bundle-assembler.js';

export { createConsoleObserver } from './console-observer.js';
