/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { logConsole } from '../core/index.js';
import type { BundleObserver } from '../types/index.js';

/**
 * Line-oriented progress for non-interactive terminals and CI logs.
 */
export const createConsoleObserver = (): BundleObserver => ({
  onStage: (event) => {
    logConsole('info', event.stage, [['message', event.message]]);
  },
  onLogSampled: (summary, progress) => {
    logConsole('info', `Sampled ${summary.fileName}`, [
      ['file', `${progress.current}/${progress.total}`],
      [
        'result',
        summary.reduced
          ? `Sampled ${summary.keptCount} from ${summary.originalCount} examples`
          : `Keeping all ${summary.originalCount} examples`,
      ],
    ]);
  },
});
