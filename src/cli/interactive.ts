/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import prompts from 'prompts';
import { MAX_SAMPLE_SEED } from '../core/index.js';
import type { RunnerOptions } from './args.js';

export async function runInteractiveSetup(options: RunnerOptions): Promise<void> {
  const responses = await prompts(
    [
      {
        type: 'text',
        name: 'sourceDir',
        message: 'Path to the source log bundle (assets/, index.html, logs/)',
        initial: options.sourceDir,
      },
      {
        type: 'text',
        name: 'outputDir',
        message: 'Directory to write the sampled bundle to (replaced if it exists)',
        initial: options.outputDir,
      },
      {
        type: 'number',
        name: 'numSamples',
        message: 'Samples to keep per log file',
        initial: options.numSamples,
        min: 0,
      },
      {
        type: 'number',
        name: 'seed',
        message: 'Random seed',
        initial: options.seed,
        min: 0,
        max: MAX_SAMPLE_SEED,
      },
    ],
    {
      onCancel: () => {
        console.log('Interactive setup cancelled.');
        process.exit(1);
      },
    },
  );

  if (typeof responses.sourceDir === 'string' && responses.sourceDir.trim()) {
    options.sourceDir = resolve(responses.sourceDir.trim());
  }
  if (typeof responses.outputDir === 'string' && responses.outputDir.trim()) {
    options.outputDir = resolve(responses.outputDir.trim());
  }
  if (typeof responses.numSamples === 'number' && Number.isInteger(responses.numSamples)) {
    options.numSamples = responses.numSamples;
  }
  if (typeof responses.seed === 'number' && Number.isInteger(responses.seed)) {
    options.seed = responses.seed;
  }
}
