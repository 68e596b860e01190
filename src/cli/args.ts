/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import { isValidSeed, MAX_SAMPLE_SEED } from '../core/index.js';
import { parseInteger, resolveSamplerConfigFromEnv } from '../config/sampler-config.js';

export const USAGE = 'Usage: eval-log-sampler <source_bundle> <output_dir> [num_samples] [--seed <n>] [--interactive] [--plain]';
export const USAGE_EXAMPLE = 'Example: eval-log-sampler my-logs-www my-logs-sampled 10';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export interface RunnerOptions {
  sourceDir: string;
  outputDir: string;
  numSamples: number;
  seed: number;
  interactive?: boolean;
  plain?: boolean;
  help?: boolean;
}

const parseIntegerArg = (name: string, raw: string | undefined): number => {
  if (raw === undefined) {
    throw new CliUsageError(`Missing value for ${name}.`);
  }
  const value = parseInteger(raw);
  if (value === undefined) {
    throw new CliUsageError(`Invalid ${name} "${raw}": expected an integer.`);
  }
  return value;
};

export const parseArgs = (
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): RunnerOptions => {
  const defaults = resolveSamplerConfigFromEnv(env);
  const options: RunnerOptions = {
    sourceDir: '',
    outputDir: '',
    numSamples: defaults.numSamples,
    seed: defaults.seed,
  };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--seed':
        options.seed = parseIntegerArg('--seed', argv[++i]);
        break;
      case '--interactive':
        options.interactive = true;
        break;
      case '--plain':
        options.plain = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new CliUsageError(`Unknown argument: ${arg}`);
        }
        positionals.push(arg);
    }
  }

  if (positionals.length > 3) {
    throw new CliUsageError(`Unexpected argument: ${positionals[3]}`);
  }
  const [sourceDir, outputDir, numSamples] = positionals;
  if (sourceDir !== undefined) {
    options.sourceDir = resolve(sourceDir);
  }
  if (outputDir !== undefined) {
    options.outputDir = resolve(outputDir);
  }
  if (numSamples !== undefined) {
    options.numSamples = parseIntegerArg('num_samples', numSamples);
  }

  return options;
};

/**
 * Checks what interactive setup may still have filled in.
 */
export const assertRunnable = (options: RunnerOptions): void => {
  if (!options.sourceDir || !options.outputDir) {
    throw new CliUsageError('Expected <source_bundle> and <output_dir>.');
  }
  if (options.numSamples < 0) {
    throw new CliUsageError(`num_samples must not be negative, got ${options.numSamples}.`);
  }
  if (!isValidSeed(options.seed)) {
    throw new CliUsageError(`--seed must be between 0 and ${MAX_SAMPLE_SEED}, got ${options.seed}.`);
  }
};
