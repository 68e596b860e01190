#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { render } from 'ink';
import { createDeterministicRng, logConsole } from '../core/index.js';
import { assembleSampledBundle, createConsoleObserver } from '../runner/index.js';
import { LogSamplerApp, type LogSamplerRunOptions } from '../ui/log-sampler-app.js';
import {
  assertRunnable,
  CliUsageError,
  parseArgs,
  USAGE,
  USAGE_EXAMPLE,
  type RunnerOptions,
} from './args.js';
import { runInteractiveSetup } from './interactive.js';

const runPlain = async (options: LogSamplerRunOptions): Promise<void> => {
  logConsole('info', 'Creating sampled log bundle', [
    ['source', options.sourceDir],
    ['output', options.outputDir],
    ['samples per log', options.numSamples],
    ['seed', options.seed],
  ]);
  const result = await assembleSampledBundle({
    sourceDir: options.sourceDir,
    outputDir: options.outputDir,
    targetCount: options.numSamples,
    rng: createDeterministicRng(options.seed),
    observer: createConsoleObserver(),
  });
  logConsole('info', 'Sampled bundle created', [
    ['output', result.outputDir],
    ['logs', result.logs.length],
    ['index', result.indexPath],
  ]);
};

/**
 * Prints a failure the way the CLI reports it and returns the exit status.
 */
export const reportFailure = (error: unknown): number => {
  if (error instanceof CliUsageError) {
    console.error(`${error.message}\n${USAGE}\n${USAGE_EXAMPLE}`);
  } else {
    logConsole('error', 'Failed to sample log bundle', [
      ['error', error instanceof Error ? error.message : String(error)],
    ]);
  }
  return 1;
};

/**
 * Runs the CLI and resolves to the exit status. Failures outside the terminal
 * view are thrown for `reportFailure`; the view renders its own.
 */
export const main = async (argv: string[] = process.argv.slice(2)): Promise<number> => {
  const options: RunnerOptions = parseArgs(argv);
  if (options.help) {
    console.log(`${USAGE}\n${USAGE_EXAMPLE}`);
    return 0;
  }

  if (options.interactive) {
    await runInteractiveSetup(options);
  }
  assertRunnable(options);

  const runOptions: LogSamplerRunOptions = {
    sourceDir: options.sourceDir,
    outputDir: options.outputDir,
    numSamples: options.numSamples,
    seed: options.seed,
  };

  if (options.plain || !process.stdout.isTTY) {
    await runPlain(runOptions);
    return 0;
  }

  const { waitUntilExit } = render(<LogSamplerApp options={runOptions} />);
  // The app shows the error in its ERROR box before exiting with it.
  return waitUntilExit().then(
    () => 0,
    () => 1,
  );
};

const isEntryPoint = (): boolean => {
  const invoked = process.argv[1];
  if (!invoked) {
    return false;
  }
  try {
    return realpathSync(invoked) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
};

if (isEntryPoint()) {
  main().then(
    (status) => process.exit(status),
    (error: unknown) => process.exit(reportFailure(error)),
  );
}
