/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { join, resolve } from 'node:path';
import {
  describeSampling,
  sampleLogDocument,
  type DeterministicRng,
  type SampledBundleResult,
  type SampledIndex,
  type SampledLogSummary,
} from '../core/index.js';
import type { BundleObserver } from '../types/index.js';
import {
  copyPath,
  fileExists,
  listJsonFiles,
  readJsonFile,
  resetDirectory,
  touchFile,
  writeJsonFile,
  ensureDirectory,
} from '../tools/index.js';

export const LOGS_DIR_NAME = 'logs';
export const INDEX_FILE_NAME = 'logs.json';
export const STATIC_ENTRIES = ['assets', 'index.html', 'robots.txt'] as const;
export const NO_JEKYLL_MARKER = '.nojekyll';

export interface SampledBundleOptions {
  sourceDir: string;
  outputDir: string;
  targetCount: number;
  rng: DeterministicRng;
  observer?: BundleObserver;
}

/**
 * Rebuilds `outputDir` from `sourceDir` with every log reduced to at most
 * `targetCount` samples, plus a `logs/logs.json` index of the results.
 *
 * Logs are visited in ascending file-name order and all draw from the one
 * `rng`, so a fixed seed reproduces the same bundle. Steps are not rolled back
 * on failure.
 */
export async function assembleSampledBundle(
  options: SampledBundleOptions,
): Promise<SampledBundleResult> {
  const { targetCount, rng, observer } = options;
  if (!Number.isInteger(targetCount) || targetCount < 0) {
    throw new RangeError(`Sample count must be a non-negative integer, got ${targetCount}.`);
  }
  const sourceDir = resolve(options.sourceDir);
  const outputDir = resolve(options.outputDir);
  const sourceLogsDir = join(sourceDir, LOGS_DIR_NAME);
  const logsDir = join(outputDir, LOGS_DIR_NAME);
  const indexPath = join(logsDir, INDEX_FILE_NAME);

  const replacing = await fileExists(outputDir);
  await resetDirectory(outputDir);
  observer?.onStage?.({
    stage: 'reset',
    message: replacing ? `Replaced ${outputDir}` : `Created ${outputDir}`,
  });

  observer?.onStage?.({ stage: 'copy', message: 'Copying static files...' });
  for (const entry of STATIC_ENTRIES) {
    await copyPath(join(sourceDir, entry), join(outputDir, entry));
  }

  await touchFile(join(outputDir, NO_JEKYLL_MARKER));
  observer?.onStage?.({ stage: 'marker', message: `Wrote ${NO_JEKYLL_MARKER}` });

  await ensureDirectory(logsDir);
  const fileNames = await listJsonFiles(sourceLogsDir, new Set([INDEX_FILE_NAME]));
  observer?.onLogDiscovered?.({ fileNames });
  observer?.onStage?.({
    stage: 'sample',
    message: `Sampling log files to ${targetCount} examples each...`,
  });

  const index: SampledIndex = {};
  const logs: SampledLogSummary[] = [];
  for (const [position, fileName] of fileNames.entries()) {
    const document = await readJsonFile(join(sourceLogsDir, fileName));
    const summary = describeSampling(fileName, document, targetCount);
    const sampled = sampleLogDocument(document, targetCount, rng);
    await writeJsonFile(join(logsDir, fileName), sampled);
    index[fileName] = sampled;
    logs.push(summary);
    observer?.onLogSampled?.(summary, { current: position + 1, total: fileNames.length });
  }

  await writeJsonFile(indexPath, index);
  observer?.onStage?.({
    stage: 'index',
    message: `Indexed ${fileNames.length} log file(s) in ${INDEX_FILE_NAME}`,
  });

  return {
    outputDir,
    logsDir,
    indexPath,
    targetCount,
    seed: rng.seed,
    logs,
  };
}
