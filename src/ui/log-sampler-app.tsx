/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import { createDeterministicRng, type SampledBundleResult } from '../core/index.js';
import { assembleSampledBundle } from '../runner/index.js';
import type { BundleObserver } from '../types/index.js';

export interface LogSamplerRunOptions {
  sourceDir: string;
  outputDir: string;
  numSamples: number;
  seed: number;
}

interface Stats {
  reduced: number;
  kept: number;
  examplesBefore: number;
  examplesAfter: number;
}

interface AppState {
  stats: Stats;
  currentFile: number;
  totalFiles: number;
  lastEvent: string;
}

const initialState: AppState = {
  stats: { reduced: 0, kept: 0, examplesBefore: 0, examplesAfter: 0 },
  currentFile: 0,
  totalFiles: 0,
  lastEvent: 'Initializing...',
};

export interface LogSamplerAppProps {
  options: LogSamplerRunOptions;
}

export const LogSamplerApp: React.FC<LogSamplerAppProps> = ({ options }) => {
  const [state, setState] = useState<AppState>(initialState);
  const [result, setResult] = useState<SampledBundleResult | undefined>();
  const [error, setError] = useState<string | undefined>();
  const { exit } = useApp();

  useEffect(() => {
    let cancelled = false;

    const observer: BundleObserver = {
      onStage: (event) => {
        if (cancelled) return;
        setState((prev) => ({ ...prev, lastEvent: `[${event.stage}] ${event.message}` }));
      },

      onLogDiscovered: (info) => {
        if (cancelled) return;
        setState((prev) => ({ ...prev, totalFiles: info.fileNames.length }));
      },

      onLogSampled: (summary, progress) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          currentFile: progress.current,
          totalFiles: progress.total,
          stats: {
            reduced: prev.stats.reduced + (summary.reduced ? 1 : 0),
            kept: prev.stats.kept + (summary.reduced ? 0 : 1),
            examplesBefore: prev.stats.examplesBefore + summary.originalCount,
            examplesAfter: prev.stats.examplesAfter + summary.keptCount,
          },
          lastEvent: summary.reduced
            ? `${summary.fileName}: sampled ${summary.keptCount} from ${summary.originalCount} examples`
            : `${summary.fileName}: keeping all ${summary.originalCount} examples`,
        }));
      },
    };

    assembleSampledBundle({
      sourceDir: options.sourceDir,
      outputDir: options.outputDir,
      targetCount: options.numSamples,
      rng: createDeterministicRng(options.seed),
      observer,
    })
      .then((res) => {
        if (cancelled) return;
        setResult(res);
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        setError(err instanceof Error ? err.message : String(err));
      });

    return () => {
      cancelled = true;
    };
  }, [options]);

  useEffect(() => {
    if (result || error) {
      const timer = setTimeout(() => exit(error ? new Error(error) : undefined), 200);
      return () => clearTimeout(timer);
    }
    return undefined;
  }, [result, error, exit]);

  const progressPercent = calculateProgress(state.currentFile, state.totalFiles);
  const progressBar = renderBar(progressPercent, 30);

  return (
    <Box flexDirection="column">
      <Box borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text bold color="cyanBright">
          LOG SAMPLER
        </Text>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="gray" flexDirection="column" paddingX={1} paddingY={0}>
        <Box>
          <Text dimColor>Source: </Text>
          <Text color="white">{options.sourceDir}</Text>
          <Text dimColor> | Output: </Text>
          <Text color="cyan">{options.outputDir}</Text>
        </Box>
        <Box>
          <Text dimColor>Samples per log: </Text>
          <Text>{options.numSamples}</Text>
          <Text dimColor> | Seed: </Text>
          <Text>{options.seed}</Text>
          <Text dimColor> | File: </Text>
          <Text>
            {state.currentFile}/{state.totalFiles || '?'}
          </Text>
        </Box>
        <Box>
          <Text dimColor>Reduced: </Text>
          <Text color="greenBright">{state.stats.reduced}</Text>
          <Text dimColor> | Kept whole: </Text>
          <Text color="yellow">{state.stats.kept}</Text>
          <Text dimColor> | Examples: </Text>
          <Text color="cyan">
            {state.stats.examplesBefore} → {state.stats.examplesAfter}
          </Text>
        </Box>
        <Box>
          <Text dimColor>Progress: </Text>
          <Text color="greenBright">{progressBar}</Text>
          <Text color="white"> {progressPercent}%</Text>
        </Box>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="magenta" paddingX={1} paddingY={0}>
        <Text bold color="magenta">
          Activity:{' '}
        </Text>
        <Text>{state.lastEvent}</Text>
      </Box>

      {result && (
        <Box marginTop={1} borderStyle="double" borderColor="greenBright" flexDirection="column" paddingX={1} paddingY={0}>
          <Text bold color="greenBright">
            ✓ COMPLETE
          </Text>
          <Text>
            Sampled bundle created at: <Text color="cyan">{result.outputDir}</Text>
          </Text>
          <Text>
            Processed {result.logs.length} log file(s) | Reduced {state.stats.reduced}
          </Text>
          <Text dimColor>Index: {result.indexPath}</Text>
        </Box>
      )}

      {error && (
        <Box marginTop={1} borderStyle="bold" borderColor="red" paddingX={1} paddingY={0}>
          <Text color="redBright">ERROR: {error}</Text>
        </Box>
      )}
    </Box>
  );
};

function calculateProgress(current: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((current / total) * 100);
}

function renderBar(percent: number, width: number): string {
  const filled = Math.round((percent / 100) * width);
  const empty = width - filled;
  return '█'.repeat(filled) + '░'.repeat(empty);
}
