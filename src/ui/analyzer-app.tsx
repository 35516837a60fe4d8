/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import type {
  PerformanceAnalysisOptions,
  PerformanceAnalysisResult,
} from '../runner/index.js';
import { runPerformanceAnalysis } from '../runner/index.js';
import type { AnalysisObserver } from '../types/index.js';

interface Progress {
  current: number;
  total: number;
  analysed: number;
  skipped: number;
}

interface AppState {
  currentRun: string;
  progress: Progress;
  lastEvent: string;
}

const initialState: AppState = {
  currentRun: '...',
  progress: { current: 0, total: 0, analysed: 0, skipped: 0 },
  lastEvent: 'Discovering runs...',
};

export interface AnalyzerAppProps {
  options: PerformanceAnalysisOptions;
}

export const AnalyzerApp: React.FC<AnalyzerAppProps> = ({ options }) => {
  const [state, setState] = useState<AppState>(initialState);
  const [result, setResult] = useState<PerformanceAnalysisResult | undefined>();
  const [error, setError] = useState<string | undefined>();
  const { exit } = useApp();

  useEffect(() => {
    let cancelled = false;

    const observer: AnalysisObserver = {
      onDiscovery: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress: { ...prev.progress, total: info.runs },
          lastEvent: `Found ${info.runs} run(s)`,
        }));
      },

      onRunStart: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          currentRun: info.key,
          progress: { ...prev.progress, current: info.index + 1, total: info.total },
          lastEvent: `Analysing ${info.metadata.fileName}`,
        }));
      },

      onRunComplete: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress: { ...prev.progress, analysed: prev.progress.analysed + 1 },
          lastEvent: `${info.key}: ${info.records} operation(s), ${info.samples} sample(s)`,
        }));
      },

      onRunFailed: (failure) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress:
            failure.scope === 'run'
              ? { ...prev.progress, skipped: prev.progress.skipped + 1 }
              : prev.progress,
          lastEvent: `[${failure.code}] ${failure.reason}`,
        }));
      },
    };

    runPerformanceAnalysis({ ...options, observer })
      .then((res) => {
        if (cancelled) return;
        setResult(res);
      })
      .catch((err) => {
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
  }, [result, error, exit]);

  const { progress } = state;
  const percent = progress.total === 0 ? 0 : Math.round(((progress.analysed + progress.skipped) / progress.total) * 100);

  return (
    <Box flexDirection="column">
      <Box borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text bold color="cyanBright">
          PERFORMANCE LOG ANALYZER
        </Text>
      </Box>

      <Box marginTop={1} borderStyle="single" borderColor="gray" flexDirection="column" paddingX={1} paddingY={0}>
        <Box>
          <Text dimColor>Run: </Text>
          <Text color="cyan">{state.currentRun}</Text>
          <Text dimColor> | Progress: </Text>
          <Text>
            {progress.current}/{progress.total || '?'}
          </Text>
        </Box>
        <Box>
          <Text dimColor>Analysed: </Text>
          <Text color="greenBright">{progress.analysed}</Text>
          <Text dimColor> | Skipped: </Text>
          <Text color="yellow">{progress.skipped}</Text>
        </Box>
        <Box>
          <Text dimColor>Done: </Text>
          <Text color="greenBright">{renderBar(percent, 30)}</Text>
          <Text color="white"> {percent}%</Text>
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
            Analysed {result.analysed.length} run(s) | Skipped{' '}
            {result.failures.filter((failure) => failure.scope === 'run').length}
          </Text>
          {result.reportPath ? (
            <Text>
              Report: <Text color="cyan">{result.reportPath}</Text>
            </Text>
          ) : (
            <Text color="yellow">No report written: no run could be read.</Text>
          )}
          {result.seriesPaths.length > 0 && (
            <Text dimColor>Chart series: {result.seriesPaths.length} file(s) in {result.runDirectory}</Text>
          )}
          {result.failureReportPath && <Text color="red">Skipped runs and series: {result.failureReportPath}</Text>}
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

function renderBar(percent: number, width: number): string {
  const filled = Math.round((percent / 100) * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}
