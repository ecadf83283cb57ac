/**
 * progressReporter.ts — Console rendering of upload progress.
 *
 * Implements the OnProgress callback the upload engine accepts. Writes one
 * line when a file starts and one per accepted part, through the logger so
 * the lines land on stderr next to the rest of the run's output.
 */
import type { OnProgress, UploadProgress } from '../shared';
import { logger } from '../utils/logger';
import { formatSize } from './fileService';

export function formatProgress(progress: UploadProgress): string {
  if (progress.partNumber === 0) {
    return `${progress.key}: starting (${formatSize(progress.total)}, ${progress.partCount} part(s))`;
  }
  return (
    `${progress.key}: ${progress.percent.toFixed(1)}% ` +
    `(${formatSize(progress.loaded)} of ${formatSize(progress.total)}, ` +
    `part ${progress.partNumber}/${progress.partCount})`
  );
}

export function createProgressReporter(write: (line: string) => void = logger.info): OnProgress {
  return (progress) => write(formatProgress(progress));
}
