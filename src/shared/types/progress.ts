/**
 * types/progress.ts — Progress callback contract for the upload engine.
 *
 * The engine reports each file once when it starts (partNumber 0, loaded 0)
 * and again after every part the storage endpoint has accepted. `loaded` is
 * the cumulative number of bytes transmitted for that file and only grows.
 */
export interface UploadProgress {
  key: string;          // Logical key of the file being uploaded
  loaded: number;       // Bytes accepted by storage so far
  total: number;        // File size in bytes
  percent: number;      // 0-100, one decimal
  partNumber: number;   // Last accepted part (0 for initial state)
  partCount: number;    // Total parts for this file
}

export type OnProgress = (progress: UploadProgress) => void;
