/**
 * constants/limits.ts — Upload limits and defaults.
 *
 * ## Categories
 *
 * - **Parts**: Default part size for multipart transfers
 * - **Batch**: Maximum files per draft without zipping
 * - **Network**: Request timeout applied to every HTTP call
 * - **Files**: Names skipped when collecting a directory
 */
export const LIMITS = {
  // ── Parts ─────────────────────────────────────────────────────────
  /** Default part size for multipart transfers — 100 MiB */
  DEFAULT_PART_SIZE: 100 * 1024 * 1024, // 100MB
  /** Bytes per MiB, for --part-size and RDM_PART_SIZE_MB */
  MIB: 1024 * 1024,
  /**
   * Largest part read into a single buffer (Node caps a Buffer at 4 GiB;
   * storage accepts up to 5 GiB per part).
   */
  MAX_PART_SIZE_MIB: 4095,
  MAX_PART_SIZE: 4095 * 1024 * 1024,

  // ── Batch ─────────────────────────────────────────────────────────
  /**
   * More files than this are refused unless the directory is zipped first.
   * Enforced by the submission service before the draft is created.
   */
  MAX_FILES_PER_DRAFT: 100,

  // ── Network ───────────────────────────────────────────────────────
  /** Header and body timeout for every request (ms) — 5 minutes */
  REQUEST_TIMEOUT_MS: 300_000,

  // ── Files ─────────────────────────────────────────────────────────
  /** Entry names never collected, in addition to dot-files */
  IGNORED_NAMES: ['__pycache__', '.DS_Store'] as const,
} as const;
