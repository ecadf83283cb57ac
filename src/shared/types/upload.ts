/**
 * types/upload.ts — Upload targets, part plans and transfer sessions.
 *
 * ## Multipart Transfer Flow
 *
 *   POST /api/records/{id}/draft/files               → FileInitRequest[] → entries[]
 *   PUT  {part url}                                  → (raw bytes, Content-MD5)
 *   POST /api/records/{id}/draft/files/{key}/commit  → (no body)
 *
 * An UploadTarget is resolved once from the collected file list. Each target
 * gets a PartPlan (no network) and, after initialization, a
 * FileTransferSession describing where its parts go.
 */

/** One local file to upload */
export interface UploadTarget {
  readonly path: string;    // Absolute local path
  readonly key: string;     // Logical key on the record (path relative to the upload root)
  readonly size: number;    // Bytes, > 0
}

/** How a file is split into parts */
export interface PartPlan {
  readonly partSize: number;
  readonly partCount: number;
  readonly lastPartSize: number;
}

/** Byte range of one part within its file */
export interface PartRange {
  readonly offset: number;
  readonly length: number;
}

/** One entry of the batch initialization request */
export interface FileInitRequest {
  key: string;
  size: number;
  metadata: { description: string };
  transfer: {
    type: string;
    parts: number;
    part_size: number;
  };
}

/** A part's pre-signed destination */
export interface PartTarget {
  readonly partNumber: number;  // 1-indexed
  readonly url: string;         // Pre-signed storage URL
}

/** Server-issued transfer description for one file */
export interface FileTransferSession {
  readonly key: string;
  readonly size: number;
  readonly partSize: number;
  readonly partCount: number;
  readonly parts: readonly PartTarget[];  // Sorted by partNumber, 1..partCount
}
