/**
 * uploadService.ts — Multipart upload engine.
 *
 * Uploads a batch of files into an existing draft using the repository's
 * multipart transfer protocol. One invocation moves through:
 *
 *   PLANNED → INITIALIZED → (per file: UPLOADING → COMMITTED) → DONE
 *
 * ## Flow
 *
 * 1. Plan: planParts() splits every file into fixed-size parts. No network.
 *
 * 2. Initialize (one batched call):
 *    POST /api/records/{id}/draft/files
 *    Body: [{ key, size, metadata, transfer: { type: 'M', parts, part_size } }, ...]
 *    Response: { entries: [{ key, size, transfer, links: { parts: [{ part, url }] } }] }
 *    Every submitted key must come back. A missing key aborts the whole
 *    upload with MissingFileEntryError before any bytes are sent.
 *
 * 3. Upload parts (per file, strictly in ascending part order):
 *    PUT {pre-signed url}  — raw bytes, Content-Length, Content-MD5
 *    The file is opened once and read with positional reads, so each part is
 *    exactly bytes [(p-1) * partSize, (p-1) * partSize + length). Anything
 *    but a 200 from storage aborts with PartUploadError.
 *
 * 4. Commit:
 *    POST /api/records/{id}/draft/files/{key}/commit
 *
 * ## Failure policy
 *
 * All-or-nothing: the first failure propagates and nothing after it runs —
 * no retries, no skipping to the next file. Files committed before the
 * failure stay on the draft.
 *
 * ## Progress & cancellation
 *
 * onProgress fires once per file with loaded=0, then after each part the
 * storage endpoint accepted, with the cumulative byte count. An AbortSignal
 * is checked before every file and every part; an in-flight part always
 * runs to completion.
 */
import crypto from 'crypto';
import fs from 'fs';
import type { FileHandle } from 'fs/promises';
import type {
  FileInitRequest,
  FileTransferSession,
  OnProgress,
  PartPlan,
  PartRange,
  UploadTarget,
} from '../shared';
import { LIMITS, TRANSFER } from '../shared';
import type { RepositoryClient } from '../infra/http';
import {
  CommitError,
  FileAccessError,
  HttpError,
  MissingFileEntryError,
  PartUploadError,
  ProtocolError,
  UploadCancelledError,
  ValidationError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import type { FileEntry } from '../utils/validators';
import { fileInitResponseSchema, parseResponse } from '../utils/validators';

export interface UploadOptions {
  partSize?: number;
  onProgress?: OnProgress;
  signal?: AbortSignal;
}

// ─── Planning ─────────────────────────────────────────────────────

/**
 * Splits `size` bytes into parts of `partSize`.
 * An exact multiple never gets a trailing empty part: 200 MiB at 100 MiB
 * per part is 2 full parts, 250 MiB is 100 + 100 + 50.
 */
export function planParts(size: number, partSize: number = LIMITS.DEFAULT_PART_SIZE): PartPlan {
  if (!Number.isInteger(partSize) || partSize <= 0) {
    throw new ValidationError(`Part size must be a positive integer, got ${partSize}`);
  }
  if (!Number.isInteger(size) || size < 0) {
    throw new ValidationError(`File size must be a non-negative integer, got ${size}`);
  }

  const partCount = Math.ceil(size / partSize);
  const remainder = size % partSize;
  const lastPartSize = partCount === 0 ? 0 : remainder === 0 ? partSize : remainder;
  return { partSize, partCount, lastPartSize };
}

/** Byte range of a 1-indexed part */
export function partRange(plan: PartPlan, partNumber: number): PartRange {
  if (!Number.isInteger(partNumber) || partNumber < 1 || partNumber > plan.partCount) {
    throw new ValidationError(`Part ${partNumber} is outside 1..${plan.partCount}`);
  }
  const length = partNumber === plan.partCount ? plan.lastPartSize : plan.partSize;
  return { offset: (partNumber - 1) * plan.partSize, length };
}

/** base64 MD5 digest, as sent in Content-MD5 */
export function md5Base64(bytes: Uint8Array): string {
  return crypto.createHash('md5').update(bytes).digest('base64');
}

// ─── Paths ────────────────────────────────────────────────────────

function filesPath(draftId: string): string {
  return `/api/records/${encodeURIComponent(draftId)}/draft/files`;
}

/** Keys may contain '/'; each segment is encoded on its own */
function commitPath(draftId: string, key: string): string {
  const encodedKey = key.split('/').map(encodeURIComponent).join('/');
  return `${filesPath(draftId)}/${encodedKey}/commit`;
}

// ─── Initialization ───────────────────────────────────────────────

export function buildInitRequest(target: UploadTarget, plan: PartPlan): FileInitRequest {
  return {
    key: target.key,
    size: target.size,
    metadata: { description: TRANSFER.FILE_DESCRIPTION },
    transfer: {
      type: TRANSFER.MULTIPART_TYPE,
      parts: plan.partCount,
      part_size: plan.partSize,
    },
  };
}

/**
 * Registers every file with the draft in one call and maps the returned
 * entries to transfer sessions, keyed by logical key.
 * @throws MissingFileEntryError if any submitted key is absent
 * @throws ProtocolError if an entry's part list or size is inconsistent
 */
export async function initializeFiles(
  client: RepositoryClient,
  draftId: string,
  targets: readonly UploadTarget[],
  partSize: number = LIMITS.DEFAULT_PART_SIZE,
): Promise<Map<string, FileTransferSession>> {
  const body = targets.map((target) => buildInitRequest(target, planParts(target.size, partSize)));

  logger.debug('Initializing file transfers', { files: body.length, partSize });
  const response = await client.post(filesPath(draftId), body);
  const { entries } = parseResponse(fileInitResponseSchema, response, 'file initialization');

  const byKey = new Map<string, FileEntry>();
  for (const entry of entries) {
    byKey.set(entry.key, entry);
  }

  const missing = targets.find((target) => !byKey.has(target.key));
  if (missing) {
    throw new MissingFileEntryError(missing.key);
  }

  const sessions = new Map<string, FileTransferSession>();
  for (const target of targets) {
    const entry = byKey.get(target.key);
    if (entry) {
      sessions.set(target.key, toSession(entry, target));
    }
  }
  return sessions;
}

function toSession(entry: FileEntry, target: UploadTarget): FileTransferSession {
  if (entry.size !== target.size) {
    throw new ProtocolError(
      `Repository declared ${entry.size} bytes for ${target.key}, local file has ${target.size}`,
      JSON.stringify(entry),
    );
  }

  if (entry.transfer.part_size > LIMITS.MAX_PART_SIZE) {
    throw new ProtocolError(
      `Repository declared a part size of ${entry.transfer.part_size} bytes for ${target.key}, ` +
        `above the supported maximum of ${LIMITS.MAX_PART_SIZE}`,
      JSON.stringify(entry.transfer),
    );
  }

  const parts = [...entry.links.parts]
    .sort((a, b) => a.part - b.part)
    .map((link) => ({ partNumber: link.part, url: link.url }));

  const expected = entry.transfer.parts;
  const contiguous = parts.length === expected && parts.every((p, i) => p.partNumber === i + 1);
  if (!contiguous) {
    throw new ProtocolError(
      `Part links for ${target.key} do not cover parts 1..${expected}`,
      JSON.stringify(entry.links.parts),
    );
  }

  return {
    key: entry.key,
    size: entry.size,
    partSize: entry.transfer.part_size,
    partCount: expected,
    parts,
  };
}

// ─── Part Upload ──────────────────────────────────────────────────

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new UploadCancelledError();
  }
}

async function openForUpload(target: UploadTarget): Promise<FileHandle> {
  try {
    return await fs.promises.open(target.path, 'r');
  } catch (err) {
    throw new FileAccessError(target.path, err instanceof Error ? err.message : String(err));
  }
}

/**
 * Sends every part of one file to its pre-signed URL, in order.
 * The file handle is held for the whole file and always closed.
 */
export async function uploadFileParts(
  client: RepositoryClient,
  target: UploadTarget,
  session: FileTransferSession,
  options: Pick<UploadOptions, 'onProgress' | 'signal'> = {},
): Promise<void> {
  const { onProgress, signal } = options;
  const plan = planParts(session.size, session.partSize);
  if (plan.partCount !== session.partCount) {
    throw new ProtocolError(
      `Repository declared ${session.partCount} parts for ${session.key}, expected ${plan.partCount}`,
      JSON.stringify(session),
    );
  }

  const report = (loaded: number, partNumber: number): void => {
    onProgress?.({
      key: target.key,
      loaded,
      total: target.size,
      percent: target.size === 0 ? 100 : Math.round((loaded / target.size) * 1000) / 10,
      partNumber,
      partCount: plan.partCount,
    });
  };

  report(0, 0);
  let loaded = 0;

  const handle = await openForUpload(target);
  try {
    for (const part of session.parts) {
      throwIfAborted(signal);

      const { offset, length } = partRange(plan, part.partNumber);
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, offset);
      if (bytesRead !== length) {
        throw new FileAccessError(
          target.path,
          `expected ${length} bytes at offset ${offset} for part ${part.partNumber}, read ${bytesRead}; the file changed during upload`,
        );
      }

      const response = await client.putRaw(part.url, buffer, {
        'Content-Length': String(length),
        'Content-MD5': md5Base64(buffer),
      });
      if (response.statusCode !== TRANSFER.PART_SUCCESS_STATUS) {
        throw new PartUploadError(target.key, part.partNumber, response.statusCode, response.body);
      }

      loaded += length;
      report(loaded, part.partNumber);
    }
  } finally {
    await handle.close();
  }
}

// ─── Commit ───────────────────────────────────────────────────────

/**
 * Finalizes one file on the draft.
 * HTTP failures become CommitError; an authentication failure is
 * re-thrown unchanged.
 */
export async function commitFile(
  client: RepositoryClient,
  draftId: string,
  key: string,
): Promise<void> {
  try {
    await client.post(commitPath(draftId, key));
  } catch (err) {
    if (err instanceof HttpError) {
      throw new CommitError(key, err.statusCode, err.body);
    }
    throw err;
  }
  logger.debug('File committed', { key });
}

// ─── Orchestration ────────────────────────────────────────────────

/**
 * Uploads all targets into the draft: one batch initialization, then
 * parts and commit for each file in turn.
 */
export async function uploadFiles(
  client: RepositoryClient,
  draftId: string,
  targets: readonly UploadTarget[],
  options: UploadOptions = {},
): Promise<void> {
  const partSize = options.partSize ?? LIMITS.DEFAULT_PART_SIZE;

  throwIfAborted(options.signal);
  const sessions = await initializeFiles(client, draftId, targets, partSize);

  for (const target of targets) {
    throwIfAborted(options.signal);

    const session = sessions.get(target.key);
    if (!session) {
      throw new MissingFileEntryError(target.key);
    }

    logger.debug('Uploading file', { key: target.key, size: target.size, parts: session.partCount });
    await uploadFileParts(client, target, session, options);
    await commitFile(client, draftId, target.key);
  }

  logger.info(`Uploaded ${targets.length} file(s)`);
}
