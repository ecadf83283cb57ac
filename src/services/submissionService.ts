/**
 * submissionService.ts — One complete upload, from local path to draft.
 *
 * The caller (the CLI) hands over the path, metadata, target system and
 * token. This service:
 *
 *   1. Optionally zips a directory into a single temporary archive
 *   2. Collects the files and enforces the per-draft file limit
 *   3. Resolves upload targets (keys, sizes; empty files rejected)
 *   4. Builds the draft payload
 *   5. Creates the draft                       — first network call
 *   6. Runs the multipart upload engine
 *   7. Removes the temporary archive, whatever the outcome
 *
 * Everything that can be rejected locally is rejected before step 5, so a
 * bad batch never leaves an empty draft behind.
 */
import fs from 'fs';
import path from 'path';
import type { Dispatcher } from 'undici';
import type { DraftRecord, MetadataInput, OnProgress } from '../shared';
import { LIMITS } from '../shared';
import type { SystemConfig } from '../config';
import { createRepositoryClient } from '../infra/http';
import { TooManyFilesError, UploadCancelledError, ValidationError } from '../utils/errors';
import { logger, setLogContext } from '../utils/logger';
import { buildDraftPayload, createDraft } from './draftService';
import { collectFiles, formatSize, resolveUploadTargets, zipDirectory } from './fileService';
import { uploadFiles } from './uploadService';

export interface SubmissionRequest {
  /** File or directory given by the user */
  source: string;
  metadata: MetadataInput;
  system: SystemConfig;
  token: string;
  publisher: string;
  zipDirectory?: boolean;
  partSize?: number;
  requestTimeoutMs?: number;
  onProgress?: OnProgress;
  signal?: AbortSignal;
  /** Replaces the HTTP agent (tests) */
  dispatcher?: Dispatcher;
}

export interface SubmissionResult extends DraftRecord {
  fileCount: number;
  totalBytes: number;
}

export async function submitUpload(request: SubmissionRequest): Promise<SubmissionResult> {
  const source = path.resolve(request.source);
  let uploadRoot = source;
  let tempArchive: string | undefined;

  try {
    if (request.zipDirectory && (await isDirectory(source))) {
      tempArchive = await zipDirectory(source);
      uploadRoot = tempArchive;
    }

    const files = await collectFiles(uploadRoot);
    if (files.length === 0) {
      throw new ValidationError(`No files found to upload in ${request.source}`);
    }
    if (files.length > LIMITS.MAX_FILES_PER_DRAFT) {
      throw new TooManyFilesError(files.length, LIMITS.MAX_FILES_PER_DRAFT);
    }

    const targets = await resolveUploadTargets(files, uploadRoot);
    const totalBytes = targets.reduce((sum, target) => sum + target.size, 0);
    logger.info(`Found ${targets.length} file(s) to upload (${formatSize(totalBytes)})`);

    const payload = buildDraftPayload(request.metadata, {
      restricted: request.system.restricted,
      publisher: request.publisher,
    });

    if (request.signal?.aborted) {
      throw new UploadCancelledError();
    }

    const client = createRepositoryClient({
      baseUrl: request.system.baseUrl,
      token: request.token,
      verifyTls: request.system.verifyTls,
      timeoutMs: request.requestTimeoutMs,
      dispatcher: request.dispatcher,
    });

    try {
      logger.info('Creating draft record...');
      const draft = await createDraft(client, payload);
      setLogContext(draft.id);

      await uploadFiles(client, draft.id, targets, {
        partSize: request.partSize,
        onProgress: request.onProgress,
        signal: request.signal,
      });

      return { ...draft, fileCount: targets.length, totalBytes };
    } finally {
      await client.close();
    }
  } finally {
    if (tempArchive) {
      await fs.promises.rm(tempArchive, { force: true });
      logger.debug('Cleaned up temporary zip file');
    }
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(target)).isDirectory();
  } catch {
    return false;
  }
}
