/**
 * shared/index.ts — Barrel export for shared types and constants.
 *
 * Services import from here (e.g., `import { LIMITS, UploadTarget } from '../shared'`)
 * rather than reaching into individual files.
 */

export { LIMITS } from './constants/limits';
export { TRANSFER, ACCESS_LEVELS, DEFAULT_RESOURCE_TYPE } from './constants/transfer';
export type { AccessLevel } from './constants/transfer';

export type {
  Subject,
  SimpleMetadata,
  RecordAccess,
  RecordMetadata,
  DraftPayload,
  FullRecordPayload,
  MetadataInput,
  DraftRecord,
} from './types/record';

export type {
  UploadTarget,
  PartPlan,
  PartRange,
  FileInitRequest,
  PartTarget,
  FileTransferSession,
} from './types/upload';

export type { UploadProgress, OnProgress } from './types/progress';
