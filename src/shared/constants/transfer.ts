/**
 * constants/transfer.ts — Fixed values of the repository's file transfer API.
 */
export const TRANSFER = {
  /** Transfer type for multipart uploads to pre-signed storage URLs */
  MULTIPART_TYPE: 'M',
  /** Description attached to every file at initialization */
  FILE_DESCRIPTION: 'Uploaded file.',
  /** The only status a storage part PUT may return */
  PART_SUCCESS_STATUS: 200,
} as const;

export const ACCESS_LEVELS = ['public', 'restricted'] as const;
export type AccessLevel = (typeof ACCESS_LEVELS)[number];

export const DEFAULT_RESOURCE_TYPE = 'dataset';
