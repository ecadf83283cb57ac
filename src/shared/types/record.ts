/**
 * types/record.ts — Draft record payloads and metadata input.
 *
 * The draft builder accepts either a complete record payload (as loaded from
 * a metadata file) or the simplified fields collected from CLI options, and
 * always produces a DraftPayload ready for POST /api/records.
 *
 *   POST /api/records  → DraftPayload → { id, links: { self_html } }
 */
import type { AccessLevel } from '../constants/transfer';

/** A subject/keyword entry, as InvenioRDM stores it */
export interface Subject {
  subject: string;
  [field: string]: unknown;
}

/**
 * Simplified metadata — the fields a user can supply on the command line or
 * in a flat metadata file. Everything except the title is optional.
 */
export interface SimpleMetadata {
  title: string;
  description?: string;
  subjects?: Subject[];
  resource_type?: string;
  rights?: unknown[];
  creators?: unknown[];
  publication_date?: string | number | null;
}

export interface RecordAccess {
  record: AccessLevel;
  files: AccessLevel;
  [field: string]: unknown;
}

/** The record's `metadata` section as submitted */
export interface RecordMetadata {
  title: string;
  resource_type: { id: string };
  publication_date: string;
  publisher: string;
  description?: string;
  subjects?: Subject[];
  rights?: unknown[];
  creators?: unknown[];
}

/** Body of POST /api/records */
export interface DraftPayload {
  access: RecordAccess | Record<string, unknown>;
  metadata: RecordMetadata | Record<string, unknown>;
  files?: { enabled: boolean };
  [field: string]: unknown;
}

/**
 * A complete payload supplied by the user: anything that already has both a
 * metadata and an access section is submitted unchanged.
 */
export interface FullRecordPayload extends DraftPayload {
  access: Record<string, unknown>;
  metadata: Record<string, unknown>;
}

export type MetadataInput = SimpleMetadata | FullRecordPayload;

/** The created draft — identity plus the browsable URL */
export interface DraftRecord {
  id: string;
  url: string;
}
