/**
 * draftService.ts — Draft record payloads and draft creation.
 *
 * buildDraftPayload() is pure: it turns the user's metadata into the body of
 * POST /api/records. Two input shapes are accepted:
 *
 *   1. A complete payload (has both `metadata` and `access` sections, e.g.
 *      from --metadata-file) — submitted unchanged.
 *   2. Simplified fields (title plus optional description, subjects, rights,
 *      creators, resource type, publication date) — expanded with defaults:
 *        - publication_date: current year when absent or blank
 *        - resource_type:    { id: 'dataset' }
 *        - publisher:        from runtime settings
 *        - access:           restricted/restricted on a restricted system,
 *                            public/public everywhere else
 *        - files.enabled:    true (the draft will receive files)
 *
 * createDraft() submits the payload and validates that the response carries
 * both the draft id and its browsable URL before anything else happens.
 */
import type { AccessLevel, DraftPayload, DraftRecord, MetadataInput, RecordMetadata } from '../shared';
import { DEFAULT_RESOURCE_TYPE } from '../shared';
import type { RepositoryClient } from '../infra/http';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import {
  draftResponseSchema,
  isFullRecordPayload,
  parseResponse,
  validateTitle,
} from '../utils/validators';

export interface DraftTarget {
  restricted: boolean;
  publisher: string;
}

export function buildDraftPayload(
  metadata: MetadataInput,
  target: DraftTarget,
  now: Date = new Date(),
): DraftPayload {
  if (isFullRecordPayload(metadata)) {
    return metadata;
  }

  if (!validateTitle(metadata.title)) {
    throw new ValidationError('A non-empty title is required');
  }

  const pubDate = metadata.publication_date;
  const publicationDate =
    pubDate === undefined || pubDate === null || String(pubDate).trim() === ''
      ? String(now.getFullYear())
      : String(pubDate);

  const rdmMetadata: RecordMetadata = {
    title: metadata.title,
    resource_type: { id: metadata.resource_type || DEFAULT_RESOURCE_TYPE },
    publication_date: publicationDate,
    publisher: target.publisher,
    ...(metadata.description !== undefined && { description: metadata.description }),
    ...(metadata.subjects !== undefined && { subjects: metadata.subjects }),
    ...(metadata.rights !== undefined && { rights: metadata.rights }),
    ...(metadata.creators !== undefined && { creators: metadata.creators }),
  };

  const access: AccessLevel = target.restricted ? 'restricted' : 'public';

  return {
    access: { record: access, files: access },
    files: { enabled: true },
    metadata: rdmMetadata,
  };
}

/**
 * POST /api/records — creates the draft.
 * @throws ProtocolError when the response lacks `id` or `links.self_html`
 */
export async function createDraft(
  client: RepositoryClient,
  payload: DraftPayload,
): Promise<DraftRecord> {
  const response = await client.post('/api/records', payload);
  const draft = parseResponse(draftResponseSchema, response, 'draft');

  logger.info('Draft created', { id: draft.id });
  return { id: draft.id, url: draft.links.self_html };
}
