/**
 * metadataService.ts — Metadata from CLI options or a metadata file.
 *
 * Produces the MetadataInput handed to the draft builder:
 *   - buildMetadataFromOptions(): --title, --description, --keywords
 *   - loadMetadataFile():         .json, .yaml or .yml
 *
 * A metadata file with both `metadata` and `access` sections is a complete
 * record payload and is later submitted unchanged. Any other file must hold
 * the simplified fields (at least a title).
 */
import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import type { MetadataInput, SimpleMetadata } from '../shared';
import { ValidationError } from '../utils/errors';
import { isFullRecordPayload, isPlainObject, simpleMetadataSchema } from '../utils/validators';

export interface MetadataOptions {
  title: string;
  description?: string;
  keywords?: readonly string[];
}

export function buildMetadataFromOptions(options: MetadataOptions): SimpleMetadata {
  const metadata: SimpleMetadata = { title: options.title };

  if (options.description) {
    metadata.description = options.description;
  }
  if (options.keywords && options.keywords.length > 0) {
    metadata.subjects = options.keywords.map((keyword) => ({ subject: keyword }));
  }

  return metadata;
}

function parseContent(filePath: string, content: string): unknown {
  const extension = path.extname(filePath).toLowerCase();
  try {
    switch (extension) {
      case '.json':
        return JSON.parse(content);
      case '.yaml':
      case '.yml':
        return parseYaml(content);
      default:
        break;
    }
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Could not parse metadata file ${path.basename(filePath)}: ${reason}`);
  }
  throw new ValidationError(
    `Unsupported metadata file format: ${extension || '(none)'}. Use .json or .yaml`,
  );
}

export async function loadMetadataFile(filePath: string): Promise<MetadataInput> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Cannot read metadata file ${filePath}: ${reason}`);
  }

  const parsed = parseContent(filePath, content);
  if (!isPlainObject(parsed)) {
    throw new ValidationError(`Metadata file ${path.basename(filePath)} must contain an object`);
  }
  if (isFullRecordPayload(parsed)) {
    return parsed;
  }

  const result = simpleMetadataSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid metadata in ${path.basename(filePath)} (${issues})`);
  }
  return result.data;
}
