/**
 * utils/errors.ts — Application error class hierarchy.
 *
 * Every failure the uploader can surface is one of these types. Each carries
 * a machine-readable code plus the context needed to diagnose the failure
 * without re-running the upload (file key, part number, HTTP status, raw
 * response body). The CLI prints the message and exits non-zero.
 *
 * Hierarchy:
 *   Error (native)
 *     └── AppError (base — carries a machine-readable code)
 *           ├── ValidationError        (bad CLI input, config or metadata)
 *           ├── AuthenticationError    (401/403 — token wrong or missing)
 *           ├── HttpError              (any other non-2xx repository response)
 *           ├── ProtocolError          (unparseable or structurally invalid response)
 *           ├── NetworkError           (request never got a response)
 *           ├── MissingFileEntryError  (initialization response omits a key)
 *           ├── PartUploadError        (storage PUT did not return 200)
 *           ├── CommitError            (commit call failed)
 *           ├── FileAccessError        (local file missing, unreadable or truncated)
 *           ├── EmptyFileError         (zero-byte file, rejected before upload)
 *           ├── TooManyFilesError      (batch above the per-draft file limit)
 *           └── UploadCancelledError   (interrupted between parts)
 *
 * Usage: throw new MissingFileEntryError('data/run-1.csv');
 */

/** Base application error — carries a machine-readable code */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Invalid input: CLI options, environment values, metadata files */
export class ValidationError extends AppError {
  constructor(message: string, code = 'VALIDATION_ERROR') {
    super(message, code);
    this.name = 'ValidationError';
  }
}

/** 401/403 from the repository — the token is likely invalid or missing */
export class AuthenticationError extends AppError {
  constructor(
    public statusCode: number,
    public url: string,
  ) {
    super(
      'Authentication failed: Your API token is likely wrong or missing. ' +
        'Please check your token and try again.',
      'AUTHENTICATION_FAILED',
    );
    this.name = 'AuthenticationError';
  }
}

/** Non-2xx repository response other than 401/403 */
export class HttpError extends AppError {
  constructor(
    public statusCode: number,
    public url: string,
    public body: string,
  ) {
    super(`Request to ${url} failed with status ${statusCode}: ${body}`, 'HTTP_ERROR');
    this.name = 'HttpError';
  }
}

/**
 * The response could not be decoded or did not have the expected shape.
 * `raw` holds the response text (or a JSON rendering of the decoded body)
 * so HTML error pages and proxy responses are visible in the message.
 */
export class ProtocolError extends AppError {
  constructor(
    message: string,
    public raw: string,
  ) {
    super(`${message}: ${raw}`, 'PROTOCOL_ERROR');
    this.name = 'ProtocolError';
  }
}

/** Connection refused, DNS failure, TLS failure or timeout */
export class NetworkError extends AppError {
  constructor(
    public url: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Request to ${url} failed: ${reason}`, 'NETWORK_ERROR');
    this.name = 'NetworkError';
    this.cause = cause;
  }
}

export class MissingFileEntryError extends AppError {
  constructor(public key: string) {
    super(`File entry not found in initialization response for ${key}`, 'MISSING_FILE_ENTRY');
    this.name = 'MissingFileEntryError';
  }
}

/** The storage endpoint answered a part PUT with anything other than 200 */
export class PartUploadError extends AppError {
  constructor(
    public key: string,
    public partNumber: number,
    public statusCode: number,
    public body: string,
  ) {
    super(
      `Failed to upload part ${partNumber} of ${key} (status ${statusCode}): ${body}`,
      'PART_UPLOAD_FAILED',
    );
    this.name = 'PartUploadError';
  }
}

export class CommitError extends AppError {
  constructor(
    public key: string,
    public statusCode: number,
    public body: string,
  ) {
    super(`Failed to commit ${key} (status ${statusCode}): ${body}`, 'COMMIT_FAILED');
    this.name = 'CommitError';
  }
}

export class FileAccessError extends AppError {
  constructor(
    public path: string,
    reason: string,
  ) {
    super(`Cannot read ${path}: ${reason}`, 'FILE_ACCESS');
    this.name = 'FileAccessError';
  }
}

export class EmptyFileError extends AppError {
  constructor(public path: string) {
    super(`${path} is empty; zero-byte files cannot be uploaded`, 'EMPTY_FILE');
    this.name = 'EmptyFileError';
  }
}

export class TooManyFilesError extends AppError {
  constructor(
    public count: number,
    public limit: number,
  ) {
    super(
      `Found ${count} files. Uploading more than ${limit} files without zipping is not supported. ` +
        'Use --zip-directory to zip the folder before uploading.',
      'TOO_MANY_FILES',
    );
    this.name = 'TooManyFilesError';
  }
}

export class UploadCancelledError extends AppError {
  constructor(message = 'Upload cancelled by user') {
    super(message, 'UPLOAD_CANCELLED');
    this.name = 'UploadCancelledError';
  }
}
