#!/usr/bin/env node
/**
 * cli.ts — Command-line entry point.
 *
 * ─── Run Sequence ────────────────────────────────────────────────
 *   1. Parse options (commander)
 *   2. No options at all → print help and exit 0
 *   3. Check required options → exit 2 listing what is missing
 *   4. Load .env, resolve the token (option, then INVENIORDM_TOKEN)
 *   5. Build metadata from options or load the metadata file
 *   6. Hand everything to the submission service
 *   7. Print the draft URL on stdout
 *
 * ─── Exit Codes ──────────────────────────────────────────────────
 *   0 — upload complete, or help/version shown
 *   1 — the upload failed or was cancelled
 *   2 — missing or invalid options
 *
 * ─── Interrupts ──────────────────────────────────────────────────
 *   The first Ctrl+C lets the part in flight finish, then stops before the
 *   next part or file. A second Ctrl+C terminates immediately.
 */
import { Command, CommanderError, Option } from 'commander';
import { SYSTEM_NAMES, SYSTEMS, getRuntimeSettings, getSystem, loadConfig, tokenUrl } from './config';
import type { SystemConfig } from './config';
import type { MetadataInput } from './shared';
import { createProgressReporter } from './services/progressReporter';
import { buildMetadataFromOptions, loadMetadataFile } from './services/metadataService';
import { submitUpload } from './services/submissionService';
import type { SubmissionRequest, SubmissionResult } from './services/submissionService';
import { AppError, ValidationError } from './utils/errors';
import { logger, setLogFormat, setLogLevel } from './utils/logger';
import { parsePartSizeMiB } from './utils/validators';

export const VERSION = '0.1.0';

export type CliOptions = {
  token?: string;
  title?: string;
  files?: string;
  system?: string;
  zipDirectory?: boolean;
  description?: string;
  keywords?: string[];
  metadataFile?: string;
  partSize?: string;
  verbose?: boolean;
  logFormat?: 'text' | 'json';
};

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
  submit: (request: SubmissionRequest) => Promise<SubmissionResult>;
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  env: process.env,
  cwd: process.cwd(),
  submit: submitUpload,
};

function helpText(): string {
  const tokenLines = Object.values(SYSTEMS)
    .filter((system) => system.verifyTls)
    .map((system) => `  - ${system.name.padEnd(10)} ${tokenUrl(system)}`);
  return [
    'Upload files or folders to an InvenioRDM repository as a draft record.',
    '',
    'To get an API token, visit:',
    ...tokenLines,
    '',
    'Basic usage:',
    '  rdm-upload --system datastore --token <YOUR_TOKEN> --title "My Data" --files /path/to/data',
  ].join('\n');
}

export function createProgram(io: Pick<CliIO, 'out' | 'err'> = defaultIO): Command {
  return new Command()
    .name('rdm-upload')
    .description(helpText())
    .version(VERSION)
    .helpOption('-h, --help', 'Show this help')
    .option('--token <token>', 'API token (or INVENIORDM_TOKEN in the environment or .env)')
    .option('--title <title>', 'Title of the draft record (required)')
    .option('--files <path>', 'File or folder to upload (required)')
    .option('--system <name>', `Repository to use (required): ${SYSTEM_NAMES.join(', ')}`)
    .option('--zip-directory', 'Zip a folder into one archive before uploading', false)
    .option('--description <text>', 'Description of the dataset')
    .option('--keywords <keyword...>', 'Keywords/subjects (repeatable)')
    .option('--metadata-file <path>', 'JSON or YAML file with metadata (overrides title, description, keywords)')
    .option('--part-size <MiB>', 'Part size for multipart uploads in MiB')
    .option('-v, --verbose', 'Log every request and part')
    .addOption(
      new Option('--log-format <format>', 'Log line format (overrides LOG_FORMAT)').choices([
        'text',
        'json',
      ]),
    )
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });
}

/** Required options, in the order they are reported */
function missingOptions(options: CliOptions): string[] {
  const missing: string[] = [];
  if (!options.title && !options.metadataFile) missing.push('--title');
  if (!options.files) missing.push('--files');
  if (!options.system) missing.push('--system');
  return missing;
}

async function resolveMetadata(options: CliOptions): Promise<MetadataInput> {
  if (options.metadataFile) {
    logger.info(`Loading metadata from ${options.metadataFile}`);
    return loadMetadataFile(options.metadataFile);
  }
  return buildMetadataFromOptions({
    title: options.title ?? '',
    description: options.description,
    keywords: options.keywords,
  });
}

function tokenHelp(system: SystemConfig): string[] {
  return [
    'Missing option --token.',
    `To get an API token for ${system.name}, visit ${tokenUrl(system)}`,
    'You can provide the token via:',
    '  - Command line: --token YOUR_TOKEN',
    '  - Environment variable: INVENIORDM_TOKEN=YOUR_TOKEN',
    '  - .env file: INVENIORDM_TOKEN=YOUR_TOKEN',
  ];
}

/**
 * Runs the CLI and resolves to the process exit code.
 * Never calls process.exit itself.
 */
export async function run(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const program = createProgram(io);

  try {
    program.parse(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? 0 : 2;
    }
    throw err;
  }

  const options = program.opts<CliOptions>();
  if (options.verbose) setLogLevel('debug');
  if (options.logFormat) setLogFormat(options.logFormat);

  if (!options.title && !options.files && !options.system && !options.token && !options.metadataFile) {
    io.out(program.helpInformation().trimEnd());
    return 0;
  }

  const missing = missingOptions(options);
  if (missing.length > 0) {
    io.err(`Error: Missing required option(s): ${missing.join(', ')}`);
    io.err('Use --help to see all available options');
    return 2;
  }

  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn('Interrupt received; stopping after the current part');
    controller.abort();
  };

  try {
    const envFile = loadConfig(io.cwd);
    if (envFile) logger.info(`Loaded .env from ${envFile}`);

    const system = getSystem(options.system ?? '');
    const settings = getRuntimeSettings(io.env);
    const token = options.token?.trim() || settings.token;
    if (!token) {
      for (const line of tokenHelp(system)) io.err(line);
      return 2;
    }

    const partSize = parsePartSizeMiB(options.partSize, '--part-size', settings.partSize);
    const metadata = await resolveMetadata(options);

    process.once('SIGINT', onInterrupt);
    const result = await io.submit({
      source: options.files ?? '',
      metadata,
      system,
      token,
      publisher: settings.publisher,
      zipDirectory: options.zipDirectory,
      partSize,
      requestTimeoutMs: settings.requestTimeoutMs,
      onProgress: createProgressReporter(),
      signal: controller.signal,
    });

    logger.info('Upload completed successfully', { files: result.fileCount });
    io.out(`Draft: ${result.id}`);
    io.out(`Draft URL: ${result.url}`);
    io.out('Review the draft in the web interface, add metadata if needed, then publish it.');
    return 0;
  } catch (err) {
    if (err instanceof ValidationError) {
      io.err(`Error: ${err.message}`);
      return 2;
    }
    if (err instanceof AppError) {
      logger.error(err.message, { code: err.code });
      io.err(`Error: ${err.message}`);
      return 1;
    }
    logger.error('Unexpected failure', {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

if (require.main === module) {
  run(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error('Fatal error', { error: err instanceof Error ? err.message : String(err) });
      process.exitCode = 1;
    });
}
