import { parseArgs } from 'node:util';
import { config } from './config/index.js';
import { createDatabase } from './db/index.js';
import { DrizzleCatalogSession } from './db/drizzle-session.js';
import { DryRunCatalogSession } from './db/dry-run-session.js';
import type { CatalogSession } from './db/session.js';
import { importService } from './services/import.service.js';
import type { ImportOptions, ImportSummary } from './types/catalog.js';
import { importOptionsSchema } from './validation/import.js';
import { configError, validationError } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('App');

export const USAGE = `Usage: stashgrid-import <rootFolder> <libraryId> [databaseUrl] [--dry-run]

Scans <rootFolder>/<creator>/<collection>/<model>-<variant>/ and writes
creators, collections, models and model files into the catalog database.

Arguments:
  rootFolder   folder to scan
  libraryId    id of the library the models belong to
  databaseUrl  PostgreSQL connection URI (defaults to $DATABASE_URL)

Options:
  --dry-run    log the rows that would be written instead of writing them
  -h, --help   show this help
`;

/**
 * Parse and validate command-line arguments. Returns null when help was requested.
 */
export function parseCliArgs(
  argv: string[],
  defaults: { databaseUrl?: string } = { databaseUrl: config.databaseUrl },
): ImportOptions | null {
  let parsed: ReturnType<typeof parseCliTokens>;
  try {
    parsed = parseCliTokens(argv);
  } catch (err) {
    throw validationError(err instanceof Error ? err.message : String(err));
  }

  if (parsed.values.help) {
    return null;
  }

  const { positionals } = parsed;
  if (positionals.length > 3) {
    throw validationError(`Unexpected argument: ${positionals[3]}`);
  }

  const result = importOptionsSchema.safeParse({
    rootFolder: positionals[0],
    libraryId: positionals[1],
    databaseUrl: positionals[2] ?? defaults.databaseUrl,
    dryRun: parsed.values['dry-run'],
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    throw validationError(issue.message, issue.path.join('.') || undefined);
  }

  return result.data;
}

function parseCliTokens(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      'dry-run': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

export function openSession(options: ImportOptions): CatalogSession {
  if (options.dryRun) {
    logger.info('Dry run: rows will be logged, not written');
    return new DryRunCatalogSession();
  }
  if (!options.databaseUrl) {
    throw configError('A database URL is required unless --dry-run is given', 'databaseUrl');
  }
  const { db, pool } = createDatabase(options.databaseUrl);
  return new DrizzleCatalogSession(db, pool);
}

/**
 * Run one import with the session chosen by the options. The session is
 * closed whether or not the import succeeds; when the import has already
 * failed, a close failure is logged and the import error is rethrown.
 */
export async function runImport(
  options: ImportOptions,
  open: (options: ImportOptions) => CatalogSession = openSession,
): Promise<ImportSummary> {
  const session = open(options);
  let summary: ImportSummary;
  try {
    summary = await importService.importLibrary(session, {
      rootFolder: options.rootFolder,
      libraryId: options.libraryId,
    });
  } catch (err) {
    try {
      await session.close();
    } catch (closeErr) {
      logger.error({ err: closeErr }, 'Failed to close session after import error');
    }
    throw err;
  }
  await session.close();
  return summary;
}
