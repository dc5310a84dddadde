#!/usr/bin/env tsx
/**
 * Index Management Script
 *
 * Builds, updates, validates and queries the rulebook knowledge base from the
 * command line. Source documents are listed in <data-dir>/raw/documents.json;
 * chunk files and indices are written under <data-dir>/chunks and
 * <data-dir>/indices.
 *
 * Usage:
 *   npx tsx scripts/src/manage-index.ts <command> [options]
 *   # or via npm script:
 *   npm run manage-index -w @rulebook-kb/scripts -- <command> [options]
 *
 * Environment variables:
 *   - KB_DATA_DIR: data directory (default: ./data)
 *   - KB_CHUNK_MAX_TOKENS: chunk token budget (default: 14000)
 *   - KB_CONTEXT_TOKEN_CEILING: retrieval ceiling (default: 24000)
 *   - LOG_LEVEL / LOG_FORMAT / LOG_FILE: logging
 *
 * Exit code is 1 when any document fails to build or validate.
 */

import path from 'node:path';

import {
  KnowledgeBase,
  createLogger,
  loadSettings,
  type Logger,
  type RetrievalResult,
  type UpdateSummary,
  type ValidationReport,
} from '@rulebook-kb/lib';

import { HELP_TEXT, parseArgs, resolveLogLevel, type ParsedArgs } from './cli/args.js';

// ============================================================================
// Output
// ============================================================================

function printSummary(summary: UpdateSummary, logger: Logger): void {
  for (const report of summary.rebuilt) {
    logger.info(`Indexed ${report.documentId}`, {
      version: report.version,
      buildId: report.buildId,
      reason: summary.reasons[report.documentId],
      units: report.units,
      chunks: report.chunks,
      oversized: report.oversized.length,
      unchanged: report.unchanged,
    });
  }
  for (const failure of summary.failed) {
    logger.error(`Failed ${failure.documentId}: ${failure.error.message}`, {
      code: failure.error.code,
      ...failure.error.details,
    });
  }
  logger.info('Done', {
    rebuilt: summary.rebuilt.length,
    skipped: summary.skipped.length,
    failed: summary.failed.length,
  });
}

function printValidation(reports: ValidationReport[], logger: Logger): void {
  if (reports.length === 0) {
    logger.warn('No published indices to validate');
  }
  for (const report of reports) {
    if (report.ok) {
      logger.info(`${report.documentId}: consistent`, { buildId: report.buildId });
    } else {
      logger.error(`${report.documentId}: ${report.problems.length} problem(s)`, { buildId: report.buildId });
      for (const problem of report.problems) {
        logger.error(`  ${problem}`);
      }
    }
  }
}

function printRetrieval(result: RetrievalResult): void {
  console.log(JSON.stringify(result, null, 2));
}

// ============================================================================
// Commands
// ============================================================================

async function runCommand(args: ParsedArgs, kb: KnowledgeBase, logger: Logger): Promise<number> {
  switch (args.command) {
    case 'rebuild-index': {
      const summary = await kb.rebuildCatalog(args.documentId ? [args.documentId] : undefined);
      if (summary.rebuilt.length === 0 && summary.failed.length === 0) {
        logger.warn(`No documents in ${path.join(kb.paths.raw, 'documents.json')}`);
      }
      printSummary(summary, logger);
      return summary.failed.length > 0 ? 1 : 0;
    }

    case 'update-index': {
      const summary = await kb.update();
      printSummary(summary, logger);
      return summary.failed.length > 0 ? 1 : 0;
    }

    case 'validate-index': {
      const reports = await kb.validate(args.documentId);
      printValidation(reports, logger);
      return reports.every((report) => report.ok) ? 0 : 1;
    }

    case 'query': {
      await kb.load();
      const result = await kb.retrieve(args.query ?? '', args.ceiling ? { tokenCeiling: args.ceiling } : undefined);
      printRetrieval(result);
      return 0;
    }

    case 'status': {
      await kb.load();
      const rows = await kb.status();
      if (rows.length === 0) {
        logger.info('No documents catalogued or indexed');
      }
      for (const row of rows) {
        logger.info(row.documentId, {
          title: row.title,
          catalogVersion: row.catalogVersion,
          indexedVersion: row.indexedVersion,
          checksum: row.checksum?.slice(0, 12) ?? null,
          buildId: row.buildId,
          chunks: row.chunks,
          indexedAt: row.indexedAt,
          published: row.published,
        });
      }
      return 0;
    }

    case null:
      return 1;
  }
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }
  if (args.errors.length > 0) {
    for (const error of args.errors) {
      console.error(error);
    }
    console.error(HELP_TEXT);
    process.exit(1);
  }

  const level = resolveLogLevel(args);
  const settings = loadSettings(process.env, {
    ...(args.dataDir ? { dataDir: path.resolve(args.dataDir) } : {}),
    logLevel: level,
    logFormat: args.logFormat,
  });

  const logger = createLogger('manage-index', {
    level,
    format: args.logFormat,
    timestamps: true,
    colors: true,
    filePath: settings.logFile,
  });

  const kb = new KnowledgeBase({ settings, logger });

  try {
    const exitCode = await runCommand(args, kb, logger);
    process.exit(exitCode);
  } catch (error) {
    logger.error('Fatal error', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
