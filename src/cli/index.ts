#!/usr/bin/env node

// CLI entry point
import { Command, InvalidArgumentError } from 'commander';
import * as path from 'path';
import {
  createFreshdeskConfig,
  createSharePointConfig,
  validateFreshdeskConfig,
  validateMigrationConfig,
  validateSharePointConfig,
} from '../auth/config';
import { FreshdeskAuthConfig, SharePointAuthConfig } from '../auth/types';
import { DEFAULT_MIGRATION_CONFIG } from '../core/constants';
import { ErrorHandler } from '../core/error-handler';
import { EnhancedLogger, parseLogLevel } from '../core/logger';
import { MigrationOrchestrator } from '../core/migration-orchestrator';
import { ItemFailure } from '../types';
import { FreshdeskApiClient } from '../services/freshdesk/api-client';
import { TicketRetriever } from '../services/freshdesk/ticket-retriever';
import { AttachmentDownloader } from '../services/freshdesk/attachment-downloader';
import { SharePointApiClient } from '../services/sharepoint/api-client';
import { UploadOrchestrator } from '../services/sharepoint/upload-orchestrator';
import { SnapshotStore } from '../services/local/snapshot-store';

type GlobalOptions = {
  logLevel?: string;
  logDir?: string;
};

interface FreshdeskOptions {
  domain?: string;
  apiKey?: string;
}

interface SharePointOptions {
  siteUrl?: string;
  username?: string;
  password?: string;
  sharepointFolder?: string;
}

interface RetrieveOptions extends FreshdeskOptions {
  outputDir?: string;
  perPage?: number;
  updatedSince?: string;
}

interface DownloadOptions extends FreshdeskOptions {
  ticketsFile?: string;
  outputDir?: string;
  refresh: boolean;
}

interface UploadOptions extends SharePointOptions {
  ticketsDir?: string;
  attachmentsDir?: string;
  ticketsFile?: string;
}

interface RunOptions extends FreshdeskOptions, SharePointOptions {
  dataDir?: string;
  perPage?: number;
  updatedSince?: string;
}

/**
 * Thrown for problems with the command line itself
 */
class UsageError extends Error {
  constructor(readonly problems: string[]) {
    super(problems.join('; '));
    this.name = 'UsageError';
  }
}

function parsePageSize(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function defaultDataDirectory(): string {
  return process.env.MIGRATION_DATA_DIR || DEFAULT_MIGRATION_CONFIG.dataDirectory;
}

function dataSubdirectory(name: string): string {
  return path.join(defaultDataDirectory(), name);
}

/**
 * Flags first, then environment variables
 */
function freshdeskConfigFrom(options: FreshdeskOptions): FreshdeskAuthConfig {
  return createFreshdeskConfig(
    options.domain ?? process.env.FRESHDESK_DOMAIN ?? '',
    options.apiKey ?? process.env.FRESHDESK_API_KEY ?? ''
  );
}

function sharePointConfigFrom(options: SharePointOptions): SharePointAuthConfig {
  return createSharePointConfig(
    options.siteUrl ?? process.env.SHAREPOINT_SITE_URL ?? '',
    options.username ?? process.env.SHAREPOINT_USERNAME ?? '',
    options.password ?? process.env.SHAREPOINT_PASSWORD ?? ''
  );
}

function resolveFreshdesk(options: FreshdeskOptions): FreshdeskAuthConfig {
  const config = freshdeskConfigFrom(options);
  const validation = validateFreshdeskConfig(config);
  if (!validation.isValid) {
    throw new UsageError(validation.errors);
  }
  return config;
}

function resolveSharePoint(options: SharePointOptions): SharePointAuthConfig {
  const config = sharePointConfigFrom(options);
  const validation = validateSharePointConfig(config);
  if (!validation.isValid) {
    throw new UsageError(validation.errors);
  }
  return config;
}

function resolveFolder(options: SharePointOptions): string {
  return options.sharepointFolder ?? process.env.SHAREPOINT_FOLDER ?? DEFAULT_MIGRATION_CONFIG.sharePointFolder;
}

function createLogger(program: Command, dataDirectory: string): EnhancedLogger {
  const globals = program.opts<GlobalOptions>();
  return new EnhancedLogger({
    level: parseLogLevel(globals.logLevel ?? process.env.LOG_LEVEL),
    logDirectory:
      globals.logDir ?? process.env.LOG_DIR ?? path.join(dataDirectory, DEFAULT_MIGRATION_CONFIG.logsSubdirectory),
  });
}

function printFailures(failures: ItemFailure[]): void {
  if (failures.length === 0) {
    return;
  }

  console.log(`\n⚠️  ${failures.length} item(s) failed:`);
  failures.slice(0, 10).forEach((failure) => {
    const ticket = failure.ticketId !== undefined ? `ticket ${failure.ticketId}` : failure.stage;
    const file = failure.fileName ? ` (${failure.fileName})` : '';
    console.log(`  • ${ticket}${file}: ${failure.message}`);
  });
  if (failures.length > 10) {
    console.log(`  ... and ${failures.length - 10} more`);
  }
}

/**
 * Run a command body; any error escaping it is a setup failure and sets a
 * non-zero exit code. Item failures are reported by the body itself.
 */
async function runCommand(name: string, body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`❌ Invalid ${name} options:`);
      error.problems.forEach((problem) => console.error(`  • ${problem}`));
    } else {
      console.error(`❌ ${name} failed:`, error instanceof Error ? error.message : String(error));
    }
    process.exitCode = 1;
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('freshdesk-sharepoint')
    .description('Migrate Freshdesk tickets and their attachments into SharePoint')
    .version('1.0.0')
    .option('--log-level <level>', 'Log level: ERROR, WARN, INFO or DEBUG (env LOG_LEVEL)')
    .option('--log-dir <directory>', 'Directory for log files (env LOG_DIR)');

  program
    .command('retrieve')
    .description('Retrieve all tickets from Freshdesk into a timestamped JSON snapshot')
    .option('--domain <domain>', 'Freshdesk domain, e.g. acme.freshdesk.com (env FRESHDESK_DOMAIN)')
    .option('--api-key <key>', 'Freshdesk API key (env FRESHDESK_API_KEY)')
    .option('--output-dir <directory>', 'Directory for ticket snapshots')
    .option('--per-page <number>', 'Tickets per page, at most 100', parsePageSize)
    .option('--updated-since <timestamp>', 'Only tickets updated since this ISO timestamp')
    .action((options: RetrieveOptions) =>
      runCommand('retrieve', async () => {
        const config = resolveFreshdesk(options);
        const outputDirectory = options.outputDir ?? dataSubdirectory(DEFAULT_MIGRATION_CONFIG.ticketsSubdirectory);
        const logger = createLogger(program, defaultDataDirectory());

        const client = new FreshdeskApiClient(config, logger.createChildLogger('freshdesk'));
        const retriever = new TicketRetriever(
          client,
          new SnapshotStore(logger),
          new ErrorHandler(logger),
          logger.createChildLogger('retrieve')
        );

        const result = await retriever.retrieve({
          outputDirectory,
          pageSize: options.perPage,
          updatedSince: options.updatedSince,
        });

        console.log(`✅ Retrieved ${result.tickets.length} tickets`);
        console.log(`📁 Snapshot: ${result.filePath}`);
        printFailures(result.failures);
      })
    );

  program
    .command('download')
    .description('Download the attachments of every ticket in a snapshot')
    .option('--domain <domain>', 'Freshdesk domain (env FRESHDESK_DOMAIN)')
    .option('--api-key <key>', 'Freshdesk API key (env FRESHDESK_API_KEY)')
    .option('--tickets-file <file>', 'Ticket snapshot; the newest in the data directory by default')
    .option('--output-dir <directory>', 'Directory for downloaded attachments')
    .option('--no-refresh', 'Use the attachment URLs stored in the snapshot as they are')
    .action((options: DownloadOptions) =>
      runCommand('download', async () => {
        const config = resolveFreshdesk(options);
        const logger = createLogger(program, defaultDataDirectory());
        const store = new SnapshotStore(logger);

        const ticketsFile =
          options.ticketsFile ??
          (await store.findLatestSnapshot(dataSubdirectory(DEFAULT_MIGRATION_CONFIG.ticketsSubdirectory)));
        const outputDirectory =
          options.outputDir ?? dataSubdirectory(DEFAULT_MIGRATION_CONFIG.attachmentsSubdirectory);

        const downloader = new AttachmentDownloader(
          new FreshdeskApiClient(config, logger.createChildLogger('freshdesk')),
          store,
          new ErrorHandler(logger),
          logger.createChildLogger('download')
        );
        const result = await downloader.downloadAll({
          ticketsFile,
          outputDirectory,
          refreshReferences: options.refresh,
        });

        console.log(
          `✅ Downloaded ${result.downloaded} attachments (${result.skipped} already present) ` +
            `for ${result.ticketsProcessed} tickets`
        );
        console.log(`📁 Attachments: ${outputDirectory}`);
        printFailures(result.failures);
      })
    );

  program
    .command('upload')
    .description('Upload ticket metadata and attachments into SharePoint, one folder per ticket')
    .option('--site-url <url>', 'SharePoint site URL (env SHAREPOINT_SITE_URL)')
    .option('--username <username>', 'SharePoint user name (env SHAREPOINT_USERNAME)')
    .option('--password <password>', 'SharePoint password (env SHAREPOINT_PASSWORD)')
    .option('--sharepoint-folder <folder>', 'Site-relative base folder (env SHAREPOINT_FOLDER)')
    .option('--tickets-dir <directory>', 'Directory holding ticket snapshots')
    .option('--attachments-dir <directory>', 'Directory holding downloaded attachments')
    .option('--tickets-file <file>', 'Snapshot to upload; the newest in the tickets directory by default')
    .action((options: UploadOptions) =>
      runCommand('upload', async () => {
        const config = resolveSharePoint(options);
        const logger = createLogger(program, defaultDataDirectory());
        const client = new SharePointApiClient(config, logger.createChildLogger('sharepoint'));
        await client.authenticate();

        const uploader = new UploadOrchestrator(
          client,
          new SnapshotStore(logger),
          new ErrorHandler(logger),
          logger.createChildLogger('upload')
        );
        const result = await uploader.uploadAll({
          ticketsDirectory: options.ticketsDir ?? dataSubdirectory(DEFAULT_MIGRATION_CONFIG.ticketsSubdirectory),
          attachmentsDirectory:
            options.attachmentsDir ?? dataSubdirectory(DEFAULT_MIGRATION_CONFIG.attachmentsSubdirectory),
          sharePointFolder: resolveFolder(options),
          ticketsFile: options.ticketsFile,
        });

        console.log(
          `✅ Uploaded ${result.results.length} tickets: ${result.metadataUploaded} metadata files, ` +
            `${result.attachmentsUploaded} attachments (${result.attachmentsFailed} failed)`
        );
        console.log(`📄 Results: ${result.resultsFile}`);
        printFailures(result.failures);
      })
    );

  program
    .command('run')
    .description('Retrieve, download and upload in one go, then write the migration report')
    .option('--domain <domain>', 'Freshdesk domain (env FRESHDESK_DOMAIN)')
    .option('--api-key <key>', 'Freshdesk API key (env FRESHDESK_API_KEY)')
    .option('--site-url <url>', 'SharePoint site URL (env SHAREPOINT_SITE_URL)')
    .option('--username <username>', 'SharePoint user name (env SHAREPOINT_USERNAME)')
    .option('--password <password>', 'SharePoint password (env SHAREPOINT_PASSWORD)')
    .option('--sharepoint-folder <folder>', 'Site-relative base folder (env SHAREPOINT_FOLDER)')
    .option('--data-dir <directory>', 'Working directory for tickets, attachments and reports (env MIGRATION_DATA_DIR)')
    .option('--per-page <number>', 'Tickets per page, at most 100', parsePageSize)
    .option('--updated-since <timestamp>', 'Only tickets updated since this ISO timestamp')
    .action((options: RunOptions) =>
      runCommand('run', async () => {
        const freshdesk = freshdeskConfigFrom(options);
        const sharepoint = sharePointConfigFrom(options);
        const sharePointFolder = resolveFolder(options);
        const validation = validateMigrationConfig({
          freshdesk,
          sharepoint,
          sharePointFolder,
          pageSize: options.perPage,
        });
        if (!validation.isValid) {
          throw new UsageError(validation.errors);
        }

        const dataDirectory = options.dataDir ?? defaultDataDirectory();
        const logger = createLogger(program, dataDirectory);

        const orchestrator = new MigrationOrchestrator({
          freshdesk: new FreshdeskApiClient(freshdesk, logger.createChildLogger('freshdesk')),
          sharepoint: new SharePointApiClient(sharepoint, logger.createChildLogger('sharepoint')),
          logger: logger.createChildLogger('migration'),
        });

        const { summary, reportFiles } = await orchestrator.run({
          dataDirectory,
          freshdeskDomain: freshdesk.domain,
          sharePointUrl: sharepoint.siteUrl,
          sharePointFolder,
          pageSize: options.perPage,
          updatedSince: options.updatedSince,
        });

        console.log('\n📊 Migration Results:');
        console.log('═'.repeat(50));
        console.log(`Tickets: ${summary.tickets}`);
        console.log(`Attachments downloaded: ${summary.attachmentsDownloaded} (${summary.attachmentsSkipped} already present)`);
        console.log(`Attachments uploaded: ${summary.attachmentsUploaded}`);
        console.log(`Attachments failed: ${summary.attachmentsFailed}`);
        console.log(`Failures: ${summary.failures.length}`);
        console.log(`📄 Summary: ${reportFiles.summaryFile}`);
        console.log(`📄 Report: ${reportFiles.reportFile}`);
        printFailures(summary.failures);

        const logFile = logger.getLogFilePath();
        if (logFile) {
          console.log(`📝 Log: ${logFile}`);
        }
      })
    );

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error('❌', error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    });
}
