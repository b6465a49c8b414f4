// Runs retrieve, download and upload end to end over one data directory

import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger } from '../types';
import { IFreshdeskClient, ISharePointClient } from './interfaces';
import { ErrorHandler } from './error-handler';
import { DEFAULT_MIGRATION_CONFIG } from './constants';
import { SnapshotStore } from '../services/local/snapshot-store';
import { TicketRetriever } from '../services/freshdesk/ticket-retriever';
import { AttachmentDownloader } from '../services/freshdesk/attachment-downloader';
import { UploadOrchestrator } from '../services/sharepoint/upload-orchestrator';
import { MigrationReporter, MigrationSummary, ReportFiles } from '../progress/migration-reporter';

export interface MigrationDependencies {
  freshdesk: IFreshdeskClient;
  sharepoint: ISharePointClient;
  logger: Logger;
}

export interface MigrationRunOptions {
  dataDirectory: string;
  freshdeskDomain: string;
  sharePointUrl: string;
  sharePointFolder: string;
  pageSize?: number;
  updatedSince?: string;
}

export interface MigrationOutcome {
  snapshotFile: string;
  summary: MigrationSummary;
  reportFiles: ReportFiles;
}

export class MigrationOrchestrator {
  private readonly freshdesk: IFreshdeskClient;
  private readonly sharepoint: ISharePointClient;
  private readonly logger: Logger;

  constructor(deps: MigrationDependencies) {
    this.freshdesk = deps.freshdesk;
    this.sharepoint = deps.sharepoint;
    this.logger = deps.logger;
  }

  /**
   * Migrate every ticket. Item failures end up in the summary; setup
   * failures such as bad credentials reject the returned promise.
   */
  async run(options: MigrationRunOptions): Promise<MigrationOutcome> {
    const startTime = new Date();
    const ticketsDirectory = path.join(options.dataDirectory, DEFAULT_MIGRATION_CONFIG.ticketsSubdirectory);
    const attachmentsDirectory = path.join(options.dataDirectory, DEFAULT_MIGRATION_CONFIG.attachmentsSubdirectory);

    await fs.mkdir(ticketsDirectory, { recursive: true });
    await fs.mkdir(attachmentsDirectory, { recursive: true });

    this.logger.info('Starting Freshdesk to SharePoint migration', {
      dataDirectory: options.dataDirectory,
      sharePointFolder: options.sharePointFolder,
    });

    // Bad SharePoint credentials should fail before anything is downloaded
    await this.sharepoint.authenticate();

    const errorHandler = new ErrorHandler(this.logger);
    const store = new SnapshotStore(this.logger);

    this.logger.info('Step 1: Retrieving tickets from Freshdesk');
    const retrieved = await new TicketRetriever(this.freshdesk, store, errorHandler, this.logger).retrieve({
      outputDirectory: ticketsDirectory,
      pageSize: options.pageSize,
      updatedSince: options.updatedSince,
    });

    this.logger.info('Step 2: Downloading attachments');
    // References were resolved moments ago by the retriever
    const downloaded = await new AttachmentDownloader(this.freshdesk, store, errorHandler, this.logger).downloadAll({
      ticketsFile: retrieved.filePath,
      outputDirectory: attachmentsDirectory,
      refreshReferences: false,
    });

    this.logger.info('Step 3: Uploading to SharePoint');
    const uploaded = await new UploadOrchestrator(this.sharepoint, store, errorHandler, this.logger).uploadAll({
      ticketsDirectory,
      attachmentsDirectory,
      sharePointFolder: options.sharePointFolder,
      ticketsFile: retrieved.filePath,
    });

    const reporter = new MigrationReporter(this.logger);
    const summary = reporter.buildSummary(
      {
        startTime,
        endTime: new Date(),
        freshdeskDomain: options.freshdeskDomain,
        sharePointUrl: options.sharePointUrl,
        sharePointFolder: options.sharePointFolder,
      },
      {
        tickets: retrieved.tickets.length,
        attachmentsDownloaded: downloaded.downloaded,
        attachmentsSkipped: downloaded.skipped,
        metadataUploaded: uploaded.metadataUploaded,
        attachmentsUploaded: uploaded.attachmentsUploaded,
        attachmentsFailed: uploaded.attachmentsFailed,
      },
      uploaded.results,
      errorHandler.getFailures()
    );
    const reportFiles = await reporter.writeReports(options.dataDirectory, summary);

    this.logger.info(
      `Migration completed: ${summary.tickets} tickets, ${summary.attachmentsUploaded} attachments uploaded, ` +
        `${summary.failures.length} failures`
    );

    return { snapshotFile: retrieved.filePath, summary, reportFiles };
  }
}
