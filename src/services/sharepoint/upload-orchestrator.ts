import { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ItemFailure, Logger, Ticket, TicketUploadResult } from '../../types';
import { ISharePointClient } from '../../core/interfaces';
import { ErrorHandler } from '../../core/error-handler';
import { FILE_NAMES } from '../../core/constants';
import { SnapshotStore, writeJsonFile } from '../local/snapshot-store';
import { PathUtils } from '../local/path-utils';

export interface UploadOptions {
  ticketsDirectory: string;
  attachmentsDirectory: string;
  sharePointFolder: string;
  /** Snapshot to upload; the newest in ticketsDirectory when omitted */
  ticketsFile?: string;
}

export interface UploadSummary {
  ticketsFile: string;
  results: TicketUploadResult[];
  failures: ItemFailure[];
  metadataUploaded: number;
  attachmentsUploaded: number;
  attachmentsFailed: number;
  resultsFile: string;
}

/**
 * Regular files in a ticket's attachment directory. A missing directory means
 * the ticket has no attachments; any other read error is thrown.
 */
async function listAttachmentFiles(directory: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && Reflect.get(error, 'code') === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return entries
    .filter((entry) => entry.isFile() && !PathUtils.isPartialDownload(entry.name))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Creates one SharePoint folder per ticket and fills it with the ticket's
 * metadata JSON and downloaded attachments
 */
export class UploadOrchestrator {
  private readonly client: ISharePointClient;
  private readonly store: SnapshotStore;
  private readonly errorHandler: ErrorHandler;
  private readonly logger: Logger;

  constructor(client: ISharePointClient, store: SnapshotStore, errorHandler: ErrorHandler, logger: Logger) {
    this.client = client;
    this.store = store;
    this.errorHandler = errorHandler;
    this.logger = logger;
  }

  async uploadAll(options: UploadOptions): Promise<UploadSummary> {
    const ticketsFile = options.ticketsFile ?? (await this.store.findLatestSnapshot(options.ticketsDirectory));
    const tickets = await this.store.readSnapshot(ticketsFile);

    const base = await this.client.ensureFolderPath(options.sharePointFolder);
    this.logger.info(`Uploading ${tickets.length} tickets to ${base.serverRelativeUrl}`);

    const results: TicketUploadResult[] = [];
    const failures: ItemFailure[] = [];

    for (const ticket of tickets) {
      this.logger.info(`Uploading ticket ${ticket.id}: ${ticket.subject || 'No subject'}`);
      results.push(await this.uploadTicket(ticket, options, failures));
    }

    const resultsFile = path.join(options.ticketsDirectory, FILE_NAMES.UPLOAD_RESULTS);
    await writeJsonFile(resultsFile, results);

    const summary: UploadSummary = {
      ticketsFile,
      results,
      failures,
      metadataUploaded: results.filter((result) => result.metadataUploaded).length,
      attachmentsUploaded: results.reduce((sum, result) => sum + result.attachmentsUploaded, 0),
      attachmentsFailed: results.reduce((sum, result) => sum + result.attachmentsFailed, 0),
      resultsFile,
    };

    this.logger.info(
      `Upload completed: ${results.length} tickets, ${summary.attachmentsUploaded} attachments uploaded, ` +
        `${summary.attachmentsFailed} attachments failed`
    );
    return summary;
  }

  private async uploadTicket(ticket: Ticket, options: UploadOptions, failures: ItemFailure[]): Promise<TicketUploadResult> {
    const result: TicketUploadResult = {
      ticketId: ticket.id,
      subject: ticket.subject,
      folderPath: null,
      metadataUploaded: false,
      attachmentsUploaded: 0,
      attachmentsFailed: 0,
      files: [],
    };

    const folderName = PathUtils.ticketFolderName(ticket.id);
    try {
      await this.client.ensureFolder(options.sharePointFolder, folderName);
    } catch (error) {
      failures.push(
        this.errorHandler.handleItemError(error, {
          stage: 'upload',
          operation: `Create folder ${folderName}`,
          ticketId: ticket.id,
        })
      );
      return result;
    }

    const folderPath = `${options.sharePointFolder.replace(/\/+$/, '')}/${folderName}`;
    result.folderPath = folderPath;

    const metadataName = PathUtils.metadataFileName(ticket.id);
    const metadata = Buffer.from(JSON.stringify(ticket, null, 2), 'utf8');
    if (await this.uploadOne(folderPath, metadataName, () => Promise.resolve(metadata), ticket.id, result, failures)) {
      result.metadataUploaded = true;
    }

    const attachmentDirectory = PathUtils.ticketAttachmentDirectory(options.attachmentsDirectory, ticket.id);
    let files: string[];
    try {
      files = await listAttachmentFiles(attachmentDirectory);
    } catch (error) {
      failures.push(
        this.errorHandler.handleItemError(error, {
          stage: 'upload',
          operation: `List attachments in ${attachmentDirectory}`,
          ticketId: ticket.id,
        })
      );
      return result;
    }
    if (files.length === 0) {
      this.logger.info(`No attachments found for ticket ${ticket.id}`);
    }

    for (const fileName of files) {
      const uploaded = await this.uploadOne(
        folderPath,
        fileName,
        () => fs.readFile(path.join(attachmentDirectory, fileName)),
        ticket.id,
        result,
        failures
      );
      if (uploaded) {
        result.attachmentsUploaded++;
      } else {
        result.attachmentsFailed++;
      }
    }

    return result;
  }

  private async uploadOne(
    folderPath: string,
    fileName: string,
    read: () => Promise<Buffer>,
    ticketId: number,
    result: TicketUploadResult,
    failures: ItemFailure[]
  ): Promise<boolean> {
    try {
      await this.client.uploadFile(folderPath, fileName, await read());
      result.files.push({ fileName, status: 'success' });
      return true;
    } catch (error) {
      const failure = this.errorHandler.handleItemError(error, {
        stage: 'upload',
        operation: `Upload ${fileName}`,
        ticketId,
        fileName,
      });
      failures.push(failure);
      result.files.push({ fileName, status: 'failed', error: failure.message });
      return false;
    }
  }
}
