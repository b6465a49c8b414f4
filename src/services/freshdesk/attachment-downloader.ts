import * as fs from 'fs/promises';
import * as path from 'path';
import { AttachmentReference, ItemFailure, Logger, Ticket } from '../../types';
import { IFreshdeskClient } from '../../core/interfaces';
import { ErrorHandler } from '../../core/error-handler';
import { FILE_NAMES } from '../../core/constants';
import { SnapshotStore } from '../local/snapshot-store';
import { PathUtils } from '../local/path-utils';

export interface DownloadOptions {
  ticketsFile: string;
  outputDirectory: string;
  /**
   * Re-read attachment references from Freshdesk before downloading, since
   * the URLs stored in an older snapshot may have expired. Defaults to true.
   */
  refreshReferences?: boolean;
}

export interface DownloadResult {
  ticketsProcessed: number;
  downloaded: number;
  skipped: number;
  bytesDownloaded: number;
  failures: ItemFailure[];
}

async function existingSize(filePath: string): Promise<number> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() ? stats.size : 0;
  } catch {
    return 0;
  }
}

/**
 * Downloads every attachment referenced by a snapshot into
 * <output>/<ticketId>/<fileName>. Re-runs skip files already on disk.
 */
export class AttachmentDownloader {
  private readonly client: IFreshdeskClient;
  private readonly store: SnapshotStore;
  private readonly errorHandler: ErrorHandler;
  private readonly logger: Logger;

  constructor(client: IFreshdeskClient, store: SnapshotStore, errorHandler: ErrorHandler, logger: Logger) {
    this.client = client;
    this.store = store;
    this.errorHandler = errorHandler;
    this.logger = logger;
  }

  async downloadAll(options: DownloadOptions): Promise<DownloadResult> {
    const tickets = await this.store.readSnapshot(options.ticketsFile);
    await fs.mkdir(options.outputDirectory, { recursive: true });

    const result: DownloadResult = {
      ticketsProcessed: 0,
      downloaded: 0,
      skipped: 0,
      bytesDownloaded: 0,
      failures: [],
    };

    for (const ticket of tickets) {
      this.logger.info(`Processing ticket ${ticket.id}: ${ticket.subject || 'No subject'}`);
      await this.downloadForTicket(ticket, options, result);
      result.ticketsProcessed++;
    }

    this.logger.info(
      `Downloaded ${result.downloaded} attachments (${result.skipped} already present, ` +
        `${result.failures.length} failed) for ${tickets.length} tickets`
    );
    return result;
  }

  private async downloadForTicket(ticket: Ticket, options: DownloadOptions, result: DownloadResult): Promise<void> {
    let references: AttachmentReference[];
    if (options.refreshReferences ?? true) {
      try {
        references = await this.client.getAttachments(ticket.id);
      } catch (error) {
        result.failures.push(
          this.errorHandler.handleItemError(error, {
            stage: 'download',
            operation: `Resolve attachments for ticket ${ticket.id}`,
            ticketId: ticket.id,
          })
        );
        return;
      }
    } else {
      references = ticket.attachments;
    }

    if (references.length === 0) {
      this.logger.debug(`No attachments found for ticket ${ticket.id}`);
      return;
    }

    const ticketDirectory = PathUtils.ticketAttachmentDirectory(options.outputDirectory, ticket.id);
    const fileNames = PathUtils.attachmentFileNames(references);

    for (const [index, reference] of references.entries()) {
      const fileName = fileNames[index];
      const target = path.join(ticketDirectory, fileName);

      if ((await existingSize(target)) > 0) {
        this.logger.debug(`Skipping ${target}: already downloaded`);
        result.skipped++;
        continue;
      }

      const partial = `${target}${FILE_NAMES.PARTIAL_SUFFIX}`;
      try {
        const content = await this.client.downloadAttachment(reference.url);
        await fs.mkdir(ticketDirectory, { recursive: true });
        await fs.writeFile(partial, content);
        await fs.rename(partial, target);

        result.downloaded++;
        result.bytesDownloaded += content.length;
        this.logger.info(`Downloaded attachment ${reference.id} to ${target}`);
      } catch (error) {
        result.failures.push(
          this.errorHandler.handleItemError(error, {
            stage: 'download',
            operation: `Download attachment ${reference.id}`,
            ticketId: ticket.id,
            fileName,
          })
        );
        await fs.rm(partial, { force: true }).catch((cleanupError: unknown) => {
          this.logger.warn(`Could not remove partial download ${partial}`, {
            error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
          });
        });
      }
    }
  }
}
