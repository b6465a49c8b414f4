import { ItemFailure, Logger, Ticket } from '../../types';
import { IFreshdeskClient } from '../../core/interfaces';
import { ErrorHandler } from '../../core/error-handler';
import { DEFAULT_MIGRATION_CONFIG } from '../../core/constants';
import { SnapshotStore } from '../local/snapshot-store';

export interface RetrieveOptions {
  outputDirectory: string;
  pageSize?: number;
  updatedSince?: string;
  /** Resolve each ticket's attachment references from its detail record */
  includeAttachments?: boolean;
}

export interface RetrieveResult {
  filePath: string;
  tickets: Ticket[];
  failures: ItemFailure[];
}

/**
 * Pulls every ticket into a fresh timestamped snapshot. Each run is a full
 * pull and produces a new file.
 */
export class TicketRetriever {
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

  async retrieve(options: RetrieveOptions): Promise<RetrieveResult> {
    const includeAttachments = options.includeAttachments ?? true;
    const tickets: Ticket[] = [];
    const failures: ItemFailure[] = [];

    this.logger.info('Retrieving all tickets from Freshdesk...');
    for await (const ticket of this.client.listTickets({
      pageSize: options.pageSize ?? DEFAULT_MIGRATION_CONFIG.pageSize,
      updatedSince: options.updatedSince,
    })) {
      tickets.push(ticket);
    }
    this.logger.info(`Retrieved ${tickets.length} tickets`);

    if (includeAttachments) {
      for (const ticket of tickets) {
        try {
          ticket.attachments = await this.client.getAttachments(ticket.id);
        } catch (error) {
          failures.push(
            this.errorHandler.handleItemError(error, {
              stage: 'retrieve',
              operation: `Resolve attachments for ticket ${ticket.id}`,
              ticketId: ticket.id,
            })
          );
        }
      }
    }

    const { filePath } = await this.store.writeSnapshot(options.outputDirectory, tickets);
    return { filePath, tickets, failures };
  }
}
