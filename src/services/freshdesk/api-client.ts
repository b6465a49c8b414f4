import { AttachmentReference, Logger, Ticket } from '../../types';
import { FreshdeskAuthConfig } from '../../auth/types';
import { IFreshdeskClient } from '../../core/interfaces';
import { API_ENDPOINTS, FRESHDESK_LIMITS, USER_AGENT } from '../../core/constants';
import { ApiError, AuthenticationError, NotFoundError, errorFromResponse, networkError } from '../../core/errors';
import { RetryPolicy, RetryUtility } from '../../core/retry-utility';
import { mapTicket } from './ticket-mapper';
import { ListTicketsOptions } from './types';

/**
 * HTTP client for the Freshdesk v2 REST API with Basic authentication,
 * rate-limit backoff and typed responses
 */
export class FreshdeskApiClient implements IFreshdeskClient {
  private readonly config: FreshdeskAuthConfig;
  private readonly logger: Logger;
  private readonly retryPolicy: Partial<RetryPolicy>;

  constructor(config: FreshdeskAuthConfig, logger: Logger, retryPolicy: Partial<RetryPolicy> = {}) {
    this.config = config;
    this.logger = logger;
    this.retryPolicy = retryPolicy;

    this.logger.debug(`FreshdeskApiClient initialized with base URL: ${this.config.baseUrl}`);
  }

  private get authorization(): string {
    // API key as user name, any password
    return `Basic ${Buffer.from(`${this.config.apiKey}:X`).toString('base64')}`;
  }

  private apiUrl(endpoint: string): string {
    return `${this.config.baseUrl}${API_ENDPOINTS.FRESHDESK.API_PREFIX}${endpoint}`;
  }

  /**
   * Send a request, mapping failures onto the error taxonomy and retrying
   * rate-limited and transient ones
   */
  private async request(url: string, operation: string, headers: Record<string, string>): Promise<Response> {
    return RetryUtility.withRetry(
      async () => {
        let response: Response;
        try {
          this.logger.debug(`GET ${redactQuery(url)}`);
          response = await fetch(url, { headers: { 'User-Agent': USER_AGENT, ...headers } });
        } catch (error) {
          throw networkError('freshdesk', operation, error);
        }

        if (!response.ok) {
          throw errorFromResponse(
            'freshdesk',
            response.status,
            await response.text(),
            response.headers.get('Retry-After'),
            operation
          );
        }

        return response;
      },
      {
        ...this.retryPolicy,
        onRetry: (error, attempt, delay) => {
          this.logger.warn(`${operation} failed (${error.name}), retry ${attempt} in ${delay}ms`, {
            error: error.message,
          });
        },
      }
    );
  }

  private async getJson(endpoint: string, operation: string): Promise<unknown> {
    const response = await this.request(this.apiUrl(endpoint), operation, {
      Authorization: this.authorization,
      'Content-Type': 'application/json',
    });
    return response.json();
  }

  /**
   * Fetch one page of tickets
   */
  async getTicketsPage(page: number, options: ListTicketsOptions): Promise<Ticket[]> {
    const params = new URLSearchParams({
      page: page.toString(),
      per_page: clampPageSize(options.pageSize).toString(),
    });
    if (options.updatedSince) {
      params.set('updated_since', options.updatedSince);
    }

    const payload = await this.getJson(`${API_ENDPOINTS.FRESHDESK.TICKETS}?${params}`, `list tickets page ${page}`);
    if (!Array.isArray(payload)) {
      throw new ApiError(`Freshdesk ticket page ${page} was not a JSON array`);
    }

    return payload.map((item) => mapTicket(item));
  }

  /**
   * Lazily walk every ticket page in API order; stops after the first empty
   * or short page
   */
  async *listTickets(options: ListTicketsOptions): AsyncGenerator<Ticket> {
    const pageSize = clampPageSize(options.pageSize);

    for (let page = 1; ; page++) {
      this.logger.info(`Fetching tickets page ${page}`);
      const tickets = await this.getTicketsPage(page, { ...options, pageSize });

      for (const ticket of tickets) {
        yield ticket;
      }

      if (tickets.length < pageSize) {
        return;
      }
    }
  }

  async getTicket(ticketId: number): Promise<Ticket> {
    const payload = await this.getJson(`${API_ENDPOINTS.FRESHDESK.TICKETS}/${ticketId}`, `get ticket ${ticketId}`);
    return mapTicket(payload);
  }

  async getAttachments(ticketId: number): Promise<AttachmentReference[]> {
    const ticket = await this.getTicket(ticketId);
    return ticket.attachments;
  }

  /**
   * Download attachment bytes. Attachment URLs are usually pre-signed storage
   * links that expire; those get no credentials, and a 403 from them means
   * the signature is no longer valid.
   */
  async downloadAttachment(url: string): Promise<Buffer> {
    const onFreshdesk = isSameOrigin(url, this.config.baseUrl);
    const headers: Record<string, string> = onFreshdesk ? { Authorization: this.authorization } : {};

    let response: Response;
    try {
      response = await this.request(url, 'download attachment', headers);
    } catch (error) {
      if (!onFreshdesk && error instanceof AuthenticationError) {
        throw new NotFoundError(`Attachment URL expired or revoked: ${redactQuery(url)}`, 403);
      }
      throw error;
    }

    const buffer = Buffer.from(await response.arrayBuffer());
    this.logger.debug(`Downloaded ${buffer.length} bytes from ${redactQuery(url)}`);
    return buffer;
  }
}

function clampPageSize(pageSize: number): number {
  return Math.max(1, Math.min(Math.floor(pageSize), FRESHDESK_LIMITS.MAX_PAGE_SIZE));
}

function isSameOrigin(url: string, baseUrl: string): boolean {
  try {
    return new URL(url).origin === new URL(baseUrl).origin;
  } catch {
    return false;
  }
}

/**
 * Signed URLs carry credentials in the query string; keep them out of logs
 */
function redactQuery(url: string): string {
  const queryStart = url.indexOf('?');
  return queryStart === -1 ? url : url.slice(0, queryStart);
}
