import { v4 as uuidv4 } from 'uuid';
import { Logger, SharePointFolder, UploadResult } from '../../types';
import { ISharePointAuthenticator, SharePointAuthConfig, SharePointSession } from '../../auth/types';
import { SharePointAuthenticator } from '../../auth/sharepoint-auth';
import { ISharePointClient } from '../../core/interfaces';
import { SHAREPOINT_LIMITS, USER_AGENT } from '../../core/constants';
import {
  ApiError,
  InvalidInputError,
  MigrationError,
  NotFoundError,
  QuotaExceededError,
  errorFromResponse,
  networkError,
} from '../../core/errors';
import { RetryUtility } from '../../core/retry-utility';
import { SharePointClientOptions, SharePointFilePayload, SharePointFolderPayload } from './types';

/**
 * Quote a value for use inside a SharePoint REST function argument
 */
export function odataLiteral(value: string): string {
  return encodeURIComponent(value.replace(/'/g, "''"));
}

export function joinSharePointPath(...segments: string[]): string {
  return segments
    .flatMap((segment) => segment.split('/'))
    .filter((segment) => segment.length > 0)
    .join('/');
}

function isFolderPayload(value: unknown): value is SharePointFolderPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'Name') === 'string' &&
    typeof Reflect.get(value, 'ServerRelativeUrl') === 'string'
  );
}

function isFilePayload(value: unknown): value is SharePointFilePayload {
  return isFolderPayload(value);
}

/**
 * SharePoint REST client: folders are ensured rather than created, files are
 * always written with overwrite semantics
 */
export class SharePointApiClient implements ISharePointClient {
  private readonly config: SharePointAuthConfig;
  private readonly logger: Logger;
  private readonly authenticator: ISharePointAuthenticator;
  private readonly options: SharePointClientOptions;
  private readonly sitePath: string;
  private session?: SharePointSession;

  constructor(
    config: SharePointAuthConfig,
    logger: Logger,
    options: Partial<SharePointClientOptions> = {},
    authenticator?: ISharePointAuthenticator
  ) {
    this.config = config;
    this.logger = logger;
    this.authenticator = authenticator ?? new SharePointAuthenticator(logger);
    this.options = {
      chunkedUploadThreshold: SHAREPOINT_LIMITS.CHUNKED_UPLOAD_THRESHOLD,
      chunkSize: SHAREPOINT_LIMITS.CHUNK_SIZE,
      retryPolicy: {},
      ...options,
    };
    this.sitePath = new URL(config.siteUrl).pathname.replace(/\/+$/, '');
  }

  async authenticate(): Promise<void> {
    this.session = await this.authenticator.authenticate(this.config);
  }

  /**
   * Server-relative URL for a site-relative path
   */
  serverRelativeUrl(sitePath: string): string {
    const relative = joinSharePointPath(sitePath);
    return relative ? `${this.sitePath}/${relative}` : this.sitePath || '/';
  }

  async ensureFolder(parentPath: string, name: string): Promise<SharePointFolder> {
    const folderPath = joinSharePointPath(parentPath, name);
    if (!folderPath) {
      throw new InvalidInputError('Folder name must not be empty');
    }

    const serverRelativeUrl = this.serverRelativeUrl(folderPath);
    const existing = await this.getFolder(serverRelativeUrl);
    if (existing) {
      this.logger.debug(`Folder already exists: ${serverRelativeUrl}`);
      return { name: existing.Name, serverRelativeUrl: existing.ServerRelativeUrl, created: false };
    }

    const payload = await this.requestJson(
      'POST',
      `/_api/web/folders/add('${odataLiteral(serverRelativeUrl)}')`,
      `create folder ${folderPath}`
    );
    if (!isFolderPayload(payload)) {
      throw new ApiError(`Unexpected response creating folder ${folderPath}`);
    }

    this.logger.info(`Created folder: ${payload.ServerRelativeUrl}`);
    return { name: payload.Name, serverRelativeUrl: payload.ServerRelativeUrl, created: true };
  }

  /**
   * Ensure each level of a nested site-relative path, e.g. "Shared Documents/Tickets/Ticket_1"
   */
  async ensureFolderPath(folderPath: string): Promise<SharePointFolder> {
    const segments = joinSharePointPath(folderPath).split('/').filter(Boolean);
    if (segments.length === 0) {
      throw new InvalidInputError('Folder path must not be empty');
    }

    let folder = await this.ensureFolder('', segments[0]);
    for (let index = 1; index < segments.length; index++) {
      folder = await this.ensureFolder(segments.slice(0, index).join('/'), segments[index]);
    }
    return folder;
  }

  async uploadFile(folderPath: string, fileName: string, content: Buffer): Promise<UploadResult> {
    const folderUrl = this.serverRelativeUrl(folderPath);
    const chunked = content.length > this.options.chunkedUploadThreshold;

    const file = chunked
      ? await this.uploadChunked(folderUrl, fileName, content)
      : await this.addFile(folderUrl, fileName, content);

    this.logger.info(`Uploaded file ${fileName} to ${folderUrl}`, { size: content.length, chunked });

    return {
      fileName: file.Name,
      serverRelativeUrl: file.ServerRelativeUrl,
      size: content.length,
      chunked,
      uploadedAt: new Date(),
    };
  }

  private async getFolder(serverRelativeUrl: string): Promise<SharePointFolderPayload | null> {
    try {
      const payload = await this.requestJson(
        'GET',
        `/_api/web/GetFolderByServerRelativeUrl('${odataLiteral(serverRelativeUrl)}')`,
        `get folder ${serverRelativeUrl}`
      );
      return isFolderPayload(payload) ? payload : null;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return null;
      }
      throw error;
    }
  }

  private async addFile(folderUrl: string, fileName: string, content: Buffer): Promise<SharePointFilePayload> {
    const payload = await this.requestJson(
      'POST',
      `/_api/web/GetFolderByServerRelativeUrl('${odataLiteral(folderUrl)}')/Files/add(url='${odataLiteral(fileName)}',overwrite=true)`,
      `upload ${fileName}`,
      content
    );
    if (!isFilePayload(payload)) {
      throw new ApiError(`Unexpected response uploading ${fileName}`);
    }
    return payload;
  }

  /**
   * Create (or truncate) the file, then send it with StartUpload,
   * ContinueUpload and FinishUpload under one upload id
   */
  private async uploadChunked(folderUrl: string, fileName: string, content: Buffer): Promise<SharePointFilePayload> {
    const chunkSize = this.options.chunkSize;
    if (content.length <= chunkSize) {
      return this.addFile(folderUrl, fileName, content);
    }

    const placeholder = await this.addFile(folderUrl, fileName, Buffer.alloc(0));
    const fileRef = `/_api/web/GetFileByServerRelativeUrl('${odataLiteral(placeholder.ServerRelativeUrl)}')`;
    const uploadId = uuidv4();

    this.logger.debug(`Starting chunked upload of ${fileName}`, { uploadId, size: content.length, chunkSize });

    await this.requestJson(
      'POST',
      `${fileRef}/StartUpload(uploadId=guid'${uploadId}')`,
      `start upload of ${fileName}`,
      content.subarray(0, chunkSize)
    );

    let offset = chunkSize;
    while (content.length - offset > chunkSize) {
      await this.requestJson(
        'POST',
        `${fileRef}/ContinueUpload(uploadId=guid'${uploadId}',fileOffset=${offset})`,
        `upload ${fileName} at offset ${offset}`,
        content.subarray(offset, offset + chunkSize)
      );
      offset += chunkSize;
    }

    const payload = await this.requestJson(
      'POST',
      `${fileRef}/FinishUpload(uploadId=guid'${uploadId}',fileOffset=${offset})`,
      `finish upload of ${fileName}`,
      content.subarray(offset)
    );
    if (!isFilePayload(payload)) {
      throw new ApiError(`Unexpected response finishing upload of ${fileName}`);
    }
    return payload;
  }

  private async ensureSession(): Promise<SharePointSession> {
    let session = this.session ?? (await this.authenticator.authenticate(this.config));

    if (session.digestExpiresAt.getTime() - Date.now() < SHAREPOINT_LIMITS.DIGEST_REFRESH_MARGIN_MS) {
      session = await this.authenticator.refreshDigest(this.config, session);
    }

    this.session = session;
    return session;
  }

  private async requestJson(
    method: 'GET' | 'POST',
    endpoint: string,
    operation: string,
    body?: Buffer
  ): Promise<unknown> {
    return RetryUtility.withRetry(
      async () => {
        const session = await this.ensureSession();
        const url = `${this.config.siteUrl}${endpoint}`;

        let response: Response;
        try {
          this.logger.debug(`${method} ${url}`);
          response = await fetch(url, {
            method,
            headers: {
              Accept: 'application/json;odata=nometadata',
              Cookie: session.cookieHeader,
              'X-RequestDigest': session.formDigest,
              'User-Agent': USER_AGENT,
            },
            body,
          });
        } catch (error) {
          throw networkError('sharepoint', operation, error);
        }

        if (!response.ok) {
          throw this.toError(response.status, await response.text(), response.headers.get('Retry-After'), operation);
        }

        const text = await response.text();
        return text ? JSON.parse(text) : {};
      },
      {
        ...this.options.retryPolicy,
        onRetry: (error, attempt, delay) => {
          this.logger.warn(`${operation} failed (${error.name}), retry ${attempt} in ${delay}ms`, {
            error: error.message,
          });
        },
      }
    );
  }

  private toError(status: number, body: string, retryAfter: string | null, operation: string): MigrationError {
    if (body.includes('SPQuotaExceededException') || body.includes('SPServerQuotaExceededException')) {
      return new QuotaExceededError(`sharepoint ${operation} failed: storage quota exceeded`, status);
    }
    // Older farms answer a missing folder with a 500 wrapping FileNotFoundException
    if (status === 500 && body.includes('FileNotFoundException')) {
      return new NotFoundError(`sharepoint ${operation} failed: not found`, status);
    }
    return errorFromResponse('sharepoint', status, body, retryAfter, operation);
  }
}
