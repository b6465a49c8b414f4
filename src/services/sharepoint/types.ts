// SharePoint REST response shapes (odata=nometadata)

import { RetryPolicy } from '../../core/retry-utility';

export interface SharePointFolderPayload {
  Name: string;
  ServerRelativeUrl: string;
}

export interface SharePointFilePayload {
  Name: string;
  ServerRelativeUrl: string;
  Length?: string | number;
}

export interface SharePointClientOptions {
  /** Content larger than this many bytes is sent in chunks */
  chunkedUploadThreshold: number;
  chunkSize: number;
  retryPolicy: Partial<RetryPolicy>;
}
