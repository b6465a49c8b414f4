// Core constants and configuration defaults

export const DEFAULT_MIGRATION_CONFIG = {
  dataDirectory: './data',
  ticketsSubdirectory: 'tickets',
  attachmentsSubdirectory: 'attachments',
  logsSubdirectory: 'logs',
  sharePointFolder: 'FreshdeskTickets',
  pageSize: 100,
};

export const API_ENDPOINTS = {
  FRESHDESK: {
    API_PREFIX: '/api/v2',
    TICKETS: '/tickets',
  },
  SHAREPOINT: {
    STS_URL: 'https://login.microsoftonline.com/extSTS.srf',
    SIGN_IN: '/_forms/default.aspx?wa=wsignin1.0',
    CONTEXT_INFO: '/_api/contextinfo',
  },
};

export const FRESHDESK_LIMITS = {
  MAX_PAGE_SIZE: 100,
};

export const SHAREPOINT_LIMITS = {
  // Content above this goes through StartUpload/ContinueUpload/FinishUpload
  CHUNKED_UPLOAD_THRESHOLD: 10 * 1024 * 1024,
  CHUNK_SIZE: 10 * 1024 * 1024,
  // Refresh the form digest this long before the server says it expires
  DIGEST_REFRESH_MARGIN_MS: 60 * 1000,
};

export const DEFAULT_RETRY_POLICY = {
  maxRetries: 5,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
  jitter: true,
};

export const TICKET_STATUS_NAMES: Record<number, string> = {
  2: 'Open',
  3: 'Pending',
  4: 'Resolved',
  5: 'Closed',
};

export const FILE_NAMES = {
  SNAPSHOT_PREFIX: 'tickets_',
  SNAPSHOT_EXTENSION: '.json',
  TICKET_INDEX: 'ticket_index.json',
  UPLOAD_RESULTS: 'upload_results.json',
  SUMMARY_JSON: 'migration_summary.json',
  REPORT_TEXT: 'migration_report.txt',
  PARTIAL_SUFFIX: '.part',
};

export const USER_AGENT = 'FreshdeskToSharePointMigration/1.0';
