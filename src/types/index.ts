// Core interfaces and types for the migration tool

export interface AttachmentReference {
  ticketId: number;
  id: number;
  name: string;
  contentType: string;
  url: string;
  size: number;
}

export interface Ticket {
  id: number;
  subject: string;
  status: number;
  statusName: string;
  priority: number | null;
  requesterId: number | null;
  createdAt: string | null;
  updatedAt: string | null;
  // Every other helpdesk field, custom fields included, kept verbatim
  fields: Record<string, unknown>;
  attachments: AttachmentReference[];
}

export type MigrationStage = 'retrieve' | 'download' | 'upload';

export interface ItemFailure {
  stage: MigrationStage;
  ticketId?: number;
  fileName?: string;
  errorType: string;
  message: string;
  timestamp: Date;
}

export interface TicketUploadResult {
  ticketId: number;
  subject: string;
  folderPath: string | null;
  metadataUploaded: boolean;
  attachmentsUploaded: number;
  attachmentsFailed: number;
  files: Array<{ fileName: string; status: 'success' | 'failed'; error?: string }>;
}

export interface SharePointFolder {
  name: string;
  serverRelativeUrl: string;
  created: boolean;
}

export interface UploadResult {
  fileName: string;
  serverRelativeUrl: string;
  size: number;
  chunked: boolean;
  uploadedAt: Date;
}

export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
}
