// Freshdesk API response shapes, as sent over the wire

export interface FreshdeskAttachmentPayload {
  id: number;
  name: string;
  content_type?: string;
  size?: number;
  attachment_url: string;
  created_at?: string;
  updated_at?: string;
}

export interface FreshdeskTicketPayload {
  id: number;
  subject?: string | null;
  status?: number;
  priority?: number;
  requester_id?: number | null;
  created_at?: string;
  updated_at?: string;
  attachments?: FreshdeskAttachmentPayload[];
  [field: string]: unknown;
}

export interface ListTicketsOptions {
  pageSize: number;
  /** ISO timestamp; without it Freshdesk only lists recently updated tickets */
  updatedSince?: string;
}
