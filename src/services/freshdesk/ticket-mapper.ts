// Converts raw Freshdesk payloads into typed records at the client boundary

import { AttachmentReference, Ticket } from '../../types';
import { TICKET_STATUS_NAMES } from '../../core/constants';
import { ApiError, InvalidInputError } from '../../core/errors';

type JsonObject = Record<string, unknown>;

const MAPPED_FIELDS = new Set([
  'id',
  'subject',
  'status',
  'priority',
  'requester_id',
  'created_at',
  'updated_at',
  'attachments',
]);

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export function describeStatus(status: number): string {
  return TICKET_STATUS_NAMES[status] ?? `Unknown (${status})`;
}

export function mapAttachment(ticketId: number, raw: unknown): AttachmentReference {
  if (!isObject(raw) || !Number.isInteger(raw.id) || typeof raw.attachment_url !== 'string') {
    throw new ApiError(`Malformed attachment on ticket ${ticketId}`);
  }

  return {
    ticketId,
    id: Number(raw.id),
    name: optionalString(raw.name) ?? `attachment_${raw.id}`,
    contentType: optionalString(raw.content_type) ?? 'application/octet-stream',
    url: raw.attachment_url,
    size: optionalNumber(raw.size) ?? 0,
  };
}

export function mapTicket(raw: unknown): Ticket {
  if (!isObject(raw) || !Number.isInteger(raw.id)) {
    throw new ApiError('Malformed ticket payload: missing integer id');
  }

  const id = Number(raw.id);
  const status = optionalNumber(raw.status) ?? 0;
  const attachments = Array.isArray(raw.attachments) ? raw.attachments.map((item) => mapAttachment(id, item)) : [];

  const fields: JsonObject = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!MAPPED_FIELDS.has(key)) {
      fields[key] = value;
    }
  }

  return {
    id,
    subject: optionalString(raw.subject) ?? '',
    status,
    statusName: describeStatus(status),
    priority: optionalNumber(raw.priority),
    requesterId: optionalNumber(raw.requester_id),
    createdAt: optionalString(raw.created_at),
    updatedAt: optionalString(raw.updated_at),
    fields,
    attachments,
  };
}

function isAttachmentReference(value: unknown): value is AttachmentReference {
  return (
    isObject(value) &&
    Number.isInteger(value.ticketId) &&
    Number.isInteger(value.id) &&
    typeof value.name === 'string' &&
    typeof value.contentType === 'string' &&
    typeof value.url === 'string' &&
    typeof value.size === 'number'
  );
}

/**
 * Validate a ticket record read back from a local snapshot
 */
export function parseSnapshotTicket(value: unknown, index: number): Ticket {
  if (
    !isObject(value) ||
    !Number.isInteger(value.id) ||
    typeof value.subject !== 'string' ||
    typeof value.status !== 'number' ||
    !isObject(value.fields) ||
    !Array.isArray(value.attachments)
  ) {
    throw new InvalidInputError(`Snapshot entry ${index} is not a valid ticket record`);
  }

  const id = Number(value.id);
  const attachments = value.attachments.map((attachment, position) => {
    if (!isAttachmentReference(attachment)) {
      throw new InvalidInputError(`Snapshot ticket ${id} has an invalid attachment at position ${position}`);
    }
    return attachment;
  });

  return {
    id,
    subject: value.subject,
    status: value.status,
    statusName: optionalString(value.statusName) ?? describeStatus(value.status),
    priority: optionalNumber(value.priority),
    requesterId: optionalNumber(value.requesterId),
    createdAt: optionalString(value.createdAt),
    updatedAt: optionalString(value.updatedAt),
    fields: value.fields,
    attachments,
  };
}
