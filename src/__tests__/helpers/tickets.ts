import { AttachmentReference, Ticket } from '../../types';

export function makeTicket(id: number, subject: string, attachments: Array<Pick<AttachmentReference, 'id' | 'name' | 'url'>> = []): Ticket {
  return {
    id,
    subject,
    status: 2,
    statusName: 'Open',
    priority: 1,
    requesterId: 5000 + id,
    createdAt: '2025-01-10T09:00:00Z',
    updatedAt: '2025-01-11T09:00:00Z',
    fields: { tags: ['billing'], custom_fields: { cf_region: 'EMEA' } },
    attachments: attachments.map((attachment) => ({
      ticketId: id,
      contentType: 'text/plain',
      size: 0,
      ...attachment,
    })),
  };
}
