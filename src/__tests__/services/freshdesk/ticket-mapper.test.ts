import { describeStatus, mapAttachment, mapTicket, parseSnapshotTicket } from '../../../services/freshdesk/ticket-mapper';
import { ApiError, InvalidInputError } from '../../../core/errors';

describe('ticket mapping', () => {
  describe('describeStatus', () => {
    it('should name the standard statuses', () => {
      expect([2, 3, 4, 5].map(describeStatus)).toEqual(['Open', 'Pending', 'Resolved', 'Closed']);
    });

    it('should label custom statuses', () => {
      expect(describeStatus(9)).toBe('Unknown (9)');
    });
  });

  describe('mapTicket', () => {
    it('should keep unmapped fields verbatim', () => {
      const ticket = mapTicket({
        id: 1,
        subject: 'Printer jam',
        status: 3,
        priority: 2,
        requester_id: 77,
        created_at: '2025-01-01T00:00:00Z',
        updated_at: '2025-01-02T00:00:00Z',
        type: 'Incident',
        custom_fields: { cf_floor: 3 },
      });

      expect(ticket).toEqual({
        id: 1,
        subject: 'Printer jam',
        status: 3,
        statusName: 'Pending',
        priority: 2,
        requesterId: 77,
        createdAt: '2025-01-01T00:00:00Z',
        updatedAt: '2025-01-02T00:00:00Z',
        fields: { type: 'Incident', custom_fields: { cf_floor: 3 } },
        attachments: [],
      });
    });

    it('should tolerate missing optional fields', () => {
      expect(mapTicket({ id: 2, subject: null })).toMatchObject({
        id: 2,
        subject: '',
        status: 0,
        statusName: 'Unknown (0)',
        priority: null,
        requesterId: null,
        createdAt: null,
      });
    });

    it('should reject a payload without an integer id', () => {
      expect(() => mapTicket({ subject: 'no id' })).toThrow(ApiError);
      expect(() => mapTicket([])).toThrow('Malformed ticket payload: missing integer id');
    });
  });

  describe('mapAttachment', () => {
    it('should default the name, content type and size', () => {
      expect(mapAttachment(5, { id: 50, attachment_url: 'https://attachments.example.com/5/50' })).toEqual({
        ticketId: 5,
        id: 50,
        name: 'attachment_50',
        contentType: 'application/octet-stream',
        url: 'https://attachments.example.com/5/50',
        size: 0,
      });
    });

    it('should reject an attachment without a URL', () => {
      expect(() => mapAttachment(5, { id: 50, name: 'a.txt' })).toThrow(new ApiError('Malformed attachment on ticket 5'));
    });
  });

  describe('parseSnapshotTicket', () => {
    it('should accept a ticket that went through JSON', () => {
      const ticket = mapTicket({
        id: 3,
        subject: 'Refund',
        status: 2,
        attachments: [{ id: 30, name: 'receipt.pdf', attachment_url: 'https://attachments.example.com/3/30', size: 10 }],
      });

      expect(parseSnapshotTicket(JSON.parse(JSON.stringify(ticket)), 0)).toEqual(ticket);
    });

    it('should reject records that are not tickets', () => {
      expect(() => parseSnapshotTicket({ id: 3, subject: 'x' }, 4)).toThrow(
        new InvalidInputError('Snapshot entry 4 is not a valid ticket record')
      );
    });

    it('should reject invalid attachment references', () => {
      const ticket = JSON.parse(JSON.stringify(mapTicket({ id: 3, subject: 'x', status: 2 })));
      ticket.attachments = [{ id: 'x' }];

      expect(() => parseSnapshotTicket(ticket, 0)).toThrow('Snapshot ticket 3 has an invalid attachment at position 0');
    });
  });
});
