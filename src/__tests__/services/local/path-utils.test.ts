import { PathUtils } from '../../../services/local/path-utils';
import { AttachmentReference } from '../../../types';

function attachment(id: number, name: string): AttachmentReference {
  return {
    ticketId: 1,
    id,
    name,
    contentType: 'application/octet-stream',
    url: `https://attachments.example.com/1/${id}`,
    size: 1,
  };
}

describe('PathUtils', () => {
  describe('sanitizeFileName', () => {
    it('should sanitize invalid characters', () => {
      const result = PathUtils.sanitizeFileName('test<>:|?*file.docx');

      expect(result.sanitized).toBe('test______file.docx');
      expect(result.changed).toBe(true);
      expect(result.originalUnsafeChars).toEqual(['<', '>', ':', '|', '?', '*']);
    });

    it('should replace path separators so a name cannot escape its ticket directory', () => {
      const result = PathUtils.sanitizeFileName('../a/b\\c.txt');

      expect(result.sanitized).toBe('_a_b_c.txt');
    });

    it('should prefix Windows reserved names', () => {
      const result = PathUtils.sanitizeFileName('CON.txt');

      expect(result.sanitized).toBe('_CON.txt');
      expect(result.changed).toBe(true);
    });

    it('should remove leading and trailing dots and spaces', () => {
      const result = PathUtils.sanitizeFileName('  ...test file...  ');

      expect(result.sanitized).toBe('test file');
      expect(result.changed).toBe(true);
    });

    it('should fall back when nothing usable is left', () => {
      expect(PathUtils.sanitizeFileName('   ').sanitized).toBe('untitled');
      expect(PathUtils.sanitizeFileName('...', 'attachment_7').sanitized).toBe('attachment_7');
    });

    it('should truncate long filenames and keep the extension', () => {
      const longName = 'a'.repeat(300) + '.docx';
      const result = PathUtils.sanitizeFileName(longName);

      expect(result.sanitized).toHaveLength(255);
      expect(result.sanitized.endsWith('.docx')).toBe(true);
    });

    it('should measure the limit in UTF-8 bytes', () => {
      const result = PathUtils.sanitizeFileName('報告書'.repeat(100) + '.pdf');

      expect(result.sanitized).toBe('報告書'.repeat(27) + '報告' + '.pdf');
      expect(Buffer.byteLength(result.sanitized)).toBe(253);
    });

    it('should not split surrogate pairs when truncating', () => {
      const result = PathUtils.sanitizeFileName('😀'.repeat(100) + '.png');

      expect(result.sanitized).toBe('😀'.repeat(62) + '.png');
    });

    it('should leave safe names untouched', () => {
      const result = PathUtils.sanitizeFileName('invoice 2025-03.pdf');

      expect(result).toEqual({ sanitized: 'invoice 2025-03.pdf', changed: false, originalUnsafeChars: undefined });
    });
  });

  describe('attachmentFileNames', () => {
    it('should append the attachment id to names that collide within a ticket', () => {
      const names = PathUtils.attachmentFileNames([
        attachment(1, 'Report.pdf'),
        attachment(2, 'report.pdf'),
        attachment(3, 'notes.txt'),
        attachment(4, 'Report.pdf'),
      ]);

      expect(names).toEqual(['Report.pdf', 'report_2.pdf', 'notes.txt', 'Report_4.pdf']);
    });

    it('should leave room for the id and partial-download suffixes', () => {
      const [name] = PathUtils.attachmentFileNames([attachment(7, 'b'.repeat(300) + '.txt')]);

      expect(name).toBe('b'.repeat(244) + '.txt');
      expect(Buffer.byteLength(`${name}.part`)).toBeLessThanOrEqual(255);
    });

    it('should use the attachment id when the name is unusable', () => {
      expect(PathUtils.attachmentFileNames([attachment(9, '..')])).toEqual(['attachment_9']);
    });
  });

  describe('naming', () => {
    it('should name ticket folders and metadata files by ticket id', () => {
      expect(PathUtils.ticketFolderName(123)).toBe('Ticket_123');
      expect(PathUtils.metadataFileName(123)).toBe('ticket_123_metadata.json');
    });

    it('should key attachment directories by ticket id', () => {
      expect(PathUtils.ticketAttachmentDirectory('/data/attachments', 456)).toBe('/data/attachments/456');
    });

    it('should recognise partial downloads', () => {
      expect(PathUtils.isPartialDownload('photo.png.part')).toBe(true);
      expect(PathUtils.isPartialDownload('photo.png')).toBe(false);
    });

    it('should format local timestamps for snapshot names', () => {
      expect(PathUtils.formatTimestamp(new Date(2025, 2, 1, 14, 5, 9))).toBe('20250301_140509');
    });
  });
});
