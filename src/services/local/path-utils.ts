// Path utilities for safe file naming on disk and in SharePoint

import * as path from 'path';
import { AttachmentReference } from '../../types';
import { FILE_NAMES } from '../../core/constants';
import { PathSanitizationResult } from './types';

/**
 * Characters rejected by Windows, by SharePoint, or by both
 */
const RESERVED_CHARS = /[<>:"|?*\/\\\x00-\x1f]/g;

const WINDOWS_RESERVED_NAMES = [
  'CON', 'PRN', 'AUX', 'NUL',
  'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
  'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9'
];

// Linux and macOS limit a path component to 255 bytes, not characters
const MAX_FILENAME_BYTES = 255;

/**
 * Longest prefix of `value` that fits in `maxBytes` of UTF-8, cut on code
 * point boundaries
 */
function truncateUtf8(value: string, maxBytes: number): string {
  let result = '';
  let bytes = 0;
  for (const char of value) {
    const size = Buffer.byteLength(char, 'utf8');
    if (bytes + size > maxBytes) {
      break;
    }
    result += char;
    bytes += size;
  }
  return result;
}

export class PathUtils {
  /**
   * Sanitize a filename to be safe on every platform and in a document library
   */
  static sanitizeFileName(
    fileName: string,
    fallback = 'untitled',
    maxBytes = MAX_FILENAME_BYTES
  ): PathSanitizationResult {
    const unsafeChars: string[] = [];

    let sanitized = fileName.replace(RESERVED_CHARS, (match) => {
      unsafeChars.push(match);
      return '_';
    });

    // Remove leading/trailing dots and spaces
    sanitized = sanitized.replace(/^[.\s]+|[.\s]+$/g, '');

    if (WINDOWS_RESERVED_NAMES.includes(path.parse(sanitized).name.toUpperCase())) {
      sanitized = `_${sanitized}`;
    }

    if (!sanitized) {
      sanitized = fallback;
    }

    if (Buffer.byteLength(sanitized, 'utf8') > maxBytes) {
      let ext = path.extname(sanitized);
      if (Buffer.byteLength(ext, 'utf8') * 2 > maxBytes) {
        ext = '';
      }
      const nameWithoutExt = sanitized.slice(0, sanitized.length - ext.length);
      const budget = maxBytes - Buffer.byteLength(ext, 'utf8');
      sanitized = truncateUtf8(nameWithoutExt, budget).replace(/[.\s]+$/, '') + ext;
    }

    return {
      sanitized,
      changed: sanitized !== fileName,
      originalUnsafeChars: unsafeChars.length > 0 ? [...new Set(unsafeChars)] : undefined,
    };
  }

  /**
   * Local file names for a ticket's attachments, in order. Names that collide
   * within the ticket get the attachment id appended so every attachment keeps
   * its own stable file across runs. Every name leaves room for that suffix
   * and for the partial-download suffix.
   */
  static attachmentFileNames(attachments: AttachmentReference[]): string[] {
    const used = new Set<string>();

    return attachments.map((attachment) => {
      const reserved = Buffer.byteLength(FILE_NAMES.PARTIAL_SUFFIX, 'utf8') + `_${attachment.id}`.length;
      let name = this.sanitizeFileName(
        attachment.name,
        `attachment_${attachment.id}`,
        MAX_FILENAME_BYTES - reserved
      ).sanitized;

      if (used.has(name.toLowerCase())) {
        const ext = path.extname(name);
        name = `${name.slice(0, name.length - ext.length)}_${attachment.id}${ext}`;
      }

      used.add(name.toLowerCase());
      return name;
    });
  }

  /**
   * Join-key directory for a ticket's attachments
   */
  static ticketAttachmentDirectory(attachmentsRoot: string, ticketId: number): string {
    return path.join(attachmentsRoot, String(ticketId));
  }

  static ticketFolderName(ticketId: number): string {
    return `Ticket_${ticketId}`;
  }

  static metadataFileName(ticketId: number): string {
    return `ticket_${ticketId}_metadata.json`;
  }

  static isPartialDownload(fileName: string): boolean {
    return fileName.endsWith(FILE_NAMES.PARTIAL_SUFFIX);
  }

  /**
   * Local-time stamp used in snapshot names, e.g. 20250301_141500
   */
  static formatTimestamp(date: Date): string {
    const pad = (value: number) => value.toString().padStart(2, '0');
    return (
      `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
      `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
  }
}
