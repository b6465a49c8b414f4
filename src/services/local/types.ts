// Local file management types

/**
 * Result of filename sanitization
 */
export interface PathSanitizationResult {
  sanitized: string;
  changed: boolean;
  /** Distinct characters that were replaced */
  originalUnsafeChars?: string[];
}

export interface SnapshotWriteResult {
  filePath: string;
  indexPath: string;
  ticketCount: number;
}
