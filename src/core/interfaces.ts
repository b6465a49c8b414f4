// Seams between the pipeline stages and the two remote systems

import { AttachmentReference, SharePointFolder, Ticket, UploadResult } from '../types';
import { ListTicketsOptions } from '../services/freshdesk/types';

export interface IFreshdeskClient {
  listTickets(options: ListTicketsOptions): AsyncIterable<Ticket>;
  getTicket(ticketId: number): Promise<Ticket>;
  getAttachments(ticketId: number): Promise<AttachmentReference[]>;
  downloadAttachment(url: string): Promise<Buffer>;
}

export interface ISharePointClient {
  authenticate(): Promise<void>;
  ensureFolder(parentPath: string, name: string): Promise<SharePointFolder>;
  ensureFolderPath(folderPath: string): Promise<SharePointFolder>;
  uploadFile(folderPath: string, fileName: string, content: Buffer): Promise<UploadResult>;
}
