import * as fs from 'fs/promises';
import * as path from 'path';
import { ItemFailure, Logger, MigrationStage, TicketUploadResult } from '../types';
import { FILE_NAMES } from '../core/constants';

export interface MigrationRunInfo {
  startTime: Date;
  endTime: Date;
  freshdeskDomain: string;
  sharePointUrl: string;
  sharePointFolder: string;
}

export interface StageTotals {
  tickets: number;
  attachmentsDownloaded: number;
  attachmentsSkipped: number;
  metadataUploaded: number;
  attachmentsUploaded: number;
  attachmentsFailed: number;
}

export interface MigrationSummary extends MigrationRunInfo, StageTotals {
  durationSeconds: number;
  failures: ItemFailure[];
  failuresByStage: Record<MigrationStage, number>;
  ticketDetails: TicketUploadResult[];
}

export interface ReportFiles {
  summaryFile: string;
  reportFile: string;
}

function formatDuration(totalSeconds: number): string {
  const seconds = Math.floor(totalSeconds);
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const pad = (value: number): string => String(value).padStart(2, '0');
  return `${hours}:${pad(minutes)}:${pad(seconds % 60)}`;
}

/**
 * Builds the end-of-run summary and writes it as machine-readable JSON and a
 * plain-text report
 */
export class MigrationReporter {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  buildSummary(
    run: MigrationRunInfo,
    totals: StageTotals,
    ticketDetails: TicketUploadResult[],
    failures: ItemFailure[]
  ): MigrationSummary {
    const failuresByStage: Record<MigrationStage, number> = { retrieve: 0, download: 0, upload: 0 };
    for (const failure of failures) {
      failuresByStage[failure.stage]++;
    }

    return {
      ...run,
      ...totals,
      durationSeconds: Math.max(0, (run.endTime.getTime() - run.startTime.getTime()) / 1000),
      failures,
      failuresByStage,
      ticketDetails,
    };
  }

  /**
   * JSON shape of the summary file
   */
  static toJson(summary: MigrationSummary): Record<string, unknown> {
    return {
      start_time: summary.startTime.toISOString(),
      end_time: summary.endTime.toISOString(),
      duration_seconds: summary.durationSeconds,
      freshdesk_domain: summary.freshdeskDomain,
      sharepoint_url: summary.sharePointUrl,
      sharepoint_folder: summary.sharePointFolder,
      tickets: summary.tickets,
      attachments_downloaded: summary.attachmentsDownloaded,
      attachments_skipped: summary.attachmentsSkipped,
      metadata_uploaded: summary.metadataUploaded,
      attachments_uploaded: summary.attachmentsUploaded,
      attachments_failed: summary.attachmentsFailed,
      failures: summary.failures.length,
      failures_by_stage: summary.failuresByStage,
      failure_details: summary.failures.map((failure) => ({
        stage: failure.stage,
        ticket_id: failure.ticketId ?? null,
        file_name: failure.fileName ?? null,
        error_type: failure.errorType,
        message: failure.message,
        timestamp: failure.timestamp.toISOString(),
      })),
      ticket_details: summary.ticketDetails.map((ticket) => ({
        ticket_id: ticket.ticketId,
        subject: ticket.subject,
        folder_path: ticket.folderPath,
        metadata_uploaded: ticket.metadataUploaded,
        attachments: {
          success: ticket.attachmentsUploaded,
          failed: ticket.attachmentsFailed,
          files: ticket.files.map((file) => ({
            file_name: file.fileName,
            status: file.status,
            ...(file.error ? { error: file.error } : {}),
          })),
        },
      })),
    };
  }

  static toText(summary: MigrationSummary): string {
    const lines = [
      'Freshdesk to SharePoint Migration Report',
      '=======================================',
      '',
      `Start time: ${summary.startTime.toISOString()}`,
      `End time: ${summary.endTime.toISOString()}`,
      `Duration: ${formatDuration(summary.durationSeconds)}`,
      '',
      `Freshdesk domain: ${summary.freshdeskDomain}`,
      `SharePoint site: ${summary.sharePointUrl}`,
      `SharePoint folder: ${summary.sharePointFolder}`,
      '',
      `Total tickets processed: ${summary.tickets}`,
      `Total attachments downloaded: ${summary.attachmentsDownloaded}`,
      `Total attachments uploaded: ${summary.attachmentsUploaded}`,
      `Total attachments failed: ${summary.attachmentsFailed}`,
      `Total failures: ${summary.failures.length}`,
      '',
      'Ticket Details:',
      '--------------',
    ];

    for (const ticket of summary.ticketDetails) {
      lines.push(`Ticket ${ticket.ticketId}: ${ticket.subject}`);
      lines.push(`  Attachments: ${ticket.attachmentsUploaded} uploaded, ${ticket.attachmentsFailed} failed`);
    }

    if (summary.failures.length > 0) {
      lines.push('', 'Failures:', '---------');
      for (const failure of summary.failures) {
        const target = [
          failure.ticketId !== undefined ? `ticket ${failure.ticketId}` : null,
          failure.fileName ?? null,
        ]
          .filter((part): part is string => part !== null)
          .join(' / ');
        lines.push(`[${failure.stage}] ${target ? `${target}: ` : ''}${failure.errorType}: ${failure.message}`);
      }
    }

    return lines.join('\n') + '\n';
  }

  async writeReports(directory: string, summary: MigrationSummary): Promise<ReportFiles> {
    await fs.mkdir(directory, { recursive: true });

    const summaryFile = path.join(directory, FILE_NAMES.SUMMARY_JSON);
    await fs.writeFile(summaryFile, JSON.stringify(MigrationReporter.toJson(summary), null, 2) + '\n', 'utf8');
    this.logger.info(`Summary saved to ${summaryFile}`);

    const reportFile = path.join(directory, FILE_NAMES.REPORT_TEXT);
    await fs.writeFile(reportFile, MigrationReporter.toText(summary), 'utf8');
    this.logger.info(`Detailed report saved to ${reportFile}`);

    return { summaryFile, reportFile };
  }
}
