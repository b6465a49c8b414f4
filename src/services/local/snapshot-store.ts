// Reads and writes the local ticket snapshot files

import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger, Ticket } from '../../types';
import { FILE_NAMES } from '../../core/constants';
import { InvalidInputError } from '../../core/errors';
import { parseSnapshotTicket } from '../freshdesk/ticket-mapper';
import { PathUtils } from './path-utils';
import { SnapshotWriteResult } from './types';

const SNAPSHOT_NAME = /^tickets_(\d{8}_\d{6})(?:_(\d+))?\.json$/;

/** Sort key for a snapshot file name, or null when the name is not a snapshot */
function snapshotKey(name: string): [string, number] | null {
  const match = SNAPSHOT_NAME.exec(name);
  if (!match) {
    return null;
  }
  return [match[1], match[2] ? Number(match[2]) : 0];
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, 2) + '\n', 'utf8');
}

export class SnapshotStore {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Write a new timestamped snapshot; never replaces an earlier one
   */
  async writeSnapshot(directory: string, tickets: Ticket[], now: Date = new Date()): Promise<SnapshotWriteResult> {
    await fs.mkdir(directory, { recursive: true });

    const baseName = `${FILE_NAMES.SNAPSHOT_PREFIX}${PathUtils.formatTimestamp(now)}`;
    const content = JSON.stringify(tickets, null, 2) + '\n';

    let filePath = '';
    for (let attempt = 0; !filePath; attempt++) {
      const candidate = path.join(
        directory,
        `${baseName}${attempt === 0 ? '' : `_${attempt}`}${FILE_NAMES.SNAPSHOT_EXTENSION}`
      );
      try {
        await fs.writeFile(candidate, content, { encoding: 'utf8', flag: 'wx' });
        filePath = candidate;
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EEXIST') {
          throw error;
        }
      }
    }

    const indexPath = path.join(directory, FILE_NAMES.TICKET_INDEX);
    await writeJsonFile(
      indexPath,
      tickets.map((ticket) => ({ id: ticket.id, subject: ticket.subject }))
    );

    this.logger.info(`Saved ${tickets.length} tickets to ${filePath}`);
    return { filePath, indexPath, ticketCount: tickets.length };
  }

  async readSnapshot(filePath: string): Promise<Ticket[]> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new InvalidInputError(`Cannot read tickets file ${filePath}: ${isErrnoException(error) ? error.code : String(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new InvalidInputError(`Tickets file ${filePath} is not valid JSON`);
    }

    if (!Array.isArray(parsed)) {
      throw new InvalidInputError(`Tickets file ${filePath} must contain a JSON array`);
    }

    const tickets = parsed.map((entry, index) => parseSnapshotTicket(entry, index));
    this.logger.info(`Loaded ${tickets.length} tickets from ${filePath}`);
    return tickets;
  }

  /**
   * Newest snapshot in a directory, by the timestamp in its name
   */
  async findLatestSnapshot(directory: string): Promise<string> {
    let entries: string[];
    try {
      entries = await fs.readdir(directory);
    } catch {
      throw new InvalidInputError(`Tickets directory not found: ${directory}`);
    }

    let latest: { name: string; key: [string, number] } | null = null;
    for (const name of entries) {
      const key = snapshotKey(name);
      if (!key) {
        continue;
      }
      if (!latest || key[0] > latest.key[0] || (key[0] === latest.key[0] && key[1] > latest.key[1])) {
        latest = { name, key };
      }
    }

    if (!latest) {
      throw new InvalidInputError(`No ticket files found in ${directory}`);
    }
    return path.join(directory, latest.name);
  }
}
