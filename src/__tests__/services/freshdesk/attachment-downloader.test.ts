import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { AttachmentDownloader } from '../../../services/freshdesk/attachment-downloader';
import { FreshdeskApiClient } from '../../../services/freshdesk/api-client';
import { SnapshotStore } from '../../../services/local/snapshot-store';
import { ErrorHandler } from '../../../core/error-handler';
import { createFreshdeskConfig } from '../../../auth/config';
import { RecordingLogger } from '../../helpers/recording-logger';
import { jsonResponse } from '../../helpers/http';
import { FILES_ORIGIN, FakeFreshdesk, TEST_API_KEY, attachmentUrl } from '../../helpers/fake-freshdesk';
import { makeTicket } from '../../helpers/tickets';

describe('AttachmentDownloader', () => {
  let root: string;
  let ticketsFile: string;
  let output: string;
  let fake: FakeFreshdesk;
  let store: SnapshotStore;
  let downloader: AttachmentDownloader;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'download-'));
    output = path.join(root, 'attachments');

    fake = new FakeFreshdesk([
      {
        id: 123,
        subject: 'Invoice question',
        attachments: [
          { id: 1, name: 'invoice.pdf', content: Buffer.from('pdf-bytes') },
          { id: 2, name: 'notes: draft.txt', content: Buffer.from('notes') },
        ],
      },
      {
        id: 456,
        subject: 'Old screenshots',
        attachments: [{ id: 3, name: 'screen.png', content: null }],
      },
    ]);
    fake.install();

    const logger = new RecordingLogger();
    store = new SnapshotStore(logger);
    ticketsFile = (
      await store.writeSnapshot(path.join(root, 'tickets'), [makeTicket(123, 'Invoice question'), makeTicket(456, 'Old screenshots')])
    ).filePath;

    const client = new FreshdeskApiClient(createFreshdeskConfig('acme', TEST_API_KEY), logger, {
      baseDelay: 0,
      jitter: false,
    });
    downloader = new AttachmentDownloader(client, store, new ErrorHandler(logger), logger);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should download into one directory per ticket and isolate failures', async () => {
    const result = await downloader.downloadAll({ ticketsFile, outputDirectory: output });

    expect(result).toMatchObject({ ticketsProcessed: 2, downloaded: 2, skipped: 0, bytesDownloaded: 14 });
    expect(await fs.readFile(path.join(output, '123', 'invoice.pdf'), 'utf8')).toBe('pdf-bytes');
    expect(await fs.readFile(path.join(output, '123', 'notes_ draft.txt'), 'utf8')).toBe('notes');
    expect((await fs.readdir(path.join(output, '123'))).sort()).toEqual(['invoice.pdf', 'notes_ draft.txt']);

    expect(result.failures).toEqual([
      expect.objectContaining({
        stage: 'download',
        ticketId: 456,
        fileName: 'screen.png',
        errorType: 'NotFoundError',
        message: `Attachment URL expired or revoked: ${FILES_ORIGIN}/456/3/screen.png`,
      }),
    ]);
    await expect(fs.stat(path.join(output, '456'))).rejects.toThrow();
  });

  it('should skip files that are already on disk', async () => {
    await downloader.downloadAll({ ticketsFile, outputDirectory: output });
    const fileRequests = fake.requestsMatching(new RegExp(`^${FILES_ORIGIN}`)).length;

    const second = await downloader.downloadAll({ ticketsFile, outputDirectory: output });

    expect(second.downloaded).toBe(0);
    expect(second.skipped).toBe(2);
    expect(fake.requestsMatching(new RegExp(`^${FILES_ORIGIN}`))).toHaveLength(fileRequests + 1);
  });

  it('should replace an empty leftover file', async () => {
    await fs.mkdir(path.join(output, '123'), { recursive: true });
    await fs.writeFile(path.join(output, '123', 'invoice.pdf'), '');

    const result = await downloader.downloadAll({ ticketsFile, outputDirectory: output });

    expect(result.downloaded).toBe(2);
    expect(await fs.readFile(path.join(output, '123', 'invoice.pdf'), 'utf8')).toBe('pdf-bytes');
  });

  it('should keep both attachments when names collide', async () => {
    fake.tickets = [
      {
        id: 789,
        subject: 'Two reports',
        attachments: [
          { id: 11, name: 'report.pdf', content: Buffer.from('first') },
          { id: 12, name: 'report.pdf', content: Buffer.from('second') },
        ],
      },
    ];
    const file = (await store.writeSnapshot(path.join(root, 'other'), [makeTicket(789, 'Two reports')])).filePath;

    await downloader.downloadAll({ ticketsFile: file, outputDirectory: output });

    expect(await fs.readFile(path.join(output, '789', 'report.pdf'), 'utf8')).toBe('first');
    expect(await fs.readFile(path.join(output, '789', 'report_12.pdf'), 'utf8')).toBe('second');
  });

  describe('with very long attachment names', () => {
    const asciiName = 'a'.repeat(300) + '.txt';
    const cjkName = '報告書'.repeat(50) + '.pdf';

    beforeEach(async () => {
      fake.tickets = [
        {
          id: 456,
          subject: 'Long names',
          attachments: [
            { id: 1, name: asciiName, content: Buffer.from('ascii') },
            { id: 2, name: cjkName, content: Buffer.from('cjk') },
          ],
        },
        { id: 789, subject: 'Short name', attachments: [{ id: 3, name: 'ok.txt', content: Buffer.from('ok') }] },
      ];
      ticketsFile = (
        await store.writeSnapshot(path.join(root, 'long'), [makeTicket(456, 'Long names'), makeTicket(789, 'Short name')])
      ).filePath;
    });

    it('should shorten names to fit the file system', async () => {
      const result = await downloader.downloadAll({ ticketsFile, outputDirectory: output });

      expect(result.failures).toEqual([]);
      expect(result.downloaded).toBe(3);
      expect((await fs.readdir(path.join(output, '456'))).sort()).toEqual(
        ['a'.repeat(244) + '.txt', '報告書'.repeat(27) + '.pdf'].sort()
      );
      expect(await fs.readFile(path.join(output, '789', 'ok.txt'), 'utf8')).toBe('ok');
    });

    it('should keep going when a failed write cannot be cleaned up', async () => {
      await fs.mkdir(output, { recursive: true });
      await fs.writeFile(path.join(output, '456'), 'not a directory');

      const result = await downloader.downloadAll({ ticketsFile, outputDirectory: output });

      expect(result.failures.map((failure) => [failure.ticketId, failure.stage])).toEqual([
        [456, 'download'],
        [456, 'download'],
      ]);
      expect(result.downloaded).toBe(1);
      expect(await fs.readFile(path.join(output, '789', 'ok.txt'), 'utf8')).toBe('ok');
    });
  });

  it('should record a ticket whose references cannot be refreshed', async () => {
    fake.failNext(/\/tickets\/123$/, () => jsonResponse({ message: 'not found' }, 404));

    const result = await downloader.downloadAll({ ticketsFile, outputDirectory: output });

    expect(result.failures.map((failure) => [failure.ticketId, failure.errorType])).toEqual([
      [123, 'NotFoundError'],
      [456, 'NotFoundError'],
    ]);
    expect(result.downloaded).toBe(0);
  });

  it('should use the snapshot references when refreshing is off', async () => {
    const file = (
      await store.writeSnapshot(path.join(root, 'stored'), [
        makeTicket(123, 'Invoice question', [
          { id: 1, name: 'invoice.pdf', url: attachmentUrl(123, { id: 1, name: 'invoice.pdf' }) },
        ]),
      ])
    ).filePath;

    const result = await downloader.downloadAll({ ticketsFile: file, outputDirectory: output, refreshReferences: false });

    expect(result.downloaded).toBe(1);
    expect(fake.requestsMatching(/\/api\/v2\//)).toHaveLength(0);
  });
});
