import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import pino from 'pino';

import { NotFoundError, StoreUnavailableError } from '../errors.js';
import { ContactBook } from '../services/contacts.js';
import type { CommandRunner } from '../services/imageConvert.js';
import { OnThisDayService } from '../services/onThisDay.js';
import type { OnThisDayOptions } from '../services/onThisDay.js';
import { ChatDbFixture } from './fixtures/chatDb.js';

const log = pino({ level: 'silent' });

const contacts = new ContactBook(
  new Map([
    ['4155552671', 'Ada Lovelace'],
    ['2125550100', 'Grace Hopper'],
    ['reader@example.com', 'Barbara Liskov'],
  ]),
);

describe('OnThisDayService', () => {
  let fixture: ChatDbFixture;
  let oneToOne: number;
  let group: number;
  const attachmentIds: Record<string, number> = {};

  function service(overrides: Partial<OnThisDayOptions> = {}): OnThisDayService {
    return new OnThisDayService({
      chatDbPath: fixture.path,
      contacts: () => contacts,
      imageCacheDir: join(fixture.dir, 'image-cache'),
      imageConvertTimeoutMs: 1000,
      logger: log,
      ...overrides,
    });
  }

  beforeAll(() => {
    fixture = new ChatDbFixture();
    const files = join(fixture.dir, 'Attachments');
    mkdirSync(files);
    writeFileSync(join(files, 'Beach Day.jpg'), 'jpeg bytes');
    writeFileSync(join(files, 'IMG_0007.HEIC'), 'heic bytes');

    oneToOne = fixture.addChat({ chatIdentifier: '+14155552671', handles: ['+14155552671'] });
    fixture.addMessage({
      chatId: oneToOne,
      guid: 'A-1',
      at: '2021-06-15T18:30:00Z',
      text: 'Remember this?',
      handle: '+14155552671',
    });
    const photo = fixture.addMessage({ chatId: oneToOne, guid: 'A-2', at: '2021-06-15T18:31:00Z', isFromMe: true });
    attachmentIds.jpeg = fixture.addAttachment(photo, {
      filename: join(files, 'Beach%20Day.jpg'),
      mimeType: 'image/jpeg',
    });
    attachmentIds.heic = fixture.addAttachment(photo, {
      filename: join(files, 'IMG_0007.HEIC'),
      mimeType: 'image/heic',
    });
    attachmentIds.gone = fixture.addAttachment(photo, {
      filename: join(files, 'deleted.mov'),
      mimeType: 'video/quicktime',
    });

    group = fixture.addChat({
      chatIdentifier: 'chat88',
      style: 43,
      handles: ['+12125550100', 'reader@example.com'],
    });
    fixture.addMessage({ chatId: group, guid: 'G-1', at: '2019-06-15T08:00:00Z', text: 'Anyone up?' });

    fixture.close();
  });

  afterAll(() => {
    fixture.cleanup();
  });

  // ── listConversations ────────────────────────────────────────────

  describe('listConversations', () => {
    it('should resolve conversation names through the contact book', () => {
      const listing = service().listConversations({ month: 6, day: 15 });

      expect(listing.month).toBe(6);
      expect(listing.day).toBe(15);
      expect(listing.conversations.map((c) => [c.chatId, c.displayName])).toEqual([
        [oneToOne, 'Ada Lovelace'],
        [group, expect.stringMatching(/^(Grace Hopper, Barbara Liskov|Barbara Liskov, Grace Hopper)$/)],
      ]);
    });

    it('should default to the current local day', () => {
      const listing = service().listConversations({}, log, new Date(2024, 5, 15, 9, 0));

      expect(listing.month).toBe(6);
      expect(listing.day).toBe(15);
      expect(listing.conversations).toHaveLength(2);
    });

    it('should fill in only the missing part of the day', () => {
      const listing = service().listConversations({ day: 16 }, log, new Date(2024, 5, 15));

      expect(listing).toEqual({ month: 6, day: 16, conversations: [] });
    });

    it('should raise StoreUnavailableError when the archive cannot be opened', () => {
      const missing = service({ chatDbPath: join(fixture.dir, 'nope', 'chat.db') });

      expect(() => missing.listConversations({ month: 6, day: 15 })).toThrow(StoreUnavailableError);
    });
  });

  // ── getTimeline ──────────────────────────────────────────────────

  describe('getTimeline', () => {
    it('should resolve the chat name and each sender', () => {
      const timeline = service().getTimeline(oneToOne, { month: 6, day: 15 });

      expect(timeline.displayName).toBe('Ada Lovelace');
      expect(timeline.yearGroups).toHaveLength(1);
      expect(timeline.yearGroups[0].messages.map((m) => [m.guid, m.sender])).toEqual([
        ['A-1', 'Ada Lovelace'],
        ['A-2', 'Me'],
      ]);
    });

    it('should leave the sender empty for unattributed incoming messages', () => {
      const timeline = service().getTimeline(group, { month: 6, day: 15 });

      expect(timeline.isGroup).toBe(true);
      expect(timeline.yearGroups[0].messages[0].sender).toBeNull();
    });

    it('should throw NotFoundError for an unknown chat', () => {
      expect(() => service().getTimeline(4242, { month: 6, day: 15 })).toThrow(NotFoundError);
      expect(() => service().getTimeline(4242, { month: 6, day: 15 })).toThrow('Chat 4242 not found');
    });
  });

  // ── getAttachment ────────────────────────────────────────────────

  describe('getAttachment', () => {
    it('should return the decoded path of a regular attachment', async () => {
      const file = await service().getAttachment(attachmentIds.jpeg);

      expect(file).toEqual({ path: join(fixture.dir, 'Attachments', 'Beach Day.jpg'), mimeType: 'image/jpeg' });
    });

    it('should serve HEIC attachments as converted JPEGs', async () => {
      const runCommand = vi.fn<CommandRunner>(async (_file, args) => {
        writeFileSync(args[5], 'converted');
      });
      const cacheDir = join(fixture.dir, 'heic-cache');

      const file = await service({ runCommand, imageCacheDir: cacheDir }).getAttachment(attachmentIds.heic);

      expect(file).toEqual({ path: join(cacheDir, `${attachmentIds.heic}.jpg`), mimeType: 'image/jpeg' });
    });

    it('should fall back to the original HEIC file when conversion fails', async () => {
      const runCommand = vi.fn<CommandRunner>(async () => {
        throw new Error('sips: command not found');
      });
      const cacheDir = join(fixture.dir, 'failing-cache');

      const file = await service({ runCommand, imageCacheDir: cacheDir }).getAttachment(attachmentIds.heic);

      expect(file).toEqual({ path: join(fixture.dir, 'Attachments', 'IMG_0007.HEIC'), mimeType: 'image/heic' });
    });

    it('should throw NotFoundError when the file is gone or the id is unknown', async () => {
      await expect(service().getAttachment(attachmentIds.gone)).rejects.toThrow(NotFoundError);
      await expect(service().getAttachment(9999)).rejects.toThrow('Attachment 9999 not found');
    });
  });
});
