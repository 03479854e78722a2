import { describe, it, expect } from 'vitest';
import { Api, helpers } from 'telegram';
import { describeMedia, isRelayInbound, toInboxMessage } from '../src/media.js';

// ─── Helpers ────────────────────────────────────────────────────────────────

const SELF_ID = 9000;
const BOT_ID = 4242;

function documentMedia(
  mimeType: string,
  attributes: Api.TypeDocumentAttribute[],
  size = 2048,
): Api.MessageMediaDocument {
  return new Api.MessageMediaDocument({
    document: new Api.Document({
      id: helpers.returnBigInt(77),
      accessHash: helpers.returnBigInt(1),
      fileReference: Buffer.from('ref'),
      date: 1_700_000_000,
      mimeType,
      size: helpers.returnBigInt(size),
      dcId: 2,
      attributes,
    }),
  });
}

function stickerAttr(): Api.DocumentAttributeSticker {
  return new Api.DocumentAttributeSticker({ alt: '🙂', stickerset: new Api.InputStickerSetEmpty() });
}

// ─── describeMedia ──────────────────────────────────────────────────────────

describe('describeMedia', () => {
  it('describes a named document', () => {
    const media = documentMedia(
      'application/pdf',
      [new Api.DocumentAttributeFilename({ fileName: 'report.pdf' })],
      5_242_880,
    );

    expect(describeMedia(media)).toEqual({
      kind: 'document',
      fileName: 'report.pdf',
      size: 5_242_880,
      mimeType: 'application/pdf',
      fileUniqueId: '77',
    });
  });

  it('tells videos, round videos and animations apart', () => {
    const video = new Api.DocumentAttributeVideo({ duration: 10, w: 640, h: 360 });
    const round = new Api.DocumentAttributeVideo({ duration: 10, w: 240, h: 240, roundMessage: true });

    expect(describeMedia(documentMedia('video/mp4', [video]))?.kind).toBe('video');
    expect(describeMedia(documentMedia('video/mp4', [round]))).toBeUndefined();
    expect(
      describeMedia(documentMedia('video/mp4', [video, new Api.DocumentAttributeAnimated()]))?.kind,
    ).toBe('document');
  });

  it('tells voice messages from audio', () => {
    const voice = new Api.DocumentAttributeAudio({ duration: 3, voice: true });
    const song = new Api.DocumentAttributeAudio({ duration: 180, title: 'Song' });

    expect(describeMedia(documentMedia('audio/ogg', [voice]))?.kind).toBe('voice');
    expect(describeMedia(documentMedia('audio/mpeg', [song]))?.kind).toBe('audio');
  });

  it('keeps static stickers and drops animated ones', () => {
    expect(describeMedia(documentMedia('image/webp', [stickerAttr()]))?.kind).toBe('sticker');
    expect(describeMedia(documentMedia('application/x-tgsticker', [stickerAttr()]))).toBeUndefined();
    expect(describeMedia(documentMedia('video/webm', [stickerAttr()]))).toBeUndefined();
  });

  it('reports the largest size of a photo', () => {
    const media = new Api.MessageMediaPhoto({
      photo: new Api.Photo({
        id: helpers.returnBigInt(88),
        accessHash: helpers.returnBigInt(1),
        fileReference: Buffer.from('ref'),
        date: 1_700_000_000,
        dcId: 2,
        sizes: [
          new Api.PhotoSize({ type: 'm', w: 320, h: 240, size: 20_000 }),
          new Api.PhotoSizeProgressive({ type: 'y', w: 1280, h: 960, sizes: [10_000, 60_000, 120_000] }),
        ],
      }),
    });

    expect(describeMedia(media)).toEqual({
      kind: 'photo',
      size: 120_000,
      mimeType: 'image/jpeg',
      fileUniqueId: '88',
    });
  });

  it('ignores messages without retrievable media', () => {
    expect(describeMedia(undefined)).toBeUndefined();
    expect(describeMedia(new Api.MessageMediaEmpty())).toBeUndefined();
  });
});

// ─── toInboxMessage ─────────────────────────────────────────────────────────

describe('toInboxMessage', () => {
  it('maps a reply in the bot chat', () => {
    const message = new Api.Message({
      id: 31,
      peerId: new Api.PeerUser({ userId: helpers.returnBigInt(BOT_ID) }),
      date: 1_700_000_000,
      message: 'envelope text',
      replyTo: new Api.MessageReplyHeader({ replyToMsgId: 30 }),
    });

    expect(toInboxMessage(message, SELF_ID)).toEqual({
      chatId: BOT_ID,
      messageId: 31,
      text: 'envelope text',
      senderId: undefined,
      replyToMessageId: 30,
      attachment: undefined,
      isSelfChat: false,
    });
  });

  it('flags the saved-messages chat', () => {
    const message = new Api.Message({
      id: 5,
      peerId: new Api.PeerUser({ userId: helpers.returnBigInt(SELF_ID) }),
      date: 1_700_000_000,
      message: '',
      out: true,
      media: documentMedia('application/zip', [new Api.DocumentAttributeFilename({ fileName: 'a.zip' })]),
    });

    const inbox = toInboxMessage(message, SELF_ID);

    expect(inbox.isSelfChat).toBe(true);
    expect(inbox.chatId).toBe(SELF_ID);
    expect(inbox.attachment?.fileName).toBe('a.zip');
  });
});

// ─── isRelayInbound ─────────────────────────────────────────────────────────

describe('isRelayInbound', () => {
  function messageIn(chatId: number, out: boolean): Api.Message {
    return new Api.Message({
      id: 40,
      peerId: new Api.PeerUser({ userId: helpers.returnBigInt(chatId) }),
      date: 1_700_000_000,
      message: '',
      out,
    });
  }

  function accepts(message: Api.Message): boolean {
    return isRelayInbound(toInboxMessage(message, SELF_ID), message.out, BOT_ID);
  }

  it('accepts incoming messages from the frontend bot', () => {
    expect(accepts(messageIn(BOT_ID, false))).toBe(true);
  });

  it('drops messages the account itself sent to the bot', () => {
    expect(accepts(messageIn(BOT_ID, true))).toBe(false);
  });

  it('accepts the saved-messages chat', () => {
    expect(accepts(messageIn(SELF_ID, true))).toBe(true);
  });

  it('drops every other chat', () => {
    expect(accepts(messageIn(1234, false))).toBe(false);
  });
});
