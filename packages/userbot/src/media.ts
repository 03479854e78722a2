import { Api, utils } from 'telegram';
import type { AttachmentDescriptor, InboxMessage } from '@filerelay/core';

const STATIC_STICKER_MIME = 'image/webp';

// ─── Media → attachment ─────────────────────────────────────────────────────

function describeDocument(doc: Api.Document): AttachmentDescriptor | undefined {
  let fileName: string | undefined;
  let video: Api.DocumentAttributeVideo | undefined;
  let audio: Api.DocumentAttributeAudio | undefined;
  let sticker = false;
  let animated = false;

  for (const attr of doc.attributes) {
    if (attr instanceof Api.DocumentAttributeFilename) fileName = attr.fileName;
    else if (attr instanceof Api.DocumentAttributeVideo) video = attr;
    else if (attr instanceof Api.DocumentAttributeAudio) audio = attr;
    else if (attr instanceof Api.DocumentAttributeSticker) sticker = true;
    else if (attr instanceof Api.DocumentAttributeAnimated) animated = true;
  }

  const base = {
    fileName,
    size: doc.size.toJSNumber(),
    mimeType: doc.mimeType,
    fileUniqueId: doc.id.toString(),
  };

  if (sticker) {
    // .tgs and .webm stickers have no static form to relay
    return doc.mimeType === STATIC_STICKER_MIME ? { kind: 'sticker', ...base } : undefined;
  }
  if (video?.roundMessage) return undefined;
  if (video && !animated) return { kind: 'video', ...base };
  if (audio) return { kind: audio.voice ? 'voice' : 'audio', ...base };
  return { kind: 'document', ...base };
}

function largestPhotoSize(photo: Api.Photo): number | undefined {
  let largest: number | undefined;
  for (const size of photo.sizes) {
    let bytes: number | undefined;
    if (size instanceof Api.PhotoSize) bytes = size.size;
    else if (size instanceof Api.PhotoSizeProgressive) bytes = Math.max(...size.sizes);
    if (bytes !== undefined && (largest === undefined || bytes > largest)) largest = bytes;
  }
  return largest;
}

/**
 * Describe the retrievable media of a message, or undefined when there is
 * none the relay can handle (web pages, polls, animated stickers, round videos).
 */
export function describeMedia(media: Api.TypeMessageMedia | undefined): AttachmentDescriptor | undefined {
  if (media instanceof Api.MessageMediaDocument && media.document instanceof Api.Document) {
    return describeDocument(media.document);
  }
  if (media instanceof Api.MessageMediaPhoto && media.photo instanceof Api.Photo) {
    return {
      kind: 'photo',
      size: largestPhotoSize(media.photo),
      mimeType: 'image/jpeg',
      fileUniqueId: media.photo.id.toString(),
    };
  }
  return undefined;
}

// ─── Message → inbox message ────────────────────────────────────────────────

export function peerToChatId(peer: Api.TypePeer): number {
  return Number(utils.getPeerId(peer));
}

export function toInboxMessage(message: Api.Message, selfId: number): InboxMessage {
  const peer = message.peerId;
  const replyTo =
    message.replyTo instanceof Api.MessageReplyHeader ? message.replyTo.replyToMsgId : undefined;

  return {
    chatId: peerToChatId(peer),
    messageId: message.id,
    text: message.message,
    senderId: message.fromId ? peerToChatId(message.fromId) : undefined,
    replyToMessageId: replyTo,
    attachment: describeMedia(message.media),
    isSelfChat: peer instanceof Api.PeerUser && peer.userId.toJSNumber() === selfId,
  };
}

/**
 * Only two chats feed the relay: incoming messages from the frontend bot
 * (forwards and envelopes) and the account's own saved messages.
 */
export function isRelayInbound(inbox: InboxMessage, out: boolean | undefined, frontendBotId: number): boolean {
  if (inbox.isSelfChat) return true;
  return inbox.chatId === frontendBotId && !out;
}
