import type {
  AttachmentDescriptor,
  BackendReference,
  InboxMessage,
  StatusHandle,
  UploadResult,
} from './types.js';

// ─── Frontend identity (public bot) ─────────────────────────────────────────

export interface SentMessageRef {
  chatId: number;
  messageId: number;
}

export interface FrontendTransport {
  /** Send a text message; optionally as a reply to `replyTo` */
  sendMessage(chatId: number, text: string, replyTo?: number): Promise<SentMessageRef>;

  /** Edit a text message previously sent by this identity */
  editMessage(chatId: number, messageId: number, text: string): Promise<void>;

  /**
   * Forward a message, keeping the platform back-reference that lets the
   * recipient fetch the original bytes from the forwarded copy.
   */
  forwardMessage(toChatId: number, fromChatId: number, messageId: number): Promise<SentMessageRef>;
}

// ─── Backend identity (privileged account) ──────────────────────────────────

export interface BackendMessage {
  ref: BackendReference;
  text: string;
  attachment?: AttachmentDescriptor;
}

export interface BackendTransport {
  /** Read one message of the inbox by id; undefined when it no longer exists */
  getMessage(ref: BackendReference): Promise<BackendMessage | undefined>;

  /**
   * Download the attachment of `ref` to `destination`.
   * Resolves with the number of bytes written.
   */
  downloadAttachment(ref: BackendReference, destination: string): Promise<number>;

  /** Send a status message into the backend identity's own chat */
  sendSelfMessage(text: string): Promise<SentMessageRef>;

  /** Edit a message in the backend identity's own chat */
  editSelfMessage(messageId: number, text: string): Promise<void>;
}

// ─── Content store ──────────────────────────────────────────────────────────

export interface ContentStore {
  upload(filePath: string, fileName: string): Promise<UploadResult>;
}

// ─── Status reporting ───────────────────────────────────────────────────────

export interface StatusReporter {
  /** Best-effort edit of a status message; never throws */
  update(handle: StatusHandle | undefined, text: string): Promise<void>;
}

/** Listener for inbound backend inbox traffic */
export type InboxHandler = (message: InboxMessage) => Promise<void>;
