// ─── Attachments ────────────────────────────────────────────────────────────

export type AttachmentKind =
  | 'document'
  | 'video'
  | 'audio'
  | 'photo'
  | 'voice'
  | 'sticker';

export interface AttachmentDescriptor {
  kind: AttachmentKind;
  /** Name declared by the sender, when the platform carries one */
  fileName?: string;
  /** Approximate size in bytes as reported by the platform */
  size?: number;
  mimeType?: string;
  /** Platform file id (Bot API `file_id`) */
  fileId?: string;
  /** Stable platform file id, used to synthesize a name when none is declared */
  fileUniqueId?: string;
}

// ─── Job state ──────────────────────────────────────────────────────────────

export type JobState =
  | 'created'
  | 'forward_requested'
  | 'forward_acked'
  | 'fetching'
  | 'uploading'
  | 'completed'
  | 'failed';

/** Forward-only ordering of the non-failure states */
export const JOB_STATE_ORDER: readonly JobState[] = [
  'created',
  'forward_requested',
  'forward_acked',
  'fetching',
  'uploading',
  'completed',
];

export function isTerminal(state: JobState): boolean {
  return state === 'completed' || state === 'failed';
}

// ─── Failures ───────────────────────────────────────────────────────────────

export type FailureKind =
  | 'input_rejected'
  | 'transport'
  | 'resolution'
  | 'expired'
  | 'rate_limited'
  | 'upstream_store'
  | 'timeout'
  | 'unexpected';

export interface JobFailure {
  kind: FailureKind;
  message: string;
}

// ─── Handles & references ───────────────────────────────────────────────────

/** Which identity sent (and therefore can edit) a status message */
export type StatusOwner = 'frontend' | 'backend';

export interface StatusHandle {
  chatId: number;
  messageId: number;
  owner: StatusOwner;
}

/** Location of the forwarded copy inside the backend identity's inbox */
export interface BackendReference {
  chatId: number;
  messageId: number;
}

// ─── Upload result ──────────────────────────────────────────────────────────

export interface UploadResult {
  link: string;
  /** Management token issued by the store, if any */
  token?: string;
  fileName: string;
}

// ─── Job ────────────────────────────────────────────────────────────────────

export interface Job {
  correlationId: string;
  originChat: number;
  statusHandle?: StatusHandle;
  attachment: AttachmentDescriptor;
  backendReference?: BackendReference;
  state: JobState;
  attemptCount: number;
  createdAt: number;
  lastUpdateAt: number;
  failure?: JobFailure;
  result?: UploadResult;
}

// ─── Backend inbox message (platform-agnostic) ──────────────────────────────

export interface InboxMessage {
  chatId: number;
  messageId: number;
  text: string;
  senderId?: number;
  /** Id of the message this one replies to, when it is a reply */
  replyToMessageId?: number;
  /** Present when the message carries retrievable media */
  attachment?: AttachmentDescriptor;
  /** True for the backend identity's own "Saved Messages" chat */
  isSelfChat: boolean;
}
