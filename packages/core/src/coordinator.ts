/**
 * RelayCoordinator — binds envelopes to forwarded attachments on the
 * backend side.
 *
 * An envelope is only ever matched to the message it replies to. Recency
 * (e.g. "the last media message before this one") is never consulted: two
 * attachments forwarded in the same instant are indistinguishable that way,
 * while each reply link names exactly one message.
 *
 * Dispatch is idempotent. The store's atomic bind lets exactly one envelope
 * per correlation id through. A replayed or redelivered envelope sees
 * `already_bound` and is dropped. While one copy is still resolving its
 * reply link, other copies of the same envelope are dropped too, so a
 * redelivery whose lookup fails cannot fail a job the first copy binds.
 */

import type { CorrelationStore } from './correlation-store.js';
import { decodeEnvelope, isEnvelope, type Envelope } from './envelope.js';
import { toFailure } from './errors.js';
import { statusText } from './lib/status-text.js';
import type { BackendMessage, BackendTransport, StatusReporter } from './transport.js';
import type { InboxMessage, JobFailure } from './types.js';

export interface CoordinatorOptions {
  store: CorrelationStore;
  backend: BackendTransport;
  status: StatusReporter;
  /** Hand a job that reached `fetching` to the worker */
  dispatch: (correlationId: string) => void;
  /** Called when an envelope could not be handled at all */
  onUnexpectedError?: (scope: string, err: unknown) => void;
}

export class RelayCoordinator {
  private readonly store: CorrelationStore;
  private readonly backend: BackendTransport;
  private readonly status: StatusReporter;
  private readonly dispatch: (correlationId: string) => void;
  private readonly onUnexpectedError?: (scope: string, err: unknown) => void;

  /** Correlation ids whose reply link is being looked up */
  private readonly resolving = new Set<string>();

  constructor(options: CoordinatorOptions) {
    this.store = options.store;
    this.backend = options.backend;
    this.status = options.status;
    this.dispatch = options.dispatch;
    this.onUnexpectedError = options.onUnexpectedError;
  }

  /**
   * Handle one inbox message. Anything that is not an envelope is inert.
   * Never rejects.
   */
  async handle(message: InboxMessage): Promise<void> {
    if (!isEnvelope(message.text)) return;

    try {
      await this.handleEnvelope(message);
    } catch (err) {
      console.error(`[COORDINATOR] Failed to handle envelope ${message.chatId}/${message.messageId}:`, err);
      this.onUnexpectedError?.(`envelope ${message.chatId}/${message.messageId}`, err);
    }
  }

  private async handleEnvelope(message: InboxMessage): Promise<void> {
    const decoded = decodeEnvelope(message.text);
    if (!decoded.ok) {
      console.warn(`[COORDINATOR] Malformed envelope ${message.messageId}: ${decoded.reason}`);
      if (decoded.correlationId && !this.resolving.has(decoded.correlationId)) {
        await this.failUnbound(decoded.correlationId, {
          kind: 'resolution',
          message: `malformed envelope (${decoded.reason})`,
        });
      }
      return;
    }

    const { envelope } = decoded;
    const job = this.store.get(envelope.correlationId);
    if (!job) {
      console.warn(`[COORDINATOR] Unknown or expired correlation id ${envelope.correlationId}, ignoring`);
      return;
    }
    if (!matchesJob(envelope, job.originChat, job.statusHandle?.messageId)) {
      console.warn(`[COORDINATOR] Envelope ${envelope.correlationId} does not match its job, ignoring`);
      return;
    }
    if (job.backendReference) {
      console.log(`[COORDINATOR] Envelope ${envelope.correlationId} already bound, skipping`);
      return;
    }
    if (this.resolving.has(envelope.correlationId)) {
      console.log(`[COORDINATOR] Envelope ${envelope.correlationId} is already being resolved, skipping`);
      return;
    }

    this.resolving.add(envelope.correlationId);
    try {
      await this.resolve(envelope, message);
    } finally {
      this.resolving.delete(envelope.correlationId);
    }
  }

  private async resolve(envelope: Envelope, message: InboxMessage): Promise<void> {
    if (message.replyToMessageId === undefined) {
      await this.failUnbound(envelope.correlationId, {
        kind: 'resolution',
        message: 'envelope is not linked to an attachment',
      });
      return;
    }

    let target: BackendMessage | undefined;
    try {
      target = await this.backend.getMessage({
        chatId: message.chatId,
        messageId: message.replyToMessageId,
      });
    } catch (err) {
      await this.failUnbound(envelope.correlationId, toFailure(err));
      return;
    }

    if (!target?.attachment) {
      await this.failUnbound(envelope.correlationId, {
        kind: 'resolution',
        message: 'attachment not found',
      });
      return;
    }

    const bind = this.store.bindBackendReference(envelope.correlationId, target.ref);
    if (bind.status !== 'bound') {
      console.log(`[COORDINATOR] Bind of ${envelope.correlationId} skipped (${bind.status})`);
      return;
    }

    if (!this.store.transition(envelope.correlationId, 'fetching').ok) {
      console.warn(`[COORDINATOR] ${envelope.correlationId} left forward_acked before dispatch`);
      return;
    }

    console.log(
      `[COORDINATOR] ${envelope.correlationId} bound to ${target.ref.chatId}/${target.ref.messageId}, dispatching`,
    );
    this.dispatch(envelope.correlationId);
  }

  /**
   * Fail a job that no envelope has bound yet. A job that another envelope
   * already bound is left to its worker.
   */
  private async failUnbound(correlationId: string, failure: JobFailure): Promise<void> {
    const job = this.store.get(correlationId);
    if (!job || job.backendReference) return;

    if (!this.store.fail(correlationId, failure).ok) return;
    console.warn(`[COORDINATOR] ${correlationId} failed (${failure.kind}): ${failure.message}`);
    await this.status.update(job.statusHandle, statusText.failed(failure));
  }
}

function matchesJob(envelope: Envelope, originChat: number, statusMessageId: number | undefined): boolean {
  if (envelope.originChat !== originChat) return false;
  return statusMessageId === undefined || envelope.statusMessageId === statusMessageId;
}
