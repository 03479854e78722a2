import type { BackendTransport, FrontendTransport, StatusReporter } from './transport.js';
import type { StatusHandle } from './types.js';

/**
 * Edits a status message through whichever identity sent it. Frontend
 * handles live in the user's chat with the bot; backend handles live in the
 * privileged account's own chat (direct submissions).
 *
 * Edit failures are logged and swallowed: a status edit never changes the
 * outcome of a job.
 */
export class RoutedStatusReporter implements StatusReporter {
  constructor(
    private readonly frontend: FrontendTransport,
    private readonly backend: BackendTransport,
  ) {}

  async update(handle: StatusHandle | undefined, text: string): Promise<void> {
    if (!handle) return;

    try {
      if (handle.owner === 'backend') {
        await this.backend.editSelfMessage(handle.messageId, text);
      } else {
        await this.frontend.editMessage(handle.chatId, handle.messageId, text);
      }
    } catch (err) {
      console.warn(
        `[STATUS] Edit of ${handle.owner} message ${handle.chatId}/${handle.messageId} failed:`,
        err instanceof Error ? err.message : String(err),
      );
    }
  }
}
