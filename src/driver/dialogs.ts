import * as log from '../utils/logger.js';
import type { DialogHandle } from './types.js';

/** The part of a browser dialog the queue needs. */
export interface QueuedDialog {
  message(): string;
  accept(): Promise<void>;
  dismiss(): Promise<void>;
}

/**
 * Dialogs in the order they opened.
 *
 * An open dialog blocks the page until someone answers it, so whatever a
 * page object has not taken by the next navigation is dismissed there.
 */
export class DialogQueue {
  private readonly pending: QueuedDialog[] = [];

  get size(): number {
    return this.pending.length;
  }

  push(dialog: QueuedDialog): void {
    this.pending.push(dialog);
  }

  take(): DialogHandle | undefined {
    const dialog = this.pending.shift();
    if (!dialog) return undefined;
    return {
      message: dialog.message(),
      accept: () => dialog.accept(),
      dismiss: () => dialog.dismiss(),
    };
  }

  async dismissPending(): Promise<void> {
    for (let dialog = this.pending.shift(); dialog; dialog = this.pending.shift()) {
      log.warn(`Dismissing unhandled dialog: ${dialog.message()}`);
      try {
        await dialog.dismiss();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.warn(`Failed to dismiss dialog: ${message}`);
      }
    }
  }
}
