import { describe, expect, it, vi } from 'vitest';

import { DialogQueue } from './dialogs.js';
import type { QueuedDialog } from './dialogs.js';

function dialog(message: string): QueuedDialog & { answers: string[] } {
  const answers: string[] = [];
  return {
    answers,
    message: () => message,
    accept: async () => {
      answers.push('accept');
    },
    dismiss: async () => {
      answers.push('dismiss');
    },
  };
}

describe('DialogQueue', () => {
  it('hands out dialogs oldest first', async () => {
    const queue = new DialogQueue();
    const first = dialog('Saved');
    queue.push(first);
    queue.push(dialog('Are you sure?'));

    const handle = queue.take();
    expect(handle?.message).toBe('Saved');
    await handle?.accept();

    expect(first.answers).toEqual(['accept']);
    expect(queue.take()?.message).toBe('Are you sure?');
    expect(queue.take()).toBeUndefined();
  });

  it('dismisses every dialog nobody took', async () => {
    const queue = new DialogQueue();
    const stray = dialog('Leftover');
    const another = dialog('Another');
    queue.push(stray);
    queue.push(another);

    await queue.dismissPending();

    expect(stray.answers).toEqual(['dismiss']);
    expect(another.answers).toEqual(['dismiss']);
    expect(queue.size).toBe(0);
  });

  it('keeps dismissing when one dialog is already gone', async () => {
    const queue = new DialogQueue();
    const gone = dialog('Closed elsewhere');
    gone.dismiss = vi.fn(async () => {
      throw new Error('Dialog already handled');
    });
    const next = dialog('Still open');
    queue.push(gone);
    queue.push(next);

    await expect(queue.dismissPending()).resolves.toBeUndefined();
    expect(next.answers).toEqual(['dismiss']);
    expect(queue.size).toBe(0);
  });
});
