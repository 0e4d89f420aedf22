import { describe, expect, it } from 'vitest';

import { consoleReporter } from './sink.js';

describe('consoleReporter', () => {
  it('returns what the step body returns', async () => {
    await expect(consoleReporter.step('Load data', async () => 42)).resolves.toBe(42);
  });

  it('rethrows the step body error unchanged', async () => {
    const failure = new Error('boom');
    await expect(
      consoleReporter.step('Explode', async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);
  });

  it('accepts text and binary attachments', async () => {
    await expect(consoleReporter.attach('note', 'hello', 'text/plain')).resolves.toBeUndefined();
    await expect(
      consoleReporter.attach('image', Buffer.from([1, 2, 3]), 'image/png'),
    ).resolves.toBeUndefined();
  });
});
