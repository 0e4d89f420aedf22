import { beforeEach, vi } from 'vitest';

// Keep the harness logger out of the test output.
beforeEach(() => {
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
});
