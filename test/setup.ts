import { afterEach, vi } from 'vitest';

// Keep pipeline log lines out of test output unless a test opts in.
process.env.LOG_LEVEL ??= 'silent';

afterEach(() => {
  vi.restoreAllMocks();
});
