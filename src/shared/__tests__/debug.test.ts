import { describe, it, expect, vi, afterEach } from 'vitest';

import { createLogger, noopLogger } from '../debug.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes warnings to stderr with category and data', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    createLogger('pool').warn('Closing source failed', { error: 'gone' });

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0][0])).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[LENGTH-GATE:pool\] WARN Closing source failed \{"error":"gone"\}\n$/,
    );
  });

  it('omits the data block when there is none', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    createLogger('http').error('Fatal');

    expect(String(write.mock.calls[0][0])).toMatch(/\] \[LENGTH-GATE:http\] ERROR Fatal\n$/);
  });

  it('noopLogger writes nothing', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    noopLogger.error('ignored');
    expect(write).not.toHaveBeenCalled();
  });
});
