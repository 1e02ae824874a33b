import { afterEach, describe, expect, it, vi } from 'vitest';
import { logger } from '../../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes scoped errors to stderr with flattened error metadata', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    logger.child('pipeline').child('writer').error('Turn failed', { err: new Error('overloaded') });

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0]?.[0])).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[ERROR\] \[pipeline:writer\] Turn failed {"err":{"name":"Error","message":"overloaded"}}\n$/,
    );
  });

  it('drops messages below the configured level', () => {
    const out = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    logger.info('not shown');
    logger.warn('not shown either');
    expect(out).not.toHaveBeenCalled();
  });
});
