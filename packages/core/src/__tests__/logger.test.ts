import { describe, it, expect, vi, afterEach } from 'vitest';
import { logger, setLogLevel, errorFields } from '../observability/logger';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('info');
  });

  it('writes one JSON line to stdout for info', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    logger.info('generated transactions', { requestId: 'req-1', generated: 3 });
    expect(write).toHaveBeenCalledTimes(1);
    const line = String(write.mock.calls[0]?.[0]);
    expect(line.endsWith('\n')).toBe(true);
    const entry = JSON.parse(line);
    expect(entry.level).toBe('info');
    expect(entry.message).toBe('generated transactions');
    expect(entry.requestId).toBe('req-1');
    expect(entry.generated).toBe(3);
  });

  it('writes errors to stderr', () => {
    const out = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const err = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    logger.error('ledger mismatch');
    expect(err).toHaveBeenCalledTimes(1);
    expect(out).not.toHaveBeenCalled();
  });

  it('drops entries below the minimum level', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    setLogLevel('warn');
    logger.info('hidden');
    logger.debug('hidden');
    expect(write).not.toHaveBeenCalled();
  });

  it('flattens errors with codes', () => {
    const err = Object.assign(new Error('boom'), { code: 'LEDGER_CONSISTENCY' });
    const fields = errorFields(err);
    expect(fields?.code).toBe('LEDGER_CONSISTENCY');
    expect(fields?.message).toBe('boom');
    expect(errorFields('plain')).toEqual({ message: 'plain' });
  });
});
