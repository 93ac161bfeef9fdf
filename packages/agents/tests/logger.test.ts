import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, getLogLevel, setLogLevel } from '../utils/logger.js';

afterEach(() => {
  setLogLevel('warn');
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('writes scoped lines to stderr with JSON data', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createLogger('Retrieval').warn('slow query', { ms: 120 });
    expect(spy).toHaveBeenCalledWith('[Retrieval:WARN] slow query', '{"ms":120}');
  });

  it('drops messages below the threshold', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = createLogger('Test');

    log.info('hidden');
    setLogLevel('debug');
    log.debug('shown');

    expect(getLogLevel()).toBe('debug');
    expect(spy.mock.calls).toEqual([['[Test:DEBUG] shown']]);
  });

  it('trace always writes at info', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('error');
    createLogger('Orchestrator').trace('classified');
    expect(spy).toHaveBeenCalledWith('[Orchestrator:INFO] classified');
  });
});
