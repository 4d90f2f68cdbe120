import { logError, logInfo, logWarn } from '@/lib/logger';

describe('logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('prefixes messages and serializes context', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);

    logInfo('Lookup completed', { cacheKey: 'beans__standard' });

    expect(info).toHaveBeenCalledWith('[lookup] Lookup completed', '{"cacheKey":"beans__standard"}');
  });

  it('reduces errors to message and stack', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    logWarn('Persistent cache write failed', new Error('offline'));

    const payload = JSON.parse(String(warn.mock.calls[0][1]));
    expect(payload.message).toBe('offline');
    expect(typeof payload.stack).toBe('string');
  });

  it('leaves out empty context', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    logError('Lookup failed', {}, undefined);

    expect(error).toHaveBeenCalledWith('[lookup] Lookup failed');
  });
});
