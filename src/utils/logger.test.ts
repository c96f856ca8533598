import { Logger, isLogLevel } from './logger.js';

describe('Logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should recognise log level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });

  it('should drop messages below the current level', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = new Logger();
    log.setLevel('warn');

    log.info('[Host]', 'listening');
    log.warn('[Host]', 'peer rejected');

    expect(log.getLevel()).toBe('warn');
    expect(error).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should keep info off stdout', () => {
    const stdout = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = new Logger();
    log.setLevel('info');

    log.info('[Client]', 'received', 12, 'bytes');

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(1);
    const [prefix, ...rest] = stderr.mock.calls[0];
    expect(prefix).toMatch(/^\[\d{2}:\d{2}:\d{2}\] \[Client\]$/);
    expect(rest).toEqual(['received', '12', 'bytes']);
  });

  it('should print error messages rather than objects', () => {
    const stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = new Logger('[logshare]');
    log.setLevel('error');

    log.error('[NAT]', 'failed:', new Error('SSDP timed out'));

    const [prefix, ...rest] = stderr.mock.calls[0];
    expect(prefix).toMatch(/\[logshare\]\[NAT\]$/);
    expect(rest).toEqual(['failed:', 'SSDP timed out']);
  });
});
