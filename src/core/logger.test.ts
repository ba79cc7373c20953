// Tests for Logger

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, LogLevel, logger } from './logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    Logger.configure({});
  });

  it('should print prefix, level, message and context on one line', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    new Logger().info('History cleanup', { removedByGroup: 1 });

    expect(info).toHaveBeenCalledWith('[retention] [INFO] History cleanup {"removedByGroup":1}');
  });

  it('should omit an empty context and an unset prefix', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    new Logger({ prefix: undefined }).warn('Sweep skipped file', {});

    expect(warn).toHaveBeenCalledWith('[WARN] Sweep skipped file');
  });

  it('should drop messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const quiet = new Logger({ level: LogLevel.WARN });
    quiet.debug('hidden');
    quiet.info('hidden');
    quiet.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should reconfigure the shared instance in place', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    Logger.configure({ level: LogLevel.DEBUG });
    logger.debug('Opened store');

    expect(Logger.getInstance()).toBe(logger);
    expect(debug).toHaveBeenCalledWith('[retention] [DEBUG] Opened store');
  });
});
