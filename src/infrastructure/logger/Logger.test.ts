import { describe, it, expect, vi, afterEach } from 'vitest';
import { errorMessage, Logger } from './Logger';

describe('Logger', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('prefixes messages with timestamp and level and appends metadata', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-10T12:00:00.000Z'));
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    Logger.info('Habit created', { habitId: 3 });

    expect(log).toHaveBeenCalledWith('[2024-03-10T12:00:00.000Z] [INFO] Habit created {"habitId":3}');
  });

  it('writes errors to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    Logger.error('Boom');

    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toMatch(/\[ERROR\] Boom$/);
  });

  it('describes unknown errors', () => {
    expect(errorMessage(new Error('disk full'))).toBe('disk full');
    expect(errorMessage('nope')).toBe('Unknown error');
  });
});
