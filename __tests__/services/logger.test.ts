/**
 * Logger Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, LogLevel, createLogger, type LogEntry } from '@/services/logger';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should take its level from LOG_LEVEL', () => {
    expect(createLogger('Test').getLevel()).toBe(LogLevel.SILENT);
  });

  it('should filter by level and share callbacks with children', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const entries: LogEntry[] = [];
    const parent = new Logger('Storyboard', LogLevel.INFO);
    parent.addCallback(entry => entries.push(entry));
    const child = parent.child('Parser');

    parent.debug('hidden');
    child.warn('careful', { scene: 3 });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: LogLevel.WARN,
      context: 'Storyboard:Parser',
      message: 'careful',
      data: { scene: 3 },
    });
    expect(warn).toHaveBeenCalledWith('[Storyboard:Parser]', 'careful', { scene: 3 });
  });

  it('should stop notifying a removed callback', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const seen: string[] = [];
    const callback = (entry: LogEntry) => seen.push(entry.message);
    const log = new Logger('Audit', LogLevel.ERROR, [callback]);

    log.error('first');
    log.removeCallback(callback);
    log.error('second');

    expect(seen).toEqual(['first']);
  });
});
