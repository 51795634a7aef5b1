import { describe, it, expect, vi } from 'vitest';

import { create_logger, parse_log_level } from './logger.util';

function fake_sink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('parse_log_level', () => {
  it('accepts known levels case-insensitively', () => {
    expect(parse_log_level('DEBUG')).toBe('debug');
    expect(parse_log_level(' warn ')).toBe('warn');
  });

  it('falls back to info', () => {
    expect(parse_log_level(undefined)).toBe('info');
    expect(parse_log_level('verbose')).toBe('info');
  });
});

describe('create_logger', () => {
  it('drops messages below the level', () => {
    const sink = fake_sink();
    const log = create_logger('warn', sink);

    log.debug('d');
    log.info('i');
    log.warn('w');
    log.error('e', { code: 1 });

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith('w');
    expect(sink.error).toHaveBeenCalledWith('e', { code: 1 });
  });

  it('passes everything through at debug', () => {
    const sink = fake_sink();
    create_logger('debug', sink).debug('trace');
    expect(sink.debug).toHaveBeenCalledWith('trace');
  });
});
