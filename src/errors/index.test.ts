import { describe, it, expect } from 'vitest';

import { JsonDataMissingError, ProcessingError, join_path, to_issue } from './index';

describe('errors', () => {
  it('carries code, path and class name', () => {
    const err = new ProcessingError('/a', 'bad');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ProcessingError');
    expect(err.code).toBe('PROCESSING_ERROR');
    expect(err.path).toBe('/a');
  });

  it('converts errors to issues', () => {
    expect(to_issue(new JsonDataMissingError('/id', 'missing'))).toEqual({
      code: 'JSON_DATA_MISSING',
      path: '/id',
      message: 'missing',
    });
    expect(to_issue(new ProcessingError('', 'top'))).toEqual({ code: 'PROCESSING_ERROR', path: '/', message: 'top' });
    expect(to_issue(new RangeError('boom'))).toEqual({ code: 'UNEXPECTED_ERROR', path: '/', message: 'boom' });
    expect(to_issue('plain')).toEqual({ code: 'UNEXPECTED_ERROR', path: '/', message: 'plain' });
  });

  it('escapes pointer segments', () => {
    expect(join_path('', 'a')).toBe('/a');
    expect(join_path('/a', 0)).toBe('/a/0');
    expect(join_path('/a', 'b/c~d')).toBe('/a/b~1c~0d');
  });
});
