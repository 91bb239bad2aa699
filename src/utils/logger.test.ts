import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { getErrorLogPath } from './logger';

describe('getErrorLogPath', () => {
  it('puts the error log beside the main log', () => {
    expect(getErrorLogPath(path.join('logs', 'run.log'))).toBe(path.join('logs', 'run-errors.log'));
  });

  it('defaults the extension to .log', () => {
    expect(getErrorLogPath('conversion')).toBe('conversion-errors.log');
  });
});
