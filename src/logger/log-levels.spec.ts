import { resolveLogLevels } from './log-levels';

describe('resolveLogLevels', () => {
  it('enables every level up to the threshold', () => {
    expect(resolveLogLevels('debug')).toEqual(['error', 'warn', 'log', 'debug']);
    expect(resolveLogLevels('error')).toEqual(['error']);
    expect(resolveLogLevels(' VERBOSE ')).toEqual([
      'error',
      'warn',
      'log',
      'debug',
      'verbose',
    ]);
  });

  it('defaults to log', () => {
    expect(resolveLogLevels(undefined)).toEqual(['error', 'warn', 'log']);
    expect(resolveLogLevels('trace')).toEqual(['error', 'warn', 'log']);
  });
});
