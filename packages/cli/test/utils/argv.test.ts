import { describe, it, expect } from 'vitest';
import { CliUsageError } from '@sixdegrees/core';
import { assertValidArgv } from '../../source/utils/argv.js';

describe('assertValidArgv', () => {
  it('accepts a dataset with or without -l', () => {
    expect(() => assertValidArgv(['movies.txt'])).not.toThrow();
    expect(() => assertValidArgv(['-l', 'movies.txt'])).not.toThrow();
    expect(() => assertValidArgv(['movies.txt', '--path'])).not.toThrow();
  });

  it('rejects a second dataset', () => {
    expect(() => assertValidArgv(['a.txt', 'b.txt'])).toThrow('Too many files were given.');
  });

  it('rejects a repeated -l', () => {
    expect(() => assertValidArgv(['-l', 'movies.txt', '-l'])).toThrow('Too many optional arguments.');
    expect(() => assertValidArgv(['--path', '-l', 'movies.txt'])).toThrow(CliUsageError);
  });

  it('rejects a missing dataset', () => {
    expect(() => assertValidArgv([])).toThrow('Missing dataset file.');
    expect(() => assertValidArgv(['-l'])).toThrow(CliUsageError);
  });

  it('leaves help and version requests alone', () => {
    expect(() => assertValidArgv(['--help'])).not.toThrow();
    expect(() => assertValidArgv(['-v'])).not.toThrow();
  });
});
