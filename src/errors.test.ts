import { describe, it, expect } from 'vitest';
import { ConfigError, PersistenceFailureError, ProbeTimeoutError, describeError, isSweepError } from './errors';

describe('errors', () => {
  it('lists config issues under the message', () => {
    const error = new ConfigError('Invalid configuration', ['siteUrl: required', 'timeoutMs: too small']);
    expect(error.message).toBe('Invalid configuration:\n  - siteUrl: required\n  - timeoutMs: too small');
    expect(error.code).toBe('ConfigError');
    expect(isSweepError(error)).toBe(true);
  });

  it('names the file a persistence failure could not write', () => {
    const error = new PersistenceFailureError('output/state.json', { cause: new Error('EACCES: permission denied') });
    expect(error.message).toBe('Could not write output/state.json: EACCES: permission denied');
    expect(error.path).toBe('output/state.json');
  });

  it('describes anything thrown on one line', () => {
    expect(describeError(new ProbeTimeoutError('https://shop.example.com/', 500))).toBe(
      'Timed out after 500ms loading https://shop.example.com/'
    );
    expect(describeError(new Error('first\nsecond'))).toBe('first');
    expect(describeError('plain')).toBe('plain');
    expect(isSweepError(new Error('x'))).toBe(false);
  });
});
