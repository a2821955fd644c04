import { describe, it, expect } from 'vitest';
import { ValidationError } from '@meshwatch/core';
import { loadClientConfig } from './index.js';

describe('loadClientConfig', () => {
  it('defaults to the local server', () => {
    expect(loadClientConfig({})).toEqual({ serverUrl: 'http://127.0.0.1:8080', maxBackoffMs: 8000 });
  });

  it('reads MESHWATCH_URL and trims trailing slashes', () => {
    expect(loadClientConfig({ MESHWATCH_URL: 'http://meshes.test:9000/' }).serverUrl).toBe('http://meshes.test:9000');
  });

  it('prefers flags over the environment', () => {
    const config = loadClientConfig(
      { MESHWATCH_URL: 'http://meshes.test:9000' },
      { url: 'http://127.0.0.1:9100', backoffMax: 30000 }
    );
    expect(config).toEqual({ serverUrl: 'http://127.0.0.1:9100', maxBackoffMs: 30000 });
  });

  it('rejects malformed URLs', () => {
    expect(() => loadClientConfig({ MESHWATCH_URL: 'not a url' })).toThrow(ValidationError);
    expect(() => loadClientConfig({}, { url: 'nope' })).toThrow('Validation failed for url: not a valid URL: nope');
  });
});
