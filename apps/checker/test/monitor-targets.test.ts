import { describe, expect, it } from 'vitest';

import { validateHttpTarget } from '../src/monitor/targets';

describe('validateHttpTarget', () => {
  it('accepts http and https targets, including private hosts', () => {
    expect(validateHttpTarget('https://example.com/health')).toBeNull();
    expect(validateHttpTarget('http://status.example.com:8080/ping')).toBeNull();
    expect(validateHttpTarget('http://127.0.0.1:3000/')).toBeNull();
    expect(validateHttpTarget('http://localhost/health')).toBeNull();
  });

  it('rejects invalid URLs and unsupported protocols', () => {
    expect(validateHttpTarget('not-a-url')).toBe('target must be a valid URL');
    expect(validateHttpTarget('ftp://example.com')).toBe('target protocol must be http or https');
    expect(validateHttpTarget('https://')).toBe('target must be a valid URL');
  });

  it('rejects invalid ports', () => {
    expect(validateHttpTarget('https://example.com:0/health')).toBe('target port is invalid');
  });
});
