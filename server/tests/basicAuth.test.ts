import { describe, expect, it } from 'vitest';
import { parseBasicAuth, safeEqual } from '../middleware/basicAuth.js';

const encode = (value: string) => `Basic ${Buffer.from(value, 'utf8').toString('base64')}`;

describe('parseBasicAuth', () => {
  it('should split on the first colon only', () => {
    expect(parseBasicAuth(encode('admin:test:secret'))).toEqual({ username: 'admin', password: 'test:secret' });
  });

  it('should reject other schemes and malformed credentials', () => {
    expect(parseBasicAuth(undefined)).toBeNull();
    expect(parseBasicAuth('Bearer test-token')).toBeNull();
    expect(parseBasicAuth(encode('no-colon'))).toBeNull();
  });
});

describe('safeEqual', () => {
  it('should compare regardless of length', () => {
    expect(safeEqual('test-secret', 'test-secret')).toBe(true);
    expect(safeEqual('test-secret', 'test-secret-longer')).toBe(false);
    expect(safeEqual('', 'x')).toBe(false);
  });
});
