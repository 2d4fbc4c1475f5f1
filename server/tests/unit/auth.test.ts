import { bearerToken, signToken, verifyToken } from '../../src/lib/jwt';
import { guestUser, identify } from '../../src/socket/index';

describe('jwt helpers', () => {
  it('round-trips the identity and drops the registered claims', () => {
    const token = signToken({ id: 'guest:1', username: 'alice' }, '1h', 'test-secret');
    expect(verifyToken(token, 'test-secret')).toEqual({ id: 'guest:1', username: 'alice' });
  });

  it('rejects a token signed with another secret', () => {
    const token = signToken({ id: 'guest:1', username: 'alice' }, '1h', 'test-secret');
    expect(verifyToken(token, 'other-secret')).toBeNull();
  });

  it('rejects garbage', () => {
    expect(verifyToken('not-a-token', 'test-secret')).toBeNull();
  });

  it('reads bearer headers', () => {
    expect(bearerToken('Bearer abc.def')).toBe('abc.def');
    expect(bearerToken('Basic abc')).toBeUndefined();
    expect(bearerToken(undefined)).toBeUndefined();
  });
});

describe('socket identity', () => {
  it('uses the token identity when it verifies', () => {
    const token = signToken({ id: 'guest:42', username: 'bob' });
    expect(identify(token)).toEqual({ id: 'guest:42', username: 'bob' });
  });

  it('has no identity without a valid token', () => {
    expect(identify(undefined)).toBeNull();
    expect(identify('nope')).toBeNull();
  });

  it('derives guest identities from the socket id', () => {
    expect(guestUser('abcdef123')).toEqual({ id: 'guest:abcdef123', username: 'guest_abcd' });
  });
});
