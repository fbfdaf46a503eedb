import { generateOAuthState, validateOAuthState } from './state';

describe('OAuth state', () => {
  const secret = 'test-secret';
  const now = 1_700_000_000_000;

  it('accepts a state it signed before expiry', () => {
    const state = generateOAuthState(secret, 600_000, now);

    expect(validateOAuthState(state, secret, now + 600_000)).toBe(true);
  });

  it('issues a different state each time', () => {
    expect(generateOAuthState(secret, 600_000, now)).not.toBe(generateOAuthState(secret, 600_000, now));
  });

  it('rejects an expired state', () => {
    const state = generateOAuthState(secret, 600_000, now);

    expect(validateOAuthState(state, secret, now + 600_001)).toBe(false);
  });

  it('rejects a state signed with another secret', () => {
    const state = generateOAuthState('other-secret', 600_000, now);

    expect(validateOAuthState(state, secret, now)).toBe(false);
  });

  it('rejects a payload whose expiry was extended', () => {
    const decoded = JSON.parse(Buffer.from(generateOAuthState(secret, 600_000, now), 'base64url').toString());
    decoded.payload = JSON.stringify({ ...JSON.parse(decoded.payload), expiresAt: now + 10_000_000 });
    const tampered = Buffer.from(JSON.stringify(decoded)).toString('base64url');

    expect(validateOAuthState(tampered, secret, now + 700_000)).toBe(false);
  });

  it('rejects garbage', () => {
    expect(validateOAuthState('not-a-state', secret, now)).toBe(false);
  });
});
