/**
 * Tests for credential selection
 */

import { MissingCredentialsError, TokenProvider } from '../src/infrastructure/http/TokenProvider.js';

describe('TokenProvider', () => {
  const noFile = () => null;

  it('should prefer the container session token', () => {
    const provider = new TokenProvider(
      { sessionTokenPath: '/token', oauthToken: 'test-oauth', pat: 'test-pat' },
      () => 'test-session\n'
    );
    expect(provider.getToken()).toEqual({ token: 'test-session', tokenType: 'OAUTH', source: 'session' });
  });

  it('should use the OAuth token before the PAT', () => {
    const provider = new TokenProvider({ sessionTokenPath: '/token', oauthToken: 'test-oauth', pat: 'test-pat' }, noFile);
    expect(provider.getToken()).toEqual({ token: 'test-oauth', tokenType: 'OAUTH', source: 'oauth' });
  });

  it('should fall back to the programmatic access token', () => {
    const provider = new TokenProvider({ sessionTokenPath: '/token', pat: 'test-pat' }, () => '   ');
    expect(provider.getToken()).toEqual({
      token: 'test-pat',
      tokenType: 'PROGRAMMATIC_ACCESS_TOKEN',
      source: 'pat',
    });
  });

  it('should report missing credentials', () => {
    const provider = new TokenProvider({ sessionTokenPath: '/token' }, noFile);
    expect(() => provider.getToken()).toThrow(MissingCredentialsError);
    expect(provider.hasCredentials()).toBe(false);
  });
});
