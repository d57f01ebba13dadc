import fs from 'fs';

export type TokenType = 'OAUTH' | 'PROGRAMMATIC_ACCESS_TOKEN';

export type TokenSource = 'session' | 'oauth' | 'pat';

export interface AccessToken {
  token: string;
  tokenType: TokenType;
  source: TokenSource;
}

export interface TokenProviderOptions {
  /** Token file mounted into Snowpark Container Services */
  sessionTokenPath: string;
  oauthToken?: string;
  pat?: string;
}

export class MissingCredentialsError extends Error {
  constructor() {
    super('No Snowflake credentials available: set SNOWFLAKE_PAT or SNOWFLAKE_OAUTH_TOKEN');
    this.name = 'MissingCredentialsError';
  }
}

/**
 * Picks the bearer token for Cortex REST calls.
 * Priority: container session token, OAuth token, programmatic access token.
 */
export class TokenProvider {
  constructor(
    private options: TokenProviderOptions,
    private readFile: (path: string) => string | null = readTokenFile
  ) {}

  getToken(): AccessToken {
    // Re-read on every call; the container rotates the file
    const sessionToken = this.readFile(this.options.sessionTokenPath)?.trim();
    if (sessionToken) {
      return { token: sessionToken, tokenType: 'OAUTH', source: 'session' };
    }
    if (this.options.oauthToken) {
      return { token: this.options.oauthToken, tokenType: 'OAUTH', source: 'oauth' };
    }
    if (this.options.pat) {
      return { token: this.options.pat, tokenType: 'PROGRAMMATIC_ACCESS_TOKEN', source: 'pat' };
    }
    throw new MissingCredentialsError();
  }

  hasCredentials(): boolean {
    try {
      this.getToken();
      return true;
    } catch (error) {
      if (error instanceof MissingCredentialsError) {
        return false;
      }
      throw error;
    }
  }
}

function readTokenFile(path: string): string | null {
  if (!fs.existsSync(path)) {
    return null;
  }
  return fs.readFileSync(path, 'utf-8');
}
