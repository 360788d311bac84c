/**
 * Authentication Models
 *
 * Contracts for supplying session credentials to the HTTP layer. The
 * providers and services never know how credentials were obtained.
 */

/**
 * HTTP authentication material applied to outgoing requests
 */
export interface AuthCredentials {
  headers: Record<string, string>;
  cookies: Record<string, string>;
}

/**
 * Where the active credentials were resolved from
 */
export enum CredentialSource {
  CONSTRUCTOR = 'constructor arguments',
  ENVIRONMENT = 'environment variables',
  CREDENTIALS_FILE = 'credentials file',
  NONE = 'none',
}

/**
 * Credentials together with where they came from
 */
export interface ResolvedCredentials {
  credentials: AuthCredentials;
  source: CredentialSource;
}

/**
 * Authentication strategy
 *
 * `isAuthenticated` and `resolveCredentials` must never throw;
 * `getCredentials` throws AuthenticationRequiredError when nothing can be
 * resolved. `resolveCredentials` does a single resolution pass.
 */
export interface AuthProvider {
  resolveCredentials(): ResolvedCredentials | null;
  getCredentials(): AuthCredentials;
  isAuthenticated(): boolean;
  credentialSource(): CredentialSource;
}

/**
 * Cookie credentials as stored in credentials.json
 */
export interface StoredCredentials {
  access_token?: string;
  phpsessid?: string;
}
