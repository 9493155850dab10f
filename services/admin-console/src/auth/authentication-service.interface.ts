import type { AuthCookies } from './auth-cookies';

export const AUTHENTICATION_SERVICE = Symbol('AUTHENTICATION_SERVICE');

export interface IAuthenticationService {
  /**
   * Cookies for `domain`. A tenant domain falls back to its admin domain and vice versa, since
   * FedAuth/rtFa issued for one of them authorize the other.
   */
  getStoredCookies(domain: string): Promise<AuthCookies | undefined>;
  storeCookies(cookies: AuthCookies): Promise<void>;
  clearCredentials(domain: string): Promise<void>;
  clearAllCredentials(): Promise<void>;
  /** True when valid, unexpired cookies are reachable for `domain`. */
  hasStoredCredentials(domain: string): Promise<boolean>;
  hasAnyStoredCredentials(): Promise<boolean>;
  getStoredDomains(): Promise<string[]>;
}
