import type { AuthCookies } from './auth-cookies';

export const SIGN_IN_PROVIDER = Symbol('SIGN_IN_PROVIDER');

export interface ISignInProvider {
  /** Captures the session cookies of an interactive sign-in at `siteUrl`; undefined when cancelled. */
  signIn(siteUrl: string): Promise<AuthCookies | undefined>;
}
