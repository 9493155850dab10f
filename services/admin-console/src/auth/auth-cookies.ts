import { z } from 'zod';

export const AuthCookiesSchema = z.object({
  domain: z.string().nonempty(),
  fedAuth: z.string(),
  rtFa: z.string(),
  userEmail: z.string().optional(),
  capturedAt: z.iso.datetime(),
  expiresAt: z.iso.datetime().optional(),
});

/**
 * Browser session cookies captured at sign-in. FedAuth and rtFa authorize every SharePoint REST
 * call of the tenant they were issued for.
 */
export type AuthCookies = z.infer<typeof AuthCookiesSchema>;

export function isValidCookies(cookies: Pick<AuthCookies, 'fedAuth' | 'rtFa'>): boolean {
  return cookies.fedAuth.trim().length > 0 && cookies.rtFa.trim().length > 0;
}

export function isExpiredCookies(cookies: Pick<AuthCookies, 'expiresAt'>, now = new Date()): boolean {
  return cookies.expiresAt !== undefined && new Date(cookies.expiresAt).getTime() <= now.getTime();
}

export function toCookieHeader(cookies: Pick<AuthCookies, 'fedAuth' | 'rtFa'>): string {
  return `FedAuth=${cookies.fedAuth}; rtFa=${cookies.rtFa}`;
}
