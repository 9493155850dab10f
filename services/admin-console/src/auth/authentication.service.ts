import { Injectable, Logger } from '@nestjs/common';
import { type AuthCookies, isExpiredCookies, isValidCookies } from './auth-cookies';
import type { IAuthenticationService } from './authentication-service.interface';
import { CookieStore } from './cookie.store';

const TENANT_SUFFIX = '.sharepoint.com';
const ADMIN_SUFFIX = '-admin.sharepoint.com';

export function fallbackDomainFor(domain: string): string | undefined {
  const normalized = domain.toLowerCase();
  if (normalized.endsWith(ADMIN_SUFFIX)) {
    return `${normalized.slice(0, -ADMIN_SUFFIX.length)}${TENANT_SUFFIX}`;
  }
  if (normalized.endsWith(TENANT_SUFFIX)) {
    return `${normalized.slice(0, -TENANT_SUFFIX.length)}${ADMIN_SUFFIX}`;
  }
  return undefined;
}

@Injectable()
export class AuthenticationService implements IAuthenticationService {
  private readonly logger = new Logger(this.constructor.name);

  public constructor(private readonly cookieStore: CookieStore) {}

  public async getStoredCookies(domain: string): Promise<AuthCookies | undefined> {
    const exact = await this.cookieStore.load(domain);
    if (exact) return exact;

    const fallbackDomain = fallbackDomainFor(domain);
    if (!fallbackDomain) return undefined;

    const fallback = await this.cookieStore.load(fallbackDomain);
    if (fallback) {
      this.logger.debug({ msg: 'Using cookies of a sibling domain', domain, fallbackDomain });
    }
    return fallback;
  }

  public async storeCookies(cookies: AuthCookies): Promise<void> {
    await this.cookieStore.save(cookies);
    this.logger.log({ msg: 'Stored session cookies', domain: cookies.domain });
  }

  public async clearCredentials(domain: string): Promise<void> {
    await this.cookieStore.remove(domain);
  }

  public async clearAllCredentials(): Promise<void> {
    await this.cookieStore.removeAll();
  }

  public async hasStoredCredentials(domain: string): Promise<boolean> {
    const cookies = await this.getStoredCookies(domain);
    return cookies !== undefined && isValidCookies(cookies) && !isExpiredCookies(cookies);
  }

  public async hasAnyStoredCredentials(): Promise<boolean> {
    return (await this.getStoredDomains()).length > 0;
  }

  public async getStoredDomains(): Promise<string[]> {
    const all = await this.cookieStore.loadAll();
    return all.map((cookies) => cookies.domain).sort();
  }
}
