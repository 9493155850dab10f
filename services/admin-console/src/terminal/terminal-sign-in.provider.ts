import { Injectable, Logger } from '@nestjs/common';
import type { AuthCookies } from '../auth/auth-cookies';
import type { ISignInProvider } from '../auth/sign-in-provider.interface';
import { TerminalIo } from './terminal-io';

/**
 * Sign-in for a terminal session: the operator signs in with a browser and pastes the FedAuth and
 * rtFa cookie values from its developer tools.
 */
@Injectable()
export class TerminalSignInProvider implements ISignInProvider {
  private readonly logger = new Logger(this.constructor.name);

  public constructor(private readonly io: TerminalIo) {}

  public async signIn(siteUrl: string): Promise<AuthCookies | undefined> {
    const domain = new URL(siteUrl).host;
    this.io.write(`Sign in at ${siteUrl} in your browser, then copy the cookies of ${domain}.`);

    const fedAuth = (await this.io.ask('FedAuth (empty to cancel): ')).trim();
    if (!fedAuth) return undefined;
    const rtFa = (await this.io.ask('rtFa (empty to cancel): ')).trim();
    if (!rtFa) return undefined;
    const userEmail = (await this.io.ask('Signed in as (optional): ')).trim();

    this.logger.log({ msg: 'Captured session cookies', domain });
    return {
      domain,
      fedAuth,
      rtFa,
      userEmail: userEmail || undefined,
      capturedAt: new Date().toISOString(),
    };
  }
}
