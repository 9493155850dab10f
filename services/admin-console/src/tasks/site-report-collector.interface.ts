import type { z } from 'zod';
import type { AuthCookies } from '../auth/auth-cookies';
import type { ReportResult, SiteResultBase } from '../reports/report-result';

export interface ReportConfigurationBase {
  connectionId: string;
  targetSiteUrls: string[];
}

export interface SiteCollectionContext<TConfiguration> {
  cookies: AuthCookies;
  siteUrl: string;
  configuration: TConfiguration;
  log: (message: string) => void;
  signal: AbortSignal;
}

/**
 * The report specific part of a task run: how one site turns into one site result.
 */
export interface ISiteReportCollector<
  TConfiguration extends ReportConfigurationBase,
  TSite extends SiteResultBase,
> {
  /** Lowercase, used in execution log lines. */
  readonly reportName: string;
  readonly configurationSchema: z.ZodType<TConfiguration>;
  describeConfiguration: (configuration: TConfiguration) => string[];
  /** Throws when the site as a whole fails. */
  collectSite: (context: SiteCollectionContext<TConfiguration>) => Promise<TSite>;
  failedSite: (siteUrl: string, errorMessage: string) => TSite;
  summarize: (result: ReportResult<TSite>) => string[];
}
