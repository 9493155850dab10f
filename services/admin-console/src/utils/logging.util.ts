import { LogsDiagnosticDataPolicy, smear, smearSiteUrl } from '@spo-admin/utils';
import type { ConfigService } from '@nestjs/config';
import type { Config } from '../config';

export function shouldConcealLogs(configService: ConfigService<Config, true>): boolean {
  return (
    configService.get('app.logsDiagnosticsDataPolicy', { infer: true }) ===
    LogsDiagnosticDataPolicy.CONCEAL
  );
}

export function createSiteUrlLogger(configService: ConfigService<Config, true>) {
  const conceal = shouldConcealLogs(configService);
  return (siteUrl: string) => smearSiteUrl(siteUrl, conceal);
}

const MANAGED_PATH_SITE_NAME_REGEX = /\/(sites|teams)\/([^/?]+)/gi;

/**
 * `/sites/finance/_api/web` → `/sites/***ance/_api/web`
 */
export function concealSitePath(path: string | undefined): string {
  if (!path) return 'unknown';
  return path.replace(
    MANAGED_PATH_SITE_NAME_REGEX,
    (_, managedPath: string, siteName: string) => `/${managedPath}/${smear(siteName)}`,
  );
}
