import { Injectable } from '@nestjs/common';
import { AD_HOC_GUEST_LOGIN_MARKER } from '../../constants/defaults.constants';
import { SharepointApiService } from '../../sharepoint-api/sharepoint-api.service';
import type {
  ISiteReportCollector,
  SiteCollectionContext,
} from '../../tasks/site-report-collector.interface';
import type { ReportResult } from '../report-result';
import {
  type AdHocUserItem,
  type AdHocUsersReportConfiguration,
  AdHocUsersReportConfigurationSchema,
  describePrincipalType,
  type SiteAdHocUsersResult,
  totalGuestUsers,
} from './ad-hoc-users.models';

@Injectable()
export class AdHocUsersCollector
  implements ISiteReportCollector<AdHocUsersReportConfiguration, SiteAdHocUsersResult>
{
  public readonly reportName = 'ad hoc users report';
  public readonly configurationSchema = AdHocUsersReportConfigurationSchema;

  public constructor(private readonly sharepointApi: SharepointApiService) {}

  public describeConfiguration(): string[] {
    return [];
  }

  public async collectSite({
    cookies,
    siteUrl,
    log,
    signal,
  }: SiteCollectionContext<AdHocUsersReportConfiguration>): Promise<SiteAdHocUsersResult> {
    const { Title: siteTitle } = await this.sharepointApi.getSiteInfo(cookies, siteUrl, signal);
    const siteUsers = await this.sharepointApi.getSiteUsers(
      cookies,
      siteUrl,
      AD_HOC_GUEST_LOGIN_MARKER,
      signal,
    );

    const users = siteUsers.map(
      (user): AdHocUserItem => ({
        siteUrl,
        siteTitle,
        loginName: user.LoginName,
        title: user.Title,
        email: user.Email ?? '',
        id: user.Id,
        isSiteAdmin: user.IsSiteAdmin,
        principalType: describePrincipalType(user.PrincipalType),
      }),
    );
    log(`  Found ${users.length} guest users`);

    return { siteUrl, siteTitle, success: true, users };
  }

  public failedSite(siteUrl: string, errorMessage: string): SiteAdHocUsersResult {
    return { siteUrl, siteTitle: '', success: false, errorMessage, users: [] };
  }

  public summarize(result: ReportResult<SiteAdHocUsersResult>): string[] {
    return [
      `Task completed. Sites: ${result.successfulSites} successful, ${result.failedSites} failed`,
      `Total: ${totalGuestUsers(result)} guest users`,
    ];
  }
}
