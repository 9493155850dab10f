import { z } from 'zod';
import { type ReportResult, reportResultSchema, SiteResultBaseSchema } from '../report-result';

export const AdHocUsersReportConfigurationSchema = z.object({
  connectionId: z.string().prefault(''),
  targetSiteUrls: z.array(z.string()).prefault([]),
});

export type AdHocUsersReportConfiguration = z.infer<typeof AdHocUsersReportConfigurationSchema>;

export const AdHocUserItemSchema = z.object({
  siteUrl: z.string(),
  siteTitle: z.string(),
  loginName: z.string(),
  title: z.string(),
  email: z.string(),
  id: z.number().int(),
  isSiteAdmin: z.boolean(),
  principalType: z.string(),
});

export type AdHocUserItem = z.infer<typeof AdHocUserItemSchema>;

export const SiteAdHocUsersResultSchema = SiteResultBaseSchema.extend({
  users: z.array(AdHocUserItemSchema),
});

export type SiteAdHocUsersResult = z.infer<typeof SiteAdHocUsersResultSchema>;

export const AdHocUsersReportResultSchema = reportResultSchema(SiteAdHocUsersResultSchema);

export type AdHocUsersReportResult = ReportResult<SiteAdHocUsersResult>;

export function guestCount(site: SiteAdHocUsersResult): number {
  return site.users.length;
}

export function getAllUsers(result: AdHocUsersReportResult): AdHocUserItem[] {
  return result.siteResults.flatMap((site) => site.users);
}

export function totalGuestUsers(result: AdHocUsersReportResult): number {
  return result.siteResults.reduce((sum, site) => sum + guestCount(site), 0);
}

const PRINCIPAL_TYPES: Record<number, string> = {
  1: 'User',
  2: 'DistributionList',
  4: 'SecurityGroup',
  8: 'SharePointGroup',
};

export function describePrincipalType(principalType: number): string {
  return PRINCIPAL_TYPES[principalType] ?? String(principalType);
}
