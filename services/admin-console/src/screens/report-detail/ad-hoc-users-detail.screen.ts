import {
  type AdHocUserItem,
  type AdHocUsersReportResult,
  getAllUsers,
  guestCount,
  totalGuestUsers,
} from '../../reports/ad-hoc-users/ad-hoc-users.models';
import { ScreenKey } from '../screen.interface';
import { yesNo } from '../screen-view';
import type { ReportDescriptor } from './report-descriptor';
import { type ReportDetailDependencies, ReportDetailScreen } from './report-detail.screen';

export const adHocUsersReportDescriptor: ReportDescriptor<AdHocUsersReportResult, AdHocUserItem> = {
  title: 'Ad Hoc Users Report',
  exportName: 'AdHocUsers',
  itemsTitle: 'Guest Users',
  itemColumns: ['Site', 'Login Name', 'Display Name', 'Email', 'Site Admin', 'Type'],
  siteColumns: ['Site URL', 'Title', 'Guests', 'Status', 'Error'],

  loadLatest: (taskService, taskId) => taskService.getLatestAdHocUsersReportResult(taskId),
  execute: (taskService, task, authService, onProgress, signal) =>
    taskService.executeAdHocUsersReport(task, authService, onProgress, signal),
  exportItems: (exporter, result, filePath) => exporter.exportAdHocUsersReport(result, filePath),
  exportSummary: (exporter, result, filePath) =>
    exporter.exportAdHocUsersReportSummary(result, filePath),

  items: getAllUsers,
  itemSiteUrl: (user) => user.siteUrl,
  matchesSearch: (user, needle) =>
    [user.loginName, user.title, user.email].some((value) => value.toLowerCase().includes(needle)),
  itemRow: (user) => [
    user.siteUrl,
    user.loginName,
    user.title,
    user.email,
    yesNo(user.isSiteAdmin),
    user.principalType,
  ],
  siteRows: (result) =>
    result.siteResults.map((site) => [
      site.siteUrl,
      site.siteTitle,
      String(guestCount(site)),
      site.success ? 'Success' : 'Failed',
      site.errorMessage ?? '',
    ]),
  filterStatus: (shown, result) =>
    `Showing ${shown} of ${totalGuestUsers(result)} guest users across ${result.successfulSites} sites`,
  completedStatus: (result) =>
    `Task completed. ${totalGuestUsers(result)} guest users found across ${result.successfulSites} sites.`,
};

export class AdHocUsersDetailScreen extends ReportDetailScreen<AdHocUsersReportResult, AdHocUserItem> {
  public constructor(dependencies: ReportDetailDependencies) {
    super(ScreenKey.AdHocUsersDetail, adHocUsersReportDescriptor, dependencies);
  }
}
