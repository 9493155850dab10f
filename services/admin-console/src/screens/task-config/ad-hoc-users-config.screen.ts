import type { AdHocUsersReportConfiguration } from '../../reports/ad-hoc-users/ad-hoc-users.models';
import { TaskType } from '../../tasks/task-definition';
import { ScreenKey } from '../screen.interface';
import type { TaskConfigDescriptor } from './task-config.state';
import { type TaskConfigDependencies, TaskConfigScreen } from './task-config.screen';

// The report has no options of its own
export type AdHocUsersOptions = Record<string, never>;

export const adHocUsersConfigDescriptor: TaskConfigDescriptor<AdHocUsersOptions> = {
  title: 'New Ad Hoc Users Report',
  taskType: TaskType.AdHocUsersReport,
  defaultNamePrefix: 'Ad Hoc Users Report',
  detailScreen: ScreenKey.AdHocUsersDetail,
  defaultOptions: {},
  optionFields: [],
  buildConfiguration: (connectionId, siteUrls) =>
    ({ connectionId, targetSiteUrls: siteUrls }) satisfies AdHocUsersReportConfiguration,
};

export class AdHocUsersConfigScreen extends TaskConfigScreen<AdHocUsersOptions> {
  public constructor(dependencies: TaskConfigDependencies) {
    super(ScreenKey.AdHocUsersConfig, adHocUsersConfigDescriptor, dependencies);
  }
}
