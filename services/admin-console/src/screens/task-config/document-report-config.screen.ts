import type { DocumentReportConfiguration } from '../../reports/document-report/document-report.models';
import { TaskType } from '../../tasks/task-definition';
import { ScreenKey } from '../screen.interface';
import type { TaskConfigDescriptor } from './task-config.state';
import { type TaskConfigDependencies, TaskConfigScreen } from './task-config.screen';

export interface DocumentReportOptions extends Record<string, boolean | string> {
  includeHiddenLibraries: boolean;
  includeSubfolders: boolean;
  includeVersionCount: boolean;
  /** Comma, semicolon or space separated, e.g. `pdf, .docx`. Empty reports every file. */
  extensionFilter: string;
}

export const documentReportConfigDescriptor: TaskConfigDescriptor<DocumentReportOptions> = {
  title: 'New Document Report',
  taskType: TaskType.DocumentReport,
  defaultNamePrefix: 'Document Report',
  detailScreen: ScreenKey.DocumentReportDetail,
  defaultOptions: {
    includeHiddenLibraries: false,
    includeSubfolders: true,
    includeVersionCount: true,
    extensionFilter: '',
  },
  optionFields: [
    { key: 'includeHiddenLibraries', label: 'Include hidden libraries' },
    { key: 'includeSubfolders', label: 'Include subfolders' },
    { key: 'includeVersionCount', label: 'Include version count' },
    { key: 'extensionFilter', label: 'Extension filter' },
  ],
  buildConfiguration: (connectionId, siteUrls, options) =>
    ({
      connectionId,
      targetSiteUrls: siteUrls,
      includeHiddenLibraries: options.includeHiddenLibraries,
      includeSubfolders: options.includeSubfolders,
      includeVersionCount: options.includeVersionCount,
      extensionFilter: options.extensionFilter.trim(),
    }) satisfies DocumentReportConfiguration,
};

export class DocumentReportConfigScreen extends TaskConfigScreen<DocumentReportOptions> {
  public constructor(dependencies: TaskConfigDependencies) {
    super(ScreenKey.DocumentReportConfig, documentReportConfigDescriptor, dependencies);
  }
}
