import {
  type DocumentReportItem,
  type DocumentReportResult,
  getAllDocuments,
  getSummary,
  siteTotalDocuments,
  siteTotalSizeBytes,
  sizeFormatted,
} from '../../reports/document-report/document-report.models';
import { formatDisplayDate } from '../../utils/date-format.util';
import { formatSize } from '../../utils/format-size.util';
import { ScreenKey } from '../screen.interface';
import type { ReportDescriptor } from './report-descriptor';
import { type ReportDetailDependencies, ReportDetailScreen } from './report-detail.screen';

export const documentReportDescriptor: ReportDescriptor<DocumentReportResult, DocumentReportItem> = {
  title: 'Document Report',
  exportName: 'Documents',
  itemsTitle: 'Documents',
  itemColumns: [
    'File Name',
    'Ext',
    'Size',
    'Created',
    'Created By',
    'Modified',
    'Modified By',
    'Library',
    'Site',
    'Versions',
  ],
  siteColumns: ['Site URL', 'Title', 'Libraries', 'Documents', 'Size', 'Status', 'Error'],

  loadLatest: (taskService, taskId) => taskService.getLatestDocumentReportResult(taskId),
  execute: (taskService, task, authService, onProgress, signal) =>
    taskService.executeDocumentReport(task, authService, onProgress, signal),
  exportItems: (exporter, result, filePath) => exporter.exportDocumentReport(result, filePath),
  exportSummary: (exporter, result, filePath) =>
    exporter.exportDocumentReportSummary(result, filePath),

  items: getAllDocuments,
  itemSiteUrl: (document) => document.siteCollectionUrl,
  matchesSearch: (document, needle) =>
    document.fileName.toLowerCase().includes(needle) ||
    document.extension.toLowerCase().includes(needle),
  itemRow: (document) => [
    document.fileName,
    document.extension,
    sizeFormatted(document),
    formatDisplayDate(document.createdDate || undefined),
    document.createdBy,
    formatDisplayDate(document.modifiedDate || undefined),
    document.modifiedBy,
    document.libraryTitle,
    document.siteTitle,
    String(document.versionCount),
  ],
  siteRows: (result) =>
    result.siteResults.map((site) => [
      site.siteUrl,
      site.siteTitle,
      String(site.librariesProcessed),
      String(siteTotalDocuments(site)),
      formatSize(siteTotalSizeBytes(site)),
      site.success ? 'Success' : 'Failed',
      site.errorMessage ?? '',
    ]),
  filterStatus: (shown, result) => {
    const { totalDocuments, totalSizeBytes } = getSummary(result);
    return `Showing ${shown} of ${totalDocuments} documents (${formatSize(totalSizeBytes)} total)`;
  },
  completedStatus: (result) => {
    const { totalDocuments, totalSizeBytes, totalLibraries } = getSummary(result);
    return `Task completed. ${totalDocuments} documents, ${formatSize(totalSizeBytes)}, ${totalLibraries} libraries.`;
  },
};

export class DocumentReportDetailScreen extends ReportDetailScreen<
  DocumentReportResult,
  DocumentReportItem
> {
  public constructor(dependencies: ReportDetailDependencies) {
    super(ScreenKey.DocumentReportDetail, documentReportDescriptor, dependencies);
  }
}
