import type { AdHocUsersReportResult } from '../reports/ad-hoc-users/ad-hoc-users.models';
import type { DocumentReportResult } from '../reports/document-report/document-report.models';

export const CSV_EXPORTER = Symbol('CSV_EXPORTER');

/** Every export overwrites `filePath` and rejects on I/O failure. */
export interface ICsvExporter {
  exportAdHocUsersReport(result: AdHocUsersReportResult, filePath: string): Promise<void>;
  exportAdHocUsersReportSummary(result: AdHocUsersReportResult, filePath: string): Promise<void>;
  exportDocumentReport(result: DocumentReportResult, filePath: string): Promise<void>;
  exportDocumentReportSummary(result: DocumentReportResult, filePath: string): Promise<void>;
}
