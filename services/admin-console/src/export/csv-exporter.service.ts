import { writeFile } from 'node:fs/promises';
import { Injectable, Logger } from '@nestjs/common';
import { MAX_EXPORT_FOLDER_LEVELS } from '../constants/defaults.constants';
import {
  type AdHocUserItem,
  type AdHocUsersReportResult,
  getAllUsers,
  guestCount,
  type SiteAdHocUsersResult,
} from '../reports/ad-hoc-users/ad-hoc-users.models';
import {
  type DocumentReportItem,
  type DocumentReportResult,
  getAllDocuments,
  type SiteDocumentResult,
  siteTotalDocuments,
  siteTotalSizeBytes,
  sizeFormatted,
} from '../reports/document-report/document-report.models';
import { formatSize } from '../utils/format-size.util';
import { type CsvColumn, toCsv } from './csv';
import type { ICsvExporter } from './csv-exporter.interface';

const siteStatus = (site: { success: boolean }) => (site.success ? 'Success' : 'Failed');

/**
 * `Level{k}` is the site URL followed by the first k segments of the folder path, or empty
 * when the document sits less than k folders deep.
 */
export function folderLevels(siteUrl: string, folderPath: string): string[] {
  const base = siteUrl.replace(/\/+$/, '');
  const segments = folderPath.split('/').filter((segment) => segment.length > 0);
  return Array.from({ length: MAX_EXPORT_FOLDER_LEVELS }, (_, index) =>
    index < segments.length ? `${base}/${segments.slice(0, index + 1).join('/')}` : '',
  );
}

const AD_HOC_USER_COLUMNS: CsvColumn<AdHocUserItem>[] = [
  { header: 'SiteUrl', value: (user) => user.siteUrl },
  { header: 'SiteTitle', value: (user) => user.siteTitle },
  { header: 'LoginName', value: (user) => user.loginName },
  { header: 'Title', value: (user) => user.title },
  { header: 'Email', value: (user) => user.email },
  { header: 'Id', value: (user) => user.id },
  { header: 'IsSiteAdmin', value: (user) => user.isSiteAdmin },
  { header: 'PrincipalType', value: (user) => user.principalType },
];

const AD_HOC_SITE_COLUMNS: CsvColumn<SiteAdHocUsersResult>[] = [
  { header: 'SiteUrl', value: (site) => site.siteUrl },
  { header: 'SiteTitle', value: (site) => site.siteTitle },
  { header: 'GuestCount', value: guestCount },
  { header: 'Status', value: siteStatus },
  { header: 'Error', value: (site) => site.errorMessage },
];

type DocumentRow = DocumentReportItem & { levels: string[] };

const DOCUMENT_COLUMNS: CsvColumn<DocumentRow>[] = [
  { header: 'FileName', value: (document) => document.fileName },
  { header: 'Extension', value: (document) => document.extension },
  { header: 'SizeBytes', value: (document) => document.sizeBytes },
  { header: 'SizeFormatted', value: sizeFormatted },
  { header: 'CreatedDate', value: (document) => document.createdDate },
  { header: 'CreatedBy', value: (document) => document.createdBy },
  { header: 'ModifiedDate', value: (document) => document.modifiedDate },
  { header: 'ModifiedBy', value: (document) => document.modifiedBy },
  { header: 'FileUrl', value: (document) => document.fileUrl },
  { header: 'SiteCollectionUrl', value: (document) => document.siteCollectionUrl },
  { header: 'SiteTitle', value: (document) => document.siteTitle },
  { header: 'LibraryTitle', value: (document) => document.libraryTitle },
  { header: 'VersionCount', value: (document) => document.versionCount },
  ...Array.from(
    { length: MAX_EXPORT_FOLDER_LEVELS },
    (_, index): CsvColumn<DocumentRow> => ({
      header: `Level${index + 1}`,
      value: (document) => document.levels[index],
    }),
  ),
];

const DOCUMENT_SITE_COLUMNS: CsvColumn<SiteDocumentResult>[] = [
  { header: 'SiteUrl', value: (site) => site.siteUrl },
  { header: 'SiteTitle', value: (site) => site.siteTitle },
  { header: 'LibrariesProcessed', value: (site) => site.librariesProcessed },
  { header: 'TotalDocuments', value: siteTotalDocuments },
  { header: 'TotalSizeBytes', value: siteTotalSizeBytes },
  { header: 'TotalSizeFormatted', value: (site) => formatSize(siteTotalSizeBytes(site)) },
  { header: 'Status', value: siteStatus },
  { header: 'Error', value: (site) => site.errorMessage },
];

@Injectable()
export class CsvExporterService implements ICsvExporter {
  private readonly logger = new Logger(this.constructor.name);

  public async exportAdHocUsersReport(result: AdHocUsersReportResult, filePath: string): Promise<void> {
    await this.write(filePath, toCsv(AD_HOC_USER_COLUMNS, getAllUsers(result)));
  }

  public async exportAdHocUsersReportSummary(
    result: AdHocUsersReportResult,
    filePath: string,
  ): Promise<void> {
    await this.write(filePath, toCsv(AD_HOC_SITE_COLUMNS, result.siteResults));
  }

  public async exportDocumentReport(result: DocumentReportResult, filePath: string): Promise<void> {
    const rows = getAllDocuments(result).map((document) => ({
      ...document,
      levels: folderLevels(document.siteCollectionUrl, document.folderPath),
    }));
    await this.write(filePath, toCsv(DOCUMENT_COLUMNS, rows));
  }

  public async exportDocumentReportSummary(
    result: DocumentReportResult,
    filePath: string,
  ): Promise<void> {
    await this.write(filePath, toCsv(DOCUMENT_SITE_COLUMNS, result.siteResults));
  }

  private async write(filePath: string, content: string): Promise<void> {
    await writeFile(filePath, content, 'utf-8');
    this.logger.log({ msg: 'Exported CSV', filePath });
  }
}
