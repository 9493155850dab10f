import type { DocumentReportItem } from '../reports/document-report/document-report.models';
import type { RenderListDataRow } from './sharepoint.types';

export interface RowContext {
  siteUrl: string;
  libraryTitle: string;
  includeVersionCount: boolean;
}

function readString(row: RenderListDataRow, field: string): string {
  const value = row[field];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

/**
 * Person fields arrive as `[{ id, title, email, ... }]`, older farms send plain text.
 */
function readPersonTitle(row: RenderListDataRow, field: string): string {
  const value = row[field];
  if (typeof value === 'string') return value;
  if (!Array.isArray(value)) return '';

  const people: unknown[] = value;
  for (const person of people) {
    if (typeof person === 'object' && person !== null && 'title' in person) {
      return typeof person.title === 'string' ? person.title : '';
    }
  }
  return '';
}

function readFileSize(row: RenderListDataRow): number {
  const raw =
    readString(row, 'File_x0020_Size') ||
    readString(row, 'FileSizeDisplay') ||
    readString(row, 'SMTotalFileStreamSize');
  const cleaned = raw.replaceAll(',', '').replaceAll(' ', '').replaceAll('bytes', '');
  const size = /^\d+$/.test(cleaned) ? Number(cleaned) : 0;
  return Number.isSafeInteger(size) ? size : 0;
}

// `_UIVersionString` is "3.0" for the third major version.
function readVersionCount(row: RenderListDataRow): number {
  const version = readString(row, '_UIVersionString');
  const dotIndex = version.indexOf('.');
  if (dotIndex <= 0) return 1;

  const major = Number.parseInt(version.slice(0, dotIndex), 10);
  return Number.isNaN(major) ? 1 : major;
}

// The dotted variants carry an ISO timestamp, the plain ones a localized display string.
function readDate(row: RenderListDataRow, field: string): string {
  const candidates = [readString(row, `${field}.`), readString(row, field)];
  for (const candidate of candidates) {
    if (!candidate) continue;
    const date = new Date(candidate);
    if (!Number.isNaN(date.getTime())) return date.toISOString();
  }
  return '';
}

function extensionOf(fileName: string): string {
  const dotIndex = fileName.lastIndexOf('.');
  return dotIndex >= 0 ? fileName.slice(dotIndex + 1).toLowerCase() : '';
}

/**
 * `/sites/hr/Shared Documents/Policies/leave.pdf` in library `Shared Documents` gives
 * `Shared Documents/Policies`. Without a library segment the whole directory is returned.
 */
export function extractFolderPath(serverRelativeUrl: string, libraryTitle: string): string {
  const lastSlash = serverRelativeUrl.lastIndexOf('/');
  if (lastSlash <= 0) return '';

  const directory = serverRelativeUrl.slice(0, lastSlash);
  const libraryIndex = directory.toLowerCase().indexOf(`/${libraryTitle.toLowerCase()}`);
  return libraryIndex >= 0 ? directory.slice(libraryIndex + 1) : directory;
}

export function parseRenderListDataRow(
  row: RenderListDataRow,
  { siteUrl, libraryTitle, includeVersionCount }: RowContext,
): DocumentReportItem | undefined {
  const fileName = readString(row, 'FileLeafRef');
  const fileRef = readString(row, 'FileRef');
  if (!fileName || !fileRef) return undefined;

  const site = new URL(siteUrl);
  return {
    fileName,
    extension: extensionOf(fileName),
    sizeBytes: readFileSize(row),
    createdDate: readDate(row, 'Created'),
    createdBy: readPersonTitle(row, 'Author'),
    modifiedDate: readDate(row, 'Modified'),
    modifiedBy: readPersonTitle(row, 'Editor'),
    fileUrl: `${site.protocol}//${site.host}${fileRef}`,
    serverRelativeUrl: fileRef,
    siteCollectionUrl: siteUrl,
    siteTitle: '',
    libraryTitle,
    versionCount: includeVersionCount ? readVersionCount(row) : 1,
    folderPath: extractFolderPath(fileRef, libraryTitle),
  };
}
