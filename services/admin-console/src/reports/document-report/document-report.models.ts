import { z } from 'zod';
import { formatSize } from '../../utils/format-size.util';
import { type ReportResult, reportResultSchema, SiteResultBaseSchema } from '../report-result';

export const DocumentReportConfigurationSchema = z.object({
  connectionId: z.string().prefault(''),
  targetSiteUrls: z.array(z.string()).prefault([]),
  includeHiddenLibraries: z.boolean().prefault(false),
  includeSubfolders: z.boolean().prefault(true),
  includeVersionCount: z.boolean().prefault(true),
  extensionFilter: z.string().prefault(''),
});

export type DocumentReportConfiguration = z.infer<typeof DocumentReportConfigurationSchema>;

export const DocumentReportItemSchema = z.object({
  fileName: z.string(),
  extension: z.string(),
  sizeBytes: z.number().min(0),
  createdDate: z.string(),
  createdBy: z.string(),
  modifiedDate: z.string(),
  modifiedBy: z.string(),
  fileUrl: z.string(),
  serverRelativeUrl: z.string(),
  siteCollectionUrl: z.string(),
  siteTitle: z.string(),
  libraryTitle: z.string(),
  versionCount: z.number().int(),
  folderPath: z.string(),
});

export type DocumentReportItem = z.infer<typeof DocumentReportItemSchema>;

export const SiteDocumentResultSchema = SiteResultBaseSchema.extend({
  documents: z.array(DocumentReportItemSchema),
  librariesProcessed: z.number().int().min(0),
});

export type SiteDocumentResult = z.infer<typeof SiteDocumentResultSchema>;

export const DocumentReportResultSchema = reportResultSchema(SiteDocumentResultSchema);

export type DocumentReportResult = ReportResult<SiteDocumentResult>;

export interface DocumentReportSummary {
  totalDocuments: number;
  totalSizeBytes: number;
  totalLibraries: number;
}

export function sizeFormatted(item: Pick<DocumentReportItem, 'sizeBytes'>): string {
  return formatSize(item.sizeBytes);
}

export function siteTotalDocuments(site: SiteDocumentResult): number {
  return site.documents.length;
}

export function siteTotalSizeBytes(site: SiteDocumentResult): number {
  return site.documents.reduce((sum, document) => sum + document.sizeBytes, 0);
}

export function getAllDocuments(result: DocumentReportResult): DocumentReportItem[] {
  return result.siteResults.flatMap((site) => site.documents);
}

export function getSummary(result: DocumentReportResult): DocumentReportSummary {
  return result.siteResults.reduce<DocumentReportSummary>(
    (summary, site) => ({
      totalDocuments: summary.totalDocuments + siteTotalDocuments(site),
      totalSizeBytes: summary.totalSizeBytes + siteTotalSizeBytes(site),
      totalLibraries: summary.totalLibraries + site.librariesProcessed,
    }),
    { totalDocuments: 0, totalSizeBytes: 0, totalLibraries: 0 },
  );
}

/**
 * `".PDF; docx, .xlsx"` → `{'pdf', 'docx', 'xlsx'}`
 */
export function parseExtensionFilter(extensionFilter: string): Set<string> {
  return new Set(
    extensionFilter
      .split(/[,; ]/)
      .map((extension) => extension.trim().replace(/^\.+/, '').toLowerCase())
      .filter((extension) => extension.length > 0),
  );
}
