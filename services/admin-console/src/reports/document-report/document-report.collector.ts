import { normalizeError } from '@spo-admin/utils';
import { Injectable } from '@nestjs/common';
import { DOCUMENT_LIBRARY_BASE_TEMPLATE } from '../../constants/defaults.constants';
import { SharepointApiService } from '../../sharepoint-api/sharepoint-api.service';
import type {
  ISiteReportCollector,
  SiteCollectionContext,
} from '../../tasks/site-report-collector.interface';
import { formatSize } from '../../utils/format-size.util';
import type { ReportResult } from '../report-result';
import {
  type DocumentReportConfiguration,
  DocumentReportConfigurationSchema,
  type DocumentReportItem,
  getSummary,
  parseExtensionFilter,
  type SiteDocumentResult,
} from './document-report.models';

@Injectable()
export class DocumentReportCollector
  implements ISiteReportCollector<DocumentReportConfiguration, SiteDocumentResult>
{
  public readonly reportName = 'document report';
  public readonly configurationSchema = DocumentReportConfigurationSchema;

  public constructor(private readonly sharepointApi: SharepointApiService) {}

  public describeConfiguration(configuration: DocumentReportConfiguration): string[] {
    const extensions = parseExtensionFilter(configuration.extensionFilter);
    return extensions.size > 0 ? [`Extension filter: ${[...extensions].join(', ')}`] : [];
  }

  public async collectSite({
    cookies,
    siteUrl,
    configuration,
    log,
    signal,
  }: SiteCollectionContext<DocumentReportConfiguration>): Promise<SiteDocumentResult> {
    const { Title: siteTitle } = await this.sharepointApi.getSiteInfo(cookies, siteUrl, signal);

    let lists: Awaited<ReturnType<SharepointApiService['getLists']>>;
    try {
      lists = await this.sharepointApi.getLists(
        cookies,
        siteUrl,
        configuration.includeHiddenLibraries,
        signal,
      );
    } catch (error) {
      throw new Error(`Failed to get lists: ${normalizeError(error).message}`, { cause: error });
    }

    const libraries = lists.filter((list) => list.baseTemplate === DOCUMENT_LIBRARY_BASE_TEMPLATE);
    log(`  Found ${libraries.length} document libraries`);

    const extensions = parseExtensionFilter(configuration.extensionFilter);
    const documents: DocumentReportItem[] = [];
    let librariesProcessed = 0;

    for (const library of libraries) {
      signal.throwIfAborted();
      log(`  Processing library: ${library.title}`);

      try {
        const libraryFiles = await this.sharepointApi.getDocumentLibraryFiles(
          cookies,
          siteUrl,
          library.title,
          {
            includeSubfolders: configuration.includeSubfolders,
            includeVersionCount: configuration.includeVersionCount,
          },
          signal,
        );
        if (libraryFiles.errorMessage) {
          log(`    Error getting files: ${libraryFiles.errorMessage}`);
        }

        const files = libraryFiles.documents
          .filter((document) => extensions.size === 0 || extensions.has(document.extension))
          .map((document) => ({ ...document, siteTitle }));
        documents.push(...files);
        librariesProcessed++;
        log(`    Found ${files.length} documents`);
      } catch (error) {
        if (signal.aborted) throw error;
        log(`    Error getting files: ${normalizeError(error).message}`);
      }
    }

    log(`  Site completed: ${documents.length} documents, ${librariesProcessed} libraries`);
    return { siteUrl, siteTitle, success: true, documents, librariesProcessed };
  }

  public failedSite(siteUrl: string, errorMessage: string): SiteDocumentResult {
    return {
      siteUrl,
      siteTitle: '',
      success: false,
      errorMessage,
      documents: [],
      librariesProcessed: 0,
    };
  }

  public summarize(result: ReportResult<SiteDocumentResult>): string[] {
    const { totalDocuments, totalSizeBytes, totalLibraries } = getSummary(result);
    return [
      `Task completed. Sites: ${result.successfulSites} successful, ${result.failedSites} failed`,
      `Total: ${totalDocuments} documents, ${formatSize(totalSizeBytes)}, ${totalLibraries} libraries`,
    ];
  }
}
