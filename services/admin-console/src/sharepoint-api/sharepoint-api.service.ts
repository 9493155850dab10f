import { sanitizeError } from '@spo-admin/utils';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AuthCookies } from '../auth/auth-cookies';
import type { Config } from '../config';
import { RENDER_LIST_ROW_LIMIT } from '../constants/defaults.constants';
import type { DocumentReportItem } from '../reports/document-report/document-report.models';
import { createSiteUrlLogger } from '../utils/logging.util';
import { parseRenderListDataRow } from './render-list-data.parser';
import { SharepointHttpError } from './sharepoint-http.error';
import { SharepointRestHttpService } from './sharepoint-rest-http.service';
import {
  type ListInfo,
  ListsResponseSchema,
  RenderListDataResponseSchema,
  type SiteInfo,
  type SiteUser,
  SiteUsersResponseSchema,
  WebResponseSchema,
} from './sharepoint.types';

type SessionCookies = Pick<AuthCookies, 'fedAuth' | 'rtFa'>;

export interface LibraryFilesOptions {
  includeSubfolders: boolean;
  includeVersionCount: boolean;
}

export interface LibraryFilesResult {
  documents: DocumentReportItem[];
  /** Set when paging stopped early; `documents` then holds the pages read so far. */
  errorMessage?: string;
}

const LIST_FIELDS =
  'Id,Title,ItemCount,Hidden,Created,LastItemModifiedDate,BaseTemplate,RootFolder/ServerRelativeUrl';
const SITE_USER_FIELDS = 'Id,LoginName,Title,Email,IsSiteAdmin,PrincipalType';

const VIEW_FIELDS = [
  'FileLeafRef',
  'FileRef',
  'File_x0020_Size',
  'Created',
  'Modified',
  'Author',
  'Editor',
  '_UIVersionString',
];

export function buildDocumentsViewXml(includeSubfolders: boolean): string {
  const scope = includeSubfolders ? " Scope='RecursiveAll'" : '';
  const fieldRefs = VIEW_FIELDS.map((field) => `<FieldRef Name='${field}'/>`).join('');
  return (
    `<View${scope}>` +
    "<Query><Where><Eq><FieldRef Name='FSObjType'/><Value Type='Integer'>0</Value></Eq></Where></Query>" +
    `<ViewFields>${fieldRefs}</ViewFields>` +
    `<RowLimit Paged='TRUE'>${RENDER_LIST_ROW_LIMIT}</RowLimit>` +
    '</View>'
  );
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

function odataStringLiteral(value: string): string {
  return encodeURIComponent(value.replaceAll("'", "''"));
}

@Injectable()
export class SharepointApiService {
  private readonly logger = new Logger(this.constructor.name);
  private readonly logSiteUrl: (siteUrl: string) => string;

  public constructor(
    private readonly httpService: SharepointRestHttpService,
    configService: ConfigService<Config, true>,
  ) {
    this.logSiteUrl = createSiteUrlLogger(configService);
  }

  public async getSiteInfo(
    cookies: SessionCookies,
    siteUrl: string,
    signal?: AbortSignal,
  ): Promise<SiteInfo> {
    return this.httpService.requestJson({
      url: `${trimTrailingSlash(siteUrl)}/_api/web`,
      cookies,
      schema: WebResponseSchema,
      signal,
    });
  }

  public async getLists(
    cookies: SessionCookies,
    siteUrl: string,
    includeHidden: boolean,
    signal?: AbortSignal,
  ): Promise<ListInfo[]> {
    const lists = await this.httpService.requestJson({
      url: `${trimTrailingSlash(siteUrl)}/_api/web/lists?$select=${LIST_FIELDS}&$expand=RootFolder`,
      cookies,
      schema: ListsResponseSchema,
      signal,
    });
    return includeHidden ? lists : lists.filter((list) => !list.hidden);
  }

  /**
   * Reads every file of a library through RenderListDataAsStream, following `NextHref` until the
   * last page. A failing page ends paging and is reported next to the files read so far.
   */
  public async getDocumentLibraryFiles(
    cookies: SessionCookies,
    siteUrl: string,
    libraryTitle: string,
    options: LibraryFilesOptions,
    signal?: AbortSignal,
  ): Promise<LibraryFilesResult> {
    const baseApiUrl = `${trimTrailingSlash(siteUrl)}/_api/web/lists/GetByTitle('${odataStringLiteral(libraryTitle)}')/RenderListDataAsStream`;
    const body = {
      parameters: { RenderOptions: 2, ViewXml: buildDocumentsViewXml(options.includeSubfolders) },
    };
    const documents: DocumentReportItem[] = [];
    let nextHref: string | undefined;
    let page = 0;

    do {
      page++;
      let response: { Row: Record<string, unknown>[]; NextHref?: string };
      try {
        response = await this.httpService.requestJson({
          url: `${baseApiUrl}${nextHref ?? ''}`,
          cookies,
          schema: RenderListDataResponseSchema,
          method: 'POST',
          body,
          signal,
        });
      } catch (error) {
        if (!(error instanceof SharepointHttpError)) throw error;

        this.logger.warn({
          msg: 'Library page request failed, keeping the files read so far',
          siteUrl: this.logSiteUrl(siteUrl),
          page,
          error: sanitizeError(error),
        });
        return {
          documents,
          errorMessage: `Page ${page}: HTTP ${error.statusCode} - ${error.responseSnippet ?? error.message}`,
        };
      }

      for (const row of response.Row) {
        const document = parseRenderListDataRow(row, {
          siteUrl,
          libraryTitle,
          includeVersionCount: options.includeVersionCount,
        });
        if (document) documents.push(document);
      }
      nextHref = response.NextHref || undefined;
    } while (nextHref);

    this.logger.debug({
      msg: 'Read document library',
      siteUrl: this.logSiteUrl(siteUrl),
      pages: page,
      documents: documents.length,
    });
    return { documents };
  }

  /**
   * Site users whose login name contains `loginNameFilter`. The filter runs server side first;
   * tenants that reject the `$filter` get the full list filtered here.
   */
  public async getSiteUsers(
    cookies: SessionCookies,
    siteUrl: string,
    loginNameFilter?: string,
    signal?: AbortSignal,
  ): Promise<SiteUser[]> {
    const usersUrl = `${trimTrailingSlash(siteUrl)}/_api/web/siteusers?$select=${SITE_USER_FIELDS}`;
    if (!loginNameFilter) {
      return this.httpService.requestJson({
        url: usersUrl,
        cookies,
        schema: SiteUsersResponseSchema,
        signal,
      });
    }

    // LoginName is stored URL encoded, so the encoded marker has to be encoded once more
    const serverFilter = loginNameFilter.replaceAll('%3a', '%253a');
    try {
      return await this.httpService.requestJson({
        url: `${usersUrl}&$filter=substringof('${serverFilter}',LoginName)`,
        cookies,
        schema: SiteUsersResponseSchema,
        signal,
      });
    } catch (error) {
      if (!(error instanceof SharepointHttpError) || error.isAuthenticationFailure) throw error;

      this.logger.debug({
        msg: 'Server side login name filter rejected, filtering locally',
        siteUrl: this.logSiteUrl(siteUrl),
        statusCode: error.statusCode,
      });
    }

    const allUsers = await this.httpService.requestJson({
      url: usersUrl,
      cookies,
      schema: SiteUsersResponseSchema,
      signal,
    });
    const needle = loginNameFilter.toLowerCase();
    return allUsers.filter((user) => user.LoginName.toLowerCase().includes(needle));
  }
}
