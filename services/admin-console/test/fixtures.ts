import type { AuthCookies } from '../src/auth/auth-cookies';
import { type Connection, ConnectionType } from '../src/connections/connection';
import type {
  AdHocUserItem,
  AdHocUsersReportResult,
  SiteAdHocUsersResult,
} from '../src/reports/ad-hoc-users/ad-hoc-users.models';
import type {
  DocumentReportItem,
  DocumentReportResult,
  SiteDocumentResult,
} from '../src/reports/document-report/document-report.models';
import { type TaskDefinition, TaskStatus, TaskType } from '../src/tasks/task-definition';

export const SITE_URL = 'https://contoso.sharepoint.com/sites/finance';
export const OTHER_SITE_URL = 'https://contoso.sharepoint.com/sites/legal';

export function aConnection(overrides: Partial<Connection> = {}): Connection {
  return {
    id: 'connection-1',
    name: 'Contoso',
    type: ConnectionType.Admin,
    tenantName: 'contoso',
    createdAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function someCookies(overrides: Partial<AuthCookies> = {}): AuthCookies {
  return {
    domain: 'contoso-admin.sharepoint.com',
    fedAuth: 'test-fedauth',
    rtFa: 'test-rtfa',
    capturedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function aTask(overrides: Partial<TaskDefinition> = {}): TaskDefinition {
  return {
    id: 'task-1',
    name: 'Finance documents',
    type: TaskType.DocumentReport,
    connectionId: 'connection-1',
    targetSiteUrls: [SITE_URL],
    status: TaskStatus.Pending,
    createdAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function aDocument(overrides: Partial<DocumentReportItem> = {}): DocumentReportItem {
  return {
    fileName: 'budget.xlsx',
    extension: 'xlsx',
    sizeBytes: 2048,
    createdDate: '2024-02-01T10:00:00.000Z',
    createdBy: 'Alex Wilber',
    modifiedDate: '2024-02-02T11:00:00.000Z',
    modifiedBy: 'Megan Bowen',
    fileUrl: `https://contoso.sharepoint.com/sites/finance/Shared Documents/budget.xlsx`,
    serverRelativeUrl: '/sites/finance/Shared Documents/budget.xlsx',
    siteCollectionUrl: SITE_URL,
    siteTitle: 'Finance',
    libraryTitle: 'Shared Documents',
    versionCount: 1,
    folderPath: 'Shared Documents',
    ...overrides,
  };
}

export function aDocumentSite(overrides: Partial<SiteDocumentResult> = {}): SiteDocumentResult {
  return {
    siteUrl: SITE_URL,
    siteTitle: 'Finance',
    success: true,
    documents: [],
    librariesProcessed: 1,
    ...overrides,
  };
}

export function aDocumentResult(
  siteResults: SiteDocumentResult[],
  overrides: Partial<DocumentReportResult> = {},
): DocumentReportResult {
  const failedSites = siteResults.filter((site) => !site.success).length;
  return {
    id: 'result-1',
    taskId: 'task-1',
    executedAt: '2024-03-05T07:08:09.000Z',
    completedAt: '2024-03-05T07:09:09.000Z',
    success: failedSites === 0,
    totalSitesProcessed: siteResults.length,
    successfulSites: siteResults.length - failedSites,
    failedSites,
    siteResults,
    executionLog: [],
    ...overrides,
  };
}

export function aGuest(overrides: Partial<AdHocUserItem> = {}): AdHocUserItem {
  return {
    siteUrl: SITE_URL,
    siteTitle: 'Finance',
    loginName: 'i:0#.f|membership|urn%3aspo%3aguest#jane@fabrikam.com',
    title: 'Jane Doe',
    email: 'jane@fabrikam.com',
    id: 12,
    isSiteAdmin: false,
    principalType: 'User',
    ...overrides,
  };
}

export function anAdHocSite(overrides: Partial<SiteAdHocUsersResult> = {}): SiteAdHocUsersResult {
  return {
    siteUrl: SITE_URL,
    siteTitle: 'Finance',
    success: true,
    users: [],
    ...overrides,
  };
}

export function anAdHocResult(
  siteResults: SiteAdHocUsersResult[],
  overrides: Partial<AdHocUsersReportResult> = {},
): AdHocUsersReportResult {
  const failedSites = siteResults.filter((site) => !site.success).length;
  return {
    id: 'result-1',
    taskId: 'task-1',
    executedAt: '2024-03-05T07:08:09.000Z',
    completedAt: '2024-03-05T07:09:09.000Z',
    success: failedSites === 0,
    totalSitesProcessed: siteResults.length,
    successfulSites: siteResults.length - failedSites,
    failedSites,
    siteResults,
    executionLog: [],
    ...overrides,
  };
}
