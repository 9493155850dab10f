import { randomUUID } from 'node:crypto';
import { z } from 'zod';

export const SiteResultBaseSchema = z.object({
  siteUrl: z.string(),
  siteTitle: z.string().prefault(''),
  success: z.boolean(),
  errorMessage: z.string().optional(),
});

export type SiteResultBase = z.infer<typeof SiteResultBaseSchema>;

export const reportResultSchema = <TSite extends z.ZodType>(siteResult: TSite) =>
  z.object({
    id: z.string(),
    taskId: z.string(),
    executedAt: z.iso.datetime(),
    completedAt: z.iso.datetime().optional(),
    success: z.boolean(),
    errorMessage: z.string().optional(),
    totalSitesProcessed: z.number().int().min(0),
    successfulSites: z.number().int().min(0),
    failedSites: z.number().int().min(0),
    siteResults: z.array(siteResult),
    executionLog: z.array(z.string()),
  });

export interface ReportResult<TSite extends SiteResultBase> {
  id: string;
  taskId: string;
  executedAt: string;
  completedAt?: string;
  success: boolean;
  errorMessage?: string;
  totalSitesProcessed: number;
  successfulSites: number;
  failedSites: number;
  siteResults: TSite[];
  executionLog: string[];
}

export function createReportResult<TSite extends SiteResultBase>(
  taskId: string,
  now = new Date(),
): ReportResult<TSite> {
  return {
    id: randomUUID(),
    taskId,
    executedAt: now.toISOString(),
    success: false,
    totalSitesProcessed: 0,
    successfulSites: 0,
    failedSites: 0,
    siteResults: [],
    executionLog: [],
  };
}

export function successfulSiteUrls(result: ReportResult<SiteResultBase>): string[] {
  return result.siteResults.filter((site) => site.success).map((site) => site.siteUrl);
}
