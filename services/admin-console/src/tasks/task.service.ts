import { randomUUID } from 'node:crypto';
import { elapsedSecondsLog, json, normalizeError, sanitizeError } from '@spo-admin/utils';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { sortBy } from 'remeda';
import type { z } from 'zod';
import { isValidCookies } from '../auth/auth-cookies';
import type { IAuthenticationService } from '../auth/authentication-service.interface';
import type { Config } from '../config';
import { AdHocUsersCollector } from '../reports/ad-hoc-users/ad-hoc-users.collector';
import {
  type AdHocUsersReportResult,
  AdHocUsersReportResultSchema,
} from '../reports/ad-hoc-users/ad-hoc-users.models';
import { DocumentReportCollector } from '../reports/document-report/document-report.collector';
import {
  type DocumentReportResult,
  DocumentReportResultSchema,
} from '../reports/document-report/document-report.models';
import { createReportResult, type ReportResult, type SiteResultBase } from '../reports/report-result';
import type { JsonDataStore } from '../storage/json-data.store';
import { JsonDataStoreFactory } from '../storage/json-data-store.factory';
import { createSiteUrlLogger } from '../utils/logging.util';
import { appendLog } from './execution-log';
import type {
  ISiteReportCollector,
  ReportConfigurationBase,
  SiteCollectionContext,
} from './site-report-collector.interface';
import { type TaskDefinition, TaskDefinitionSchema, TaskStatus } from './task-definition';
import type { ProgressSink } from './task-progress';
import { ResultKind, TaskResultStore } from './task-result.store';
import type { ITaskService } from './task-service.interface';

const TASKS_FILE_NAME = 'tasks.json';

interface ReportRun<TConfiguration extends ReportConfigurationBase, TSite extends SiteResultBase> {
  task: TaskDefinition;
  authService: IAuthenticationService;
  collector: ISiteReportCollector<TConfiguration, TSite>;
  resultKind: ResultKind;
  onProgress?: ProgressSink;
  signal?: AbortSignal;
}

function groupByHost(siteUrls: string[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const siteUrl of siteUrls) {
    const host = new URL(siteUrl).host;
    const group = groups.get(host);
    if (group) {
      group.push(siteUrl);
    } else {
      groups.set(host, [siteUrl]);
    }
  }
  return groups;
}

@Injectable()
export class TaskService implements ITaskService {
  private readonly logger = new Logger(this.constructor.name);
  private readonly store: JsonDataStore<TaskDefinition>;
  private readonly logSiteUrl: (siteUrl: string) => string;

  public constructor(
    storeFactory: JsonDataStoreFactory,
    private readonly resultStore: TaskResultStore,
    private readonly adHocUsersCollector: AdHocUsersCollector,
    private readonly documentReportCollector: DocumentReportCollector,
    configService: ConfigService<Config, true>,
  ) {
    this.store = storeFactory.create(TASKS_FILE_NAME, TaskDefinitionSchema);
    this.logSiteUrl = createSiteUrlLogger(configService);
  }

  public async getAllTasks(): Promise<TaskDefinition[]> {
    const tasks = await this.store.getAll();
    return sortBy(tasks, [(task) => task.lastRunAt ?? task.createdAt, 'desc']);
  }

  public async getTask(id: string): Promise<TaskDefinition | undefined> {
    return this.store.getById(id);
  }

  public async saveTask(task: TaskDefinition): Promise<void> {
    if (!task.id) task.id = randomUUID();
    await this.store.save(task);
  }

  public async deleteTask(id: string): Promise<void> {
    const deletedResults = await this.resultStore.deleteForTask(id);
    await this.store.delete(id);
    this.logger.log({ msg: 'Deleted task', taskId: id, deletedResults });
  }

  public async executeAdHocUsersReport(
    task: TaskDefinition,
    authService: IAuthenticationService,
    onProgress?: ProgressSink,
    signal?: AbortSignal,
  ): Promise<AdHocUsersReportResult> {
    return this.runReport({
      task,
      authService,
      collector: this.adHocUsersCollector,
      resultKind: ResultKind.AdHocUsers,
      onProgress,
      signal,
    });
  }

  public async executeDocumentReport(
    task: TaskDefinition,
    authService: IAuthenticationService,
    onProgress?: ProgressSink,
    signal?: AbortSignal,
  ): Promise<DocumentReportResult> {
    return this.runReport({
      task,
      authService,
      collector: this.documentReportCollector,
      resultKind: ResultKind.DocumentReport,
      onProgress,
      signal,
    });
  }

  public async getLatestAdHocUsersReportResult(
    taskId: string,
  ): Promise<AdHocUsersReportResult | undefined> {
    return this.resultStore.findLatest(ResultKind.AdHocUsers, taskId, AdHocUsersReportResultSchema);
  }

  public async getLatestDocumentReportResult(taskId: string): Promise<DocumentReportResult | undefined> {
    return this.resultStore.findLatest(ResultKind.DocumentReport, taskId, DocumentReportResultSchema);
  }

  private async runReport<
    TConfiguration extends ReportConfigurationBase,
    TSite extends SiteResultBase,
  >({
    task,
    authService,
    collector,
    resultKind,
    onProgress,
    signal = new AbortController().signal,
  }: ReportRun<TConfiguration, TSite>): Promise<ReportResult<TSite>> {
    const startedAt = new Date();
    const result = createReportResult<TSite>(task.id, startedAt);
    const log = (message: string) => appendLog(result.executionLog, message);

    task.status = TaskStatus.Running;
    task.lastRunAt = startedAt.toISOString();
    task.lastError = undefined;
    await this.saveTask(task);

    this.logger.log({ msg: `Starting ${collector.reportName}`, taskId: task.id });

    try {
      const configuration = this.resolveConfiguration(task, collector.configurationSchema);
      const targetSiteUrls =
        configuration.targetSiteUrls.length > 0 ? configuration.targetSiteUrls : task.targetSiteUrls;
      log(`Starting ${collector.reportName} task for ${targetSiteUrls.length} sites`);
      for (const line of collector.describeConfiguration(configuration)) log(line);

      let processedCount = 0;
      const recordSite = (site: TSite) => {
        result.siteResults.push(site);
        result.totalSitesProcessed++;
        if (site.success) {
          result.successfulSites++;
        } else {
          result.failedSites++;
        }
      };

      for (const [host, siteUrls] of groupByHost(targetSiteUrls)) {
        log(`Processing domain: ${host}`);
        const cookies = await authService.getStoredCookies(host);

        if (!cookies || !isValidCookies(cookies)) {
          log(`No valid credentials for ${host} - skipping ${siteUrls.length} sites`);
          for (const siteUrl of siteUrls) {
            recordSite(collector.failedSite(siteUrl, 'Authentication required'));
          }
          processedCount += siteUrls.length;
          continue;
        }

        for (const siteUrl of siteUrls) {
          signal.throwIfAborted();

          processedCount++;
          onProgress?.({
            currentSite: processedCount,
            totalSites: targetSiteUrls.length,
            currentSiteUrl: siteUrl,
            message: `Processing ${processedCount}/${targetSiteUrls.length}: ${siteUrl}`,
          });
          log(`Processing site: ${siteUrl}`);

          const site = await this.collectSite(collector, {
            cookies,
            siteUrl,
            configuration,
            log,
            signal,
          });
          recordSite(site);
        }
      }

      result.success = result.failedSites === 0;
      for (const line of collector.summarize(result)) log(line);

      task.status = result.success ? TaskStatus.Completed : TaskStatus.Failed;
      if (!result.success) task.lastError = `${result.failedSites} site(s) failed`;
    } catch (error) {
      result.success = false;
      if (signal.aborted) {
        result.errorMessage = 'Task was cancelled';
        log('Task cancelled by user');
        task.status = TaskStatus.Cancelled;
        task.lastError = 'Cancelled';
      } else {
        const { message } = normalizeError(error);
        result.errorMessage = message;
        log(`Task failed: ${message}`);
        task.status = TaskStatus.Failed;
        task.lastError = message;
        this.logger.error({
          msg: `${collector.reportName} failed`,
          taskId: task.id,
          error: sanitizeError(error),
        });
      }
    }

    const completedAt = new Date();
    result.completedAt = completedAt.toISOString();
    task.completedAt = completedAt.toISOString();
    await this.saveTask(task);
    await this.resultStore.save(resultKind, result);

    this.logger.log({
      msg: `Finished ${collector.reportName}`,
      taskId: task.id,
      status: task.status,
      successfulSites: result.successfulSites,
      failedSites: result.failedSites,
      duration: elapsedSecondsLog(startedAt),
    });
    return result;
  }

  private resolveConfiguration<TConfiguration extends ReportConfigurationBase>(
    task: TaskDefinition,
    schema: z.ZodType<TConfiguration>,
  ): TConfiguration {
    if (!task.configurationJson) {
      return schema.parse({
        connectionId: task.connectionId,
        targetSiteUrls: task.targetSiteUrls,
      });
    }

    const configuration = json(schema).safeParse(task.configurationJson);
    if (!configuration.success) {
      const reason = configuration.error.issues
        .map(({ path, message }) =>
          path.length > 0 ? `${path.map(String).join('.')}: ${message}` : message,
        )
        .join('; ');
      throw new Error(`Invalid configuration: ${reason}`);
    }
    return configuration.data;
  }

  private async collectSite<TConfiguration extends ReportConfigurationBase, TSite extends SiteResultBase>(
    collector: ISiteReportCollector<TConfiguration, TSite>,
    context: SiteCollectionContext<TConfiguration>,
  ): Promise<TSite> {
    try {
      return await collector.collectSite(context);
    } catch (error) {
      if (context.signal.aborted) throw error;

      const { message } = normalizeError(error);
      context.log(`  Exception: ${message}`);
      this.logger.warn({
        msg: 'Site failed',
        siteUrl: this.logSiteUrl(context.siteUrl),
        error: sanitizeError(error),
      });
      return collector.failedSite(context.siteUrl, message);
    }
  }
}
