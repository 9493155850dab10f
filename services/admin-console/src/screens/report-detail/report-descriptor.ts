import type { IAuthenticationService } from '../../auth/authentication-service.interface';
import type { ICsvExporter } from '../../export/csv-exporter.interface';
import type { ReportResult, SiteResultBase } from '../../reports/report-result';
import type { TaskDefinition } from '../../tasks/task-definition';
import type { ProgressSink } from '../../tasks/task-progress';
import type { ITaskService } from '../../tasks/task-service.interface';

export type AnyReportResult = ReportResult<SiteResultBase>;

/**
 * What differs between the report detail screens: which service calls load, run and export a
 * result, and how its items are filtered and shown.
 */
export interface ReportDescriptor<TResult extends AnyReportResult, TItem> {
  readonly title: string;
  /** Middle part of the default export file name. */
  readonly exportName: string;
  readonly itemsTitle: string;
  readonly itemColumns: string[];
  readonly siteColumns: string[];

  loadLatest(taskService: ITaskService, taskId: string): Promise<TResult | undefined>;
  execute(
    taskService: ITaskService,
    task: TaskDefinition,
    authService: IAuthenticationService,
    onProgress: ProgressSink,
    signal: AbortSignal,
  ): Promise<TResult>;
  exportItems(exporter: ICsvExporter, result: TResult, filePath: string): Promise<void>;
  exportSummary(exporter: ICsvExporter, result: TResult, filePath: string): Promise<void>;

  items(result: TResult): TItem[];
  itemSiteUrl(item: TItem): string;
  /** `needle` is trimmed and lowercased. */
  matchesSearch(item: TItem, needle: string): boolean;
  itemRow(item: TItem): string[];
  siteRows(result: TResult): string[][];
  filterStatus(shown: number, result: TResult): string;
  completedStatus(result: TResult): string;
}
