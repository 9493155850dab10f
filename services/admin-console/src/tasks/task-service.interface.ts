import type { IAuthenticationService } from '../auth/authentication-service.interface';
import type { AdHocUsersReportResult } from '../reports/ad-hoc-users/ad-hoc-users.models';
import type { DocumentReportResult } from '../reports/document-report/document-report.models';
import type { TaskDefinition } from './task-definition';
import type { ProgressSink } from './task-progress';

export const TASK_SERVICE = Symbol('TASK_SERVICE');

export interface ITaskService {
  /** Most recently run (or created) first. */
  getAllTasks(): Promise<TaskDefinition[]>;
  getTask(id: string): Promise<TaskDefinition | undefined>;
  saveTask(task: TaskDefinition): Promise<void>;
  /** Removes the task together with every saved result of it. */
  deleteTask(id: string): Promise<void>;
  /**
   * Runs the report, persists the task state and the result, and resolves with the result. Only
   * persistence failures reject; site failures, invalid configuration and cancellation through
   * `signal` end up in the result.
   */
  executeAdHocUsersReport(
    task: TaskDefinition,
    authService: IAuthenticationService,
    onProgress?: ProgressSink,
    signal?: AbortSignal,
  ): Promise<AdHocUsersReportResult>;
  executeDocumentReport(
    task: TaskDefinition,
    authService: IAuthenticationService,
    onProgress?: ProgressSink,
    signal?: AbortSignal,
  ): Promise<DocumentReportResult>;
  getLatestAdHocUsersReportResult(taskId: string): Promise<AdHocUsersReportResult | undefined>;
  getLatestDocumentReportResult(taskId: string): Promise<DocumentReportResult | undefined>;
}
